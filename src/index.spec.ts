/**
 * @license
 * Copyright 2025 Google Inc.
 * Licensed under the Apache License, Version 2.0 (the "License");
 * you may not use this file except in compliance with the License.
 * You may obtain a copy of the License at
 *
 *      http://www.apache.org/licenses/LICENSE-2.0
 *
 * Unless required by applicable law or agreed to in writing, software
 * distributed under the License is distributed on an "AS IS" BASIS,
 * WITHOUT WARRANTIES OR CONDITIONS OF ANY KIND, either express or implied.
 * See the License for the specific language governing permissions and
 * limitations under the License.
 */

import { test, expect } from "vitest";
import {
  BASE64_PAD,
  Base64Encoder,
  encodeBase64ToString,
  getBase64EncodedLength,
} from "#src/index.js";

test("public entry point", () => {
  expect(BASE64_PAD).toEqual(0x3d);
  expect(getBase64EncodedLength(5)).toEqual(8);
  expect(encodeBase64ToString(Uint8Array.of(0x4d, 0x61))).toEqual("TWE=");
  expect(new Base64Encoder().capacity).toEqual(0);
});
