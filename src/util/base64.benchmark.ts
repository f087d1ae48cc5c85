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

import { describe, bench } from "vitest";
import {
  encodeBase64,
  encodeBase64Into,
  getBase64EncodedLength,
} from "#src/util/base64.js";
import { makeRandomBytes } from "#src/util/random_bytes.js";

for (const length of [12, 1000, 1024 * 1024]) {
  describe(`encode ${length} bytes`, () => {
    const input = makeRandomBytes(length);
    const output = new Uint8Array(getBase64EncodedLength(length));
    bench("encodeBase64", () => {
      encodeBase64(input);
    });
    bench("encodeBase64Into", () => {
      encodeBase64Into(input, 0, length, output);
    });
    bench("Buffer.toString", () => {
      Buffer.from(input.buffer, input.byteOffset, input.length).toString(
        "base64",
      );
    });
  });
}
