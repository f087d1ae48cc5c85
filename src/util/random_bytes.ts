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

// crypto.getRandomValues fills at most 65536 bytes per call.
const MAX_RANDOM_VALUES_BYTES = 65536;

export function makeRandomBytes(length: number): Uint8Array {
  const data = new Uint8Array(length);
  for (let start = 0; start < length; start += MAX_RANDOM_VALUES_BYTES) {
    crypto.getRandomValues(
      data.subarray(start, Math.min(length, start + MAX_RANDOM_VALUES_BYTES)),
    );
  }
  return data;
}
