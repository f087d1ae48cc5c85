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

/**
 * Standard (RFC 4648, section 4) base64 encoding of byte windows.
 *
 * Output is ASCII, one byte per symbol, `=` padded to a multiple of 4.
 */

export type ByteSource = Uint8Array | Uint8ClampedArray | Int8Array;

export const BASE64_ALPHABET =
  "ABCDEFGHIJKLMNOPQRSTUVWXYZabcdefghijklmnopqrstuvwxyz0123456789+/";

// ASCII code of each symbol, indexed by 6-bit value.  Not exported.
const alphabetCodes = new TextEncoder().encode(BASE64_ALPHABET);

// "="
export const BASE64_PAD = 0x3d;

function checkNonNegativeInteger(name: string, value: number) {
  if (!Number.isSafeInteger(value) || value < 0) {
    throw new RangeError(
      `${name} must be a non-negative integer, but received ${value}`,
    );
  }
}

/**
 * Returns the number of bytes produced by encoding `length` input bytes.
 */
export function getBase64EncodedLength(length: number): number {
  checkNonNegativeInteger("length", length);
  return Math.floor((length + 2) / 3) * 4;
}

function checkWindow(input: ByteSource, offset: number, length: number) {
  checkNonNegativeInteger("offset", offset);
  checkNonNegativeInteger("length", length);
  if (offset + length > input.length) {
    throw new RangeError(
      `window [${offset}, ${offset + length}) exceeds input of length ${input.length}`,
    );
  }
}

/**
 * Encodes `input[offset, offset + length)` into `output`, starting at index 0.
 *
 * Exactly `getBase64EncodedLength(length)` bytes are written; any bytes of
 * `output` past that point are left as they were, so a single buffer may be
 * reused across calls.  Arguments are validated before anything is written.
 *
 * @returns `output`
 */
export function encodeBase64Into(
  input: ByteSource,
  offset: number,
  length: number,
  output: Uint8Array,
): Uint8Array {
  checkWindow(input, offset, length);
  const outputLength = getBase64EncodedLength(length);
  if (output.length < outputLength) {
    throw new RangeError(
      `output of length ${output.length} is smaller than required length ${outputLength}`,
    );
  }
  const alphabet = alphabetCodes;
  const tailLength = length % 3;
  const end = offset + length;
  const loopEnd = end - tailLength;
  let j = 0;
  // Bytes are masked on read: Int8Array elements are negative when the high
  // bit is set.
  for (let i = offset; i < loopEnd; i += 3, j += 4) {
    const x = input[i] & 0xff;
    const y = input[i + 1] & 0xff;
    const z = input[i + 2] & 0xff;
    output[j] = alphabet[x >>> 2];
    output[j + 1] = alphabet[((x & 0x3) << 4) | (y >>> 4)];
    output[j + 2] = alphabet[((y & 0xf) << 2) | (z >>> 6)];
    output[j + 3] = alphabet[z & 0x3f];
  }
  switch (tailLength) {
    case 1: {
      const x = input[end - 1] & 0xff;
      output[j] = alphabet[x >>> 2];
      output[j + 1] = alphabet[(x & 0x3) << 4];
      output[j + 2] = BASE64_PAD;
      output[j + 3] = BASE64_PAD;
      break;
    }
    case 2: {
      const x = input[end - 2] & 0xff;
      const y = input[end - 1] & 0xff;
      output[j] = alphabet[x >>> 2];
      output[j + 1] = alphabet[((x & 0x3) << 4) | (y >>> 4)];
      output[j + 2] = alphabet[(y & 0xf) << 2];
      output[j + 3] = BASE64_PAD;
      break;
    }
  }
  return output;
}

/**
 * Encodes `input[offset, offset + length)` into a newly allocated array.
 */
export function encodeBase64(
  input: ByteSource,
  offset = 0,
  length = input.length - offset,
): Uint8Array {
  checkWindow(input, offset, length);
  const output = new Uint8Array(getBase64EncodedLength(length));
  return encodeBase64Into(input, offset, length, output);
}

const textDecoder = new TextDecoder();

export function encodeBase64ToString(
  input: ByteSource,
  offset = 0,
  length = input.length - offset,
): string {
  return textDecoder.decode(encodeBase64(input, offset, length));
}

// Encoder that reuses one output buffer across calls, growing it as needed.
export class Base64Encoder {
  private buffer: Uint8Array;

  /**
   * @param initialInputLength Number of input bytes the initial buffer can
   *     encode without growing.
   */
  constructor(initialInputLength = 0) {
    this.buffer = new Uint8Array(getBase64EncodedLength(initialInputLength));
  }

  // Size of the output buffer, in encoded bytes.
  get capacity(): number {
    return this.buffer.length;
  }

  /**
   * Returns a view of the internal buffer holding the encoded window.  The view
   * is overwritten by the next call to `encode`.
   */
  encode(
    input: ByteSource,
    offset = 0,
    length = input.length - offset,
  ): Uint8Array {
    checkWindow(input, offset, length);
    const outputLength = getBase64EncodedLength(length);
    if (this.buffer.length < outputLength) {
      this.buffer = new Uint8Array(
        Math.max(outputLength, this.buffer.length * 2),
      );
    }
    const output = this.buffer.subarray(0, outputLength);
    return encodeBase64Into(input, offset, length, output);
  }
}
