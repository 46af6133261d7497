// Copyright © Aptos Foundation
// SPDX-License-Identifier: Apache-2.0

import { base64 } from "@scure/base";
import logger from "../utils/logger";
import { DecodeError, DecodeErrorReason, ParsingError, ParsingResult, toParsingResult } from "./common";
import { Hex } from "./hex";
import { describeJson, JsonCodec, parseJson } from "./json";

/**
 * Arbitrary length bytes as sent by the node API, either as hex or as standard
 * base64. Whichever form was received, the bytes are always written back as
 * lowercase 0x-prefixed hex:
 *
 * ```ts
 * HexBytes.fromJson('"0x123456"').toUint8Array(); // [0x12, 0x34, 0x56]
 * HexBytes.fromJson('"EjRW"').toString(); // "0x123456"
 * ```
 */
export class HexBytes {
  private readonly data: Uint8Array;

  constructor(args: { data: Uint8Array }) {
    this.data = args.data;
  }

  toUint8Array(): Uint8Array {
    return this.data;
  }

  toString(): string {
    return new Hex({ data: this.data }).toString();
  }

  toJSON(): string {
    return this.toString();
  }

  equals(other: HexBytes): boolean {
    if (this.data.length !== other.data.length) return false;
    return this.data.every((value, index) => value === other.data[index]);
  }

  /**
   * Decodes the content of a JSON string. The checks run in this order, and the
   * order decides what ambiguous input such as "deadbeef" means:
   * 1. a `0x` prefix means hex
   * 2. a trailing `=` means base64
   * 3. otherwise hex, then base64 if that fails
   */
  static fromString(args: { str: string }): HexBytes {
    const { str } = args;

    if (str.startsWith("0x")) {
      return new HexBytes({ data: decodeHex(str) });
    }

    if (str.endsWith("=")) {
      return new HexBytes({ data: decodeBase64(str) });
    }

    try {
      return new HexBytes({ data: Hex.fromString({ str }).toUint8Array() });
    } catch (e) {
      if (!(e instanceof ParsingError)) throw e;
      logger.debug("bytes are not hex, trying base64", { length: str.length, reason: e.invalidReason });
    }
    return new HexBytes({ data: decodeBase64(str) });
  }

  /**
   * Decodes the raw text of a JSON string token.
   */
  static fromJson(raw: string): HexBytes {
    return HexBytes.fromJsonValue(parseJson(raw, DecodeErrorReason.MALFORMED_BYTES, "bytes"));
  }

  static fromJsonValue(value: unknown): HexBytes {
    if (typeof value !== "string") {
      throw new DecodeError(
        `Expected a JSON string for bytes, got ${describeJson(value)}`,
        DecodeErrorReason.MALFORMED_BYTES,
      );
    }
    return HexBytes.fromString({ str: value });
  }

  static isValid(args: { str: string }): ParsingResult<DecodeErrorReason> {
    return toParsingResult(() => HexBytes.fromString(args));
  }
}

function malformedBytes(str: string, cause: unknown): DecodeError {
  return new DecodeError(`"${str}" is neither valid hex nor valid base64`, DecodeErrorReason.MALFORMED_BYTES, {
    cause,
  });
}

function decodeHex(str: string): Uint8Array {
  try {
    return Hex.fromString({ str }).toUint8Array();
  } catch (e) {
    throw malformedBytes(str, e);
  }
}

const BASE64_ALPHABET = "ABCDEFGHIJKLMNOPQRSTUVWXYZabcdefghijklmnopqrstuvwxyz0123456789+/";

/**
 * Zeroes the bits of the last data character that fall past the final byte, e.g.
 * "Eh==" becomes "Eg==". Characters outside the alphabet are left for the decoder
 * to reject.
 */
function clearTrailingBits(str: string): string {
  const dataLength = str.replace(/=+$/, "").length;
  const unusedBits = (dataLength * 6) % 8;
  if (unusedBits === 0) return str;

  const index = BASE64_ALPHABET.indexOf(str[dataLength - 1]);
  if (index < 0) return str;

  const cleared = BASE64_ALPHABET[index & ~((1 << unusedBits) - 1)];
  return `${str.slice(0, dataLength - 1)}${cleared}${str.slice(dataLength)}`;
}

// Line breaks are skipped and unused trailing bits may be set, but the alphabet and
// padding are checked. The empty string is valid base64 for zero bytes, but on the
// wire only "0x" means empty, so it is rejected here.
function decodeBase64(str: string): Uint8Array {
  const input = str.replace(/[\r\n]/g, "");
  if (input.length === 0) {
    throw malformedBytes(str, new Error("empty string"));
  }
  try {
    return base64.decode(clearTrailingBits(input));
  } catch (e) {
    throw malformedBytes(str, e);
  }
}

export const hexBytesCodec: JsonCodec<HexBytes> = {
  decode: (raw) => HexBytes.fromJson(raw),
  encode: (value) => JSON.stringify(value.toString()),
};
