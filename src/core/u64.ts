// Copyright © Aptos Foundation
// SPDX-License-Identifier: Apache-2.0

import { isLosslessNumber } from "lossless-json";
import { AnyNumber } from "../types";
import { DecodeError, DecodeErrorReason, ParsingResult, toParsingResult } from "./common";
import { describeJson, JsonCodec, parseJson } from "./json";

export const MAX_U64_BIG_INT: bigint = 2n ** 64n - 1n;

const DECIMAL_DIGITS = /^[0-9]+$/;

/**
 * An unsigned 64 bit integer as sent by the node API.
 *
 * Node APIs quote u64 values so that clients limited to doubles keep every bit,
 * but some endpoints send bare JSON numbers. Both are accepted on decode:
 *
 * ```ts
 * U64.fromJson('"18446744073709551615"').toBigInt(); // 18446744073709551615n
 * U64.fromJson("42").toBigInt(); // 42n
 * ```
 *
 * Encoding always produces the quoted decimal form, `"42"`.
 */
export class U64 {
  private readonly value: bigint;

  // Only reachable through fromBigInt and fromString, which both reject values
  // outside [0, 2^64 - 1], so `value` is always a valid u64.
  private constructor(value: bigint) {
    this.value = value;
  }

  toBigInt(): bigint {
    return this.value;
  }

  /**
   * @returns The value in base 10, without quotes
   */
  toString(): string {
    return this.value.toString(10);
  }

  toJSON(): string {
    return this.toString();
  }

  equals(other: U64): boolean {
    return this.value === other.value;
  }

  /**
   * Range checked construction from an in-memory integer.
   */
  static fromBigInt(n: AnyNumber): U64 {
    if (typeof n === "number" && !Number.isSafeInteger(n)) {
      throw new DecodeError(`${n} is not an integer within the safe number range`, DecodeErrorReason.MALFORMED_NUMBER);
    }

    const value = BigInt(n);
    if (value < 0n || value > MAX_U64_BIG_INT) {
      throw new DecodeError(`${value} is outside the u64 range`, DecodeErrorReason.MALFORMED_NUMBER);
    }
    return new U64(value);
  }

  /**
   * Parses a base 10 literal. Only ASCII digits are allowed: no sign, no
   * whitespace, no exponent. Leading zeroes are fine.
   */
  static fromString(args: { str: string }): U64 {
    const { str } = args;
    if (!DECIMAL_DIGITS.test(str)) {
      throw new DecodeError(`Invalid u64 literal "${str}"`, DecodeErrorReason.MALFORMED_NUMBER);
    }

    const value = BigInt(str);
    if (value > MAX_U64_BIG_INT) {
      throw new DecodeError(`u64 literal "${str}" exceeds ${MAX_U64_BIG_INT}`, DecodeErrorReason.MALFORMED_NUMBER);
    }
    return new U64(value);
  }

  /**
   * Decodes the raw text of a single JSON token. If the token starts and ends with
   * a double quote it is a JSON string and its content is the literal, otherwise the
   * token text itself is the literal.
   */
  static fromJson(raw: string): U64 {
    if (raw.length >= 2 && raw.startsWith('"') && raw.endsWith('"')) {
      const str = parseJson(raw, DecodeErrorReason.MALFORMED_NUMBER, "u64");
      if (typeof str !== "string") {
        throw new DecodeError(`Invalid u64 literal ${raw}`, DecodeErrorReason.MALFORMED_NUMBER);
      }
      return U64.fromString({ str });
    }
    return U64.fromString({ str: raw });
  }

  /**
   * Decodes a parsed JSON value. A LosslessNumber from `parseJson` is decoded from
   * its token text, so it follows the same rules as `fromJson`. A plain number from
   * `JSON.parse` may already have lost precision, so only safe integers are taken.
   */
  static fromJsonValue(value: unknown): U64 {
    if (typeof value === "string") return U64.fromString({ str: value });
    if (isLosslessNumber(value)) return U64.fromString({ str: value.value });
    if (typeof value === "number") {
      if (!Number.isSafeInteger(value)) {
        throw new DecodeError(
          `JSON number ${value} is not a safe integer, decode its raw token with fromJson instead`,
          DecodeErrorReason.MALFORMED_NUMBER,
        );
      }
      return U64.fromBigInt(value);
    }
    throw new DecodeError(
      `Expected a JSON string or number for u64, got ${describeJson(value)}`,
      DecodeErrorReason.MALFORMED_NUMBER,
    );
  }

  static isValid(args: { raw: string }): ParsingResult<DecodeErrorReason> {
    return toParsingResult(() => U64.fromJson(args.raw));
  }
}

export const u64Codec: JsonCodec<U64> = {
  decode: (raw) => U64.fromJson(raw),
  encode: (value) => JSON.stringify(value.toString()),
};
