// Copyright © Aptos Foundation
// SPDX-License-Identifier: Apache-2.0

import { bytesToHex, hexToBytes } from "@noble/hashes/utils";
import { HexInput } from "../types";
import { ParsingError, ParsingResult, toParsingResult } from "./common";

/**
 * This enum is used to explain why parsing might have failed.
 */
export enum HexInvalidReason {
  TOO_SHORT = "too_short",
  INVALID_LENGTH = "invalid_length",
  INVALID_HEX_CHARS = "invalid_hex_chars",
}

/**
 * NOTE: Do not use this class when working with account addresses, use AccountAddress.
 *
 * Hex is the low level hex codec the JSON types build on. Hex data, when represented
 * as a string, generally looks like this: 0xaabbcc, 45cd32, etc.
 *
 * Unlike most hex helpers, `0x` on its own is accepted and means zero bytes, since
 * node APIs use it for empty byte vectors. A completely empty string is rejected.
 *
 * - `Hex.fromString({ str: "0x1f" }).toUint8Array()`
 * - `new Hex({ data: new Uint8Array([1, 3]) }).toString()` returns `0x0103`
 */
export class Hex {
  private readonly data: Uint8Array;

  constructor(args: { data: Uint8Array }) {
    this.data = args.data;
  }

  toUint8Array(): Uint8Array {
    return this.data;
  }

  /**
   * @returns Lowercase hex string without the 0x prefix
   */
  toStringWithoutPrefix(): string {
    return bytesToHex(this.data);
  }

  /**
   * @returns Lowercase hex string with the 0x prefix, `0x` for empty data
   */
  toString(): string {
    return `0x${this.toStringWithoutPrefix()}`;
  }

  /**
   * Static method to convert a hex string to Hex. Upper and lower case digits are
   * both accepted.
   *
   * @param args.str A hex string, with or without the 0x prefix
   */
  static fromString(args: { str: string }): Hex {
    if (args.str.length === 0) {
      throw new ParsingError("Hex string is empty, expected at least 0x or one byte.", HexInvalidReason.TOO_SHORT);
    }

    const input = args.str.startsWith("0x") ? args.str.slice(2) : args.str;

    if (input.length % 2 !== 0) {
      throw new ParsingError("Hex string must be an even number of hex characters.", HexInvalidReason.INVALID_LENGTH);
    }

    try {
      return new Hex({ data: hexToBytes(input) });
    } catch (e) {
      const message = e instanceof Error ? e.message : String(e);
      throw new ParsingError(
        `Hex string contains invalid hex characters: ${message}`,
        HexInvalidReason.INVALID_HEX_CHARS,
        { cause: e },
      );
    }
  }

  static fromHexInput(args: { hexInput: HexInput }): Hex {
    if (args.hexInput instanceof Uint8Array) return new Hex({ data: args.hexInput });
    return Hex.fromString({ str: args.hexInput });
  }

  static isValid(args: { str: string }): ParsingResult<HexInvalidReason> {
    return toParsingResult(() => Hex.fromString(args));
  }

  /**
   * Hex instances are equal if their underlying byte data is identical.
   */
  equals(other: Hex): boolean {
    if (this.data.length !== other.data.length) return false;
    return this.data.every((value, index) => value === other.data[index]);
  }
}
