// Copyright © Aptos Foundation
// SPDX-License-Identifier: Apache-2.0

import { bytesToHex, hexToBytes } from "@noble/hashes/utils";
import { HexInput } from "../types";
import { DecodeError, DecodeErrorReason, ParsingError, ParsingResult, toParsingResult } from "./common";
import { describeJson } from "./json";

/**
 * This enum is used to explain why an address was invalid.
 */
export enum AddressInvalidReason {
  INCORRECT_NUMBER_OF_BYTES = "incorrect_number_of_bytes",
  INVALID_HEX_CHARS = "invalid_hex_chars",
  TOO_SHORT = "too_short",
  TOO_LONG = "too_long",
  LEADING_ZERO_X_REQUIRED = "leading_zero_x_required",
  LONG_FORM_REQUIRED_UNLESS_SPECIAL = "long_form_required_unless_special",
  INVALID_PADDING_ZEROES = "invalid_padding_zeroes",
}

/**
 * NOTE: Only use this class for account addresses. For other hex data, e.g. transaction
 * hashes, use Hash or HexBytes.
 *
 * An account address is 32 bytes. As a string it is written either in LONG form,
 * 0x followed by 64 hex characters, or in SHORT form, with the leading zeroes
 * dropped:
 * - 0x1
 * - 0xaa86fe99004361f747f91342ca13c426ca0cccb0c1217677180c9493bad6ef0c
 *
 * "Special" addresses are 0x0 through 0xf. They are the only ones printed in SHORT
 * form by toString.
 */
export class AccountAddress {
  readonly data: Uint8Array;

  static readonly LENGTH: number = 32;

  /*
   * The length of an address string in LONG form without a leading 0x.
   */
  static readonly LONG_STRING_LENGTH: number = 64;

  constructor(args: { data: Uint8Array }) {
    if (args.data.length !== AccountAddress.LENGTH) {
      throw new ParsingError(
        "AccountAddress data should be exactly 32 bytes long",
        AddressInvalidReason.INCORRECT_NUMBER_OF_BYTES,
      );
    }
    this.data = args.data;
  }

  /**
   * @returns true if every byte but the last is zero and the last is below 16.
   */
  isSpecial(): boolean {
    return (
      this.data.slice(0, this.data.length - 1).every((byte) => byte === 0) && this.data[this.data.length - 1] < 0b10000
    );
  }

  /**
   * SHORT form for special addresses, LONG form for everything else.
   */
  toString(): string {
    return `0x${this.toStringWithoutPrefix()}`;
  }

  toStringWithoutPrefix(): string {
    const hex = bytesToHex(this.data);
    return this.isSpecial() ? hex[hex.length - 1] : hex;
  }

  /**
   * LONG form unconditionally: 0x + 64 hex characters.
   */
  toStringLong(): string {
    return `0x${bytesToHex(this.data)}`;
  }

  toUint8Array(): Uint8Array {
    return this.data;
  }

  /**
   * The wire form of an address is its toString output.
   */
  toJSON(): string {
    return this.toString();
  }

  /**
   * Strict parsing. Only the LONG form with a leading 0x is accepted, plus the SHORT
   * form 0x0 to 0xf for special addresses. Use `fromStringRelaxed` for anything a
   * node API may send.
   */
  static fromString(args: { input: string }): AccountAddress {
    if (!args.input.startsWith("0x")) {
      throw new ParsingError("Hex string must start with a leading 0x.", AddressInvalidReason.LEADING_ZERO_X_REQUIRED);
    }

    const address = AccountAddress.fromStringRelaxed(args);

    if (args.input.length !== AccountAddress.LONG_STRING_LENGTH + 2) {
      if (!address.isSpecial()) {
        throw new ParsingError(
          "The given hex string is not a special address, it must be represented as 0x + 64 chars.",
          AddressInvalidReason.LONG_FORM_REQUIRED_UNLESS_SPECIAL,
        );
      }
      // 0x + one hex char is the only valid SHORT form.
      if (args.input.length !== 3) {
        throw new ParsingError(
          "The given hex string is a special address not in LONG form, it must be 0x0 to 0xf without padding zeroes.",
          AddressInvalidReason.INVALID_PADDING_ZEROES,
        );
      }
    }

    return address;
  }

  /**
   * Relaxed parsing. Accepts 1 to 64 hex characters, with or without a leading 0x,
   * padding zeroes allowed. This is the form used when decoding JSON.
   */
  static fromStringRelaxed(args: { input: string }): AccountAddress {
    const input = args.input.startsWith("0x") ? args.input.slice(2) : args.input;

    if (input.length === 0) {
      throw new ParsingError(
        "Hex string is too short, must be 1 to 64 chars long, excluding the leading 0x.",
        AddressInvalidReason.TOO_SHORT,
      );
    }

    if (input.length > AccountAddress.LONG_STRING_LENGTH) {
      throw new ParsingError(
        "Hex string is too long, must be 1 to 64 chars long, excluding the leading 0x.",
        AddressInvalidReason.TOO_LONG,
      );
    }

    let addressBytes: Uint8Array;
    try {
      addressBytes = hexToBytes(input.padStart(AccountAddress.LONG_STRING_LENGTH, "0"));
    } catch (e) {
      // Length is already checked, so only bad characters get here.
      const message = e instanceof Error ? e.message : String(e);
      throw new ParsingError(`Hex characters are invalid: ${message}`, AddressInvalidReason.INVALID_HEX_CHARS, {
        cause: e,
      });
    }

    return new AccountAddress({ data: addressBytes });
  }

  static fromHexInput(args: { input: HexInput }): AccountAddress {
    if (args.input instanceof Uint8Array) {
      return new AccountAddress({ data: args.input });
    }
    return AccountAddress.fromStringRelaxed({ input: args.input });
  }

  /**
   * Decodes an address from a parsed JSON value. Only strings are accepted; parse
   * failures surface as the ParsingError from `fromStringRelaxed`.
   */
  static fromJsonValue(value: unknown): AccountAddress {
    if (typeof value !== "string") {
      throw new DecodeError(
        `Expected a JSON string for an account address, got ${describeJson(value)}`,
        DecodeErrorReason.MALFORMED_OBJECT,
      );
    }
    return AccountAddress.fromStringRelaxed({ input: value });
  }

  static isValid(args: { input: string; relaxed?: boolean }): ParsingResult<AddressInvalidReason> {
    return toParsingResult(() =>
      args.relaxed ? AccountAddress.fromStringRelaxed({ input: args.input }) : AccountAddress.fromString(args),
    );
  }

  equals(other: AccountAddress): boolean {
    if (this.data.length !== other.data.length) return false;
    return this.data.every((value, index) => value === other.data[index]);
  }
}
