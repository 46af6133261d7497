// Copyright © Aptos Foundation
// SPDX-License-Identifier: Apache-2.0

import { DecodeError, DecodeErrorReason } from "./common";
import { describeJson, JsonCodec, parseJson } from "./json";

/**
 * A 32 byte hash, such as a transaction or state root hash, carried as its hex
 * text: 64 hex characters, usually with a leading 0x.
 *
 * The text is passed through untouched. Nothing checks the length or the
 * characters, so callers that need the bytes should go through HexBytes.
 *
 * TODO: decide whether this should hold a fixed 32 byte array instead of text.
 */
export class Hash {
  private readonly value: string;

  constructor(value: string) {
    this.value = value;
  }

  toString(): string {
    return this.value;
  }

  toJSON(): string {
    return this.value;
  }

  equals(other: Hash): boolean {
    return this.value === other.value;
  }

  static fromJson(raw: string): Hash {
    return Hash.fromJsonValue(parseJson(raw, DecodeErrorReason.MALFORMED_OBJECT, "hash"));
  }

  static fromJsonValue(value: unknown): Hash {
    if (typeof value !== "string") {
      throw new DecodeError(
        `Expected a JSON string for a hash, got ${describeJson(value)}`,
        DecodeErrorReason.MALFORMED_OBJECT,
      );
    }
    return new Hash(value);
  }
}

export const hashCodec: JsonCodec<Hash> = {
  decode: (raw) => Hash.fromJson(raw),
  encode: (value) => JSON.stringify(value.toString()),
};
