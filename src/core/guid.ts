// Copyright © Aptos Foundation
// SPDX-License-Identifier: Apache-2.0

import { AnyNumber } from "../types";
import { AccountAddress } from "./account_address";
import { DecodeError, DecodeErrorReason, ParsingResult, toParsingResult } from "./common";
import { decodeField, describeJson, isJsonObject, JsonCodec, parseJson } from "./json";
import { U64 } from "./u64";

export type EventGuidJson = {
  creation_number: string;
  account_address: string;
};

/**
 * The GUID attached to a v1 event: the creator's address and the creation number
 * of the event handle.
 *
 * NOTE: this only matches the `guid` of entries in a transaction's `events`. The
 * `GUID` resource that shows up in a transaction's `changes` has a different
 * shape and must not be decoded with this class.
 *
 * ```ts
 * const guid = EventGuid.fromJson('{"creation_number": 5, "account_address": "0x1"}');
 * JSON.stringify(guid); // {"creation_number":"5","account_address":"0x1"}
 * ```
 */
export class EventGuid {
  readonly creationNumber: bigint;

  readonly accountAddress: AccountAddress;

  /**
   * @throws DecodeError if creationNumber is not a u64
   */
  constructor(args: { creationNumber: AnyNumber; accountAddress: AccountAddress }) {
    this.creationNumber = U64.fromBigInt(args.creationNumber).toBigInt();
    this.accountAddress = args.accountAddress;
  }

  /**
   * Fields are always written in this order, with the creation number quoted.
   */
  toJSON(): EventGuidJson {
    return {
      creation_number: this.creationNumber.toString(10),
      account_address: this.accountAddress.toString(),
    };
  }

  toString(): string {
    return JSON.stringify(this.toJSON());
  }

  equals(other: EventGuid): boolean {
    return this.creationNumber === other.creationNumber && this.accountAddress.equals(other.accountAddress);
  }

  static fromJson(raw: string): EventGuid {
    return EventGuid.fromJsonValue(parseJson(raw, DecodeErrorReason.MALFORMED_OBJECT, "event GUID"));
  }

  /**
   * Both fields are required. Fields other than `creation_number` and
   * `account_address` are ignored.
   */
  static fromJsonValue(value: unknown): EventGuid {
    if (!isJsonObject(value)) {
      throw new DecodeError(
        `Expected a JSON object for an event GUID, got ${describeJson(value)}`,
        DecodeErrorReason.MALFORMED_OBJECT,
      );
    }

    const creationNumber = decodeField(value, "creation_number", U64.fromJsonValue);
    const accountAddress = decodeField(value, "account_address", AccountAddress.fromJsonValue);
    return new EventGuid({ creationNumber: creationNumber.toBigInt(), accountAddress });
  }

  static isValid(args: { raw: string }): ParsingResult<DecodeErrorReason> {
    return toParsingResult(() => EventGuid.fromJson(args.raw));
  }
}

export const eventGuidCodec: JsonCodec<EventGuid> = {
  decode: (raw) => EventGuid.fromJson(raw),
  encode: (value) => value.toString(),
};
