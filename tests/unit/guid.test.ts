// Copyright © Aptos Foundation
// SPDX-License-Identifier: Apache-2.0

import { AccountAddress, AddressInvalidReason } from "../../src/core/account_address";
import { DecodeErrorReason, ParsingError } from "../../src/core/common";
import { EventGuid, eventGuidCodec } from "../../src/core/guid";
import { U64 } from "../../src/core/u64";
import { catchDecodeError } from "./helper";

const LONG_ADDRESS = "0xaa86fe99004361f747f91342ca13c426ca0cccb0c1217677180c9493bad6ef0c";

describe("EventGuid", () => {
  describe("decoding", () => {
    it("decodes both fields", () => {
      const guid = EventGuid.fromJson('{"creation_number": "3", "account_address": "0x1"}');
      expect(guid.creationNumber).toBe(3n);
      expect(guid.accountAddress.equals(AccountAddress.fromJsonValue("0x1"))).toBe(true);
    });

    it("accepts a bare number for the creation number", () => {
      const guid = EventGuid.fromJson(`{"creation_number": 7, "account_address": "${LONG_ADDRESS}"}`);
      expect(guid.creationNumber).toBe(7n);
      expect(guid.accountAddress.toString()).toBe(LONG_ADDRESS);
    });

    it("decodes the largest u64 as a bare number", () => {
      const guid = EventGuid.fromJson('{"creation_number": 18446744073709551615, "account_address": "0x1"}');
      expect(guid.creationNumber).toBe(18446744073709551615n);
    });

    it.each(["1e3", "1.0", "-0", "5.00"])("rejects the bare creation number %s", (token) => {
      const error = catchDecodeError(() =>
        EventGuid.fromJson(`{"creation_number": ${token}, "account_address": "0x1"}`),
      );
      expect(error.invalidReason).toBe(DecodeErrorReason.MALFORMED_NUMBER);
      expect(error.field).toBe("creation_number");
      expect(error.message).toBe(`Invalid field "creation_number": Invalid u64 literal "${token}"`);
    });

    it("ignores unknown fields", () => {
      const guid = EventGuid.fromJsonValue({ creation_number: "1", account_address: "0x2", id: "x" });
      const expected = new EventGuid({ creationNumber: 1n, accountAddress: AccountAddress.fromJsonValue("0x2") });
      expect(guid.equals(expected)).toBe(true);
    });

    it.each(["creation_number", "account_address"])("rejects a missing %s", (field) => {
      const value: Record<string, unknown> = { creation_number: "3", account_address: "0x1" };
      delete value[field];

      const error = catchDecodeError(() => EventGuid.fromJsonValue(value));
      expect(error.invalidReason).toBe(DecodeErrorReason.MALFORMED_OBJECT);
      expect(error.field).toBe(field);
      expect(error.message).toBe(`Missing required field "${field}"`);
    });

    it("treats a null field as missing", () => {
      const error = catchDecodeError(() => EventGuid.fromJson('{"creation_number": null, "account_address": "0x1"}'));
      expect(error.invalidReason).toBe(DecodeErrorReason.MALFORMED_OBJECT);
      expect(error.field).toBe("creation_number");
    });

    it("reports a malformed creation number as a number error", () => {
      const error = catchDecodeError(() => EventGuid.fromJson('{"creation_number": "abc", "account_address": "0x1"}'));
      expect(error.invalidReason).toBe(DecodeErrorReason.MALFORMED_NUMBER);
      expect(error.field).toBe("creation_number");
      expect(error.message).toBe('Invalid field "creation_number": Invalid u64 literal "abc"');
    });

    it("keeps the address error as the cause", () => {
      const error = catchDecodeError(() => EventGuid.fromJson('{"creation_number": "3", "account_address": "0xzz"}'));
      expect(error.invalidReason).toBe(DecodeErrorReason.MALFORMED_OBJECT);
      expect(error.field).toBe("account_address");
      const { cause } = error;
      expect(cause instanceof ParsingError && cause.invalidReason).toBe(AddressInvalidReason.INVALID_HEX_CHARS);
    });

    it("rejects an address that is not a string", () => {
      const error = catchDecodeError(() => EventGuid.fromJsonValue({ creation_number: "3", account_address: 5 }));
      expect(error.invalidReason).toBe(DecodeErrorReason.MALFORMED_OBJECT);
      expect(error.message).toBe(
        'Invalid field "account_address": Expected a JSON string for an account address, got number',
      );
    });

    it("rejects values that are not objects", () => {
      expect(catchDecodeError(() => EventGuid.fromJson("[]")).message).toBe(
        "Expected a JSON object for an event GUID, got array",
      );
      expect(catchDecodeError(() => EventGuid.fromJson("{")).invalidReason).toBe(DecodeErrorReason.MALFORMED_OBJECT);
    });

    it("reports validity without throwing", () => {
      expect(EventGuid.isValid({ raw: '{"creation_number": "3", "account_address": "0x1"}' })).toEqual({ valid: true });
      expect(EventGuid.isValid({ raw: '{"creation_number": "3"}' })).toEqual({
        valid: false,
        invalidReason: DecodeErrorReason.MALFORMED_OBJECT,
        invalidReasonMessage: 'Missing required field "account_address"',
      });
    });
  });

  describe("encoding", () => {
    it("re-quotes a creation number decoded from a bare number", () => {
      const guid = eventGuidCodec.decode('{"account_address": "0x1", "creation_number": 7}');
      expect(eventGuidCodec.encode(guid)).toBe('{"creation_number":"7","account_address":"0x1"}');
    });

    it("decodes what it encodes", () => {
      const guid = new EventGuid({
        creationNumber: 18446744073709551615n,
        accountAddress: AccountAddress.fromJsonValue(LONG_ADDRESS),
      });
      expect(eventGuidCodec.decode(eventGuidCodec.encode(guid)).equals(guid)).toBe(true);
    });

    it("nests inside larger documents", () => {
      const guid = new EventGuid({ creationNumber: 3, accountAddress: AccountAddress.fromJsonValue("0x1") });
      expect(JSON.stringify({ guid, sequence_number: U64.fromBigInt(2) })).toBe(
        '{"guid":{"creation_number":"3","account_address":"0x1"},"sequence_number":"2"}',
      );
    });
  });

  it("rejects a creation number outside the u64 range", () => {
    const error = catchDecodeError(
      () => new EventGuid({ creationNumber: -1, accountAddress: AccountAddress.fromJsonValue("0x1") }),
    );
    expect(error.invalidReason).toBe(DecodeErrorReason.MALFORMED_NUMBER);
  });
});
