// Copyright © Aptos Foundation
// SPDX-License-Identifier: Apache-2.0

import { isLosslessNumber, parse } from "lossless-json";
import { JsonObject } from "../types";
import { DecodeError, DecodeErrorReason, ParsingError } from "./common";

/**
 * A JSON codec for one wire type. `decode` takes the raw JSON text of a single
 * value and throws a DecodeError if it cannot be decoded. `encode` always returns
 * the canonical JSON text for the value and never throws.
 */
export interface JsonCodec<T> {
  decode(raw: string): T;
  encode(value: T): string;
}

/**
 * Parses raw JSON text, reporting syntax errors as a DecodeError with the given reason.
 * Numbers come back as LosslessNumber holding the token text, so decoders see
 * exactly what was on the wire.
 */
export function parseJson(raw: string, reason: DecodeErrorReason, typeName: string): unknown {
  try {
    return parse(raw);
  } catch (e) {
    throw new DecodeError(`Invalid JSON for ${typeName}: ${raw}`, reason, { cause: e });
  }
}

export function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === "object" && value !== null && !Array.isArray(value) && !isLosslessNumber(value);
}

/**
 * Short name of a JSON value's shape, for error messages.
 */
export function describeJson(value: unknown): string {
  if (value === null) return "null";
  if (Array.isArray(value)) return "array";
  if (isLosslessNumber(value)) return "number";
  return typeof value;
}

/**
 * Decodes one required field of a JSON object. A missing or null field is a
 * MALFORMED_OBJECT error. Errors from `decode` are rethrown with `field` set; a
 * DecodeError keeps its reason, any other ParsingError becomes MALFORMED_OBJECT.
 */
export function decodeField<T>(object: JsonObject, field: string, decode: (value: unknown) => T): T {
  const value = object[field];
  if (value === undefined || value === null) {
    throw new DecodeError(`Missing required field "${field}"`, DecodeErrorReason.MALFORMED_OBJECT, { field });
  }

  try {
    return decode(value);
  } catch (e) {
    if (e instanceof DecodeError) {
      throw new DecodeError(`Invalid field "${field}": ${e.message}`, e.invalidReason, { field, cause: e });
    }
    if (e instanceof ParsingError) {
      throw new DecodeError(`Invalid field "${field}": ${e.message}`, DecodeErrorReason.MALFORMED_OBJECT, {
        field,
        cause: e,
      });
    }
    throw e;
  }
}
