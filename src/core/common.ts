// Copyright © Aptos Foundation
// SPDX-License-Identifier: Apache-2.0

/**
 * This error is used to explain why parsing failed.
 */
export class ParsingError<T> extends Error {
  /**
   * This provides a programmatic way to access why parsing failed. Downstream devs
   * might want to use this to build their own error messages if the default error
   * messages are not suitable for their use case. This should be an enum.
   */
  public invalidReason: T;

  constructor(message: string, invalidReason: T, options?: ErrorOptions) {
    super(message, options);
    this.name = "ParsingError";
    this.invalidReason = invalidReason;
  }
}

/**
 * Whereas ParsingError is thrown when parsing fails, e.g. in a fromString function,
 * this type is returned from non-throwing functions like isValid.
 */
export type ParsingResult<T> = {
  /**
   * True if valid, false otherwise.
   */
  valid: boolean;

  /*
   * If valid is false, this will be a code explaining why parsing failed.
   */
  invalidReason?: T;

  /*
   * If valid is false, this will be a string explaining why parsing failed.
   */
  invalidReasonMessage?: string;
};

/**
 * Why a wire value could not be decoded.
 */
export enum DecodeErrorReason {
  /** Not a non-negative base 10 integer, or larger than 2^64 - 1. */
  MALFORMED_NUMBER = "malformed_number",
  /** Neither valid hex (with or without 0x) nor valid standard base64. */
  MALFORMED_BYTES = "malformed_bytes",
  /** A compound value is missing a field, or a value has the wrong JSON shape. */
  MALFORMED_OBJECT = "malformed_object",
}

/**
 * Thrown by every JSON decoder in this package. `field` is set when the failure
 * happened inside a named field of an object, and `cause` carries the error from
 * the primitive codec or collaborator that rejected the value.
 */
export class DecodeError extends ParsingError<DecodeErrorReason> {
  readonly field?: string;

  constructor(message: string, invalidReason: DecodeErrorReason, options: { field?: string; cause?: unknown } = {}) {
    super(message, invalidReason, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = "DecodeError";
    this.field = options.field;
  }
}

/**
 * Runs a throwing parser and reports the outcome as a ParsingResult.
 */
export function toParsingResult<T>(parse: () => unknown): ParsingResult<T> {
  try {
    parse();
    return { valid: true };
  } catch (e) {
    if (!(e instanceof ParsingError)) throw e;
    const error: ParsingError<T> = e;
    return {
      valid: false,
      invalidReason: error.invalidReason,
      invalidReasonMessage: error.message,
    };
  }
}
