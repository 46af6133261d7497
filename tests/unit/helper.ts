// Copyright © Aptos Foundation
// SPDX-License-Identifier: Apache-2.0

import { DecodeError } from "../../src/core/common";

/**
 * Runs `fn` and returns the DecodeError it throws. Fails the test if it returns
 * normally or throws something else.
 */
export function catchDecodeError(fn: () => unknown): DecodeError {
  try {
    fn();
  } catch (e) {
    if (e instanceof DecodeError) return e;
    throw e;
  }
  throw new Error("expected a DecodeError to be thrown");
}
