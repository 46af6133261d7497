// Copyright © Aptos Foundation
// SPDX-License-Identifier: Apache-2.0

export * from "./account_address";
export * from "./common";
export * from "./guid";
export * from "./hash";
export * from "./hex";
export * from "./hex_bytes";
export * from "./json";
export * from "./u64";
