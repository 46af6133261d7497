// Copyright © Aptos Foundation
// SPDX-License-Identifier: Apache-2.0

export * from "./core";
export * from "./types";
export { loadConfig } from "./config";
export type { ConfigType, LogLevel } from "./config";
