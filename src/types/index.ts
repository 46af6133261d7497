export type AnyNumber = number | bigint;
export type HexInput = string | Uint8Array;

/**
 * A JSON object as produced by `JSON.parse`, before any of its fields have been
 * decoded.
 */
export type JsonObject = { [key: string]: unknown };
