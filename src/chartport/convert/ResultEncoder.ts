/**
 * ResultEncoder.ts - Wraps outcomes into the tagged two-element results
 */

import { BinaryResult, ERROR, OK, Outcome, TextResult } from "./types.js";

export const EMPTY_PAYLOAD = 'Conversion produced an empty payload';

export function encodeText(outcome: Outcome<string>): TextResult {
  return outcome.success ? [OK, outcome.data] : [ERROR, outcome.error];
}

export function encodeBinary(outcome: Outcome<Uint8Array>): BinaryResult {
  if (!outcome.success) {
    return [ERROR, outcome.error];
  }
  // ok always carries bytes
  if (outcome.data.byteLength === 0) {
    return [ERROR, EMPTY_PAYLOAD];
  }
  return [OK, outcome.data];
}

export function isOk<T>(result: readonly [typeof OK, T] | readonly [typeof ERROR, string]): result is readonly [typeof OK, T] {
  return result[0] === OK;
}
