/**
 * SpecIntake.ts - Parses incoming specification text before any engine work
 */

import { Grammar, Outcome, failure, success } from "./types.js";

const INVALID_JSON: Record<Grammar, string> = {
  'vega': 'Vega spec is not valid JSON',
  'vega-lite': 'VegaLite spec is not valid JSON',
};

export function invalidJsonMessage(grammar: Grammar): string {
  return INVALID_JSON[grammar];
}

/**
 * Any JSON document passes; whether it is a usable chart is the engine's call.
 */
export function parseSpec(text: string, grammar: Grammar): Outcome<unknown> {
  try {
    const document: unknown = JSON.parse(text);
    return success(document);
  } catch {
    return failure(invalidJsonMessage(grammar));
  }
}
