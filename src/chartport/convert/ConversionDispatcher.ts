/**
 * ConversionDispatcher.ts - Runs exactly one engine operation per call
 *
 * The (grammar, format) pair selects the engine method through an
 * exhaustive switch; whatever the engine rejects with becomes a failure
 * outcome carrying its message unchanged.
 */

import type { ConversionEngine, VgOptions, VlOptions } from "../engine/ConversionEngine.js";
import {
  BinaryOperationPair,
  ConversionConfig,
  Outcome,
  TextOperationPair,
  failure,
  success,
} from "./types.js";

export function errorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}

function assertNever(value: never): never {
  throw new Error(`Unhandled operation pair: ${JSON.stringify(value)}`);
}

export function vgOpts(config: ConversionConfig): VgOptions {
  return { showWarnings: config.showWarnings };
}

export function vlOpts(config: ConversionConfig): VlOptions {
  return { vlVersion: config.vlVersion, showWarnings: config.showWarnings };
}

async function runText(engine: ConversionEngine, pair: TextOperationPair, spec: unknown, config: ConversionConfig): Promise<string> {
  switch (pair.format) {
    case 'svg':
      return pair.grammar === 'vega'
        ? engine.vegaToSvg(spec, vgOpts(config))
        : engine.vegaliteToSvg(spec, vlOpts(config));
    case 'html':
      return pair.grammar === 'vega'
        ? engine.vegaToHtml(spec, vgOpts(config), config.bundle, config.renderer)
        : engine.vegaliteToHtml(spec, vlOpts(config), config.bundle, config.renderer);
    case 'vega':
      return JSON.stringify(await engine.vegaliteToVega(spec, vlOpts(config)));
    default:
      return assertNever(pair);
  }
}

async function runBinary(engine: ConversionEngine, pair: BinaryOperationPair, spec: unknown, config: ConversionConfig): Promise<Uint8Array> {
  const vega = pair.grammar === 'vega';
  switch (pair.format) {
    case 'png':
      return vega
        ? engine.vegaToPng(spec, vgOpts(config), config.scale, config.ppi)
        : engine.vegaliteToPng(spec, vlOpts(config), config.scale, config.ppi);
    case 'jpeg':
      return vega
        ? engine.vegaToJpeg(spec, vgOpts(config), config.scale, config.quality)
        : engine.vegaliteToJpeg(spec, vlOpts(config), config.scale, config.quality);
    case 'pdf':
      return vega
        ? engine.vegaToPdf(spec, vgOpts(config))
        : engine.vegaliteToPdf(spec, vlOpts(config));
    default:
      return assertNever(pair.format);
  }
}

export async function dispatchText(
  engine: ConversionEngine,
  pair: TextOperationPair,
  spec: unknown,
  config: ConversionConfig
): Promise<Outcome<string>> {
  try {
    return success(await runText(engine, pair, spec, config));
  } catch (error) {
    return failure(errorMessage(error));
  }
}

export async function dispatchBinary(
  engine: ConversionEngine,
  pair: BinaryOperationPair,
  spec: unknown,
  config: ConversionConfig
): Promise<Outcome<Uint8Array>> {
  try {
    return success(await runBinary(engine, pair, spec, config));
  } catch (error) {
    return failure(errorMessage(error));
  }
}
