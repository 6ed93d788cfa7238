/**
 * Export.ts - Saving charts to files and JSON export
 *
 * The output format comes from `options.format` or, when absent, from the
 * file extension. Every failure, including a failed write, is returned as a
 * tagged error.
 */

import { writeFile } from "node:fs/promises";
import { extname } from "node:path";
import { Converter } from "./Converter.js";
import { errorMessage } from "./ConversionDispatcher.js";
import { DEFAULT_PARAMS } from "./OptionResolver.js";
import { parseSpec } from "./SpecIntake.js";
import { BinaryResult, ERROR, Grammar, OK, TextResult } from "./types.js";

export const EXPORT_FORMATS = ['json', 'html', 'png', 'svg', 'pdf', 'jpeg', 'jpg'] as const;
export type ExportFormat = typeof EXPORT_FORMATS[number];

export type JsonTarget = 'vega-lite' | 'vega';

export interface JsonOptions {
  grammar?: Grammar;
  target?: JsonTarget;
}

export interface SaveOptions extends JsonOptions {
  format?: string;
  bundle?: boolean;
  renderer?: string;
  scale?: number;
  ppi?: number;
  quality?: number;
}

export function parseExportFormat(value: string): ExportFormat | null {
  const normalized = value.trim().replace(/^\./, '').toLowerCase();
  return EXPORT_FORMATS.find(format => format === normalized) ?? null;
}

function unsupportedFormat(value: string): string {
  return `Unsupported export format, expected json, html, png, svg, pdf, jpeg or jpg, got: ${value}`;
}

export async function toJson(spec: string, options: JsonOptions = {}, converter: Converter = new Converter()): Promise<TextResult> {
  const { grammar = 'vega-lite', target = grammar } = options;

  if (grammar === 'vega-lite' && target === 'vega') {
    return converter.vegaliteToVega(spec);
  }
  if (grammar === 'vega' && target === 'vega-lite') {
    return [ERROR, 'A Vega spec cannot be exported as Vega-Lite'];
  }

  const parsed = parseSpec(spec, grammar);
  return parsed.success ? [OK, JSON.stringify(parsed.data)] : [ERROR, parsed.error];
}

function render(
  format: ExportFormat,
  spec: string,
  options: SaveOptions,
  converter: Converter
): Promise<TextResult | BinaryResult> {
  const vega = (options.grammar ?? 'vega-lite') === 'vega';
  const {
    bundle = DEFAULT_PARAMS.bundle,
    renderer = DEFAULT_PARAMS.renderer,
    scale = DEFAULT_PARAMS.scale,
    ppi = DEFAULT_PARAMS.ppi,
    quality = DEFAULT_PARAMS.quality,
  } = options;

  switch (format) {
    case 'json':
      return toJson(spec, options, converter);
    case 'html':
      return vega ? converter.vegaToHtml(spec, bundle, renderer) : converter.vegaliteToHtml(spec, bundle, renderer);
    case 'svg':
      return vega ? converter.vegaToSvg(spec) : converter.vegaliteToSvg(spec);
    case 'png':
      return vega ? converter.vegaToPng(spec, scale, ppi) : converter.vegaliteToPng(spec, scale, ppi);
    case 'pdf':
      return vega ? converter.vegaToPdf(spec) : converter.vegaliteToPdf(spec);
    case 'jpeg':
    case 'jpg':
      return vega ? converter.vegaToJpeg(spec, scale, quality) : converter.vegaliteToJpeg(spec, scale, quality);
  }
}

/**
 * Render `spec` and write it to `path`. Resolves to ['ok', path] once written.
 */
export async function saveChart(
  spec: string,
  path: string,
  options: SaveOptions = {},
  converter: Converter = new Converter()
): Promise<TextResult> {
  const requested = options.format ?? extname(path);
  const format = parseExportFormat(requested);
  if (!format) {
    return [ERROR, unsupportedFormat(requested.replace(/^\./, '') || '(none)')];
  }

  const result = await render(format, spec, options, converter);
  if (result[0] === ERROR) {
    return [ERROR, result[1]];
  }

  try {
    await writeFile(path, result[1]);
  } catch (error) {
    return [ERROR, `Could not write ${path}: ${errorMessage(error)}`];
  }
  return [OK, path];
}
