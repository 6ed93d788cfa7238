#!/usr/bin/env node
/**
 * Chart conversion entry point
 * Usage: chartport <vega|vega-lite> <svg|html|png|jpeg|pdf|vega> input.json [--output file]
 *        [--scale n] [--ppi n] [--quality n] [--renderer svg|canvas|hybrid] [--no-bundle]
 */

import { existsSync, realpathSync } from "node:fs";
import { readFile, writeFile } from "node:fs/promises";
import { fileURLToPath } from "node:url";
import { parseArgs } from "node:util";
import { z } from "zod";
import { Converter } from "./Converter.js";
import { errorMessage } from "./ConversionDispatcher.js";
import {
  BinaryResult,
  ConversionParams,
  ERROR,
  Grammar,
  TargetFormat,
  TextResult,
} from "./types.js";

export const USAGE =
  'Usage: chartport <vega|vega-lite> <svg|html|png|jpeg|pdf|vega> input.json [--output file] ' +
  '[--scale n] [--ppi n] [--quality n] [--renderer svg|canvas|hybrid] [--no-bundle]';

export interface CliIO {
  readFile(path: string): Promise<string>;
  writeFile(path: string, data: string | Uint8Array): Promise<void>;
  stdout(text: string): void;
  stderr(text: string): void;
}

export const nodeIO: CliIO = {
  readFile: (path) => readFile(path, 'utf8'),
  writeFile: (path, data) => writeFile(path, data),
  stdout: (text) => { process.stdout.write(text); },
  stderr: (text) => { process.stderr.write(text); },
};

const GrammarArg = z.enum(['vega', 'vega-lite']);
const FormatArg = z.enum(['svg', 'html', 'png', 'jpeg', 'pdf', 'vega']);
const NumberArg = z.coerce.number();

function parseNumber(name: string, value: string | undefined): number | undefined {
  if (value === undefined) {
    return undefined;
  }
  const parsed = NumberArg.safeParse(value);
  if (!parsed.success) {
    throw new Error(`--${name} expects a number, got: ${value}`);
  }
  return parsed.data;
}

function convert(
  converter: Converter,
  grammar: Grammar,
  format: TargetFormat,
  spec: string,
  params: ConversionParams
): Promise<TextResult | BinaryResult> | TextResult {
  switch (format) {
    case 'svg':
      return converter.convertText({ grammar, format: 'svg' }, spec, params);
    case 'html':
      return converter.convertText({ grammar, format: 'html' }, spec, params);
    case 'vega':
      return grammar === 'vega-lite'
        ? converter.convertText({ grammar, format: 'vega' }, spec, params)
        : [ERROR, 'Only Vega-Lite specs compile to Vega'];
    case 'png':
    case 'jpeg':
    case 'pdf':
      return converter.convertBinary({ grammar, format }, spec, params);
  }
}

export async function runCli(argv: string[], io: CliIO = nodeIO, converter?: Converter): Promise<number> {
  try {
    const { values, positionals } = parseArgs({
      args: argv,
      allowPositionals: true,
      options: {
        output: { type: 'string', short: 'o' },
        scale: { type: 'string' },
        ppi: { type: 'string' },
        quality: { type: 'string' },
        renderer: { type: 'string' },
        'no-bundle': { type: 'boolean' },
      },
    });

    if (positionals.length !== 3) {
      io.stderr(`${USAGE}\n`);
      return 1;
    }

    const grammar = GrammarArg.safeParse(positionals[0]);
    const format = FormatArg.safeParse(positionals[1]);
    if (!grammar.success || !format.success) {
      io.stderr(`Error: unknown grammar or format\n${USAGE}\n`);
      return 1;
    }

    const binary = format.data === 'png' || format.data === 'jpeg' || format.data === 'pdf';
    if (binary && !values.output) {
      io.stderr(`Error: ${format.data} output is binary, pass --output <file>\n`);
      return 1;
    }

    const params: ConversionParams = {
      scale: parseNumber('scale', values.scale),
      ppi: parseNumber('ppi', values.ppi),
      quality: parseNumber('quality', values.quality),
      renderer: values.renderer,
      bundle: values['no-bundle'] ? false : undefined,
    };

    const spec = await io.readFile(positionals[2]);
    const result = await convert(converter ?? new Converter(), grammar.data, format.data, spec, params);
    if (result[0] === ERROR) {
      io.stderr(`Error: ${result[1]}\n`);
      return 1;
    }

    if (values.output) {
      await io.writeFile(values.output, result[1]);
      io.stderr(`Written: ${values.output}\n`);
    } else {
      io.stdout(typeof result[1] === 'string' ? `${result[1]}\n` : '');
    }
    return 0;
  } catch (error) {
    io.stderr(`Error: ${errorMessage(error)}\n`);
    return 1;
  }
}

// Main execution
const invokedPath = process.argv[1];
if (invokedPath && existsSync(invokedPath) && realpathSync(invokedPath) === fileURLToPath(import.meta.url)) {
  runCli(process.argv.slice(2)).then(
    (code) => { process.exitCode = code; },
    (error: unknown) => {
      console.error('Error converting chart:', errorMessage(error));
      process.exitCode = 1;
    }
  );
}
