/**
 * ConversionCall.ts - Operations addressed by wire name
 *
 * A call is plain data, so it can cross a thread boundary; `runCall` maps
 * it back onto the facade method of the same name.
 */

import { z } from "zod";
import type { Converter } from "./Converter.js";
import type { BinaryResult, TextResult } from "./types.js";

// Range checks belong to the engine; NaN has to reach it like any other number
const Numeric = z.number().or(z.nan());

const SpecOnlyCall = z.object({
  operation: z.enum(['vega_to_svg', 'vega_to_pdf', 'vegalite_to_svg', 'vegalite_to_pdf', 'vegalite_to_vega']),
  spec: z.string(),
});

const HtmlCall = z.object({
  operation: z.enum(['vega_to_html', 'vegalite_to_html']),
  spec: z.string(),
  bundle: z.boolean(),
  renderer: z.string(),
});

const PngCall = z.object({
  operation: z.enum(['vega_to_png', 'vegalite_to_png']),
  spec: z.string(),
  scale: Numeric,
  ppi: Numeric,
});

const JpegCall = z.object({
  operation: z.enum(['vega_to_jpeg', 'vegalite_to_jpeg']),
  spec: z.string(),
  scale: Numeric,
  quality: Numeric,
});

export const ConversionCallSchema = z.union([SpecOnlyCall, HtmlCall, PngCall, JpegCall]);

export type ConversionCall = z.infer<typeof ConversionCallSchema>;

export function runCall(converter: Converter, call: ConversionCall): Promise<TextResult | BinaryResult> {
  switch (call.operation) {
    case 'vega_to_svg':
      return converter.vegaToSvg(call.spec);
    case 'vega_to_html':
      return converter.vegaToHtml(call.spec, call.bundle, call.renderer);
    case 'vega_to_png':
      return converter.vegaToPng(call.spec, call.scale, call.ppi);
    case 'vega_to_jpeg':
      return converter.vegaToJpeg(call.spec, call.scale, call.quality);
    case 'vega_to_pdf':
      return converter.vegaToPdf(call.spec);
    case 'vegalite_to_svg':
      return converter.vegaliteToSvg(call.spec);
    case 'vegalite_to_html':
      return converter.vegaliteToHtml(call.spec, call.bundle, call.renderer);
    case 'vegalite_to_png':
      return converter.vegaliteToPng(call.spec, call.scale, call.ppi);
    case 'vegalite_to_jpeg':
      return converter.vegaliteToJpeg(call.spec, call.scale, call.quality);
    case 'vegalite_to_pdf':
      return converter.vegaliteToPdf(call.spec);
    case 'vegalite_to_vega':
      return converter.vegaliteToVega(call.spec);
  }
}
