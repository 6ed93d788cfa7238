/**
 * SvgToPng.ts - SVG rasterization using @resvg/resvg-js
 *
 * Pixel density is expressed the way print people think about it: the
 * output is scaled by `scale * ppi / 72`, 72 ppi being one pixel per point.
 */

import { Resvg } from "@resvg/resvg-js";
import type { ResvgRenderOptions } from "@resvg/resvg-js";
import type { FontConfig } from "../config/Config.js";
import type { Outcome } from "../convert/types.js";

export interface ConversionOptions {
  scale?: number;
  ppi?: number;
  /** CSS color painted under the chart; transparent when absent */
  background?: string;
}

export interface RasterImage {
  png: Uint8Array;
  /** Straight RGBA, row-major */
  pixels: Uint8Array;
  width: number;
  height: number;
}

export type ConversionResult = Outcome<RasterImage>;

export const BASE_PPI = 72;
export const MAX_DIMENSION = 16384;

export function effectiveScale(options: ConversionOptions): number {
  const { scale = 1.0, ppi = BASE_PPI } = options;
  return scale * ppi / BASE_PPI;
}

export function rasterizeSvg(svgString: string, options: ConversionOptions = {}, fonts?: FontConfig): ConversionResult {
  const dimensions = extractSvgDimensions(svgString);
  if (!dimensions) {
    return { success: false, error: 'Could not extract SVG dimensions from SVG string' };
  }

  const zoom = effectiveScale(options);
  const finalWidth = Math.round(dimensions.width * zoom);
  const finalHeight = Math.round(dimensions.height * zoom);
  if (finalWidth > MAX_DIMENSION || finalHeight > MAX_DIMENSION) {
    return {
      success: false,
      error: `Image too large: ${finalWidth}x${finalHeight} exceeds ${MAX_DIMENSION}px per side. Try reducing scale or ppi.`,
    };
  }

  const opts: ResvgRenderOptions = {
    fitTo: { mode: 'zoom', value: zoom },
    font: {
      loadSystemFonts: fonts?.loadSystemFonts ?? true,
      fontDirs: fonts?.fontDirs ?? [],
      ...(fonts?.defaultFontFamily ? { defaultFontFamily: fonts.defaultFontFamily } : {}),
    },
    ...(options.background ? { background: options.background } : {}),
  };

  try {
    const rendered = new Resvg(svgString, opts).render();
    return {
      success: true,
      data: {
        png: new Uint8Array(rendered.asPng()),
        pixels: new Uint8Array(rendered.pixels),
        width: rendered.width,
        height: rendered.height,
      },
    };
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    return { success: false, error: `Resvg conversion failed: ${message}` };
  }
}

export function convertSvgToPng(svgString: string, options: ConversionOptions = {}, fonts?: FontConfig): Outcome<Uint8Array> {
  const result = rasterizeSvg(svgString, options, fonts);
  return result.success ? { success: true, data: result.data.png } : result;
}

/**
 * Extract width and height from the root <svg> tag, falling back to viewBox
 */
export function extractSvgDimensions(svgString: string): { width: number; height: number } | null {
  const svgMatch = svgString.match(/<svg[^>]*>/);
  if (!svgMatch) {
    return null;
  }

  const svgTag = svgMatch[0];

  const widthMatch = svgTag.match(/\swidth\s*=\s*["']?(\d+(?:\.\d+)?)["']?/);
  const heightMatch = svgTag.match(/\sheight\s*=\s*["']?(\d+(?:\.\d+)?)["']?/);
  if (widthMatch && heightMatch) {
    return {
      width: parseFloat(widthMatch[1]),
      height: parseFloat(heightMatch[1]),
    };
  }

  const viewBoxMatch = svgTag.match(/viewBox\s*=\s*["']\s*-?[\d.]+[\s,]+-?[\d.]+[\s,]+(\d+(?:\.\d+)?)[\s,]+(\d+(?:\.\d+)?)\s*["']/);
  if (viewBoxMatch) {
    return {
      width: parseFloat(viewBoxMatch[1]),
      height: parseFloat(viewBoxMatch[2]),
    };
  }

  return null;
}
