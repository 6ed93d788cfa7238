/**
 * SvgToPdf.ts - Single-page PDF documents via pdf-lib
 *
 * The page is sized to the chart in points (one SVG pixel per point) and
 * holds the chart rasterized at twice that density.
 */

import { PDFDocument } from "pdf-lib";
import type { FontConfig } from "../config/Config.js";
import type { Outcome } from "../convert/types.js";
import { extractSvgDimensions, rasterizeSvg } from "./SvgToPng.js";

export const PDF_RASTER_SCALE = 2;

export async function convertSvgToPdf(svgString: string, fonts?: FontConfig): Promise<Outcome<Uint8Array>> {
  const dimensions = extractSvgDimensions(svgString);
  if (!dimensions) {
    return { success: false, error: 'Could not extract SVG dimensions from SVG string' };
  }

  const raster = rasterizeSvg(svgString, { scale: PDF_RASTER_SCALE }, fonts);
  if (!raster.success) {
    return raster;
  }

  const { width, height } = dimensions;
  const doc = await PDFDocument.create();
  doc.setProducer('chartport');
  doc.setCreator('chartport');

  const image = await doc.embedPng(raster.data.png);
  const page = doc.addPage([width, height]);
  page.drawImage(image, { x: 0, y: 0, width, height });

  return { success: true, data: await doc.save() };
}
