/**
 * SvgToJpeg.ts - JPEG encoding of rasterized charts via jpeg-js
 */

import jpeg from "jpeg-js";
import type { FontConfig } from "../config/Config.js";
import type { Outcome } from "../convert/types.js";
import { rasterizeSvg } from "./SvgToPng.js";

export interface JpegOptions {
  scale?: number;
  quality?: number;
}

export function convertSvgToJpeg(svgString: string, options: JpegOptions = {}, fonts?: FontConfig): Outcome<Uint8Array> {
  const { scale = 1.0, quality = 90 } = options;

  // JPEG has no alpha channel
  const raster = rasterizeSvg(svgString, { scale, background: 'white' }, fonts);
  if (!raster.success) {
    return raster;
  }

  const { pixels, width, height } = raster.data;
  const encoded = jpeg.encode({ data: pixels, width, height }, quality);
  return { success: true, data: new Uint8Array(encoded.data) };
}
