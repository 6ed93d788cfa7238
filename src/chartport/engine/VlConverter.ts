/**
 * VlConverter - Default ConversionEngine, backed by vega, vega-lite and resvg
 */

import type { Spec as VegaSpec } from "vega";
import type { Renderer } from "../convert/types.js";
import { EngineSettings } from "./BaseEngine.js";
import { ConversionEngine, VgOptions, VlOptions } from "./ConversionEngine.js";
import { VegaEngine } from "./VegaEngine.js";
import { VegaLiteEngine } from "./VegaLiteEngine.js";

export class VlConverter implements ConversionEngine {
  private vega: VegaEngine;
  private vegaLite: VegaLiteEngine;

  constructor(settings: EngineSettings = {}) {
    this.vega = new VegaEngine(settings);
    this.vegaLite = new VegaLiteEngine(settings);
  }

  vegaToSvg(spec: unknown, opts: VgOptions): Promise<string> {
    return this.vega.toSvg(spec, opts);
  }

  vegaToHtml(spec: unknown, opts: VgOptions, bundle: boolean, renderer: Renderer): Promise<string> {
    return this.vega.toHtml(spec, opts, bundle, renderer);
  }

  vegaToPng(spec: unknown, opts: VgOptions, scale?: number, ppi?: number): Promise<Uint8Array> {
    return this.vega.toPng(spec, opts, scale, ppi);
  }

  vegaToJpeg(spec: unknown, opts: VgOptions, scale?: number, quality?: number): Promise<Uint8Array> {
    return this.vega.toJpeg(spec, opts, scale, quality);
  }

  vegaToPdf(spec: unknown, opts: VgOptions): Promise<Uint8Array> {
    return this.vega.toPdf(spec, opts);
  }

  vegaliteToVega(spec: unknown, opts: VlOptions): Promise<VegaSpec> {
    return this.vegaLite.toVega(spec, opts);
  }

  vegaliteToSvg(spec: unknown, opts: VlOptions): Promise<string> {
    return this.vegaLite.toSvg(spec, opts);
  }

  vegaliteToHtml(spec: unknown, opts: VlOptions, bundle: boolean, renderer: Renderer): Promise<string> {
    return this.vegaLite.toHtml(spec, opts, bundle, renderer);
  }

  vegaliteToPng(spec: unknown, opts: VlOptions, scale?: number, ppi?: number): Promise<Uint8Array> {
    return this.vegaLite.toPng(spec, opts, scale, ppi);
  }

  vegaliteToJpeg(spec: unknown, opts: VlOptions, scale?: number, quality?: number): Promise<Uint8Array> {
    return this.vegaLite.toJpeg(spec, opts, scale, quality);
  }

  vegaliteToPdf(spec: unknown, opts: VlOptions): Promise<Uint8Array> {
    return this.vegaLite.toPdf(spec, opts);
  }
}
