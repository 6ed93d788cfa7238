/**
 * ConversionEngine - The rendering/compilation back end the facade drives
 *
 * One asynchronous method per (grammar, format) pair. Methods reject on
 * failure; the rejection's message is what the caller eventually sees.
 */

import type { Spec as VegaSpec } from "vega";
import type { Renderer, VlVersion } from "../convert/types.js";

export interface VgOptions {
  showWarnings?: boolean;
}

export interface VlOptions {
  vlVersion: VlVersion;
  showWarnings?: boolean;
}

export interface ConversionEngine {
  vegaToSvg(spec: unknown, opts: VgOptions): Promise<string>;
  vegaToHtml(spec: unknown, opts: VgOptions, bundle: boolean, renderer: Renderer): Promise<string>;
  vegaToPng(spec: unknown, opts: VgOptions, scale?: number, ppi?: number): Promise<Uint8Array>;
  vegaToJpeg(spec: unknown, opts: VgOptions, scale?: number, quality?: number): Promise<Uint8Array>;
  vegaToPdf(spec: unknown, opts: VgOptions): Promise<Uint8Array>;

  vegaliteToVega(spec: unknown, opts: VlOptions): Promise<VegaSpec>;
  vegaliteToSvg(spec: unknown, opts: VlOptions): Promise<string>;
  vegaliteToHtml(spec: unknown, opts: VlOptions, bundle: boolean, renderer: Renderer): Promise<string>;
  vegaliteToPng(spec: unknown, opts: VlOptions, scale?: number, ppi?: number): Promise<Uint8Array>;
  vegaliteToJpeg(spec: unknown, opts: VlOptions, scale?: number, quality?: number): Promise<Uint8Array>;
  vegaliteToPdf(spec: unknown, opts: VlOptions): Promise<Uint8Array>;
}

export type EngineFactory = () => ConversionEngine;

export class EngineError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'EngineError';
  }
}
