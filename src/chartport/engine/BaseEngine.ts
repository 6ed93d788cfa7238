/**
 * BaseEngine - Abstract base class for the Vega and Vega-Lite engines
 * Every output is produced the same way: compile to a Vega spec, render it
 * to SVG, then rasterize or wrap the SVG. Subclasses supply the compile step.
 */

import * as vega from "vega";
import type { Spec as VegaSpec } from "vega";
import { DEFAULT_CONFIG, FontConfig } from "../config/Config.js";
import type { Outcome, Renderer, VlVersion } from "../convert/types.js";
import { EngineError, VgOptions } from "./ConversionEngine.js";
import { EmbedMode, buildHtml } from "./HtmlTemplate.js";
import { ScriptReader, readBundleScript } from "./BundleScripts.js";
import { convertSvgToPng } from "./SvgToPng.js";
import { convertSvgToJpeg } from "./SvgToJpeg.js";
import { convertSvgToPdf } from "./SvgToPdf.js";

export interface EngineSettings {
  fonts?: FontConfig;
  readScript?: ScriptReader;
}

export function isJsonObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function unwrap<T>(outcome: Outcome<T>): T {
  if (!outcome.success) {
    throw new EngineError(outcome.error);
  }
  return outcome.data;
}

export async function renderVegaSvg(spec: VegaSpec, showWarnings = false): Promise<string> {
  const view = new vega.View(vega.parse(spec), {
    renderer: 'none',
    logLevel: showWarnings ? vega.Warn : vega.Error,
  });
  try {
    return await view.toSVG();
  } finally {
    view.finalize();
  }
}

export abstract class BaseEngine<TOptions extends VgOptions> {
  protected fonts: FontConfig;
  protected readScript: ScriptReader;

  constructor(settings: EngineSettings = {}) {
    this.fonts = settings.fonts ?? DEFAULT_CONFIG.fonts;
    this.readScript = settings.readScript ?? readBundleScript;
  }

  // Abstract methods that must be implemented by subclasses
  protected abstract getLabel(): string;
  protected abstract getEmbedMode(): EmbedMode;
  protected abstract compile(spec: Record<string, unknown>, opts: TOptions): VegaSpec;

  protected getVlVersion(_opts: TOptions): VlVersion | undefined {
    return undefined;
  }

  protected requireObject(spec: unknown): Record<string, unknown> {
    if (!isJsonObject(spec)) {
      throw new EngineError(`${this.getLabel()} spec must be a JSON object`);
    }
    return spec;
  }

  protected checkScale(scale: number): void {
    if (!Number.isFinite(scale) || scale <= 0) {
      throw new EngineError(`Scale factor must be a positive number, received ${scale}`);
    }
  }

  protected checkPpi(ppi: number): void {
    if (!Number.isFinite(ppi) || ppi <= 0) {
      throw new EngineError(`Pixels per inch must be a positive number, received ${ppi}`);
    }
  }

  protected checkQuality(quality: number): void {
    if (!Number.isInteger(quality) || quality < 0 || quality > 100) {
      throw new EngineError(`JPEG quality must be an integer between 0 and 100, received ${quality}`);
    }
  }

  public async toVega(spec: unknown, opts: TOptions): Promise<VegaSpec> {
    return this.compile(this.requireObject(spec), opts);
  }

  public async toSvg(spec: unknown, opts: TOptions): Promise<string> {
    const vgSpec = await this.toVega(spec, opts);
    return renderVegaSvg(vgSpec, opts.showWarnings);
  }

  public async toPng(spec: unknown, opts: TOptions, scale = 1.0, ppi = 72.0): Promise<Uint8Array> {
    this.checkScale(scale);
    this.checkPpi(ppi);
    const svg = await this.toSvg(spec, opts);
    return unwrap(convertSvgToPng(svg, { scale, ppi }, this.fonts));
  }

  public async toJpeg(spec: unknown, opts: TOptions, scale = 1.0, quality = 90): Promise<Uint8Array> {
    this.checkScale(scale);
    this.checkQuality(quality);
    const svg = await this.toSvg(spec, opts);
    return unwrap(convertSvgToJpeg(svg, { scale, quality }, this.fonts));
  }

  public async toPdf(spec: unknown, opts: TOptions): Promise<Uint8Array> {
    const svg = await this.toSvg(spec, opts);
    return unwrap(await convertSvgToPdf(svg, this.fonts));
  }

  public async toHtml(spec: unknown, opts: TOptions, bundle: boolean, renderer: Renderer): Promise<string> {
    const document = this.requireObject(spec);
    return buildHtml(
      document,
      {
        mode: this.getEmbedMode(),
        bundle,
        renderer,
        vlVersion: this.getVlVersion(opts),
      },
      this.readScript
    );
  }
}
