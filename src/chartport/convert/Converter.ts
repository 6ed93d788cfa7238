/**
 * Converter - The conversion facade
 *
 * Every operation runs intake -> resolve -> dispatch -> encode against a
 * fresh engine and resolves to a tagged result; none of them rejects.
 */

import { ChartportConfig, loadConfig } from "../config/Config.js";
import { EngineFactory } from "../engine/ConversionEngine.js";
import { VlConverter } from "../engine/VlConverter.js";
import { Logger, createLogger } from "../util/Logger.js";
import { dispatchBinary, dispatchText } from "./ConversionDispatcher.js";
import { DEFAULT_PARAMS, resolveConfig } from "./OptionResolver.js";
import { encodeBinary, encodeText } from "./ResultEncoder.js";
import { parseSpec } from "./SpecIntake.js";
import {
  BinaryOperationPair,
  BinaryResult,
  ConversionParams,
  OPERATIONS,
  TextOperationPair,
  TextResult,
} from "./types.js";

export interface ConverterOptions {
  config?: ChartportConfig;
  createEngine?: EngineFactory;
  logger?: Logger;
}

export class Converter {
  private config: ChartportConfig;
  private createEngine: EngineFactory;
  private logger: Logger;

  constructor(options: ConverterOptions = {}) {
    const loaded = options.config ? { config: options.config, problems: [] } : loadConfig();
    this.config = loaded.config;
    this.logger = options.logger ?? createLogger('convert', this.config.debug);
    for (const problem of loaded.problems) {
      this.logger.warn(`Ignoring invalid environment setting ${problem}`);
    }

    const fonts = this.config.fonts;
    this.createEngine = options.createEngine ?? (() => new VlConverter({ fonts }));
  }

  async convertText(pair: TextOperationPair, specText: string, params: ConversionParams = {}): Promise<TextResult> {
    this.logger.debug(`${pair.grammar} -> ${pair.format}`);

    const parsed = parseSpec(specText, pair.grammar);
    if (!parsed.success) {
      return encodeText(parsed);
    }

    const resolved = resolveConfig(params, { showWarnings: this.config.showWarnings, logger: this.logger });
    if (!resolved.success) {
      return encodeText(resolved);
    }

    const outcome = await dispatchText(this.createEngine(), pair, parsed.data, resolved.data);
    if (!outcome.success) {
      this.logger.debug(`${pair.grammar} -> ${pair.format} failed: ${outcome.error}`);
    }
    return encodeText(outcome);
  }

  async convertBinary(pair: BinaryOperationPair, specText: string, params: ConversionParams = {}): Promise<BinaryResult> {
    this.logger.debug(`${pair.grammar} -> ${pair.format}`);

    const parsed = parseSpec(specText, pair.grammar);
    if (!parsed.success) {
      return encodeBinary(parsed);
    }

    const resolved = resolveConfig(params, { showWarnings: this.config.showWarnings, logger: this.logger });
    if (!resolved.success) {
      return encodeBinary(resolved);
    }

    const outcome = await dispatchBinary(this.createEngine(), pair, parsed.data, resolved.data);
    if (!outcome.success) {
      this.logger.debug(`${pair.grammar} -> ${pair.format} failed: ${outcome.error}`);
    }
    return encodeBinary(outcome);
  }

  // Vega

  vegaToSvg(spec: string): Promise<TextResult> {
    return this.convertText(OPERATIONS.vega_to_svg, spec);
  }

  vegaToHtml(spec: string, bundle: boolean = DEFAULT_PARAMS.bundle, renderer: string = DEFAULT_PARAMS.renderer): Promise<TextResult> {
    return this.convertText(OPERATIONS.vega_to_html, spec, { bundle, renderer });
  }

  vegaToPng(spec: string, scale: number = DEFAULT_PARAMS.scale, ppi: number = DEFAULT_PARAMS.ppi): Promise<BinaryResult> {
    return this.convertBinary(OPERATIONS.vega_to_png, spec, { scale, ppi });
  }

  vegaToJpeg(spec: string, scale: number = DEFAULT_PARAMS.scale, quality: number = DEFAULT_PARAMS.quality): Promise<BinaryResult> {
    return this.convertBinary(OPERATIONS.vega_to_jpeg, spec, { scale, quality });
  }

  vegaToPdf(spec: string): Promise<BinaryResult> {
    return this.convertBinary(OPERATIONS.vega_to_pdf, spec);
  }

  // Vega-Lite

  vegaliteToSvg(spec: string): Promise<TextResult> {
    return this.convertText(OPERATIONS.vegalite_to_svg, spec);
  }

  vegaliteToHtml(spec: string, bundle: boolean = DEFAULT_PARAMS.bundle, renderer: string = DEFAULT_PARAMS.renderer): Promise<TextResult> {
    return this.convertText(OPERATIONS.vegalite_to_html, spec, { bundle, renderer });
  }

  vegaliteToPng(spec: string, scale: number = DEFAULT_PARAMS.scale, ppi: number = DEFAULT_PARAMS.ppi): Promise<BinaryResult> {
    return this.convertBinary(OPERATIONS.vegalite_to_png, spec, { scale, ppi });
  }

  vegaliteToJpeg(spec: string, scale: number = DEFAULT_PARAMS.scale, quality: number = DEFAULT_PARAMS.quality): Promise<BinaryResult> {
    return this.convertBinary(OPERATIONS.vegalite_to_jpeg, spec, { scale, quality });
  }

  vegaliteToPdf(spec: string): Promise<BinaryResult> {
    return this.convertBinary(OPERATIONS.vegalite_to_pdf, spec);
  }

  vegaliteToVega(spec: string): Promise<TextResult> {
    return this.convertText(OPERATIONS.vegalite_to_vega, spec);
  }
}
