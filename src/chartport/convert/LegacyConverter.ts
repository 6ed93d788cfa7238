/**
 * LegacyConverter - Older Vega-Lite operations that take a version string
 *
 * Kept for existing callers. An unrecognized version falls back to the
 * default version with a warning instead of failing. Errors come back as
 * tagged failures like everywhere else.
 */

import { Converter } from "./Converter.js";
import { DEFAULT_PARAMS } from "./OptionResolver.js";
import { OPERATIONS, TextResult } from "./types.js";

export class LegacyConverter {
  constructor(private converter: Converter = new Converter()) {}

  vegaliteToVega(spec: string, version: string): Promise<TextResult> {
    return this.converter.convertText(OPERATIONS.vegalite_to_vega, spec, {
      vlVersion: version,
      lenientVersion: true,
    });
  }

  vegaliteToSvg(spec: string, version: string): Promise<TextResult> {
    return this.converter.convertText(OPERATIONS.vegalite_to_svg, spec, {
      vlVersion: version,
      lenientVersion: true,
    });
  }

  vegaliteToHtml(
    spec: string,
    version: string,
    bundle: boolean = DEFAULT_PARAMS.bundle,
    renderer: string = DEFAULT_PARAMS.renderer
  ): Promise<TextResult> {
    return this.converter.convertText(OPERATIONS.vegalite_to_html, spec, {
      vlVersion: version,
      lenientVersion: true,
      bundle,
      renderer,
    });
  }
}
