/**
 * VegaEngine - Vega specs are already in the target grammar
 */

import type { Spec as VegaSpec } from "vega";
import { BaseEngine } from "./BaseEngine.js";
import { EngineError, VgOptions } from "./ConversionEngine.js";
import type { EmbedMode } from "./HtmlTemplate.js";

// A top-level "mark" without "marks" means a Vega-Lite spec was sent down the Vega path
function isVegaSpec(value: Record<string, unknown>): value is Record<string, unknown> & VegaSpec {
  return !('mark' in value) || 'marks' in value;
}

export class VegaEngine extends BaseEngine<VgOptions> {
  protected getLabel(): string {
    return 'Vega';
  }

  protected getEmbedMode(): EmbedMode {
    return 'vega';
  }

  protected compile(spec: Record<string, unknown>): VegaSpec {
    if (!isVegaSpec(spec)) {
      throw new EngineError('Vega spec has a "mark" property but no "marks"; this looks like a Vega-Lite spec');
    }
    return spec;
  }
}
