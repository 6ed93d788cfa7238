/**
 * VegaLiteEngine - Compiles Vega-Lite to Vega with the installed vega-lite
 */

import * as vega from "vega";
import type { Spec as VegaSpec } from "vega";
import * as vegaLite from "vega-lite";
import type { TopLevelSpec } from "vega-lite";
import type { VlVersion } from "../convert/types.js";
import { BaseEngine } from "./BaseEngine.js";
import { EngineError, VlOptions } from "./ConversionEngine.js";
import type { EmbedMode } from "./HtmlTemplate.js";

// Structural checks are left to the compiler, which reports them itself
function isTopLevelSpec(value: Record<string, unknown>): value is Record<string, unknown> & TopLevelSpec {
  return !('marks' in value);
}

// Top-level unit specs have no parent to inherit these from
const UNIT_REQUIREMENTS = ['data', 'encoding'] as const;

export function minorOf(version: string): string {
  return version.split('.').slice(0, 2).join('.');
}

export function missingUnitProperties(spec: Record<string, unknown>): string[] {
  if (!('mark' in spec)) {
    return [];
  }
  return UNIT_REQUIREMENTS.filter(key => !(key in spec));
}

export class VegaLiteEngine extends BaseEngine<VlOptions> {
  protected getLabel(): string {
    return 'Vega-Lite';
  }

  protected getEmbedMode(): EmbedMode {
    return 'vega-lite';
  }

  protected getVlVersion(opts: VlOptions): VlVersion {
    return opts.vlVersion;
  }

  protected compile(spec: Record<string, unknown>, opts: VlOptions): VegaSpec {
    if (opts.vlVersion !== minorOf(vegaLite.version)) {
      throw new EngineError(
        `Vega-Lite ${opts.vlVersion} is not supported by the installed compiler (${vegaLite.version})`
      );
    }
    if (!isTopLevelSpec(spec)) {
      throw new EngineError('Vega-Lite spec has a "marks" property; this looks like a Vega spec');
    }
    const missing = missingUnitProperties(spec);
    if (missing.length > 0) {
      throw new EngineError(`Invalid Vega-Lite unit spec: missing ${missing.map(key => `"${key}"`).join(' and ')}`);
    }

    const logger = vega.logger(opts.showWarnings ? vega.Warn : vega.None);
    return vegaLite.compile(spec, { logger }).spec;
  }
}
