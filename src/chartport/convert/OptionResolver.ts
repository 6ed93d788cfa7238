/**
 * OptionResolver.ts - Builds the engine configuration for one call
 *
 * Only the renderer name (and, in strict mode, the Vega-Lite version) is
 * validated here. Scale, ppi and quality go to the engine untouched.
 */

import {
  ConversionConfig,
  ConversionParams,
  DEFAULT_VL_VERSION,
  Outcome,
  RENDERERS,
  Renderer,
  VL_VERSIONS,
  VlVersion,
  failure,
  success,
} from "./types.js";
import { Logger, silentLogger } from "../util/Logger.js";

export const INVALID_RENDERER = 'Invalid renderer provided';
export const INVALID_VL_VERSION = 'Invalid Vega-Lite version provided';

export const DEFAULT_PARAMS = {
  renderer: 'svg',
  bundle: true,
  scale: 1.0,
  ppi: 72.0,
  quality: 90,
} as const;

export function parseRenderer(name: string): Renderer | null {
  return RENDERERS.find(renderer => renderer === name) ?? null;
}

/**
 * Accepts "5.21", "v5.21", "5_21" and "v5_21".
 */
export function parseVlVersion(value: string): VlVersion | null {
  const normalized = value.trim().replace(/^v/i, '').replace(/_/g, '.');
  return VL_VERSIONS.find(version => version === normalized) ?? null;
}

export interface ResolveOptions {
  showWarnings?: boolean;
  logger?: Logger;
}

export function resolveConfig(params: ConversionParams, options: ResolveOptions = {}): Outcome<ConversionConfig> {
  const logger = options.logger ?? silentLogger;

  let renderer: Renderer = DEFAULT_PARAMS.renderer;
  if (params.renderer !== undefined) {
    const parsed = parseRenderer(params.renderer);
    if (!parsed) {
      return failure(INVALID_RENDERER);
    }
    renderer = parsed;
  }

  let vlVersion: VlVersion = DEFAULT_VL_VERSION;
  if (params.vlVersion !== undefined) {
    const parsed = parseVlVersion(params.vlVersion);
    if (parsed) {
      vlVersion = parsed;
    } else if (params.lenientVersion) {
      logger.warn(`Unknown Vega-Lite version "${params.vlVersion}", using ${DEFAULT_VL_VERSION}`);
    } else {
      return failure(INVALID_VL_VERSION);
    }
  }

  return success({
    vlVersion,
    renderer,
    bundle: params.bundle ?? DEFAULT_PARAMS.bundle,
    scale: params.scale ?? DEFAULT_PARAMS.scale,
    ppi: params.ppi ?? DEFAULT_PARAMS.ppi,
    quality: params.quality ?? DEFAULT_PARAMS.quality,
    showWarnings: options.showWarnings ?? false,
  });
}
