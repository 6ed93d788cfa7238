/**
 * types.ts - Shared vocabulary for the conversion facade
 *
 * Grammars, target formats, renderer names, supported Vega-Lite versions,
 * the resolved configuration and the two tagged result shapes.
 */

export type Grammar = 'vega' | 'vega-lite';

export type TextFormat = 'svg' | 'html' | 'vega';
export type BinaryFormat = 'png' | 'jpeg' | 'pdf';
export type TargetFormat = TextFormat | BinaryFormat;

export const RENDERERS = ['svg', 'canvas', 'hybrid'] as const;
export type Renderer = typeof RENDERERS[number];

// One compiler is installed; these are the versions it answers for
export const VL_VERSIONS = ['5.21'] as const;
export type VlVersion = typeof VL_VERSIONS[number];
export const DEFAULT_VL_VERSION: VlVersion = '5.21';

export const OK = 'ok';
export const ERROR = 'error';

export type Ok<T> = readonly [typeof OK, T];
export type Err = readonly [typeof ERROR, string];

/** Result of operations whose success payload is text (SVG, HTML, compiled Vega) */
export type TextResult = Ok<string> | Err;

/** Result of operations whose success payload is bytes (PNG, JPEG, PDF) */
export type BinaryResult = Ok<Uint8Array> | Err;

export interface Success<T> {
  success: true;
  data: T;
}

export interface Failure {
  success: false;
  error: string;
}

export type Outcome<T> = Success<T> | Failure;

export function success<T>(data: T): Success<T> {
  return { success: true, data };
}

export function failure(error: string): Failure {
  return { success: false, error };
}

// Operation pairs. The set is closed: one entry per exposed operation.
export type TextOperationPair =
  | { grammar: Grammar; format: 'svg' }
  | { grammar: Grammar; format: 'html' }
  | { grammar: 'vega-lite'; format: 'vega' };

export interface BinaryOperationPair {
  grammar: Grammar;
  format: BinaryFormat;
}

export const OPERATIONS = {
  vega_to_svg: { grammar: 'vega', format: 'svg' },
  vega_to_html: { grammar: 'vega', format: 'html' },
  vega_to_png: { grammar: 'vega', format: 'png' },
  vega_to_jpeg: { grammar: 'vega', format: 'jpeg' },
  vega_to_pdf: { grammar: 'vega', format: 'pdf' },
  vegalite_to_svg: { grammar: 'vega-lite', format: 'svg' },
  vegalite_to_html: { grammar: 'vega-lite', format: 'html' },
  vegalite_to_png: { grammar: 'vega-lite', format: 'png' },
  vegalite_to_jpeg: { grammar: 'vega-lite', format: 'jpeg' },
  vegalite_to_pdf: { grammar: 'vega-lite', format: 'pdf' },
  vegalite_to_vega: { grammar: 'vega-lite', format: 'vega' },
} as const satisfies Record<string, TextOperationPair | BinaryOperationPair>;

export type OperationName = keyof typeof OPERATIONS;

/** Optional per-call parameters, as supplied by the caller */
export interface ConversionParams {
  renderer?: string;
  bundle?: boolean;
  scale?: number;
  ppi?: number;
  quality?: number;
  vlVersion?: string;
  /** Unknown version strings fall back to the default instead of failing */
  lenientVersion?: boolean;
}

export interface ConversionConfig {
  vlVersion: VlVersion;
  renderer: Renderer;
  bundle: boolean;
  scale: number;
  ppi: number;
  quality: number;
  showWarnings: boolean;
}
