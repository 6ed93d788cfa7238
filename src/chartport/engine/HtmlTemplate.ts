/**
 * HtmlTemplate.ts - Standalone HTML documents that render a chart with vega-embed
 */

import type { Renderer, VlVersion } from "../convert/types.js";
import { BundlePackage, ScriptReader, readBundleScript } from "./BundleScripts.js";

export type EmbedMode = 'vega' | 'vega-lite';

export interface HtmlOptions {
  mode: EmbedMode;
  bundle: boolean;
  renderer: Renderer;
  /** Pins the vega-lite CDN script; ignored in vega mode */
  vlVersion?: VlVersion;
}

export const CDN_BASE = 'https://cdn.jsdelivr.net/npm';

// Keeps embedded text from closing the surrounding <script> element
function escapeScript(source: string): string {
  return source.replace(/<\/script/gi, '<\\/script');
}

export function serializeSpec(spec: object): string {
  return JSON.stringify(spec)
    .replace(/</g, '\\u003c')
    .replace(/\u2028/g, '\\u2028')
    .replace(/\u2029/g, '\\u2029');
}

export function scriptPackages(mode: EmbedMode): BundlePackage[] {
  return mode === 'vega-lite' ? ['vega', 'vega-lite', 'vega-embed'] : ['vega', 'vega-embed'];
}

export function cdnUrl(pkg: BundlePackage, vlVersion?: VlVersion): string {
  switch (pkg) {
    case 'vega':
      return `${CDN_BASE}/vega@5`;
    case 'vega-lite':
      return `${CDN_BASE}/vega-lite@${vlVersion ?? '5'}`;
    case 'vega-embed':
      return `${CDN_BASE}/vega-embed@6`;
  }
}

async function renderScriptTags(options: HtmlOptions, readScript: ScriptReader): Promise<string> {
  const packages = scriptPackages(options.mode);
  if (!options.bundle) {
    return packages
      .map(pkg => `    <script src="${cdnUrl(pkg, options.vlVersion)}"></script>`)
      .join('\n');
  }

  const sources = await Promise.all(packages.map(pkg => readScript(pkg)));
  return sources
    .map(source => `    <script type="text/javascript">\n${escapeScript(source)}\n    </script>`)
    .join('\n');
}

export async function buildHtml(
  spec: object,
  options: HtmlOptions,
  readScript: ScriptReader = readBundleScript
): Promise<string> {
  const scripts = await renderScriptTags(options, readScript);
  const embedOptions = JSON.stringify({ renderer: options.renderer, mode: options.mode });

  return `<!DOCTYPE html>
<html>
  <head>
    <meta charset="UTF-8">
    <title>Chart</title>
    <style>
      #vega-chart.vega-embed { width: 100%; display: flex; }
      #vega-chart.vega-embed details,
      #vega-chart.vega-embed details summary { position: relative; }
    </style>
${scripts}
  </head>
  <body>
    <div id="vega-chart"></div>
    <script type="text/javascript">
      const spec = ${serializeSpec(spec)};
      vegaEmbed('#vega-chart', spec, ${embedOptions}).catch(console.error);
    </script>
  </body>
</html>
`;
}
