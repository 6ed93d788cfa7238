/**
 * BundleScripts.ts - Locates the browser builds of vega, vega-lite and vega-embed
 *
 * Packages are found by walking up from this module to the nearest
 * node_modules that holds them; the build file comes from the package's
 * `unpkg` (or `jsdelivr`) field.
 */

import { existsSync } from "node:fs";
import { readFile } from "node:fs/promises";
import { dirname, join, parse } from "node:path";
import { fileURLToPath } from "node:url";
import { z } from "zod";
import { EngineError } from "./ConversionEngine.js";

export type BundlePackage = 'vega' | 'vega-lite' | 'vega-embed';

export type ScriptReader = (pkg: BundlePackage) => Promise<string>;

const Manifest = z.object({
  version: z.string(),
  unpkg: z.string().optional(),
  jsdelivr: z.string().optional(),
});

export function findPackageDir(name: string, from: string = dirname(fileURLToPath(import.meta.url))): string | null {
  const { root } = parse(from);
  let dir = from;
  for (;;) {
    const candidate = join(dir, 'node_modules', name);
    if (existsSync(join(candidate, 'package.json'))) {
      return candidate;
    }
    if (dir === root) {
      return null;
    }
    dir = dirname(dir);
  }
}

export const readBundleScript: ScriptReader = async (pkg) => {
  const dir = findPackageDir(pkg);
  if (!dir) {
    throw new EngineError(`Cannot bundle ${pkg}: package not found in node_modules`);
  }

  const manifest = Manifest.safeParse(JSON.parse(await readFile(join(dir, 'package.json'), 'utf8')));
  if (!manifest.success) {
    throw new EngineError(`Cannot bundle ${pkg}: unreadable package.json`);
  }

  const entry = manifest.data.unpkg ?? manifest.data.jsdelivr;
  if (!entry) {
    throw new EngineError(`Cannot bundle ${pkg}: no browser build declared`);
  }
  return readFile(join(dir, entry), 'utf8');
};
