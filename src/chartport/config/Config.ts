/**
 * Config.ts - Environment-driven settings
 *
 * Read with a zod schema. A malformed variable never aborts a conversion:
 * the defaults are used and the problems are reported back to the caller.
 */

import { z } from "zod";

const flag = z
  .enum(['1', '0', 'true', 'false', 'yes', 'no'])
  .transform(value => value === '1' || value === 'true' || value === 'yes');

const list = z
  .string()
  .transform(value => value.split(',').map(item => item.trim()).filter(item => item.length > 0));

const EnvSchema = z.object({
  CHARTPORT_DEBUG: flag.optional(),
  CHARTPORT_SHOW_WARNINGS: flag.optional(),
  CHARTPORT_LOAD_SYSTEM_FONTS: flag.optional(),
  CHARTPORT_FONT_DIRS: list.optional(),
  CHARTPORT_DEFAULT_FONT: z.string().min(1).optional(),
});

export interface FontConfig {
  loadSystemFonts: boolean;
  fontDirs: string[];
  defaultFontFamily?: string;
}

export interface ChartportConfig {
  debug: boolean;
  showWarnings: boolean;
  fonts: FontConfig;
}

export const DEFAULT_CONFIG: ChartportConfig = {
  debug: false,
  showWarnings: false,
  fonts: {
    loadSystemFonts: true,
    fontDirs: [],
  },
};

export interface LoadedConfig {
  config: ChartportConfig;
  problems: string[];
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): LoadedConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    return {
      config: DEFAULT_CONFIG,
      problems: parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`),
    };
  }

  const vars = parsed.data;
  return {
    config: {
      debug: vars.CHARTPORT_DEBUG ?? DEFAULT_CONFIG.debug,
      showWarnings: vars.CHARTPORT_SHOW_WARNINGS ?? DEFAULT_CONFIG.showWarnings,
      fonts: {
        loadSystemFonts: vars.CHARTPORT_LOAD_SYSTEM_FONTS ?? DEFAULT_CONFIG.fonts.loadSystemFonts,
        fontDirs: vars.CHARTPORT_FONT_DIRS ?? [],
        defaultFontFamily: vars.CHARTPORT_DEFAULT_FONT,
      },
    },
    problems: [],
  };
}
