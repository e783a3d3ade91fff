import fs from 'node:fs';
import path from 'node:path';
import { z } from 'zod';
import { ExporterNameSchema } from '../schema/index.js';

export const ConfigSchema = z
  .object({
    exporter: ExporterNameSchema.optional(),
    options: z
      .object({
        summary: z.boolean().optional(),
        fold: z.boolean().optional(),
      })
      .strict()
      .default({}),
    color: z.enum(['auto', 'always', 'never']).default('auto'),
  })
  .strict();

export type Config = z.infer<typeof ConfigSchema>;
export type ColorMode = Config['color'];

const CONFIG_FILENAME = '.burrito.json';

export function getGlobalConfigPath(): string {
  // Recompute each call so tests that stub HOME behave correctly.
  return path.join(process.env.HOME ?? process.env.USERPROFILE ?? '', '.config', 'task-burrito', 'config.json');
}

export function findConfigPath(startDir: string = process.cwd()): string | null {
  let dir = startDir;
  while (true) {
    const configPath = path.join(dir, CONFIG_FILENAME);
    if (fs.existsSync(configPath)) {
      return configPath;
    }
    const parent = path.dirname(dir);
    if (parent === dir) {
      break;
    }
    dir = parent;
  }
  return null;
}

/**
 * Loads the explicit config file, else the nearest `.burrito.json`, else the
 * global config. Missing files yield the defaults.
 */
export function loadConfig(configPath?: string): Config {
  const pathToLoad = configPath ?? findConfigPath() ?? getGlobalConfigPath();

  if (!fs.existsSync(pathToLoad)) {
    if (configPath !== undefined) {
      throw new Error(`Config file not found: ${configPath}`);
    }
    return ConfigSchema.parse({});
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(fs.readFileSync(pathToLoad, 'utf-8'));
  } catch (error) {
    if (error instanceof SyntaxError) {
      throw new Error(`Invalid JSON in config file: ${pathToLoad}`);
    }
    throw error;
  }

  const result = ConfigSchema.safeParse(parsed);
  if (!result.success) {
    const problems = result.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
    throw new Error(`Invalid config file ${pathToLoad}: ${problems.join('; ')}`);
  }
  return result.data;
}

export function resolveColor(mode: ColorMode, terminalSupportsColor: boolean): boolean {
  if (mode === 'always') return true;
  if (mode === 'never') return false;
  return terminalSupportsColor;
}
