import fs from 'node:fs';
import path from 'node:path';
import { z } from 'zod';
import { ConfigError } from '../cli/errors.js';
import { ColorLabelSchema, SortModeSchema } from '../schema/index.js';

function homeDir(): string {
  return process.env.HOME ?? process.env.USERPROFILE ?? '';
}

export const ConfigSchema = z.object({
  keysFile: z.string().optional(),
  reviewTag: z.string().optional(),
  reviewWindowHours: z.number().positive().default(24),
  listLimit: z.number().int().positive().default(30),
  defaultColor: ColorLabelSchema.default('green'),
  sort: SortModeSchema.default('urgency'),
  backend: z
    .object({
      command: z.string().default('task'),
      args: z.array(z.string()).default(['rc.confirmation=off', 'rc.json.array=on']),
    })
    .default({}),
  colors: z
    .object({
      disable: z.boolean().optional(),
    })
    .optional(),
});

export type Config = z.infer<typeof ConfigSchema>;

const CONFIG_FILENAME = '.taskreview.json';

export function getGlobalConfigPath(): string {
  // Recompute each call so tests that stub HOME behave correctly.
  return path.join(homeDir(), '.config', 'taskreview', 'config.json');
}

export function getDefaultKeysPath(): string {
  return path.join(homeDir(), '.taskreview');
}

export function getDefaultReviewTag(): string {
  return `r:${process.env.USER ?? process.env.USERNAME ?? 'me'}`;
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

export function loadConfig(configPath?: string): Config {
  const pathToLoad = configPath ?? findConfigPath() ?? getGlobalConfigPath();

  if (!fs.existsSync(pathToLoad)) {
    return ConfigSchema.parse({});
  }

  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(pathToLoad, 'utf-8'));
  } catch (error) {
    if (error instanceof SyntaxError) {
      throw new ConfigError('Invalid JSON in config file', pathToLoad);
    }
    throw error;
  }

  const parsed = ConfigSchema.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue ? `${issue.path.join('.') || '(root)'}: ${issue.message}` : 'unknown shape';
    throw new ConfigError(`Invalid config (${where})`, pathToLoad);
  }
  return parsed.data;
}

export function resolveKeysPath(config: Config, keysFlag?: string): string {
  return keysFlag ?? config.keysFile ?? getDefaultKeysPath();
}

export function resolveReviewTag(config: Config, tagFlag?: string): string {
  return tagFlag ?? config.reviewTag ?? getDefaultReviewTag();
}
