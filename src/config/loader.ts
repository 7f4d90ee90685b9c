import fs from 'node:fs';
import path from 'node:path';
import { z } from 'zod';
import { PrioritySchema } from '../schema/index.js';

export const DEFAULT_IGNORE = [
  '.git',
  '.hg',
  '.svn',
  '.venv',
  'venv',
  '__pycache__',
  '.tox',
  '.nox',
  '.mypy_cache',
  '.pytest_cache',
  '.ruff_cache',
  'node_modules',
  'site-packages',
  '*.egg-info',
];

export const ConfigSchema = z.object({
  root: z.string().default('.'),
  extensions: z
    .array(z.string().regex(/^\.[^./\\]+$/, 'Extensions look like ".py"'))
    .min(1)
    .default(['.py']),
  ignore: z.array(z.string()).default(DEFAULT_IGNORE),
  template: z
    .object({
      description: z.string().default('Describe the task'),
      priority: PrioritySchema.default('MEDIUM'),
      assignee: z.string().min(1).optional(),
    })
    .default({}),
});

export type Config = z.infer<typeof ConfigSchema>;

const CONFIG_FILENAME = '.pytodo.json';

export function getGlobalConfigPath(): string {
  // Recompute each call so tests that stub HOME behave correctly.
  return path.join(process.env.HOME ?? process.env.USERPROFILE ?? '', '.config', 'pytodo', 'config.json');
}

export function findConfigPath(startDir: string = process.cwd()): string | null {
  let dir = path.resolve(startDir);
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
 * Load the explicit config, else the nearest .pytodo.json, else the global one, else defaults.
 */
export function loadConfig(configPath?: string): Config {
  const pathToLoad = configPath ?? findConfigPath() ?? getGlobalConfigPath();

  if (!fs.existsSync(pathToLoad)) {
    if (configPath) {
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
    const details = result.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new Error(`Invalid config file ${pathToLoad}: ${details}`);
  }
  return result.data;
}

export function resolveRoot(config: Config, pathFlag?: string): string {
  return pathFlag ?? config.root;
}
