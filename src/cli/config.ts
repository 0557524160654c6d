import { existsSync } from 'node:fs';
import { readFile } from 'node:fs/promises';
import { resolve } from 'node:path';

export type OutputFormat = 'terminal' | 'json';

export interface RkdiffConfig {
  verbose?: boolean;
  checkPaths?: boolean;
  format?: OutputFormat;
  leftFormat?: string;
  rightFormat?: string;
}

export const CONFIG_FILES = ['.rkdiffrc.json', '.rkdiffrc'];

export function isOutputFormat(value: unknown): value is OutputFormat {
  return value === 'terminal' || value === 'json';
}

/** Keeps the recognised fields of a parsed config; anything else is dropped. */
export function normalizeConfig(raw: unknown): RkdiffConfig {
  if (typeof raw !== 'object' || raw === null || Array.isArray(raw)) return {};
  const config: RkdiffConfig = {};
  const entries = new Map<string, unknown>(Object.entries(raw));

  const verbose = entries.get('verbose');
  if (typeof verbose === 'boolean') config.verbose = verbose;
  const checkPaths = entries.get('checkPaths');
  if (typeof checkPaths === 'boolean') config.checkPaths = checkPaths;
  const format = entries.get('format');
  if (isOutputFormat(format)) config.format = format;
  // Line templates must carry the value placeholder
  const leftFormat = entries.get('leftFormat');
  if (typeof leftFormat === 'string' && leftFormat.includes('%s')) config.leftFormat = leftFormat;
  const rightFormat = entries.get('rightFormat');
  if (typeof rightFormat === 'string' && rightFormat.includes('%s')) config.rightFormat = rightFormat;

  return config;
}

export async function loadConfig(cwd: string): Promise<RkdiffConfig> {
  const configFile = CONFIG_FILES.map(name => resolve(cwd, name)).find(path => existsSync(path));
  if (!configFile) return {};

  const content = await readFile(configFile, 'utf-8');
  return normalizeConfig(JSON.parse(content));
}
