import { existsSync, readFileSync } from 'node:fs';
import path from 'node:path';
import { pathToFileURL } from 'node:url';

import { z } from 'zod';

import { ConfigError, SETTING_NAMES, mergeSettings, settingsFromEnv } from '@chatcache/core';
import type { ProxySettings } from '@chatcache/core';

/**
 * Config file names, searched upwards from the working directory.
 */
export const CONFIG_FILES = ['.chatcacherc.json', 'chatcache.config.js'] as const;

const fileSchema = z.record(z.union([z.string(), z.number()]));

/**
 * Find a config file by walking up from `startDir`. Returns `null` at the filesystem root.
 */
export function findConfigFile(startDir: string): string | null {
  for (let dir = path.resolve(startDir); ; dir = path.dirname(dir)) {
    const found = CONFIG_FILES.map((name) => path.join(dir, name)).find((file) => existsSync(file));
    if (found) return found;
    if (path.dirname(dir) === dir) return null;
  }
}

/**
 * Check a parsed config file: a flat object whose keys are known setting names.
 */
export function parseConfigFile(raw: unknown, filePath: string): ProxySettings {
  const parsed = fileSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigError([`${filePath}: expected an object of string or number settings`]);
  }

  const settings: ProxySettings = {};
  const unknownKeys = new Set(Object.keys(parsed.data));
  for (const name of SETTING_NAMES) {
    const value = parsed.data[name];
    if (value === undefined) continue;
    settings[name] = value;
    unknownKeys.delete(name);
  }

  if (unknownKeys.size > 0) {
    throw new ConfigError([...unknownKeys].map((key) => `${filePath}: unknown setting "${key}"`));
  }
  return settings;
}

/**
 * Load settings from disk. Supports:
 * - `.chatcacherc.json`
 * - `chatcache.config.js` (default export)
 */
export async function loadConfigFile(filePath: string): Promise<ProxySettings> {
  if (filePath.endsWith('.json')) {
    let raw: unknown;
    try {
      raw = JSON.parse(readFileSync(filePath, 'utf8'));
    } catch (error) {
      throw new ConfigError([
        `${filePath}: ${error instanceof Error ? error.message : 'unreadable config file'}`,
      ]);
    }
    return parseConfigFile(raw, filePath);
  }

  if (filePath.endsWith('.js')) {
    const mod: unknown = await import(pathToFileURL(filePath).href);
    const exported =
      mod !== null && typeof mod === 'object' && 'default' in mod ? mod.default : mod;
    return parseConfigFile(exported, filePath);
  }

  throw new ConfigError([`${filePath}: unsupported config file type`]);
}

/**
 * Collect settings with precedence: config file < environment < CLI flags.
 *
 * An explicit `configPath` must exist; otherwise the nearest config file (if
 * any) is used.
 */
export async function loadSettings(options: {
  cwd: string;
  env: NodeJS.ProcessEnv;
  configPath?: string;
  flags?: ProxySettings;
}): Promise<ProxySettings> {
  let filePath: string | null;
  if (options.configPath) {
    filePath = path.resolve(options.cwd, options.configPath);
    if (!existsSync(filePath)) throw new ConfigError([`${filePath}: config file not found`]);
  } else {
    filePath = findConfigFile(options.cwd);
  }

  const fromFile = filePath ? await loadConfigFile(filePath) : {};
  return mergeSettings(fromFile, settingsFromEnv(options.env), options.flags ?? {});
}
