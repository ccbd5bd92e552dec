import { z } from 'zod';
import { cosmiconfig } from 'cosmiconfig';
import fs from 'node:fs';
import path from 'node:path';
import { stringify as yamlStringify } from 'yaml';
import { resolvePath } from './utils.js';
import { ConfigError, errorMessage } from './errors.js';
import { logger } from './logger.js';
import { deriveSourceId } from '../source/sources.js';

export const SourceEntrySchema = z.object({
  url: z.string().url(),
  enabled: z.boolean().default(true),
  name: z.string().optional(),
});

export const ConfigSchema = z.object({
  sources: z.array(SourceEntrySchema),

  fetch: z
    .object({
      timeout_ms: z.number().int().positive().default(15000),
      delay_ms: z.number().int().nonnegative().default(2000),
      user_agent: z.string().default('lede-watch/1.0 (+article-change-detection)'),
    })
    .default({}),

  state: z
    .object({
      dir: z.string().default('./state'),
    })
    .default({}),

  notify: z
    .object({
      webhook_url: z.string().default(''),
      format: z.enum(['discord', 'slack']).default('discord'),
      timeout_ms: z.number().int().positive().default(10000),
    })
    .default({}),

  schedule: z
    .object({
      cron: z.string().default('0 * * * *'),
    })
    .default({}),
});

export type Config = z.infer<typeof ConfigSchema>;
export type SourceEntry = z.infer<typeof SourceEntrySchema>;

export interface EnabledSource {
  sourceId: string;
  url: string;
  name?: string;
}

const SEARCH_PLACES = [
  'lede.config.yaml',
  'lede.config.yml',
  'lede.config.json',
  '.lederc.yaml',
  '.lederc.yml',
  '.lederc.json',
];

export function generateDefaultConfig(): Config {
  return ConfigSchema.parse({
    sources: [{ url: 'https://example.com/feeds/latest.rss', enabled: true }],
  });
}

export function generateDefaultConfigYaml(): string {
  return yamlStringify(generateDefaultConfig());
}

export function writeDefaultConfig(configPath: string): void {
  fs.mkdirSync(path.dirname(configPath), { recursive: true });
  fs.writeFileSync(configPath, generateDefaultConfigYaml(), 'utf-8');
}

export function parseConfig(raw: unknown): Config {
  const parsed = ConfigSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigError('Invalid configuration', {
      errors: parsed.error.flatten().fieldErrors,
    });
  }
  return parsed.data;
}

/**
 * Load configuration from an explicit path, `LEDE_CONFIG`, or the first
 * search place found in `cwd`.
 */
export async function loadConfig(
  options: { configPath?: string; cwd?: string } = {},
): Promise<Config> {
  const explorer = cosmiconfig('lede', { searchPlaces: SEARCH_PLACES });
  const explicit = options.configPath ?? process.env['LEDE_CONFIG'];

  let rawConfig: unknown;
  try {
    if (explicit) {
      const resolved = resolvePath(explicit);
      if (!fs.existsSync(resolved)) {
        throw new ConfigError(`Config file not found: ${resolved}`, { path: resolved });
      }
      const result = await explorer.load(resolved);
      rawConfig = result?.config;
    } else {
      const result = await explorer.search(options.cwd ?? process.cwd());
      if (!result) {
        throw new ConfigError('No configuration file found', { searchPlaces: SEARCH_PLACES });
      }
      logger.debug({ path: result.filepath }, 'Config file found');
      rawConfig = result.config;
    }
  } catch (err) {
    if (err instanceof ConfigError) throw err;
    throw new ConfigError(`Config file could not be read: ${errorMessage(err)}`);
  }

  const config = parseConfig(rawConfig ?? {});

  const envWebhook = process.env['LEDE_WEBHOOK_URL'];
  if (envWebhook) {
    config.notify.webhook_url = envWebhook;
  }

  return config;
}

/**
 * Enabled sources in configuration order, each with its derived id.
 */
export function enabledSources(config: Config): EnabledSource[] {
  const seen = new Map<string, string>();
  const result: EnabledSource[] = [];

  for (const entry of config.sources) {
    if (!entry.enabled) continue;
    const sourceId = deriveSourceId(entry.url);
    const clash = seen.get(sourceId);
    if (clash !== undefined) {
      throw new ConfigError(`Sources ${clash} and ${entry.url} share the id "${sourceId}"`, {
        sourceId,
      });
    }
    seen.set(sourceId, entry.url);
    result.push({ sourceId, url: entry.url, name: entry.name });
  }

  return result;
}
