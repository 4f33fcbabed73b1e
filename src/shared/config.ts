import { z } from 'zod';
import { cosmiconfig } from 'cosmiconfig';
import fs from 'node:fs';
import path from 'node:path';
import { stringify as yamlStringify } from 'yaml';
import { resolvePath, getLowdownDir, isRecord } from './utils.js';
import { ConfigError } from './errors.js';
import { logger } from './logger.js';

export const DEFAULT_USER_AGENT =
  'Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/124.0 Safari/537.36';

export const ConfigSchema = z.object({
  server: z
    .object({
      port: z.number().int().min(0).max(65535).default(8000),
      host: z.string().default('127.0.0.1'),
    })
    .default({}),

  db: z
    .object({
      path: z.string().default('~/.lowdown/lowdown.db'),
    })
    .default({}),

  scraper: z
    .object({
      timeout_ms: z.number().int().positive().default(15000),
      user_agent: z.string().default(DEFAULT_USER_AGENT),
      // lines of extracted text this short or shorter are dropped as navigation noise
      min_line_chars: z.number().int().min(0).default(25),
    })
    .default({}),

  summarizer: z
    .object({
      excerpt_chars: z.number().int().positive().default(280),
    })
    .default({}),
});

export type Config = z.infer<typeof ConfigSchema>;

export function generateDefaultConfig(): Config {
  return ConfigSchema.parse({});
}

export function configToYaml(config: Config): string {
  return yamlStringify(config);
}

export function generateDefaultConfigYaml(): string {
  return configToYaml(generateDefaultConfig());
}

export function writeDefaultConfig(configPath: string): void {
  fs.mkdirSync(path.dirname(configPath), { recursive: true });
  fs.writeFileSync(configPath, generateDefaultConfigYaml(), 'utf-8');
}

export function getDefaultConfigPath(): string {
  return path.join(getLowdownDir(), 'config.yaml');
}

/**
 * Load config from $LOWDOWN_CONFIG or ~/.lowdown/config.yaml, then apply
 * LOWDOWN_DB_PATH and PORT. Each call reads the file again; callers hand the
 * result to whatever needs it.
 */
export async function loadConfig(env: NodeJS.ProcessEnv = process.env): Promise<Config> {
  const explorer = cosmiconfig('lowdown', {
    searchPlaces: [
      'lowdown.config.yaml',
      'lowdown.config.yml',
      '.lowdownrc.yaml',
      '.lowdownrc.yml',
    ],
  });

  const envConfigPath = env['LOWDOWN_CONFIG'];
  const defaultConfigPath = getDefaultConfigPath();

  let rawConfig: Record<string, unknown> = {};

  if (envConfigPath) {
    const resolved = resolvePath(envConfigPath);
    if (!fs.existsSync(resolved)) {
      throw new ConfigError(`Config file not found: ${resolved}`);
    }
    const loaded: unknown = (await explorer.load(resolved))?.config;
    rawConfig = isRecord(loaded) ? loaded : {};
  } else if (fs.existsSync(defaultConfigPath)) {
    const loaded: unknown = (await explorer.load(defaultConfigPath))?.config;
    rawConfig = isRecord(loaded) ? loaded : {};
  } else {
    logger.debug('No config file found, using defaults');
  }

  const envDbPath = env['LOWDOWN_DB_PATH'];
  if (envDbPath) {
    const db = isRecord(rawConfig['db']) ? rawConfig['db'] : {};
    rawConfig['db'] = { ...db, path: envDbPath };
  }

  const envPort = env['PORT'];
  if (envPort) {
    const server = isRecord(rawConfig['server']) ? rawConfig['server'] : {};
    rawConfig['server'] = { ...server, port: Number(envPort) };
  }

  const parsed = ConfigSchema.safeParse(rawConfig);
  if (!parsed.success) {
    throw new ConfigError('Invalid configuration', {
      errors: parsed.error.flatten().fieldErrors,
    });
  }

  return parsed.data;
}
