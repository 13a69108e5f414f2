/**
 * Client configuration.
 *
 * Values are merged from, highest precedence first: explicit overrides (CLI
 * flags), the YAML config file, `RELAY_TUNNEL_*` environment variables, and
 * finally an interactive prompt for whatever required value is still missing.
 *
 * Example config file:
 *
 *   server: relay.example.com
 *   server-port: 7835
 *   local-host: 127.0.0.1
 *   local-port: 3000
 *   client-id: my-laptop
 *   secret-key: change-me
 *   network-timeout: 30000
 */

import fs from 'node:fs';
import { parse as parseYaml } from 'yaml';
import { z } from 'zod';
import { ConfigError, errorMessage } from './errors';
import type { TunnelOptions } from './types';

export const DEFAULT_LOCAL_HOST = '127.0.0.1';

const CONFIG_KEYS = ['server', 'serverPort', 'localHost', 'localPort', 'clientId', 'secret', 'networkTimeoutMs'] as const;

export type ConfigKey = (typeof CONFIG_KEYS)[number];

/** Config values before validation; ports may still be strings. */
export type RawConfig = Partial<Record<ConfigKey, string | number>>;

export type Prompt = (question: string, defaultValue?: string) => Promise<string>;

export interface LoadConfigOptions {
  /** Path to a YAML config file. */
  file?: string;
  overrides?: RawConfig;
  env?: NodeJS.ProcessEnv;
  /** Asked for required values that no other source provided. */
  prompt?: Prompt;
}

const ENV_VARS: Record<ConfigKey, string> = {
  server: 'RELAY_TUNNEL_SERVER',
  serverPort: 'RELAY_TUNNEL_SERVER_PORT',
  localHost: 'RELAY_TUNNEL_LOCAL_HOST',
  localPort: 'RELAY_TUNNEL_LOCAL_PORT',
  clientId: 'RELAY_TUNNEL_CLIENT_ID',
  secret: 'RELAY_TUNNEL_SECRET',
  networkTimeoutMs: 'RELAY_TUNNEL_NETWORK_TIMEOUT',
};

const scalar = z.union([z.string(), z.number()]).transform(String);

const fileSchema = z
  .object({
    server: scalar,
    'server-port': scalar,
    'local-host': scalar,
    'local-port': scalar,
    'client-id': scalar,
    'secret-key': scalar,
    'network-timeout': scalar,
  })
  .partial();

const portSchema = z.coerce.number().int().min(1).max(65535);

const configSchema = z.object({
  server: z.string().min(1, 'server is required'),
  serverPort: portSchema,
  localHost: z.string().min(1),
  localPort: portSchema,
  clientId: z.string().min(1, 'client id is required'),
  secret: z.string().optional(),
  networkTimeoutMs: z.coerce.number().int().positive().optional(),
});

const PROMPTS: Array<{ key: ConfigKey; question: string; defaultValue?: string }> = [
  { key: 'server', question: 'Server address' },
  { key: 'serverPort', question: 'Server port' },
  { key: 'clientId', question: 'Client ID' },
  { key: 'secret', question: 'Secret key (leave empty for none)' },
  { key: 'localHost', question: 'Local host', defaultValue: DEFAULT_LOCAL_HOST },
  { key: 'localPort', question: 'Local port' },
];

export function readConfigFile(file: string): RawConfig {
  let text: string;
  try {
    text = fs.readFileSync(file, 'utf-8');
  } catch (err) {
    throw new ConfigError([`cannot read config file ${file}: ${errorMessage(err)}`]);
  }

  let parsed: unknown;
  try {
    parsed = parseYaml(text) ?? {};
  } catch (err) {
    throw new ConfigError([`cannot parse config file ${file}: ${errorMessage(err)}`]);
  }

  const result = fileSchema.safeParse(parsed);
  if (!result.success) {
    throw new ConfigError(result.error.issues.map((i) => `${file}: ${i.path.join('.') || '(root)'}: ${i.message}`));
  }
  const values = result.data;
  return {
    server: values.server,
    serverPort: values['server-port'],
    localHost: values['local-host'],
    localPort: values['local-port'],
    clientId: values['client-id'],
    secret: values['secret-key'],
    networkTimeoutMs: values['network-timeout'],
  };
}

export function readConfigEnv(env: NodeJS.ProcessEnv): RawConfig {
  const raw: RawConfig = {};
  for (const key of CONFIG_KEYS) {
    const value = env[ENV_VARS[key]];
    if (value) raw[key] = value;
  }
  return raw;
}

function isMissing(value: string | number | undefined): boolean {
  return value === undefined || value === '';
}

/** Merges sources left to right; earlier sources win. */
export function mergeConfig(...sources: RawConfig[]): RawConfig {
  const merged: RawConfig = {};
  for (const source of sources) {
    for (const key of CONFIG_KEYS) {
      const value = source[key];
      if (isMissing(merged[key]) && !isMissing(value)) {
        merged[key] = value;
      }
    }
  }
  return merged;
}

export function validateConfig(raw: RawConfig): TunnelOptions {
  const input: Partial<Record<ConfigKey, string>> = {};
  for (const key of CONFIG_KEYS) {
    const value = raw[key];
    if (!isMissing(value)) input[key] = String(value);
  }
  if (!input.localHost) input.localHost = DEFAULT_LOCAL_HOST;

  const result = configSchema.safeParse(input);
  if (!result.success) {
    throw new ConfigError(result.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`));
  }
  return result.data;
}

export async function loadConfig(options: LoadConfigOptions = {}): Promise<TunnelOptions> {
  const sources: RawConfig[] = [options.overrides ?? {}];
  if (options.file) {
    sources.push(readConfigFile(options.file));
  }
  sources.push(readConfigEnv(options.env ?? process.env));

  const merged = mergeConfig(...sources);

  if (options.prompt) {
    for (const { key, question, defaultValue } of PROMPTS) {
      if (isMissing(merged[key])) {
        merged[key] = (await options.prompt(question, defaultValue)).trim() || defaultValue;
      }
    }
  }

  return validateConfig(merged);
}
