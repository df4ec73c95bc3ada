/**
 * Config loader: smol-toml parsing, nested section detection, env override, Zod validation.
 *
 * Pipeline: read config.toml -> parse with smol-toml -> detectNestedSections ->
 *           applyEnvOverrides -> applyOverrides (CLI flags) -> DaemonConfigSchema.parse.
 */

import { readFileSync } from 'node:fs';
import { join } from 'node:path';
import { parse } from 'smol-toml';
import { z } from 'zod';
import { BuildReleaseEnum, LogLevelEnum } from '@poolnode/core';
import { BOOTSTRAP_PEERS } from '../../modules/gateway/bootstrap-peers.js';

// ---------------------------------------------------------------------------
// Zod Schema: 6 sections, flat keys, with defaults
// ---------------------------------------------------------------------------

export const DaemonConfigSchema = z.object({
  daemon: z
    .object({
      release: BuildReleaseEnum.default('standard'),
      log_level: LogLevelEnum.default('info'),
      pid_file: z.string().default('daemon.pid'),
      shutdown_timeout: z.number().int().min(5).max(300).default(30),
    })
    .default({}),
  gateway: z
    .object({
      dir: z.string().min(1).default('gateway'),
      rpc_addr: z.string().default(':9981'),
      bootstrap_peers: z.array(z.string().min(1)).default([...BOOTSTRAP_PEERS]),
      bootstrap_count: z.number().int().min(0).max(16).default(3),
    })
    .default({}),
  consensus: z
    .object({
      dir: z.string().min(1).default('consensus'),
    })
    .default({}),
  tpool: z
    .object({
      dir: z.string().min(1).default('transactionpool'),
      max_transactions: z.number().int().min(1).max(100_000).default(1000),
    })
    .default({}),
  api: z
    .object({
      addr: z.string().default('localhost:9980'),
      user_agent: z.string().min(1).default('Poolnode-Agent'),
    })
    .default({}),
  pool: z
    .object({
      bind_addr: z.string().default(':9985'),
      /** Hundredths of a percent: 200 = 2%. */
      fee: z.number().int().min(0).max(10_000).default(200),
    })
    .default({}),
});

export type DaemonConfig = z.infer<typeof DaemonConfigSchema>;

/** Per-section overrides applied after the file and environment (CLI flags). */
export type ConfigOverrides = Partial<Record<ConfigSection, Record<string, unknown>>>;

// ---------------------------------------------------------------------------
// Known TOML sections
// ---------------------------------------------------------------------------

const KNOWN_SECTIONS = ['daemon', 'gateway', 'consensus', 'tpool', 'api', 'pool'] as const;
type ConfigSection = (typeof KNOWN_SECTIONS)[number];

function isKnownSection(key: string): key is ConfigSection {
  return KNOWN_SECTIONS.some((section) => section === key);
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

// ---------------------------------------------------------------------------
// detectNestedSections: reject nested TOML sections
// ---------------------------------------------------------------------------

/**
 * Walk top-level keys. A section whose own values contain another table means
 * nested TOML sections, which the flat-key config policy forbids.
 *
 * Also rejects unknown top-level sections not in KNOWN_SECTIONS.
 */
export function detectNestedSections(parsed: Record<string, unknown>): void {
  for (const key of Object.keys(parsed)) {
    if (!isKnownSection(key)) {
      throw new Error(
        `Unknown config section '[${key}]'. Allowed sections: ${KNOWN_SECTIONS.join(', ')}`,
      );
    }

    const value = parsed[key];
    if (isPlainObject(value)) {
      for (const [subKey, subValue] of Object.entries(value)) {
        if (isPlainObject(subValue)) {
          throw new Error(
            `Nested TOML section '[${key}.${subKey}]' detected. ` +
              `poolnode config requires flattened keys. ` +
              `Use '${subKey}_<field>' inside [${key}] instead.`,
          );
        }
      }
    }
  }
}

// ---------------------------------------------------------------------------
// parseEnvValue: coerce string env values to correct types
// ---------------------------------------------------------------------------

/**
 * Parse an environment variable string into the appropriate JS type.
 * - 'true'/'false' -> boolean
 * - Numeric strings -> number
 * - JSON array strings -> parsed array
 * - Otherwise -> string
 */
export function parseEnvValue(value: string): string | number | boolean | unknown[] {
  if (value === 'true') return true;
  if (value === 'false') return false;

  if (value.startsWith('[') && value.endsWith(']')) {
    try {
      const parsed: unknown = JSON.parse(value);
      if (Array.isArray(parsed)) return parsed;
    } catch {
      // Not JSON: keep the raw string
    }
  }

  if (/^-?\d+(\.\d+)?$/.test(value)) {
    const num = Number(value);
    if (Number.isFinite(num)) return num;
  }

  return value;
}

// ---------------------------------------------------------------------------
// applyEnvOverrides: POOLNODE_{SECTION}_{KEY} -> config override
// ---------------------------------------------------------------------------

/** Env keys that are not config keys. */
const SKIP_ENV_KEYS = new Set(['POOLNODE_DATA_DIR']);

function sectionOf(config: Record<string, unknown>, section: ConfigSection): Record<string, unknown> {
  const existing = config[section];
  if (isPlainObject(existing)) return existing;
  const created: Record<string, unknown> = {};
  config[section] = created;
  return created;
}

/**
 * Apply environment variable overrides. Pattern: POOLNODE_{SECTION}_{KEY}.
 * The first segment after POOLNODE_ is the section; the rest joined with '_' is the field,
 * so POOLNODE_GATEWAY_RPC_ADDR maps to gateway.rpc_addr.
 */
export function applyEnvOverrides(config: Record<string, unknown>, env: NodeJS.ProcessEnv = process.env): void {
  for (const [envKey, envValue] of Object.entries(env)) {
    if (!envKey.startsWith('POOLNODE_') || envValue === undefined) continue;
    if (SKIP_ENV_KEYS.has(envKey)) continue;

    const parts = envKey.slice('POOLNODE_'.length).toLowerCase().split('_');
    const section = parts[0];
    if (!section || !isKnownSection(section)) continue;

    const field = parts.slice(1).join('_');
    if (!field) continue;

    sectionOf(config, section)[field] = parseEnvValue(envValue);
  }
}

/** Merge CLI-level overrides (undefined values are ignored). */
export function applyOverrides(config: Record<string, unknown>, overrides: ConfigOverrides): void {
  for (const section of KNOWN_SECTIONS) {
    const values = overrides[section];
    if (!values) continue;
    for (const [field, value] of Object.entries(values)) {
      if (value === undefined) continue;
      sectionOf(config, section)[field] = value;
    }
  }
}

// ---------------------------------------------------------------------------
// loadConfig: main pipeline
// ---------------------------------------------------------------------------

function isNotFound(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}

/**
 * Load daemon config from dataDir/config.toml with env override and Zod validation.
 *
 * 1. Read config.toml (ENOENT -> empty object, all defaults)
 * 2. Parse with smol-toml
 * 3. Detect nested sections (reject)
 * 4. Apply env overrides (POOLNODE_{SECTION}_{KEY})
 * 5. Apply CLI overrides
 * 6. Validate with DaemonConfigSchema.parse() (applies defaults)
 */
export function loadConfig(dataDir: string, overrides: ConfigOverrides = {}): DaemonConfig {
  let raw: Record<string, unknown> = {};

  const configPath = join(dataDir, 'config.toml');
  try {
    const content = readFileSync(configPath, 'utf-8');
    if (content.trim().length > 0) {
      raw = parse(content);
    }
  } catch (err) {
    if (!isNotFound(err)) {
      throw err;
    }
  }

  detectNestedSections(raw);
  applyEnvOverrides(raw);
  applyOverrides(raw, overrides);

  return DaemonConfigSchema.parse(raw);
}
