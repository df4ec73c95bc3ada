/**
 * Config module barrel export.
 *
 * Re-exports config loader, schema, and type.
 */

export {
  loadConfig,
  DaemonConfigSchema,
  detectNestedSections,
  applyEnvOverrides,
  applyOverrides,
  parseEnvValue,
} from './loader.js';
export type { DaemonConfig, ConfigOverrides } from './loader.js';
