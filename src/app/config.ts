import { existsSync, readFileSync } from 'fs';
import { load } from 'js-yaml';
import { z } from 'zod';
import merge from 'lodash/merge.js';
import { resolveProjectPath } from './paths.js';

const yamlObjectSchema = z.record(z.string(), z.unknown());

function loadYamlObject(path: string): Record<string, unknown> {
  const parsed: unknown = load(readFileSync(path, 'utf8'));
  if (parsed === undefined || parsed === null) return {};
  return yamlObjectSchema.parse(parsed);
}

// Load defaults from YAML (single source of truth)
const configDefaults = loadYamlObject(resolveProjectPath('config.defaults.yaml'));

// ============================================
// Schemas (validation only, no defaults)
// ============================================

const logConfigSchema = z.object({
  level: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal']),
  target: z.enum(['stdout', 'file']),
  filePath: z.string(),
});

// PBKDF2 parameters for sealing private keys at rest
const keyStoreConfigSchema = z.object({
  iterations: z.number().int().min(1000),
  saltBytes: z.number().int().min(16).max(64),
});

const certificateConfigSchema = z.object({
  keySize: z.union([z.literal(2048), z.literal(3072), z.literal(4096)]),
  validityDays: z.number().int().positive(),
});

const signatureConfigSchema = z.object({
  maxAgeDays: z.number().int().positive(),
});

const revocationConfigSchema = z.object({
  path: z.string().min(1),
});

const identityConfigSchema = z.object({
  usersDir: z.string().min(1),
});

const mergedConfigSchema = z.object({
  log: logConfigSchema,
  keyStore: keyStoreConfigSchema,
  certificate: certificateConfigSchema,
  signature: signatureConfigSchema,
  revocation: revocationConfigSchema,
  identity: identityConfigSchema,
});

type MergedConfig = z.infer<typeof mergedConfigSchema>;

// ============================================
// Config Loading
// ============================================

// Cache user config (loaded once)
let userConfigCache: Record<string, unknown> | null = null;
function loadUserYaml(): Record<string, unknown> {
  if (userConfigCache !== null) return userConfigCache;

  const configPath = resolveProjectPath('config.yaml');
  userConfigCache = existsSync(configPath) ? loadYamlObject(configPath) : {};
  return userConfigCache;
}

function loadMergedConfig(overrides: Record<string, unknown>): MergedConfig {
  try {
    // defaults -> config.yaml -> programmatic overrides
    const merged = merge({}, configDefaults, loadUserYaml(), overrides);
    return mergedConfigSchema.parse(merged);
  } catch (error) {
    if (error instanceof z.ZodError) {
      const details = error.issues.map((e) => `  - ${e.path.join('.')}: ${e.message}`).join('\n');
      throw new Error(`Invalid configuration. Please check config.yaml and config.defaults.yaml\n${details}`);
    }
    throw error;
  }
}

// ============================================
// State
// ============================================

let config: MergedConfig | null = null;

export function initConfig(overrides: Record<string, unknown> = {}): void {
  config = loadMergedConfig(overrides);
}

export function isConfigInitialized(): boolean {
  return config !== null;
}

function getConfig(): MergedConfig {
  if (!config) throw new Error('Config not initialized. Call initConfig() first.');
  return config;
}

// ============================================
// Getters
// ============================================

export const getLogConfig = () => getConfig().log;
export const getKeyStoreConfig = () => getConfig().keyStore;
export const getCertificateConfig = () => getConfig().certificate;
export const getSignatureConfig = () => getConfig().signature;
export const getRevocationConfig = () => getConfig().revocation;
export const getIdentityConfig = () => getConfig().identity;

// ============================================
// Types (only export those used externally)
// ============================================

export type LogConfig = z.infer<typeof logConfigSchema>;
export type KeyStoreConfig = z.infer<typeof keyStoreConfigSchema>;
export type CertificateConfig = z.infer<typeof certificateConfigSchema>;
export type SignatureConfig = z.infer<typeof signatureConfigSchema>;
