/**
 * Centralized environment variable loader
 *
 * Locates the repo root and loads .env / .env.local deterministically.
 * Provides diagnostics without logging secrets.
 */

import { config } from 'dotenv';
import { existsSync, readFileSync } from 'fs';
import { dirname, join, resolve } from 'path';

export interface EnvKeyStatus {
  key: string;
  present: boolean;
  maskedValue?: string;
  length?: number;
  source?: string;
}

export interface EnvDiagnostics {
  cwd: string;
  repoRoot: string;
  envFilePath: string;
  envFileExists: boolean;
  keys: EnvKeyStatus[];
  warnings: string[];
}

export interface InitEnvResult {
  repoRoot: string;
  envFilePath: string;
  envLocalFilePath: string;
  loaded: boolean;
  localLoaded: boolean;
  keysLoaded: string[];
  /** Maps key -> '.env' or '.env.local' */
  keySources: Record<string, string>;
}

const SECRET_KEY_HINTS = ['TOKEN', 'SECRET', 'PASSWORD', 'KEY'];

function hasWorkspaces(packageJsonPath: string): boolean {
  try {
    const pkg: unknown = JSON.parse(readFileSync(packageJsonPath, 'utf-8'));
    return typeof pkg === 'object' && pkg !== null && 'workspaces' in pkg;
  } catch {
    // Unreadable package.json is not a root marker
    return false;
  }
}

/**
 * Find repository root by walking up from the start directory
 */
export function findRepoRoot(startPath: string = process.cwd()): string {
  let current = resolve(startPath);

  for (;;) {
    const packageJsonPath = join(current, 'package.json');
    if (existsSync(packageJsonPath) && hasWorkspaces(packageJsonPath)) {
      return current;
    }
    if (existsSync(join(current, '.git'))) {
      return current;
    }

    const parent = dirname(current);
    if (parent === current) break;
    current = parent;
  }

  return resolve(startPath);
}

export function maskValue(value: string): string {
  if (value.length <= 8) {
    return '*'.repeat(value.length);
  }
  return `${value.substring(0, 4)}...${value.substring(value.length - 4)}`;
}

function isSecretKey(key: string): boolean {
  return SECRET_KEY_HINTS.some((hint) => key.includes(hint));
}

// CRLF and control characters usually mean a Windows-edited .env
function hasUnprintableChars(value: string): boolean {
  return /[\r\x00-\x08\x0B-\x0C\x0E-\x1F]/.test(value);
}

function hasQuotesOrWhitespace(value: string): boolean {
  return /^["'\s]|["'\s]$/.test(value);
}

function loadFile(
  path: string,
  label: string,
  keysLoaded: string[],
  keySources: Record<string, string>
): boolean {
  const result = config({ path, override: true });
  const parsed = result.parsed ?? {};

  for (const [key, value] of Object.entries(parsed)) {
    if (value.trim().length === 0) continue;
    keySources[key] = label;
    if (!keysLoaded.includes(key)) keysLoaded.push(key);
  }

  if (result.error && Object.keys(parsed).length === 0) {
    console.warn(`[env] Warning: Error loading ${label} file: ${result.error.message}`);
    return false;
  }
  return true;
}

let cachedResult: InitEnvResult | null = null;

/**
 * Initialize environment variables. Call before anything reads process.env.
 *
 * Loads <repo-root>/.env, then <repo-root>/.env.local (overrides .env).
 * An existing non-empty variable is never replaced by an empty file value.
 */
export function initEnv(envFileOverride?: string): InitEnvResult {
  if (cachedResult) {
    return cachedResult;
  }

  const repoRoot = findRepoRoot();
  const envFilePath = resolve(envFileOverride || process.env.ENV_FILE || join(repoRoot, '.env'));
  const envLocalFilePath = resolve(join(repoRoot, '.env.local'));

  const existingEnv: Record<string, string> = {};
  for (const [key, value] of Object.entries(process.env)) {
    if (value && value.trim().length > 0) {
      existingEnv[key] = value;
    }
  }

  const keysLoaded: string[] = [];
  const keySources: Record<string, string> = {};

  let loaded = false;
  if (existsSync(envFilePath)) {
    loaded = loadFile(envFilePath, '.env', keysLoaded, keySources);
  } else {
    console.warn(`[env] .env file not found at: ${envFilePath}`);
  }

  let localLoaded = false;
  if (existsSync(envLocalFilePath)) {
    localLoaded = loadFile(envLocalFilePath, '.env.local', keysLoaded, keySources);
  }

  for (const [key, existingValue] of Object.entries(existingEnv)) {
    const currentValue = process.env[key];
    if (!currentValue || currentValue.trim().length === 0) {
      process.env[key] = existingValue;
    }
  }

  cachedResult = { repoRoot, envFilePath, envLocalFilePath, loaded, localLoaded, keysLoaded, keySources };
  return cachedResult;
}

/**
 * Key presence and value warnings, safe for logging
 */
export function getEnvDiagnostics(
  keys: readonly string[],
  env: NodeJS.ProcessEnv = process.env
): EnvDiagnostics {
  const cwd = process.cwd();
  const repoRoot = findRepoRoot(cwd);
  const envFilePath = resolve(env.ENV_FILE || join(repoRoot, '.env'));
  const keySources = cachedResult?.keySources ?? {};

  const statuses = keys.map((key): EnvKeyStatus => {
    const value = env[key]?.trim();
    if (!value) {
      return { key, present: false };
    }
    return {
      key,
      present: true,
      length: value.length,
      maskedValue: isSecretKey(key) ? maskValue(value) : undefined,
      source: keySources[key],
    };
  });

  const warnings: string[] = [];
  if (!existsSync(envFilePath)) {
    warnings.push(`.env file not found at: ${envFilePath}`);
  }

  for (const key of keys) {
    const value = env[key];
    if (!value) continue;
    if (isSecretKey(key) && hasQuotesOrWhitespace(value)) {
      warnings.push(`${key} contains quotes or leading/trailing whitespace (may cause issues)`);
    }
    if (hasUnprintableChars(value)) {
      warnings.push(`${key} contains unprintable characters (possible CRLF/encoding issue)`);
    }
  }

  return { cwd, repoRoot, envFilePath, envFileExists: existsSync(envFilePath), keys: statuses, warnings };
}

export function validateRequiredEnv(
  requiredKeys: readonly string[],
  env: NodeJS.ProcessEnv = process.env
): { valid: boolean; missing: string[] } {
  const missing = requiredKeys.filter((key) => !env[key] || env[key]?.trim().length === 0);
  return { valid: missing.length === 0, missing };
}
