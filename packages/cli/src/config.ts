/**
 * CLI configuration loading
 *
 * Loads configuration from .env files, searching from the current directory
 * up to the filesystem root.
 */

import type { Environment, LogLevel } from '@simplelang/logger';
import { isLogLevel } from '@simplelang/logger';
import * as fs from 'node:fs';
import * as path from 'node:path';

export interface SimpleLangConfig {
  strictBlocks?: boolean;
  strictOperands?: boolean;
  logLevel?: LogLevel;
  environment?: Environment;
}

const ENVIRONMENTS: readonly Environment[] = ['test', 'development', 'production'];

/**
 * Parse a .env file into a key-value object
 */
export function parseEnvFile(content: string): Record<string, string> {
  const result: Record<string, string> = {};

  for (const line of content.split('\n')) {
    const trimmed = line.trim();

    // Skip empty lines and comments
    if (!trimmed || trimmed.startsWith('#')) {
      continue;
    }

    const eqIndex = trimmed.indexOf('=');
    if (eqIndex === -1) {
      continue;
    }

    const key = trimmed.slice(0, eqIndex).trim();
    let value = trimmed.slice(eqIndex + 1).trim();

    // Remove surrounding quotes if present
    if (
      (value.startsWith('"') && value.endsWith('"')) ||
      (value.startsWith("'") && value.endsWith("'"))
    ) {
      value = value.slice(1, -1);
    }

    result[key] = value;
  }

  return result;
}

/**
 * Find and load the nearest readable .env file, searching from startDir up to root
 */
function findEnvFile(startDir: string): Record<string, string> | null {
  let currentDir = path.resolve(startDir);

  while (true) {
    const envPath = path.join(currentDir, '.env');

    if (fs.existsSync(envPath)) {
      try {
        return parseEnvFile(fs.readFileSync(envPath, 'utf-8'));
      } catch {
        // Unreadable (a directory, no permission): continue searching
      }
    }

    const parentDir = path.dirname(currentDir);
    if (parentDir === currentDir) {
      // Reached filesystem root
      return null;
    }
    currentDir = parentDir;
  }
}

function parseBoolean(value: string | undefined): boolean | undefined {
  if (value === 'true') return true;
  if (value === 'false') return false;
  return undefined;
}

function isEnvironment(value: string | undefined): value is Environment {
  return ENVIRONMENTS.some((env) => env === value);
}

function applyVariables(config: SimpleLangConfig, vars: Record<string, string | undefined>): void {
  const strictBlocks = parseBoolean(vars.SIMPLELANG_STRICT_BLOCKS);
  if (strictBlocks !== undefined) {
    config.strictBlocks = strictBlocks;
  }

  const strictOperands = parseBoolean(vars.SIMPLELANG_STRICT_OPERANDS);
  if (strictOperands !== undefined) {
    config.strictOperands = strictOperands;
  }

  const logLevel = vars.SIMPLELANG_LOG_LEVEL;
  if (isLogLevel(logLevel)) {
    config.logLevel = logLevel;
  }

  const environment = vars.SIMPLELANG_ENV;
  if (isEnvironment(environment)) {
    config.environment = environment;
  }
}

/**
 * Load configuration from environment and .env files
 *
 * Priority (highest to lowest):
 * 1. Process environment variables
 * 2. .env file (searched from cwd upward)
 *
 * Unrecognized values are ignored.
 */
export function loadConfig(
  cwd: string = process.cwd(),
  env: Record<string, string | undefined> = process.env,
): SimpleLangConfig {
  const config: SimpleLangConfig = {};

  // Load from .env file first (lower priority)
  const envFile = findEnvFile(cwd);
  if (envFile) {
    applyVariables(config, envFile);
  }

  // Override with process environment (higher priority)
  applyVariables(config, env);

  return config;
}
