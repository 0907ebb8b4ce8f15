/**
 * Shared environment loading utilities
 * Centralizes loading the .env file relative to the workspace root
 */

import dotenv from 'dotenv';
import path from 'path';
import fs from 'fs';

/**
 * Options for loading environment variables
 */
export interface EnvLoaderOptions {
  /** Custom path to .env file (overrides default resolution) */
  envPath?: string;
  /** Directory to start the upward search from (default: process.cwd()) */
  startDir?: string;
  /** Whether to throw an error if .env file is not found (default: false) */
  required?: boolean;
  /** Additional environment variables to set (useful for testing) */
  overrides?: Record<string, string>;
}

/**
 * Find the project root by looking for a .env file or the workspace package.json
 */
export function findProjectRoot(startDir: string): string {
  let currentDir = path.resolve(startDir);

  // Walk up the directory tree looking for markers
  while (currentDir !== path.dirname(currentDir)) {
    if (fs.existsSync(path.join(currentDir, '.env'))) {
      return currentDir;
    }
    const pkgPath = path.join(currentDir, 'package.json');
    if (fs.existsSync(pkgPath) && isWorkspaceManifest(pkgPath)) {
      return currentDir;
    }
    currentDir = path.dirname(currentDir);
  }

  return path.resolve(startDir);
}

function isWorkspaceManifest(pkgPath: string): boolean {
  try {
    const pkg: unknown = JSON.parse(fs.readFileSync(pkgPath, 'utf8'));
    return typeof pkg === 'object' && pkg !== null && 'workspaces' in pkg;
  } catch (error) {
    console.error(`[env] Ignoring unreadable ${pkgPath}: ${error}`);
    return false;
  }
}

/**
 * Load environment variables from .env file
 *
 * @returns The resolved path to the .env file (or null if not found)
 *
 * @example
 * ```typescript
 * import { loadEnv } from '@cancel-triage/shared';
 *
 * // In your entry point:
 * loadEnv();
 * ```
 */
export function loadEnv(options: EnvLoaderOptions = {}): string | null {
  let envPath: string;
  if (options.envPath) {
    envPath = options.envPath;
  } else {
    const projectRoot = findProjectRoot(options.startDir ?? process.cwd());
    envPath = path.resolve(projectRoot, '.env');
  }

  if (!fs.existsSync(envPath)) {
    if (options.required) {
      throw new Error(`Required .env file not found at: ${envPath}`);
    }
    return null;
  }

  dotenv.config({ path: envPath });

  if (options.overrides) {
    for (const [key, value] of Object.entries(options.overrides)) {
      process.env[key] = value;
    }
  }

  return envPath;
}

/**
 * Source of raw environment values. Defaults to process.env, tests pass a plain object.
 */
export type EnvSource = Record<string, string | undefined>;

/**
 * Get optional environment variable with default
 */
export function getEnv(name: string, defaultValue: string = '', env: EnvSource = process.env): string {
  const value = env[name];
  if (value === undefined || value === '') {
    return defaultValue;
  }
  return value.trim().replace(/\r\n?/g, '');
}

/**
 * Read a "1"/"0" style flag. Anything other than "1" or "true" is off.
 */
export function getEnvFlag(name: string, defaultValue: boolean, env: EnvSource = process.env): boolean {
  const value = getEnv(name, '', env);
  if (!value) {
    return defaultValue;
  }
  return value === '1' || value.toLowerCase() === 'true';
}
