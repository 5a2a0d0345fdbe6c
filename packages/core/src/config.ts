/**
 * Configuration management for manforge
 * Loads settings from a workspace .env file and environment variables
 */

import * as fs from 'fs';
import * as path from 'path';
import { isOutputStrategyName, OUTPUT_STRATEGY_NAMES } from './services/OutputStrategies.js';
import { LogLevel, parseLogLevel } from './utils/LoggingService.js';

export interface Config {
  workspaceRoot: string;         // Base for relative paths given to the MCP server
  format: string;                // Output strategy selector
  permalink?: string;            // Front-matter permalink
  logLevel: string;
}

/**
 * Load `.env` from the workspace root into `env`. Variables that are
 * already set win.
 */
function loadEnvFile(env: NodeJS.ProcessEnv): void {
  const workspaceRoot = env.MANFORGE_WORKSPACE_ROOT || process.cwd();
  const envPath = path.join(workspaceRoot, '.env');

  if (fs.existsSync(envPath)) {
    const envContent = fs.readFileSync(envPath, 'utf-8');
    const lines = envContent.split('\n');

    for (const line of lines) {
      const trimmed = line.trim();
      if (!trimmed || trimmed.startsWith('#')) continue;

      const [key, ...valueParts] = trimmed.split('=');
      const value = valueParts.join('=').trim();

      if (key && !env[key]) {
        env[key] = value;
      }
    }
  }
}

/**
 * Load configuration from environment variables
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  loadEnvFile(env);

  return {
    workspaceRoot: env.MANFORGE_WORKSPACE_ROOT || process.cwd(),
    format: env.MANFORGE_FORMAT || 'html',
    permalink: env.MANFORGE_PERMALINK || undefined,
    logLevel: env.MANFORGE_LOG_LEVEL || 'warn',
  };
}

/**
 * Validate configuration
 */
export function validateConfig(config: Config): string[] {
  const errors: string[] = [];

  if (!config.workspaceRoot) {
    errors.push('MANFORGE_WORKSPACE_ROOT is required');
  }

  if (!isOutputStrategyName(config.format)) {
    errors.push(`MANFORGE_FORMAT must be one of: ${OUTPUT_STRATEGY_NAMES.join(', ')}`);
  }

  if (parseLogLevel(config.logLevel) === null) {
    errors.push('MANFORGE_LOG_LEVEL must be one of: debug, info, warn, error');
  }

  return errors;
}

/**
 * Level to log at; falls back to WARN for an invalid setting.
 */
export function configuredLogLevel(config: Config): LogLevel {
  return parseLogLevel(config.logLevel) ?? LogLevel.WARN;
}
