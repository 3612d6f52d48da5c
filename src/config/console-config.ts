/**
 * Console Configuration
 *
 * Resolves where the console keeps its files and how it talks to the runtime.
 * Precedence (lowest to highest): built-in defaults, environment variables,
 * command-line flags.
 */

import * as os from 'os';
import * as path from 'path';
import { BUNDLED_CATALOG_PATH } from './service-catalog';

export interface ConsoleConfig {
  /** Directory holding .env, the dashboard artifact and the compose project */
  installDir: string;
  envFile: string;
  artifactFile: string;
  backupDir: string;
  /** Persistent data of the managed services (removed on full uninstall) */
  dataDir: string;
  /** Probe output and console decision logs */
  logDir: string;
  catalogPath: string;
  pollIntervalMs: number;
  manualEntryTimeoutMs: number;
  /** Command prefix for the container runtime, e.g. ['docker', 'compose'] */
  runtimeCommand: string[];
  verbose: boolean;
}

/**
 * Overrides accepted from the command line
 */
export interface ConsoleConfigOverrides {
  installDir?: string;
  dataDir?: string;
  catalogPath?: string;
  verbose?: boolean;
}

export const ENV_FILE_NAME = '.env';
export const ARTIFACT_FILE_NAME = 'dashboard-config.js';

const DEFAULTS = {
  dataDir: '/opt/adsb',
  pollIntervalMs: 1000,
  manualEntryTimeoutMs: 15000,
  runtimeCommand: ['docker', 'compose'],
};

/**
 * Parse a positive integer environment value; fail-closed with the variable name
 */
function readPositiveInt(env: NodeJS.ProcessEnv, name: string, fallback: number): number {
  const raw = env[name];
  if (raw === undefined || raw === '') {
    return fallback;
  }
  const value = parseInt(raw, 10);
  if (isNaN(value) || value <= 0 || String(value) !== raw.trim()) {
    throw new Error(`Invalid ${name}: "${raw}". Must be a positive integer.`);
  }
  return value;
}

function splitCommand(raw: string): string[] {
  return raw.split(/\s+/).filter((part) => part.length > 0);
}

/**
 * Build the console configuration
 */
export function resolveConsoleConfig(
  overrides: ConsoleConfigOverrides = {},
  env: NodeJS.ProcessEnv = process.env,
  cwd: string = process.cwd()
): ConsoleConfig {
  const installDir = path.resolve(cwd, overrides.installDir || env.FEEDER_CONSOLE_DIR || '.');
  const runtimeCommand = env.FEEDER_CONSOLE_RUNTIME
    ? splitCommand(env.FEEDER_CONSOLE_RUNTIME)
    : DEFAULTS.runtimeCommand;
  if (runtimeCommand.length === 0) {
    throw new Error('Invalid FEEDER_CONSOLE_RUNTIME: command is empty');
  }

  return {
    installDir,
    envFile: path.join(installDir, ENV_FILE_NAME),
    artifactFile: path.join(installDir, ARTIFACT_FILE_NAME),
    backupDir: installDir,
    dataDir: path.resolve(cwd, overrides.dataDir || env.FEEDER_CONSOLE_DATA_DIR || DEFAULTS.dataDir),
    logDir: path.resolve(cwd, env.FEEDER_CONSOLE_LOG_DIR || path.join(os.tmpdir(), 'feeder-console')),
    catalogPath: path.resolve(cwd, overrides.catalogPath || env.FEEDER_CONSOLE_CATALOG || BUNDLED_CATALOG_PATH),
    pollIntervalMs: readPositiveInt(env, 'FEEDER_CONSOLE_POLL_MS', DEFAULTS.pollIntervalMs),
    manualEntryTimeoutMs: readPositiveInt(env, 'FEEDER_CONSOLE_MANUAL_TIMEOUT_MS', DEFAULTS.manualEntryTimeoutMs),
    runtimeCommand,
    verbose: overrides.verbose ?? false,
  };
}
