#!/usr/bin/env node
/**
 * feeder-console - CLI Entry Point
 *
 * Usage:
 *   feeder-console [options]              Interactive console (default)
 *   feeder-console regenerate [options]   Rebuild dashboard-config.js from .env
 *   feeder-console status [options]       Print the state of every managed service
 *   feeder-console backup [options]       Write a timestamped backup of .env
 */

import * as fs from 'fs';
import * as path from 'path';
import { resolveConsoleConfig, type ConsoleConfig } from '../config/console-config';
import { loadServiceCatalog } from '../config/service-catalog';
import { ConsoleStateMachine } from '../console/console-state-machine';
import { createSessionContext } from '../console/session-context';
import { InterruptController } from '../console/interrupt-controller';
import { ConsoleOutput } from '../console/console-output';
import { getConsoleLogger } from '../logging/console-logger';
import { JsonlLogSink, StderrLogSink } from '../logging/jsonl-log-sink';
import { regenerateFromStore } from '../store/config-commit';
import { getProbeRegistry, installCleanupHandlers } from '../supervisor/probe-registry';
import { createConsoleServices } from './bootstrap';
import { CliUsageError, parseArgs, type ParsedArgs } from './cli-args';

const HELP_TEXT = `
feeder-console - ADS-B feeder configuration console

Usage:
  feeder-console [command] [options]

Commands:
  console        Interactive setup and maintenance console (default)
  regenerate     Rebuild dashboard-config.js from .env
  status         Show the state of every managed service
  backup         Write a timestamped backup of .env

Options:
  --dir <path>       Installation directory holding .env and the compose project
                     (env: FEEDER_CONSOLE_DIR, default: current directory)
  --data-dir <path>  Persistent data directory of the feeders
                     (env: FEEDER_CONSOLE_DATA_DIR, default: /opt/adsb)
  --catalog <path>   Service catalog YAML (env: FEEDER_CONSOLE_CATALOG)
  --verbose          Echo the decision log to stderr
  -h, --help         Show this help
  -v, --version      Show version

Environment:
  FEEDER_CONSOLE_LOG_DIR            Probe and decision logs (default: <tmp>/feeder-console)
  FEEDER_CONSOLE_RUNTIME            Container runtime command (default: "docker compose")
  FEEDER_CONSOLE_POLL_MS            Discovery poll interval (default: 1000)
  FEEDER_CONSOLE_MANUAL_TIMEOUT_MS  Manual entry window after a failed discovery (default: 15000)
`;

function readVersion(): string {
  const packagePath = path.join(__dirname, '..', '..', 'package.json');
  const parsed: unknown = JSON.parse(fs.readFileSync(packagePath, 'utf-8'));
  if (typeof parsed === 'object' && parsed !== null && 'version' in parsed && typeof parsed.version === 'string') {
    return parsed.version;
  }
  return '0.0.0';
}

function attachLogSinks(config: ConsoleConfig): void {
  const logger = getConsoleLogger();
  logger.subscribe(new JsonlLogSink({ filePath: path.join(config.logDir, 'console.jsonl') }));
  if (config.verbose) {
    logger.subscribe(new StderrLogSink());
  }
}

async function runConsole(config: ConsoleConfig): Promise<number> {
  const catalog = loadServiceCatalog(config.catalogPath);
  const logger = getConsoleLogger();
  const interrupts = new InterruptController();
  const services = createConsoleServices(config, catalog, logger, { interrupts });
  const registry = getProbeRegistry();

  // Outside a prompt, Ctrl+C cancels the running operation; with none running it ends the console
  const onInterrupt = (): void => {
    if (interrupts.interrupt()) {
      services.output.line();
      services.output.warn('Cancelled');
      return;
    }
    registry.terminateAll().then(
      () => process.exit(130),
      () => process.exit(130)
    );
  };
  process.on('SIGINT', onInterrupt);

  try {
    const machine = new ConsoleStateMachine(services);
    await machine.run(createSessionContext(config, catalog));
    services.output.line('Goodbye.');
    return 0;
  } finally {
    process.off('SIGINT', onInterrupt);
    await registry.terminateAll();
  }
}

async function runRegenerate(config: ConsoleConfig): Promise<number> {
  const catalog = loadServiceCatalog(config.catalogPath);
  const services = createConsoleServices(config, catalog, getConsoleLogger());
  const result = regenerateFromStore(services);
  if (!result) {
    services.output.warn(`No configuration at ${config.envFile}`, 'Run feeder-console to set up first');
    return 1;
  }
  services.output.ok(`${result.changed ? 'Regenerated' : 'Up to date'}: ${result.path}`);
  return 0;
}

async function runStatus(config: ConsoleConfig): Promise<number> {
  const catalog = loadServiceCatalog(config.catalogPath);
  const services = createConsoleServices(config, catalog, getConsoleLogger());
  services.output.serviceStatus(await services.lifecycle.status());
  return 0;
}

async function runBackup(config: ConsoleConfig): Promise<number> {
  const catalog = loadServiceCatalog(config.catalogPath);
  const services = createConsoleServices(config, catalog, getConsoleLogger());
  const snapshot = services.store.load();
  if (!snapshot) {
    services.output.warn(`No configuration at ${config.envFile}`);
    return 1;
  }
  services.output.ok(`Backup written: ${services.store.backup(snapshot, 'manual').path}`);
  return 0;
}

/**
 * Main entry point
 */
async function main(): Promise<void> {
  let parsed: ParsedArgs;
  try {
    parsed = parseArgs(process.argv.slice(2));
  } catch (error) {
    if (error instanceof CliUsageError) {
      console.error(`Error: ${error.message}`);
      console.error('Run feeder-console --help for usage.');
      process.exit(2);
    }
    throw error;
  }

  if (parsed.help) {
    console.log(HELP_TEXT);
    process.exit(0);
  }
  if (parsed.version) {
    console.log(readVersion());
    process.exit(0);
  }

  const config = resolveConsoleConfig(parsed.overrides);
  attachLogSinks(config);
  installCleanupHandlers();

  let exitCode = 0;
  try {
    switch (parsed.command) {
      case 'regenerate':
        exitCode = await runRegenerate(config);
        break;
      case 'status':
        exitCode = await runStatus(config);
        break;
      case 'backup':
        exitCode = await runBackup(config);
        break;
      case 'console':
        exitCode = await runConsole(config);
        break;
    }
  } catch (error) {
    getConsoleLogger().logError(`${parsed.command} failed`, error);
    new ConsoleOutput((text) => process.stderr.write(text)).fail(error);
    exitCode = 1;
  }
  process.exit(exitCode);
}

main().catch((err: unknown) => {
  console.error(`Fatal error: ${err instanceof Error ? err.message : String(err)}`);
  process.exit(1);
});
