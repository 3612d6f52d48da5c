/**
 * Wires the production collaborators for a resolved configuration
 */

import * as fs from 'fs';
import { v4 as uuidv4 } from 'uuid';
import { DashboardArtifactGenerator } from '../artifacts/dashboard-artifact';
import type { ConsoleConfig } from '../config/console-config';
import type { ServiceCatalog } from '../config/service-catalog';
import { ConsoleOutput } from '../console/console-output';
import type { ConsoleServices } from '../console/console-services';
import { InterruptController } from '../console/interrupt-controller';
import { Prompts, ReadlinePrompter, type Prompter } from '../console/prompter';
import { CredentialDiscoveryEngine } from '../discovery/credential-discovery';
import type { ConsoleLogger } from '../logging/console-logger';
import { ChildProcessCommandRunner, type CommandRunner } from '../runtime/command-runner';
import { LifecycleController } from '../runtime/lifecycle-controller';
import { SourceUpdater } from '../runtime/source-updater';
import { ConfigurationStore } from '../store/configuration-store';
import type { ProbeLauncher } from '../supervisor/process-supervisor';
import { ProcessSupervisor } from '../supervisor/process-supervisor';

export interface BootstrapOverrides {
  prompter?: Prompter;
  output?: ConsoleOutput;
  runner?: CommandRunner;
  launcher?: ProbeLauncher;
  interrupts?: InterruptController;
  generateId?: () => string;
  postStartDelayMs?: number;
}

export function createConsoleServices(
  config: ConsoleConfig,
  catalog: ServiceCatalog,
  logger: ConsoleLogger,
  overrides: BootstrapOverrides = {}
): ConsoleServices {
  const output = overrides.output ?? new ConsoleOutput();
  const runner = overrides.runner ?? new ChildProcessCommandRunner();
  const launcher = overrides.launcher ?? new ProcessSupervisor({ logger });

  return {
    store: new ConfigurationStore({ envFile: config.envFile, backupDir: config.backupDir, logger }),
    artifacts: new DashboardArtifactGenerator(config.artifactFile, { logger }),
    lifecycle: new LifecycleController({
      catalog,
      runner,
      runtimeCommand: config.runtimeCommand,
      cwd: config.installDir,
      logger,
    }),
    discovery: new CredentialDiscoveryEngine(launcher, { logger }),
    updater: new SourceUpdater(runner, config.installDir, { logger }),
    prompts: new Prompts(overrides.prompter ?? new ReadlinePrompter(), output),
    output,
    interrupts: overrides.interrupts ?? new InterruptController(),
    logger,
    generateId: overrides.generateId ?? uuidv4,
    removeDirectory: (dir) => fs.promises.rm(dir, { recursive: true, force: true }),
    postStartDelayMs: overrides.postStartDelayMs ?? 3000,
  };
}
