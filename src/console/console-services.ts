/**
 * Collaborators the console drives
 */

import type { DashboardArtifactGenerator } from '../artifacts/dashboard-artifact';
import type { CredentialDiscoveryEngine } from '../discovery/credential-discovery';
import type { ConsoleLogger } from '../logging/console-logger';
import type { LifecycleController } from '../runtime/lifecycle-controller';
import type { SourceUpdater } from '../runtime/source-updater';
import type { ConfigurationStore } from '../store/configuration-store';
import type { ConsoleOutput } from './console-output';
import type { InterruptController } from './interrupt-controller';
import type { Prompts } from './prompter';

export interface ConsoleServices {
  store: ConfigurationStore;
  artifacts: DashboardArtifactGenerator;
  lifecycle: LifecycleController;
  discovery: CredentialDiscoveryEngine;
  updater: SourceUpdater;
  prompts: Prompts;
  output: ConsoleOutput;
  interrupts: InterruptController;
  logger: ConsoleLogger;
  /** Source of locally generated UUIDs */
  generateId: () => string;
  /** Recursive delete of the managed services' data directory */
  removeDirectory: (dir: string) => Promise<void>;
  /** Wait before reading logs of freshly started services */
  postStartDelayMs: number;
}
