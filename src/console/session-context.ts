/**
 * Session Context
 *
 * Everything the console has learned in this session. Handlers receive the
 * context and return an updated copy; nothing is read from ambient globals.
 */

import type { ConsoleConfig } from '../config/console-config';
import type { ServiceCatalog } from '../config/service-catalog';
import type { FeederProfile } from '../models/feeder-profile';

export interface SessionContext {
  readonly config: ConsoleConfig;
  readonly catalog: ServiceCatalog;
  /** Profile confirmed in this session */
  readonly profile?: FeederProfile;
  /** Operator has fed ADS-B data before (asked once per setup flow) */
  readonly returningOperator: boolean;
  /** Number of completed setup flows */
  readonly setupRuns: number;
  /** Message of the last failure reported to the operator */
  readonly lastError?: string;
}

export function createSessionContext(config: ConsoleConfig, catalog: ServiceCatalog): SessionContext {
  return {
    config,
    catalog,
    returningOperator: false,
    setupRuns: 0,
  };
}
