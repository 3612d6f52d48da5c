/**
 * Dashboard Artifact Generator
 *
 * dashboard-config.js is computed from the configuration alone. The output has
 * no timestamps or other ambient input, so regenerating it from an unchanged
 * snapshot is byte-identical.
 */

import * as fs from 'fs';
import * as path from 'path';
import { ConsoleError } from '../errors/console-error';
import { ErrorCode } from '../errors/error-codes';
import { atomicWriteFileSync } from '../logging/atomic-file-writer';
import { getConsoleLogger, type ConsoleLogger } from '../logging/console-logger';
import { getValue, type ConfigSnapshot } from '../store/env-file';

/**
 * Artifact field name -> configuration key
 */
export const ARTIFACT_FIELDS: ReadonlyArray<readonly [string, string]> = [
  ['adsbxUUID', 'ADSBX_UUID'],
  ['adsbLolUUID', 'MULTIFEEDER_UUID'],
  ['fr24Key', 'FR24KEY'],
  ['radarboxKey', 'RADARBOX_KEY'],
  ['radarboxSerial', 'RADARBOX_SERIAL'],
  ['piawareID', 'PIAWARE_FEEDER_ID'],
];

export interface ArtifactResult {
  path: string;
  content: string;
  /** False when the file already had exactly this content */
  changed: boolean;
}

/**
 * Render the artifact text
 */
export function renderArtifact(snapshot: ConfigSnapshot): string {
  const fields = ARTIFACT_FIELDS.map(
    ([field, key]) => `  ${field}: ${JSON.stringify(getValue(snapshot, key) ?? '')}`
  );
  return [
    '// Generated by feeder-console from .env. Do not edit: run "feeder-console regenerate" instead.',
    'window.FEEDER_CONFIG = {',
    fields.join(',\n'),
    '};',
    '',
  ].join('\n');
}

export class DashboardArtifactGenerator {
  private readonly logger: ConsoleLogger;

  constructor(
    readonly artifactFile: string,
    options: { logger?: ConsoleLogger } = {}
  ) {
    this.logger = options.logger ?? getConsoleLogger();
  }

  render(snapshot: ConfigSnapshot): string {
    return renderArtifact(snapshot);
  }

  /**
   * Write the artifact atomically
   * @throws ConsoleError E104
   */
  regenerate(snapshot: ConfigSnapshot): ArtifactResult {
    const content = this.render(snapshot);
    const existing = fs.existsSync(this.artifactFile) ? fs.readFileSync(this.artifactFile, 'utf-8') : undefined;
    if (existing === content) {
      this.logger.debug('ARTIFACT', `${path.basename(this.artifactFile)} unchanged`);
      return { path: this.artifactFile, content, changed: false };
    }

    const result = atomicWriteFileSync(this.artifactFile, content);
    if (!result.success) {
      throw new ConsoleError(
        ErrorCode.E104_ARTIFACT_WRITE_FAILURE,
        `${this.artifactFile}: ${result.error?.message ?? 'unknown error'}`
      );
    }
    this.logger.info('ARTIFACT', `Regenerated ${path.basename(this.artifactFile)}`, { path: this.artifactFile });
    return { path: this.artifactFile, content, changed: true };
  }

  /**
   * Delete the artifact (uninstall)
   */
  remove(): boolean {
    if (!fs.existsSync(this.artifactFile)) {
      return false;
    }
    fs.rmSync(this.artifactFile, { force: true });
    this.logger.info('ARTIFACT', `Removed ${path.basename(this.artifactFile)}`);
    return true;
  }
}
