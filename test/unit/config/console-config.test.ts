/**
 * Console configuration resolution tests
 */

import { describe, it } from 'mocha';
import { strict as assert } from 'assert';
import * as os from 'os';
import * as path from 'path';
import { resolveConsoleConfig } from '../../../src/config/console-config';
import { BUNDLED_CATALOG_PATH } from '../../../src/config/service-catalog';

describe('resolveConsoleConfig', () => {
  const cwd = '/srv/adsb-feeder';

  it('should apply built-in defaults', () => {
    const config = resolveConsoleConfig({}, {}, cwd);
    assert.equal(config.installDir, cwd);
    assert.equal(config.envFile, '/srv/adsb-feeder/.env');
    assert.equal(config.artifactFile, '/srv/adsb-feeder/dashboard-config.js');
    assert.equal(config.backupDir, cwd);
    assert.equal(config.dataDir, '/opt/adsb');
    assert.equal(config.logDir, path.join(os.tmpdir(), 'feeder-console'));
    assert.equal(config.catalogPath, BUNDLED_CATALOG_PATH);
    assert.equal(config.pollIntervalMs, 1000);
    assert.equal(config.manualEntryTimeoutMs, 15000);
    assert.deepEqual(config.runtimeCommand, ['docker', 'compose']);
    assert.equal(config.verbose, false);
  });

  it('should let environment variables override defaults', () => {
    const config = resolveConsoleConfig(
      {},
      {
        FEEDER_CONSOLE_DIR: 'feeder',
        FEEDER_CONSOLE_DATA_DIR: '/data/adsb',
        FEEDER_CONSOLE_LOG_DIR: '/var/log/feeder',
        FEEDER_CONSOLE_POLL_MS: '250',
        FEEDER_CONSOLE_MANUAL_TIMEOUT_MS: '5000',
        FEEDER_CONSOLE_RUNTIME: 'podman  compose',
      },
      cwd
    );
    assert.equal(config.installDir, '/srv/adsb-feeder/feeder');
    assert.equal(config.envFile, '/srv/adsb-feeder/feeder/.env');
    assert.equal(config.dataDir, '/data/adsb');
    assert.equal(config.logDir, '/var/log/feeder');
    assert.equal(config.pollIntervalMs, 250);
    assert.equal(config.manualEntryTimeoutMs, 5000);
    assert.deepEqual(config.runtimeCommand, ['podman', 'compose']);
  });

  it('should let command-line flags override environment variables', () => {
    const config = resolveConsoleConfig(
      { installDir: '/opt/feeder', dataDir: '/mnt/adsb', catalogPath: 'my-catalog.yaml', verbose: true },
      { FEEDER_CONSOLE_DIR: '/elsewhere', FEEDER_CONSOLE_DATA_DIR: '/elsewhere/data' },
      cwd
    );
    assert.equal(config.installDir, '/opt/feeder');
    assert.equal(config.dataDir, '/mnt/adsb');
    assert.equal(config.catalogPath, '/srv/adsb-feeder/my-catalog.yaml');
    assert.equal(config.verbose, true);
  });

  it('should reject invalid numeric values naming the variable', () => {
    assert.throws(
      () => resolveConsoleConfig({}, { FEEDER_CONSOLE_POLL_MS: 'fast' }, cwd),
      /Invalid FEEDER_CONSOLE_POLL_MS: "fast"/
    );
    assert.throws(
      () => resolveConsoleConfig({}, { FEEDER_CONSOLE_MANUAL_TIMEOUT_MS: '0' }, cwd),
      /Invalid FEEDER_CONSOLE_MANUAL_TIMEOUT_MS/
    );
  });

  it('should reject an empty runtime command', () => {
    assert.throws(() => resolveConsoleConfig({}, { FEEDER_CONSOLE_RUNTIME: '   ' }, cwd), /command is empty/);
  });
});
