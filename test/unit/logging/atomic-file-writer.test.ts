/**
 * Atomic File Writer Tests
 */

import { describe, it, beforeEach, afterEach } from 'mocha';
import { strict as assert } from 'assert';
import * as fs from 'fs';
import * as path from 'path';
import { DEFAULT_MAX_RETRIES, atomicWriteFileSync } from '../../../src/logging/atomic-file-writer';
import { makeTempDir, removeTempDir } from '../../helpers/temp-dir';

describe('Atomic File Writer', () => {
  let tempDir: string;

  beforeEach(() => {
    tempDir = makeTempDir('atomic');
  });

  afterEach(() => removeTempDir(tempDir));

  describe('atomicWriteFileSync', () => {
    it('should write and replace content without leaving temp files', () => {
      const target = path.join(tempDir, '.env');
      assert.equal(atomicWriteFileSync(target, 'A=1\n').success, true);
      assert.equal(atomicWriteFileSync(target, 'A=2\n').success, true);

      assert.equal(fs.readFileSync(target, 'utf-8'), 'A=2\n');
      assert.deepEqual(fs.readdirSync(tempDir), ['.env']);
    });

    it('should create missing parent directories', () => {
      const target = path.join(tempDir, 'nested', 'dir', 'dashboard-config.js');
      const result = atomicWriteFileSync(target, 'x');
      assert.equal(result.success, true);
      assert.equal(result.retryCount, 0);
      assert.equal(fs.readFileSync(target, 'utf-8'), 'x');
    });

    it('should apply the requested mode', () => {
      const target = path.join(tempDir, '.env');
      atomicWriteFileSync(target, 'A=1\n', { mode: 0o600 });
      assert.equal(fs.statSync(target).mode & 0o777, 0o600);
    });

    it('should retry three times by default', () => {
      const blocker = path.join(tempDir, 'file');
      fs.writeFileSync(blocker, '');
      const result = atomicWriteFileSync(path.join(blocker, 'x'), 'y');
      assert.equal(result.success, false);
      assert.equal(result.retryCount, DEFAULT_MAX_RETRIES);
    });

    it('should report failure after the retries are used up', () => {
      const blocker = path.join(tempDir, 'not-a-dir');
      fs.writeFileSync(blocker, '');
      const result = atomicWriteFileSync(path.join(blocker, '.env'), 'A=1\n', { maxRetries: 2 });

      assert.equal(result.success, false);
      assert.equal(result.retryCount, 2);
      assert.ok(result.error instanceof Error);
    });
  });
});
