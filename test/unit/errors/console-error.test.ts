/**
 * Error code and ConsoleError tests
 */

import { describe, it } from 'mocha';
import { strict as assert } from 'assert';
import {
  ErrorCategory,
  ErrorCode,
  getErrorCategory,
  getErrorMessage,
  getRemediationHint,
  isRecoverable,
} from '../../../src/errors/error-codes';
import { ConsoleError, describeError, isConsoleError } from '../../../src/errors/console-error';

describe('Error codes', () => {
  it('should map every code to its category by prefix', () => {
    assert.equal(getErrorCategory(ErrorCode.E101_MALFORMED_CONFIGURATION), ErrorCategory.CONFIGURATION);
    assert.equal(getErrorCategory(ErrorCode.E202_EXTRACTION_TIMEOUT), ErrorCategory.DISCOVERY);
    assert.equal(getErrorCategory(ErrorCode.E301_RUNTIME_OPERATION_FAILURE), ErrorCategory.RUNTIME);
    assert.equal(getErrorCategory(ErrorCode.E401_INVALID_TRANSITION), ErrorCategory.CONSOLE);
  });

  it('should have a message and a hint for every code', () => {
    for (const code of Object.values(ErrorCode)) {
      assert.notEqual(getErrorMessage(code), '');
      assert.notEqual(getRemediationHint(code), '');
    }
  });

  it('should treat only a malformed configuration as unrecoverable', () => {
    assert.equal(isRecoverable(ErrorCode.E101_MALFORMED_CONFIGURATION), false);
    assert.equal(isRecoverable(ErrorCode.E201_PROBE_LAUNCH_FAILURE), true);
    assert.equal(isRecoverable(ErrorCode.E301_RUNTIME_OPERATION_FAILURE), true);
  });
});

describe('ConsoleError', () => {
  it('should format the message with code and context', () => {
    const error = new ConsoleError(ErrorCode.E302_UNKNOWN_SERVICE, 'adsbhub');
    assert.equal(error.message, '[E302] Unknown service name: adsbhub');
    assert.equal(error.code, ErrorCode.E302_UNKNOWN_SERVICE);
    assert.equal(error.category, ErrorCategory.RUNTIME);
    assert.equal(error.hint, 'Use one of the service names listed in the catalog');
    assert.equal(error.name, 'ConsoleError');
  });

  it('should omit the context part when none is given', () => {
    assert.equal(new ConsoleError(ErrorCode.E203_PROBE_INTERRUPTED).message, '[E203] Probe was interrupted');
  });

  it('should keep details', () => {
    const error = new ConsoleError(ErrorCode.E101_MALFORMED_CONFIGURATION, '.env line 3', { line: 3 });
    assert.deepEqual(error.details, { line: 3 });
  });

  it('should be an Error and a ConsoleError for instanceof checks', () => {
    const error = new ConsoleError(ErrorCode.E104_ARTIFACT_WRITE_FAILURE);
    assert.ok(error instanceof Error);
    assert.ok(error instanceof ConsoleError);
  });

  describe('isConsoleError', () => {
    it('should match by code when one is given', () => {
      const error = new ConsoleError(ErrorCode.E201_PROBE_LAUNCH_FAILURE);
      assert.equal(isConsoleError(error), true);
      assert.equal(isConsoleError(error, ErrorCode.E201_PROBE_LAUNCH_FAILURE), true);
      assert.equal(isConsoleError(error, ErrorCode.E202_EXTRACTION_TIMEOUT), false);
    });

    it('should reject plain errors and other values', () => {
      assert.equal(isConsoleError(new Error('x')), false);
      assert.equal(isConsoleError('E201'), false);
    });
  });

  it('describeError should handle non-Error values', () => {
    assert.equal(describeError(new Error('boom')), 'boom');
    assert.equal(describeError(42), '42');
  });
});
