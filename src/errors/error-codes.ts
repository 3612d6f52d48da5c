/**
 * Error Codes for Feeder Console
 */

/**
 * Error Categories
 */
export enum ErrorCategory {
  CONFIGURATION = 'CONFIGURATION',
  DISCOVERY = 'DISCOVERY',
  RUNTIME = 'RUNTIME',
  CONSOLE = 'CONSOLE',
}

/**
 * Error Codes
 * E1xx: Configuration Errors - store, backups and derived artifacts
 * E2xx: Discovery Errors - probe processes and credential extraction
 * E3xx: Runtime Errors - external container runtime and source updates
 * E4xx: Console Errors - menu transitions and operator confirmations
 */
export enum ErrorCode {
  // E1xx: Configuration Errors
  E101_MALFORMED_CONFIGURATION = 'E101',
  E102_CONFIGURATION_WRITE_FAILURE = 'E102',
  E103_BACKUP_FAILURE = 'E103',
  E104_ARTIFACT_WRITE_FAILURE = 'E104',
  E105_SERVICE_CATALOG_INVALID = 'E105',

  // E2xx: Discovery Errors
  E201_PROBE_LAUNCH_FAILURE = 'E201',
  E202_EXTRACTION_TIMEOUT = 'E202',
  E203_PROBE_INTERRUPTED = 'E203',

  // E3xx: Runtime Errors
  E301_RUNTIME_OPERATION_FAILURE = 'E301',
  E302_UNKNOWN_SERVICE = 'E302',
  E303_SOURCE_UPDATE_FAILURE = 'E303',

  // E4xx: Console Errors
  E401_INVALID_TRANSITION = 'E401',
  E402_CONFIRMATION_REJECTED = 'E402',
}

/**
 * Error messages for each error code
 */
const ERROR_MESSAGES: Record<ErrorCode, string> = {
  E101: 'Configuration file is unreadable',
  E102: 'Failed to write configuration file',
  E103: 'Failed to create configuration backup',
  E104: 'Failed to write dashboard configuration',
  E105: 'Service catalog is invalid',

  E201: 'Probe process could not be started',
  E202: 'Credential not found in probe output within time budget',
  E203: 'Probe was interrupted',

  E301: 'Container runtime operation failed',
  E302: 'Unknown service name',
  E303: 'Source update failed',

  E401: 'Invalid menu transition',
  E402: 'Operation cancelled: confirmation not given',
};

/**
 * Remediation hints shown under the one-line status indicator
 */
const REMEDIATION_HINTS: Record<ErrorCode, string> = {
  E101: 'Choose "reconfigure" to rebuild it; the unreadable file is backed up first',
  E102: 'Check that the install directory is writable',
  E103: 'Check free disk space and permissions; nothing was changed',
  E104: 'Run "feeder-console regenerate" once the directory is writable',
  E105: 'Fix the YAML file or unset FEEDER_CONSOLE_CATALOG to use the bundled catalog',

  E201: 'Check that the container runtime is installed and running, then retry',
  E202: 'Enter the value manually or skip and add it to .env later',
  E203: 'Run the setup again to resume discovery',

  E301: 'Read the runtime message above; run the operation again once fixed',
  E302: 'Use one of the service names listed in the catalog',
  E303: 'Update manually with git, then run the console again',

  E401: 'Pick one of the numbered choices',
  E402: 'Type "yes" to confirm',
};

/**
 * Get the error category for an error code
 */
export function getErrorCategory(code: ErrorCode): ErrorCategory {
  const codeStr = code.toString();
  if (codeStr.startsWith('E1')) {
    return ErrorCategory.CONFIGURATION;
  }
  if (codeStr.startsWith('E2')) {
    return ErrorCategory.DISCOVERY;
  }
  if (codeStr.startsWith('E3')) {
    return ErrorCategory.RUNTIME;
  }
  if (codeStr.startsWith('E4')) {
    return ErrorCategory.CONSOLE;
  }
  throw new Error(`Unknown error code: ${code}`);
}

/**
 * Get the error message for an error code
 */
export function getErrorMessage(code: ErrorCode): string {
  return ERROR_MESSAGES[code] || `Unknown error: ${code}`;
}

/**
 * Get the remediation hint for an error code
 */
export function getRemediationHint(code: ErrorCode): string {
  return REMEDIATION_HINTS[code] || '';
}

/**
 * Failures that downgrade to an operator choice instead of aborting
 */
export function isRecoverable(code: ErrorCode): boolean {
  return code !== ErrorCode.E101_MALFORMED_CONFIGURATION;
}
