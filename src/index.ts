/**
 * feeder-console library entry
 */

export * from './errors/error-codes';
export * from './errors/console-error';
export * from './logging';
export * from './models/value-grammar';
export * from './models/feeder-profile';
export * from './models/credential';
export * from './config/service-catalog';
export * from './config/console-config';
export * from './supervisor/output-buffer';
export * from './supervisor/probe-registry';
export * from './supervisor/probe-log-sink';
export * from './supervisor/process-supervisor';
export * from './discovery/pattern-extractor';
export * from './discovery/credential-discovery';
export * from './store/env-file';
export * from './store/configuration-store';
export * from './store/credentials';
export * from './store/feed-routing';
export * from './store/config-commit';
export * from './artifacts/dashboard-artifact';
export * from './runtime/command-runner';
export * from './runtime/lifecycle-controller';
export * from './runtime/source-updater';
export * from './console/console-output';
export * from './console/prompter';
export * from './console/session-context';
export * from './console/transitions';
export * from './console/interrupt-controller';
export * from './console/console-services';
export * from './console/setup-flow';
export * from './console/console-state-machine';
