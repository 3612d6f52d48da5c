/**
 * Setup Flow
 *
 * Shared by Fresh and Reconfigure:
 *   location -> "fed before?" -> local UUIDs -> per-service credentials
 *   -> persist + regenerate -> optional start with post-start detection
 *
 * Values already stored are offered as defaults. Every failure on the way is
 * turned into an operator choice; a credential can always fall back to manual
 * entry or its placeholder.
 */

import {
  credentialsForService,
  findCredential,
  findProbe,
  type CredentialDefinition,
  type ProbeDefinition,
  type ServiceDefinition,
} from '../config/service-catalog';
import { fillTemplate, probeTemplateValues, type DiscoveryResult } from '../discovery/credential-discovery';
import { scan } from '../discovery/pattern-extractor';
import { isConsoleError } from '../errors/console-error';
import { ErrorCode, getRemediationHint } from '../errors/error-codes';
import { normalizeManualValue } from '../models/credential';
import {
  DEFAULT_ALTITUDE_M,
  DEFAULT_STATION_NAME,
  DEFAULT_TIMEZONE,
  TIMEZONE_CHOICES,
  parseAltitude,
  parseCoordinate,
  profileFromValues,
  profileToValues,
  type FeederProfile,
} from '../models/feeder-profile';
import { matchesGrammar, VALUE_GRAMMARS } from '../models/value-grammar';
import { persistConfiguration } from '../store/config-commit';
import { credentialChanges, readCredential, type CredentialUpdate } from '../store/credentials';
import { emptySnapshot, getValue, snapshotValues, type ConfigSnapshot } from '../store/env-file';
import { sleep } from '../utils/timing';
import type { ConsoleServices } from './console-services';
import type { SessionContext } from './session-context';

export type SetupMode = 'fresh' | 'reconfigure';

type CredentialUpdates = Record<string, CredentialUpdate>;

/**
 * Receiver defaults written when the file does not have them yet
 */
const RECEIVER_DEFAULTS: Readonly<Record<string, string>> = {
  ADSB_SDR_SERIAL: '',
  ADSB_SDR_PPM: '0',
};

function placeholder(definition: CredentialDefinition): CredentialUpdate {
  return { value: definition.placeholder, provenance: 'placeholder' };
}

export class SetupFlow {
  constructor(private readonly services: ConsoleServices) {}

  async run(ctx: SessionContext, mode: SetupMode): Promise<SessionContext> {
    const { output, prompts, store } = this.services;
    const previous = store.load();

    output.heading(mode === 'fresh' ? 'New Feeder Setup' : 'Reconfigure Feeder');
    const profile = await this.location(previous ? snapshotValues(previous) : {});
    const returningOperator = await prompts.confirm('Have you set up ADS-B feeding before?');
    const session: SessionContext = { ...ctx, profile, returningOperator };

    const updates: CredentialUpdates = this.generatedCredentials(session, previous);
    for (const service of session.catalog.services) {
      const definitions = credentialsForService(session.catalog, service.name).filter(
        (definition) => definition.source === 'discovered'
      );
      if (definitions.length > 0) {
        Object.assign(updates, await this.credentialFlow(session, profile, service, definitions, previous));
      }
    }

    const base = previous ?? emptySnapshot();
    const receiverDefaults = Object.fromEntries(
      Object.entries(RECEIVER_DEFAULTS).filter(([key]) => getValue(base, key) === undefined)
    );
    const commit = persistConfiguration(
      { store, artifacts: this.services.artifacts, catalog: session.catalog },
      { ...profileToValues(profile), ...receiverDefaults, ...credentialChanges(base, updates) }
    );
    output.line();
    output.ok(`Configuration saved to ${store.envFile}`);
    output.ok(`Dashboard config ${commit.artifact.changed ? 'written' : 'unchanged'}: ${commit.artifact.path}`);
    this.summarize(session, commit.snapshot);

    const completed: SessionContext = { ...session, setupRuns: session.setupRuns + 1 };
    output.line();
    if (await prompts.confirm('Start all feeders now?', true)) {
      return this.startServices(completed);
    }
    output.line('Services not started. Use "Restart all services" from the management menu later.');
    return completed;
  }

  /**
   * Location and identity; an existing profile can be kept as a whole
   */
  async location(previous: Readonly<Record<string, string>>): Promise<FeederProfile> {
    const { output, prompts } = this.services;
    output.heading('Location');

    const existing = profileFromValues(previous);
    if (existing) {
      output.line('Found existing location:');
      output.line(`  Latitude:  ${existing.latitude}`);
      output.line(`  Longitude: ${existing.longitude}`);
      output.line(`  Altitude:  ${existing.altitudeM}m`);
      output.line(`  Timezone:  ${existing.timezone}`);
      output.line(`  Name:      ${existing.stationName}`);
      output.line();
      if (await prompts.confirm('Keep this location?', true)) {
        output.ok('Keeping existing location');
        return existing;
      }
    }

    const latitude = await prompts.askParsed(
      'Latitude (e.g. 40.6892)',
      (input) => parseCoordinate(input, 'latitude'),
      existing ? String(existing.latitude) : undefined
    );
    const longitude = await prompts.askParsed(
      'Longitude (e.g. -74.0445)',
      (input) => parseCoordinate(input, 'longitude'),
      existing ? String(existing.longitude) : undefined
    );
    const altitudeM = await prompts.askParsed(
      'Altitude in meters',
      parseAltitude,
      String(existing?.altitudeM ?? DEFAULT_ALTITUDE_M)
    );
    output.line();
    const timezone = await this.timezone(existing?.timezone);
    const stationName = await prompts.ask('Feeder name', existing?.stationName ?? DEFAULT_STATION_NAME);

    output.ok('Location configured');
    return { latitude, longitude, altitudeM, timezone, stationName };
  }

  private async timezone(current: string | undefined): Promise<string> {
    const options = [
      ...TIMEZONE_CHOICES.map((choice) => ({ value: choice.zone, label: `${choice.zone} (${choice.label})` })),
      { value: 'other', label: 'Other (enter manually)' },
    ];
    const listed = options.some((option) => option.value === current);
    const defaultValue = current === undefined ? DEFAULT_TIMEZONE : listed ? current : 'other';
    const choice = await this.services.prompts.choose('Select timezone:', options, defaultValue);
    if (choice !== 'other') {
      return choice;
    }
    return this.services.prompts.ask('Timezone (e.g. America/New_York)', current ?? DEFAULT_TIMEZONE);
  }

  /**
   * Locally generated identifiers; valid existing ones are kept
   */
  private generatedCredentials(ctx: SessionContext, previous: ConfigSnapshot | undefined): CredentialUpdates {
    const updates: CredentialUpdates = {};
    for (const definition of ctx.catalog.credentials.filter((c) => c.source === 'generated')) {
      const existing = previous ? readCredential(previous, definition) : undefined;
      if (existing?.validity === 'confirmed') {
        this.services.output.ok(`Keeping ${definition.label}`);
        continue;
      }
      updates[definition.key] = { value: this.services.generateId(), provenance: 'generated-locally' };
      this.services.output.ok(`Generated ${definition.label}`);
    }
    return updates;
  }

  private async credentialFlow(
    ctx: SessionContext,
    profile: FeederProfile,
    service: ServiceDefinition,
    definitions: CredentialDefinition[],
    previous: ConfigSnapshot | undefined
  ): Promise<CredentialUpdates> {
    const { output, prompts } = this.services;
    const primary = definitions.find((d) => d.dependsOn === undefined) ?? definitions[0];
    const dependents = definitions.filter((d) => d !== primary);
    output.heading(service.label);

    if (previous) {
      const existing = readCredential(previous, primary);
      if (existing.provenance !== 'placeholder' && existing.value !== '') {
        output.line(`Found existing ${primary.label}: ${existing.value}`);
        if (await prompts.confirm('Keep it?', true)) {
          output.ok(`Keeping existing ${primary.label}`);
          return {};
        }
      }
    }

    if (ctx.returningOperator && (await prompts.confirm(`Do you have an existing ${primary.label}?`))) {
      return this.manualEntry(primary, dependents);
    }

    const probe = findProbe(ctx.catalog, service.name);
    const options = [
      ...(probe
        ? [{
            value: 'discover' as const,
            label: probe.interactive
              ? 'Sign up interactively (recommended)'
              : 'Try auto-discovery (recommended, needs an SDR receiving aircraft)',
          }]
        : []),
      { value: 'manual' as const, label: `Enter ${primary.label} manually` },
      { value: 'skip' as const, label: 'Skip for now (add it to .env later)' },
    ];
    const choice = await prompts.choose(`${service.label} needs a ${primary.label}. Options:`, options, options[0].value);

    if (choice === 'discover' && probe) {
      return this.discover(ctx, profile, probe, primary, dependents);
    }
    if (choice === 'manual') {
      return this.manualEntry(primary, dependents);
    }
    return this.skip(primary, dependents);
  }

  private async discover(
    ctx: SessionContext,
    profile: FeederProfile,
    probe: ProbeDefinition,
    primary: CredentialDefinition,
    dependents: CredentialDefinition[]
  ): Promise<CredentialUpdates> {
    const { output, prompts, interrupts, discovery } = this.services;

    for (;;) {
      if (probe.instructions.length > 0) {
        const values = probeTemplateValues(profile);
        output.line("You'll be asked several questions. Answer them like this:");
        output.line();
        for (const instruction of probe.instructions) {
          output.line(`  ${fillTemplate(instruction, values)}`);
        }
        output.line();
        await prompts.pause();
      }
      output.line(`Running ${probe.name} probe (up to ${probe.budgetSeconds}s, Ctrl+C to cancel)...`);

      const signal = interrupts.begin();
      let result: DiscoveryResult;
      try {
        result = await discovery.discover(probe, profile, {
          signal,
          pollIntervalMs: ctx.config.pollIntervalMs,
          logDir: ctx.config.logDir,
        });
      } catch (error) {
        if (!isConsoleError(error, ErrorCode.E201_PROBE_LAUNCH_FAILURE)) {
          throw error;
        }
        output.fail(error);
        const next = await prompts.choose('What now?', [
          { value: 'retry', label: 'Retry' },
          { value: 'manual', label: 'Enter manually' },
          { value: 'skip', label: 'Skip for now' },
        ] as const, 'retry');
        if (next === 'retry') {
          continue;
        }
        return next === 'manual' ? this.manualEntry(primary, dependents) : this.skip(primary, dependents);
      } finally {
        interrupts.end();
      }
      return this.applyDiscovery(ctx, probe, primary, dependents, result);
    }
  }

  private async applyDiscovery(
    ctx: SessionContext,
    probe: ProbeDefinition,
    primary: CredentialDefinition,
    dependents: CredentialDefinition[],
    result: DiscoveryResult
  ): Promise<CredentialUpdates> {
    const { output, prompts } = this.services;
    const updates: CredentialUpdates = {};
    output.line();
    for (const definition of [primary, ...dependents]) {
      const value = result.values[definition.key];
      if (value !== undefined) {
        output.ok(`${definition.label}: ${value}`);
        updates[definition.key] = { value, provenance: 'extracted-from-probe' };
      }
    }
    if (result.logPath) {
      output.line(`  Full log: ${result.logPath}`);
    }

    if (updates[primary.key] !== undefined && probe.interactive) {
      if (!(await prompts.confirm('Is this correct?', true))) {
        return this.manualEntry(primary, dependents);
      }
    }

    if (updates[primary.key] === undefined) {
      if (result.outcome === 'interrupted') {
        output.warn('Discovery cancelled', getRemediationHint(ErrorCode.E203_PROBE_INTERRUPTED));
        const next = await prompts.choose('What now?', [
          { value: 'manual', label: 'Enter manually' },
          { value: 'skip', label: 'Skip for now' },
        ] as const, 'skip');
        return next === 'manual' ? this.manualEntry(primary, dependents) : this.skip(primary, dependents);
      }

      output.warn(
        result.outcome === 'exited'
          ? `Probe exited before printing a ${primary.label}`
          : `No ${primary.label} found within ${Math.round(result.elapsedMs / 1000)}s`,
        getRemediationHint(ErrorCode.E202_EXTRACTION_TIMEOUT)
      );
      const seconds = Math.round(ctx.config.manualEntryTimeoutMs / 1000);
      const typed = await prompts.askTimed(
        `Enter ${primary.label} manually (or wait ${seconds}s to skip)`,
        ctx.config.manualEntryTimeoutMs
      );
      if (typed === undefined) {
        return this.skip(primary, dependents);
      }
      updates[primary.key] = this.manualValue(primary, normalizeManualValue(typed, primary.key));
    }

    for (const dependent of dependents) {
      if (updates[dependent.key] === undefined) {
        updates[dependent.key] = placeholder(dependent);
        output.line(`  (${dependent.label} will be detected after the services start)`);
      }
    }
    return updates;
  }

  private async manualEntry(
    primary: CredentialDefinition,
    dependents: CredentialDefinition[]
  ): Promise<CredentialUpdates> {
    const { output, prompts } = this.services;
    const value = normalizeManualValue(await prompts.ask(`Enter your ${primary.label}`), primary.key);
    if (value === '') {
      output.warn('No value entered');
      return this.skip(primary, dependents);
    }

    const updates: CredentialUpdates = { [primary.key]: this.manualValue(primary, value) };
    for (const dependent of dependents) {
      let dependentValue = '';
      if (await prompts.confirm(`Do you also have your ${dependent.label}?`)) {
        dependentValue = normalizeManualValue(await prompts.ask(`Enter your ${dependent.label}`), dependent.key);
      }
      if (dependentValue === '') {
        updates[dependent.key] = placeholder(dependent);
        output.line(`  (${dependent.label} will be detected after the services start)`);
      } else {
        updates[dependent.key] = this.manualValue(dependent, dependentValue);
      }
    }
    return updates;
  }

  private manualValue(definition: CredentialDefinition, value: string): CredentialUpdate {
    if (matchesGrammar(value, definition.grammar)) {
      this.services.output.ok(`${definition.label} saved`);
    } else {
      this.services.output.warn(
        `"${value}" does not look like a ${definition.label}; saved as unverified`,
        `Expected ${VALUE_GRAMMARS[definition.grammar].description}`
      );
    }
    return { value, provenance: 'entered-manually' };
  }

  private skip(primary: CredentialDefinition, dependents: CredentialDefinition[]): CredentialUpdates {
    this.services.output.warn(
      `Skipping ${primary.label}. Add it to .env later.`,
      primary.helpUrl ? `Visit: ${primary.helpUrl}` : undefined
    );
    const updates: CredentialUpdates = { [primary.key]: placeholder(primary) };
    for (const dependent of dependents) {
      updates[dependent.key] = placeholder(dependent);
    }
    return updates;
  }

  private summarize(ctx: SessionContext, snapshot: ConfigSnapshot): void {
    const { output } = this.services;
    output.line();
    output.line('Credentials:');
    for (const definition of ctx.catalog.credentials) {
      const credential = readCredential(snapshot, definition);
      const symbol = credential.validity === 'confirmed' ? '✓' : '⚠';
      output.line(`  ${symbol} ${definition.label}: ${credential.value || '(not set)'} [${credential.provenance}]`);
    }
  }

  /**
   * Pull, start, show status, then look for credentials that only appear
   * once the service runs
   */
  async startServices(ctx: SessionContext): Promise<SessionContext> {
    const { output, lifecycle } = this.services;
    try {
      output.line('Pulling latest images...');
      await lifecycle.pullLatest('all');
      output.ok('Images pulled');
      await lifecycle.start('all');
      output.ok('Services started');

      await sleep(this.services.postStartDelayMs);
      output.line();
      output.line('Service status:');
      output.serviceStatus(await lifecycle.status());
      await this.detectDeferredCredentials(ctx);
      return ctx;
    } catch (error) {
      if (!isConsoleError(error)) {
        throw error;
      }
      output.fail(error);
      return { ...ctx, lastError: error.message };
    }
  }

  /**
   * Dependent targets (e.g. a serial issued after the key) still unresolved
   * are looked up in the running service's logs
   */
  async detectDeferredCredentials(ctx: SessionContext): Promise<void> {
    const { output, store, lifecycle } = this.services;
    for (const probe of ctx.catalog.probes) {
      for (const target of probe.targets) {
        const definition = findCredential(ctx.catalog, target.key);
        const prerequisite = probe.targets.find((t) => t.id === target.dependsOn);
        const prerequisiteDefinition = prerequisite ? findCredential(ctx.catalog, prerequisite.key) : undefined;
        if (!definition || !prerequisiteDefinition) {
          continue;
        }

        const snapshot = store.loadOrEmpty();
        if (readCredential(snapshot, definition).validity === 'confirmed') {
          continue;
        }
        if (readCredential(snapshot, prerequisiteDefinition).validity !== 'confirmed') {
          continue;
        }

        output.line(`Checking for ${definition.label}...`);
        const match = scan(await lifecycle.logs([probe.service], { tail: 500 }), target);
        if (!match) {
          output.warn(
            `${definition.label} not found yet (this is normal on first run)`,
            `Check later under Status & logs > Recent logs > ${probe.service}`
          );
          continue;
        }
        persistConfiguration(
          { store, artifacts: this.services.artifacts, catalog: ctx.catalog },
          credentialChanges(snapshot, { [target.key]: { value: match.value, provenance: 'extracted-from-probe' } })
        );
        output.ok(`Found ${definition.label}: ${match.value} (dashboard config updated)`);
      }
    }
  }
}
