/**
 * Service Catalog Loader
 * Loads and validates config/services.yaml
 *
 * The catalog lists the managed services, the credentials each one needs, the
 * probes that can discover those credentials, and the feed-routing expression
 * assembled from them.
 */

import * as fs from 'fs';
import * as path from 'path';
import * as yaml from 'js-yaml';
import { ConsoleError } from '../errors/console-error';
import { ErrorCode } from '../errors/error-codes';
import { isValueGrammar, type ValueGrammar } from '../models/value-grammar';

export interface ServiceDefinition {
  name: string;
  label: string;
  /** Service serves the derived dashboard artifact */
  readsArtifact: boolean;
}

export type CredentialSource = 'generated' | 'discovered';

export interface CredentialDefinition {
  key: string;
  label: string;
  service: string;
  source: CredentialSource;
  grammar: ValueGrammar;
  /** Value stored when the operator skips; '' means "detected later" */
  placeholder: string;
  helpUrl?: string;
  /** Credential only obtainable together with (after) another one */
  dependsOn?: string;
}

export interface ExtractionTarget {
  id: string;
  /** Configuration key the extracted value is stored under */
  key: string;
  anchor: string;
  grammar: ValueGrammar;
  /** Target id that must resolve first */
  dependsOn?: string;
}

export interface ProbeDefinition {
  name: string;
  service: string;
  budgetSeconds: number;
  command: string;
  args: string[];
  stopCommand?: string[];
  interactive: boolean;
  instructions: string[];
  targets: ExtractionTarget[];
}

export interface FeedRouting {
  key: string;
  routes: string[];
}

export interface ServiceCatalog {
  version: number;
  services: ServiceDefinition[];
  credentials: CredentialDefinition[];
  probes: ProbeDefinition[];
  feedRouting: FeedRouting;
  runtimeNoise: RegExp[];
  /** File the catalog was loaded from */
  sourcePath: string;
}

/**
 * Bundled catalog shipped next to the sources (src/ and dist/ alike)
 */
export const BUNDLED_CATALOG_PATH = path.join(__dirname, '..', '..', 'config', 'services.yaml');

type Raw = Record<string, unknown>;

function fail(where: string, problem: string): never {
  throw new ConsoleError(ErrorCode.E105_SERVICE_CATALOG_INVALID, `${where}: ${problem}`);
}

function asRecord(value: unknown, where: string): Raw {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) {
    fail(where, 'expected a mapping');
  }
  return Object.fromEntries(Object.entries(value));
}

function asList(value: unknown, where: string): unknown[] {
  if (!Array.isArray(value)) {
    fail(where, 'expected a list');
  }
  return value;
}

function requireString(raw: Raw, field: string, where: string): string {
  const value = raw[field];
  if (typeof value !== 'string' || value === '') {
    fail(where, `"${field}" must be a non-empty string`);
  }
  return value;
}

function optionalString(raw: Raw, field: string, where: string): string | undefined {
  const value = raw[field];
  if (value === undefined || value === null) {
    return undefined;
  }
  if (typeof value !== 'string') {
    fail(where, `"${field}" must be a string`);
  }
  return value;
}

function stringList(value: unknown, where: string): string[] {
  return asList(value, where).map((item, i) => {
    if (typeof item !== 'string') {
      fail(`${where}[${i}]`, 'expected a string');
    }
    return item;
  });
}

function requireGrammar(raw: Raw, where: string): ValueGrammar {
  const grammar = raw.grammar;
  if (!isValueGrammar(grammar)) {
    fail(where, `unknown grammar "${String(grammar)}"`);
  }
  return grammar;
}

function parseService(value: unknown, i: number): ServiceDefinition {
  const where = `services[${i}]`;
  const raw = asRecord(value, where);
  return {
    name: requireString(raw, 'name', where),
    label: optionalString(raw, 'label', where) ?? requireString(raw, 'name', where),
    readsArtifact: raw.readsArtifact === true,
  };
}

function parseCredential(value: unknown, i: number): CredentialDefinition {
  const where = `credentials[${i}]`;
  const raw = asRecord(value, where);
  const source = raw.source;
  if (source !== 'generated' && source !== 'discovered') {
    fail(where, '"source" must be "generated" or "discovered"');
  }
  return {
    key: requireString(raw, 'key', where),
    label: requireString(raw, 'label', where),
    service: requireString(raw, 'service', where),
    source,
    grammar: requireGrammar(raw, where),
    placeholder: optionalString(raw, 'placeholder', where) ?? '',
    helpUrl: optionalString(raw, 'helpUrl', where),
    dependsOn: optionalString(raw, 'dependsOn', where),
  };
}

function parseTarget(value: unknown, where: string): ExtractionTarget {
  const raw = asRecord(value, where);
  return {
    id: requireString(raw, 'id', where),
    key: requireString(raw, 'key', where),
    anchor: requireString(raw, 'anchor', where),
    grammar: requireGrammar(raw, where),
    dependsOn: optionalString(raw, 'dependsOn', where),
  };
}

function parseProbe(value: unknown, i: number): ProbeDefinition {
  const where = `probes[${i}]`;
  const raw = asRecord(value, where);
  const budget = raw.budgetSeconds;
  if (typeof budget !== 'number' || !(budget > 0)) {
    fail(where, '"budgetSeconds" must be a positive number');
  }
  const targets = asList(raw.targets, `${where}.targets`).map((t, j) =>
    parseTarget(t, `${where}.targets[${j}]`)
  );
  if (targets.length === 0) {
    fail(where, 'at least one target is required');
  }

  // Dependencies must point backwards so targets resolve in declared order
  const seen = new Set<string>();
  for (const target of targets) {
    if (target.dependsOn !== undefined && !seen.has(target.dependsOn)) {
      fail(where, `target "${target.id}" depends on "${target.dependsOn}", which is not declared before it`);
    }
    seen.add(target.id);
  }

  return {
    name: requireString(raw, 'name', where),
    service: requireString(raw, 'service', where),
    budgetSeconds: budget,
    command: requireString(raw, 'command', where),
    args: raw.args === undefined ? [] : stringList(raw.args, `${where}.args`),
    stopCommand: raw.stopCommand === undefined ? undefined : stringList(raw.stopCommand, `${where}.stopCommand`),
    interactive: raw.interactive === true,
    instructions: raw.instructions === undefined ? [] : stringList(raw.instructions, `${where}.instructions`),
    targets,
  };
}

/**
 * Validate a parsed YAML document
 */
export function parseServiceCatalog(document: unknown, sourcePath: string): ServiceCatalog {
  const root = asRecord(document, 'catalog');
  const version = root.version;
  if (typeof version !== 'number') {
    fail('catalog', '"version" must be a number');
  }

  const services = asList(root.services, 'services').map(parseService);
  const credentials = asList(root.credentials, 'credentials').map(parseCredential);
  const probes = asList(root.probes, 'probes').map(parseProbe);
  const routingRaw = asRecord(root.feedRouting, 'feedRouting');
  const feedRouting: FeedRouting = {
    key: requireString(routingRaw, 'key', 'feedRouting'),
    routes: stringList(routingRaw.routes, 'feedRouting.routes'),
  };
  const runtimeNoise = root.runtimeNoise === undefined
    ? []
    : stringList(root.runtimeNoise, 'runtimeNoise').map((pattern) => new RegExp(pattern, 'i'));

  const serviceNames = new Set(services.map((s) => s.name));
  for (const credential of credentials) {
    if (!serviceNames.has(credential.service)) {
      fail(`credential ${credential.key}`, `unknown service "${credential.service}"`);
    }
  }
  for (const probe of probes) {
    if (!serviceNames.has(probe.service)) {
      fail(`probe ${probe.name}`, `unknown service "${probe.service}"`);
    }
  }

  return { version, services, credentials, probes, feedRouting, runtimeNoise, sourcePath };
}

/**
 * Load the service catalog from YAML
 */
export function loadServiceCatalog(catalogPath: string = BUNDLED_CATALOG_PATH): ServiceCatalog {
  let content: string;
  try {
    content = fs.readFileSync(catalogPath, 'utf-8');
  } catch (error) {
    throw new ConsoleError(
      ErrorCode.E105_SERVICE_CATALOG_INVALID,
      `cannot read ${catalogPath}: ${error instanceof Error ? error.message : String(error)}`
    );
  }

  let document: unknown;
  try {
    document = yaml.load(content);
  } catch (error) {
    throw new ConsoleError(
      ErrorCode.E105_SERVICE_CATALOG_INVALID,
      `${catalogPath}: ${error instanceof Error ? error.message : String(error)}`
    );
  }
  return parseServiceCatalog(document, catalogPath);
}

export function findService(catalog: ServiceCatalog, name: string): ServiceDefinition | undefined {
  return catalog.services.find((s) => s.name === name);
}

export function findCredential(catalog: ServiceCatalog, key: string): CredentialDefinition | undefined {
  return catalog.credentials.find((c) => c.key === key);
}

export function findProbe(catalog: ServiceCatalog, service: string): ProbeDefinition | undefined {
  return catalog.probes.find((p) => p.service === service);
}

/**
 * Credentials obtained per service, in catalog order
 */
export function credentialsForService(catalog: ServiceCatalog, service: string): CredentialDefinition[] {
  return catalog.credentials.filter((c) => c.service === service);
}
