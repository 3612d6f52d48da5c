/**
 * Credentials stored in the configuration.
 *
 * Provenance is kept in a single CREDENTIAL_PROVENANCE record
 * ("KEY:provenance,KEY:provenance"); validity is always derived.
 */

import type { CredentialDefinition, ServiceCatalog } from '../config/service-catalog';
import {
  deriveValidity,
  isCredentialProvenance,
  type Credential,
  type CredentialProvenance,
} from '../models/credential';
import { getValue, type ConfigSnapshot } from './env-file';

export const PROVENANCE_KEY = 'CREDENTIAL_PROVENANCE';

export function decodeProvenance(raw: string | undefined): Record<string, CredentialProvenance> {
  const result: Record<string, CredentialProvenance> = {};
  if (!raw) {
    return result;
  }
  for (const part of raw.split(',')) {
    const [key, provenance] = part.split(':');
    if (key && provenance && isCredentialProvenance(provenance)) {
      result[key.trim()] = provenance;
    }
  }
  return result;
}

export function encodeProvenance(provenance: Readonly<Record<string, CredentialProvenance>>): string {
  return Object.keys(provenance)
    .sort()
    .map((key) => `${key}:${provenance[key]}`)
    .join(',');
}

function inferProvenance(definition: CredentialDefinition, value: string): CredentialProvenance {
  if (value === '' || value === definition.placeholder) {
    return 'placeholder';
  }
  return definition.source === 'generated' ? 'generated-locally' : 'entered-manually';
}

export function readCredential(snapshot: ConfigSnapshot, definition: CredentialDefinition): Credential {
  const value = getValue(snapshot, definition.key) ?? '';
  const recorded = decodeProvenance(getValue(snapshot, PROVENANCE_KEY))[definition.key];
  const provenance = recorded ?? inferProvenance(definition, value);
  return {
    key: definition.key,
    serviceId: definition.service,
    value,
    provenance,
    validity: deriveValidity(value, provenance, {
      grammar: definition.grammar,
      placeholder: definition.placeholder,
    }),
  };
}

/**
 * Every catalog credential as currently stored
 */
export function readCredentials(snapshot: ConfigSnapshot, catalog: ServiceCatalog): Credential[] {
  return catalog.credentials.map((definition) => readCredential(snapshot, definition));
}

export interface CredentialUpdate {
  value: string;
  provenance: CredentialProvenance;
}

/**
 * Configuration changes for a set of credential updates, including the merged
 * provenance record
 */
export function credentialChanges(
  snapshot: ConfigSnapshot,
  updates: Readonly<Record<string, CredentialUpdate>>
): Record<string, string> {
  const provenance = decodeProvenance(getValue(snapshot, PROVENANCE_KEY));
  const changes: Record<string, string> = {};
  for (const [key, update] of Object.entries(updates)) {
    changes[key] = update.value;
    provenance[key] = update.provenance;
  }
  changes[PROVENANCE_KEY] = encodeProvenance(provenance);
  return changes;
}
