/**
 * Credential model
 */

import { matchesGrammar, type ValueGrammar } from './value-grammar';

export type CredentialProvenance =
  | 'generated-locally'
  | 'extracted-from-probe'
  | 'entered-manually'
  | 'placeholder';

export type CredentialValidity = 'confirmed' | 'unverified';

export const CREDENTIAL_PROVENANCES: readonly CredentialProvenance[] = [
  'generated-locally',
  'extracted-from-probe',
  'entered-manually',
  'placeholder',
];

export interface Credential {
  /** Configuration key, e.g. RADARBOX_KEY */
  key: string;
  /** Managed service the credential belongs to */
  serviceId: string;
  value: string;
  provenance: CredentialProvenance;
  validity: CredentialValidity;
}

export function isCredentialProvenance(value: string): value is CredentialProvenance {
  return (CREDENTIAL_PROVENANCES as readonly string[]).includes(value);
}

/**
 * Derive validity.
 *
 * A placeholder (or empty value) is never confirmed. A value with a documented
 * grammar is confirmed only when it satisfies that grammar.
 */
export function deriveValidity(
  value: string,
  provenance: CredentialProvenance,
  options: { grammar?: ValueGrammar; placeholder?: string } = {}
): CredentialValidity {
  if (provenance === 'placeholder' || value === '') {
    return 'unverified';
  }
  if (options.placeholder !== undefined && value === options.placeholder) {
    return 'unverified';
  }
  if (options.grammar !== undefined) {
    return matchesGrammar(value, options.grammar) ? 'confirmed' : 'unverified';
  }
  return provenance === 'entered-manually' ? 'unverified' : 'confirmed';
}

/**
 * Normalize a manually entered value (surrounding quotes, key=value prefixes, whitespace)
 */
export function normalizeManualValue(input: string, key: string): string {
  let value = input.trim();
  const prefix = new RegExp(`^(${key}|${key.toLowerCase().replace(/_/g, '')})=`, 'i');
  value = value.replace(prefix, '');
  value = value.replace(/["']/g, '');
  return value.replace(/\s+/g, '');
}
