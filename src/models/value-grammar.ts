/**
 * Value Grammars
 *
 * Each grammar describes the exact shape of one credential token as it appears
 * in probe output and in the configuration file.
 */

export type ValueGrammar = 'hex32' | 'hex16' | 'serial' | 'feeder-id' | 'uuid';

export interface GrammarDefinition {
  /** Whole-token pattern (anchored) */
  pattern: RegExp;
  /** Human-readable shape, used in prompts and hints */
  description: string;
}

export const VALUE_GRAMMARS: Readonly<Record<ValueGrammar, GrammarDefinition>> = {
  hex32: {
    pattern: /^[a-f0-9]{32}$/,
    description: '32 lowercase hexadecimal characters',
  },
  hex16: {
    pattern: /^[a-f0-9]{16}$/,
    description: '16 lowercase hexadecimal characters',
  },
  serial: {
    pattern: /^[A-Z0-9]{6,32}$/,
    description: 'uppercase alphanumeric serial (e.g. EXTRPI000123)',
  },
  'feeder-id': {
    pattern: /^[a-f0-9-]{11,}$/,
    description: 'hexadecimal feeder ID with dashes',
  },
  uuid: {
    pattern: /^[a-f0-9]{8}-[a-f0-9]{4}-[a-f0-9]{4}-[a-f0-9]{4}-[a-f0-9]{12}$/,
    description: 'UUID (8-4-4-4-12 hexadecimal)',
  },
};

const GRAMMAR_NAMES = Object.keys(VALUE_GRAMMARS);

export function isValueGrammar(name: unknown): name is ValueGrammar {
  return typeof name === 'string' && GRAMMAR_NAMES.includes(name);
}

/**
 * Check a complete token against a grammar
 */
export function matchesGrammar(value: string, grammar: ValueGrammar): boolean {
  return VALUE_GRAMMARS[grammar].pattern.test(value);
}
