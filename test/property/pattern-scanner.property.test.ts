/**
 * Property-based tests for incremental extraction
 *
 * Feeding a growing line list in arbitrary increments finds exactly what a
 * single scan over the final list finds.
 */

import { describe, it } from 'mocha';
import * as fc from 'fast-check';
import { PatternScanner, scan, type ScanTarget } from '../../src/discovery/pattern-extractor';

const MIN_RUNS = 100;

const TARGET: ScanTarget = { anchor: 'Your new key is', grammar: 'hex32' };

const probeLine = fc.oneof(
  fc.constant('[rbfeeder] Your new key is 0123456789abcdef0123456789abcdef. Please save it.'),
  fc.constant('[rbfeeder] Your new key is fedcba9876543210fedcba9876543210'),
  fc.constant('[rbfeeder] Your new key is pending'),
  fc.constant('your new key is (aaaaaaaaaaaaaaaaaaaaaaaaaaaaaaaa)'),
  fc.string()
);

describe('PatternScanner (Property-based)', () => {
  it('should match a batch scan whatever the feed increments', () => {
    fc.assert(
      fc.property(
        fc.array(probeLine, { maxLength: 30 }),
        fc.array(fc.nat(), { maxLength: 10 }),
        fc.nat(),
        (lines, cuts, start) => {
          const startLine = lines.length === 0 ? 0 : start % lines.length;
          const scanner = new PatternScanner(TARGET, startLine);
          const prefixes = cuts.map((cut) => cut % (lines.length + 1)).sort((a, b) => a - b);
          for (const length of prefixes) {
            scanner.feed(lines.slice(0, length));
          }
          const incremental = scanner.feed(lines);
          const batch = scan(lines, TARGET, startLine);
          return JSON.stringify(incremental) === JSON.stringify(batch);
        }
      ),
      { numRuns: MIN_RUNS }
    );
  });
});
