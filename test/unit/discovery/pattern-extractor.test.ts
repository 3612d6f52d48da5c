/**
 * Pattern extractor tests
 */

import { describe, it } from 'mocha';
import { strict as assert } from 'assert';
import { PatternScanner, matchLine, scan, type ScanTarget } from '../../../src/discovery/pattern-extractor';
import { readFixture } from '../../helpers/fake-probe-launcher';

const KEY: ScanTarget = { anchor: 'Your new key is', grammar: 'hex32' };
const SERIAL: ScanTarget = { anchor: 'station serial number:', grammar: 'serial' };
const FR24: ScanTarget = { anchor: 'Your sharing key', grammar: 'hex16' };
const PIAWARE: ScanTarget = { anchor: 'my feeder ID is', grammar: 'feeder-id' };

describe('Pattern extractor', () => {
  describe('matchLine', () => {
    it('should take the token right after the anchor, without trailing punctuation', () => {
      assert.equal(
        matchLine('Your new key is 0123456789abcdef0123456789abcdef. Please save it.', KEY),
        '0123456789abcdef0123456789abcdef'
      );
    });

    it('should match the anchor case-insensitively', () => {
      assert.equal(matchLine('YOUR NEW KEY IS 0123456789abcdef0123456789abcdef', KEY), '0123456789abcdef0123456789abcdef');
    });

    it('should strip wrapping parentheses and quotes', () => {
      assert.equal(matchLine('+ Your sharing key (0123456789abcdef) has been configured', FR24), '0123456789abcdef');
      assert.equal(matchLine("Your sharing key: '0123456789abcdef'", FR24), '0123456789abcdef');
    });

    it('should skip a token that does not satisfy the grammar', () => {
      assert.equal(matchLine('Your new key is pending', KEY), undefined);
      assert.equal(matchLine('enter your sharing key.', FR24), undefined);
      assert.equal(matchLine('Your new key is 0123456789abcdef0123456789abcdef0', KEY), undefined);
    });

    it('should fall back to an earlier occurrence on the same line', () => {
      assert.equal(
        matchLine('Your sharing key (0123456789abcdef) replaces Your sharing key (none)', FR24),
        '0123456789abcdef'
      );
    });

    it('should prefer the last valid occurrence on a line', () => {
      assert.equal(
        matchLine('Your sharing key 1111111111111111, Your sharing key 2222222222222222', FR24),
        '2222222222222222'
      );
    });
  });

  describe('scan', () => {
    it('should find the values in recorded probe output', () => {
      const radarbox = readFixture('probe-logs/radarbox.log').split('\n');
      assert.deepEqual(scan(radarbox, KEY), { value: '0123456789abcdef0123456789abcdef', lineIndex: 3 });
      assert.deepEqual(scan(readFixture('probe-logs/flightradar24.log').split('\n'), FR24), {
        value: '0123456789abcdef',
        lineIndex: 7,
      });
      assert.deepEqual(scan(readFixture('probe-logs/piaware.log').split('\n'), PIAWARE), {
        value: '12345678-90ab-cdef-1234-567890abcdef',
        lineIndex: 5,
      });
    });

    it('should let the last occurrence win', () => {
      const radarbox = readFixture('probe-logs/radarbox.log').split('\n');
      assert.deepEqual(scan(radarbox, SERIAL), { value: 'EXTRPI000123', lineIndex: 5 });
    });

    it('should ignore lines before the start line', () => {
      const lines = ['station serial number: EXTRPI999999', 'nothing here'];
      assert.equal(scan(lines, SERIAL, 1), undefined);
      assert.deepEqual(scan(lines, SERIAL, 0), { value: 'EXTRPI999999', lineIndex: 0 });
    });

    it('should find nothing in output cut off before the key', () => {
      const text = readFixture('probe-logs/radarbox.log');
      const anchorEnd = text.indexOf('Your new key is ') + 'Your new key is '.length;
      assert.equal(scan(text.slice(0, anchorEnd).split('\n'), KEY), undefined);
      assert.equal(scan(text.slice(0, anchorEnd + 16).split('\n'), KEY), undefined);
    });

    it('should return undefined when nothing matches', () => {
      assert.equal(scan([], KEY), undefined);
      assert.equal(scan(['Connecting...'], KEY), undefined);
    });
  });

  describe('PatternScanner', () => {
    it('should examine only new lines on each feed', () => {
      const scanner = new PatternScanner(KEY);
      const lines = ['starting'];
      assert.equal(scanner.feed(lines), undefined);
      assert.equal(scanner.getScannedCount(), 1);

      lines.push('Your new key is 0123456789abcdef0123456789abcdef');
      assert.deepEqual(scanner.feed(lines), { value: '0123456789abcdef0123456789abcdef', lineIndex: 1 });
      assert.equal(scanner.getScannedCount(), 2);
      assert.deepEqual(scanner.getMatch(), { value: '0123456789abcdef0123456789abcdef', lineIndex: 1 });
    });

    it('should start at the given line', () => {
      const scanner = new PatternScanner(SERIAL, 2);
      const lines = ['station serial number: EXTRPI999999', 'x', 'y'];
      assert.equal(scanner.feed(lines), undefined);
      lines.push('station serial number: EXTRPI000123');
      assert.deepEqual(scanner.feed(lines), { value: 'EXTRPI000123', lineIndex: 3 });
    });
  });
});
