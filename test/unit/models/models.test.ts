/**
 * Value grammar, feeder profile and credential model tests
 */

import { describe, it } from 'mocha';
import { strict as assert } from 'assert';
import { isValueGrammar, matchesGrammar } from '../../../src/models/value-grammar';
import {
  metersToFeet,
  parseAltitude,
  parseCoordinate,
  profileFromValues,
  profileToValues,
} from '../../../src/models/feeder-profile';
import { deriveValidity, isCredentialProvenance, normalizeManualValue } from '../../../src/models/credential';

describe('Value grammars', () => {
  it('should accept well-formed tokens', () => {
    assert.equal(matchesGrammar('0123456789abcdef0123456789abcdef', 'hex32'), true);
    assert.equal(matchesGrammar('0123456789abcdef', 'hex16'), true);
    assert.equal(matchesGrammar('EXTRPI000123', 'serial'), true);
    assert.equal(matchesGrammar('12345678-90ab-cdef-1234-567890abcdef', 'feeder-id'), true);
    assert.equal(matchesGrammar('00000000-0000-4000-8000-000000000001', 'uuid'), true);
  });

  it('should reject tokens of the wrong shape', () => {
    assert.equal(matchesGrammar('0123456789ABCDEF0123456789ABCDEF', 'hex32'), false);
    assert.equal(matchesGrammar('0123456789abcdef0', 'hex16'), false);
    assert.equal(matchesGrammar('EXT12', 'serial'), false);
    assert.equal(matchesGrammar('extrpi000123', 'serial'), false);
    assert.equal(matchesGrammar('abcdef-1234', 'feeder-id'), true);
    assert.equal(matchesGrammar('abcdef-123', 'feeder-id'), false);
    assert.equal(matchesGrammar('YOUR-FR24-KEY', 'hex16'), false);
  });

  it('should recognise grammar names', () => {
    assert.equal(isValueGrammar('hex32'), true);
    assert.equal(isValueGrammar('base64'), false);
    assert.equal(isValueGrammar(32), false);
  });
});

describe('Feeder profile', () => {
  it('should parse coordinates within range', () => {
    assert.deepEqual(parseCoordinate(' 40.6892 ', 'latitude'), { value: 40.6892 });
    assert.deepEqual(parseCoordinate('-74.0445', 'longitude'), { value: -74.0445 });
    assert.deepEqual(parseCoordinate('91', 'latitude'), { error: 'latitude must be between -90 and 90' });
    assert.deepEqual(parseCoordinate('180', 'longitude'), { value: 180 });
    assert.deepEqual(parseCoordinate('north', 'latitude'), {
      error: 'latitude must be a decimal number (e.g. 40.6892)',
    });
  });

  it('should default an empty altitude', () => {
    assert.deepEqual(parseAltitude(''), { value: 10 });
    assert.deepEqual(parseAltitude('152.5'), { value: 152.5 });
    assert.deepEqual(parseAltitude('high'), { error: 'altitude must be a number of meters (e.g. 10)' });
  });

  it('should convert meters to whole feet', () => {
    assert.equal(metersToFeet(10), 33);
    assert.equal(metersToFeet(100), 328);
  });

  it('should round-trip through stored values', () => {
    const profile = {
      latitude: 40.6892,
      longitude: -74.0445,
      altitudeM: 10,
      timezone: 'America/New_York',
      stationName: 'LibertyIsland',
    };
    const values = profileToValues(profile);
    assert.deepEqual(values, {
      FEEDER_TZ: 'America/New_York',
      FEEDER_LAT: '40.6892',
      FEEDER_LONG: '-74.0445',
      FEEDER_ALT_M: '10',
      FEEDER_NAME: 'LibertyIsland',
    });
    assert.deepEqual(profileFromValues(values), profile);
  });

  it('should be undefined without coordinates and default the rest', () => {
    assert.equal(profileFromValues({ FEEDER_LAT: '40.6892' }), undefined);
    assert.deepEqual(profileFromValues({ FEEDER_LAT: '1', FEEDER_LONG: '2' }), {
      latitude: 1,
      longitude: 2,
      altitudeM: 10,
      timezone: 'America/New_York',
      stationName: 'MyFeeder',
    });
  });
});

describe('Credential model', () => {
  it('should never confirm a placeholder', () => {
    assert.equal(deriveValidity('0123456789abcdef', 'placeholder', { grammar: 'hex16' }), 'unverified');
    assert.equal(deriveValidity('', 'extracted-from-probe'), 'unverified');
    assert.equal(
      deriveValidity('YOUR-FR24-KEY', 'entered-manually', { grammar: 'hex16', placeholder: 'YOUR-FR24-KEY' }),
      'unverified'
    );
  });

  it('should confirm only values that satisfy their grammar', () => {
    assert.equal(deriveValidity('0123456789abcdef', 'entered-manually', { grammar: 'hex16' }), 'confirmed');
    assert.equal(deriveValidity('0123456789abcdeg', 'extracted-from-probe', { grammar: 'hex16' }), 'unverified');
  });

  it('should leave grammar-less manual values unverified', () => {
    assert.equal(deriveValidity('anything', 'entered-manually'), 'unverified');
    assert.equal(deriveValidity('anything', 'generated-locally'), 'confirmed');
  });

  it('should recognise provenance names', () => {
    assert.equal(isCredentialProvenance('extracted-from-probe'), true);
    assert.equal(isCredentialProvenance('guessed'), false);
  });

  it('should normalise pasted values', () => {
    assert.equal(normalizeManualValue('  "0123456789abcdef" ', 'FR24KEY'), '0123456789abcdef');
    assert.equal(normalizeManualValue('FR24KEY=0123456789abcdef', 'FR24KEY'), '0123456789abcdef');
    assert.equal(normalizeManualValue('radarboxkey=abc def', 'RADARBOX_KEY'), 'abcdef');
  });
});
