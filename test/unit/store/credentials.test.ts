/**
 * Credential persistence and feed routing tests
 */

import { describe, it } from 'mocha';
import { strict as assert } from 'assert';
import { loadServiceCatalog, findCredential, type CredentialDefinition } from '../../../src/config/service-catalog';
import {
  PROVENANCE_KEY,
  credentialChanges,
  decodeProvenance,
  encodeProvenance,
  readCredential,
  readCredentials,
} from '../../../src/store/credentials';
import { buildFeedRouting, routingKeys } from '../../../src/store/feed-routing';
import { parseEnv, upsert } from '../../../src/store/env-file';

const catalog = loadServiceCatalog();

function definition(key: string): CredentialDefinition {
  const found = findCredential(catalog, key);
  if (!found) {
    throw new Error(`no credential ${key} in catalog`);
  }
  return found;
}

describe('Credentials', () => {
  describe('provenance record', () => {
    it('should encode sorted by key and decode back', () => {
      const encoded = encodeProvenance({ RADARBOX_KEY: 'extracted-from-probe', FR24KEY: 'entered-manually' });
      assert.equal(encoded, 'FR24KEY:entered-manually,RADARBOX_KEY:extracted-from-probe');
      assert.deepEqual(decodeProvenance(encoded), {
        FR24KEY: 'entered-manually',
        RADARBOX_KEY: 'extracted-from-probe',
      });
    });

    it('should ignore unknown provenance names', () => {
      assert.deepEqual(decodeProvenance('A:guessed,B:placeholder'), { B: 'placeholder' });
      assert.deepEqual(decodeProvenance(undefined), {});
    });
  });

  describe('readCredential', () => {
    it('should use the recorded provenance', () => {
      const snapshot = parseEnv(
        'RADARBOX_KEY=0123456789abcdef0123456789abcdef\n' +
          `${PROVENANCE_KEY}=RADARBOX_KEY:extracted-from-probe\n`
      );
      assert.deepEqual(readCredential(snapshot, definition('RADARBOX_KEY')), {
        key: 'RADARBOX_KEY',
        serviceId: 'radarbox',
        value: '0123456789abcdef0123456789abcdef',
        provenance: 'extracted-from-probe',
        validity: 'confirmed',
      });
    });

    it('should infer provenance for hand-edited files', () => {
      const snapshot = parseEnv(
        'FR24KEY=YOUR-FR24-KEY\nPIAWARE_FEEDER_ID=12345678-90ab-cdef-1234-567890abcdef\n' +
          'ADSBX_UUID=00000000-0000-4000-8000-000000000001\n'
      );
      const fr24 = readCredential(snapshot, definition('FR24KEY'));
      assert.equal(fr24.provenance, 'placeholder');
      assert.equal(fr24.validity, 'unverified');

      const piaware = readCredential(snapshot, definition('PIAWARE_FEEDER_ID'));
      assert.equal(piaware.provenance, 'entered-manually');
      assert.equal(piaware.validity, 'confirmed');

      assert.equal(readCredential(snapshot, definition('ADSBX_UUID')).provenance, 'generated-locally');
      assert.equal(readCredential(snapshot, definition('RADARBOX_SERIAL')).provenance, 'placeholder');
    });

    it('should read every catalog credential', () => {
      assert.deepEqual(
        readCredentials(parseEnv(''), catalog).map((c) => c.key),
        ['ADSBX_UUID', 'MULTIFEEDER_UUID', 'RADARBOX_KEY', 'RADARBOX_SERIAL', 'FR24KEY', 'PIAWARE_FEEDER_ID']
      );
    });
  });

  describe('credentialChanges', () => {
    it('should merge provenance with what is already recorded', () => {
      const snapshot = parseEnv(`${PROVENANCE_KEY}=ADSBX_UUID:generated-locally\n`);
      const changes = credentialChanges(snapshot, {
        FR24KEY: { value: '0123456789abcdef', provenance: 'extracted-from-probe' },
        RADARBOX_SERIAL: { value: '', provenance: 'placeholder' },
      });
      assert.deepEqual(changes, {
        FR24KEY: '0123456789abcdef',
        RADARBOX_SERIAL: '',
        [PROVENANCE_KEY]: 'ADSBX_UUID:generated-locally,FR24KEY:extracted-from-probe,RADARBOX_SERIAL:placeholder',
      });
    });

    it('should round-trip through the snapshot', () => {
      const snapshot = upsert(
        parseEnv(''),
        credentialChanges(parseEnv(''), { FR24KEY: { value: 'abc', provenance: 'entered-manually' } })
      );
      const credential = readCredential(snapshot, definition('FR24KEY'));
      assert.equal(credential.provenance, 'entered-manually');
      assert.equal(credential.validity, 'unverified');
    });
  });
});

describe('Feed routing', () => {
  it('should list the referenced keys', () => {
    assert.deepEqual(routingKeys(catalog.feedRouting), ['FR24KEY', 'ADSBX_UUID', 'MULTIFEEDER_UUID']);
  });

  it('should join complete routes with semicolons', () => {
    const expression = buildFeedRouting(catalog.feedRouting, {
      FR24KEY: '0123456789abcdef',
      ADSBX_UUID: 'aaaaaaaa-0000-4000-8000-000000000001',
      MULTIFEEDER_UUID: 'bbbbbbbb-0000-4000-8000-000000000002',
    });
    assert.equal(
      expression,
      'adsb,feed.flightradar24.com,30004,beast_reduce_plus_out,uuid=0123456789abcdef;' +
        'adsb,feed.adsbexchange.com,30004,beast_reduce_plus_out,uuid=aaaaaaaa-0000-4000-8000-000000000001;' +
        'mlat,in.adsb.lol,31090,uuid=bbbbbbbb-0000-4000-8000-000000000002'
    );
  });

  it('should drop routes with a missing credential and keep placeholders', () => {
    const expression = buildFeedRouting(catalog.feedRouting, {
      FR24KEY: 'YOUR-FR24-KEY',
      ADSBX_UUID: '',
      MULTIFEEDER_UUID: 'bbbbbbbb-0000-4000-8000-000000000002',
    });
    assert.equal(
      expression,
      'adsb,feed.flightradar24.com,30004,beast_reduce_plus_out,uuid=YOUR-FR24-KEY;' +
        'mlat,in.adsb.lol,31090,uuid=bbbbbbbb-0000-4000-8000-000000000002'
    );
  });
});
