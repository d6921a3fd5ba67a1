import { describe, it, expect } from 'vitest';
import { mkdtempSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { Gazetteer, defaultGazetteer } from '../../src/store/landmarks.js';
import { RecordStoreError } from '../../src/errors.js';

function writeTemp(contents: string): string {
  const dir = mkdtempSync(join(tmpdir(), 'landmarks-'));
  const path = join(dir, 'landmarks.json');
  writeFileSync(path, contents);
  return path;
}

describe('Gazetteer', () => {
  const gazetteer = new Gazetteer([
    { name: "Fisherman's Wharf", point: { lng: -122.4178, lat: 37.808 } },
    { name: 'Pier 39', point: { lng: -122.4098, lat: 37.8087 } },
  ]);

  it('resolves names ignoring case, spacing and punctuation', () => {
    expect(gazetteer.resolve('fishermans wharf')).toEqual({
      name: "Fisherman's Wharf",
      point: { lng: -122.4178, lat: 37.808 },
    });
    expect(gazetteer.resolve('PIER-39')?.name).toBe('Pier 39');
  });

  it('returns null for unknown names', () => {
    expect(gazetteer.resolve('Atlantis')).toBeNull();
  });

  it('reports its size', () => {
    expect(gazetteer.size).toBe(2);
  });
});

describe('Gazetteer.fromFile', () => {
  it('reads name to [lng, lat] entries', () => {
    const path = writeTemp('{"Coit Tower": [-122.4058, 37.8024]}');
    const gazetteer = Gazetteer.fromFile(path);
    expect(gazetteer.resolve('coit tower')?.point).toEqual({ lng: -122.4058, lat: 37.8024 });
  });

  it('rejects a file that is not a JSON object', () => {
    const path = writeTemp('[1, 2]');
    expect(() => Gazetteer.fromFile(path)).toThrow(RecordStoreError);
  });

  it('rejects malformed positions', () => {
    const path = writeTemp('{"Coit Tower": [-122.4058]}');
    expect(() => Gazetteer.fromFile(path)).toThrow('Landmark "Coit Tower" must be a [lng, lat] pair');
  });

  it('wraps read failures in RecordStoreError', () => {
    expect(() => Gazetteer.fromFile(join(tmpdir(), 'no-such-dir', 'landmarks.json'))).toThrow(RecordStoreError);
  });
});

describe('defaultGazetteer', () => {
  it('loads the bundled landmarks once', () => {
    const gazetteer = defaultGazetteer();
    expect(gazetteer.size).toBe(24);
    expect(gazetteer.resolve('union square')?.point).toEqual({ lng: -122.4074, lat: 37.7881 });
    expect(defaultGazetteer()).toBe(gazetteer);
  });
});
