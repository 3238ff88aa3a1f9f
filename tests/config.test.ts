import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { defaultConfigPath, loadGameConfig, parseGameConfig } from '../src/config.js';
import type { GpsCoordinate } from '../src/parser.js';

function makeCoordinate(x: number, y: number, z: number): GpsCoordinate {
  return {
    name: 'probe',
    x,
    y,
    z,
    colour: '#FF75C9F1',
    notes: '',
    zone: null,
    duplicate: false,
    resources: null,
  };
}

const VALID = {
  clusterPrefix: 'Cluster',
  thresholds: {
    duplicateResourceMeters: 2000,
    duplicateClusterMeters: 500000,
    clusterAssignMeters: 500000,
  },
  zones: [
    { abbreviation: 'IN', header: 'Inner Zone', center: 'GPS:Inner - (R100km):0:0:0:#FFFFFF00:' },
    { abbreviation: 'OU', header: 'Outer Zone', center: 'GPS:Outer - (R1000km):0:0:0:#FFFFFF00:' },
  ],
  ores: [{ code: 'U', name: 'Uranium' }, { code: 'ICE' }],
};

describe('loadGameConfig (bundled)', () => {
  const config = loadGameConfig();

  it('finds the bundled configuration', () => {
    expect(path.basename(defaultConfigPath())).toBe('default.json');
  });

  it('loads the cluster prefix and thresholds', () => {
    expect(config.clusterPrefix).toBe('Cluster');
    expect(config.thresholds).toEqual({
      duplicateResourceMeters: 2000,
      duplicateClusterMeters: 500000,
      clusterAssignMeters: 500000,
    });
  });

  it('loads the ore order of precedence', () => {
    expect(config.ores.codes).toEqual(['U', 'PT', 'AU', 'AG', 'ICE', 'MG', 'CO', 'NI', 'SI', 'FE']);
  });

  it('lists planets before the space around them', () => {
    expect(config.zones.size).toBe(20);
    expect(config.zones.indexOf('ZP')).toBeLessThan(config.zones.indexOf('ZS'));
    expect(config.zones.indexOf('HB')).toBeLessThan(config.zones.indexOf('CB'));
  });

  it('classifies coordinates', () => {
    expect(config.zones.classify(makeCoordinate(1088776.01, 0, -2619759))).toBe('ZP');
    expect(config.zones.classify(makeCoordinate(1000, 0, 0))).toBe('HB');
    expect(config.zones.classify(makeCoordinate(2000000, 0, 0))).toBe('GZ');
  });
});

describe('parseGameConfig', () => {
  it('builds the zone table and ore vocabulary', () => {
    const config = parseGameConfig(VALID);
    expect(config.zones.size).toBe(2);
    expect(config.ores.priority('ice')).toBe(1);
  });

  it('lists schema issues by path', () => {
    expect(() => parseGameConfig({ ...VALID, ores: [{ code: 'fe' }] })).toThrow(
      'Invalid configuration:\n  ores.0.code: must be upper-case letters'
    );
  });

  it('rejects non-positive thresholds', () => {
    const data = { ...VALID, thresholds: { ...VALID.thresholds, clusterAssignMeters: 0 } };
    expect(() => parseGameConfig(data)).toThrow('thresholds.clusterAssignMeters');
  });

  it('rejects a zone table in the wrong order', () => {
    const data = { ...VALID, zones: [VALID.zones[1], VALID.zones[0]] };
    expect(() => parseGameConfig(data)).toThrow('Zone IN lies inside OU and must be listed before it');
  });

  it('rejects a zone center without a radius', () => {
    const data = {
      ...VALID,
      zones: [{ abbreviation: 'NO', header: 'No Radius', center: 'GPS:Nowhere:0:0:0:#FFFFFF00:' }],
    };
    expect(() => parseGameConfig(data)).toThrow('Unexpected zone GPS name: Nowhere');
  });
});

describe('loadGameConfig (files)', () => {
  let tempDir: string;

  beforeAll(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'gps-cluster-sort-config-'));
  });

  afterAll(() => {
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  it('loads a custom file', () => {
    const file = path.join(tempDir, 'custom.json');
    fs.writeFileSync(file, JSON.stringify({ ...VALID, clusterPrefix: 'Field' }));
    expect(loadGameConfig(file).clusterPrefix).toBe('Field');
  });

  it('reports a missing file', () => {
    const file = path.join(tempDir, 'missing.json');
    expect(() => loadGameConfig(file)).toThrow(`Cannot read config file ${file}`);
  });

  it('reports invalid JSON', () => {
    const file = path.join(tempDir, 'broken.json');
    fs.writeFileSync(file, '{ "clusterPrefix": ');
    expect(() => loadGameConfig(file)).toThrow(`Config file ${file} is not valid JSON`);
  });

  it('names the file in schema errors', () => {
    const file = path.join(tempDir, 'empty.json');
    fs.writeFileSync(file, '{}');
    expect(() => loadGameConfig(file)).toThrow(`Invalid config file ${file}:`);
  });
});
