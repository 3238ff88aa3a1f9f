import { describe, it, expect } from 'vitest';
import {
  OreVocabulary,
  formatLabel,
  leadingOrePriority,
  makeNamesUnique,
  normalizeLabel,
  normalizeResourceLabels,
  parseOreList,
  type LabelVocabulary,
} from '../src/labels.js';
import { createScriptedOracle } from '../src/oracle.js';
import type { GpsCoordinate } from '../src/parser.js';
import { ZoneTable } from '../src/zones.js';

const ORES = new OreVocabulary([
  { code: 'U', name: 'Uranium' },
  { code: 'PT', name: 'Platinum' },
  { code: 'ICE' },
  { code: 'FE', name: 'Iron' },
]);

const ZONES = ZoneTable.fromDefinitions([
  { abbreviation: 'ZA', header: 'Zone A', center: 'GPS:Zone A - (R100km):0:0:0:#FFFFFF00:' },
]);

const VOCAB: LabelVocabulary = { ores: ORES, zones: ZONES };
const UNZONED: LabelVocabulary = { ores: ORES, zones: null };

function makeResource(name: string, zone: string | null = 'ZA'): GpsCoordinate {
  return {
    name,
    x: 0,
    y: 0,
    z: 0,
    colour: '#FF75C9F1',
    notes: '',
    zone,
    duplicate: false,
    resources: null,
  };
}

describe('OreVocabulary', () => {
  it('orders codes by priority', () => {
    expect(ORES.codes).toEqual(['U', 'PT', 'ICE', 'FE']);
    expect(ORES.priority('fe')).toBe(3);
    expect(ORES.priority('XX')).toBe(Infinity);
    expect(ORES.has('ice')).toBe(true);
  });

  it('rejects lower-case and duplicate codes', () => {
    expect(() => new OreVocabulary([{ code: 'fe' }])).toThrow('Ore code must be upper-case letters: fe');
    expect(() => new OreVocabulary([{ code: 'FE' }, { code: 'FE' }])).toThrow('Duplicate ore code: FE');
  });
});

describe('parseOreList', () => {
  it('splits entries on commas and keeps sizes', () => {
    expect(parseOreList('fe big, u small,ice')).toEqual([
      { code: 'FE', size: 'big' },
      { code: 'U', size: 'small' },
      { code: 'ICE', size: null },
    ]);
  });

  it('reads codes without sizes', () => {
    expect(parseOreList('fe, u')).toEqual([
      { code: 'FE', size: null },
      { code: 'U', size: null },
    ]);
  });

  it('drops a uniqueness suffix from sizes', () => {
    expect(parseOreList('fe a_1, u')).toEqual([
      { code: 'FE', size: 'a' },
      { code: 'U', size: null },
    ]);
    expect(parseOreList('fe _7')).toEqual([{ code: 'FE', size: null }]);
  });

  it('finds nothing in text without letters', () => {
    expect(parseOreList('123')).toEqual([]);
  });
});

describe('formatLabel', () => {
  it('joins entries with a spaced comma', () => {
    expect(formatLabel('ZA', [{ code: 'U', size: 'small' }, { code: 'ICE', size: null }])).toBe(
      'ZA U small , ICE'
    );
  });
});

describe('normalizeLabel', () => {
  it('upper-cases ore codes', () => {
    expect(normalizeLabel('ZA fe large', 'ZA', VOCAB)).toEqual({ ok: true, label: 'ZA FE large' });
  });

  it('gives the same label when normalized twice', () => {
    const cases: Array<[string, string | null, string]> = [
      ['ZA fe a_1, u', 'ZA', 'ZA U , FE a'],
      ['ZA pt x_12 , fe a_3', 'ZA', 'ZA PT x , FE a'],
      ['ZA fe a_1 b, u', 'ZA', 'ZA U , FE a_1 b'],
      ['ZA fe big, u small, ice', 'ZA', 'ZA U small , ICE , FE big'],
      ['ZA FE large _2', 'ZA', 'ZA FE large'],
      ['fe large', 'ZA', 'ZA FE large'],
      ['za u_2', 'ZA', 'za U'],
    ];

    for (const [label, zone, expected] of cases) {
      const once = normalizeLabel(label, zone, VOCAB);
      expect(once).toEqual({ ok: true, label: expected });
      expect(normalizeLabel(expected, zone, VOCAB)).toEqual(once);
    }
  });

  it('sorts entries by ore priority', () => {
    expect(normalizeLabel('ZA fe big, u small, ice', 'ZA', VOCAB)).toEqual({
      ok: true,
      label: 'ZA U small , ICE , FE big',
    });
  });

  it('keeps entries of the same ore in order', () => {
    expect(normalizeLabel('ZA fe a, fe b', 'ZA', VOCAB)).toEqual({ ok: true, label: 'ZA FE a , FE b' });
  });

  it('drops a uniqueness suffix', () => {
    expect(normalizeLabel('ZA FE large _2', 'ZA', VOCAB)).toEqual({ ok: true, label: 'ZA FE large' });
    expect(normalizeLabel('ZA fe_3', 'ZA', VOCAB)).toEqual({ ok: true, label: 'ZA FE' });
  });

  it('keeps the zone token as written', () => {
    expect(normalizeLabel('za fe', 'ZA', VOCAB)).toEqual({ ok: true, label: 'za FE' });
  });

  it('fills in the zone when the label starts with an ore', () => {
    expect(normalizeLabel('fe large', 'ZA', VOCAB)).toEqual({ ok: true, label: 'ZA FE large' });
  });

  it('needs a zone when the label starts with an ore', () => {
    expect(normalizeLabel('fe large', null, UNZONED)).toEqual({
      ok: false,
      reason: 'Missing zone token: fe large',
    });
  });

  it('rejects a single word', () => {
    expect(normalizeLabel('FE', 'ZA', VOCAB)).toEqual({
      ok: false,
      reason: 'Label needs a zone and at least one ore: FE',
    });
  });

  it('rejects unknown zones', () => {
    expect(normalizeLabel('qq fe', 'ZA', VOCAB)).toEqual({ ok: false, reason: 'Invalid zone: QQ' });
  });

  it('accepts any zone token when zoning is off', () => {
    expect(normalizeLabel('Anywhere fe', null, UNZONED)).toEqual({ ok: true, label: 'Anywhere FE' });
  });

  it('rejects unknown ores', () => {
    expect(normalizeLabel('ZA xx big, fe', 'ZA', VOCAB)).toEqual({ ok: false, reason: 'Invalid ore: XX' });
  });

  it('rejects labels without ores', () => {
    expect(normalizeLabel('ZA 123', 'ZA', VOCAB)).toEqual({ ok: false, reason: 'No ores in label: ZA 123' });
  });
});

describe('normalizeResourceLabels', () => {
  it('rewrites names in place', async () => {
    const resources = [makeResource('ZA fe large'), makeResource('ZA u, pt')];
    const replaced = await normalizeResourceLabels(resources, VOCAB, createScriptedOracle());

    expect(replaced).toBe(0);
    expect(resources.map(r => r.name)).toEqual(['ZA FE large', 'ZA U , PT']);
  });

  it('asks for replacements until the label normalizes', async () => {
    const resource = makeResource('ZA xx');
    const oracle = createScriptedOracle({ labels: ['still bad', 'ZA fe'] });
    const warnings: string[] = [];

    const replaced = await normalizeResourceLabels([resource], VOCAB, oracle, message => {
      warnings.push(message);
    });

    expect(replaced).toBe(2);
    expect(resource.name).toBe('ZA FE');
    expect(oracle.labelRequests).toEqual(['ZA xx', 'still bad']);
    expect(warnings).toEqual([
      'Invalid ore: XX',
      'Invalid name: ZA xx',
      'Invalid zone: STILL',
      'Invalid name: still bad',
    ]);
  });
});

describe('makeNamesUnique', () => {
  it('suffixes repeats counting from 2', () => {
    const resources = ['ZA FE', 'ZA U', 'ZA FE', 'ZA FE'].map(name => makeResource(name));
    makeNamesUnique(resources);
    expect(resources.map(r => r.name)).toEqual(['ZA FE', 'ZA U', 'ZA FE _2', 'ZA FE _3']);
  });
});

describe('leadingOrePriority', () => {
  it('ranks by the first ore after the zone', () => {
    expect(leadingOrePriority('ZA FE large , ICE', ORES)).toBe(3);
    expect(leadingOrePriority('ZA U', ORES)).toBe(0);
  });

  it('ranks labels without a known ore last', () => {
    expect(leadingOrePriority('ZA', ORES)).toBe(Infinity);
    expect(leadingOrePriority('ZA XX', ORES)).toBe(Infinity);
  });
});
