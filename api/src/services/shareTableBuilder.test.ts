import { describe, expect, it } from 'vitest';

import type { UnitFragment } from '../models/types.js';
import { buildShareTable, contributionOf } from './shareTableBuilder.js';

function fragment(
  unitId: string,
  zoneId: string,
  baseValue: number,
  categories: Record<string, string>,
  weight = 1
): UnitFragment {
  return { unitId, zoneId, weight, baseValue, categories, split: weight !== 1 };
}

const twoUnits = [fragment('A', 'Z', 60, { group: 'C' }), fragment('B', 'Z', 40, { group: 'C' })];

describe('buildShareTable', () => {
  it('computes magnitude shares within a stratum', () => {
    const { table, issues } = buildShareTable(twoUnits, { mode: 'magnitude', categoryFields: ['group'] });

    expect(issues).toEqual([]);
    expect(table.rows.map((row) => [row.unitId, row.share])).toEqual([
      ['A', 0.6],
      ['B', 0.4]
    ]);
    expect(table.strata).toEqual([
      {
        stratum: ['Z', 'C'],
        zoneId: 'Z',
        categories: { group: 'C' },
        total: 100,
        contributors: 2,
        empty: false,
        fromUnits: true
      }
    ]);
  });

  it('counts units instead of weighing them in count mode', () => {
    const { table } = buildShareTable(twoUnits, { mode: 'count', categoryFields: ['group'] });

    expect(table.rows.map((row) => row.share)).toEqual([0.5, 0.5]);
    expect(table.strata[0]?.total).toBe(2);
  });

  it('gives different shares in count and magnitude mode when values differ', () => {
    const counted = buildShareTable(twoUnits, { mode: 'count', categoryFields: ['group'] }).table;
    const weighed = buildShareTable(twoUnits, { mode: 'magnitude', categoryFields: ['group'] }).table;

    expect(counted.rows.map((row) => row.share)).not.toEqual(weighed.rows.map((row) => row.share));
  });

  it('counts a split unit by its membership weight', () => {
    const splitFragment = fragment('S', 'Z', 5, { group: 'C' }, 0.25);
    const fragments = [fragment('P', 'Z', 10, { group: 'C' }), splitFragment, fragment('S', 'Y', 15, { group: 'C' }, 0.75)];

    expect(contributionOf(splitFragment, 'count')).toBe(0.25);
    expect(contributionOf(splitFragment, 'magnitude')).toBe(5);

    const { table } = buildShareTable(fragments, { mode: 'count', categoryFields: ['group'] });
    expect(table.rows.map((row) => [row.unitId, row.zoneId, row.share])).toEqual([
      ['P', 'Z', 0.8],
      ['S', 'Z', 0.2],
      ['S', 'Y', 1]
    ]);
  });

  it('keeps separate strata per category tuple', () => {
    const fragments = [
      fragment('A', 'Z', 10, { sex: 'F' }),
      fragment('A', 'Z', 30, { sex: 'M' }),
      fragment('B', 'Z', 30, { sex: 'F' })
    ];

    const { table } = buildShareTable(fragments, { mode: 'magnitude', categoryFields: ['sex'] });

    expect(table.strata.map((stratum) => [stratum.stratum, stratum.total])).toEqual([
      [['Z', 'F'], 40],
      [['Z', 'M'], 30]
    ]);
    expect(table.rows.map((row) => row.share)).toEqual([0.25, 0.75, 1]);
  });

  it('flags a zero-total stratum as empty with zero shares', () => {
    const fragments = [fragment('A', 'Z', 0, { group: 'C' }), fragment('B', 'Z', 0, { group: 'C' })];

    const { table, issues } = buildShareTable(fragments, { mode: 'magnitude', categoryFields: ['group'] });

    expect(table.rows.map((row) => row.share)).toEqual([0, 0]);
    expect(table.strata[0]?.empty).toBe(true);
    expect(issues).toEqual([{ kind: 'empty-stratum', stratum: ['Z', 'C'] }]);
  });

  it('divides by a caller-supplied baseline total', () => {
    const { table } = buildShareTable(twoUnits, {
      mode: 'magnitude',
      categoryFields: ['group'],
      denominator: { kind: 'baseline', totals: [{ zoneId: 'Z', categories: { group: 'C' }, total: 200 }] }
    });

    expect(table.rows.map((row) => row.share)).toEqual([0.3, 0.2]);
    expect(table.strata[0]).toMatchObject({ total: 200, fromUnits: false });
  });

  it('excludes strata that have no baseline total', () => {
    const fragments = [...twoUnits, fragment('C', 'Y', 10, { group: 'C' })];

    const { table, issues } = buildShareTable(fragments, {
      mode: 'magnitude',
      categoryFields: ['group'],
      denominator: { kind: 'baseline', totals: [{ zoneId: 'Z', categories: { group: 'C' }, total: 100 }] }
    });

    expect(table.rows.map((row) => row.unitId)).toEqual(['A', 'B']);
    expect(issues).toEqual([{ kind: 'missing-baseline', stratum: ['Y', 'C'] }]);
  });
});
