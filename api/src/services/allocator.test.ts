import { describe, expect, it } from 'vitest';

import { IntegrityError } from '../models/errors.js';
import type { ShareTable, UnitFragment } from '../models/types.js';
import { allocate, BASE_AXIS } from './allocator.js';
import { buildShareTable } from './shareTableBuilder.js';

function fragment(unitId: string, zoneId: string, baseValue: number, group = 'C'): UnitFragment {
  return { unitId, zoneId, weight: 1, baseValue, categories: { group }, split: false };
}

function shareTable(fragments: UnitFragment[]): ShareTable {
  return buildShareTable(fragments, { mode: 'magnitude', categoryFields: ['group'] }).table;
}

describe('allocate', () => {
  it('distributes a target total by share', () => {
    const table = shareTable([fragment('A', 'Z', 60), fragment('B', 'Z', 40)]);

    const allocation = allocate(table, [{ zoneId: 'Z', categories: { group: 'C' }, axis: 2030, total: 500 }]);

    expect(allocation.rows.map((row) => [row.unitId, row.axis, row.allocatedValue])).toEqual([
      ['A', 2030, 300],
      ['B', 2030, 200]
    ]);
    expect(allocation.expected).toEqual([{ stratum: ['Z', 'C'], categories: { group: 'C' }, axis: 2030, total: 500 }]);
    expect(allocation.issues).toEqual([]);
  });

  it('allocates every axis value independently', () => {
    const table = shareTable([fragment('A', 'Z', 75), fragment('B', 'Z', 25)]);

    const allocation = allocate(table, [
      { zoneId: 'Z', categories: { group: 'C' }, axis: 2030, total: 400 },
      { zoneId: 'Z', categories: { group: 'C' }, axis: 2035, total: 800 }
    ]);

    expect(allocation.rows.map((row) => [row.unitId, row.axis, row.allocatedValue])).toEqual([
      ['A', 2030, 300],
      ['B', 2030, 100],
      ['A', 2035, 600],
      ['B', 2035, 200]
    ]);
  });

  it('skips and reports strata without a target total', () => {
    const table = shareTable([fragment('A', 'Z', 10), fragment('B', 'Y', 10)]);

    const allocation = allocate(table, [{ zoneId: 'Z', categories: { group: 'C' }, axis: 2030, total: 50 }]);

    expect(allocation.rows.map((row) => row.unitId)).toEqual(['A']);
    expect(allocation.issues).toEqual([{ kind: 'missing-target', stratum: ['Y', 'C'], axis: 2030 }]);
  });

  it('reports every stratum when the target list is empty', () => {
    const table = shareTable([fragment('A', 'Z', 10), fragment('B', 'Y', 10)]);

    const allocation = allocate(table, []);

    expect(allocation.rows).toEqual([]);
    expect(allocation.expected).toEqual([]);
    expect(allocation.issues).toEqual([
      { kind: 'missing-target', stratum: ['Z', 'C'], axis: null },
      { kind: 'missing-target', stratum: ['Y', 'C'], axis: null }
    ]);
  });

  it('reports target totals that have no contributing units', () => {
    const table = shareTable([fragment('A', 'Z', 10), fragment('E', 'Y', 0)]);

    const allocation = allocate(table, [
      { zoneId: 'Z', categories: { group: 'C' }, axis: 2030, total: 50 },
      { zoneId: 'Y', categories: { group: 'C' }, axis: 2030, total: 20 },
      { zoneId: 'Q', categories: { group: 'C' }, axis: 2030, total: 70 }
    ]);

    expect(allocation.rows.map((row) => row.unitId)).toEqual(['A']);
    expect(allocation.issues).toEqual([
      { kind: 'unallocatable-total', stratum: ['Y', 'C'], axis: 2030, total: 20 },
      { kind: 'unallocatable-total', stratum: ['Q', 'C'], axis: 2030, total: 70 }
    ]);
  });

  it('reallocates each stratum onto its own total when no targets are given', () => {
    const table = shareTable([fragment('A', 'Z', 0.1), fragment('B', 'Z', 0.2), fragment('C', 'Y', 3)]);

    const allocation = allocate(table);

    expect(allocation.rows.map((row) => [row.unitId, row.axis, row.allocatedValue])).toEqual([
      ['A', BASE_AXIS, 0.1],
      ['B', BASE_AXIS, 0.2],
      ['C', BASE_AXIS, 3]
    ]);
    expect(allocation.expected.map((expected) => expected.total)).toEqual([0.1 + 0.2, 3]);
  });

  it('rejects conflicting target totals for the same stratum and axis', () => {
    const table = shareTable([fragment('A', 'Z', 10)]);

    expect(() =>
      allocate(table, [
        { zoneId: 'Z', categories: { group: 'C' }, axis: 2030, total: 50 },
        { zoneId: 'Z', categories: { group: 'C' }, axis: 2030, total: 51 }
      ])
    ).toThrow(IntegrityError);
  });
});
