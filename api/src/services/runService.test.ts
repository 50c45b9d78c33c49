import { describe, expect, it } from 'vitest';

import { IntegrityError, ProjectionSetNotFoundError, RunNotFoundError } from '../models/errors.js';
import type { ProjectionSet } from '../models/types.js';
import { ProjectionService } from './projectionService.js';
import { RunService } from './runService.js';

class EmptyProjectionService extends ProjectionService {
  constructor() {
    super(null);
  }

  override async getProjectionSet(id: string): Promise<ProjectionSet | null> {
    return { id, name: 'Empty', axisLabel: 'year', categoryFields: [], totals: [] };
  }
}

const childUnits = [
  { unitId: 'n-01', baseValue: 30, categories: { ageGroup: '0-17', sex: 'F' } },
  { unitId: 'n-02', baseValue: 10, categories: { ageGroup: '0-17', sex: 'F' } }
];

describe('RunService', () => {
  it('allocates a projection set onto the run units', async () => {
    const service = new RunService(null);
    const run = service.createRun({
      categoryFields: ['ageGroup', 'sex'],
      shareMode: 'magnitude',
      denominator: 'units',
      projectionSetId: 'sample-two-zone-projection'
    });
    service.addUnits(run.id, childUnits);
    expect(service.applyMembershipRules(run.id, { prefixes: { 'n-': 'north' } })).toEqual([]);

    const result = await service.compute(run.id);

    expect(result.path).toBe('authoritative');
    expect(result.allocated.map((row) => [row.unitId, row.axis, row.allocatedValue])).toEqual([
      ['n-01', 2030, 900],
      ['n-02', 2030, 300],
      ['n-01', 2035, 937.5],
      ['n-02', 2035, 312.5]
    ]);
    expect(result.issues.filter((issue) => issue.kind === 'unallocatable-total')).toHaveLength(14);
    expect(service.getLastResult(run.id)).toBe(result);
  });

  it('reallocates onto unit totals when a run has no targets', async () => {
    const service = new RunService(null);
    const run = service.createRun({ categoryFields: ['sex'], shareMode: 'count', denominator: 'units' });
    service.addUnits(run.id, childUnits);
    service.addMemberships(run.id, [
      { unitId: 'n-01', zoneId: 'north', weight: 1 },
      { unitId: 'n-02', zoneId: 'north', weight: 1 }
    ]);

    const result = await service.compute(run.id);

    expect(result.selfReallocation).toBe(true);
    expect(result.shares.map((row) => row.share)).toEqual([0.5, 0.5]);
  });

  it('prepares projection rows into target totals', async () => {
    const service = new RunService(null);
    const run = service.createRun({ categoryFields: ['ageGroup'], shareMode: 'magnitude', denominator: 'units' });
    service.addUnits(run.id, [{ unitId: 'a', baseValue: 5, categories: { ageGroup: '0-17' } }]);
    service.addMemberships(run.id, [{ unitId: 'a', zoneId: 'north', weight: 1 }]);

    const dropped = service.addProjectionRows(
      run.id,
      [
        { zoneId: 'north', axis: 2030, total: 40, categories: { ageGroup: '4' } },
        { zoneId: 'north', axis: 2030, total: 2, categories: { ageGroup: '9' } },
        { zoneId: 'north', axis: 2030, total: 7, categories: { ageGroup: 'n/a' } }
      ],
      { ageField: 'ageGroup' }
    );

    expect(dropped).toBe(1);
    const result = await service.compute(run.id);
    expect(result.allocated.map((row) => row.allocatedValue)).toEqual([42]);
  });

  it('divides by baseline totals when the run asks for them', async () => {
    const service = new RunService(null);
    const run = service.createRun({
      categoryFields: [],
      shareMode: 'magnitude',
      denominator: 'baseline',
      path: 'advisory'
    });
    service.addUnits(run.id, [{ unitId: 'a', baseValue: 20, categories: {} }]);
    service.addMemberships(run.id, [{ unitId: 'a', zoneId: 'north', weight: 1 }]);
    service.addBaselineTotals(run.id, [{ zoneId: 'north', categories: {}, total: 80 }]);
    service.addTargetTotals(run.id, [{ zoneId: 'north', categories: {}, axis: 2030, total: 400 }]);

    const result = await service.compute(run.id);

    expect(result.allocated.map((row) => row.allocatedValue)).toEqual([100]);
    expect(result.issues.map((issue) => issue.kind)).toEqual(['share-sum', 'conservation-warning']);
  });

  it('rethrows integrity failures', async () => {
    const service = new RunService(null);
    const run = service.createRun({ categoryFields: [], shareMode: 'magnitude', denominator: 'units' });
    service.addUnits(run.id, [{ unitId: 'a', baseValue: 1, categories: {} }]);
    service.addMemberships(run.id, [{ unitId: 'a', zoneId: 'north', weight: 0.5 }]);

    await expect(service.compute(run.id)).rejects.toBeInstanceOf(IntegrityError);
  });

  it('rejects unknown runs and projection sets', async () => {
    const service = new RunService(null);
    expect(() => service.addUnits('missing', childUnits)).toThrow(RunNotFoundError);

    const run = service.createRun({
      categoryFields: [],
      shareMode: 'magnitude',
      denominator: 'units',
      projectionSetId: 'missing'
    });
    await expect(service.compute(run.id)).rejects.toBeInstanceOf(ProjectionSetNotFoundError);
  });

  it('refuses a projection set without target totals', async () => {
    const service = new RunService(null, undefined, new EmptyProjectionService());
    const run = service.createRun({
      categoryFields: [],
      shareMode: 'magnitude',
      denominator: 'units',
      projectionSetId: 'empty-set'
    });
    service.addUnits(run.id, [{ unitId: 'a', baseValue: 1, categories: {} }]);
    service.addMemberships(run.id, [{ unitId: 'a', zoneId: 'north', weight: 1 }]);

    await expect(service.compute(run.id)).rejects.toThrow('Projection set empty-set has no target totals');
    expect(service.getLastResult(run.id)).toBeUndefined();
  });
});
