import { describe, expect, it } from 'vitest';

import { ProjectionService } from './projectionService.js';

describe('ProjectionService without a database', () => {
  const service = new ProjectionService(null);

  it('lists the seed projection set', async () => {
    await expect(service.listProjectionSets()).resolves.toEqual([
      {
        id: 'sample-two-zone-projection',
        name: 'Sample two-zone projection',
        axisLabel: 'year',
        categoryFields: ['ageGroup', 'sex']
      }
    ]);
  });

  it('returns the seed totals by id', async () => {
    const projectionSet = await service.getProjectionSet('sample-two-zone-projection');

    expect(projectionSet?.totals).toHaveLength(16);
    expect(projectionSet?.totals[0]).toEqual({
      zoneId: 'north',
      categories: { ageGroup: '0-17', sex: 'F' },
      axis: 2030,
      total: 1200
    });
  });

  it('returns null for an unknown id', async () => {
    await expect(service.getProjectionSet('missing')).resolves.toBeNull();
  });
});
