import { readFileSync } from 'node:fs';

import neo4j, { type Driver } from 'neo4j-driver';
import { z } from 'zod';

import { projectionSetSchema } from '../models/schemas.js';
import type { CategoryValues, ProjectionSet } from '../models/types.js';
import { logger } from '../utils/logger.js';

export type ProjectionSetSummary = Pick<ProjectionSet, 'id' | 'name' | 'axisLabel' | 'categoryFields'>;

const neo4jNumber = z.preprocess((value) => (neo4j.isInt(value) ? value.toNumber() : value), z.number());

const summaryRecordSchema = z.object({
  id: z.string(),
  name: z.string(),
  axisLabel: z.string(),
  categoryFields: z.array(z.string())
});

const detailRecordSchema = summaryRecordSchema.extend({
  totals: z.array(
    z.object({
      zoneId: z.string(),
      axis: z.union([z.string(), neo4jNumber]),
      total: neo4jNumber,
      categoryValues: z.array(z.string())
    })
  )
});

function loadSeedProjectionSet(): ProjectionSet {
  const raw = readFileSync(new URL('../data/sample-projection-set.json', import.meta.url), 'utf8');
  return projectionSetSchema.parse(JSON.parse(raw));
}

const seedProjectionSet = loadSeedProjectionSet();

function summarize({ id, name, axisLabel, categoryFields }: ProjectionSetSummary): ProjectionSetSummary {
  return { id, name, axisLabel, categoryFields };
}

function zipCategories(fields: string[], values: string[]): CategoryValues {
  const categories: CategoryValues = {};
  fields.forEach((field, index) => {
    const value = values[index];
    if (value !== undefined) {
      categories[field] = value;
    }
  });
  return categories;
}

function normalizeProjectionSet(record: z.infer<typeof detailRecordSchema>): ProjectionSet {
  return {
    id: record.id,
    name: record.name,
    axisLabel: record.axisLabel,
    categoryFields: record.categoryFields,
    totals: record.totals.map((total) => ({
      zoneId: total.zoneId,
      axis: total.axis,
      total: total.total,
      categories: zipCategories(record.categoryFields, total.categoryValues)
    }))
  } satisfies ProjectionSet;
}

/**
 * Projection sets are named tables of authoritative target totals, e.g.
 * multi-year population projections per zone, age group and sex.
 */
export class ProjectionService {
  constructor(private readonly driver: Driver | null) {}

  async listProjectionSets(): Promise<ProjectionSetSummary[]> {
    if (!this.driver) {
      return [summarize(seedProjectionSet)];
    }
    const session = this.driver.session();
    try {
      const result = await session.run(
        `MATCH (ps:ProjectionSet)
         RETURN ps.id AS id, ps.name AS name, ps.axisLabel AS axisLabel, ps.categoryFields AS categoryFields
         ORDER BY ps.name`
      );
      if (result.records.length === 0) {
        return [summarize(seedProjectionSet)];
      }
      return result.records.map((record) => summaryRecordSchema.parse(record.toObject()));
    } catch (error) {
      logger.warn({ err: error }, 'Falling back to seed projection set list');
      return [summarize(seedProjectionSet)];
    } finally {
      await session.close();
    }
  }

  async getProjectionSet(id: string): Promise<ProjectionSet | null> {
    if (id === seedProjectionSet.id) {
      return seedProjectionSet;
    }
    if (!this.driver) {
      return null;
    }
    const session = this.driver.session();
    try {
      const result = await session.run(
        `MATCH (ps:ProjectionSet { id: $id })
         OPTIONAL MATCH (ps)-[:HAS_TOTAL]->(t:TargetTotal)
         WITH ps, collect(t { .zoneId, .axis, .total, .categoryValues }) AS totals
         RETURN ps.id AS id, ps.name AS name, ps.axisLabel AS axisLabel, ps.categoryFields AS categoryFields, totals`,
        { id }
      );
      const [record] = result.records;
      if (!record) {
        return null;
      }
      return normalizeProjectionSet(detailRecordSchema.parse(record.toObject()));
    } catch (error) {
      logger.warn({ err: error, projectionSetId: id }, 'Failed to load projection set');
      return null;
    } finally {
      await session.close();
    }
  }
}
