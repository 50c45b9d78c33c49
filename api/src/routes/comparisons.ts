import express from 'express';
import { z } from 'zod';

import { unitRecordSchema, zoneMembershipSchema } from '../models/schemas.js';
import type { Tolerances } from '../models/types.js';
import { compareApproaches } from '../services/approaches.js';
import { comparisonToCsv } from '../services/exporters.js';
import { parseBody } from './validation.js';

const comparisonSchema = z.object({
  units: z.array(unitRecordSchema).min(1),
  memberships: z.array(zoneMembershipSchema).min(1),
  dimensions: z.array(z.string().min(1)).min(1)
});

const exportSchema = comparisonSchema.extend({
  dimensions: z.array(z.string().min(1)).length(1)
});

export function createComparisonsRouter(tolerances: Tolerances): express.Router {
  const router = express.Router();

  router.post('/', (req, res) => {
    const input = parseBody(comparisonSchema, req, res);
    if (!input) {
      return;
    }
    const comparisons = compareApproaches({ ...input, tolerances });
    res.json(
      comparisons.map(({ dimension, approaches, comparison }) => ({
        dimension,
        approaches: approaches.map(({ approach, composition, result }) => ({
          approach,
          composition,
          issues: result.issues
        })),
        comparison
      }))
    );
  });

  router.post('/export.csv', (req, res) => {
    const input = parseBody(exportSchema, req, res);
    if (!input) {
      return;
    }
    const [comparison] = compareApproaches({ ...input, tolerances });
    if (!comparison) {
      res.status(400).json({ message: 'Nothing to compare' });
      return;
    }
    res.setHeader('Content-Type', 'text/csv');
    res.setHeader('Content-Disposition', `attachment; filename="${comparison.dimension}-approach-comparison.csv"`);
    res.send(comparisonToCsv(comparison));
  });

  return router;
}
