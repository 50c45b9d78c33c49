import express from 'express';
import type { Driver } from 'neo4j-driver';
import { z } from 'zod';

import {
  axisValueSchema,
  baselineTotalSchema,
  categoryValuesSchema,
  shareModeSchema,
  targetTotalSchema,
  unitRecordSchema,
  validationPathSchema,
  zoneMembershipSchema
} from '../models/schemas.js';
import type { AllocationResult, Tolerances } from '../models/types.js';
import { allocatedToCsv, issuesToCsv, validationToCsv } from '../services/exporters.js';
import { ageBandsSchema } from '../services/projectionPrep.js';
import { RunService } from '../services/runService.js';
import { parseBody } from './validation.js';

const createRunSchema = z.object({
  categoryFields: z.array(z.string().min(1)).default([]),
  shareMode: shareModeSchema.default('magnitude'),
  path: validationPathSchema.optional(),
  denominator: z.enum(['units', 'baseline']).default('units'),
  projectionSetId: z.string().min(1).optional()
});

const unitsSchema = z.object({ units: z.array(unitRecordSchema).min(1) });

const membershipsSchema = z.object({ memberships: z.array(zoneMembershipSchema).min(1) });

const membershipRulesSchema = z.object({
  prefixes: z.record(z.string().min(1)),
  splits: z
    .record(z.array(z.object({ zoneId: z.string().min(1), weight: z.number().min(0).max(1) })).min(1))
    .optional()
});

const targetTotalsSchema = z.object({ totals: z.array(targetTotalSchema).min(1) });

const baselineTotalsSchema = z.object({ totals: z.array(baselineTotalSchema).min(1) });

const projectionRowsSchema = z.object({
  rows: z
    .array(
      z.object({
        zoneId: z.string().min(1),
        axis: axisValueSchema,
        total: z.number(),
        categories: categoryValuesSchema.default({})
      })
    )
    .min(1),
  options: z
    .object({
      ageField: z.string().min(1).optional(),
      ageBands: ageBandsSchema.optional(),
      categoryRules: z
        .record(z.object({ recode: z.record(z.string()).optional(), allowed: z.array(z.string()).optional() }))
        .optional(),
      zoneAliases: z.record(z.string()).optional()
    })
    .default({})
});

export function createRunsRouter(driver: Driver | null, tolerances: Tolerances): express.Router {
  const router = express.Router();
  const runService = new RunService(driver, tolerances);

  function sendCsv(res: express.Response, runId: string, name: string, render: (result: AllocationResult) => string) {
    const result = runService.getLastResult(runId);
    if (!result) {
      res.status(404).json({ message: 'Run results not found. Compute the run first.' });
      return;
    }
    res.setHeader('Content-Type', 'text/csv');
    res.setHeader('Content-Disposition', `attachment; filename="${runId}-${name}.csv"`);
    res.send(render(result));
  }

  router.post('/', (req, res) => {
    const payload = parseBody(createRunSchema, req, res);
    if (!payload) {
      return;
    }
    const run = runService.createRun(payload);
    res.status(201).json({ runId: run.id });
  });

  router.post('/:runId/units', (req, res) => {
    const payload = parseBody(unitsSchema, req, res);
    if (!payload) {
      return;
    }
    runService.addUnits(req.params.runId, payload.units);
    res.status(204).send();
  });

  router.post('/:runId/memberships', (req, res) => {
    const payload = parseBody(membershipsSchema, req, res);
    if (!payload) {
      return;
    }
    runService.addMemberships(req.params.runId, payload.memberships);
    res.status(204).send();
  });

  router.post('/:runId/membership-rules', (req, res) => {
    const payload = parseBody(membershipRulesSchema, req, res);
    if (!payload) {
      return;
    }
    const unassigned = runService.applyMembershipRules(req.params.runId, payload);
    res.json({ unassigned });
  });

  router.post('/:runId/target-totals', (req, res) => {
    const payload = parseBody(targetTotalsSchema, req, res);
    if (!payload) {
      return;
    }
    runService.addTargetTotals(req.params.runId, payload.totals);
    res.status(204).send();
  });

  router.post('/:runId/projection-rows', (req, res) => {
    const payload = parseBody(projectionRowsSchema, req, res);
    if (!payload) {
      return;
    }
    const dropped = runService.addProjectionRows(req.params.runId, payload.rows, payload.options);
    res.json({ dropped });
  });

  router.post('/:runId/baseline-totals', (req, res) => {
    const payload = parseBody(baselineTotalsSchema, req, res);
    if (!payload) {
      return;
    }
    runService.addBaselineTotals(req.params.runId, payload.totals);
    res.status(204).send();
  });

  router.post('/:runId/compute', async (req, res) => {
    const result = await runService.compute(req.params.runId);
    res.json(result);
  });

  router.get('/:runId/export/allocated.csv', (req, res) => {
    sendCsv(res, req.params.runId, 'allocated', allocatedToCsv);
  });

  router.get('/:runId/export/validation.csv', (req, res) => {
    sendCsv(res, req.params.runId, 'validation', validationToCsv);
  });

  router.get('/:runId/export/issues.csv', (req, res) => {
    sendCsv(res, req.params.runId, 'issues', issuesToCsv);
  });

  return router;
}
