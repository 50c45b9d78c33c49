import { randomUUID } from 'node:crypto';

import type { Driver } from 'neo4j-driver';

import { IntegrityError, ProjectionSetNotFoundError, RunNotFoundError } from '../models/errors.js';
import type {
  AllocationResult,
  AllocationRun,
  BaselineTotal,
  DenominatorSource,
  ShareMode,
  TargetTotal,
  Tolerances,
  UnitRecord,
  ValidationPath,
  ZoneMembership
} from '../models/types.js';
import { logger } from '../utils/logger.js';
import { runAllocation } from './allocationEngine.js';
import { buildMemberships, type MembershipRules } from './membershipBuilder.js';
import { prepareTargetTotals, type ProjectionPrepOptions, type RawProjectionRow } from './projectionPrep.js';
import { ProjectionService } from './projectionService.js';

type RunInternal = AllocationRun & {
  units: UnitRecord[];
  memberships: ZoneMembership[];
  targetTotals: TargetTotal[];
  baselineTotals: BaselineTotal[];
  lastResult?: AllocationResult;
};

export type CreateRunPayload = {
  categoryFields: string[];
  shareMode: ShareMode;
  path?: ValidationPath;
  denominator: DenominatorSource['kind'];
  projectionSetId?: string;
};

export class RunService {
  private readonly runs = new Map<string, RunInternal>();
  private readonly projectionService: ProjectionService;

  constructor(
    driver: Driver | null,
    private readonly tolerances?: Partial<Tolerances>,
    projectionService?: ProjectionService
  ) {
    this.projectionService = projectionService ?? new ProjectionService(driver);
  }

  createRun(payload: CreateRunPayload): AllocationRun {
    const run: RunInternal = {
      id: randomUUID(),
      categoryFields: payload.categoryFields,
      shareMode: payload.shareMode,
      path: payload.path,
      denominator: payload.denominator,
      projectionSetId: payload.projectionSetId ?? null,
      createdAt: new Date().toISOString(),
      units: [],
      memberships: [],
      targetTotals: [],
      baselineTotals: []
    };
    this.runs.set(run.id, run);
    logger.info({ runId: run.id, shareMode: run.shareMode, categoryFields: run.categoryFields }, 'Allocation run created');
    return run;
  }

  getRun(runId: string): RunInternal | undefined {
    return this.runs.get(runId);
  }

  private requireRun(runId: string): RunInternal {
    const run = this.runs.get(runId);
    if (!run) {
      throw new RunNotFoundError(runId);
    }
    return run;
  }

  addUnits(runId: string, units: UnitRecord[]): RunInternal {
    const run = this.requireRun(runId);
    run.units.push(...units);
    return run;
  }

  addMemberships(runId: string, memberships: ZoneMembership[]): RunInternal {
    const run = this.requireRun(runId);
    run.memberships.push(...memberships);
    return run;
  }

  /** Derives memberships for the run's units from prefix and split rules. */
  applyMembershipRules(runId: string, rules: MembershipRules): string[] {
    const run = this.requireRun(runId);
    const { memberships, unassigned } = buildMemberships(
      run.units.map((unit) => unit.unitId),
      rules
    );
    run.memberships.push(...memberships);
    if (unassigned.length > 0) {
      logger.warn({ runId, unassigned: unassigned.length }, 'Units matched no membership rule');
    }
    return unassigned;
  }

  addTargetTotals(runId: string, totals: TargetTotal[]): RunInternal {
    const run = this.requireRun(runId);
    run.targetTotals.push(...totals);
    return run;
  }

  addProjectionRows(runId: string, rows: RawProjectionRow[], options: ProjectionPrepOptions): number {
    const run = this.requireRun(runId);
    const { totals, dropped } = prepareTargetTotals(rows, options);
    run.targetTotals.push(...totals);
    if (dropped.length > 0) {
      logger.warn({ runId, dropped: dropped.length }, 'Projection rows dropped during preparation');
    }
    return dropped.length;
  }

  addBaselineTotals(runId: string, totals: BaselineTotal[]): RunInternal {
    const run = this.requireRun(runId);
    run.baselineTotals.push(...totals);
    return run;
  }

  private async collectTargets(run: RunInternal): Promise<TargetTotal[] | undefined> {
    const targets = [...run.targetTotals];
    if (run.projectionSetId) {
      const projectionSet = await this.projectionService.getProjectionSet(run.projectionSetId);
      if (!projectionSet) {
        throw new ProjectionSetNotFoundError(run.projectionSetId);
      }
      if (projectionSet.totals.length === 0) {
        logger.warn({ runId: run.id, projectionSetId: projectionSet.id }, 'Projection set has no target totals');
        throw new IntegrityError(`Projection set ${projectionSet.id} has no target totals`);
      }
      targets.push(...projectionSet.totals);
    }
    return targets.length > 0 ? targets : undefined;
  }

  async compute(runId: string): Promise<AllocationResult> {
    const run = this.requireRun(runId);
    const denominator: DenominatorSource =
      run.denominator === 'baseline' ? { kind: 'baseline', totals: run.baselineTotals } : { kind: 'units' };

    try {
      const result = runAllocation({
        units: run.units,
        memberships: run.memberships,
        categoryFields: run.categoryFields,
        shareMode: run.shareMode,
        targetTotals: await this.collectTargets(run),
        denominator,
        path: run.path,
        tolerances: this.tolerances
      });
      run.lastResult = result;
      logger.info(
        {
          runId,
          path: result.path,
          allocated: result.allocated.length,
          strata: result.strata.length,
          issues: result.issues.length
        },
        'Allocation run computed'
      );
      if (result.issues.length > 0) {
        logger.warn({ runId, kinds: countIssueKinds(result) }, 'Allocation completed with reported issues');
      }
      return result;
    } catch (error) {
      logger.error({ err: error, runId }, 'Allocation run aborted');
      throw error;
    }
  }

  getLastResult(runId: string): AllocationResult | undefined {
    return this.runs.get(runId)?.lastResult;
  }
}

function countIssueKinds(result: AllocationResult): Record<string, number> {
  const counts: Record<string, number> = {};
  for (const issue of result.issues) {
    counts[issue.kind] = (counts[issue.kind] ?? 0) + 1;
  }
  return counts;
}
