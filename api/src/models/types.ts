export type ShareMode = 'count' | 'magnitude';

export type ValidationPath = 'advisory' | 'authoritative';

export type CategoryValues = Record<string, string>;

/** Target axis value, e.g. a projection year. */
export type AxisValue = string | number;

/**
 * Structured stratum key: zone id followed by the category values in the
 * order of the run's category fields.
 */
export type StratumKey = readonly [zoneId: string, ...categoryValues: string[]];

export type UnitRecord = {
  unitId: string;
  baseValue: number;
  categories: CategoryValues;
};

export type ZoneMembership = {
  unitId: string;
  zoneId: string;
  weight: number;
};

export type UnitFragment = {
  unitId: string;
  zoneId: string;
  weight: number;
  baseValue: number;
  categories: CategoryValues;
  split: boolean;
};

export type BaselineTotal = {
  zoneId: string;
  categories: CategoryValues;
  total: number;
};

export type DenominatorSource = { kind: 'units' } | { kind: 'baseline'; totals: BaselineTotal[] };

export type StratumSummary = {
  stratum: StratumKey;
  zoneId: string;
  categories: CategoryValues;
  total: number;
  contributors: number;
  empty: boolean;
  fromUnits: boolean;
};

export type ShareRow = {
  unitId: string;
  zoneId: string;
  categories: CategoryValues;
  stratum: StratumKey;
  contribution: number;
  share: number;
};

export type ShareTable = {
  mode: ShareMode;
  categoryFields: string[];
  rows: ShareRow[];
  strata: StratumSummary[];
};

export type TargetTotal = {
  zoneId: string;
  categories: CategoryValues;
  axis: AxisValue;
  total: number;
};

export type AllocatedRow = {
  unitId: string;
  zoneId: string;
  categories: CategoryValues;
  stratum: StratumKey;
  axis: AxisValue;
  share: number;
  allocatedValue: number;
};

export type ExpectedTotal = {
  stratum: StratumKey;
  categories: CategoryValues;
  axis: AxisValue;
  total: number;
};

export type ValidationRow = {
  stratum: StratumKey;
  zoneId: string;
  categories: CategoryValues;
  axis: AxisValue;
  expectedTotal: number;
  actualTotal: number;
  discrepancy: number;
  withinTolerance: boolean;
};

export type AllocationIssue =
  | { kind: 'missing-membership'; unitId: string }
  /** `axis` is null when no target totals were supplied at all. */
  | { kind: 'missing-target'; stratum: StratumKey; axis: AxisValue | null }
  | { kind: 'missing-baseline'; stratum: StratumKey }
  | { kind: 'unallocatable-total'; stratum: StratumKey; axis: AxisValue; total: number }
  | { kind: 'empty-stratum'; stratum: StratumKey }
  | { kind: 'share-sum'; row: ValidationRow }
  | { kind: 'conservation-warning'; row: ValidationRow };

export type Tolerances = {
  /** Absolute tolerance on per-unit sums after split expansion. */
  split: number;
  /** Absolute tolerance on allocated sums per stratum. */
  magnitude: number;
  /** Relative tolerance on share sums expected to equal 1. */
  shareSum: number;
};

export type AllocationRequest = {
  units: UnitRecord[];
  memberships: ZoneMembership[];
  categoryFields: string[];
  shareMode: ShareMode;
  targetTotals?: TargetTotal[];
  denominator?: DenominatorSource;
  /** Defaults to authoritative when target totals are supplied. */
  path?: ValidationPath;
  tolerances?: Partial<Tolerances>;
};

export type AllocationResult = {
  shareMode: ShareMode;
  categoryFields: string[];
  path: ValidationPath;
  selfReallocation: boolean;
  strata: StratumSummary[];
  shares: ShareRow[];
  allocated: AllocatedRow[];
  validation: ValidationRow[];
  shareValidation: ValidationRow[];
  issues: AllocationIssue[];
};

export type AllocationRun = {
  id: string;
  categoryFields: string[];
  shareMode: ShareMode;
  path?: ValidationPath;
  denominator: DenominatorSource['kind'];
  projectionSetId: string | null;
  createdAt: string;
};

export type ProjectionSet = {
  id: string;
  name: string;
  axisLabel: string;
  categoryFields: string[];
  totals: TargetTotal[];
};
