import type { ZoneMembership } from '../models/types.js';

export type SplitRule = Array<{ zoneId: string; weight: number }>;

export type MembershipRules = {
  /** Unit id prefix -> zone id. The longest matching prefix wins. */
  prefixes: Record<string, string>;
  /** Explicit memberships for units that straddle zones; checked before prefixes. */
  splits?: Record<string, SplitRule>;
};

export type BuiltMemberships = {
  memberships: ZoneMembership[];
  unassigned: string[];
};

export function buildMemberships(unitIds: string[], rules: MembershipRules): BuiltMemberships {
  const prefixes = Object.entries(rules.prefixes).sort(([a], [b]) => b.length - a.length);
  const splits = rules.splits ?? {};
  const memberships: ZoneMembership[] = [];
  const unassigned: string[] = [];

  for (const unitId of new Set(unitIds)) {
    const split = splits[unitId];
    if (split) {
      memberships.push(...split.map(({ zoneId, weight }) => ({ unitId, zoneId, weight })));
      continue;
    }
    const match = prefixes.find(([prefix]) => unitId.startsWith(prefix));
    if (match) {
      memberships.push({ unitId, zoneId: match[1], weight: 1 });
    } else {
      unassigned.push(unitId);
    }
  }

  return { memberships, unassigned };
}
