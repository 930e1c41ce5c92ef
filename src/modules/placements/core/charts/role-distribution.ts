import { formatFixed, ratioPct, roundHalfUp } from '../numeric.js';

import type { ChartBuilder, RoleDistributionData, RoleRow } from './types.js';

const TOP_N = 10;

/**
 * Mentions of each job role across the three role slots. Shares are taken
 * over the listed roles only.
 */
export const buildRoleDistribution: ChartBuilder<RoleDistributionData> = (dataset) => {
  if (dataset.length === 0) return { data: null, insight: '' };

  const counts = new Map<string, number>();
  for (const row of dataset) {
    for (const role of row.topJobRoles) {
      if (role !== null) counts.set(role, (counts.get(role) ?? 0) + 1);
    }
  }

  const top = [...counts.entries()]
    .map(([role, count]) => ({ role, count }))
    .sort((a, b) => b.count - a.count)
    .slice(0, TOP_N);

  const totalMentions = top.reduce((acc, r) => acc + r.count, 0);
  const roles: RoleRow[] = top.map((r) => ({
    ...r,
    sharePct: roundHalfUp(ratioPct(r.count, totalMentions), 1),
  }));

  const [first] = roles;
  if (first === undefined) {
    return { data: null, insight: 'No role data available.' };
  }

  return {
    data: { roles, totalMentions },
    insight:
      `${first.role} is the most common role, appearing ${String(first.count)} times ` +
      `(${formatFixed(ratioPct(first.count, totalMentions), 0)}% of mentions).`,
  };
};
