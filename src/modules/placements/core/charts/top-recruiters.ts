import { compareStrings, formatCount } from '../numeric.js';

import type { ChartBuilder, RecruiterRow, TopRecruitersData } from './types.js';

const TOP_N = 10;

/**
 * Students per company summed over all three company slots.
 */
export const buildTopRecruiters: ChartBuilder<TopRecruitersData> = (dataset) => {
  if (dataset.length === 0) return { data: null, insight: '' };

  const totals = new Map<string, number>();
  for (const row of dataset) {
    for (const slot of row.topCompanies) {
      if (slot.name === null || slot.students === null) continue;
      totals.set(slot.name, (totals.get(slot.name) ?? 0) + Math.trunc(slot.students));
    }
  }

  if (totals.size === 0) {
    return { data: null, insight: 'No company data available.' };
  }

  // Equal totals stay in name order
  const companies: RecruiterRow[] = [...totals.entries()]
    .map(([company, students]) => ({ company, students }))
    .sort((a, b) => compareStrings(a.company, b.company))
    .sort((a, b) => b.students - a.students)
    .slice(0, TOP_N);

  const [top] = companies;
  if (top === undefined) {
    return { data: null, insight: 'No company data available.' };
  }

  return {
    data: { companies },
    insight:
      `${top.company} is the top recruiter with ${formatCount(top.students)} students ` +
      'placed across the selected period.',
  };
};
