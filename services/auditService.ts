import type { AuditReport, Balances, StepTotals } from '../types';

const GINI_ALERT_THRESHOLD = 0.6;
const SHORTAGE_ALERT_THRESHOLD = 0.5;

const round2 = (value: number): number => Math.round(value * 100) / 100;

// Gini coefficient (0 = perfect equality, 1 = perfect inequality)
export const calculateGini = (values: readonly number[]): number => {
  const sorted = [...values].sort((a, b) => a - b);
  const n = sorted.length;
  if (n === 0) return 0;

  const total = sorted.reduce((a, b) => a + b, 0);
  if (total === 0) return 0;

  let numerator = 0;
  for (let i = 0; i < n; i++) {
    numerator += (i + 1) * sorted[i];
  }

  return (2 * numerator) / (n * total) - (n + 1) / n;
};

/**
 * 1 - (largest share - smallest share) of the total held.
 */
export const calculateConcentrationIndex = (values: readonly number[]): number => {
  const total = values.reduce((a, b) => a + b, 0);
  if (values.length === 0 || total === 0) return 0;

  const shares = values.map(value => value / total);
  return 1 - (Math.max(...shares) - Math.min(...shares));
};

// Fraction of agents holding anything at all
export const calculateDistributionIndex = (values: readonly number[]): number => {
  if (values.length === 0) return 0;
  return values.filter(value => value > 0).length / values.length;
};

export const runAudit = (
  balances: Balances,
  totals: Pick<StepTotals, 'totalRequested' | 'totalDonated' | 'waste'>
): AuditReport => {
  const alerts: string[] = [];
  let status: AuditReport['systemStatus'] = 'NORMAL';
  const values = Object.values(balances);

  // 1. Inequality
  const gini = calculateGini(values);
  if (gini > GINI_ALERT_THRESHOLD) {
    alerts.push(`High inequality (Gini: ${gini.toFixed(2)})`);
    status = 'WARNING';
  }

  // 2. Spread of holdings
  const concentration = calculateConcentrationIndex(values);
  const distribution = calculateDistributionIndex(values);

  // 3. Shortage
  const fulfilment = totals.totalRequested > 0 ? totals.totalDonated / totals.totalRequested : 1;
  if (fulfilment < SHORTAGE_ALERT_THRESHOLD) {
    alerts.push(`Shortage: ${(fulfilment * 100).toFixed(0)}% of requested units donated`);
    status = 'WARNING';
  }

  // 4. Idling capacity
  const held = values.reduce((a, b) => a + b, 0);
  const idling = held > 0 ? totals.waste / held : 0;

  return {
    giniCoefficient: round2(gini),
    concentrationIndex: round2(concentration),
    distributionIndex: round2(distribution),
    decentralizationIndex: round2((distribution + concentration) / 2),
    fulfilmentRatio: round2(fulfilment),
    idlingCapacity: round2(idling),
    alerts,
    systemStatus: status
  };
};
