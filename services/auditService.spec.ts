import { describe, it, expect } from 'vitest';
import {
  calculateConcentrationIndex,
  calculateDistributionIndex,
  calculateGini,
  runAudit
} from './auditService';

describe('calculateGini', () => {
  it('is zero for perfect equality', () => {
    expect(calculateGini([5, 5, 5, 5])).toBeCloseTo(0);
  });

  it('approaches one as holdings concentrate', () => {
    expect(calculateGini([10, 0, 0])).toBeCloseTo(2 / 3);
    expect(calculateGini([0, 0, 0, 0, 100])).toBeCloseTo(0.8);
  });

  it('is zero for empty or empty-handed populations', () => {
    expect(calculateGini([])).toBe(0);
    expect(calculateGini([0, 0, 0])).toBe(0);
  });
});

describe('calculateConcentrationIndex', () => {
  it('compares the largest and smallest shares', () => {
    expect(calculateConcentrationIndex([5, 5])).toBe(1);
    expect(calculateConcentrationIndex([3, 1])).toBeCloseTo(0.5);
    expect(calculateConcentrationIndex([1, 0, 0])).toBe(0);
  });

  it('is zero when nothing is held', () => {
    expect(calculateConcentrationIndex([0, 0])).toBe(0);
  });
});

describe('calculateDistributionIndex', () => {
  it('counts the share of agents holding anything', () => {
    expect(calculateDistributionIndex([0, 3, 0, 1])).toBe(0.5);
    expect(calculateDistributionIndex([])).toBe(0);
  });
});

describe('runAudit', () => {
  it('flags inequality and shortage together', () => {
    const report = runAudit({ agent_0: 10, agent_1: 0, agent_2: 0 }, { totalRequested: 10, totalDonated: 2, waste: 5 });

    expect(report).toEqual({
      giniCoefficient: 0.67,
      concentrationIndex: 0,
      distributionIndex: 0.33,
      decentralizationIndex: 0.17,
      fulfilmentRatio: 0.2,
      idlingCapacity: 0.5,
      alerts: ['High inequality (Gini: 0.67)', 'Shortage: 20% of requested units donated'],
      systemStatus: 'WARNING'
    });
  });

  it('reports a normal system when holdings are even and nothing was asked for', () => {
    const report = runAudit({ agent_0: 4, agent_1: 4 }, { totalRequested: 0, totalDonated: 0, waste: 8 });

    expect(report.systemStatus).toBe('NORMAL');
    expect(report.alerts).toEqual([]);
    expect(report.fulfilmentRatio).toBe(1);
    expect(report.decentralizationIndex).toBe(1);
    expect(report.idlingCapacity).toBe(1);
  });

  it('reports idle donor stock as a share of everything held', () => {
    expect(runAudit({ agent_0: 2, agent_1: 4 }, { totalRequested: 3, totalDonated: 3, waste: 2 }).idlingCapacity).toBe(0.33);
    expect(runAudit({ agent_0: 0, agent_1: 0 }, { totalRequested: 0, totalDonated: 0, waste: 0 }).idlingCapacity).toBe(0);
  });
});
