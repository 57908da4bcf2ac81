import type { AgentId, AgentProfile, Balances, Request } from '../types';
import type { RequestConfig, RequestQuantity } from './configService';
import type { DeterministicRNG } from './randomService';

export interface RequestContext {
  step: number;
  roster: readonly AgentProfile[];
  balances: Balances;
  // Residuals left unmet by the previous step
  previousUnmet: readonly Request[];
}

const drawQuantity = (
  distribution: RequestQuantity,
  balance: number,
  alreadyRequested: number,
  rng: DeterministicRNG
): number => {
  switch (distribution.kind) {
    case 'fixed':
      return distribution.quantity;
    case 'uniform':
      return rng.rangeInt(distribution.min, distribution.max);
    case 'need-based':
      return Math.max(0, distribution.target - balance - alreadyRequested);
  }
};

/**
 * Builds the ordered request list for one step.
 *
 * Carried residuals come first (in their previous order), then fresh
 * requests for every requesting agent in registry order. All randomness
 * comes from `rng`, so the same seed and prior state reproduce the list.
 */
export const generateRequests = (
  context: RequestContext,
  config: RequestConfig,
  rng: DeterministicRNG
): Request[] => {
  const { step, roster, balances, previousUnmet } = context;
  const requests: Request[] = [];
  const perAgent = new Map<AgentId, { count: number; quantity: number }>();
  let serial = 0;

  const push = (agentId: AgentId, quantity: number, carried?: Request) => {
    const tally = perAgent.get(agentId) ?? { count: 0, quantity: 0 };
    tally.count++;
    tally.quantity += quantity;
    perAgent.set(agentId, tally);

    requests.push({
      id: `req_${step}_${serial++}`,
      agentId,
      quantity,
      step,
      carriedFrom: carried?.id,
      carrySteps: carried ? carried.carrySteps + 1 : 0
    });
  };

  const countFor = (agentId: AgentId) => perAgent.get(agentId)?.count ?? 0;

  // 1. Carry-over of unmet residuals
  if (config.carryOver) {
    previousUnmet.forEach(residual => {
      if (residual.quantity <= 0) return;
      if (config.maxCarrySteps !== undefined && residual.carrySteps + 1 > config.maxCarrySteps) return;
      if (countFor(residual.agentId) >= config.maxRequestsPerAgent) return;
      push(residual.agentId, residual.quantity, residual);
    });
  }

  // 2. Fresh requests
  roster.forEach(agent => {
    if (!agent.canRequest) return;

    for (let slot = countFor(agent.id); slot < config.maxRequestsPerAgent; slot++) {
      if (!rng.chance(config.requestRate)) continue;

      const alreadyRequested = perAgent.get(agent.id)?.quantity ?? 0;
      const quantity = drawQuantity(config.quantity, balances[agent.id] ?? 0, alreadyRequested, rng);
      if (quantity > 0) push(agent.id, quantity);
    }
  });

  return requests;
};
