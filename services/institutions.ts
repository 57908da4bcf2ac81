import type { AgentId, RequestOutcome } from '../types';
import type { AgentRegistry } from './agentRegistry';
import type { ConsumptionPolicy, ProductionConfig } from './configService';
import type { DeterministicRNG } from './randomService';

/**
 * INSTITUTION MODULES
 *
 * The rules that move resources into and out of the economy.
 * Production injects new units before requests are drawn; consumption
 * removes what satisfied requests used up once allocation is done.
 * Together they are the only terms besides balances in the conservation law.
 */

export interface ProductionResult {
  total: number;
  byAgent: Map<AgentId, number>;
}

export const applyProduction = (
  registry: AgentRegistry,
  policy: ProductionConfig,
  rng: DeterministicRNG
): ProductionResult => {
  const byAgent = new Map<AgentId, number>();
  if (policy.kind === 'none') return { total: 0, byAgent };

  let total = 0;
  registry.agents().forEach(agent => {
    if (!agent.canDonate) return;

    const quantity = policy.kind === 'fixed' ? policy.quantity : rng.rangeInt(policy.min, policy.max);
    if (quantity <= 0) return;

    registry.applyDelta(agent.id, quantity);
    byAgent.set(agent.id, quantity);
    total += quantity;
  });

  return { total, byAgent };
};

/**
 * Under the `fulfilled` policy each fully met request is used up by its
 * requester. Partially met requests keep what they received.
 */
export const applyConsumption = (
  registry: AgentRegistry,
  outcomes: readonly RequestOutcome[],
  policy: ConsumptionPolicy
): number => {
  if (policy === 'none') return 0;

  let consumed = 0;
  outcomes.forEach(({ request, unmet }) => {
    if (unmet > 0) return;
    registry.applyDelta(request.agentId, -request.quantity);
    consumed += request.quantity;
  });
  return consumed;
};
