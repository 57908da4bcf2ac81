import type { Agent, AgentRoles, SimulationState } from '../types';
import { validateSystemInvariants } from './accountingService';
import { AgentRegistry } from './agentRegistry';
import { executeOffers } from './allocationService';
import { type BalanceDistribution, type RoleAssignment, type SimulationConfig, validateConfig } from './configService';
import { resolveStrategy } from './donationStrategies';
import { InsufficientBalanceError, InvalidConfigurationError, InvariantViolationError } from './errors';
import { applyConsumption, applyProduction } from './institutions';
import { DeterministicRNG } from './randomService';
import { generateRequests } from './requestGenerator';
import { Trajectory, buildState } from './stateRecorder';

/**
 * ENGINE ARCHITECTURE
 *
 * The driver knows nothing about donation rules. It knows:
 * 1. Configuration (validated once, before step 0)
 * 2. Execution order per step:
 *    Production -> Requests -> Strategy -> Allocation -> Consumption -> Audit/Record
 * 3. Continuity: step N+1 is computed from the frozen snapshot of step N only,
 *    with the PRNG state carried inside that snapshot.
 */

const drawBalance = (distribution: BalanceDistribution, index: number, rng: DeterministicRNG): number => {
  switch (distribution.kind) {
    case 'fixed':
      return distribution.quantity;
    case 'uniform':
      return rng.rangeInt(distribution.min, distribution.max);
    case 'explicit':
      return distribution.balances[index];
  }
};

const drawRoles = (assignment: RoleAssignment, index: number, rng: DeterministicRNG): AgentRoles => {
  switch (assignment.kind) {
    case 'universal':
      return { canDonate: true, canRequest: true };
    case 'probabilistic':
      return {
        canDonate: rng.chance(assignment.donateProbability),
        canRequest: rng.chance(assignment.requestProbability)
      };
    case 'explicit':
      return { ...assignment.roles[index] };
  }
};

export const initializeSimulation = (config: SimulationConfig): SimulationState => {
  const rng = new DeterministicRNG(config.seed);
  const agents: Agent[] = [];

  for (let i = 0; i < config.population.size; i++) {
    const balance = drawBalance(config.population.initialBalance, i, rng);
    agents.push({ id: `agent_${i}`, balance, ...drawRoles(config.population.roles, i, rng) });
  }

  const registry = new AgentRegistry(agents);
  const balances = registry.snapshot();

  return buildState({
    step: 0,
    roster: registry.roster(),
    opening: balances,
    after: balances,
    requests: [],
    offers: [],
    transfers: [],
    outcomes: [],
    produced: 0,
    consumed: 0,
    log: [`Simulation initialized: ${agents.length} agents holding ${registry.total()} units`],
    rngState: rng.getState()
  });
};

/**
 * Single time step. Pure with respect to `current`: the input snapshot is
 * never mutated and the returned snapshot shares no mutable state with it.
 */
export const runStep = (current: SimulationState, config: SimulationConfig): SimulationState => {
  const rng = new DeterministicRNG(current.rngState);
  const step = current.step + 1;
  const tickLog: string[] = [`--- Step ${step} ---`];
  const registry = AgentRegistry.fromSnapshot(current.roster, current.balances);

  try {
    // --- 1. Production ---
    const production = applyProduction(registry, config.production, rng);
    if (production.total > 0) {
      tickLog.push(`Production: ${production.total} units across ${production.byAgent.size} donor(s)`);
    }
    const opening = registry.snapshot();

    // --- 2. Requests ---
    const requests = generateRequests(
      { step, roster: current.roster, balances: opening, previousUnmet: current.unmetRequests },
      config.requests,
      rng
    );
    const requested = requests.reduce((sum, request) => sum + request.quantity, 0);
    const carried = requests.filter(request => request.carriedFrom !== undefined).length;
    tickLog.push(`Requests: ${requests.length} (${requested} units, ${carried} carried over)`);

    // --- 3. Offers ---
    const strategy = resolveStrategy(config.strategy);
    const offers = strategy(opening, requests, { step, roster: current.roster, rng });

    // --- 4. Allocation (serial) ---
    const allocation = executeOffers(registry, requests, offers, step);
    const donated = allocation.transfers.reduce((sum, transfer) => sum + transfer.quantity, 0);
    tickLog.push(`Donations: ${allocation.transfers.length} transfer(s), ${donated} units from ${allocation.donatedBy.size} donor(s)`);

    const unmet = allocation.outcomes.filter(outcome => outcome.unmet > 0);
    if (unmet.length > 0) {
      const unmetUnits = unmet.reduce((sum, outcome) => sum + outcome.unmet, 0);
      tickLog.push(`Unmet: ${unmetUnits} units across ${unmet.length} request(s)`);
    }

    // --- 5. Consumption ---
    const consumed = applyConsumption(registry, allocation.outcomes, config.consumption);
    if (consumed > 0) tickLog.push(`Consumption: ${consumed} units used up`);

    const after = registry.snapshot();
    validateSystemInvariants({
      step,
      before: current.balances,
      opening,
      after,
      produced: production.total,
      consumed,
      requests,
      transfers: allocation.transfers
    });

    return buildState({
      step,
      roster: current.roster,
      opening,
      after,
      requests,
      offers,
      transfers: allocation.transfers,
      outcomes: allocation.outcomes,
      produced: production.total,
      consumed,
      log: tickLog,
      rngState: rng.getState()
    });
  } catch (error) {
    if (error instanceof InsufficientBalanceError) {
      throw new InvariantViolationError(error.message, {
        step,
        agentId: error.agentId,
        attempted: -error.delta,
        limit: error.balance
      });
    }
    throw error;
  }
};

// Probabilistic roles can pass validation and still draw a population
// where requests arise but nobody can give.
const assertDrawnDonors = (initial: SimulationState, config: SimulationConfig): void => {
  const { roster } = initial;
  if (config.requests.requestRate <= 0) return;
  if (roster.some(agent => agent.canDonate) || !roster.some(agent => agent.canRequest)) return;

  throw new InvalidConfigurationError('Invalid simulation configuration', [
    `population.roles: seed ${config.seed} drew ${roster.length} agent(s) and no donor while requests can be generated`
  ]);
};

/**
 * Validates `input` and draws the population immediately, then yields
 * step 0..steps lazily.
 */
export const iterateSimulation = (input: unknown): Generator<SimulationState, void, undefined> => {
  const config = validateConfig(input);
  const initial = initializeSimulation(config);
  assertDrawnDonors(initial, config);

  function* steps(): Generator<SimulationState, void, undefined> {
    let state = initial;
    yield state;
    for (let i = 0; i < config.steps; i++) {
      state = runStep(state, config);
      yield state;
    }
  }

  return steps();
};

export const runSimulation = (input: unknown): Trajectory => {
  const trajectory = new Trajectory();
  for (const state of iterateSimulation(input)) {
    trajectory.append(state);
  }
  return trajectory;
};
