import type {
  AgentProfile,
  Balances,
  DonationOffer,
  Request,
  RequestOutcome,
  SimulationState,
  StepTotals,
  Transfer,
  TrajectoryRow
} from '../types';
import { runAudit } from './auditService';
import { sumBalances } from './accountingService';

export interface StepRecord {
  step: number;
  roster: readonly AgentProfile[];
  opening: Balances;
  after: Balances;
  requests: readonly Request[];
  offers: readonly DonationOffer[];
  transfers: readonly Transfer[];
  outcomes: readonly RequestOutcome[];
  produced: number;
  consumed: number;
  log: readonly string[];
  rngState: number;
}

const deepFreeze = <T>(value: T): T => {
  if (value !== null && typeof value === 'object' && !Object.isFrozen(value)) {
    Object.values(value).forEach(child => deepFreeze(child));
    Object.freeze(value);
  }
  return value;
};

/**
 * Waste is provisional: the capacity donors held when allocation opened
 * that was neither donated nor asked for. It will change once the model
 * defines spoilage and co-ownership.
 */
export const computeTotals = (record: StepRecord): StepTotals => {
  const totalRequested = record.requests.reduce((sum, request) => sum + request.quantity, 0);
  const totalDonated = record.transfers.reduce((sum, transfer) => sum + transfer.quantity, 0);
  const totalUnmet = record.outcomes.reduce((sum, outcome) => sum + outcome.unmet, 0);
  const donorCapacity = record.roster
    .filter(agent => agent.canDonate)
    .reduce((sum, agent) => sum + (record.opening[agent.id] ?? 0), 0);

  return {
    totalRequested,
    totalDonated,
    totalUnmet,
    totalProduced: record.produced,
    totalConsumed: record.consumed,
    waste: Math.max(0, donorCapacity - totalDonated)
  };
};

export const buildState = (record: StepRecord): SimulationState => {
  const totals = computeTotals(record);
  const unmetRequests = record.outcomes
    .filter(outcome => outcome.unmet > 0)
    .map(outcome => ({ ...outcome.request, quantity: outcome.unmet }));

  return deepFreeze<SimulationState>({
    step: record.step,
    roster: record.roster.map(agent => ({ ...agent })),
    balances: { ...record.after },
    requests: [...record.requests],
    offers: [...record.offers],
    transfers: [...record.transfers],
    outcomes: [...record.outcomes],
    unmetRequests,
    ...totals,
    wasteIsProvisional: true,
    audit: runAudit(record.after, totals),
    log: [...record.log],
    rngState: record.rngState
  });
};

export const toRow = (state: SimulationState): TrajectoryRow => ({
  step: state.step,
  balances: { ...state.balances },
  totalRequested: state.totalRequested,
  totalDonated: state.totalDonated,
  totalUnmet: state.totalUnmet,
  totalProduced: state.totalProduced,
  totalConsumed: state.totalConsumed,
  waste: state.waste,
  totalBalance: sumBalances(state.balances)
});

/**
 * Append-only, step-indexed sequence of recorded states.
 */
export class Trajectory implements Iterable<SimulationState> {
  private readonly states: SimulationState[] = [];

  append(state: SimulationState): void {
    const expectedStep = this.states.length === 0 ? state.step : this.latest.step + 1;
    if (state.step !== expectedStep) {
      throw new RangeError(`Expected state for step ${expectedStep}, got step ${state.step}`);
    }
    this.states.push(state);
  }

  get length(): number {
    return this.states.length;
  }

  get latest(): SimulationState {
    if (this.states.length === 0) throw new RangeError('Trajectory is empty');
    return this.states[this.states.length - 1];
  }

  at(step: number): SimulationState | undefined {
    if (this.states.length === 0) return undefined;
    return this.states[step - this.states[0].step];
  }

  *[Symbol.iterator](): Iterator<SimulationState> {
    yield* this.states;
  }

  toRows(): TrajectoryRow[] {
    return this.states.map(toRow);
  }
}
