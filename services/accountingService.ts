import type { AgentId, Balances, Request, Transfer } from '../types';
import { InvariantViolationError } from './errors';

export interface StepLedger {
  step: number;
  before: Balances;
  // Balances once production has run, i.e. what donors could give
  opening: Balances;
  after: Balances;
  produced: number;
  consumed: number;
  requests: readonly Request[];
  transfers: readonly Transfer[];
}

export const sumBalances = (balances: Balances): number =>
  Object.values(balances).reduce((sum, balance) => sum + balance, 0);

/**
 * System Invariant Validation
 * Run at the end of every step. Any breach is a defect in the engine, so it
 * throws with the step and the offending agent instead of repairing state.
 * Quantities are whole units, so every comparison is exact.
 */
export const validateSystemInvariants = (ledger: StepLedger): void => {
  const { step, before, opening, after, produced, consumed, requests, transfers } = ledger;

  // Invariant 4: non-negative, whole quantities
  Object.entries(after).forEach(([agentId, balance]) => {
    if (!Number.isInteger(balance) || balance < 0) {
      throw new InvariantViolationError(`agent ${agentId} ended with balance ${balance}`, {
        step,
        agentId,
        attempted: balance,
        limit: 0
      });
    }
  });

  // Invariant 1: conservation
  const expected = sumBalances(before) + produced;
  const actual = sumBalances(after) + consumed;
  if (actual !== expected) {
    throw new InvariantViolationError(
      `conservation breached: balances ${sumBalances(after)} + consumed ${consumed} != ` +
        `previous ${sumBalances(before)} + produced ${produced}`,
      { step, attempted: actual, limit: expected }
    );
  }

  const perRequest = new Map<string, number>();
  const perDonor = new Map<AgentId, number>();
  transfers.forEach(transfer => {
    if (transfer.quantity <= 0) {
      throw new InvariantViolationError(`transfer ${transfer.sequence} moved ${transfer.quantity}`, {
        step,
        agentId: transfer.donorId,
        requestId: transfer.requestId,
        attempted: transfer.quantity
      });
    }
    perRequest.set(transfer.requestId, (perRequest.get(transfer.requestId) ?? 0) + transfer.quantity);
    perDonor.set(transfer.donorId, (perDonor.get(transfer.donorId) ?? 0) + transfer.quantity);
  });

  // Invariant 3: no overdonation
  requests.forEach(request => {
    const received = perRequest.get(request.id) ?? 0;
    if (received > request.quantity) {
      throw new InvariantViolationError(`request ${request.id} received ${received} of ${request.quantity}`, {
        step,
        agentId: request.agentId,
        requestId: request.id,
        attempted: received,
        limit: request.quantity
      });
    }
  });

  // Invariant 2: no overdraw
  perDonor.forEach((donated, donorId) => {
    const available = opening[donorId] ?? 0;
    if (donated > available) {
      throw new InvariantViolationError(`donor ${donorId} gave ${donated} from a balance of ${available}`, {
        step,
        agentId: donorId,
        attempted: donated,
        limit: available
      });
    }
  });
};
