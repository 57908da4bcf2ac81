import type { AgentId, DonationOffer, Request, RequestOutcome, Transfer } from '../types';
import type { AgentRegistry } from './agentRegistry';
import { InvariantViolationError, UnknownAgentError } from './errors';

export interface AllocationResult {
  transfers: Transfer[];
  outcomes: RequestOutcome[];
  donatedBy: Map<AgentId, number>;
  clippedOffers: number;
}

/**
 * ALLOCATION EXECUTOR
 *
 * Applies offers strictly in sequence order. Each executed quantity is
 * min(offer, donor remaining, request remaining), so neither a request's
 * total nor a donor's total for the step can exceed its starting figure,
 * whatever the strategy proposed. Residual need is reported, never retried.
 */
export const executeOffers = (
  registry: AgentRegistry,
  requests: readonly Request[],
  offers: readonly DonationOffer[],
  step: number
): AllocationResult => {
  const requestsById = new Map<string, Request>();
  const requestRemaining = new Map<string, number>();
  requests.forEach(request => {
    requestsById.set(request.id, request);
    requestRemaining.set(request.id, request.quantity);
  });

  // Donor capacity is fixed at the balance held when the window opens;
  // anything a donor receives mid-step is not re-donated.
  const opening = registry.snapshot();
  const donorRemaining = new Map<AgentId, number>();
  const donatedBy = new Map<AgentId, number>();
  const transfers: Transfer[] = [];
  let clippedOffers = 0;

  const ordered = [...offers].sort((a, b) => a.sequence - b.sequence);

  for (const offer of ordered) {
    const request = requestsById.get(offer.requestId);
    if (!request) {
      throw new InvariantViolationError(`offer ${offer.sequence} references unknown request ${offer.requestId}`, {
        step,
        agentId: offer.donorId,
        requestId: offer.requestId,
        attempted: offer.quantity
      });
    }
    if (offer.recipientId !== request.agentId || offer.donorId === request.agentId) {
      throw new InvariantViolationError(
        `offer ${offer.sequence} routes ${offer.donorId} -> ${offer.recipientId} for a request owned by ${request.agentId}`,
        { step, agentId: offer.donorId, requestId: request.id, attempted: offer.quantity }
      );
    }
    if (!Number.isInteger(offer.quantity) || offer.quantity < 0) {
      throw new InvariantViolationError(`offer ${offer.sequence} has invalid quantity ${offer.quantity}`, {
        step,
        agentId: offer.donorId,
        requestId: request.id,
        attempted: offer.quantity
      });
    }

    if (!donorRemaining.has(offer.donorId)) {
      if (!registry.has(offer.donorId)) throw new UnknownAgentError(offer.donorId);
      donorRemaining.set(offer.donorId, opening[offer.donorId] ?? 0);
    }
    const donorLeft = donorRemaining.get(offer.donorId) ?? 0;
    const needLeft = requestRemaining.get(request.id) ?? 0;
    const executed = Math.min(offer.quantity, donorLeft, needLeft);

    if (executed < offer.quantity) {
      clippedOffers++;
      console.warn(
        `Step ${step}: offer ${offer.sequence} from ${offer.donorId} clipped from ${offer.quantity} to ${executed} ` +
          `(donor left ${donorLeft}, need left ${needLeft})`
      );
    }
    if (executed <= 0) continue;

    registry.transfer(offer.donorId, request.agentId, executed);
    donorRemaining.set(offer.donorId, donorLeft - executed);
    requestRemaining.set(request.id, needLeft - executed);
    donatedBy.set(offer.donorId, (donatedBy.get(offer.donorId) ?? 0) + executed);

    transfers.push({
      sequence: offer.sequence,
      requestId: request.id,
      donorId: offer.donorId,
      recipientId: request.agentId,
      quantity: executed
    });
  }

  const outcomes: RequestOutcome[] = requests.map(request => {
    const unmet = requestRemaining.get(request.id) ?? 0;
    return { request, fulfilled: request.quantity - unmet, unmet };
  });

  return { transfers, outcomes, donatedBy, clippedOffers };
};
