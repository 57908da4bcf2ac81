import { type AgentId, type AgentProfile, type Balances, type DonationOffer, type Request, StrategyKind } from '../types';
import type { StrategyConfig } from './configService';
import { InvalidConfigurationError } from './errors';
import type { DeterministicRNG } from './randomService';

/**
 * DONATION STRATEGY ENGINE
 *
 * Every strategy has the same shape: (balances, requests) -> offers.
 * Strategies never touch balances. They reserve capacity on a private
 * offer book so no donor is offered away more than it holds, and every
 * offer is clamped to the need still open on its request.
 */

export interface StrategyContext {
  step: number;
  roster: readonly AgentProfile[];
  rng: DeterministicRNG;
}

export type DonationStrategy = (
  balances: Balances,
  requests: readonly Request[],
  context: StrategyContext
) => DonationOffer[];

class OfferBook {
  readonly offers: DonationOffer[] = [];
  private readonly capacity = new Map<AgentId, number>();

  constructor(balances: Balances, roster: readonly AgentProfile[]) {
    roster.forEach(agent => {
      if (agent.canDonate) this.capacity.set(agent.id, balances[agent.id] ?? 0);
    });
  }

  remaining(donorId: AgentId): number {
    return this.capacity.get(donorId) ?? 0;
  }

  // Donors that could give something to this request right now, in roster order
  eligible(roster: readonly AgentProfile[], request: Request): AgentProfile[] {
    return roster.filter(agent => agent.canDonate && agent.id !== request.agentId && this.remaining(agent.id) > 0);
  }

  offer(request: Request, donorId: AgentId, quantity: number): number {
    const granted = Math.min(quantity, this.remaining(donorId));
    if (granted <= 0) return 0;

    this.capacity.set(donorId, this.remaining(donorId) - granted);
    this.offers.push({
      sequence: this.offers.length,
      requestId: request.id,
      donorId,
      recipientId: request.agentId,
      quantity: granted
    });
    return granted;
  }
}

const assertDonorsExist = (roster: readonly AgentProfile[], requests: readonly Request[]) => {
  if (requests.length > 0 && !roster.some(agent => agent.canDonate)) {
    throw new InvalidConfigurationError(`Cannot match ${requests.length} outstanding request(s): the population has no donors`);
  }
};

// ==========================================
// SINGLE DONOR
// ==========================================

export type SingleDonorSelection = 'largest-balance' | 'round-robin';

/**
 * Each request goes to at most one donor able to cover it in full.
 *
 * - largest-balance: the donor with the most remaining capacity, ties
 *   resolved by registry order.
 * - round-robin: a cursor over the donor list starting at `step mod donors`,
 *   moving past each donor that is chosen.
 */
export const createSingleDonorStrategy = (selection: SingleDonorSelection): DonationStrategy =>
  (balances, requests, { step, roster }) => {
    assertDonorsExist(roster, requests);
    const book = new OfferBook(balances, roster);
    const donors = roster.filter(agent => agent.canDonate);
    let cursor = donors.length > 0 ? step % donors.length : 0;

    requests.forEach(request => {
      const covers = (agent: AgentProfile) =>
        agent.id !== request.agentId && book.remaining(agent.id) >= request.quantity;

      if (selection === 'largest-balance') {
        let chosen: AgentProfile | undefined;
        for (const agent of donors) {
          if (!covers(agent)) continue;
          if (!chosen || book.remaining(agent.id) > book.remaining(chosen.id)) chosen = agent;
        }
        if (chosen) book.offer(request, chosen.id, request.quantity);
        return;
      }

      for (let k = 0; k < donors.length; k++) {
        const index = (cursor + k) % donors.length;
        if (covers(donors[index])) {
          book.offer(request, donors[index].id, request.quantity);
          cursor = (index + 1) % donors.length;
          break;
        }
      }
    });

    return book.offers;
  };

// ==========================================
// MULTI DONOR: SEQUENTIAL
// ==========================================

export type DonorOrder = 'registry' | 'largest-balance' | 'shuffled';

/**
 * Walks donors in `order`, each giving min(its capacity, need still open).
 * The open need is recomputed from the offers already made before every
 * offer, the last one included, so a request is never offered more than
 * it asked for.
 */
export const createSequentialStrategy = (order: DonorOrder): DonationStrategy =>
  (balances, requests, { roster, rng }) => {
    assertDonorsExist(roster, requests);
    const book = new OfferBook(balances, roster);
    // One shuffle per step keeps the order stable across that step's requests
    const shuffled = order === 'shuffled' ? rng.shuffle([...roster]) : roster;

    requests.forEach(request => {
      let donors = book.eligible(shuffled, request);
      if (order === 'largest-balance') {
        donors = [...donors].sort((a, b) => book.remaining(b.id) - book.remaining(a.id));
      }

      let offered = 0;
      for (const donor of donors) {
        const openNeed = Math.max(0, request.quantity - offered);
        if (openNeed === 0) break;
        offered += book.offer(request, donor.id, Math.min(book.remaining(donor.id), openNeed));
      }
    });

    return book.offers;
  };

// ==========================================
// MULTI DONOR: PROPORTIONAL
// ==========================================

/**
 * Splits min(need, total capacity) across all eligible donors in proportion
 * to their remaining capacity. Whole units are assigned by largest remainder,
 * ties going to the earlier donor in registry order.
 */
export const createProportionalStrategy = (): DonationStrategy =>
  (balances, requests, { roster }) => {
    assertDonorsExist(roster, requests);
    const book = new OfferBook(balances, roster);

    requests.forEach(request => {
      const donors = book.eligible(roster, request);
      const totalCapacity = donors.reduce((sum, donor) => sum + book.remaining(donor.id), 0);
      const coverable = Math.min(request.quantity, totalCapacity);
      if (coverable <= 0) return;

      const shares = donors.map((donor, index) => {
        const weighted = coverable * book.remaining(donor.id);
        return {
          donor,
          index,
          units: Math.floor(weighted / totalCapacity),
          remainder: weighted % totalCapacity
        };
      });

      let leftover = coverable - shares.reduce((sum, share) => sum + share.units, 0);
      [...shares]
        .sort((a, b) => b.remainder - a.remainder || a.index - b.index)
        .forEach(share => {
          if (leftover > 0 && share.remainder > 0) {
            share.units++;
            leftover--;
          }
        });

      shares.forEach(share => {
        book.offer(request, share.donor.id, share.units);
      });
    });

    return book.offers;
  };

/**
 * Resolves the configured variant. The switch is exhaustive over
 * StrategyKind, so adding a variant fails to compile until it is handled here.
 */
export const resolveStrategy = (config: StrategyConfig): DonationStrategy => {
  switch (config.kind) {
    case StrategyKind.SINGLE_DONOR:
      return createSingleDonorStrategy(config.selection);
    case StrategyKind.MULTI_DONOR_SEQUENTIAL:
      return createSequentialStrategy(config.donorOrder);
    case StrategyKind.MULTI_DONOR_PROPORTIONAL:
      return createProportionalStrategy();
  }
};
