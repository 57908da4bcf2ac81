import { describe, it, expect } from 'vitest';
import { type AgentProfile, type Balances, type DonationOffer, type Request, StrategyKind } from '../types';
import {
  type DonationStrategy,
  createProportionalStrategy,
  createSequentialStrategy,
  createSingleDonorStrategy,
  resolveStrategy
} from './donationStrategies';
import { InvalidConfigurationError } from './errors';
import { DeterministicRNG } from './randomService';

const profile = (id: string, canDonate = true, canRequest = true): AgentProfile => ({ id, canDonate, canRequest });

const request = (id: string, agentId: string, quantity: number): Request => ({
  id,
  agentId,
  quantity,
  step: 1,
  carrySteps: 0
});

const context = (roster: AgentProfile[], step = 1) => ({ step, roster, rng: new DeterministicRNG(7) });

const summarize = (offers: DonationOffer[]) =>
  offers.map(offer => [offer.requestId, offer.donorId, offer.quantity]);

describe('createSequentialStrategy', () => {
  const sequential = createSequentialStrategy('registry');

  it('clamps the last donor to the need still open', () => {
    const roster = [profile('d0', true, false), profile('d1', true, false), profile('r', false, true)];
    const balances = { d0: 3, d1: 3, r: 0 };

    const offers = sequential(balances, [request('req', 'r', 5)], context(roster));

    expect(offers).toEqual([
      { sequence: 0, requestId: 'req', donorId: 'd0', recipientId: 'r', quantity: 3 },
      { sequence: 1, requestId: 'req', donorId: 'd1', recipientId: 'r', quantity: 2 }
    ]);
  });

  it('lets the single rich agent cover a request on its own', () => {
    const roster = [profile('agent_0'), profile('agent_1'), profile('agent_2')];
    const balances = { agent_0: 10, agent_1: 0, agent_2: 0 };

    const offers = sequential(balances, [request('req', 'agent_1', 7)], context(roster));

    expect(summarize(offers)).toEqual([['req', 'agent_0', 7]]);
  });

  it('reserves capacity across requests in list order', () => {
    const roster = [profile('d', true, false), profile('r1', false, true), profile('r2', false, true)];
    const balances = { d: 5, r1: 0, r2: 0 };

    const offers = sequential(balances, [request('R1', 'r1', 4), request('R2', 'r2', 4)], context(roster));

    expect(summarize(offers)).toEqual([
      ['R1', 'd', 4],
      ['R2', 'd', 1]
    ]);
  });

  it('never offers a requester its own balance', () => {
    const roster = [profile('a0'), profile('a1')];
    const offers = sequential({ a0: 10, a1: 2 }, [request('req', 'a0', 3)], context(roster));

    expect(summarize(offers)).toEqual([['req', 'a1', 2]]);
  });

  it('visits donors by remaining capacity under largest-balance ordering', () => {
    const roster = [profile('a0'), profile('a1'), profile('a2')];
    const offers = createSequentialStrategy('largest-balance')(
      { a0: 2, a1: 5, a2: 0 },
      [request('req', 'a2', 6)],
      context(roster)
    );

    expect(summarize(offers)).toEqual([
      ['req', 'a1', 5],
      ['req', 'a0', 1]
    ]);
  });

  it('reproduces a shuffled order from the same generator state', () => {
    const roster = ['a0', 'a1', 'a2', 'a3', 'a4'].map(id => profile(id));
    const balances = { a0: 2, a1: 2, a2: 2, a3: 2, a4: 0 };
    const requests = [request('req', 'a4', 5)];
    const shuffled = createSequentialStrategy('shuffled');

    const first = shuffled(balances, requests, context(roster));
    const second = shuffled(balances, requests, context(roster));

    expect(first).toEqual(second);
    expect(first.reduce((sum, offer) => sum + offer.quantity, 0)).toBe(5);
  });
});

describe('createSingleDonorStrategy', () => {
  it('picks the largest balance able to cover the request, earliest on ties', () => {
    const roster = [profile('a0'), profile('a1'), profile('a2'), profile('a3')];
    const balances = { a0: 4, a1: 9, a2: 9, a3: 0 };

    const offers = createSingleDonorStrategy('largest-balance')(
      balances,
      [request('R1', 'a3', 5), request('R2', 'a0', 5)],
      context(roster)
    );

    expect(summarize(offers)).toEqual([
      ['R1', 'a1', 5],
      ['R2', 'a2', 5]
    ]);
  });

  it('leaves a request unmatched when nobody can cover it in full', () => {
    const roster = [profile('a0'), profile('a1'), profile('a2')];
    const offers = createSingleDonorStrategy('largest-balance')(
      { a0: 3, a1: 3, a2: 0 },
      [request('req', 'a2', 5)],
      context(roster)
    );

    expect(offers).toEqual([]);
  });

  it('rotates donors from step mod donor count under round-robin', () => {
    const roster = [profile('a0'), profile('a1'), profile('a2'), profile('a3')];
    const balances = { a0: 10, a1: 10, a2: 10, a3: 0 };
    const requests = [request('R1', 'a3', 2), request('R2', 'a3', 2), request('R3', 'a3', 2)];

    const offers = createSingleDonorStrategy('round-robin')(balances, requests, context(roster, 1));

    expect(offers.map(offer => offer.donorId)).toEqual(['a1', 'a2', 'a0']);
  });
});

describe('createProportionalStrategy', () => {
  const proportional = createProportionalStrategy();

  it('splits by capacity and hands leftover units to the largest remainders', () => {
    const roster = [profile('d0', true, false), profile('d1', true, false), profile('d2', true, false), profile('r', false, true)];
    const balances = { d0: 6, d1: 3, d2: 1, r: 0 };

    const offers = proportional(balances, [request('req', 'r', 5)], context(roster));

    expect(summarize(offers)).toEqual([
      ['req', 'd0', 3],
      ['req', 'd1', 2]
    ]);
  });

  it('caps the split at the capacity available', () => {
    const roster = [profile('d0', true, false), profile('d1', true, false), profile('r', false, true)];
    const offers = proportional({ d0: 2, d1: 1, r: 0 }, [request('req', 'r', 10)], context(roster));

    expect(summarize(offers)).toEqual([
      ['req', 'd0', 2],
      ['req', 'd1', 1]
    ]);
  });

  it('shares what is left with later requests', () => {
    const roster = [profile('d0', true, false), profile('r1', false, true), profile('r2', false, true)];
    const offers = proportional(
      { d0: 4, r1: 0, r2: 0 },
      [request('R1', 'r1', 3), request('R2', 'r2', 3)],
      context(roster)
    );

    expect(summarize(offers)).toEqual([
      ['R1', 'd0', 3],
      ['R2', 'd0', 1]
    ]);
  });
});

describe('donor availability', () => {
  const strategies: Array<[string, DonationStrategy]> = [
    ['single-donor', createSingleDonorStrategy('largest-balance')],
    ['sequential', createSequentialStrategy('registry')],
    ['proportional', createProportionalStrategy()]
  ];

  it.each(strategies)('%s rejects requests when the population has no donors', (_name, strategy) => {
    const roster = [profile('a0', false, true), profile('a1', false, true)];
    expect(() => strategy({ a0: 5, a1: 5 }, [request('req', 'a0', 1)], context(roster))).toThrow(
      InvalidConfigurationError
    );
  });

  it.each(strategies)('%s offers nothing when donors hold nothing', (_name, strategy) => {
    const roster = [profile('a0'), profile('a1')];
    expect(strategy({ a0: 0, a1: 0 }, [request('req', 'a0', 2)], context(roster))).toEqual([]);
  });

  it.each(strategies)('%s stays within balances and needs on random populations', (_name, strategy) => {
    const rng = new DeterministicRNG(99);
    const roster = Array.from({ length: 12 }, (_, i) => profile(`a${i}`, i === 0 || rng.chance(0.7), true));
    const balances: Balances = Object.fromEntries(roster.map(agent => [agent.id, rng.rangeInt(0, 8)]));
    const requests = roster.map((agent, i) => request(`req_${i}`, agent.id, rng.rangeInt(1, 6)));

    const offers = strategy(balances, requests, context(roster));

    const byDonor = new Map<string, number>();
    const byRequest = new Map<string, number>();
    offers.forEach(offer => {
      expect(offer.donorId).not.toBe(offer.recipientId);
      expect(offer.quantity).toBeGreaterThan(0);
      byDonor.set(offer.donorId, (byDonor.get(offer.donorId) ?? 0) + offer.quantity);
      byRequest.set(offer.requestId, (byRequest.get(offer.requestId) ?? 0) + offer.quantity);
    });
    byDonor.forEach((given, donorId) => expect(given).toBeLessThanOrEqual(balances[donorId]));
    requests.forEach(req => expect(byRequest.get(req.id) ?? 0).toBeLessThanOrEqual(req.quantity));
  });
});

describe('resolveStrategy', () => {
  const roster = [profile('d0', true, false), profile('d1', true, false), profile('r', false, true)];
  const balances = { d0: 3, d1: 3, r: 0 };
  const requests = [request('req', 'r', 5)];

  it('resolves each configured variant', () => {
    const single = resolveStrategy({ kind: StrategyKind.SINGLE_DONOR, selection: 'largest-balance' });
    const sequential = resolveStrategy({ kind: StrategyKind.MULTI_DONOR_SEQUENTIAL, donorOrder: 'registry' });
    const proportional = resolveStrategy({ kind: StrategyKind.MULTI_DONOR_PROPORTIONAL });

    expect(single(balances, requests, context(roster))).toEqual([]);
    expect(summarize(sequential(balances, requests, context(roster)))).toEqual([
      ['req', 'd0', 3],
      ['req', 'd1', 2]
    ]);
    expect(summarize(proportional(balances, requests, context(roster)))).toEqual([
      ['req', 'd0', 3],
      ['req', 'd1', 2]
    ]);
  });
});
