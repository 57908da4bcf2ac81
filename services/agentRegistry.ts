import type { Agent, AgentId, AgentProfile, Balances } from '../types';
import { InsufficientBalanceError, UnknownAgentError } from './errors';

/**
 * AGENT REGISTRY
 *
 * Owns the mutable balances for one step. Every balance change goes through
 * applyDelta; the rest of the engine sees frozen snapshots only.
 * A registry is always built from a copy, so snapshots never alias across steps.
 */
export class AgentRegistry {
  private readonly agentsById = new Map<AgentId, Agent>();
  private deltaCount = 0;

  constructor(agents: readonly Agent[]) {
    agents.forEach(agent => {
      this.agentsById.set(agent.id, { ...agent });
    });
  }

  static fromSnapshot(roster: readonly AgentProfile[], balances: Balances): AgentRegistry {
    return new AgentRegistry(roster.map(profile => ({ ...profile, balance: balances[profile.id] ?? 0 })));
  }

  /**
   * Number of deltas applied since construction.
   */
  get version(): number {
    return this.deltaCount;
  }

  has(agentId: AgentId): boolean {
    return this.agentsById.has(agentId);
  }

  getAgent(agentId: AgentId): Readonly<Agent> {
    const agent = this.agentsById.get(agentId);
    if (!agent) throw new UnknownAgentError(agentId);
    return agent;
  }

  getBalance(agentId: AgentId): number {
    return this.getAgent(agentId).balance;
  }

  // Registry (insertion) order is the tie-breaker everywhere in the engine.
  agents(): Readonly<Agent>[] {
    return Array.from(this.agentsById.values());
  }

  roster(): AgentProfile[] {
    return this.agents().map(({ id, canDonate, canRequest }) => ({ id, canDonate, canRequest }));
  }

  applyDelta(agentId: AgentId, delta: number): number {
    const agent = this.agentsById.get(agentId);
    if (!agent) throw new UnknownAgentError(agentId);

    // HARD CONSTRAINT: discrete resources, no overdrafts
    if (!Number.isInteger(delta)) {
      throw new RangeError(`Delta for ${agentId} must be a whole number of units, got ${delta}`);
    }
    if (agent.balance + delta < 0) {
      throw new InsufficientBalanceError(agentId, agent.balance, delta);
    }

    agent.balance += delta;
    this.deltaCount++;
    return agent.balance;
  }

  /**
   * Moves resources between two agents. The debit is applied first so a
   * failed debit leaves both balances untouched.
   */
  transfer(fromId: AgentId, toId: AgentId, quantity: number): void {
    if (!this.has(toId)) throw new UnknownAgentError(toId);
    this.applyDelta(fromId, -quantity);
    this.applyDelta(toId, quantity);
  }

  total(): number {
    let sum = 0;
    this.agentsById.forEach(agent => {
      sum += agent.balance;
    });
    return sum;
  }

  snapshot(): Balances {
    const balances: Record<AgentId, number> = {};
    this.agentsById.forEach(agent => {
      balances[agent.id] = agent.balance;
    });
    return Object.freeze(balances);
  }
}
