import type { AgentId } from '../types';

export type SimulationErrorCode =
  | 'INVALID_CONFIGURATION'
  | 'INSUFFICIENT_BALANCE'
  | 'INVARIANT_VIOLATION'
  | 'UNKNOWN_AGENT';

export class SimulationError extends Error {
  constructor(readonly code: SimulationErrorCode, message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/**
 * Bad parameter ranges. Always raised before the first step executes.
 */
export class InvalidConfigurationError extends SimulationError {
  constructor(message: string, readonly issues: string[] = []) {
    super('INVALID_CONFIGURATION', issues.length > 0 ? `${message}: ${issues.join('; ')}` : message);
  }
}

export class UnknownAgentError extends SimulationError {
  constructor(readonly agentId: AgentId) {
    super('UNKNOWN_AGENT', `Unknown agent: ${agentId}`);
  }
}

/**
 * A delta would drive a balance negative. Surfacing from a step means a
 * strategy/executor contract was broken, so the run aborts.
 */
export class InsufficientBalanceError extends SimulationError {
  constructor(readonly agentId: AgentId, readonly balance: number, readonly delta: number) {
    super('INSUFFICIENT_BALANCE', `Agent ${agentId} cannot apply delta ${delta} to balance ${balance}`);
  }
}

export interface ViolationContext {
  step: number;
  agentId?: AgentId;
  requestId?: string;
  attempted?: number;
  limit?: number;
}

export class InvariantViolationError extends SimulationError {
  constructor(message: string, readonly context: ViolationContext) {
    super('INVARIANT_VIOLATION', `INVARIANT VIOLATION at step ${context.step}: ${message}`);
  }
}
