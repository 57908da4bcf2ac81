export { StrategyKind } from './types';
export type {
  Agent,
  AgentId,
  AgentProfile,
  AuditReport,
  Balances,
  DonationOffer,
  Request,
  RequestOutcome,
  SimulationState,
  StepTotals,
  Transfer,
  TrajectoryRow
} from './types';

export { EXPERIMENTS, resolveExperiment } from './constants';
export { AgentRegistry } from './services/agentRegistry';
export { executeOffers } from './services/allocationService';
export type { AllocationResult } from './services/allocationService';
export { runAudit, calculateGini, calculateConcentrationIndex, calculateDistributionIndex } from './services/auditService';
export { SimulationConfigSchema, validateConfig } from './services/configService';
export type { SimulationConfig, SimulationConfigInput, StrategyConfig } from './services/configService';
export {
  createProportionalStrategy,
  createSequentialStrategy,
  createSingleDonorStrategy,
  resolveStrategy
} from './services/donationStrategies';
export type { DonationStrategy, StrategyContext } from './services/donationStrategies';
export {
  InsufficientBalanceError,
  InvalidConfigurationError,
  InvariantViolationError,
  SimulationError,
  UnknownAgentError
} from './services/errors';
export { DeterministicRNG } from './services/randomService';
export { generateRequests } from './services/requestGenerator';
export { Trajectory, toRow } from './services/stateRecorder';
export { initializeSimulation, iterateSimulation, runSimulation, runStep } from './services/simulationEngine';
