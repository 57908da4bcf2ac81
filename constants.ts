import { StrategyKind } from './types';
import { type SimulationConfig, type SimulationConfigInput, validateConfig } from './services/configService';
import { InvalidConfigurationError } from './services/errors';

export const DEFAULT_SEED = 1337;

export const DEFAULT_POPULATION: SimulationConfigInput['population'] = {
  size: 50,
  initialBalance: { kind: 'uniform', min: 0, max: 20 },
  roles: { kind: 'probabilistic', donateProbability: 0.6, requestProbability: 0.7 }
};

export const DEFAULT_REQUESTS: NonNullable<SimulationConfigInput['requests']> = {
  requestRate: 0.4,
  quantity: { kind: 'uniform', min: 1, max: 6 },
  maxRequestsPerAgent: 1,
  carryOver: false
};

// --- EXPERIMENT PRESETS ---
// One per strategy, same population and demand, so runs are comparable.

export const EXPERIMENTS: Record<string, SimulationConfigInput> = {
  BASELINE: {
    population: DEFAULT_POPULATION,
    strategy: { kind: StrategyKind.MULTI_DONOR_SEQUENTIAL, donorOrder: 'registry' },
    requests: DEFAULT_REQUESTS,
    production: { kind: 'uniform', min: 0, max: 2 },
    consumption: 'fulfilled',
    seed: DEFAULT_SEED,
    steps: 100
  },
  SINGLE_DONOR: {
    population: DEFAULT_POPULATION,
    strategy: { kind: StrategyKind.SINGLE_DONOR, selection: 'largest-balance' },
    requests: DEFAULT_REQUESTS,
    production: { kind: 'uniform', min: 0, max: 2 },
    consumption: 'fulfilled',
    seed: DEFAULT_SEED,
    steps: 100
  },
  ROUND_ROBIN: {
    population: DEFAULT_POPULATION,
    strategy: { kind: StrategyKind.SINGLE_DONOR, selection: 'round-robin' },
    requests: DEFAULT_REQUESTS,
    production: { kind: 'uniform', min: 0, max: 2 },
    consumption: 'fulfilled',
    seed: DEFAULT_SEED,
    steps: 100
  },
  PROPORTIONAL: {
    population: DEFAULT_POPULATION,
    strategy: { kind: StrategyKind.MULTI_DONOR_PROPORTIONAL },
    requests: DEFAULT_REQUESTS,
    production: { kind: 'uniform', min: 0, max: 2 },
    consumption: 'fulfilled',
    seed: DEFAULT_SEED,
    steps: 100
  },
  // Scarcity: no production, unmet demand is carried over for up to 3 steps
  SCARCITY: {
    population: { ...DEFAULT_POPULATION, initialBalance: { kind: 'uniform', min: 0, max: 5 } },
    strategy: { kind: StrategyKind.MULTI_DONOR_SEQUENTIAL, donorOrder: 'largest-balance' },
    requests: { ...DEFAULT_REQUESTS, carryOver: true, maxCarrySteps: 3 },
    production: { kind: 'none' },
    consumption: 'fulfilled',
    seed: DEFAULT_SEED,
    steps: 60
  }
};

export const resolveExperiment = (
  experimentId: string,
  overrides: Partial<SimulationConfigInput> = {}
): SimulationConfig => {
  const preset = EXPERIMENTS[experimentId];
  if (!preset) {
    throw new InvalidConfigurationError(`Unknown experiment: ${experimentId}`, [
      `expected one of ${Object.keys(EXPERIMENTS).join(', ')}`
    ]);
  }
  return validateConfig({ ...preset, ...overrides });
};
