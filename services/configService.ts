import { z } from 'zod';
import { StrategyKind } from '../types';
import { InvalidConfigurationError } from './errors';

const QuantitySchema = z.number().int().nonnegative();
const ProbabilitySchema = z.number().min(0).max(1);

export const BalanceDistributionSchema = z.discriminatedUnion('kind', [
  z.object({ kind: z.literal('fixed'), quantity: QuantitySchema }),
  z.object({ kind: z.literal('uniform'), min: QuantitySchema, max: QuantitySchema }),
  z.object({ kind: z.literal('explicit'), balances: z.array(QuantitySchema) })
]);

export const RoleAssignmentSchema = z.discriminatedUnion('kind', [
  z.object({ kind: z.literal('universal') }),
  z.object({
    kind: z.literal('probabilistic'),
    donateProbability: ProbabilitySchema,
    requestProbability: ProbabilitySchema
  }),
  z.object({
    kind: z.literal('explicit'),
    roles: z.array(z.object({ canDonate: z.boolean(), canRequest: z.boolean() }))
  })
]);

export const PopulationConfigSchema = z.object({
  size: z.number().int().min(1),
  initialBalance: BalanceDistributionSchema.default({ kind: 'fixed', quantity: 10 }),
  roles: RoleAssignmentSchema.default({ kind: 'universal' })
});

export const RequestQuantitySchema = z.discriminatedUnion('kind', [
  z.object({ kind: z.literal('fixed'), quantity: z.number().int().positive() }),
  z.object({ kind: z.literal('uniform'), min: QuantitySchema, max: QuantitySchema }),
  // Requests whatever brings the agent's balance up to `target`
  z.object({ kind: z.literal('need-based'), target: QuantitySchema })
]);

export const RequestConfigSchema = z.object({
  requestRate: ProbabilitySchema.default(0.5),
  quantity: RequestQuantitySchema.default({ kind: 'uniform', min: 1, max: 5 }),
  maxRequestsPerAgent: z.number().int().min(1).default(1),
  carryOver: z.boolean().default(false),
  maxCarrySteps: z.number().int().min(1).optional()
});

export const StrategyConfigSchema = z.discriminatedUnion('kind', [
  z.object({
    kind: z.literal(StrategyKind.SINGLE_DONOR),
    selection: z.enum(['largest-balance', 'round-robin']).default('largest-balance')
  }),
  z.object({
    kind: z.literal(StrategyKind.MULTI_DONOR_SEQUENTIAL),
    donorOrder: z.enum(['registry', 'largest-balance', 'shuffled']).default('registry')
  }),
  z.object({ kind: z.literal(StrategyKind.MULTI_DONOR_PROPORTIONAL) })
]);

export const ProductionConfigSchema = z.discriminatedUnion('kind', [
  z.object({ kind: z.literal('none') }),
  z.object({ kind: z.literal('fixed'), quantity: QuantitySchema }),
  z.object({ kind: z.literal('uniform'), min: QuantitySchema, max: QuantitySchema })
]);

export const SimulationConfigSchema = z
  .object({
    population: PopulationConfigSchema,
    strategy: StrategyConfigSchema.default({ kind: StrategyKind.MULTI_DONOR_SEQUENTIAL }),
    requests: RequestConfigSchema.default({}),
    production: ProductionConfigSchema.default({ kind: 'none' }),
    consumption: z.enum(['none', 'fulfilled']).default('none'),
    seed: z.number().int().default(1337),
    steps: z.number().int().min(0).default(50)
  })
  .superRefine((config, ctx) => {
    const { population, requests, production } = config;

    const ranges: Array<[string[], { kind: string; min?: number; max?: number }]> = [
      [['population', 'initialBalance'], population.initialBalance],
      [['requests', 'quantity'], requests.quantity],
      [['production'], production]
    ];
    ranges.forEach(([path, range]) => {
      if (range.kind === 'uniform' && range.min !== undefined && range.max !== undefined && range.max < range.min) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, path, message: 'range max must be >= min' });
      }
    });

    if (population.initialBalance.kind === 'explicit' && population.initialBalance.balances.length !== population.size) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['population', 'initialBalance', 'balances'],
        message: `expected ${population.size} balances, got ${population.initialBalance.balances.length}`
      });
    }

    if (population.roles.kind === 'explicit' && population.roles.roles.length !== population.size) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['population', 'roles', 'roles'],
        message: `expected ${population.size} role entries, got ${population.roles.roles.length}`
      });
    }

    if (requests.requestRate > 0 && !canAnyAgent(population, 'canDonate') && canAnyAgent(population, 'canRequest')) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['population', 'roles'],
        message: 'requests can be generated but no agent is able to donate'
      });
    }
  });

export type BalanceDistribution = z.infer<typeof BalanceDistributionSchema>;
export type RoleAssignment = z.infer<typeof RoleAssignmentSchema>;
export type PopulationConfig = z.infer<typeof PopulationConfigSchema>;
export type RequestQuantity = z.infer<typeof RequestQuantitySchema>;
export type RequestConfig = z.infer<typeof RequestConfigSchema>;
export type StrategyConfig = z.infer<typeof StrategyConfigSchema>;
export type ProductionConfig = z.infer<typeof ProductionConfigSchema>;
export type ConsumptionPolicy = SimulationConfig['consumption'];
export type SimulationConfig = z.output<typeof SimulationConfigSchema>;
export type SimulationConfigInput = z.input<typeof SimulationConfigSchema>;

type RoleFlag = 'canDonate' | 'canRequest';

function canAnyAgent(population: PopulationConfig, flag: RoleFlag): boolean {
  const { roles } = population;
  switch (roles.kind) {
    case 'universal':
      return true;
    case 'probabilistic':
      return (flag === 'canDonate' ? roles.donateProbability : roles.requestProbability) > 0;
    case 'explicit':
      return roles.roles.some(role => role[flag]);
  }
}

/**
 * Parses untrusted configuration and applies defaults.
 * Throws InvalidConfigurationError before any step can run.
 */
export const validateConfig = (input: unknown): SimulationConfig => {
  const parsed = SimulationConfigSchema.safeParse(input);
  if (!parsed.success) {
    const issues = parsed.error.issues.map(issue => {
      const path = issue.path.join('.');
      return path ? `${path}: ${issue.message}` : issue.message;
    });
    throw new InvalidConfigurationError('Invalid simulation configuration', issues);
  }
  return parsed.data;
};
