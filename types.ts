export type AgentId = string;

export enum StrategyKind {
  SINGLE_DONOR = 'single-donor',
  MULTI_DONOR_SEQUENTIAL = 'multi-donor-sequential',
  MULTI_DONOR_PROPORTIONAL = 'multi-donor-proportional'
}

export interface AgentProfile {
  id: AgentId;
  canDonate: boolean;
  canRequest: boolean;
}

// Base structure for any participant in the gift economy
export interface Agent extends AgentProfile {
  balance: number;
}

export type AgentRoles = Pick<AgentProfile, 'canDonate' | 'canRequest'>;

export type Balances = Readonly<Record<AgentId, number>>;

export interface Request {
  id: string;
  agentId: AgentId;
  quantity: number;
  step: number;
  carriedFrom?: string; // Set when the request continues an unmet residual
  carrySteps: number;
}

// A proposed transfer, before execution clamping
export interface DonationOffer {
  sequence: number;
  requestId: string;
  donorId: AgentId;
  recipientId: AgentId;
  quantity: number;
}

// The authoritative record of resource movement
export interface Transfer {
  sequence: number;
  requestId: string;
  donorId: AgentId;
  recipientId: AgentId;
  quantity: number;
}

export interface RequestOutcome {
  request: Request;
  fulfilled: number;
  unmet: number;
}

export interface AuditReport {
  giniCoefficient: number;
  concentrationIndex: number;
  distributionIndex: number;
  decentralizationIndex: number;
  fulfilmentRatio: number;
  // Share of held units sitting idle with donors
  idlingCapacity: number;
  alerts: string[];
  systemStatus: 'NORMAL' | 'WARNING';
}

export interface StepTotals {
  totalRequested: number;
  totalDonated: number;
  totalUnmet: number;
  totalProduced: number;
  totalConsumed: number;
  waste: number;
}

export interface SimulationState extends StepTotals {
  step: number;
  roster: readonly AgentProfile[];
  balances: Balances;
  requests: readonly Request[];
  offers: readonly DonationOffer[];
  transfers: readonly Transfer[];
  outcomes: readonly RequestOutcome[];
  unmetRequests: readonly Request[];
  // Waste is idle donor capacity until a fuller definition exists
  wasteIsProvisional: true;
  audit: AuditReport;
  log: readonly string[];
  // DETERMINISM CONTRACT: the PRNG state travels with the snapshot,
  // so replaying a step from this state yields identical results.
  rngState: number;
}

export interface TrajectoryRow {
  step: number;
  balances: Record<AgentId, number>;
  totalRequested: number;
  totalDonated: number;
  totalUnmet: number;
  totalProduced: number;
  totalConsumed: number;
  waste: number;
  totalBalance: number;
}
