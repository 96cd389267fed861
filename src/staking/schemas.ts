import type { EndpointMetrics } from '../metrics.js';

export const UNLOCK_PERIOD_DAYS = 14;
export const PROJECTION_HORIZON_DAYS = 30;
export const DAY_SECONDS = 86_400;

export type EventKind = 'stake' | 'unstake';
export type Classification = EventKind | 'none';

export type StakeEvent = {
  readonly kind: 'stake';
  readonly address: string; // sender, lowercase
  readonly txHash: string;
  readonly blockNumber: number;
  readonly timestamp: number; // block time, unix seconds
  readonly selector: string;
  readonly amount: number; // tokens, >= 0
};

export type UnstakeEvent = Omit<StakeEvent, 'kind'> & {
  readonly kind: 'unstake';
  readonly maturesAt: number; // timestamp + unlock period
  readonly daysRemaining: number;
  readonly status: 'active' | 'expired';
};

export type StakingEvent = StakeEvent | UnstakeEvent;

export type BalanceSnapshot = {
  readonly rawBalance: string; // integer base units, decimal string
  readonly tokens: number;
  readonly percentOfSupply: number;
  readonly method: 'direct' | 'estimated';
  readonly verifiedAt: number; // unix seconds
};

export type Trend = 'strong_growth' | 'growth' | 'stable' | 'decline' | 'strong_decline';

export type WeeklyBucket = {
  readonly week: number; // 1 = oldest
  readonly stakeEvents: number;
  readonly unstakeEvents: number;
  readonly netEvents: number;
};

export type FlowSide = {
  readonly events: number;
  readonly uniqueAddresses: number;
  readonly amount: number;
  readonly dailyEvents: number;
  readonly dailyAmount: number;
};

export type FlowComparison = {
  readonly windowDays: number;
  readonly stake: FlowSide;
  readonly unstake: FlowSide;
  readonly net: { readonly events: number; readonly amount: number; readonly dailyAmount: number };
  readonly percentages: {
    readonly stakeEvents: number;
    readonly unstakeEvents: number;
    readonly stakeAmount: number;
    readonly unstakeAmount: number;
  };
  readonly trend: { readonly trend: Trend; readonly score: number; readonly netFlowPct: number };
  readonly weekly: readonly WeeklyBucket[];
};

export type HealthFactor = -1 | 0 | 1 | 2;
export type HealthGrade = 'excellent' | 'good' | 'moderate' | 'critical';

export type HealthAssessment = {
  readonly factors: readonly [HealthFactor, HealthFactor, HealthFactor, HealthFactor];
  readonly average: number;
  readonly grade: HealthGrade;
  readonly metrics: {
    readonly stakingSharePct: number;
    readonly unstakingIncidencePct: number;
    readonly stakingFlowPct: number;
    readonly netFlowPct: number;
  };
  readonly interpretation: {
    readonly stakingLevel: 'very_high' | 'high' | 'medium' | 'low';
    readonly flowBalance: 'positive' | 'negative' | 'balanced';
  };
};

export type PressureBucket = { readonly day: number; readonly amount: number; readonly count: number };
export type PressureIntensity = 'low' | 'moderate' | 'high' | 'critical';

export type ProjectionReport = {
  readonly horizonDays: number;
  readonly projectedStake: number;
  readonly projectedUnstake: number;
  readonly projectedNet: number;
  readonly projectedChangePct: number;
  readonly dailyGrowthRatePct: number;
  readonly pressure: {
    readonly total: number;
    readonly pctOfBalance: number;
    readonly intensity: PressureIntensity;
    readonly dailyAverage: number;
    readonly timeline: readonly PressureBucket[];
  };
  readonly risk: {
    readonly liquidity: 'low' | 'medium' | 'high';
    readonly growth: 'sustainable' | 'stable' | 'at_risk';
    readonly marketImpact: 'limited' | 'moderate' | 'significant';
  };
};

export type OverallStatus = 'excellent' | 'good' | 'stable' | 'attention' | 'critical';

export type ExecutiveSummary = {
  readonly status: OverallStatus;
  readonly keyMetrics: {
    readonly stakingShare: string;
    readonly netFlow: string;
    readonly trend: string;
    readonly sellingPressure: string;
  };
  readonly recommendations: readonly string[];
  readonly priorityActions: readonly string[];
  readonly nextReview: '24 hours' | '72 hours' | '7 days';
};

export type SideAnalysis<E extends StakingEvent> = {
  readonly events: readonly E[];
  readonly count: number;
  readonly uniqueAddresses: number;
  readonly totalAmount: number;
  readonly dailyAverageEvents: number;
  readonly dailyAverageAmount: number;
};

export type HealthReport = {
  readonly generatedAt: string;
  readonly executionMs: number;
  readonly contracts: { readonly staking: string; readonly token: string };
  readonly windowDays: number;
  readonly blockRange: { readonly from: number; readonly to: number; readonly step: number };
  readonly token: { readonly totalSupply: number; readonly decimals: number };
  readonly amountSource: { readonly resolver: string; readonly trusted: boolean };
  readonly balance: BalanceSnapshot;
  readonly staking: SideAnalysis<StakeEvent>;
  readonly unstaking: SideAnalysis<UnstakeEvent>;
  readonly flow: FlowComparison;
  readonly health: HealthAssessment;
  readonly projection: ProjectionReport;
  readonly summary: ExecutiveSummary;
  readonly diagnostics: {
    readonly blocksScanned: number;
    readonly blocksMissing: number;
    readonly droppedEvents: number;
    readonly weeklyMode: 'rescan' | 'timestamp';
    readonly invariantErrors: readonly string[];
    readonly rpc?: Readonly<Record<string, EndpointMetrics>>;
  };
};
