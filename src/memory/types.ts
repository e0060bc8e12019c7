// Six memory relations: episodes (what happened), beliefs (what is held true),
// skills (what can be done), goals, self-model entries and open hypotheses.
// Cross-entity links are ids only; they are resolved through the store.

export type EpisodeKind = 'action' | 'observation' | 'perception' | 'system';
export type BeliefStatus = 'proposed' | 'confirmed' | 'disputed' | 'retracted' | 'archived';
export type BeliefPolarity = 'positive' | 'negative';
export type GoalStatus = 'active' | 'blocked' | 'completed' | 'abandoned';
export type HypothesisStatus = 'open' | 'verified' | 'rejected';
export type MemoryEntityType = 'episode' | 'belief' | 'skill' | 'goal' | 'hypothesis';

export const EPISODE_KINDS: readonly EpisodeKind[] = ['action', 'observation', 'perception', 'system'];
export const BELIEF_STATUSES: readonly BeliefStatus[] = ['proposed', 'confirmed', 'disputed', 'retracted', 'archived'];
export const GOAL_STATUSES: readonly GoalStatus[] = ['active', 'blocked', 'completed', 'abandoned'];
export const TERMINAL_GOAL_STATUSES: readonly GoalStatus[] = ['completed', 'abandoned'];
export const MEMORY_ENTITY_TYPES: readonly MemoryEntityType[] = ['episode', 'belief', 'skill', 'goal', 'hypothesis'];

export type JsonValue =
  | string
  | number
  | boolean
  | null
  | JsonValue[]
  | { [key: string]: JsonValue };

// Outcome of a skill invocation reported inside an episode payload.
export interface SkillOutcome {
  name: string;
  succeeded: boolean;
  failureMode?: string;
  steps?: string[];
  preconditions?: string[];
}

export interface EpisodePayload {
  text: string;
  fields?: Record<string, JsonValue>;
  verified?: boolean;  // Explicit ground truth: claims mined from it may reach confidence 1
  skill?: SkillOutcome;
}

export interface Episode {
  id: number;
  kind: EpisodeKind;
  payload: EpisodePayload | null;  // null once pruned
  salience: number;
  initialSalience: number;
  contentHash: string;
  goalId?: string;
  timestamp: Date;
  createdAt: Date;
  updatedAt: Date;
  prunedAt?: Date;
}

export interface AppendEpisodeOptions {
  salience?: number;
  timestamp?: Date;
  goalId?: string;
}

export interface EvidenceRecord {
  episodeId: number;
  contentHash: string;
  timestamp: Date;
  pruned: boolean;
}

export interface Belief {
  id: string;
  statement: string;
  subject: string;
  polarity: BeliefPolarity;
  value?: string;
  confidence: number;
  status: BeliefStatus;
  verified: boolean;
  evidenceIds: number[];
  conflictsWithIds: string[];
  lastConfirmedAt?: Date;
  createdAt: Date;
  updatedAt: Date;
}

export interface Skill {
  id: string;
  name: string;
  preconditions: string[];
  steps: string[];
  failureModes: string[];
  successRate: number;
  attempts: number;
  successes: number;
  successRateHistory: number[];
  evidenceIds: number[];
  lastUsed?: Date;
  createdAt: Date;
  updatedAt: Date;
}

export interface Goal {
  id: string;
  description: string;
  status: GoalStatus;
  priority: number;
  progress: number;
  deadline?: Date;
  createdAt: Date;
  updatedAt: Date;
}

export interface CreateGoalInput {
  description: string;
  priority?: number;
  deadline?: Date;
  status?: GoalStatus;
}

export interface SelfModelEntry {
  capability: string;
  reliabilityScore: number;
  limitations: string[];
  updatedAt: Date;
}

export interface Hypothesis {
  id: string;
  claim: string;
  verificationPlan: string;
  confidence: number;
  status: HypothesisStatus;
  evidenceIds: number[];
  riskIfWrong: string;
  promotedBeliefId?: string;
  createdAt: Date;
  updatedAt: Date;
}

export interface RegisterHypothesisInput {
  claim: string;
  verificationPlan: string;
  confidence?: number;
  evidenceIds?: number[];
  riskIfWrong?: string;
}

export interface Watermark {
  value: number;
  updatedAt?: Date;
}

export interface StoredEmbedding {
  entityType: MemoryEntityType;
  entityId: string;
  vector: Float32Array;
}

export interface ConsolidationReport {
  runId: string;
  priorWatermark: number;
  watermark: number;
  episodesProcessed: number;
  beliefsCreated: number;
  beliefsUpdated: number;
  beliefsDisputed: number;
  beliefsRetracted: number;
  beliefsArchived: number;
  skillsUpdated: number;
  hypothesesPromoted: number;
  episodesPruned: number;
  startedAt: Date;
  finishedAt: Date;
}

// The single mutation path for beliefs, skills and episode retention.
export interface ConsolidationBatch {
  priorWatermark: number;
  watermark: number;
  beliefUpserts: Belief[];
  skillUpserts: Skill[];
  selfModelUpserts: SelfModelEntry[];
  hypothesisPromotions: Array<{ hypothesisId: string; beliefId: string }>;
  salienceUpdates: Array<{ episodeId: number; salience: number }>;
  prunes: number[];
  embeddings: StoredEmbedding[];
  report?: ConsolidationReport;
}

export interface ConsolidationCommit {
  watermark: number;
  beliefsWritten: number;
  skillsWritten: number;
  episodesPruned: number;
}

export interface MemoryStats {
  episodeCount: number;
  prunedEpisodeCount: number;
  beliefCounts: Record<BeliefStatus, number>;
  skillCount: number;
  goalCount: number;
  hypothesisCount: number;
  watermark: number;
  lastRunAt?: Date;
}
