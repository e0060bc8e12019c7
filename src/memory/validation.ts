import { z } from 'zod';
import { ValidationError } from './errors.js';
import type { JsonValue } from './types.js';

const unit = z.number().min(0).max(1);

const JsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([
    z.string(),
    z.number(),
    z.boolean(),
    z.null(),
    z.array(JsonValueSchema),
    z.record(JsonValueSchema),
  ])
);

export const SkillOutcomeSchema = z.object({
  name: z.string().trim().min(1),
  succeeded: z.boolean(),
  failureMode: z.string().min(1).optional(),
  steps: z.array(z.string()).optional(),
  preconditions: z.array(z.string()).optional(),
});

export const EpisodePayloadSchema = z.object({
  text: z.string(),
  fields: z.record(JsonValueSchema).optional(),
  verified: z.boolean().optional(),
  skill: SkillOutcomeSchema.optional(),
});

export const EpisodeKindSchema = z.enum(['action', 'observation', 'perception', 'system']);

export const AppendEpisodeOptionsSchema = z.object({
  salience: z.number().min(0).finite().optional(),
  timestamp: z.date().optional(),
  goalId: z.string().min(1).optional(),
});

export const BeliefSchema = z
  .object({
    id: z.string().min(1),
    statement: z.string().min(1),
    subject: z.string().min(1),
    polarity: z.enum(['positive', 'negative']),
    value: z.string().optional(),
    confidence: unit,
    status: z.enum(['proposed', 'confirmed', 'disputed', 'retracted', 'archived']),
    verified: z.boolean(),
    evidenceIds: z.array(z.number().int().positive()),
    conflictsWithIds: z.array(z.string().min(1)),
  })
  .passthrough()
  .refine((b) => b.verified || b.status !== 'proposed' || b.confidence < 1, {
    message: 'unverified proposed belief must have confidence below 1',
  })
  .refine((b) => !b.conflictsWithIds.includes(b.id), {
    message: 'belief cannot conflict with itself',
  });

export const SkillSchema = z
  .object({
    id: z.string().min(1),
    name: z.string().min(1),
    successRate: unit,
    attempts: z.number().int().min(0),
    successes: z.number().int().min(0),
    successRateHistory: z.array(unit),
  })
  .passthrough()
  .refine((s) => s.successes <= s.attempts, { message: 'successes cannot exceed attempts' });

export const SelfModelEntrySchema = z
  .object({
    capability: z.string().min(1),
    reliabilityScore: unit,
    limitations: z.array(z.string()),
  })
  .passthrough();

export const CreateGoalSchema = z.object({
  description: z.string().trim().min(1),
  priority: z.number().int().min(0).max(10).optional(),
  deadline: z.date().optional(),
  status: z.enum(['active', 'blocked']).optional(),
});

export const GoalProgressSchema = z.object({
  progress: unit,
  status: z.enum(['active', 'blocked', 'completed', 'abandoned']).optional(),
});

export const RegisterHypothesisSchema = z.object({
  claim: z.string().trim().min(1),
  verificationPlan: z.string().trim().min(1),
  confidence: z.number().min(0).max(1).refine((c) => c < 1, 'open hypothesis confidence must be below 1').optional(),
  evidenceIds: z.array(z.number().int().positive()).optional(),
  riskIfWrong: z.string().optional(),
});

export function validate<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, input: unknown, what: string): T {
  const result = schema.safeParse(input);
  if (!result.success) {
    throw new ValidationError(
      `Invalid ${what}`,
      result.error.issues.map((issue) =>
        issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message
      )
    );
  }
  return result.data;
}
