import { invalidArgumentError } from '@skillrank/common';
import { z } from 'zod';

const idSchema = z.string().trim().min(1).max(256);

const yearsSchema = z.number().finite().min(0);

/** Upper bound for years supplied by the caller; years read from text are not capped */
const inputYearsSchema = yearsSchema.max(80);

const embeddingSchema = z.array(z.number().finite()).min(1).max(8192);

const skillListSchema = z.array(z.string().min(1)).max(500);

export const CandidateInputSchema = z.object({
  id: idSchema,
  text: z.string().max(100_000),
  experienceYears: inputYearsSchema.optional()
});

export const TargetInputSchema = z.object({
  id: idSchema,
  text: z.string().max(50_000),
  requiredExperienceYears: inputYearsSchema.optional()
});

export const CandidateProfileSchema = z.object({
  id: idSchema,
  skills: skillListSchema,
  experienceYears: yearsSchema,
  embedding: embeddingSchema
});

export const TargetProfileSchema = z.object({
  id: idSchema,
  requiredSkills: skillListSchema,
  preferredSkills: skillListSchema.optional(),
  requiredExperienceYears: yearsSchema.optional(),
  embedding: embeddingSchema
});

export const ScoringWeightsOverrideSchema = z
  .object({
    skillMatch: z.number().finite().min(0),
    semanticSimilarity: z.number().finite().min(0),
    experience: z.number().finite().min(0)
  })
  .partial();

export type CandidateInput = z.infer<typeof CandidateInputSchema>;
export type TargetInput = z.infer<typeof TargetInputSchema>;
export type ScoringWeightsOverride = z.infer<typeof ScoringWeightsOverrideSchema>;

/**
 * Parses a value or throws invalid_argument carrying the zod issues.
 */
export function parseOrThrow<T extends z.ZodTypeAny>(schema: T, value: unknown, label: string): z.output<T> {
  const parsed = schema.safeParse(value);
  if (!parsed.success) {
    throw invalidArgumentError(`Invalid ${label}`, {
      issues: parsed.error.issues.map((issue) => ({
        path: issue.path.join('.'),
        message: issue.message
      }))
    });
  }

  return parsed.data;
}
