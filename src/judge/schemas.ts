import { z } from 'zod';

export const verdictStatusSchema = z.enum(['COMPLETED', 'NOT_COMPLETED', 'UNCERTAIN']);
export type VerdictStatus = z.infer<typeof verdictStatusSchema>;

export const verdictSchema = z.object({
  results: z.array(z.object({
    task: z.string(),
    status: verdictStatusSchema,
    evidence: z.string().default(''),
  })),
  summary: z.string().default(''),
  all_completed: z.boolean().optional(),
});
export type Verdict = z.infer<typeof verdictSchema>;

export const fixProposalSchema = z.object({
  issue_identified: z.string().default(''),
  root_cause: z.string().default(''),
  file_to_fix: z.string().nullable().optional(),
  line_number: z.number().int().nullable().optional(),
  original_code: z.string().default(''),
  fixed_code: z.string().default(''),
  confidence: z.number().min(0).max(1),
  explanation: z.string().default(''),
});
export type FixProposal = z.infer<typeof fixProposalSchema>;

export const comparisonSchema = z.object({
  matches: z.boolean(),
  similarity_score: z.number().min(0).max(1),
  differences: z.array(z.string()).default([]),
  analysis: z.string().default(''),
  suggested_fixes: z.array(z.string()).default([]),
});
export type Comparison = z.infer<typeof comparisonSchema>;

const lowercase = (value: unknown): unknown => (typeof value === 'string' ? value.trim().toLowerCase() : value);

export const captureStatusSchema = z.preprocess(lowercase, z.enum(['pass', 'fail', 'uncertain']));
export type CaptureStatus = z.infer<typeof captureStatusSchema>;

export const overallStatusSchema = z.preprocess(lowercase, z.enum(['pass', 'fail', 'partial']));
export type OverallStatus = z.infer<typeof overallStatusSchema>;

export const batchVerdictSchema = z.object({
  summary: z.object({
    total: z.number().int().nonnegative(),
    passed: z.number().int().nonnegative(),
    failed: z.number().int().nonnegative(),
    uncertain: z.number().int().nonnegative(),
    overall_status: overallStatusSchema,
    issues: z.array(z.string()).default([]),
  }),
  details: z.array(z.object({
    image_index: z.number().int().positive(),
    status: captureStatusSchema,
    evidence: z.string().default(''),
    task_items_verified: z.array(z.string()).default([]),
    issues: z.array(z.string()).default([]),
  })).default([]),
  recommendation: z.string().default(''),
});
export type BatchVerdict = z.infer<typeof batchVerdictSchema>;
