// src/core/infrastructure/input-schema.ts
import { z } from 'zod';
import { v4 as uuidv4 } from 'uuid';
import type { CuttingJob } from '../common/types';
import { CutPlanValidationError } from '../common/errors';

export const partInputSchema = z.object({
  id: z.string().min(1).optional(),
  rawLength: z
    .number()
    .finite()
    .positive('Part length must be greater than 0'),
  quantity: z
    .number()
    .int('Quantity must be a whole number')
    .min(1, 'Quantity must be at least 1'),
});

export const cuttingJobSchema = z.object({
  stockLength: z
    .number()
    .finite()
    .positive('Stock length must be greater than 0'),
  cutWidth: z.number().finite().min(0, 'Cut width cannot be negative'),
  partList: z.array(partInputSchema),
});

export function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) =>
    issue.path.length > 0
      ? `${issue.path.join('.')}: ${issue.message}`
      : issue.message
  );
}

/**
 * Validates user input before it reaches the solver.
 * Rows without an id get a fresh one.
 */
export function parseCuttingJob(input: unknown): CuttingJob {
  const parsed = cuttingJobSchema.safeParse(input);
  if (!parsed.success) {
    throw new CutPlanValidationError(
      'Invalid cutting job',
      formatIssues(parsed.error)
    );
  }

  const { stockLength, cutWidth, partList } = parsed.data;
  return {
    stockLength,
    cutWidth,
    partList: partList.map((part) => ({
      id: part.id ?? uuidv4(),
      rawLength: part.rawLength,
      quantity: part.quantity,
    })),
  };
}
