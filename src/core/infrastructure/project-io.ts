// src/core/infrastructure/project-io.ts
import { z } from 'zod';
import type { CuttingJob } from '../common/types';
import { PROJECT_FILE_VERSION } from '../common/constants';
import { CutPlanValidationError } from '../common/errors';
import { cuttingJobSchema, formatIssues, parseCuttingJob } from './input-schema';

// Saved inputs only; results are always recalculated
const projectFileSchema = cuttingJobSchema.extend({
  version: z.string(),
  date: z.string().optional(),
});

export interface ProjectFile extends CuttingJob {
  version: string;
  date: string;
}

export function serializeProject(job: CuttingJob, now: Date = new Date()): string {
  const projectData: ProjectFile = {
    version: PROJECT_FILE_VERSION,
    date: now.toISOString(),
    stockLength: job.stockLength,
    cutWidth: job.cutWidth,
    partList: job.partList,
  };
  return JSON.stringify(projectData, null, 2);
}

export function parseProject(content: string): CuttingJob {
  let raw: unknown;
  try {
    raw = JSON.parse(content);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new CutPlanValidationError('Project file is not valid JSON', [reason]);
  }

  const parsed = projectFileSchema.safeParse(raw);
  if (!parsed.success) {
    throw new CutPlanValidationError(
      'Invalid project file',
      formatIssues(parsed.error)
    );
  }

  return parseCuttingJob(parsed.data);
}

