// src/core/solvers/rod-solver/index.ts

/**
 * Rod Solver Module
 *
 * 1D cutting stock with First-Fit-Decreasing:
 * - Expands part demands into single parts
 * - Sorts longest first (stable)
 * - Places each part into the first rod with enough leftover
 * - Summarizes every rod for tables and reports
 */

export {
  FirstFitDecreasingSolver,
  pack,
  expandDemands,
  sortDecreasing,
} from './first-fit-decreasing';

export { buildCutPlan, toDemands } from './cut-plan';

export type { CutPlan, CutPlanStatistics, RodSummary } from './types';
