// src/core/solvers/rod-solver/types.ts

import type { PartGroup, Rod } from '../../common/types';

/**
 * One result row: a rod with its parts counted.
 */
export interface RodSummary {
  rodId: number;
  usedLength: number;
  leftover: number;
  groups: PartGroup[];
  partsLabel: string; // "3 × 1002, 1 × 502"
  infeasible: boolean; // A single part exceeds the stock length
}

/**
 * Statistics about the cutting result
 */
export interface CutPlanStatistics {
  totalParts: number;
  totalStockLength: number; // rods × stockLength
  totalUsedLength: number;
  totalLeftover: number;
  utilization: number; // totalUsedLength / totalStockLength
}

/**
 * Result of one calculation. Read-only once built.
 */
export interface CutPlan {
  stockLength: number;
  cutWidth: number;
  rods: Rod[];
  rows: RodSummary[];
  totalRods: number;
  infeasibleRodIds: number[];
  statistics: CutPlanStatistics;
}
