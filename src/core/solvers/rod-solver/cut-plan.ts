// src/core/solvers/rod-solver/cut-plan.ts

import type { CuttingJob, Demand, PartInput, Rod } from '../../common/types';
import {
  formatPartsLabel,
  groupRodParts,
} from '../../math/rod-math/part-grouping';
import { pack } from './first-fit-decreasing';
import type { CutPlan, CutPlanStatistics, RodSummary } from './types';

/**
 * Raw part rows -> solver demands.
 * Every cut eats one blade width, so it is added to each part.
 */
export function toDemands(parts: PartInput[], cutWidth: number): Demand[] {
  return parts.map((part) => ({
    effectiveLength: part.rawLength + cutWidth,
    quantity: part.quantity,
  }));
}

function summarizeRod(rod: Rod): RodSummary {
  const groups = groupRodParts(rod.parts);
  return {
    rodId: rod.id,
    usedLength: rod.usedLength,
    leftover: rod.leftover,
    groups,
    partsLabel: formatPartsLabel(groups),
    infeasible: rod.leftover < 0,
  };
}

function computeStatistics(rods: Rod[], stockLength: number): CutPlanStatistics {
  let totalParts = 0;
  let totalUsedLength = 0;
  let totalLeftover = 0;

  rods.forEach((rod) => {
    totalParts += rod.parts.length;
    totalUsedLength += rod.usedLength;
    totalLeftover += rod.leftover;
  });

  const totalStockLength = rods.length * stockLength;

  return {
    totalParts,
    totalStockLength,
    totalUsedLength,
    totalLeftover,
    utilization: totalStockLength > 0 ? totalUsedLength / totalStockLength : 0,
  };
}

/**
 * Runs the packer on a validated job and builds the report rows.
 */
export function buildCutPlan(job: CuttingJob): CutPlan {
  const rods = pack(job.stockLength, toDemands(job.partList, job.cutWidth));
  const rows = rods.map(summarizeRod);

  return {
    stockLength: job.stockLength,
    cutWidth: job.cutWidth,
    rods,
    rows,
    totalRods: rows.length,
    infeasibleRodIds: rows.filter((row) => row.infeasible).map((row) => row.rodId),
    statistics: computeStatistics(rods, job.stockLength),
  };
}
