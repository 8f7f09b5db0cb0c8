// src/core/solvers/rod-solver/first-fit-decreasing.ts

import type { Demand, PartInstance, Rod } from '../../common/types';

/**
 * One instance per unit of quantity, in demand order.
 */
export function expandDemands(demands: Demand[]): PartInstance[] {
  const parts: PartInstance[] = [];

  demands.forEach((demand, typeIndex) => {
    for (let i = 0; i < demand.quantity; i++) {
      parts.push({ length: demand.effectiveLength, typeIndex });
    }
  });

  return parts;
}

/**
 * Longest first. Array.prototype.sort is stable, so equal lengths
 * keep their expansion order.
 */
export function sortDecreasing(parts: PartInstance[]): PartInstance[] {
  return [...parts].sort((a, b) => b.length - a.length);
}

/**
 * First-Fit-Decreasing for 1D cutting stock.
 *
 * Every part goes into the first rod (in creation order) that still has
 * enough leftover. A new rod is opened only when none fits. A part longer
 * than the stock still gets a rod of its own, with a negative leftover.
 *
 * Usage:
 * ```typescript
 * const solver = new FirstFitDecreasingSolver(5000);
 * const rods = solver.solve([{ effectiveLength: 1002, quantity: 3 }]);
 * ```
 */
export class FirstFitDecreasingSolver {
  private stockLength: number;

  constructor(stockLength: number) {
    this.stockLength = stockLength;
  }

  public solve(demands: Demand[]): Rod[] {
    const rods: Rod[] = [];
    const queue = sortDecreasing(expandDemands(demands));

    for (const part of queue) {
      const rod = rods.find((candidate) => candidate.leftover >= part.length);

      if (rod) {
        rod.parts.push(part);
        rod.usedLength += part.length;
        rod.leftover = this.stockLength - rod.usedLength;
      } else {
        rods.push({
          id: rods.length + 1,
          usedLength: part.length,
          leftover: this.stockLength - part.length,
          parts: [part],
        });
      }
    }

    return rods;
  }
}

export function pack(stockLength: number, demands: Demand[]): Rod[] {
  return new FirstFitDecreasingSolver(stockLength).solve(demands);
}
