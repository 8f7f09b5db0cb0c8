// src/core/common/types.ts

/**
 * One part type as the solver sees it.
 * effectiveLength already includes the cut width.
 */
export interface Demand {
  effectiveLength: number;
  quantity: number;
}

/**
 * A single part to be cut. Only lives during packing.
 */
export interface PartInstance {
  length: number; // Effective length
  typeIndex: number; // Index of the originating Demand
}

/**
 * A stock rod and the parts placed on it.
 */
export interface Rod {
  id: number; // 1-based, creation order
  usedLength: number;
  leftover: number; // stockLength - usedLength, negative only for an oversized part
  parts: PartInstance[]; // Placement order
}

/**
 * Identical parts on one rod, counted.
 */
export interface PartGroup {
  typeIndex: number;
  length: number;
  count: number;
}

/**
 * Raw part row entered by the user (before cut width is added).
 */
export interface PartInput {
  id: string;
  rawLength: number;
  quantity: number;
}

/**
 * Everything needed for one calculation.
 */
export interface CuttingJob {
  stockLength: number;
  cutWidth: number;
  partList: PartInput[];
}
