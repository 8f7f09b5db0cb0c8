// src/store.ts
import { createStore } from 'zustand/vanilla';
import { v4 as uuidv4 } from 'uuid';
import type { CuttingJob, PartInput } from './core/common/types';
import {
  type CuttingConfig,
  DEFAULT_CUTTING_CONFIG,
  DEFAULT_PART_ROW,
  DEFAULT_PART_ROW_COUNT,
} from './core/common/constants';
import { CutPlanValidationError } from './core/common/errors';
import { parseCuttingJob } from './core/infrastructure/input-schema';
import { buildCutPlan } from './core/solvers/rod-solver/cut-plan';
import type { CutPlan } from './core/solvers/rod-solver/types';

export interface AppState {
  stockLength: number;
  cutWidth: number;
  partList: PartInput[];
  plan: CutPlan | null;
  error: string | null;

  setStockLength: (stockLength: number) => void;
  setCutWidth: (cutWidth: number) => void;
  addPart: (part: Omit<PartInput, 'id'>) => void;
  updatePart: (id: string, updates: Partial<Omit<PartInput, 'id'>>) => void;
  removePart: (id: string) => void;
  runCalculation: () => void;
  loadProject: (job: CuttingJob) => void;
  reset: () => void;
}

const defaultPartList = (): PartInput[] =>
  Array.from({ length: DEFAULT_PART_ROW_COUNT }, () => ({
    ...DEFAULT_PART_ROW,
    id: uuidv4(),
  }));

export const createCuttingStore = (config: Partial<CuttingConfig> = {}) => {
  const defaults: CuttingConfig = { ...DEFAULT_CUTTING_CONFIG, ...config };

  return createStore<AppState>()((set, get) => ({
    stockLength: defaults.stockLength,
    cutWidth: defaults.cutWidth,
    partList: defaultPartList(),
    plan: null,
    error: null,

    // Every input change invalidates the last result
    setStockLength: (stockLength) => set({ stockLength, plan: null }),

    setCutWidth: (cutWidth) => set({ cutWidth, plan: null }),

    addPart: (part) =>
      set((state) => ({
        partList: [...state.partList, { ...part, id: uuidv4() }],
        plan: null,
      })),

    updatePart: (id, updates) =>
      set((state) => ({
        partList: state.partList.map((p) =>
          p.id === id ? { ...p, ...updates } : p
        ),
        plan: null,
      })),

    removePart: (id) =>
      set((state) => ({
        partList: state.partList.filter((p) => p.id !== id),
        plan: null,
      })),

    runCalculation: () => {
      const { stockLength, cutWidth, partList } = get();

      try {
        const job = parseCuttingJob({ stockLength, cutWidth, partList });
        const plan = buildCutPlan(job);

        plan.rows
          .filter((row) => row.infeasible)
          .forEach((row) => {
            console.warn(
              `Rod ${row.rodId}: part longer than stock (leftover ${row.leftover})`
            );
          });

        set({ plan, error: null });
      } catch (e) {
        if (!(e instanceof CutPlanValidationError)) throw e;
        console.error(e.message);
        set({ plan: null, error: e.message });
      }
    },

    loadProject: (job) =>
      set({
        stockLength: job.stockLength,
        cutWidth: job.cutWidth,
        partList: job.partList,
        // Results are recalculated, never loaded
        plan: null,
        error: null,
      }),

    reset: () =>
      set({
        stockLength: defaults.stockLength,
        cutWidth: defaults.cutWidth,
        partList: defaultPartList(),
        plan: null,
        error: null,
      }),
  }));
};
