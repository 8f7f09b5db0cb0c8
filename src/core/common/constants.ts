// src/core/common/constants.ts

// All lengths in millimetres
export interface CuttingConfig {
  stockLength: number;
  cutWidth: number;
}

export const DEFAULT_CUTTING_CONFIG: CuttingConfig = {
  stockLength: 5000,
  cutWidth: 2, // Saw blade width
};

// Pre-filled part rows of a fresh project
export const DEFAULT_PART_ROW = {
  rawLength: 1000,
  quantity: 10,
};

export const DEFAULT_PART_ROW_COUNT = 2;

export const PROJECT_FILE_VERSION = '1.0';
