// src/core/common/errors.ts

/**
 * Raised at the input boundary (store, CLI, project loader).
 * The solver itself never throws.
 */
export class CutPlanValidationError extends Error {
  public readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super(issues.length > 0 ? `${message}: ${issues.join('; ')}` : message);
    this.name = 'CutPlanValidationError';
    this.issues = issues;
  }
}
