import { describe, expect, it } from 'vitest';
import { parseCuttingJob } from '../src/core/infrastructure/input-schema';
import { CutPlanValidationError } from '../src/core/common/errors';

const issuesOf = (input: unknown): string[] => {
  try {
    parseCuttingJob(input);
  } catch (e) {
    if (e instanceof CutPlanValidationError) return e.issues;
    throw e;
  }
  return [];
};

describe('parseCuttingJob', () => {
  it('assigns ids to rows without one', () => {
    const job = parseCuttingJob({
      stockLength: 5000,
      cutWidth: 2,
      partList: [{ rawLength: 1000, quantity: 3 }],
    });

    expect(job.partList[0].id).toMatch(
      /^[0-9a-f]{8}-[0-9a-f]{4}-4[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/
    );
    expect(job.partList[0].rawLength).toBe(1000);
    expect(job.partList[0].quantity).toBe(3);
  });

  it('keeps existing ids and allows an empty list', () => {
    expect(
      parseCuttingJob({
        stockLength: 5000,
        cutWidth: 0,
        partList: [{ id: 'row-1', rawLength: 10, quantity: 1 }],
      }).partList[0].id
    ).toBe('row-1');
    expect(
      parseCuttingJob({ stockLength: 5000, cutWidth: 2, partList: [] }).partList
    ).toEqual([]);
  });

  it('rejects a non-positive stock length', () => {
    expect(() =>
      parseCuttingJob({ stockLength: 0, cutWidth: 2, partList: [] })
    ).toThrow('Invalid cutting job: stockLength: Stock length must be greater than 0');
  });

  it('rejects a negative cut width', () => {
    expect(issuesOf({ stockLength: 5000, cutWidth: -1, partList: [] })).toEqual([
      'cutWidth: Cut width cannot be negative',
    ]);
  });

  it('rejects bad part rows', () => {
    expect(
      issuesOf({
        stockLength: 5000,
        cutWidth: 2,
        partList: [
          { rawLength: 0, quantity: 1 },
          { rawLength: 100, quantity: 2.5 },
          { rawLength: 100, quantity: 0 },
        ],
      })
    ).toEqual([
      'partList.0.rawLength: Part length must be greater than 0',
      'partList.1.quantity: Quantity must be a whole number',
      'partList.2.quantity: Quantity must be at least 1',
    ]);
  });
});
