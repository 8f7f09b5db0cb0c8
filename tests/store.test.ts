import { afterEach, describe, expect, it, vi } from 'vitest';
import { createCuttingStore } from '../src/store';

afterEach(() => {
  vi.restoreAllMocks();
});

describe('cutting store', () => {
  it('starts with the default form values', () => {
    const state = createCuttingStore().getState();

    expect(state.stockLength).toBe(5000);
    expect(state.cutWidth).toBe(2);
    expect(state.partList.map((p) => [p.rawLength, p.quantity])).toEqual([
      [1000, 10],
      [1000, 10],
    ]);
    expect(state.plan).toBeNull();
  });

  it('takes default overrides', () => {
    const store = createCuttingStore({ stockLength: 6000 });
    store.getState().setStockLength(3000);
    store.getState().reset();

    expect(store.getState().stockLength).toBe(6000);
    expect(store.getState().cutWidth).toBe(2);
  });

  it('calculates the default project', () => {
    const store = createCuttingStore();
    store.getState().runCalculation();

    const { plan, error } = store.getState();
    expect(error).toBeNull();
    expect(plan?.totalRods).toBe(5);
  });

  it('clears the result when inputs change', () => {
    const store = createCuttingStore();
    store.getState().runCalculation();
    expect(store.getState().plan).not.toBeNull();

    store.getState().setCutWidth(3);
    expect(store.getState().plan).toBeNull();
  });

  it('edits the part list', () => {
    const store = createCuttingStore();
    const [first, second] = store.getState().partList;

    store.getState().removePart(second.id);
    store.getState().updatePart(first.id, { quantity: 3 });
    store.getState().addPart({ rawLength: 480, quantity: 1 });

    const { partList } = store.getState();
    expect(partList).toHaveLength(2);
    expect(partList[0]).toEqual({ id: first.id, rawLength: 1000, quantity: 3 });
    expect(partList[1].rawLength).toBe(480);
    expect(partList[1].id).not.toBe(first.id);
  });

  it('stores validation errors instead of a plan', () => {
    const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
    const store = createCuttingStore();
    store.getState().setStockLength(0);
    store.getState().runCalculation();

    const message =
      'Invalid cutting job: stockLength: Stock length must be greater than 0';
    expect(store.getState().plan).toBeNull();
    expect(store.getState().error).toBe(message);
    expect(errorSpy).toHaveBeenCalledWith(message);
  });

  it('warns about rods with an oversized part', () => {
    const warnSpy = vi.spyOn(console, 'warn').mockImplementation(() => {});
    const store = createCuttingStore();
    store.getState().loadProject({
      stockLength: 1000,
      cutWidth: 0,
      partList: [{ id: 'p1', rawLength: 1500, quantity: 1 }],
    });
    store.getState().runCalculation();

    expect(store.getState().plan?.infeasibleRodIds).toEqual([1]);
    expect(warnSpy).toHaveBeenCalledWith(
      'Rod 1: part longer than stock (leftover -500)'
    );
  });

  it('returns to defaults on reset', () => {
    const store = createCuttingStore();
    store.getState().loadProject({ stockLength: 1200, cutWidth: 0, partList: [] });
    store.getState().reset();

    expect(store.getState().stockLength).toBe(5000);
    expect(store.getState().partList).toHaveLength(2);
  });
});
