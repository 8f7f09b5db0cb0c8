import { describe, expect, it } from 'vitest';
import { ExportManager } from '../src/core/infrastructure/export-manager';
import { buildCutPlan } from '../src/core/solvers/rod-solver';

const header = (bytes: ArrayBuffer) =>
  new TextDecoder().decode(new Uint8Array(bytes).slice(0, 5));

describe('ExportManager.generatePDF', () => {
  it('renders a PDF document', () => {
    const plan = buildCutPlan({
      stockLength: 5000,
      cutWidth: 2,
      partList: [
        { id: 'a', rawLength: 1000, quantity: 10 },
        { id: 'b', rawLength: 1480, quantity: 4 },
      ],
    });

    const pdf = ExportManager.generatePDF({
      plan,
      generatedAt: new Date('2026-01-02T03:04:05.000Z'),
    });

    expect(pdf.byteLength).toBeGreaterThan(0);
    expect(header(pdf)).toBe('%PDF-');
  });

  it('renders plans with oversized parts and empty plans', () => {
    const oversized = buildCutPlan({
      stockLength: 1000,
      cutWidth: 0,
      partList: [{ id: 'a', rawLength: 1500, quantity: 1 }],
    });
    const empty = buildCutPlan({ stockLength: 1000, cutWidth: 0, partList: [] });

    expect(header(ExportManager.generatePDF({ plan: oversized }))).toBe('%PDF-');
    expect(header(ExportManager.generatePDF({ plan: empty }))).toBe('%PDF-');
  });
});
