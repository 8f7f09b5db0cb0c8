// src/core/infrastructure/export-manager.ts
import { jsPDF } from 'jspdf';
import { autoTable } from 'jspdf-autotable';
import type { CutPlan } from '../solvers/rod-solver/types';
import { formatLength } from '../math/rod-math/part-grouping';
import { buildResultTable, formatUtilization } from './result-table';

interface ReportData {
  plan: CutPlan;
  generatedAt?: Date;
}

type RGB = [number, number, number];

const HEADER_FILL: RGB = [128, 128, 128]; // grey
const HEADER_TEXT: RGB = [245, 245, 245]; // whitesmoke
const BODY_FILL: RGB = [245, 245, 220]; // beige
const INFEASIBLE_FILL: RGB = [248, 180, 180];
const GRID_LINE: RGB = [0, 0, 0];

export class ExportManager {
  /**
   * Renders the cutting plan as an A4 PDF and returns its bytes.
   */
  static generatePDF(data: ReportData): ArrayBuffer {
    const { plan } = data;
    const generatedAt = data.generatedAt ?? new Date();
    const doc = new jsPDF({ format: 'a4' });

    // --- TITLE ---
    doc.setFontSize(18);
    doc.text('1D Cutting Optimization', 14, 20);

    doc.setFontSize(10);
    doc.setTextColor(100);
    doc.text(
      `Date: ${generatedAt.toLocaleDateString()} ${generatedAt.toLocaleTimeString()}`,
      14,
      26
    );
    doc.setTextColor(0);

    // --- 1. INPUTS & SUMMARY ---
    let cursorY = 32;
    autoTable(doc, {
      startY: cursorY,
      body: [
        ['Stock length', `${formatLength(plan.stockLength)} mm`],
        ['Cut width', `${formatLength(plan.cutWidth)} mm`],
        ['Total rods', String(plan.totalRods)],
        ['Utilization', formatUtilization(plan)],
      ],
      theme: 'striped',
      showHead: 'never',
      columnStyles: { 0: { fontStyle: 'bold', cellWidth: 50 } },
      didDrawPage: (hook) => {
        cursorY = hook.cursor?.y ?? cursorY;
      },
    });

    // --- 2. ROD TABLE ---
    const table = buildResultTable(plan);
    const infeasibleRows = new Set(
      plan.rows
        .map((row, index) => (row.infeasible ? index : -1))
        .filter((index) => index >= 0)
    );

    autoTable(doc, {
      startY: cursorY + 8,
      head: [table.head],
      body: table.body,
      theme: 'grid',
      styles: {
        halign: 'center',
        lineColor: GRID_LINE,
        lineWidth: 0.3,
        fontSize: 9,
      },
      headStyles: {
        fillColor: HEADER_FILL,
        textColor: HEADER_TEXT,
        fontStyle: 'bold',
        cellPadding: { top: 3, bottom: 4, left: 2, right: 2 },
      },
      bodyStyles: { fillColor: BODY_FILL },
      didParseCell: (hook) => {
        if (hook.section === 'body' && infeasibleRows.has(hook.row.index)) {
          hook.cell.styles.fillColor = INFEASIBLE_FILL;
        }
      },
    });

    return doc.output('arraybuffer');
  }
}
