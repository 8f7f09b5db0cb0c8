// src/cli.ts
import { readFile, writeFile } from 'node:fs/promises';
import { parseArgs } from 'node:util';
import type { CuttingJob } from './core/common/types';
import { DEFAULT_CUTTING_CONFIG } from './core/common/constants';
import { CutPlanValidationError } from './core/common/errors';
import { ExportManager } from './core/infrastructure/export-manager';
import { parseProject, serializeProject } from './core/infrastructure/project-io';
import {
  buildResultTable,
  formatUtilization,
  renderTextTable,
} from './core/infrastructure/result-table';
import { createCuttingStore } from './store';

export const USAGE = `Usage: rod-cut [options]

  --stock <mm>          Stock rod length (default ${DEFAULT_CUTTING_CONFIG.stockLength})
  --cut-width <mm>      Saw blade width added to every part (default ${DEFAULT_CUTTING_CONFIG.cutWidth})
  --part <len>x<qty>    Part length and quantity, repeatable (e.g. --part 1000x10)
  --project <file>      Load inputs from a saved project file
  --save <file>         Save the inputs as a project file
  --pdf <file>          Write the cutting plan as PDF
  -h, --help            Show this help`;

/**
 * "1000x10" -> { rawLength: 1000, quantity: 10 }
 */
export function parsePartArg(value: string): { rawLength: number; quantity: number } {
  const match = /^\s*(\d+(?:\.\d+)?)\s*[x×*]\s*(\d+)\s*$/i.exec(value);
  if (!match) {
    throw new CutPlanValidationError(`Invalid part "${value}"`, [
      'expected <length>x<quantity>, e.g. 1000x10',
    ]);
  }
  return { rawLength: Number(match[1]), quantity: Number(match[2]) };
}

const OPTIONS = {
  stock: { type: 'string' },
  'cut-width': { type: 'string' },
  part: { type: 'string', multiple: true },
  project: { type: 'string' },
  save: { type: 'string' },
  pdf: { type: 'string' },
  help: { type: 'boolean', short: 'h' },
} as const;

// Errors raised by Node itself (fs, parseArgs) carry a string code
function isSystemError(e: unknown): e is Error & { code: string } {
  return e instanceof Error && 'code' in e && typeof e.code === 'string';
}

const parseCliArgs = (argv: string[]) =>
  parseArgs({ args: argv, options: OPTIONS }).values;

export async function main(argv: string[]): Promise<number> {
  let values: ReturnType<typeof parseCliArgs>;
  try {
    values = parseCliArgs(argv);
  } catch (e) {
    if (!isSystemError(e)) throw e;
    console.error(e.message);
    console.error(USAGE);
    return 1;
  }

  if (values.help) {
    console.log(USAGE);
    return 0;
  }

  const store = createCuttingStore();

  try {
    if (values.project) {
      const job: CuttingJob = parseProject(await readFile(values.project, 'utf-8'));
      store.getState().loadProject(job);
    }

    const state = store.getState();
    if (values.stock !== undefined) state.setStockLength(Number(values.stock));
    if (values['cut-width'] !== undefined) state.setCutWidth(Number(values['cut-width']));
    if (values.part && values.part.length > 0) {
      // Parts on the command line replace the project's list
      state.partList.forEach((p) => state.removePart(p.id));
      values.part.map(parsePartArg).forEach((p) => state.addPart(p));
    }
  } catch (e) {
    if (!(e instanceof CutPlanValidationError) && !isSystemError(e)) throw e;
    console.error(e.message);
    return 1;
  }

  store.getState().runCalculation();
  const { plan, error, stockLength, cutWidth, partList } = store.getState();

  if (!plan) {
    console.error(error ?? 'Calculation failed');
    return 1;
  }

  console.log(renderTextTable(buildResultTable(plan)));
  console.log('');
  console.log(`Total rods: ${plan.totalRods}`);
  console.log(`Utilization: ${formatUtilization(plan)}`);

  try {
    if (values.save) {
      await writeFile(values.save, serializeProject({ stockLength, cutWidth, partList }));
      console.log(`Project saved to ${values.save}`);
    }

    if (values.pdf) {
      const pdf = ExportManager.generatePDF({ plan });
      await writeFile(values.pdf, new Uint8Array(pdf));
      console.log(`PDF written to ${values.pdf}`);
    }
  } catch (e) {
    if (!isSystemError(e)) throw e;
    console.error(e.message);
    return 1;
  }

  return 0;
}
