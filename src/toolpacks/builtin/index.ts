import { TaskRegistry } from "../register.js";
import type { TaskSpec } from "../types.js";
import { pickedFdrTask, proteinFdrTask } from "./fdr.js";
import { createSpectraLookupTask, loadQuantLookupTask, quantIsobaricTask, quantMs1Task } from "./quant.js";
import { qcPsmsTask, qcReportTask, softwareVersionsTask } from "./qc.js";
import { createDecoyDbTask, msgfSearchTask, percolatorTask, svmToTsvTask } from "./search.js";
import {
  createPeptideTableTask,
  createPsmTableTask,
  deqmsTask,
  mergeSetTablesTask,
  normalizeTableTask,
  piAnnotationTask,
  splitPsmPlatesTask
} from "./tables.js";

export const builtinTaskDefinitions: readonly TaskSpec[] = [
  softwareVersionsTask,
  createDecoyDbTask,
  quantIsobaricTask,
  quantMs1Task,
  createSpectraLookupTask,
  loadQuantLookupTask,
  msgfSearchTask,
  percolatorTask,
  svmToTsvTask,
  createPsmTableTask,
  splitPsmPlatesTask,
  piAnnotationTask,
  createPeptideTableTask,
  proteinFdrTask,
  pickedFdrTask,
  mergeSetTablesTask,
  normalizeTableTask,
  deqmsTask,
  qcPsmsTask,
  qcReportTask
];

export function createBuiltinRegistry(): TaskRegistry {
  return new TaskRegistry(builtinTaskDefinitions);
}
