/**
 * Report assembly and rendering.
 */

export type { RegionStatus, RegionOutcome, LifecycleReport } from './types.js';
export type { AssembleOptions } from './assembler.js';
export { assembleReport } from './assembler.js';
export {
  CSV_HEADER,
  STILL_RUNNING_LABEL,
  formatTimestamp,
  escapeCsvField,
  renderCsv,
  renderSummary,
} from './csv.js';
