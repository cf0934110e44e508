export { parseDiff, isEmptyDiff } from './parse.js';
export { colorizeDiffLine, renderDiff, formatSummary, NO_CHANGES_MESSAGE } from './format.js';
export { exportDiff, formatTimestamp, patchFileName } from './export.js';
export type { ExportOptions } from './export.js';
export { DiffSession } from './session.js';
export type { DiffSessionOptions, DiffSource } from './session.js';
export type { ApplyResult, DiffStatus, DiffSummary, ExportResult } from './types.js';
