/**
 * chezmoi-manager - Terminal front end for chezmoi
 *
 * @packageDocumentation
 */

// Export all library modules
export * as chezmoi from './lib/chezmoi/index.js';
export * as diff from './lib/diff/index.js';
export * as format from './lib/format/index.js';
export * as colors from './lib/colors.js';
export * as prompts from './lib/prompts.js';
export * as config from './lib/config.js';
export * as errors from './lib/errors.js';

export { ChezmoiAdapter } from './lib/chezmoi/index.js';
export { DiffSession } from './lib/diff/index.js';
export { SingleFlight } from './lib/tasks/single-flight.js';

// Export key types
export type {
  AddOptions,
  ApplyOptions,
  CommandResult,
  CommandRunner,
  TemplateMapping,
  VerifyResult,
} from './lib/chezmoi/index.js';

export type { ApplyResult, DiffSummary, ExportResult } from './lib/diff/index.js';

export type { ManagerConfig, ResolvedConfig } from './lib/config.js';

export type { FlightResult } from './lib/tasks/single-flight.js';

export type { PromptOption } from './lib/prompts.js';
