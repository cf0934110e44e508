export { ChezmoiAdapter } from './adapter.js';
export { runCommand } from './runner.js';
export * from './args.js';
export { OPERATION_POLICIES, interpretOutcome, toOutcome } from './outcome.js';
export type { Operation, Outcome, OutcomePolicy } from './outcome.js';
export type {
  AdapterSettings,
  AddOptions,
  ApplyOptions,
  CommandResult,
  CommandRunner,
  RunOptions,
  TemplateMapping,
  TemplateValue,
  VerifyResult,
} from './types.js';
export { ADD_FLAGS, ADD_PRESETS, enabledFlags, optionsFromFlags } from './presets.js';
export type { AddFlag, AddPreset } from './presets.js';
