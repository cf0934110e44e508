/**
 * Terminal output shared by the interactive screens and the subcommands
 */

export { setJsonMode, isJsonMode, print, printErr, printLines, emitJson } from './output.js';
export {
  printStatus,
  printHeader,
  printDetail,
  printDim,
  printNextSteps,
  printBanner,
  type StatusType,
  type NextStep,
} from './status.js';
export { formatTable, type TableOptions } from './table.js';
export { printError, errorToDisplay, type ErrorDisplayOptions } from './error.js';
export { withSpinner } from '../prompts.js';
