/**
 * Line-level output helpers for screens and subcommands
 */

import { bold, cyan, dim, header, toned, type Tone } from '../colors.js';
import { print } from './output.js';

export type StatusType = Tone;

/**
 * e.g. printStatus('success', 'Changes applied')
 */
export function printStatus(type: StatusType, message: string): void {
  print(toned(type, message));
}

export function printHeader(title: string): void {
  print('');
  print(bold(title));
  print('');
}

/** "  Label: value" */
export function printDetail(label: string, value: string, indent: number = 2): void {
  print(`${' '.repeat(indent)}${label}: ${value}`);
}

export function printDim(message: string, indent: number = 0): void {
  print(' '.repeat(indent) + dim(message));
}

export interface NextStep {
  command: string;
  description?: string;
}

export function printNextSteps(steps: readonly NextStep[]): void {
  print(dim('  Next steps:'));
  for (const { command, description } of steps) {
    print(dim(description ? `    ${command}     # ${description}` : `    ${command}`));
  }
}

const BANNER_RULE = '═';

/**
 * Title between two rules, with an optional dim subtitle
 */
export function printBanner(title: string, subtitle?: string, width: number = 58): void {
  const rule = cyan(BANNER_RULE.repeat(width));
  print('');
  print(rule);
  print(header(`  ${title}`));
  if (subtitle) print(dim(`  ${subtitle}`));
  print(rule);
  print('');
}
