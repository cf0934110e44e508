import { bold, cyan, yellow } from '../colors.js';
import { formatTable } from '../ui/table.js';

export const NO_MANAGED_FILES_MESSAGE = 'No files managed';

export function managedTitle(count: number): string {
  if (count === 0) {
    return `${bold('Managed Files')} - ${yellow(NO_MANAGED_FILES_MESSAGE)}`;
  }
  return `${bold('Managed Files')} - ${cyan(`${count} ${count === 1 ? 'file' : 'files'}`)}`;
}

/**
 * Title plus a numbered table of managed paths
 */
export function formatManagedFiles(files: string[]): string[] {
  if (files.length === 0) {
    return [managedTitle(0)];
  }
  return [
    managedTitle(files.length),
    '',
    ...formatTable({
      columns: ['#', 'File Path'],
      rows: files.map((file, i) => [String(i + 1), file]),
    }),
  ];
}
