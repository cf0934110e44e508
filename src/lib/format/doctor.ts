import { paint, type Role } from '../colors.js';

export const NO_DOCTOR_OUTPUT_MESSAGE = 'No output from chezmoi doctor';

export type DoctorKind = 'ok' | 'info' | 'warning' | 'error' | 'skipped' | 'plain';

export interface DoctorEntry {
  kind: DoctorKind;
  line: string;
}

const RESULT_COLUMN: Record<string, DoctorKind> = {
  ok: 'ok',
  info: 'info',
  warning: 'warning',
  error: 'error',
  failed: 'error',
  skipped: 'skipped',
};

/**
 * Classify a doctor line by its leading result column, falling back to
 * keywords anywhere in the line
 */
export function classifyDoctorLine(line: string): DoctorKind {
  const first = line.trimStart().split(/\s+/, 1)[0]?.toLowerCase() ?? '';
  const byColumn = RESULT_COLUMN[first];
  if (byColumn && !line.startsWith(' ')) {
    return byColumn;
  }

  const lower = line.toLowerCase();
  if (/\b(error|failed)\b/.test(lower)) return 'error';
  if (/\bwarning\b/.test(lower)) return 'warning';
  if (/\bok\b/.test(lower)) return 'ok';
  return 'plain';
}

export function parseDoctor(text: string): DoctorEntry[] {
  return text
    .replace(/\n+$/, '')
    .split('\n')
    .map((line) => ({ kind: classifyDoctorLine(line), line }));
}

const KIND_ROLES: Record<Exclude<DoctorKind, 'plain'>, Role> = {
  ok: 'passed',
  info: 'noted',
  warning: 'warned',
  error: 'failed',
  skipped: 'skipped',
};

function colorEntry(entry: DoctorEntry): string {
  if (entry.kind !== 'plain') {
    return paint(KIND_ROLES[entry.kind], entry.line);
  }
  // continuation lines of a check
  return entry.line.startsWith('  ') ? paint('skipped', entry.line) : entry.line;
}

export function formatDoctor(text: string): string[] {
  if (text.trim() === '') {
    return [paint('warned', NO_DOCTOR_OUTPUT_MESSAGE)];
  }
  return parseDoctor(text).map(colorEntry);
}

/**
 * Count of entries per kind, for the summary line
 */
export function summarizeDoctor(entries: DoctorEntry[]): Record<DoctorKind, number> {
  const counts: Record<DoctorKind, number> = {
    ok: 0,
    info: 0,
    warning: 0,
    error: 0,
    skipped: 0,
    plain: 0,
  };
  for (const entry of entries) {
    counts[entry.kind]++;
  }
  return counts;
}
