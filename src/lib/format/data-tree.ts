import { dim, header, paint, yellow } from '../colors.js';
import { MAX_DATA_VALUE_LENGTH } from '../constants.js';
import type { TemplateMapping, TemplateValue } from '../chezmoi/index.js';

export const NO_DATA_MESSAGE = 'No template data available';

const INDENT = '  ';

function isMapping(value: TemplateValue): value is TemplateMapping {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Strings longer than `max` are cut to `max - 3` characters plus "..."
 */
export function truncateValue(value: string, max: number = MAX_DATA_VALUE_LENGTH): string {
  return value.length > max ? `${value.slice(0, max - 3)}...` : value;
}

export function formatScalar(value: string | number | boolean | null): string {
  if (value === null) return paint('absent', 'null');
  if (typeof value === 'boolean') return paint('boolean', String(value));
  if (typeof value === 'number') return paint('number', String(value));
  return truncateValue(value);
}

function sequenceLines(items: TemplateValue[], depth: number): string[] {
  const indent = INDENT.repeat(depth);
  const lines: string[] = [];
  items.forEach((item, idx) => {
    if (Array.isArray(item)) {
      lines.push(`${indent}${dim(String(idx))}`, ...sequenceLines(item, depth + 1));
    } else if (isMapping(item)) {
      lines.push(`${indent}${dim(String(idx))}`, ...mappingLines(item, depth + 1));
    } else {
      lines.push(`${indent}${idx}: ${formatScalar(item)}`);
    }
  });
  return lines;
}

function mappingLines(data: TemplateMapping, depth: number): string[] {
  const indent = INDENT.repeat(depth);
  const lines: string[] = [];
  for (const [key, value] of Object.entries(data)) {
    if (Array.isArray(value)) {
      lines.push(`${indent}${paint('sequenceKey', key)} (${value.length} items)`, ...sequenceLines(value, depth + 1));
    } else if (isMapping(value)) {
      lines.push(`${indent}${paint('mappingKey', key)}`, ...mappingLines(value, depth + 1));
    } else {
      lines.push(`${indent}${paint('leafKey', key)} = ${formatScalar(value)}`);
    }
  }
  return lines;
}

/**
 * Indented tree of template data under a "Template Data" heading
 */
export function formatDataTree(data: TemplateMapping): string[] {
  if (Object.keys(data).length === 0) {
    return [yellow(NO_DATA_MESSAGE)];
  }
  return [header('Template Data'), ...mappingLines(data, 1)];
}
