/**
 * Terminal styling.
 *
 * Colour is on when stdout is a TTY. FORCE_COLOR turns it on elsewhere and
 * NO_COLOR turns it off everywhere; `--no-color` overrides both at startup.
 */

const SGR = {
  bold: 1,
  dim: 2,
  red: 31,
  green: 32,
  yellow: 33,
  blue: 34,
  magenta: 35,
  cyan: 36,
} as const;

export type Style = keyof typeof SGR;

export function detectColor(
  env: NodeJS.ProcessEnv = process.env,
  isTTY: boolean | undefined = process.stdout.isTTY
): boolean {
  if (env.NO_COLOR !== undefined) return false;
  if (env.FORCE_COLOR !== undefined) return true;
  return isTTY ?? false;
}

let enabled = detectColor();

export function setColorEnabled(value: boolean): void {
  enabled = value;
}

export function isColorEnabled(): boolean {
  return enabled;
}

/**
 * One escape sequence carrying every requested style, then a reset
 */
export function style(text: string, ...styles: Style[]): string {
  if (!enabled || styles.length === 0 || text === '') {
    return text;
  }
  return `\x1b[${styles.map((s) => SGR[s]).join(';')}m${text}\x1b[0m`;
}

export const bold = (text: string): string => style(text, 'bold');
export const dim = (text: string): string => style(text, 'dim');
export const red = (text: string): string => style(text, 'red');
export const green = (text: string): string => style(text, 'green');
export const yellow = (text: string): string => style(text, 'yellow');
export const blue = (text: string): string => style(text, 'blue');
export const magenta = (text: string): string => style(text, 'magenta');
export const cyan = (text: string): string => style(text, 'cyan');

// ============================================================================
// Roles
// ============================================================================

/**
 * What a piece of chezmoi output means, independent of how it is drawn.
 * The diff, status, doctor and data formatters all paint through these.
 */
export type Role =
  | 'added'
  | 'removed'
  | 'modified'
  | 'renamed'
  | 'unchanged'
  | 'hunk'
  | 'fileHeader'
  | 'passed'
  | 'failed'
  | 'warned'
  | 'noted'
  | 'skipped'
  | 'mappingKey'
  | 'sequenceKey'
  | 'leafKey'
  | 'boolean'
  | 'number'
  | 'absent'
  | 'heading';

const ROLES: Record<Role, readonly Style[]> = {
  added: ['green'],
  removed: ['red'],
  modified: ['yellow'],
  renamed: ['magenta'],
  unchanged: ['dim'],
  hunk: ['cyan'],
  fileHeader: ['bold'],
  passed: ['green'],
  failed: ['red'],
  warned: ['yellow'],
  noted: ['blue'],
  skipped: ['dim'],
  mappingKey: ['cyan'],
  sequenceKey: ['yellow'],
  leafKey: ['green'],
  boolean: ['magenta'],
  number: ['blue'],
  absent: ['dim'],
  heading: ['bold', 'cyan'],
};

export function paint(role: Role, text: string): string {
  return style(text, ...ROLES[role]);
}

export function header(text: string): string {
  return paint('heading', text);
}

// ============================================================================
// Tones
// ============================================================================

export type Tone = 'success' | 'warning' | 'error' | 'info';

interface ToneMarker {
  glyph: string;
  /** Shown instead of the glyph when colour is off */
  label: string;
  color: Style;
  /** Message text is coloured too */
  colorText: boolean;
}

const TONES: Record<Tone, ToneMarker> = {
  success: { glyph: '✓', label: '[OK]', color: 'green', colorText: false },
  warning: { glyph: '⚠', label: '[WARN]', color: 'yellow', colorText: true },
  error: { glyph: '✗', label: '[ERROR]', color: 'red', colorText: true },
  info: { glyph: 'ℹ', label: '[INFO]', color: 'blue', colorText: false },
};

export function toneIcon(tone: Tone): string {
  const marker = TONES[tone];
  return enabled ? marker.glyph : marker.label;
}

/**
 * Icon plus message, e.g. "✓ Changes applied" or "[OK] Changes applied"
 */
export function toned(tone: Tone, text: string): string {
  const marker = TONES[tone];
  const body = marker.colorText ? style(text, marker.color) : text;
  return `${style(toneIcon(tone), marker.color)} ${body}`;
}

export const success = (text: string): string => toned('success', text);
export const warning = (text: string): string => toned('warning', text);
export const error = (text: string): string => toned('error', text);
export const info = (text: string): string => toned('info', text);
