/**
 * Hints for known chezmoi failure messages, matched on stderr substrings
 */

interface HintRule {
  patterns: string[];
  hint: string;
}

const HINT_RULES: HintRule[] = [
  {
    patterns: ['already in source state'],
    hint: 'The file is already managed. Use `chezmoi edit <file>` to change it.',
  },
  {
    patterns: ['permission denied'],
    hint: 'Check file permissions, or retry with elevated privileges.',
  },
  {
    patterns: ['not managed', 'not in source state'],
    hint: 'Add the file first with `czm add <file>`.',
  },
  {
    patterns: ['no such file', 'does not exist'],
    hint: 'Check that the path is correct.',
  },
];

/**
 * First matching hint for the given error text, or undefined
 */
export function getHintForStderr(text: string): string | undefined {
  const lower = text.toLowerCase();
  return HINT_RULES.find((rule) => rule.patterns.some((p) => lower.includes(p)))?.hint;
}
