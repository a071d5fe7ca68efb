/**
 * Answer checking.
 *
 * Comparison is exact after whitespace normalisation, plus a short,
 * closed list of accepted variations. There is no fuzzy matching.
 *
 * @module checker
 */

/** Editors accepted wherever `nano <file>` is expected */
const EDITOR_ALTERNATIVES: ReadonlySet<string> = new Set(['nano', 'vi']);

/**
 * Trim and collapse runs of whitespace to a single space.
 */
export function normalizeCommand(cmd: string): string {
  return cmd.trim().split(/\s+/).filter(Boolean).join(' ');
}

/**
 * First word of the normalised command, or `''`.
 */
export function getBaseCommand(cmd: string): string {
  return normalizeCommand(cmd).split(' ')[0] ?? '';
}

/**
 * Check whether the learner's input satisfies the expected command.
 *
 * Accepted besides an exact match:
 * - any `ls ...` when `ls` is expected
 * - any `history ...` when `history` is expected
 * - `nano <file>` or `vi <file>` when `nano <file>` is expected
 */
export function checkCommand(input: string, expected: string | null | undefined): boolean {
  if (!expected) return false;

  const userNorm = normalizeCommand(input);
  const expectedNorm = normalizeCommand(expected);

  if (userNorm === expectedNorm) return true;

  const userParts = userNorm ? userNorm.split(' ') : [];
  const expectedParts = expectedNorm ? expectedNorm.split(' ') : [];
  const userBase = userParts[0] ?? '';
  const expectedBase = expectedParts[0] ?? '';

  if ((expectedNorm === 'ls' || expectedNorm === 'history') && userBase === expectedNorm) {
    return true;
  }

  if (expectedBase === 'nano' && EDITOR_ALTERNATIVES.has(userBase)) {
    const expectedFile = expectedParts[1];
    const userFile = userParts[1];
    return expectedFile !== undefined && userFile !== undefined && expectedFile === userFile;
  }

  return false;
}
