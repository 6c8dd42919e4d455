export interface ExclusionPattern {
  /** Pattern as configured, for diagnostics */
  readonly source: string;
  readonly matcher: RegExp;
}

/**
 * Compile a case-insensitive glob anchored at both ends.
 *
 * `*` and `%` match any run of characters, `?` and `_` match exactly one.
 * `%`/`_` keep SQL LIKE style patterns ("%status%") working unchanged.
 *
 * @example
 * compileExclusionPattern('*signal*').matcher.test('sensor.wifi_Signal') // true
 */
export function compileExclusionPattern(pattern: string): ExclusionPattern {
  let expression = '';
  for (const char of pattern) {
    if (char === '*' || char === '%') {
      expression += '.*';
    } else if (char === '?' || char === '_') {
      expression += '.';
    } else {
      expression += char.replace(/[.+^${}()|[\]\\/-]/g, '\\$&');
    }
  }
  return { source: pattern, matcher: new RegExp(`^${expression}$`, 'i') };
}

export function matchesAny(
  patterns: readonly ExclusionPattern[],
  ...candidates: string[]
): ExclusionPattern | null {
  for (const pattern of patterns) {
    if (candidates.some((candidate) => pattern.matcher.test(candidate))) {
      return pattern;
    }
  }
  return null;
}
