const REGEX_SPECIAL = /[-\\^$+?.()|[\]{}/]/;

/**
 * Compile a key/file-name glob into an anchored regular expression.
 * Only `*` is a wildcard (any run of characters, including none); every other
 * character matches itself.
 */
export function compileWildcardGlob(pattern: string): RegExp {
  let regex = '';
  for (const char of pattern) {
    if (char === '*') {
      regex += '.*';
    } else if (REGEX_SPECIAL.test(char)) {
      regex += `\\${char}`;
    } else {
      regex += char;
    }
  }
  return new RegExp(`^${regex}$`);
}

export function countWildcards(pattern: string): number {
  let count = 0;
  for (const char of pattern) {
    if (char === '*') {
      count += 1;
    }
  }
  return count;
}

/** Longer patterns rank higher; each wildcard costs ten characters. */
export function globSpecificity(pattern: string): number {
  return pattern.length - countWildcards(pattern) * 10;
}
