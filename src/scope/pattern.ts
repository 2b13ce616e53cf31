/**
 * Channel pattern module
 * Matches channel directory names against glob-style patterns
 */

/**
 * Convert glob pattern to regex
 * Supports: * (any chars), ? (single char), [abc] (character class)
 */
export function globToRegex(glob: string): RegExp {
  let regex = '';

  for (let i = 0; i < glob.length; i++) {
    const char = glob[i];

    if (char === '*') {
      regex += '.*';
    } else if (char === '?') {
      regex += '.';
    } else if (char === '[') {
      const close = glob.indexOf(']', i + 2);
      if (close === -1) {
        regex += '\\[';
      } else {
        let body = glob.slice(i + 1, close).replace(/\\/g, '\\\\');
        if (body.startsWith('!')) body = `^${body.slice(1)}`;
        regex += `[${body}]`;
        i = close;
      }
    } else {
      regex += char.replace(/[.+^${}()|[\]\\]/g, '\\$&');
    }
  }

  // Anchor the pattern
  return new RegExp(`^${regex}$`);
}

/**
 * Keep the names matching a pattern, sorted
 */
export function filterByPattern(names: string[], pattern: string): string[] {
  const regex = globToRegex(pattern);
  return names.filter((name) => regex.test(name)).sort();
}
