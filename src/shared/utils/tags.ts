/**
 * Tag helpers: protection patterns and the report encoding of tag maps.
 */

/**
 * A parsed protection pattern.
 *
 * `value` undefined means "tag key present, any value".
 */
export interface TagPattern {
  key: string;
  value?: string;
}

/**
 * Parse "Key=Value" / "Key" patterns. Blank entries are ignored.
 *
 * @example parseTagPatterns(['DoNotDelete=true', 'Retention']) →
 *   [{ key: 'DoNotDelete', value: 'true' }, { key: 'Retention' }]
 */
export function parseTagPatterns(patterns: readonly string[]): TagPattern[] {
  const parsed: TagPattern[] = [];
  for (const raw of patterns) {
    const pattern = raw.trim();
    if (!pattern) continue;

    const separator = pattern.indexOf('=');
    if (separator === -1) {
      parsed.push({ key: pattern });
    } else {
      parsed.push({
        key: pattern.slice(0, separator).trim(),
        value: pattern.slice(separator + 1).trim(),
      });
    }
  }
  return parsed;
}

/**
 * Find the first pattern matching the tags, by exact key and (when given) exact value.
 *
 * @returns The matching pattern, or undefined when the tags are unprotected
 */
export function findProtectingPattern(
  tags: Record<string, string>,
  patterns: readonly TagPattern[]
): TagPattern | undefined {
  return patterns.find((pattern) => {
    if (!Object.prototype.hasOwnProperty.call(tags, pattern.key)) {
      return false;
    }
    return pattern.value === undefined || tags[pattern.key] === pattern.value;
  });
}

export function formatTagPattern(pattern: TagPattern): string {
  return pattern.value === undefined ? pattern.key : `${pattern.key}=${pattern.value}`;
}

function escapeTagPart(value: string): string {
  return value.replace(/[\\;=]/g, (ch) => `\\${ch}`);
}

/**
 * Encode tags as `key=value` pairs joined by `;`, sorted by key.
 * Backslash escapes `\`, `;` and `=` inside keys and values.
 */
export function encodeTags(tags: Record<string, string>): string {
  return Object.keys(tags)
    .sort()
    .map((key) => `${escapeTagPart(key)}=${escapeTagPart(tags[key])}`)
    .join(';');
}

/**
 * Inverse of {@link encodeTags}.
 */
export function decodeTags(encoded: string): Record<string, string> {
  const tags: Record<string, string> = {};
  if (!encoded) {
    return tags;
  }

  let key = '';
  let current = '';
  let inValue = false;

  const flush = (): void => {
    const name = inValue ? key : current;
    if (name) {
      tags[name] = inValue ? current : '';
    }
    key = '';
    current = '';
    inValue = false;
  };

  for (let i = 0; i < encoded.length; i++) {
    const ch = encoded[i];
    if (ch === '\\' && i + 1 < encoded.length) {
      current += encoded[++i];
    } else if (ch === '=' && !inValue) {
      key = current;
      current = '';
      inValue = true;
    } else if (ch === ';') {
      flush();
    } else {
      current += ch;
    }
  }
  flush();

  return tags;
}
