/**
 * String manipulation utilities.
 */

/**
 * Truncate a string to a maximum length, adding ellipsis if truncated.
 *
 * @param str - The string to truncate
 * @param maxLen - Maximum length of the resulting string (including ellipsis)
 * @returns The truncated string with ellipsis, or original if within limit
 */
export function truncateString(str: string, maxLen: number): string {
  if (maxLen < 0) {
    return '';
  }

  if (str.length <= maxLen) {
    return str;
  }

  if (maxLen <= 3) {
    return str.slice(0, maxLen);
  }

  return str.slice(0, maxLen - 3) + '...';
}

/**
 * Substitute `{name}` placeholders. Unknown placeholders are kept verbatim.
 */
export function renderTemplate(template: string, values: Record<string, string>): string {
  return template.replace(/\{(\w+)\}/g, (match, key: string) =>
    Object.prototype.hasOwnProperty.call(values, key) ? values[key] : match
  );
}

/**
 * Collapse runs of whitespace (including newlines) into single spaces.
 */
export function collapseWhitespace(str: string): string {
  return str.replace(/\s+/g, ' ').trim();
}
