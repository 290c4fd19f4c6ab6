/**
 * Builds an XPath string literal for an arbitrary value.
 *
 * Values holding both quote characters are expressed with concat(), since
 * XPath 1.0 literals have no escape sequence.
 */
export function escapeXPathLiteral(value: string): string {
  if (!value.includes("'")) {
    return `'${value}'`;
  }
  if (!value.includes('"')) {
    return `"${value}"`;
  }

  const quoteIsLast = value.endsWith('"');
  const parts = value.split('"');
  while (parts.length > 0 && parts[parts.length - 1] === '') {
    parts.pop();
  }

  const pieces = parts.map((part) => `"${part}"`);
  return `concat(${pieces.join(`, '"', `)}${quoteIsLast ? `, '"'` : ''})`;
}

/**
 * Collapses runs of whitespace the way XPath normalize-space() does.
 */
export function normalizeSpace(value: string): string {
  return value.replace(/\s+/g, ' ').trim();
}
