/**
 * Tagged template literal function to strip leading indentation from multi-line strings.
 *
 * Usage:
 *   const str = dedent`
 *     Line 1
 *     Line 2
 *   `;
 *
 * This will produce "Line 1\nLine 2" without the leading spaces.
 */
export function dedent(strings: TemplateStringsArray, ...values: unknown[]): string {
  const fullString = strings.reduce(
    (acc, str, i) => acc + str + (i < values.length ? String(values[i]) : ''),
    ''
  );

  // Indentation of the first non-empty line
  const match = fullString.match(/^[ \t]*(?=\S)/m);
  const indent = match ? match[0] : '';

  if (!indent) return fullString.trim();

  const regex = new RegExp(`^${indent}`, 'gm');
  return fullString.replace(regex, '').trim();
}

export function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

const MARKDOWN_SPECIAL = /[*_`[\]()#<>!|\\]/g;

/** Strip Markdown special characters from user-derived strings before rendering. */
export function safeMarkdown(text: string): string {
  return text.replace(MARKDOWN_SPECIAL, '');
}

/** First whitespace-separated word of a display name, or the name itself. */
export function firstName(name: string): string {
  const [first] = name.trim().split(/\s+/);
  return first || name;
}
