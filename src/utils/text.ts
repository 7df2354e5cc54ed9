/**
 * Text normalisation shared by the generators and the topic search
 */

/**
 * Lower-case the text and keep only ASCII letters, digits and whitespace, trimmed
 */
export function cleanText(text: string): string {
  return text
    .toLowerCase()
    .replace(/[^a-z0-9\s]/g, '')
    .trim();
}

/**
 * Drop repeated values, keeping the first occurrence of each
 */
export function uniqueInOrder(values: readonly string[]): string[] {
  return Array.from(new Set(values));
}

/**
 * Turn a snake_case key into a title, e.g. `reddit_communities` -> `Reddit Communities`
 */
export function toTitleLabel(key: string): string {
  return key
    .split('_')
    .filter(Boolean)
    .map((word) => word.charAt(0).toUpperCase() + word.slice(1).toLowerCase())
    .join(' ');
}
