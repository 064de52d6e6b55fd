/**
 * Category helpers. Categories are free-form labels: the original case is
 * kept for display, comparisons ignore case.
 */

/**
 * Key used to compare and group categories.
 */
export function categoryKey(label: string): string {
  return label.trim().toLowerCase();
}

export function isSameCategory(a: string, b: string): boolean {
  return categoryKey(a) === categoryKey(b);
}

/**
 * Unique category labels, keeping the case of the first occurrence,
 * sorted case-insensitively.
 */
export function uniqueCategories(labels: Iterable<string>): string[] {
  const seen = new Map<string, string>();
  for (const label of labels) {
    const key = categoryKey(label);
    if (!seen.has(key)) seen.set(key, label);
  }
  return Array.from(seen.entries())
    .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
    .map(([, label]) => label);
}
