/**
 * Name canonicalization, catalog key slugs and redaction detection.
 */

export const DEFAULT_NAME_FILTERS: readonly RegExp[] = [
  // discount prefix added at upload time
  /💲.*?% OFF💲/gu,
  // bracketed tags, brackets included
  /\[.*?\]/gu,
  // anything outside alphanumerics, whitespace and basic punctuation
  /[^a-zA-Z0-9!?,.\-\s]/gu,
];

/**
 * Compiles user-supplied filter patterns. Throws a SyntaxError naming the bad pattern.
 */
export function compileNameFilters(patterns: readonly string[]): RegExp[] {
  return patterns.map((pattern) => {
    try {
      return new RegExp(pattern, "gu");
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new SyntaxError(`Invalid name filter \`${pattern}\`: ${reason}`);
    }
  });
}

/**
 * Replaces every filter match with a space, then collapses whitespace.
 */
export function canonicalName(name: string, filters?: readonly RegExp[]): string {
  const active = filters && filters.length > 0 ? filters : DEFAULT_NAME_FILTERS;

  let out = name;
  for (const filter of active) {
    out = out.replace(globalCopy(filter), " ");
  }
  return out.replace(/\s+/gu, " ").trim();
}

/**
 * Catalog key for a product name: lowercase ASCII alphanumerics joined by hyphens.
 */
export function slugify(name: string): string {
  return name
    .toLowerCase()
    .replace(/[^a-z0-9\s]/gu, "")
    .trim()
    .replace(/\s+/gu, "-");
}

/**
 * True for text the platform redacted: only `#` placeholders and whitespace.
 */
export function isCensored(text: string): boolean {
  const trimmed = text.trim();
  return trimmed.length > 0 && /^[#\s]+$/u.test(trimmed);
}

function globalCopy(filter: RegExp): RegExp {
  return filter.global ? filter : new RegExp(filter.source, `${filter.flags}g`);
}
