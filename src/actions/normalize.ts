// Order matters: the first suffix that matches is the only one removed.
export const TARGET_SUFFIXES = [
  ' button',
  ' link',
  ' field',
  ' input',
  ' text',
  ' box',
  ' element',
] as const;

/**
 * Strip a trailing word like "button" or "field" that people add to a target
 * but that rarely appears in the element's own text.
 */
export function normalizeTarget(target: string): string {
  const trimmed = target.trim();
  const lower = trimmed.toLowerCase();

  for (const suffix of TARGET_SUFFIXES) {
    if (lower.endsWith(suffix)) {
      return trimmed.slice(0, trimmed.length - suffix.length).trim();
    }
  }

  return trimmed;
}

/** Normalized target first, then the raw one when it differs. */
export function targetVariants(raw: string): string[] {
  const normalized = normalizeTarget(raw);
  return normalized === raw ? [normalized] : [normalized, raw];
}
