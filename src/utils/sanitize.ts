import { ValidationError } from './errors.js';

const BLOCKED_PROTOCOLS = ['javascript:', 'data:', 'file:', 'vbscript:'];

export function sanitizeUrl(url: string): string {
  const trimmed = url.trim();
  if (trimmed === '') {
    throw new ValidationError('URL must not be empty');
  }

  const lower = trimmed.toLowerCase();
  for (const protocol of BLOCKED_PROTOCOLS) {
    if (lower.startsWith(protocol)) {
      throw new ValidationError(`Blocked URL protocol: ${protocol}`);
    }
  }

  let parsed: URL;
  try {
    parsed = new URL(trimmed);
  } catch {
    throw new ValidationError(`Invalid URL: ${trimmed}`);
  }

  if (parsed.protocol !== 'http:' && parsed.protocol !== 'https:') {
    throw new ValidationError(`Only http and https URLs are allowed, got: ${parsed.protocol}`);
  }

  return parsed.href;
}

/**
 * A navigate target counts as a URL only when it carries a scheme, a dot or a slash.
 * Bare words like "Products" are section names and belong to a click.
 */
export function isUrlLike(target: string): boolean {
  return target.startsWith('http') || target.includes('.') || target.includes('/');
}

export function withDefaultScheme(target: string): string {
  return target.startsWith('http') ? target : `https://${target}`;
}

/** Quote a value for use inside a CSS attribute selector. */
export function cssString(value: string): string {
  return `"${value.replace(/\\/g, '\\\\').replace(/"/g, '\\"')}"`;
}

export function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

export function truncateText(text: string, maxLength: number): string {
  if (text.length <= maxLength) return text;
  return `${text.slice(0, maxLength - 3)}...`;
}
