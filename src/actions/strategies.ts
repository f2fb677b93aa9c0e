import type { Locator, Page } from 'playwright';
import { cssString, escapeRegExp } from '../utils/sanitize.js';

export interface LookupStrategy {
  readonly name: string;
  /** Build the locator for `target`, or return null when the strategy does not apply. */
  locate(page: Page, target: string): Locator | null;
  /** Narrow a multi-element match down to one element. Defaults to the first in DOM order. */
  select?(locator: Locator, count: number): Promise<Locator>;
}

const CLICKABLE_TAGS = new Set(['a', 'button']);
const CLICKABLE_ROLES = new Set(['button', 'link']);

/**
 * Among several elements sharing the same text, prefer a real link or button
 * over whatever wrapper happens to come first.
 */
export async function pickClickable(locator: Locator, count: number): Promise<Locator> {
  for (let i = 0; i < count; i++) {
    const candidate = locator.nth(i);
    const tagName = await candidate.evaluate((el) => el.tagName.toLowerCase());
    const role = await candidate.getAttribute('role');

    if (CLICKABLE_TAGS.has(tagName) || (role !== null && CLICKABLE_ROLES.has(role))) {
      return candidate;
    }
  }
  return locator.first();
}

function containsPattern(target: string): RegExp {
  return new RegExp(escapeRegExp(target), 'i');
}

export const clickStrategies: readonly LookupStrategy[] = [
  {
    name: 'button with exact text',
    locate: (page, target) => page.getByRole('button', { name: target, exact: true }),
  },
  {
    name: 'link with exact text',
    locate: (page, target) => page.getByRole('link', { name: target, exact: true }),
  },
  {
    name: 'element with exact text',
    locate: (page, target) => page.getByText(target, { exact: true }),
    select: pickClickable,
  },
  {
    name: 'button containing text',
    locate: (page, target) => page.getByRole('button', { name: containsPattern(target) }),
  },
  {
    name: 'link containing text',
    locate: (page, target) => page.getByRole('link', { name: containsPattern(target) }),
  },
];

export const inputStrategies: readonly LookupStrategy[] = [
  {
    name: 'input by label',
    locate: (page, target) => page.getByLabel(target),
  },
  {
    name: 'input by placeholder',
    locate: (page, target) => page.getByPlaceholder(target),
  },
  {
    name: 'email input by type',
    locate: (page, target) =>
      target.toLowerCase().includes('email') ? page.locator('input[type="email"]') : null,
  },
  {
    name: 'password input by type',
    locate: (page, target) =>
      target.toLowerCase().includes('password') ? page.locator('input[type="password"]') : null,
  },
  {
    name: 'input by name or id',
    locate: (page, target) => {
      const quoted = cssString(target);
      return page.locator(`input[name*=${quoted}], input[id*=${quoted}]`);
    },
  },
];
