/**
 * In-process stand-in for a Playwright page. Elements are plain records; the
 * lookups mirror the Playwright calls the engine makes closely enough to
 * exercise strategy order, disambiguation and visibility rules.
 */

import type { BrowserContext, Page } from 'playwright';
import { vi } from 'vitest';
import { Session } from '../../src/browser/session.js';

export interface FakeElement {
  tag: string;
  text?: string;
  /** Explicit role attribute. */
  role?: string;
  visible?: boolean;
  label?: string;
  placeholder?: string;
  type?: string;
  name?: string;
  id?: string;
  /** Number of clicks that time out before one goes through. */
  clickFailures?: number;
}

export interface FakePageState {
  clickAttempts: FakeElement[];
  clicks: FakeElement[];
  /** Interactions in order, e.g. "clear:email" or "fill:email=a@b.test". */
  events: string[];
  waits: Array<{ timeout?: number; state?: string }>;
}

type NameMatcher = string | RegExp | undefined;

function implicitRole(el: FakeElement): string | null {
  if (el.role !== undefined) return el.role;
  switch (el.tag) {
    case 'button':
      return 'button';
    case 'a':
      return 'link';
    case 'input':
      return 'textbox';
    default:
      return null;
  }
}

function matchesName(actual: string, name: NameMatcher, exact?: boolean): boolean {
  if (name === undefined) return true;
  if (name instanceof RegExp) return name.test(actual);
  return exact ? actual === name : actual.toLowerCase().includes(name.toLowerCase());
}

function elementKey(el: FakeElement): string {
  return el.id ?? el.name ?? el.text ?? el.tag;
}

const ATTRIBUTE_SELECTOR = /^(\w+)\[(\w+)(\*?)="((?:[^"\\]|\\.)*)"\]$/;

function matchesSelector(el: FakeElement, selector: string): boolean {
  return selector.split(/,\s*/).some((part) => {
    const match = ATTRIBUTE_SELECTOR.exec(part.trim());
    if (!match) throw new Error(`Unsupported selector in fake page: ${part}`);

    const [, tag, attr, contains, raw] = match;
    const expected = raw.replace(/\\(.)/g, '$1');
    if (el.tag !== tag) return false;

    const actual = attr === 'type' ? el.type : attr === 'name' ? el.name : attr === 'id' ? el.id : undefined;
    if (actual === undefined) return false;
    return contains ? actual.includes(expected) : actual === expected;
  });
}

export class FakeLocator {
  constructor(
    private readonly state: FakePageState,
    readonly elements: FakeElement[],
  ) {}

  private single(): FakeElement {
    if (this.elements.length !== 1) {
      throw new Error(`strict mode violation: locator resolved to ${this.elements.length} elements`);
    }
    return this.elements[0];
  }

  async count(): Promise<number> {
    return this.elements.length;
  }

  nth(index: number): FakeLocator {
    const el = this.elements[index];
    return new FakeLocator(this.state, el ? [el] : []);
  }

  filter(options: { visible?: boolean }): FakeLocator {
    const { visible } = options;
    if (visible === undefined) return this;
    return new FakeLocator(
      this.state,
      this.elements.filter((el) => (el.visible ?? true) === visible),
    );
  }

  first(): FakeLocator {
    return this.nth(0);
  }

  async all(): Promise<FakeLocator[]> {
    return this.elements.map((el) => new FakeLocator(this.state, [el]));
  }

  async click(_options?: { timeout?: number }): Promise<void> {
    const el = this.single();
    this.state.clickAttempts.push(el);
    if (el.clickFailures && el.clickFailures > 0) {
      el.clickFailures--;
      throw new Error('Timeout 10000ms exceeded');
    }
    this.state.clicks.push(el);
  }

  async clear(): Promise<void> {
    this.state.events.push(`clear:${elementKey(this.single())}`);
  }

  async fill(value: string): Promise<void> {
    this.state.events.push(`fill:${elementKey(this.single())}=${value}`);
  }

  async isVisible(): Promise<boolean> {
    return this.single().visible ?? true;
  }

  async getAttribute(name: string): Promise<string | null> {
    return name === 'role' ? (this.single().role ?? null) : null;
  }

  async evaluate<R>(fn: (el: { tagName: string }) => R): Promise<R> {
    return fn({ tagName: this.single().tag.toUpperCase() });
  }

  async textContent(): Promise<string | null> {
    return this.single().text ?? null;
  }

  async waitFor(options: { state?: string; timeout?: number } = {}): Promise<void> {
    this.state.waits.push(options);
    const el = this.elements[0];
    if (!el || el.visible === false) {
      throw new Error(`Timeout ${options.timeout ?? 30000}ms exceeded`);
    }
  }
}

export function createFakePage(elements: FakeElement[] = [], options: { url?: string } = {}) {
  const state: FakePageState = { clickAttempts: [], clicks: [], events: [], waits: [] };
  let currentUrl = options.url ?? 'about:blank';
  const locate = (predicate: (el: FakeElement) => boolean) =>
    new FakeLocator(state, elements.filter(predicate));

  const page = {
    getByRole: vi.fn((role: string, opts: { name?: NameMatcher; exact?: boolean } = {}) =>
      locate((el) => implicitRole(el) === role && matchesName(el.text ?? '', opts.name, opts.exact)),
    ),
    getByText: vi.fn((text: string, opts: { exact?: boolean } = {}) =>
      locate((el) => el.text !== undefined && matchesName(el.text, text, opts.exact)),
    ),
    getByLabel: vi.fn((text: string) =>
      locate((el) => el.label !== undefined && matchesName(el.label, text)),
    ),
    getByPlaceholder: vi.fn((text: string) =>
      locate((el) => el.placeholder !== undefined && matchesName(el.placeholder, text)),
    ),
    locator: vi.fn((selector: string) => locate((el) => matchesSelector(el, selector))),
    goto: vi.fn(async (url: string, _options?: { waitUntil?: string; timeout?: number }) => {
      currentUrl = url;
      return null;
    }),
    url: vi.fn(() => currentUrl),
    waitForTimeout: vi.fn(async (_ms: number) => {}),
    waitForLoadState: vi.fn(async (_state?: string, _options?: { timeout?: number }) => {}),
  };

  return { page, state, elements };
}

export type FakePage = ReturnType<typeof createFakePage>['page'];

export function createTestSession(page: FakePage) {
  // The fake implements only what the engine touches.
  const session = new Session(
    'test-session',
    {} as unknown as BrowserContext,
    page as unknown as Page,
  );
  const lines: string[] = [];
  session.onLog((line) => lines.push(line));
  return { session, lines };
}

/** Log lines without their timestamp prefix. */
export function messages(lines: string[]): string[] {
  return lines.map((line) => line.replace(/^\[[^\]]+\] /, ''));
}

export function setup(elements: FakeElement[] = [], options: { url?: string } = {}) {
  const fake = createFakePage(elements, options);
  const { session, lines } = createTestSession(fake.page);
  return { ...fake, session, lines };
}
