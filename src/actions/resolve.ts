import type { Locator } from 'playwright';
import type { Session } from '../browser/session.js';
import { targetVariants } from './normalize.js';
import { clickStrategies, inputStrategies, type LookupStrategy } from './strategies.js';

export interface ResolutionCandidate {
  /** Narrowed to a single element. */
  locator: Locator;
  strategy: string;
  /** The target variant that matched. */
  target: string;
  matchCount: number;
}

/**
 * Try every strategy against every target variant, strategy-major: each
 * strategy sees all variants before the next strategy runs. The first
 * non-empty match wins.
 */
export async function resolveWithStrategies(
  session: Session,
  variants: readonly string[],
  strategies: readonly LookupStrategy[],
): Promise<ResolutionCandidate | null> {
  for (const strategy of strategies) {
    for (const target of variants) {
      const locator = strategy.locate(session.page, target);
      if (!locator) continue;

      const count = await locator.count();
      if (count === 0) continue;

      let chosen: Locator;
      if (count === 1) {
        chosen = locator;
      } else if (strategy.select) {
        session.log('info', `Found ${count} elements for "${target}", selecting the most appropriate one`);
        chosen = await strategy.select(locator, count);
      } else {
        chosen = locator.first();
      }

      session.log('info', `Found ${strategy.name}: ${target}`, { strategy: strategy.name, count });
      return { locator: chosen, strategy: strategy.name, target, matchCount: count };
    }
  }

  return null;
}

export async function resolveClickable(
  session: Session,
  rawTarget: string,
): Promise<ResolutionCandidate | null> {
  const variants = targetVariants(rawTarget);
  if (variants[0] !== rawTarget) {
    session.log('info', `Cleaned target: '${rawTarget}' -> '${variants[0]}'`);
  }
  return resolveWithStrategies(session, variants, clickStrategies);
}

export async function resolveInput(
  session: Session,
  rawTarget: string,
): Promise<ResolutionCandidate | null> {
  return resolveWithStrategies(session, [rawTarget], inputStrategies);
}

/**
 * True when at least one element whose text is exactly `text` is visible.
 * Elements that exist but are hidden do not count.
 */
export async function resolveVisibleText(session: Session, text: string): Promise<boolean> {
  const matches = session.page.getByText(text, { exact: true });
  const count = await matches.count();

  if (count === 0) {
    session.log('info', `Verify text '${text}': Not found`);
    return false;
  }

  if (count === 1) {
    const visible = await matches.isVisible();
    session.log('info', `Verify text '${text}': ${visible ? 'Found and visible' : 'Found but not visible'}`);
    return visible;
  }

  session.log('info', `Found ${count} elements with text '${text}', checking visibility`);
  for (let i = 0; i < count; i++) {
    if (await matches.nth(i).isVisible()) {
      session.log('info', `Verify text '${text}': Found and visible (match ${i + 1} of ${count})`);
      return true;
    }
  }

  session.log('info', `Verify text '${text}': Found ${count} matches but none are visible`);
  return false;
}
