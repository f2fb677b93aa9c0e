import type { Locator } from 'playwright';
import type { Session } from '../browser/session.js';
import { config } from '../config.js';
import { ActionError, errorMessage } from '../utils/errors.js';
import { truncateText } from '../utils/sanitize.js';
import { resolveClickable } from './resolve.js';
import { retryPolicy, withRetry } from './retry.js';

export const clickRetry = retryPolicy(config.timing.maxAttempts, config.timing.clickRetryDelayMs);

const DIAGNOSTIC_LIMIT = 5;

export function isNavigationClick(
  target: string,
  keywords: readonly string[] = config.navKeywords,
): boolean {
  const lower = target.toLowerCase();
  return keywords.some((keyword) => lower.includes(keyword));
}

async function visibleTexts(locator: Locator, limit: number): Promise<string[]> {
  const texts: string[] = [];
  for (const item of await locator.all()) {
    if (texts.length >= limit) break;
    if (!(await item.isVisible())) continue;
    const text = (await item.textContent())?.trim();
    if (text) texts.push(truncateText(text, 80));
  }
  return texts;
}

/** Log what could have been clicked, to help fix a target that matched nothing. */
export async function logAvailableClickables(session: Session): Promise<void> {
  try {
    const buttons = await visibleTexts(session.page.getByRole('button'), DIAGNOSTIC_LIMIT);
    const links = await visibleTexts(session.page.getByRole('link'), DIAGNOSTIC_LIMIT);

    session.log('info', 'Available clickable elements on page:');
    for (const text of buttons) session.log('info', `  Button: '${text}'`);
    for (const text of links) session.log('info', `  Link: '${text}'`);
  } catch (err) {
    const message = errorMessage(err);
    session.log('debug', `Could not list clickable elements: ${message}`);
  }
}

export async function executeClick(session: Session, target: string): Promise<void> {
  const { page } = session;
  session.log('info', `Looking for clickable element: ${target}`);

  const candidate = await resolveClickable(session, target);
  if (!candidate) {
    await logAvailableClickables(session);
    throw new ActionError('click', `Could not find any clickable element with text: ${target}`);
  }

  try {
    await withRetry(
      () => candidate.locator.click({ timeout: config.timing.clickTimeoutMs }),
      clickRetry,
      {
        sleep: (ms) => page.waitForTimeout(ms),
        onRetry: (attempt, err) =>
          session.log('warn', `Click attempt ${attempt} failed: ${err.message}. Retrying...`),
      },
    );
  } catch (err) {
    const message = errorMessage(err);
    throw new ActionError(
      'click',
      `Clicking ${target} failed after ${clickRetry.maxAttempts} attempts: ${message}`,
    );
  }

  session.log('info', `Successfully clicked: ${target}`);
  await page.waitForTimeout(config.timing.postClickSettleMs);

  if (isNavigationClick(target)) {
    session.log('info', 'Navigation click detected - waiting for page/menu to stabilize');
    await page.waitForTimeout(config.timing.navClickSettleMs);
    await page
      .waitForLoadState('networkidle', { timeout: config.timing.navClickIdleTimeoutMs })
      .catch(() => {
        session.log('info', "Network didn't idle, continuing anyway");
      });
  }
}
