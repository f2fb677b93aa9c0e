import type { Session } from '../browser/session.js';
import { config } from '../config.js';
import { NavigationError, ValidationError, errorMessage } from '../utils/errors.js';
import { isUrlLike, sanitizeUrl, withDefaultScheme } from '../utils/sanitize.js';
import { retryPolicy, withRetry } from './retry.js';

export const navigationRetry = retryPolicy(
  config.timing.maxAttempts,
  config.timing.navigationRetryDelayMs,
);

export function toNavigableUrl(target: string): string {
  const trimmed = target.trim();
  if (!isUrlLike(trimmed)) {
    throw new ValidationError(
      `'${trimmed}' doesn't look like a URL. Did you mean to click on a '${trimmed}' link instead?`,
    );
  }
  return sanitizeUrl(withDefaultScheme(trimmed));
}

export async function executeNavigate(session: Session, target: string): Promise<void> {
  const url = toNavigableUrl(target);
  const { page } = session;
  const { maxAttempts } = navigationRetry;

  try {
    await withRetry(
      async (attempt) => {
        session.log('info', `Navigation attempt ${attempt}/${maxAttempts} to: ${url}`);
        await page.goto(url, {
          waitUntil: 'networkidle',
          timeout: config.timing.navigationTimeoutMs,
        });
      },
      navigationRetry,
      {
        sleep: (ms) => page.waitForTimeout(ms),
        onRetry: (attempt, err) =>
          session.log('warn', `Navigation attempt ${attempt} failed: ${err.message}. Retrying...`),
      },
    );
  } catch (err) {
    const message = errorMessage(err);
    throw new NavigationError(url, `${maxAttempts} attempts failed, last error: ${message}`);
  }

  // Dynamic content keeps arriving after network idle on many apps
  await page.waitForTimeout(config.timing.postNavigateSettleMs);
  session.log('info', `Successfully navigated to: ${url}`);
}
