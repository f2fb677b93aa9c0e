import type { Session } from '../browser/session.js';
import { ActionError, ValidationError } from '../utils/errors.js';
import { resolveVisibleText } from './resolve.js';

export async function executeVerifyText(session: Session, value: string): Promise<void> {
  const text = value.trim();
  if (text === '') {
    throw new ValidationError('VerifyText action has empty value. Expected text to verify is missing.');
  }

  session.log('info', `Verifying text is visible: '${text}'`);
  if (!(await resolveVisibleText(session, text))) {
    throw new ActionError('verifyText', `Text '${text}' is not visible on the page`);
  }
}

export function executeVerifyUrl(session: Session, expected: string): void {
  const current = session.page.url();
  const matches = current.includes(expected);

  session.log(
    'info',
    `Verify URL contains '${expected}': ${matches ? 'Match' : 'No match'} (Current: ${current})`,
  );

  if (!matches) {
    throw new ActionError('verifyUrl', `URL '${current}' does not contain '${expected}'`);
  }
}
