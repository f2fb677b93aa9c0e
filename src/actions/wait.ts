import type { Session } from '../browser/session.js';
import { ActionError, errorMessage } from '../utils/errors.js';

export async function executeWait(
  session: Session,
  target: string,
  timeoutSeconds: number,
): Promise<void> {
  const timeout = timeoutSeconds * 1000;

  try {
    await session.page
      .getByText(target, { exact: true })
      .filter({ visible: true })
      .first()
      .waitFor({ state: 'visible', timeout });
  } catch (err) {
    const message = errorMessage(err);
    throw new ActionError('waitForElement', `Timeout waiting for element: ${target} (${message})`);
  }

  session.log('info', `Successfully waited for element: ${target}`);
}
