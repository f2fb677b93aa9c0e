import type { Session } from '../browser/session.js';
import { ActionError } from '../utils/errors.js';
import { resolveInput } from './resolve.js';

export async function executeType(session: Session, target: string, value: string): Promise<void> {
  const candidate = await resolveInput(session, target);
  if (!candidate) {
    throw new ActionError('type', `Could not find input field: ${target}`);
  }

  // Filling rarely flakes the way clicking does, so there is no retry here.
  await candidate.locator.clear();
  await candidate.locator.fill(value);

  session.log('info', `Typed '${value}' into: ${target}`);
}
