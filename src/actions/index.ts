import type { Session } from '../browser/session.js';
import { type TestAction, describeAction, validateAction } from '../scenario/types.js';
import { ValidationError, errorMessage } from '../utils/errors.js';
import { executeClick } from './click.js';
import { executeNavigate } from './navigate.js';
import { executeType } from './type.js';
import type { ActionResult } from './types.js';
import { executeVerifyText, executeVerifyUrl } from './verify.js';
import { executeWait } from './wait.js';

export type { ActionResult } from './types.js';
export type { ResolutionCandidate } from './resolve.js';
export type { LookupStrategy } from './strategies.js';
export type { RetryPolicy } from './retry.js';
export { executeClick, isNavigationClick } from './click.js';
export { executeNavigate, toNavigableUrl } from './navigate.js';
export { executeType } from './type.js';
export { executeWait } from './wait.js';
export { executeVerifyText, executeVerifyUrl } from './verify.js';
export { normalizeTarget } from './normalize.js';
export { resolveClickable, resolveInput, resolveVisibleText, resolveWithStrategies } from './resolve.js';
export { clickStrategies, inputStrategies, pickClickable } from './strategies.js';
export { retryPolicy, withRetry } from './retry.js';

async function dispatch(session: Session, action: TestAction): Promise<void> {
  switch (action.type) {
    case 'Navigate':
      return executeNavigate(session, action.target);
    case 'Click':
      return executeClick(session, action.target);
    case 'Type':
      return executeType(session, action.target, action.value);
    case 'WaitForElement':
      return executeWait(session, action.target, action.timeoutSeconds);
    case 'VerifyText':
      return executeVerifyText(session, action.value);
    case 'VerifyUrl':
      return executeVerifyUrl(session, action.value);
    default: {
      const exhaustive: never = action.type;
      throw new ValidationError(`Unknown action type: ${String(exhaustive)}`);
    }
  }
}

/**
 * Execute one action against the session's page. This is the action
 * boundary: every failure, expected or not, comes back as
 * `{ success: false }` and nothing is thrown.
 */
export async function executeAction(session: Session, action: TestAction): Promise<ActionResult> {
  const started = Date.now();
  const finish = (error?: string): ActionResult => ({
    type: action.type,
    success: error === undefined,
    ...(error !== undefined && { error }),
    durationMs: Date.now() - started,
  });

  session.log('info', `Executing ${describeAction(action)}`);

  const violation = validateAction(action);
  if (violation) {
    session.log('error', `Invalid action: ${violation}`);
    session.log('error', `Action details - Target: '${action.target}', Value: '${action.value}'`);
    return finish(violation);
  }

  try {
    await dispatch(session, action);
  } catch (err) {
    const message = errorMessage(err);
    if (err instanceof ValidationError) {
      session.log('error', `Invalid action: ${message}`);
    } else {
      session.log('error', `Exception executing ${action.type}: ${message}`);
    }
    return finish(message);
  }

  session.log('info', `${action.type} succeeded`);
  return finish();
}
