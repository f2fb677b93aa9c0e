import { nanoid } from 'nanoid';

export const ACTION_TYPES = [
  'Navigate',
  'Click',
  'Type',
  'WaitForElement',
  'VerifyText',
  'VerifyUrl',
] as const;

export type ActionType = (typeof ACTION_TYPES)[number];

export const DEFAULT_TIMEOUT_SECONDS = 30;

export interface TestAction {
  readonly type: ActionType;
  /** Element descriptor, or the URL for Navigate. Unused by VerifyUrl. */
  readonly target: string;
  /** Text to type or verify. */
  readonly value: string;
  /** Only WaitForElement reads this. */
  readonly timeoutSeconds: number;
}

export interface TestScenario {
  readonly id: string;
  readonly name: string;
  /** The prompt the scenario was parsed from. */
  readonly description: string;
  /** Advisory only; actions carry their own URLs. */
  readonly baseUrl?: string;
  readonly actions: readonly TestAction[];
}

export interface ActionInit {
  type: ActionType;
  target?: string;
  value?: string;
  timeoutSeconds?: number;
}

export function createAction(init: ActionInit): TestAction {
  return Object.freeze({
    type: init.type,
    target: init.target ?? '',
    value: init.value ?? '',
    timeoutSeconds: init.timeoutSeconds ?? DEFAULT_TIMEOUT_SECONDS,
  });
}

export function createScenario(init: {
  name: string;
  description: string;
  baseUrl?: string;
  actions: readonly TestAction[];
}): TestScenario {
  return Object.freeze({
    id: nanoid(10),
    name: init.name,
    description: init.description,
    ...(init.baseUrl ? { baseUrl: init.baseUrl } : {}),
    actions: Object.freeze([...init.actions]),
  });
}

export function parseActionType(raw: string): ActionType | null {
  const lower = raw.trim().toLowerCase();
  return ACTION_TYPES.find((t) => t.toLowerCase() === lower) ?? null;
}

function requiresTarget(type: ActionType): boolean {
  switch (type) {
    case 'Navigate':
    case 'Click':
    case 'Type':
    case 'WaitForElement':
      return true;
    case 'VerifyText':
    case 'VerifyUrl':
      return false;
    default: {
      const exhaustive: never = type;
      throw new Error(`Unhandled action type: ${String(exhaustive)}`);
    }
  }
}

// VerifyText compares trimmed text, so a whitespace-only value is as good as
// none. Type sends the value verbatim and only needs it to be non-empty.
function hasRequiredValue(action: TestAction): boolean {
  switch (action.type) {
    case 'Type':
      return action.value !== '';
    case 'VerifyText':
      return action.value.trim() !== '';
    case 'Navigate':
    case 'Click':
    case 'WaitForElement':
    case 'VerifyUrl':
      return true;
    default: {
      const exhaustive: never = action.type;
      throw new Error(`Unhandled action type: ${String(exhaustive)}`);
    }
  }
}

/**
 * Returns a description of the first broken invariant, or null when the
 * action is well-formed.
 */
export function validateAction(action: TestAction): string | null {
  if (requiresTarget(action.type) && action.target.trim() === '') {
    return `${action.type} action requires a non-empty target`;
  }
  if (!hasRequiredValue(action)) {
    return `${action.type} action requires a non-empty value`;
  }
  if (action.type === 'WaitForElement' && !(action.timeoutSeconds > 0)) {
    return `WaitForElement timeout must be positive, got ${action.timeoutSeconds}`;
  }
  return null;
}

export function describeAction(action: TestAction): string {
  return `${action.type}: ${action.target} = ${action.value}`;
}
