import type { ActionType } from '../scenario/types.js';

export interface ActionResult {
  type: ActionType;
  success: boolean;
  error?: string;
  durationMs: number;
}
