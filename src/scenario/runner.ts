import { type ActionResult, executeAction } from '../actions/index.js';
import type { Session } from '../browser/session.js';
import { config } from '../config.js';
import { ScenarioInProgressError, errorMessage } from '../utils/errors.js';
import type { TestAction, TestScenario } from './types.js';

export type ScenarioRunState = 'not_started' | 'running' | 'completed' | 'aborted';

export interface ScenarioRunResult {
  scenarioId: string;
  success: boolean;
  status: 'completed' | 'aborted';
  /** Actions that were attempted, the failing one included. */
  actionsRun: number;
  results: ActionResult[];
  failedAction?: { index: number; action: TestAction };
  error?: string;
  startedAt: Date;
  finishedAt: Date;
}

export type ActionExecutor = (session: Session, action: TestAction) => Promise<ActionResult>;

export interface ScenarioRunnerOptions {
  interActionDelayMs?: number;
  /** Replaces the built-in dispatcher. */
  execute?: ActionExecutor;
}

/**
 * Runs one scenario at a time against a session. The first failing action
 * aborts the scenario; later actions are never attempted.
 */
export class ScenarioRunner {
  private readonly session: Session;
  private readonly interActionDelayMs: number;
  private readonly execute: ActionExecutor;
  private current: { state: ScenarioRunState; scenarioId?: string } = { state: 'not_started' };

  constructor(session: Session, options: ScenarioRunnerOptions = {}) {
    this.session = session;
    this.interActionDelayMs = options.interActionDelayMs ?? config.timing.interActionDelayMs;
    this.execute = options.execute ?? executeAction;
  }

  get state(): ScenarioRunState {
    return this.current.state;
  }

  async run(scenario: TestScenario): Promise<ScenarioRunResult> {
    if (this.current.state === 'running') {
      throw new ScenarioInProgressError(this.current.scenarioId ?? 'unknown');
    }
    this.current = { state: 'running', scenarioId: scenario.id };

    const { session } = this;
    const startedAt = new Date();
    const results: ActionResult[] = [];

    const finish = (failure?: { index?: number; error: string }): ScenarioRunResult => {
      const status = failure ? 'aborted' : 'completed';
      this.current = { state: status, scenarioId: scenario.id };
      return {
        scenarioId: scenario.id,
        success: !failure,
        status,
        actionsRun: results.length,
        results,
        ...(failure?.index !== undefined && {
          failedAction: { index: failure.index, action: scenario.actions[failure.index] },
        }),
        ...(failure && { error: failure.error }),
        startedAt,
        finishedAt: new Date(),
      };
    };

    session.log('info', `Starting execution of scenario: ${scenario.name}`);
    session.log('info', `Description: ${scenario.description}`);
    if (scenario.baseUrl) {
      session.log('info', `Base URL: ${scenario.baseUrl}`);
    }

    for (const [index, action] of scenario.actions.entries()) {
      let result: ActionResult;
      try {
        result = await this.execute(session, action);
      } catch (err) {
        const message = errorMessage(err);
        session.log('error', `Exception during scenario execution: ${message}`);
        result = { type: action.type, success: false, error: message, durationMs: 0 };
      }
      results.push(result);

      if (!result.success) {
        session.log('error', `Failed to execute action: ${action.type} - ${action.target}`);
        return finish({ index, error: result.error ?? `${action.type} failed` });
      }

      if (index < scenario.actions.length - 1) {
        try {
          await session.page.waitForTimeout(this.interActionDelayMs);
        } catch (err) {
          const message = errorMessage(err);
          session.log('error', `Exception during scenario execution: ${message}`);
          return finish({ error: message });
        }
      }
    }

    session.log('info', 'Scenario executed successfully');
    return finish();
  }
}
