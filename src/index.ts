export * from './actions/index.js';
export { BrowserEngine, browserEngine } from './browser/engine.js';
export { Session, formatTimestamp } from './browser/session.js';
export type { LogLevel, LogListener, SessionCreateOptions } from './browser/session.js';
export { config } from './config.js';
export type { Config } from './config.js';
export type { LLMClient } from './parser/client.js';
export { createOpenAIClient } from './parser/openai.js';
export { PromptParser, parseActions } from './parser/prompt-parser.js';
export { TestReporter } from './report/reporter.js';
export type { RunTotals, TestReport, TestResult } from './report/reporter.js';
export { ScenarioRunner } from './scenario/runner.js';
export type { ActionExecutor, ScenarioRunResult, ScenarioRunState, ScenarioRunnerOptions } from './scenario/runner.js';
export * from './scenario/types.js';
export * from './utils/errors.js';
export { RateLimiter } from './utils/rate-limiter.js';
