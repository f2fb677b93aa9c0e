#!/usr/bin/env node

/**
 * Interactive entry point.
 *
 * Usage:
 *   webpilot                       # Prompt for test instructions and run them
 *   webpilot --headless            # Same, without a visible browser window
 *   webpilot --base-url <url>      # Pass a base URL along with every prompt
 *   webpilot --report <path>       # Where to write the JSON report
 *   webpilot --help                # Show help
 */

import { createInterface } from 'node:readline/promises';
import { browserEngine } from './browser/engine.js';
import { Session } from './browser/session.js';
import { config } from './config.js';
import { createOpenAIClient } from './parser/openai.js';
import { PromptParser } from './parser/prompt-parser.js';
import { TestReporter } from './report/reporter.js';
import { ScenarioRunner } from './scenario/runner.js';
import { type TestScenario, describeAction } from './scenario/types.js';
import { ConfigError, ParseError, errorMessage } from './utils/errors.js';
import { logger } from './utils/logger.js';
import { RateLimiter } from './utils/rate-limiter.js';

const HELP = `
webpilot: run plain-language web tests in a real browser

Usage:
  webpilot                    Prompt for test instructions and run them
  webpilot --headless         Run the browser without a window
  webpilot --base-url <url>   Base URL passed to the parser with every prompt
  webpilot --report <path>    JSON report path (default: ${config.reportPath})
  webpilot --help             Show this help message

Environment variables:
  OPENAI_API_KEY              API key for the parser (required)
  WEBPILOT_MODEL              Chat model (default: gpt-3.5-turbo)
  WEBPILOT_HEADLESS           Run browser headless (default: false)
  WEBPILOT_BROWSER            chromium|firefox|webkit (default: chromium)
  WEBPILOT_NAV_KEYWORDS       Click targets that get a longer settle (default: product,dashboard,menu,nav)
  WEBPILOT_REPORT_PATH        JSON report path (default: test-report.json)
  WEBPILOT_LOG_LEVEL          silent|debug|info|warn|error (default: info)
`.trim();

const MISSING_KEY_HELP = `
To fix this:
1. Create an OpenAI API key
2. Set the environment variable:
   Linux/macOS: export OPENAI_API_KEY=<your key>
   Windows PowerShell: $env:OPENAI_API_KEY="<your key>"
`.trim();

function optionValue(args: string[], name: string): string | undefined {
  const index = args.indexOf(name);
  return index >= 0 ? args[index + 1] : undefined;
}

const args = process.argv.slice(2);

if (args.includes('--help') || args.includes('-h')) {
  console.log(HELP);
  process.exit(0);
}

const headless = args.includes('--headless') || config.headless;
const baseUrl = optionValue(args, '--base-url') ?? '';
const reportPath = optionValue(args, '--report') ?? config.reportPath;

async function main(): Promise<void> {
  if (!config.openaiApiKey) {
    throw new ConfigError('OPENAI_API_KEY environment variable is required');
  }

  const parser = new PromptParser({
    client: createOpenAIClient({ apiKey: config.openaiApiKey, model: config.model }),
    rateLimiter: new RateLimiter({
      minIntervalMs: config.llmMinIntervalMs,
      onWait: (ms) => logger.info(`Rate limiting: waiting ${(ms / 1000).toFixed(1)}s before API call...`),
    }),
    cacheSize: config.parseCacheSize,
  });
  const reporter = new TestReporter();
  const rl = createInterface({ input: process.stdin, output: process.stdout });

  await browserEngine.launch({ headless });
  const session = await Session.create(browserEngine.getBrowser());
  session.onLog((line) => reporter.addLog(line));
  const runner = new ScenarioRunner(session);

  try {
    for (;;) {
      const input = (await rl.question("\nEnter your test prompt (or 'exit'): ")).trim();
      if (input === '' || input.toLowerCase() === 'exit') break;

      let scenario: TestScenario;
      try {
        scenario = await parser.parse(input, baseUrl);
      } catch (err) {
        if (!(err instanceof ParseError)) throw err;
        console.log(`\n${err.message}`);
        continue;
      }

      console.log(`\nParsed scenario: ${scenario.name}`);
      console.log('Actions to execute:');
      scenario.actions.forEach((action, i) => {
        console.log(`  ${i + 1}. ${describeAction(action)}`);
      });

      const proceed = (await rl.question('\nProceed with execution? (y/n): ')).trim().toLowerCase();
      if (proceed !== 'y' && proceed !== 'yes') continue;

      reporter.startScenario(scenario);
      const result = await runner.run(scenario);
      reporter.endScenario(result.success, result.success ? undefined : result.error);

      console.log(`\nScenario execution: ${result.success ? 'SUCCESS' : 'FAILED'}`);
    }
  } finally {
    rl.close();
    await reporter.writeReport(reportPath);
    console.log(`Test report generated: ${reportPath}`);
    console.log(`\n${reporter.formatSummary().join('\n')}`);
    await session.close();
    await browserEngine.close();
  }
}

main().catch(async (err) => {
  if (err instanceof ConfigError) {
    console.error(`\nERROR: ${err.message}\n\n${MISSING_KEY_HELP}`);
  } else {
    logger.fatal({ err }, `webpilot failed: ${errorMessage(err)}`);
  }
  await browserEngine.close();
  process.exit(1);
});
