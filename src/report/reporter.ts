import { writeFile } from 'node:fs/promises';
import type { TestScenario } from '../scenario/types.js';

export interface TestResult {
  scenarioId: string;
  scenarioName: string;
  description: string;
  success: boolean;
  startTime: Date;
  endTime: Date;
  durationMs: number;
  logs: string[];
  errorMessage?: string;
}

export interface RunTotals {
  total: number;
  passed: number;
  failed: number;
  averageDurationMs: number | null;
}

export interface TestReport extends RunTotals {
  generatedAt: string;
  results: Array<Omit<TestResult, 'startTime' | 'endTime'> & { startTime: string; endTime: string }>;
}

interface PendingResult {
  scenario: TestScenario;
  startTime: Date;
  logs: string[];
}

function formatDuration(ms: number): string {
  const totalSeconds = Math.round(ms / 1000);
  const minutes = Math.floor(totalSeconds / 60);
  const seconds = totalSeconds % 60;
  return `${String(minutes).padStart(2, '0')}:${String(seconds).padStart(2, '0')}`;
}

/**
 * Collects log lines and verdicts per scenario. Lines arriving while no
 * scenario is open are dropped.
 */
export class TestReporter {
  private readonly results: TestResult[] = [];
  private current: PendingResult | null = null;
  private readonly now: () => Date;

  constructor(options: { now?: () => Date } = {}) {
    this.now = options.now ?? (() => new Date());
  }

  startScenario(scenario: TestScenario): void {
    this.current = { scenario, startTime: this.now(), logs: [] };
  }

  addLog(line: string): void {
    this.current?.logs.push(line);
  }

  endScenario(success: boolean, errorMessage?: string): TestResult | null {
    const pending = this.current;
    if (!pending) return null;

    const endTime = this.now();
    const result: TestResult = {
      scenarioId: pending.scenario.id,
      scenarioName: pending.scenario.name,
      description: pending.scenario.description,
      success,
      startTime: pending.startTime,
      endTime,
      durationMs: endTime.getTime() - pending.startTime.getTime(),
      logs: pending.logs,
      ...(errorMessage !== undefined && { errorMessage }),
    };

    this.results.push(result);
    this.current = null;
    return result;
  }

  getResults(): readonly TestResult[] {
    return this.results;
  }

  totals(): RunTotals {
    const passed = this.results.filter((r) => r.success).length;
    const averageDurationMs =
      this.results.length > 0
        ? this.results.reduce((sum, r) => sum + r.durationMs, 0) / this.results.length
        : null;

    return {
      total: this.results.length,
      passed,
      failed: this.results.length - passed,
      averageDurationMs,
    };
  }

  buildReport(): TestReport {
    return {
      generatedAt: this.now().toISOString(),
      ...this.totals(),
      results: this.results.map((r) => ({
        ...r,
        startTime: r.startTime.toISOString(),
        endTime: r.endTime.toISOString(),
      })),
    };
  }

  async writeReport(outputPath: string): Promise<void> {
    await writeFile(outputPath, `${JSON.stringify(this.buildReport(), null, 2)}\n`, 'utf8');
  }

  formatSummary(): string[] {
    const totals = this.totals();
    const lines = [
      '=== TEST EXECUTION SUMMARY ===',
      `Total Scenarios: ${totals.total}`,
      `Passed: ${totals.passed}`,
      `Failed: ${totals.failed}`,
    ];
    if (totals.averageDurationMs !== null) {
      lines.push(`Average Duration: ${formatDuration(totals.averageDurationMs)}`);
    }

    lines.push('', '=== DETAILED RESULTS ===');
    for (const result of this.results) {
      lines.push('', `${result.scenarioName}: ${result.success ? 'PASSED' : 'FAILED'}`);
      lines.push(`Duration: ${formatDuration(result.durationMs)}`);
      if (!result.success && result.errorMessage) {
        lines.push(`Error: ${result.errorMessage}`);
      }
    }
    return lines;
  }
}
