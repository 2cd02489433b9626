import chalk from 'chalk';
import type { TestResult, TestSuiteResult } from './types.js';
import { formatDuration } from './utils.js';

export interface ReporterOptions {
  verbose?: boolean;
  json?: boolean;
  /** Plain PASS/FAIL lines without colours or symbols */
  ci?: boolean;
}

export interface RunSummary {
  total: number;
  passed: number;
  failed: number;
  duration: number;
}

const passIcon = () => chalk.green('✔');
const failIcon = () => chalk.red('✖');

export function summarizeRun(results: TestSuiteResult[]): RunSummary {
  const passed = results.reduce((sum, r) => sum + r.passed, 0);
  const failed = results.reduce((sum, r) => sum + r.failed, 0);
  return {
    total: passed + failed,
    passed,
    failed,
    duration: results.reduce((sum, r) => sum + r.duration, 0),
  };
}

export function formatStepLine(result: TestResult, ci = false): string[] {
  const duration = formatDuration(result.duration);

  if (ci) {
    const lines = [`  ${result.passed ? 'PASS' : 'FAIL'} ${result.name} (${duration})`];
    if (!result.passed && result.error) {
      lines.push(`    Error: ${result.error}`);
    }
    return lines;
  }

  const lines = [`  ${result.passed ? passIcon() : failIcon()} ${result.name} ${chalk.gray(`(${duration})`)}`];
  if (!result.passed && result.error) {
    lines.push(`    ${chalk.red.bold('Error')}: ${result.error}`);
  }
  return lines;
}

export function formatSuiteSummary(result: TestSuiteResult, ci = false): string {
  const duration = formatDuration(result.duration);

  if (result.failed === 0) {
    return ci
      ? `  PASS ${result.passed} tests in ${duration}`
      : `  ${chalk.green.bold('✔')} ${result.passed} tests passed in ${duration}`;
  }
  return ci
    ? `  FAIL ${result.passed} passed, ${result.failed} failed in ${duration}`
    : `  ${chalk.red.bold('✖')} ${result.passed} passed, ${result.failed} failed in ${duration}`;
}

export function printJson(results: TestSuiteResult[]): void {
  const summary = summarizeRun(results);
  const output = {
    status: summary.failed === 0 ? 'passed' : 'failed',
    suites: results.map(suite => ({
      name: suite.name,
      passed: suite.passed,
      failed: suite.failed,
      duration_ms: Math.round(suite.duration),
      tests: suite.results.map(r => ({
        name: r.name,
        passed: r.passed,
        duration_ms: Math.round(r.duration),
        ...(r.responseStatus !== undefined && { status: r.responseStatus }),
        ...(r.error && { error: r.error }),
      })),
    })),
    summary: {
      total: summary.total,
      passed: summary.passed,
      failed: summary.failed,
      duration_ms: Math.round(summary.duration),
    },
  };

  console.log(JSON.stringify(output, null, 2));
}

/** Output of the ad hoc `send` command. */
export function printResponse(result: TestResult): void {
  if (result.responseStatus === undefined) {
    console.log(`${failIcon()} ${result.error ?? 'Request failed'}`);
    return;
  }

  const status = result.passed ? chalk.green(result.responseStatus) : chalk.red(result.responseStatus);
  console.log(`${chalk.bold('Status:')}   ${status}`);
  console.log(`${chalk.bold('Duration:')} ${formatDuration(result.duration)}`);
  if (result.responseBody) {
    console.log('');
    console.log(result.responseBody);
  }
}

export class Reporter {
  private options: ReporterOptions;

  constructor(options: ReporterOptions = {}) {
    this.options = options;
  }

  start(target: string, details: { env?: string; parallel: number; filter?: string }): void {
    if (this.options.json) return;
    console.log(`Running tests from: ${target}`);
    console.log(`Environment: ${details.env ?? 'default'}`);
    console.log(`Parallel workers: ${details.parallel}`);
    if (details.filter) {
      console.log(`Filter pattern: ${details.filter}`);
    }
  }

  onSuiteStart(name: string): void {
    if (this.options.json) return;
    if (this.options.ci) {
      console.log(`RUN ${name}`);
    } else {
      console.log(`\n${chalk.cyan.bold('RUN')} ${chalk.whiteBright(name)}`);
    }
  }

  onStepComplete(result: TestResult): void {
    if (this.options.json) return;
    for (const line of formatStepLine(result, this.options.ci)) {
      console.log(line);
    }
    if (this.options.verbose && result.responseStatus !== undefined) {
      console.log(chalk.gray(`     └─ HTTP ${result.responseStatus}`));
    }
  }

  onSuiteComplete(result: TestSuiteResult): void {
    if (this.options.json) return;
    console.log(formatSuiteSummary(result, this.options.ci));
  }

  finish(results: TestSuiteResult[]): void {
    if (this.options.json) {
      printJson(results);
      return;
    }

    const summary = summarizeRun(results);
    const duration = formatDuration(summary.duration);
    console.log('');

    if (summary.failed === 0) {
      console.log(
        this.options.ci
          ? `PASS ${summary.total} tests in ${duration}`
          : `${chalk.green.bold('✔')} ${summary.total} tests passed in ${duration}`
      );
    } else {
      console.log(
        this.options.ci
          ? `FAIL ${summary.passed} passed, ${summary.failed} failed in ${duration}`
          : `${chalk.red.bold('✖')} ${summary.passed} passed, ${summary.failed} failed in ${duration}`
      );
    }
  }
}
