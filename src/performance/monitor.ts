import { writeFile } from 'node:fs/promises';
import chalk from 'chalk';
import type { PerformanceResults } from './metrics.js';
import { RivetError } from '../errors.js';
import { formatDuration } from '../utils.js';

export type OutputFormat = 'pretty' | 'json' | 'csv';

const OUTPUT_FORMATS: readonly OutputFormat[] = ['pretty', 'json', 'csv'];

export function parseOutputFormat(name: string): OutputFormat {
  const format = OUTPUT_FORMATS.find(f => f === name);
  if (!format) {
    throw new RivetError('CONFIG', `Invalid output format '${name}'. Use: ${OUTPUT_FORMATS.join(', ')}`);
  }
  return format;
}

export interface ProgressSnapshot {
  elapsed: number;
  targetDuration: number;
  phase: string;
  activeUsers: number;
  results: PerformanceResults;
}

function formatLatency(ms: number): string {
  return Math.round(ms).toString();
}

export function progressBar(percent: number, width = 20): string {
  const filled = Math.floor((Math.min(percent, 100) / 100) * width);
  return `[${chalk.green('='.repeat(filled))}${chalk.dim('-'.repeat(width - filled))}]`;
}

export function printProgress(snapshot: ProgressSnapshot): void {
  const { elapsed, targetDuration, results } = snapshot;
  const percent = targetDuration > 0 ? Math.min((elapsed / targetDuration) * 100, 100) : 0;
  const currentRps = elapsed >= 1000 ? results.totalRequests / (elapsed / 1000) : 0;

  console.log('');
  console.log(chalk.bold('Performance Test Progress'));
  console.log(`  ${progressBar(percent)} ${percent.toFixed(1)}% (${formatDuration(elapsed)} / ${formatDuration(targetDuration)})`);
  console.log(`  Load Pattern: ${chalk.whiteBright(snapshot.phase)}`);
  console.log(`  Active users: ${snapshot.activeUsers}`);

  if (results.totalRequests > 0) {
    console.log(`  Current RPS: ${chalk.whiteBright(currentRps.toFixed(1))}`);
    console.log(`  Total Requests: ${chalk.whiteBright(results.totalRequests)}`);
    console.log(`  Success Rate: ${chalk.whiteBright((results.successRate * 100).toFixed(1))}%`);
    if (results.averageResponseTime > 0) {
      console.log(`  Avg Response Time: ${chalk.whiteBright(formatLatency(results.averageResponseTime))}ms`);
      console.log(`  P95 Response Time: ${chalk.whiteBright(formatLatency(results.p95ResponseTime))}ms`);
    }
  }
}

/** The JSON document written by `perf --output` and printed by `--json`. */
export function toJsonReport(results: PerformanceResults) {
  return {
    total_requests: results.totalRequests,
    successful_requests: results.successfulRequests,
    failed_requests: results.failedRequests,
    success_rate: results.successRate,
    requests_per_second: results.requestsPerSecond,
    average_response_time: Math.floor(results.averageResponseTime),
    min_response_time: Math.floor(results.minResponseTime),
    max_response_time: Math.floor(results.maxResponseTime),
    p50_response_time: Math.floor(results.p50ResponseTime),
    p95_response_time: Math.floor(results.p95ResponseTime),
    p99_response_time: Math.floor(results.p99ResponseTime),
    status_code_distribution: Object.fromEntries(results.statusCodeDistribution),
    bytes_per_second_sent: results.bytesPerSecondSent,
    bytes_per_second_received: results.bytesPerSecondReceived,
    connection_errors: results.connectionErrors,
    total_duration: Math.floor(results.totalDuration),
  };
}

export async function saveReport(results: PerformanceResults, filePath: string): Promise<void> {
  await writeFile(filePath, JSON.stringify(toJsonReport(results), null, 2));
}

export function printResults(suiteName: string, results: PerformanceResults, format: OutputFormat = 'pretty'): void {
  switch (format) {
    case 'json':
      console.log(JSON.stringify(toJsonReport(results), null, 2));
      break;
    case 'csv':
      printCsv(suiteName, results);
      break;
    default:
      printPretty(suiteName, results);
  }
}

export type GradeLevel = 'good' | 'warn' | 'bad';

export interface Assessment {
  metric: string;
  grade: string;
  threshold: string;
  level: GradeLevel;
}

interface GradeBand {
  grade: string;
  threshold: string;
  level: GradeLevel;
  /** Whether the value falls in this band; the last band always matches */
  matches: (value: number) => boolean;
}

function grade(metric: string, value: number, bands: GradeBand[]): Assessment {
  const band = bands.find(b => b.matches(value)) ?? bands[bands.length - 1];
  return { metric, grade: band.grade, threshold: band.threshold, level: band.level };
}

/**
 * Grades a finished run against fixed thresholds. Latencies are compared in
 * whole milliseconds.
 */
export function assessPerformance(results: PerformanceResults): Assessment[] {
  const avgMs = Math.floor(results.averageResponseTime);
  const p95Ms = Math.floor(results.p95ResponseTime);

  return [
    grade('Success Rate', results.successRate, [
      { grade: 'Excellent', threshold: '≥99%', level: 'good', matches: v => v >= 0.99 },
      { grade: 'Good', threshold: '≥95%', level: 'good', matches: v => v >= 0.95 },
      { grade: 'Fair', threshold: '≥90%', level: 'warn', matches: v => v >= 0.9 },
      { grade: 'Poor', threshold: '<90%', level: 'bad', matches: () => true },
    ]),
    grade('Avg Response', avgMs, [
      { grade: 'Excellent', threshold: '≤100ms', level: 'good', matches: v => v <= 100 },
      { grade: 'Good', threshold: '≤500ms', level: 'good', matches: v => v <= 500 },
      { grade: 'Fair', threshold: '≤1s', level: 'warn', matches: v => v <= 1000 },
      { grade: 'Poor', threshold: '>1s', level: 'bad', matches: () => true },
    ]),
    grade('P95 Response', p95Ms, [
      { grade: 'Excellent', threshold: '≤200ms', level: 'good', matches: v => v <= 200 },
      { grade: 'Good', threshold: '≤1s', level: 'good', matches: v => v <= 1000 },
      { grade: 'Fair', threshold: '≤2s', level: 'warn', matches: v => v <= 2000 },
      { grade: 'Poor', threshold: '>2s', level: 'bad', matches: () => true },
    ]),
    grade('Throughput', results.requestsPerSecond, [
      { grade: 'High', threshold: '≥100 RPS', level: 'good', matches: v => v >= 100 },
      { grade: 'Medium', threshold: '≥50 RPS', level: 'good', matches: v => v >= 50 },
      { grade: 'Low', threshold: '≥10 RPS', level: 'warn', matches: v => v >= 10 },
      { grade: 'Very Low', threshold: '<10 RPS', level: 'bad', matches: () => true },
    ]),
  ];
}

export function formatAssessment({ metric, grade, threshold, level }: Assessment): string {
  const icon = level === 'good' ? chalk.green('✔') : level === 'warn' ? chalk.yellow('⚠') : chalk.red('✖');
  return `  ${metric}: ${icon} ${grade} (${threshold})`;
}

function printPretty(suiteName: string, results: PerformanceResults): void {
  const successRate = (results.successRate * 100).toFixed(1);

  console.log('');
  console.log(chalk.bold('Performance Test Results'));
  console.log(chalk.gray('══════════════════════════════════════'));
  console.log(`${chalk.cyan('Suite:')}         ${suiteName}`);
  console.log(`${chalk.cyan('Duration:')}      ${formatDuration(results.totalDuration)}`);
  console.log('');

  console.log(chalk.bold('Requests:'));
  console.log(`  Total:        ${results.totalRequests}`);
  console.log(`  Succeeded:    ${chalk.green(results.successfulRequests)} (${successRate}%)`);
  console.log(`  Failed:       ${chalk.red(results.failedRequests)}`);
  console.log(`  Conn. errors: ${results.connectionErrors}`);
  console.log('');

  if (results.totalRequests > results.connectionErrors) {
    console.log(chalk.bold('Latency (ms):'));
    console.log(`  Min:          ${formatLatency(results.minResponseTime)}`);
    console.log(`  Max:          ${formatLatency(results.maxResponseTime)}`);
    console.log(`  Avg:          ${formatLatency(results.averageResponseTime)}`);
    console.log(`  p50:          ${formatLatency(results.p50ResponseTime)}`);
    console.log(`  p95:          ${formatLatency(results.p95ResponseTime)}`);
    console.log(`  p99:          ${formatLatency(results.p99ResponseTime)}`);
    console.log('');
  }

  if (results.statusCodeDistribution.size > 0) {
    console.log(chalk.bold('Status codes:'));
    const codes = [...results.statusCodeDistribution.entries()].sort(([a], [b]) => a - b);
    for (const [code, count] of codes) {
      const label = code >= 400 ? chalk.red(code) : chalk.green(code);
      console.log(`  ${label}:  ${count}`);
    }
    console.log('');
  }

  console.log(`${chalk.cyan('Throughput:')}   ${chalk.bold(results.requestsPerSecond.toFixed(1))} req/s`);
  console.log(
    `${chalk.cyan('Bandwidth:')}    ${Math.round(results.bytesPerSecondSent)} B/s sent, ${Math.round(results.bytesPerSecondReceived)} B/s received`
  );
  console.log('');

  console.log(chalk.bold('Performance Assessment:'));
  for (const assessment of assessPerformance(results)) {
    console.log(formatAssessment(assessment));
  }
  console.log(chalk.gray('══════════════════════════════════════'));
  console.log('');
}

function printCsv(suiteName: string, results: PerformanceResults): void {
  console.log('suite,duration_ms,total,succeeded,failed,connection_errors,success_rate,min_ms,max_ms,avg_ms,p50_ms,p95_ms,p99_ms,throughput_rps');
  console.log([
    suiteName,
    Math.round(results.totalDuration),
    results.totalRequests,
    results.successfulRequests,
    results.failedRequests,
    results.connectionErrors,
    (results.successRate * 100).toFixed(2),
    Math.round(results.minResponseTime),
    Math.round(results.maxResponseTime),
    Math.round(results.averageResponseTime),
    Math.round(results.p50ResponseTime),
    Math.round(results.p95ResponseTime),
    Math.round(results.p99ResponseTime),
    results.requestsPerSecond.toFixed(2),
  ].join(','));
}
