#!/usr/bin/env node

import { Command } from 'commander';
import chalk from 'chalk';
import { loadConfig } from './config.js';
import { describeError } from './errors.js';
import { RequestExecutor } from './executor.js';
import { TestRunner } from './runner.js';
import { Reporter, printResponse } from './reporter.js';
import { PerformanceTestRunner } from './performance/runner.js';
import { parseLoadPattern } from './performance/patterns.js';
import { parseOutputFormat, printProgress, printResults, saveReport } from './performance/monitor.js';
import { VariableContext } from './variables.js';
import { parseDuration, parseHeaders, parsePositiveInt } from './utils.js';

const MIN_SUCCESS_RATE = 0.95;
const P99_WARNING_MS = 1000;

interface RunOptions {
  env?: string;
  data?: string;
  parallel?: string;
  grep?: string;
  bail?: boolean;
  ci?: boolean;
  json?: boolean;
  verbose?: boolean;
  timeout?: string;
}

interface PerfOptions {
  duration: string;
  rps?: string;
  concurrent: string;
  warmup: string;
  reportInterval: string;
  pattern: string;
  env?: string;
  output?: string;
  format: string;
  json?: boolean;
}

interface SendOptions {
  header: string[];
  data?: string;
  timeout?: string;
}

function fail(error: unknown): never {
  console.error(`Error: ${describeError(error)}`);
  process.exit(2);
}

function collect(value: string, previous: string[]): string[] {
  return [...previous, value];
}

const program = new Command();

program
  .name('rivet')
  .description('Declarative API testing and load testing from YAML suites')
  .version('0.1.0');

program
  .command('run')
  .description('Run test suites from a .rivet.yaml file or a directory of them')
  .argument('<target>', 'suite file or directory')
  .option('--env <name>', 'Environment name, exposed to suites as RIVET_ENV')
  .option('--data <file>', 'CSV dataset used instead of each suite\'s own')
  .option('--parallel <n>', 'Steps (or suites) to run at the same time')
  .option('--grep <pattern>', 'Only run steps whose name contains this text')
  .option('--bail', 'Stop at the first failure')
  .option('--ci', 'Plain output without colours')
  .option('--json', 'Output results as JSON')
  .option('--verbose', 'Show the HTTP status of every step')
  .option('--timeout <duration>', 'Per-request timeout, e.g. 30s')
  .action(async (target: string, options: RunOptions) => {
    try {
      const rivetConfig = loadConfig();
      const parallel = options.parallel ? parsePositiveInt(options.parallel, 'parallel') : rivetConfig.parallel;
      const timeout = options.timeout ? parseDuration(options.timeout) : rivetConfig.timeout;

      const reporter = new Reporter({
        verbose: options.verbose,
        json: options.json,
        ci: options.ci || rivetConfig.ci,
      });

      reporter.start(target, { env: options.env, parallel, filter: options.grep });

      const runner = new TestRunner({
        timeout,
        parallel,
        bail: options.bail,
        filter: options.grep,
        dataFile: options.data,
        onSuiteStart: (name) => reporter.onSuiteStart(name),
        onStepComplete: (result) => reporter.onStepComplete(result),
        onSuiteComplete: (result) => reporter.onSuiteComplete(result),
      });

      const results = await runner.runTests(target, options.env);
      reporter.finish(results);

      process.exit(results.some(r => r.failed > 0) ? 1 : 0);
    } catch (error) {
      fail(error);
    }
  });

program
  .command('perf')
  .description('Drive the first suite found at the target under load')
  .argument('<target>', 'suite file or directory')
  .option('--duration <duration>', 'Length of the load phase', '30s')
  .option('--rps <n>', 'Target requests per second (per worker pacing)')
  .option('--concurrent <n>', 'Number of concurrent workers', '10')
  .option('--warmup <duration>', 'Idle warm-up before load, also the ramp length', '5s')
  .option('--report-interval <duration>', 'How often to print progress', '5s')
  .option('--pattern <name>', 'Load pattern: constant, ramp-up, spike', 'constant')
  .option('--env <name>', 'Environment name, exposed to suites as RIVET_ENV')
  .option('--output <file>', 'Write the final results as JSON')
  .option('--format <format>', 'Results format: pretty, json, csv', 'pretty')
  .option('--json', 'Shorthand for --format json')
  .action(async (target: string, options: PerfOptions) => {
    try {
      const rivetConfig = loadConfig();
      const format = options.json ? 'json' : parseOutputFormat(options.format);
      const quiet = format !== 'pretty';

      const runner = new PerformanceTestRunner({
        testDuration: parseDuration(options.duration),
        targetRps: options.rps ? parsePositiveInt(options.rps, 'rps') : undefined,
        concurrentUsers: parsePositiveInt(options.concurrent, 'concurrent users'),
        warmupDuration: parseDuration(options.warmup),
        reportInterval: parseDuration(options.reportInterval),
        pattern: parseLoadPattern(options.pattern),
        timeout: rivetConfig.perfTimeout,
        onPhase: quiet ? undefined : (message) => console.log(chalk.gray(message)),
        onProgress: quiet ? undefined : printProgress,
      });

      const { suiteName, results } = await runner.run(target, options.env);
      printResults(suiteName, results, format);

      if (options.output) {
        await saveReport(results, options.output);
        if (!quiet) {
          console.log(`Results saved to: ${options.output}`);
        }
      }

      if (results.p99ResponseTime > P99_WARNING_MS) {
        console.error(
          chalk.yellow(`Warning: P99 response time is ${Math.round(results.p99ResponseTime)}ms (above ${P99_WARNING_MS}ms)`)
        );
      }

      if (results.successRate < MIN_SUCCESS_RATE) {
        console.error(
          chalk.red(
            `Performance test failed: Success rate ${(results.successRate * 100).toFixed(1)}% is below ${MIN_SUCCESS_RATE * 100}%`
          )
        );
        process.exit(1);
      }
      process.exit(0);
    } catch (error) {
      fail(error);
    }
  });

program
  .command('send')
  .description('Send a single ad hoc request and print the response')
  .argument('<method>', 'HTTP method')
  .argument('<url>', 'request URL; {{var}} and ${VAR:default} are resolved from the environment')
  .option('-H, --header <header>', 'Header as "Key: Value" (repeatable)', collect, [])
  .option('-d, --data <body>', 'Request body')
  .option('--timeout <duration>', 'Request timeout, e.g. 30s')
  .action(async (method: string, url: string, options: SendOptions) => {
    try {
      const rivetConfig = loadConfig();
      const executor = new RequestExecutor({
        timeout: options.timeout ? parseDuration(options.timeout) : rivetConfig.timeout,
      });

      const result = await executor.execute(
        `${method.toUpperCase()} ${url}`,
        {
          method: method.toUpperCase(),
          url,
          headers: parseHeaders(options.header),
          ...(options.data !== undefined && { body: options.data }),
        },
        undefined,
        VariableContext.fromEnvironment(process.env)
      );

      printResponse(result);
      process.exit(result.passed ? 0 : 1);
    } catch (error) {
      fail(error);
    }
  });

await program.parseAsync();
