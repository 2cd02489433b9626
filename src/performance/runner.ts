import { Buffer } from 'node:buffer';
import { RequestExecutor } from '../executor.js';
import { RivetError, describeError } from '../errors.js';
import { loadTestSuites } from '../loader.js';
import { buildSuiteContext } from '../runner.js';
import { sleep, formatDuration } from '../utils.js';
import { LoadController, type LoadPattern } from './patterns.js';
import { PerformanceMetrics, type PerformanceResults } from './metrics.js';
import type { ProgressSnapshot } from './monitor.js';
import type { Environment } from '../config.js';
import type { NamedSuite, Step } from '../suite.js';
import type { VariableContext } from '../variables.js';

// Assumed request size when a step has no body.
const ESTIMATED_HEADER_BYTES = 100;

export interface PerformanceRunnerOptions {
  concurrentUsers: number;
  targetRps?: number;
  /** All durations in milliseconds */
  testDuration: number;
  warmupDuration: number;
  reportInterval: number;
  pattern: LoadPattern;
  /** Per-request timeout */
  timeout: number;
  /** Wait after stopping so in-flight requests can still be recorded */
  settleTime?: number;
  /** Fixed pause after every request of a worker */
  requestPause?: number;
  env?: Environment;
  loadSuites?: (target: string) => Promise<NamedSuite[]>;
  onPhase?: (message: string) => void;
  onProgress?: (snapshot: ProgressSnapshot) => void;
}

export interface PerformanceRun {
  suiteName: string;
  results: PerformanceResults;
  /** Whether the global duration timer fired before every worker had finished */
  timedOut: boolean;
}

interface WorkerState {
  steps: Step[];
  context: VariableContext;
  metrics: PerformanceMetrics;
  controller: LoadController;
  signal: AbortSignal;
}

export class PerformanceTestRunner {
  private executor: RequestExecutor;
  private options: PerformanceRunnerOptions;

  constructor(options: PerformanceRunnerOptions) {
    this.options = options;
    this.executor = new RequestExecutor({ timeout: options.timeout });
  }

  /** Only the first suite found at `target` is used. */
  async run(target: string, envName?: string): Promise<PerformanceRun> {
    const load = this.options.loadSuites ?? loadTestSuites;
    const suites = await load(target);
    const first = suites[0];
    if (!first) {
      throw new RivetError('SUITE_LOAD', 'No test suites found in target path');
    }
    return this.runSuite(first, envName);
  }

  /**
   * Warms up, then drives the suite's steps until the duration elapses.
   * The load clock and the metrics start once warmup ends, so ramp-up and
   * `totalDuration` exclude the warmup.
   */
  async runSuite(named: NamedSuite, envName?: string): Promise<PerformanceRun> {
    const { suite } = named;
    const { concurrentUsers, targetRps, testDuration, warmupDuration, reportInterval, pattern, onPhase, onProgress } =
      this.options;

    if (suite.tests.length === 0) {
      throw new RivetError('EMPTY_SUITE', `Test suite '${named.name}' contains no tests`);
    }

    onPhase?.(`Starting performance test on suite: ${named.name}`);
    onPhase?.(`  Tests to execute: ${suite.tests.length}`);
    onPhase?.(`  Concurrent users: ${concurrentUsers}`);
    if (targetRps !== undefined) {
      onPhase?.(`  Target RPS: ${targetRps}`);
    }
    onPhase?.(`  Test duration: ${formatDuration(testDuration)}`);
    onPhase?.(`  Load pattern: ${pattern}`);

    const context = buildSuiteContext(suite, envName, this.options.env ?? process.env);

    if (warmupDuration > 0) {
      onPhase?.(`Warming up for ${formatDuration(warmupDuration)}...`);
      await sleep(warmupDuration);
    }

    onPhase?.('Starting load generation...');

    const metrics = new PerformanceMetrics();
    const controller = new LoadController({ pattern, targetRps, concurrentUsers, warmupDuration });
    const stop = new AbortController();

    const reporter =
      onProgress && reportInterval > 0
        ? setInterval(() => {
            onProgress({
              elapsed: controller.elapsed(),
              targetDuration: testDuration,
              phase: controller.currentPhaseDescription(),
              activeUsers: controller.currentConcurrentUsers(),
              results: metrics.calculateResults(),
            });
          }, reportInterval)
        : undefined;

    try {
      const workers = Array.from({ length: concurrentUsers }, (_, id) =>
        this.worker(id, {
          steps: suite.tests,
          context: context.clone(),
          metrics,
          controller,
          signal: stop.signal,
        }).catch((error: unknown) => {
          onPhase?.(`Worker ${id} failed: ${describeError(error)}`);
        })
      );

      const deadline = new AbortController();
      const outcome = await Promise.race([
        Promise.all(workers).then(() => 'finished' as const),
        sleep(testDuration, deadline.signal).then(() => 'timeout' as const),
      ]);
      deadline.abort();
      // Workers finish the request they are in and then leave their loop.
      stop.abort();

      if (outcome === 'timeout') {
        onPhase?.('Test duration reached, stopping load generation...');
      }

      await sleep(this.options.settleTime ?? 2000);

      return {
        suiteName: named.name,
        results: metrics.calculateResults(),
        timedOut: outcome === 'timeout',
      };
    } finally {
      if (reporter) {
        clearInterval(reporter);
      }
    }
  }

  /**
   * Round-robins through the suite's steps until this worker's own clock
   * reaches the test duration or the run is stopped.
   */
  private async worker(id: number, state: WorkerState): Promise<void> {
    const { steps, context, metrics, controller, signal } = state;
    const { testDuration, requestPause = 1 } = this.options;
    const startedAt = performance.now();
    let index = 0;

    while (!signal.aborted && performance.now() - startedAt < testDuration) {
      const step = steps[index];
      index = (index + 1) % steps.length;

      const result = await this.executor.execute(`worker_${id}: ${step.name}`, step.request, step.expect, context);

      if (result.responseStatus === undefined) {
        metrics.recordConnectionError();
      } else {
        metrics.record(
          result.duration,
          result.responseStatus,
          step.request.body !== undefined ? Buffer.byteLength(step.request.body) : ESTIMATED_HEADER_BYTES,
          Buffer.byteLength(result.responseBody ?? ''),
          !result.passed
        );
      }

      const delay = controller.requestDelay();
      if (delay !== undefined) {
        await sleep(delay, signal);
      }
      await sleep(requestPause, signal);
    }
  }
}
