import { RequestExecutor } from './executor.js';
import { loadCsvData } from './data.js';
import { loadTestSuites } from './loader.js';
import { RivetError, describeError } from './errors.js';
import { chunk } from './utils.js';
import { VariableContext, type DataRow } from './variables.js';
import { summarizeSuite, type TestResult, type TestSuiteResult } from './types.js';
import type { Environment } from './config.js';
import type { Dataset, NamedSuite, Step, Suite } from './suite.js';

export interface TestRunnerOptions {
  /** Per-request timeout in milliseconds */
  timeout: number;
  parallel: number;
  bail?: boolean;
  /** Only steps whose name contains this substring run */
  filter?: string;
  /** Replaces the dataset file of every suite */
  dataFile?: string;
  env?: Environment;
  loadSuites?: (target: string) => Promise<NamedSuite[]>;
  loadDataset?: (file: string) => Promise<DataRow[]>;
  onSuiteStart?: (name: string) => void;
  onStepComplete?: (result: TestResult) => void;
  onSuiteComplete?: (result: TestSuiteResult) => void;
}

interface StepListOutcome {
  results: TestResult[];
  bailed: boolean;
}

export function buildSuiteContext(suite: Suite, envName: string | undefined, env: Environment): VariableContext {
  const context = VariableContext.fromEnvironment(env).withSuiteVars(suite.vars);
  return envName ? context.with('RIVET_ENV', envName) : context;
}

export class TestRunner {
  private executor: RequestExecutor;
  private options: TestRunnerOptions;

  constructor(options: TestRunnerOptions) {
    this.options = options;
    this.executor = new RequestExecutor({ timeout: options.timeout });
  }

  async runTests(target: string, envName?: string): Promise<TestSuiteResult[]> {
    const load = this.options.loadSuites ?? loadTestSuites;
    const suites = await load(target);
    return this.runSuites(suites, envName);
  }

  /**
   * Runs suites one after another, or in chunks of `parallel` suites when
   * there is more than one. With bail enabled, a failing suite stops any
   * further suite (or chunk) from starting.
   */
  async runSuites(suites: NamedSuite[], envName?: string): Promise<TestSuiteResult[]> {
    const { parallel, bail, onSuiteStart, onSuiteComplete } = this.options;
    const all: TestSuiteResult[] = [];

    if (suites.length <= 1 || parallel <= 1) {
      for (const named of suites) {
        onSuiteStart?.(named.name);
        const result = await this.runSuite(named, envName, parallel);
        onSuiteComplete?.(result);
        all.push(result);

        if (bail && result.failed > 0) {
          break;
        }
      }
      return all;
    }

    for (const group of chunk(suites, parallel)) {
      const chunkResults = await Promise.all(
        group.map(async (named) => {
          onSuiteStart?.(named.name);
          // Steps inside a suite run sequentially while suites run side by side.
          const result = await this.runSuite(named, envName, 1);
          onSuiteComplete?.(result);
          all.push(result);
          return result;
        })
      );

      if (bail && chunkResults.some(r => r.failed > 0)) {
        break;
      }
    }

    return all;
  }

  /**
   * Runs setup, the main steps (once, or once per dataset row) and teardown.
   * Teardown always runs, even after a failure or a bail earlier in the suite.
   */
  async runSuite(named: NamedSuite, envName?: string, parallel = this.options.parallel): Promise<TestSuiteResult> {
    const { suite } = named;
    const start = performance.now();
    const context = buildSuiteContext(suite, envName, this.options.env ?? process.env);

    const dataset = this.resolveDataset(suite);
    const rows = dataset ? await this.loadRows(dataset) : undefined;

    const results: TestResult[] = [];
    let halted = false;

    if (suite.setup) {
      const setup = await this.runSteps(suite.setup, context, 1, 'Setup: ');
      results.push(...setup.results);
      halted = setup.bailed;
    }

    if (!halted) {
      if (rows && dataset) {
        const rowParallel = dataset.parallel ?? parallel;
        for (const row of rows) {
          const outcome = await this.runSteps(suite.tests, context.withDataRow(row), rowParallel);
          results.push(...outcome.results);
          if (outcome.bailed) {
            break;
          }
        }
      } else {
        const outcome = await this.runSteps(suite.tests, context, parallel);
        results.push(...outcome.results);
      }
    }

    if (suite.teardown) {
      const teardown = await this.runSteps(suite.teardown, context, 1, 'Teardown: ');
      results.push(...teardown.results);
    }

    return summarizeSuite(named.name, results, performance.now() - start);
  }

  shouldRun(stepName: string): boolean {
    const { filter } = this.options;
    return !filter || stepName.includes(filter);
  }

  /**
   * Sequential when `parallel` is 1; otherwise chunks of `parallel` steps are
   * dispatched together and the next chunk waits for the whole previous one.
   * Results are reported as they arrive.
   */
  private async runSteps(
    steps: Step[],
    context: VariableContext,
    parallel: number,
    prefix = ''
  ): Promise<StepListOutcome> {
    const { bail, onStepComplete } = this.options;
    const selected = steps.filter(step => this.shouldRun(step.name));
    const results: TestResult[] = [];

    const run = async (step: Step): Promise<TestResult> => {
      const result = await this.executor.execute(`${prefix}${step.name}`, step.request, step.expect, context);
      results.push(result);
      onStepComplete?.(result);
      return result;
    };

    if (parallel <= 1) {
      for (const step of selected) {
        const result = await run(step);
        if (bail && !result.passed) {
          return { results, bailed: true };
        }
      }
      return { results, bailed: false };
    }

    for (const group of chunk(selected, parallel)) {
      const chunkResults = await Promise.all(group.map(run));
      if (bail && chunkResults.some(r => !r.passed)) {
        return { results, bailed: true };
      }
    }
    return { results, bailed: false };
  }

  private resolveDataset(suite: Suite): Dataset | undefined {
    const { dataFile } = this.options;
    if (dataFile) {
      return { file: dataFile, parallel: suite.dataset?.parallel };
    }
    return suite.dataset;
  }

  private async loadRows(dataset: Dataset): Promise<DataRow[]> {
    const load = this.options.loadDataset ?? loadCsvData;
    try {
      return await load(dataset.file);
    } catch (error) {
      throw new RivetError('DATASET_LOAD', `Failed to load dataset: ${dataset.file} (${describeError(error)})`, {
        cause: error,
      });
    }
  }
}
