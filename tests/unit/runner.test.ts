/**
 * Unit Tests: TestRunner orchestration.
 * Covers setup/teardown order, datasets, filtering, chunked parallelism and bail.
 */
import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { TestRunner, buildSuiteContext, type TestRunnerOptions } from '../../src/runner.js';
import { RivetError } from '../../src/errors.js';
import type { TestResult, TestSuiteResult } from '../../src/types.js';
import {
  BASE_URL,
  calledUrl,
  getStep,
  installMockFetch,
  mockTextResponse,
  namedSuite,
  restoreFetch,
} from '../helpers/mock-fetch.js';

/** Responds 404 for any path containing "missing", 200 otherwise. */
function routeByPath(input: RequestInfo | URL): Promise<Response> {
  const url = input instanceof URL ? input.pathname : String(input);
  return Promise.resolve(url.includes('missing') ? mockTextResponse('no', 404) : mockTextResponse('ok'));
}

function createRunner(overrides: Partial<TestRunnerOptions> = {}): TestRunner {
  return new TestRunner({ timeout: 1000, parallel: 1, env: {}, ...overrides });
}

function names(results: TestResult[]): string[] {
  return results.map(r => r.name);
}

describe('TestRunner', () => {
  let mockFetch: ReturnType<typeof installMockFetch>;

  beforeEach(() => {
    mockFetch = installMockFetch();
    mockFetch.mockImplementation(routeByPath);
  });

  afterEach(() => {
    restoreFetch();
  });

  describe('runSuite', () => {
    it('runs setup, tests and teardown in order with prefixed names', async () => {
      const named = namedSuite('flow.rivet.yaml', {
        name: 'Flow',
        setup: [getStep('login')],
        tests: [getStep('list'), getStep('get')],
        teardown: [getStep('logout')],
      });

      const result = await createRunner().runSuite(named);

      expect(names(result.results)).toEqual(['Setup: login', 'list', 'get', 'Teardown: logout']);
      expect(result.name).toBe('flow.rivet.yaml');
      expect(result.passed).toBe(4);
      expect(result.failed).toBe(0);
    });

    it('keeps passed + failed equal to the number of results', async () => {
      const named = namedSuite('mixed', {
        name: 'Mixed',
        tests: [getStep('ok'), getStep('gone', '/missing'), getStep('ok again')],
      });

      const result = await createRunner().runSuite(named);

      expect(result.passed).toBe(2);
      expect(result.failed).toBe(1);
      expect(result.passed + result.failed).toBe(result.results.length);
      expect(result.results[1].error).toBe('Expected status 200 but got 404');
    });

    it('runs teardown even after main steps fail', async () => {
      const named = namedSuite('failing', {
        name: 'Failing',
        tests: [getStep('broken', '/missing')],
        teardown: [getStep('cleanup')],
      });

      const result = await createRunner({ bail: true }).runSuite(named);

      expect(names(result.results)).toEqual(['broken', 'Teardown: cleanup']);
    });

    it('with bail, a setup failure skips the main steps but not teardown', async () => {
      const named = namedSuite('setup-fails', {
        name: 'Setup fails',
        setup: [getStep('seed', '/missing'), getStep('seed more')],
        tests: [getStep('main')],
        teardown: [getStep('cleanup')],
      });

      const result = await createRunner({ bail: true }).runSuite(named);

      expect(names(result.results)).toEqual(['Setup: seed', 'Teardown: cleanup']);
    });

    it('without bail, every step runs after a failure', async () => {
      const named = namedSuite('no-bail', {
        name: 'No bail',
        tests: [getStep('first', '/missing'), getStep('second')],
      });

      const result = await createRunner().runSuite(named);

      expect(names(result.results)).toEqual(['first', 'second']);
    });

    it('with bail, stops sequential steps at the first failure', async () => {
      const named = namedSuite('bail', {
        name: 'Bail',
        tests: [getStep('first'), getStep('second', '/missing'), getStep('third')],
      });

      const result = await createRunner({ bail: true }).runSuite(named);

      expect(names(result.results)).toEqual(['first', 'second']);
      expect(mockFetch).toHaveBeenCalledTimes(2);
    });

    it('with bail, finishes the chunk in flight and skips later chunks', async () => {
      const named = namedSuite('chunks', {
        name: 'Chunks',
        tests: [getStep('a', '/missing'), getStep('b'), getStep('c'), getStep('d')],
      });

      const result = await createRunner({ bail: true, parallel: 2 }).runSuite(named);

      expect(names(result.results).sort()).toEqual(['a', 'b']);
      expect(mockFetch).toHaveBeenCalledTimes(2);
    });

    it('dispatches a whole chunk before waiting', async () => {
      const pending: Array<() => void> = [];
      mockFetch.mockImplementation(
        () =>
          new Promise<Response>((resolve) => {
            pending.push(() => resolve(mockTextResponse('ok')));
          })
      );

      const named = namedSuite('parallel', {
        name: 'Parallel',
        tests: [getStep('a'), getStep('b'), getStep('c')],
      });
      const run = createRunner({ parallel: 2 }).runSuite(named);

      await vi.waitFor(() => expect(pending).toHaveLength(2));
      pending.splice(0).forEach(resolve => resolve());
      await vi.waitFor(() => expect(pending).toHaveLength(1));
      pending.splice(0).forEach(resolve => resolve());

      const result = await run;
      expect(result.passed).toBe(3);
    });

    it('only runs steps whose name contains the filter', async () => {
      const named = namedSuite('filter', {
        name: 'Filter',
        setup: [getStep('users seed')],
        tests: [getStep('list users'), getStep('list orders'), getStep('Users by id')],
      });

      const result = await createRunner({ filter: 'users' }).runSuite(named);

      expect(names(result.results)).toEqual(['Setup: users seed', 'list users']);
    });

    it('reports every step as it completes', async () => {
      const onStepComplete = vi.fn<(result: TestResult) => void>();
      const named = namedSuite('live', { name: 'Live', tests: [getStep('one'), getStep('two')] });

      await createRunner({ onStepComplete }).runSuite(named);

      expect(onStepComplete).toHaveBeenCalledTimes(2);
      expect(onStepComplete.mock.calls[0][0].name).toBe('one');
    });
  });

  describe('datasets', () => {
    const datasetSuite = () =>
      namedSuite('data', {
        name: 'Data',
        tests: [
          {
            name: 'get user',
            request: { method: 'GET', url: `${BASE_URL}/users/{{user_id}}` },
            expect: { status: 200 },
          },
        ],
        dataset: { file: 'users.csv' },
      });

    it('runs the full step list once per row with row bindings', async () => {
      const loadDataset = vi.fn(async () => [{ user_id: '1' }, { user_id: '2' }, { user_id: '3' }]);

      const result = await createRunner({ loadDataset }).runSuite(datasetSuite());

      expect(loadDataset).toHaveBeenCalledWith('users.csv');
      expect(result.results).toHaveLength(3);
      expect([0, 1, 2].map(i => calledUrl(mockFetch, i))).toEqual([
        `${BASE_URL}/users/1`,
        `${BASE_URL}/users/2`,
        `${BASE_URL}/users/3`,
      ]);
    });

    it('runs a row with the dataset parallelism instead of the runner default', async () => {
      const pending: Array<() => void> = [];
      mockFetch.mockImplementation(
        () =>
          new Promise<Response>((resolve) => {
            pending.push(() => resolve(mockTextResponse('ok')));
          })
      );
      const loadDataset = async () => [{ user_id: '1' }];
      const named = namedSuite('data', {
        name: 'Data',
        tests: [getStep('get user', '/users/{{user_id}}'), getStep('get orders', '/users/{{user_id}}/orders')],
        dataset: { file: 'users.csv', parallel: 2 },
      });

      const run = createRunner({ parallel: 1, loadDataset }).runSuite(named);

      await vi.waitFor(() => expect(pending).toHaveLength(2));
      pending.splice(0).forEach(resolve => resolve());

      const result = await run;
      expect(result.passed).toBe(2);
      expect([0, 1].map(i => calledUrl(mockFetch, i))).toEqual([
        `${BASE_URL}/users/1`,
        `${BASE_URL}/users/1/orders`,
      ]);
    });

    it('uses the data file override', async () => {
      const loadDataset = vi.fn(async () => [{ user_id: '9' }]);

      await createRunner({ loadDataset, dataFile: 'override.csv' }).runSuite(datasetSuite());

      expect(loadDataset).toHaveBeenCalledWith('override.csv');
      expect(calledUrl(mockFetch)).toBe(`${BASE_URL}/users/9`);
    });

    it('with bail, stops at the row that fails', async () => {
      const loadDataset = async () => [{ user_id: '1' }, { user_id: 'missing' }, { user_id: '3' }];

      const result = await createRunner({ loadDataset, bail: true }).runSuite(datasetSuite());

      expect(result.results).toHaveLength(2);
      expect(result.failed).toBe(1);
    });

    it('wraps dataset failures before any request is sent', async () => {
      const loadDataset = async (): Promise<Record<string, string>[]> => {
        throw new Error('ENOENT');
      };

      const run = createRunner({ loadDataset }).runSuite(datasetSuite());

      await expect(run).rejects.toThrow(RivetError);
      await expect(run).rejects.toThrow('Failed to load dataset: users.csv (ENOENT)');
      expect(mockFetch).not.toHaveBeenCalled();
    });
  });

  describe('runSuites', () => {
    const suites = () => [
      namedSuite('a.rivet.yaml', { name: 'A', tests: [getStep('a1')] }),
      namedSuite('b.rivet.yaml', { name: 'B', tests: [getStep('b1', '/missing')] }),
      namedSuite('c.rivet.yaml', { name: 'C', tests: [getStep('c1')] }),
    ];

    it('runs suites sequentially and reports each one', async () => {
      const onSuiteStart = vi.fn<(name: string) => void>();
      const onSuiteComplete = vi.fn<(result: TestSuiteResult) => void>();

      const results = await createRunner({ onSuiteStart, onSuiteComplete }).runSuites(suites());

      expect(results.map(r => r.name)).toEqual(['a.rivet.yaml', 'b.rivet.yaml', 'c.rivet.yaml']);
      expect(onSuiteStart.mock.calls.map(([name]) => name)).toEqual(['a.rivet.yaml', 'b.rivet.yaml', 'c.rivet.yaml']);
      expect(onSuiteComplete).toHaveBeenCalledTimes(3);
    });

    it('with bail, stops after the first failing suite', async () => {
      const results = await createRunner({ bail: true }).runSuites(suites());

      expect(results.map(r => r.name)).toEqual(['a.rivet.yaml', 'b.rivet.yaml']);
    });

    it('with bail and parallel suites, skips the chunks after a failing one', async () => {
      const results = await createRunner({ bail: true, parallel: 2 }).runSuites(suites());

      expect(results.map(r => r.name).sort()).toEqual(['a.rivet.yaml', 'b.rivet.yaml']);
    });

    it('runs all suites in chunks without bail', async () => {
      const results = await createRunner({ parallel: 2 }).runSuites(suites());

      expect(results).toHaveLength(3);
      expect(results.reduce((sum, r) => sum + r.failed, 0)).toBe(1);
    });

    it('loads suites through the injected loader', async () => {
      const loadSuites = vi.fn(async () => suites().slice(0, 1));

      const results = await createRunner({ loadSuites }).runTests('suites/');

      expect(loadSuites).toHaveBeenCalledWith('suites/');
      expect(results).toHaveLength(1);
    });
  });

  describe('environment', () => {
    it('binds RIVET_ENV when an environment name is given', async () => {
      const named = namedSuite('env', {
        name: 'Env',
        tests: [
          {
            name: 'env',
            request: { method: 'GET', url: `${BASE_URL}/{{RIVET_ENV}}/status` },
          },
        ],
      });

      await createRunner().runSuite(named, 'staging');

      expect(calledUrl(mockFetch)).toBe(`${BASE_URL}/staging/status`);
    });
  });
});

describe('buildSuiteContext', () => {
  const suite = namedSuite('ctx', {
    name: 'Ctx',
    vars: { host: 'api.test', base: 'https://{{host}}', region: '${REGION:us}' },
    tests: [],
  }).suite;

  it('layers environment, suite vars and RIVET_ENV', () => {
    const context = buildSuiteContext(suite, 'prod', { REGION: 'eu', HOME: '/home/test' });

    expect(context.get('HOME')).toBe('/home/test');
    expect(context.get('base')).toBe('https://api.test');
    expect(context.get('region')).toBe('eu');
    expect(context.get('RIVET_ENV')).toBe('prod');
  });

  it('omits RIVET_ENV without an environment name', () => {
    expect(buildSuiteContext(suite, undefined, {}).get('RIVET_ENV')).toBeUndefined();
  });
});
