export interface TestResult {
  name: string;
  passed: boolean;
  /** Milliseconds from dispatch until the body was read (or the failure) */
  duration: number;
  error?: string;
  /** Absent when no response arrived: bad input, connection failure or timeout */
  responseStatus?: number;
  responseBody?: string;
}

export interface TestSuiteResult {
  name: string;
  results: TestResult[];
  duration: number;
  passed: number;
  failed: number;
}

export function summarizeSuite(name: string, results: TestResult[], duration: number): TestSuiteResult {
  const passed = results.filter(r => r.passed).length;
  return {
    name,
    results,
    duration,
    passed,
    failed: results.length - passed,
  };
}
