export interface SkipConfig {
  reason: string;
  link?: string;       // issue tracking the skip
}

/** Contents of a `test-*.yml` policy test case. */
export interface PolicyTestCaseConfig {
  policy_id?: string;  // defaults to the case name (file name without extension)
  input?: string;      // policy template input, used by the installer
  vars?: Record<string, unknown>;
  data_stream?: {
    vars?: Record<string, unknown>;
  };
  skip?: SkipConfig;
}

export interface PolicyTestResult {
  name: string;
  package?: string;
  dataStream?: string;
  timeElapsedMs: number;
  failureMsg?: string;     // completed, but found ≠ expected
  failureDetails?: string; // the diff
  errorMsg?: string;       // could not complete
  skipped?: SkipConfig;
}
