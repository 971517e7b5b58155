export type StepName = 'build' | 'test' | 'bench';

export type FailurePolicy = 'fail-fast' | 'suppress';

export type StepStatus = 'passed' | 'failed' | 'suppressed' | 'skipped';

export interface PipelineStep {
  name: StepName;
  policy: FailurePolicy;
  args(context: StepContext): string[];
  run(context: StepContext): Promise<StepResult>;
}

export interface StepContext {
  runId: string;
  workingDir: string;
  env: NodeJS.ProcessEnv;
  cargo: string;
  profileArgs: string[];
  trace: boolean;
}

export interface StepResult {
  step: StepName;
  command: string;
  args: string[];
  status: StepStatus;
  exitCode: number;
  duration: number;
  signal?: NodeJS.Signals;
  error?: string;
}

export interface PlannedStep {
  step: StepName;
  command: string;
  args: string[];
  policy: FailurePolicy;
  skipped: boolean;
  reason?: string;
}

export interface PipelineReport {
  runId: string;
  profile: string;
  release: boolean;
  exitCode: number;
  passed: boolean;
  steps: StepResult[];
  duration: number;
}
