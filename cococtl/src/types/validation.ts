export type TerminalState = "Ready" | "TimedOut" | "Failed";

export type ValidatorState = "Pending" | "Polling" | TerminalState;

export type SmokeTestResult = {
  podName: string;
  runtimeClass: string;
  phase: string;
  succeeded: boolean;
  kernel: string | null;
  detail: string | null;
};

export type ValidationReport = {
  state: TerminalState;
  ready: boolean;
  elapsedMs: number;
  failureReason: string | null;
  runtimeClass: string | null;
  smokeTestResult: SmokeTestResult | null;
};
