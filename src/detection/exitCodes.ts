export type InternalExitCode = 3 | 4 | 5 | 6;

export type DetectionOutcome =
  | { kind: "success" }
  | { kind: "no-unit-found" }
  | { kind: "multiple-units-found" }
  | { kind: "internal"; code: InternalExitCode }
  | { kind: "unexpected"; code: number | null };

export type DetectionFailure = Exclude<DetectionOutcome, { kind: "success" }>;

function isInternalExitCode(code: number): code is InternalExitCode {
  return code === 3 || code === 4 || code === 5 || code === 6;
}

/**
 * Maps the detector's exit status to an outcome. `null` stands for a process
 * that ended without an exit code (killed by a signal).
 */
export function classifyExitCode(code: number | null): DetectionOutcome {
  if (code === null) return { kind: "unexpected", code: null };
  if (code === 0) return { kind: "success" };
  if (code === 1) return { kind: "no-unit-found" };
  if (code === 2) return { kind: "multiple-units-found" };
  if (isInternalExitCode(code)) return { kind: "internal", code };
  return { kind: "unexpected", code };
}
