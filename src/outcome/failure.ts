import type { Diagnostic } from "./diagnostic";

export type FailureReason =
  | "malformed-definition"
  | "stack-underflow"
  | "undefined-word"
  | "invalid-code-point"
  | "division-by-zero"
  | "limit-exceeded";

export interface Failure {
  reason: FailureReason;
  message: string;
  context?: Record<string, unknown>;
  diagnostics: Diagnostic[];
  recoverable: boolean;
}

export function failure(
  reason: FailureReason,
  message: string,
  opts?: Partial<Omit<Failure, "reason" | "message">>
): Failure {
  return {
    reason,
    message,
    diagnostics: opts?.diagnostics ?? [],
    recoverable: opts?.recoverable ?? false,
    context: opts?.context,
  };
}

export function isFailureReason(f: Failure, reason: FailureReason): boolean {
  return f.reason === reason;
}

/**
 * Render a failure for display, prefixed by its first diagnostic code.
 */
export function formatFailure(f: Failure): string {
  const first = f.diagnostics[0];
  return first ? `error[${first.code}]: ${f.message}` : `error: ${f.message}`;
}
