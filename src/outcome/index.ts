// src/outcome/index.ts
// Outcome / failure / diagnostic exports

export { type Outcome, type Done, type Fail, type OutcomeMeta, isDone, isFail } from "./outcome";
export { type Failure, type FailureReason, failure, isFailureReason, formatFailure } from "./failure";
export type { Diagnostic, DiagnosticSeverity } from "./diagnostic";
export { DIAGNOSTIC_CODES, type DiagnosticCode, makeDiagnostic } from "./codes";
export {
  done,
  fail,
  malformedDefinition,
  stackUnderflow,
  undefinedWord,
  invalidCodePoint,
  divisionByZero,
  limitExceeded,
} from "./constructors";
export { match, mapOutcome, flatMapOutcome, unwrap, unwrapOr } from "./matchers";
