import type { Done, Fail, OutcomeMeta } from "./outcome";
import type { Failure } from "./failure";
import { failure } from "./failure";
import { makeDiagnostic } from "./codes";

export function done<A>(value: A, meta: OutcomeMeta = {}): Done<A> {
  return { tag: "Done", value, meta };
}

export function fail(f: Failure, meta: OutcomeMeta = {}): Fail {
  return { tag: "Fail", failure: f, meta };
}

export function malformedDefinition(meta: OutcomeMeta = {}): Fail {
  return fail(
    failure("malformed-definition", "no name specified for definition", {
      diagnostics: [makeDiagnostic("E0001")],
      recoverable: true,
    }),
    meta
  );
}

export function stackUnderflow(word: string, meta: OutcomeMeta = {}): Fail {
  return fail(
    failure("stack-underflow", `${word}: stack underflow`, {
      diagnostics: [makeDiagnostic("E0201", { word })],
      context: { word },
      recoverable: true,
    }),
    meta
  );
}

export function undefinedWord(word: string, meta: OutcomeMeta = {}): Fail {
  return fail(
    failure("undefined-word", `undefined word '${word}'`, {
      diagnostics: [makeDiagnostic("E0101", { word })],
      context: { word },
      recoverable: true,
    }),
    meta
  );
}

export function invalidCodePoint(value: number, meta: OutcomeMeta = {}): Fail {
  const message =
    value < 0
      ? "emit: out of bounds"
      : `emit: invalid unicode 0x${value.toString(16).padStart(2, "0")}`;
  return fail(
    failure("invalid-code-point", message, {
      diagnostics: [makeDiagnostic("E0202", { value })],
      context: { value },
      recoverable: true,
    }),
    meta
  );
}

export function divisionByZero(word: string, meta: OutcomeMeta = {}): Fail {
  return fail(
    failure("division-by-zero", `${word}: division by zero`, {
      diagnostics: [makeDiagnostic("E0200", { word })],
      context: { word },
      recoverable: true,
    }),
    meta
  );
}

export function limitExceeded(limit: string, max: number, meta: OutcomeMeta = {}): Fail {
  return fail(
    failure("limit-exceeded", `${limit}: limit exceeded (${max})`, {
      diagnostics: [makeDiagnostic("E0300", { limit, max })],
      context: { limit, max },
      recoverable: true,
    }),
    meta
  );
}
