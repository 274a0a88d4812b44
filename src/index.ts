// src/index.ts
// stackforth - Public API
//
// A line-at-a-time stack language interpreter. Callers feed one line to
// `Machine.eval` and print the returned text or failure.

// ═══════════════════════════════════════════════════════════════════════════════
// MACHINE
// ═══════════════════════════════════════════════════════════════════════════════

export { Machine, createMachine, type MachineOptions } from "./core/eval/machine";
export { Dictionary, bootstrapDictionary, BOOTSTRAP_DEFINITIONS } from "./core/eval/dictionary";
export { evalDefinition, DEFINITION_MARKER, type Definition } from "./core/eval/define";
export { evaluate, type EvaluateOptions } from "./core/eval/evaluate";

// ═══════════════════════════════════════════════════════════════════════════════
// READER
// ═══════════════════════════════════════════════════════════════════════════════

export { type Token, type Op, PRIMITIVES, OP_WORDS, builtin, num } from "./core/reader/token";
export { tokenize, splitWords, parseLiteral, type WordLookup, type TokenizeOptions } from "./core/reader/tokenize";

// ═══════════════════════════════════════════════════════════════════════════════
// OUTCOMES & FAILURES
// ═══════════════════════════════════════════════════════════════════════════════

export * from "./outcome";

// ═══════════════════════════════════════════════════════════════════════════════
// CONFIGURATION
// ═══════════════════════════════════════════════════════════════════════════════

export * from "./core/config";

// ═══════════════════════════════════════════════════════════════════════════════
// PORTS
// ═══════════════════════════════════════════════════════════════════════════════

export {
  type TraceEvent,
  type TraceSink,
  type MemoryTrace,
  nullTrace,
  memoryTrace,
  consoleTrace,
  formatTraceEvent,
} from "./ports/trace";
export { type ClockPort, systemClock, fixedClock } from "./ports/clock";
