/**
 * Error taxonomy for the conformance harness.
 *
 * Every arbitration-policy violation is fatal for the run that observed
 * it; nothing here is retried.
 */

/** Snapshot of the reference model registers. */
export interface ModelSnapshot {
  readonly rrPtr: number;
  readonly current: number | null;
  readonly counter: number;
}

/** Everything needed to triage a failing cycle. */
export interface CycleDiagnostics {
  readonly cycle: number;
  readonly request: bigint;
  readonly lock: bigint;
  readonly weights: readonly number[];
  /** Raw grant vector sampled from the DUT. */
  readonly grantBits: bigint;
  readonly before: ModelSnapshot;
  readonly after: ModelSnapshot;
  /** Rule that produced the model's decision. */
  readonly rule: string;
}

export class ArbiterHarnessError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ArbiterHarnessError";
  }
}

/** More than one grant bit (or a bit outside the client range) was observed. */
export class IllegalGrantError extends ArbiterHarnessError {
  readonly cycle: number;
  readonly grantBits: bigint;
  readonly clients: readonly number[];

  constructor(cycle: number, grantBits: bigint, clients: readonly number[]) {
    super(
      `cycle ${cycle}: illegal grant vector 0b${grantBits.toString(2)} ` +
        `(bits [${clients.join(", ")}] set)`,
    );
    this.name = "IllegalGrantError";
    this.cycle = cycle;
    this.grantBits = grantBits;
    this.clients = clients;
  }
}

/** The DUT's decoded grant differs from the reference model's prediction. */
export class GrantMismatchError extends ArbiterHarnessError {
  readonly expected: number | null;
  readonly observed: number | null;
  readonly diagnostics: CycleDiagnostics;

  constructor(expected: number | null, observed: number | null, diagnostics: CycleDiagnostics) {
    super(
      `cycle ${diagnostics.cycle}: expected grant ${formatGrant(expected)}, ` +
        `DUT granted ${formatGrant(observed)} ` +
        `(req=0b${diagnostics.request.toString(2)}, lock=0b${diagnostics.lock.toString(2)}, ` +
        `weights=[${diagnostics.weights.join(", ")}], rule=${diagnostics.rule}, ` +
        `model before {rrPtr=${diagnostics.before.rrPtr}, counter=${diagnostics.before.counter}, ` +
        `current=${formatGrant(diagnostics.before.current)}})`,
    );
    this.name = "GrantMismatchError";
    this.expected = expected;
    this.observed = observed;
    this.diagnostics = diagnostics;
  }
}

/** A directed scenario's expected grant was not met by the model. */
export class ScenarioExpectationError extends ArbiterHarnessError {
  readonly scenario: string;
  readonly cycle: number;
  readonly expected: number | null;
  readonly actual: number | null;

  constructor(
    scenario: string,
    cycle: number,
    expected: number | null,
    actual: number | null,
    label?: string,
  ) {
    super(
      `[${scenario}] cycle ${cycle}${label ? ` (${label})` : ""}: ` +
        `expected grant ${formatGrant(expected)}, got ${formatGrant(actual)}`,
    );
    this.name = "ScenarioExpectationError";
    this.scenario = scenario;
    this.cycle = cycle;
    this.expected = expected;
    this.actual = actual;
  }
}

export class ConfigurationError extends ArbiterHarnessError {
  readonly issues: readonly string[];

  constructor(message: string, issues: readonly string[] = []) {
    super(issues.length > 0 ? `${message}: ${issues.join("; ")}` : message);
    this.name = "ConfigurationError";
    this.issues = issues;
  }
}

export function formatGrant(grant: number | null): string {
  return grant === null ? "none" : String(grant);
}
