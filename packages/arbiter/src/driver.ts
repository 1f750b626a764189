/**
 * Conformance driver: drives one cycle of stimulus into both the DUT and
 * the reference model, then compares the decoded DUT grant with the
 * model's prediction.
 *
 * Per cycle:
 *   1. write request / lock / weights to the DUT inputs
 *   2. advance the bench one rising edge and let outputs settle
 *   3. sample and decode o_gnt; illegal vectors fail before comparison
 *   4. advance the model with the same inputs and compare
 *
 * Nothing on the driver moves until the bench edge has completed, so an
 * error thrown by the bench leaves the model and cycle count in step
 * with the last completed DUT cycle.
 */

import type { ArbiterParams } from "./config.js";
import type { ArbiterBench } from "./bench.js";
import {
  GrantMismatchError,
  IllegalGrantError,
  type CycleDiagnostics,
  type ModelSnapshot,
} from "./errors.js";
import { decodeGrant, packWeights } from "./grant.js";
import { silentLogger, type StructuredLogger } from "./logger.js";
import { ReferenceModel, type ArbiterState, type DecisionRule } from "./model.js";

export interface CycleStimulus {
  readonly request: bigint;
  readonly lock?: bigint;
  /** New weight table; omitted keeps the previously applied one. */
  readonly weights?: readonly number[];
}

export interface CycleRecord {
  readonly cycle: number;
  readonly request: bigint;
  readonly lock: bigint;
  readonly weights: readonly number[];
  readonly grant: number | null;
  readonly rule: DecisionRule;
}

export interface RunSummary {
  readonly cycles: number;
  /** Cycles each client held the grant; index N counts idle cycles. */
  readonly grantCounts: readonly number[];
  /** How often each model rule decided a cycle. */
  readonly coverage: Readonly<Partial<Record<DecisionRule, number>>>;
}

export interface ConformanceDriverOptions {
  readonly params: ArbiterParams;
  readonly logger?: StructuredLogger;
}

function snapshot(state: ArbiterState): ModelSnapshot {
  return { rrPtr: state.rrPtr, current: state.current, counter: state.counter };
}

export class ConformanceDriver {
  readonly params: ArbiterParams;
  private readonly bench: ArbiterBench;
  private readonly logger: StructuredLogger;
  private model: ReferenceModel;
  private weights: readonly number[];
  private cycleCount = 0;

  constructor(bench: ArbiterBench, options: ConformanceDriverOptions) {
    this.bench = bench;
    this.params = options.params;
    this.logger = (options.logger ?? silentLogger).child({ bench: bench.kind });
    this.model = new ReferenceModel(this.params);
    this.weights = new Array<number>(this.params.clients).fill(0);
  }

  /** Cycles driven since the last reset. */
  get cycle(): number {
    return this.cycleCount;
  }

  get modelState(): ArbiterState {
    return this.model.state;
  }

  /** Reset the DUT and start a fresh reference model. */
  reset(): void {
    this.bench.reset();
    this.model = new ReferenceModel(this.params);
    this.weights = new Array<number>(this.params.clients).fill(0);
    this.cycleCount = 0;
    this.logger.debug("reset", { time: this.bench.time() });
  }

  /**
   * Drive one cycle and compare.
   *
   * @throws IllegalGrantError when the DUT asserts more than one grant
   * @throws GrantMismatchError when the DUT and model disagree
   */
  step(stimulus: CycleStimulus): CycleRecord {
    const cycle = this.cycleCount + 1;
    const lock = stimulus.lock ?? 0n;
    const weights = stimulus.weights ? [...stimulus.weights] : this.weights;
    const inputs = { request: stimulus.request, lock, weights };

    const dut = this.bench.dut;
    dut.i_req = inputs.request;
    dut.i_lock = inputs.lock;
    dut.i_weight = packWeights(weights, this.params.weightWidth);

    this.bench.cycle();
    this.cycleCount = cycle;
    this.weights = weights;

    const grantBits = dut.o_gnt;
    const decoded = decodeGrant(grantBits, this.params.clients);

    if (decoded.kind === "illegal") {
      this.logger.error("illegal grant vector", {
        cycle,
        grantBits,
        reason: decoded.reason,
        clients: decoded.clients,
      });
      throw new IllegalGrantError(cycle, grantBits, decoded.clients);
    }

    const before = snapshot(this.model.state);
    const expected = this.model.predictNext(inputs);
    const rule = this.model.lastDecision?.rule ?? "idle";

    const observed = decoded.kind === "granted" ? decoded.client : null;
    if (observed !== expected) {
      const diagnostics: CycleDiagnostics = {
        cycle,
        request: inputs.request,
        lock,
        weights: inputs.weights,
        grantBits,
        before,
        after: snapshot(this.model.state),
        rule,
      };
      this.logger.error("grant mismatch", { expected, observed, ...diagnostics });
      throw new GrantMismatchError(expected, observed, diagnostics);
    }

    if (this.logger.isEnabled("debug")) {
      this.logger.debug("cycle", { cycle, request: inputs.request, lock, grant: observed, rule });
    }
    return { cycle, request: inputs.request, lock, weights: inputs.weights, grant: observed, rule };
  }

  /** Drive every stimulus in order, stopping at the first failure. */
  run(stimuli: Iterable<CycleStimulus>): RunSummary {
    const grantCounts = new Array<number>(this.params.clients + 1).fill(0);
    const coverage: Partial<Record<DecisionRule, number>> = {};
    let cycles = 0;
    for (const stimulus of stimuli) {
      const record = this.step(stimulus);
      cycles++;
      const slot = record.grant ?? this.params.clients;
      grantCounts[slot] = (grantCounts[slot] ?? 0) + 1;
      coverage[record.rule] = (coverage[record.rule] ?? 0) + 1;
    }
    return { cycles, grantCounts, coverage };
  }
}
