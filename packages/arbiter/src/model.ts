/**
 * Cycle-accurate reference model of the weighted round-robin arbiter.
 *
 * `transition()` is the whole policy: a pure function from the current
 * registers and one cycle's inputs to the next registers and the grant
 * that becomes visible after the clock edge. `ReferenceModel` owns one
 * state record and feeds it through `transition()` once per cycle.
 *
 * Owner rules are evaluated in order and the first match decides:
 *
 *   dropped    owner's request is low           → release
 *   locked     owner's lock is high             → hold, counter decrements to 0
 *   entitled   counter > 0                      → hold, counter decrements
 *   exhausted  counter == 0                     → release
 *
 * A release (or no owner) falls through to round-robin re-arbitration.
 * Only the owner's lock bit is ever consulted.
 */

import type { ArbiterParams } from "./config.js";
import { isBitSet } from "./grant.js";

export interface ArbiterState {
  /** Round-robin scan start. */
  readonly rrPtr: number;
  readonly current: number | null;
  /** Remaining entitled cycles beyond the current one. */
  readonly counter: number;
}

export interface CycleInputs {
  readonly request: bigint;
  readonly lock: bigint;
  readonly weights: readonly number[];
}

export type OwnerRuleName = "dropped" | "locked" | "entitled" | "exhausted";
export type DecisionRule = OwnerRuleName | "idle" | "granted";

export interface Decision {
  readonly rule: DecisionRule;
  /** Client picked by re-arbitration this cycle, if any. */
  readonly rearbitrated?: number | null;
}

export interface Transition {
  readonly state: ArbiterState;
  readonly grant: number | null;
  readonly decision: Decision;
}

type OwnerVerdict =
  | { readonly kind: "hold"; readonly counter: number }
  | { readonly kind: "release" };

interface OwnerRule {
  readonly name: OwnerRuleName;
  applies(owner: number, state: ArbiterState, inputs: CycleInputs): boolean;
  verdict(state: ArbiterState): OwnerVerdict;
}

const decrement = (counter: number): number => (counter > 0 ? counter - 1 : 0);

/** Work conservation > lock > weight entitlement > exhaustion. */
const OWNER_RULES: readonly OwnerRule[] = [
  {
    name: "dropped",
    applies: (owner, _state, inputs) => !isBitSet(inputs.request, owner),
    verdict: () => ({ kind: "release" }),
  },
  {
    name: "locked",
    applies: (owner, _state, inputs) => isBitSet(inputs.lock, owner),
    verdict: (state) => ({ kind: "hold", counter: decrement(state.counter) }),
  },
  {
    name: "entitled",
    applies: (_owner, state) => state.counter > 0,
    verdict: (state) => ({ kind: "hold", counter: decrement(state.counter) }),
  },
  {
    name: "exhausted",
    applies: () => true,
    verdict: () => ({ kind: "release" }),
  },
];

export const INITIAL_STATE: ArbiterState = { rrPtr: 0, current: null, counter: 0 };

/** First requesting client scanning `clients` positions upward from `start`. */
export function scanRoundRobin(request: bigint, start: number, clients: number): number | null {
  for (let offset = 0; offset < clients; offset++) {
    const candidate = (start + offset) % clients;
    if (isBitSet(request, candidate)) return candidate;
  }
  return null;
}

function weightOf(inputs: CycleInputs, client: number, params: ArbiterParams): number {
  const raw = inputs.weights[client] ?? 0;
  return raw & ((1 << params.weightWidth) - 1);
}

export function transition(
  state: ArbiterState,
  inputs: CycleInputs,
  params: ArbiterParams,
): Transition {
  let rrPtr = state.rrPtr;
  let rule: DecisionRule = "idle";

  const owner = state.current;
  if (owner !== null) {
    const match = OWNER_RULES.find((candidate) => candidate.applies(owner, state, inputs));
    // "exhausted" always applies, so a match exists.
    if (match) {
      rule = match.name;
      const verdict = match.verdict(state);
      if (verdict.kind === "hold") {
        return {
          state: { rrPtr, current: owner, counter: verdict.counter },
          grant: owner,
          decision: { rule },
        };
      }
      rrPtr = (owner + 1) % params.clients;
    }
  }

  const next = scanRoundRobin(inputs.request, rrPtr, params.clients);
  if (owner === null && next !== null) rule = "granted";
  return {
    state: {
      rrPtr,
      current: next,
      counter: next === null ? 0 : weightOf(inputs, next, params),
    },
    grant: next,
    decision: { rule, rearbitrated: next },
  };
}

export class ReferenceModel {
  readonly params: ArbiterParams;
  private _state: ArbiterState = INITIAL_STATE;
  private _lastDecision: Decision | undefined;

  constructor(params: ArbiterParams) {
    this.params = params;
  }

  get state(): ArbiterState {
    return this._state;
  }

  /** Decision taken by the most recent `predictNext()` call. */
  get lastDecision(): Decision | undefined {
    return this._lastDecision;
  }

  /**
   * Advance one cycle and return the grant visible after the clock edge
   * that samples `inputs`.
   */
  predictNext(inputs: CycleInputs): number | null {
    const result = transition(this._state, inputs, this.params);
    this._state = result.state;
    this._lastDecision = result.decision;
    return result.grant;
  }

  reset(): void {
    this._state = INITIAL_STATE;
    this._lastDecision = undefined;
  }
}
