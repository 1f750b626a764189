/**
 * Behavioral register-transfer model of `arbiter_wrr_lock`, the device
 * the harness checks. It is deliberately structured like the hardware
 * (one-hot grant register, rotating priority encoder, keep-current term)
 * and shares no code with the reference model.
 *
 * Ports:
 *   clk       input  clock
 *   rst_n     input  async active-low reset
 *   i_req     input  [N]
 *   i_lock    input  [N]
 *   i_weight  input  [N*W], client i at bits [i*W, i*W+W)
 *   o_gnt     output [N], registered
 *
 * Faults can be injected to check that the harness notices them.
 */

import type { BehavioralCore, ModuleDefinition, PortInfo, SignalIo } from "@busarb/sim";
import type { ArbiterParams } from "./config.js";

export interface ArbiterPorts {
  rst_n: bigint;
  i_req: bigint;
  i_lock: bigint;
  i_weight: bigint;
  readonly o_gnt: bigint;
}

export type ArbiterFault =
  /** Counter reloads from the weight table on the falling edge of lock. */
  | "reload-on-unlock"
  /** Any client's lock bit keeps the current grant. */
  | "honor-foreign-lock"
  /** The owner keeps its grant after dropping its request. */
  | "ignore-request-drop"
  /** The runner-up requester is granted alongside the winner. */
  | "double-grant";

export interface ArbiterModuleOptions extends ArbiterParams {
  readonly faults?: readonly ArbiterFault[];
  /** Omit parameters from the module, as a DUT without introspection would. */
  readonly hideParams?: boolean;
}

export const ARBITER_MODULE_NAME = "arbiter_wrr_lock";

/** Index of the single set bit of a one-hot value (lowest if several). */
function oneHotIndex(value: bigint): number {
  let index = 0;
  let rest = value;
  while (rest > 1n && (rest & 1n) === 0n) {
    rest >>= 1n;
    index++;
  }
  return index;
}

/** Rotate right by `amount` within an `n`-bit field. */
function rotateRight(value: bigint, amount: number, n: number): bigint {
  const mask = (1n << BigInt(n)) - 1n;
  const k = BigInt(amount % n);
  return ((value >> k) | (value << (BigInt(n) - k))) & mask;
}

/** Lowest set bit isolated (x & -x). */
function lowestBit(value: bigint): bigint {
  return value & -value;
}

class ArbiterCore implements BehavioralCore {
  private gntQ = 0n;
  private cntQ = 0;
  private ptrQ = 0;
  private lockQ = false;
  private readonly n: number;
  private readonly w: number;
  private readonly faults: ReadonlySet<ArbiterFault>;

  constructor(params: ArbiterParams, faults: readonly ArbiterFault[]) {
    this.n = params.clients;
    this.w = params.weightWidth;
    this.faults = new Set(faults);
  }

  evalComb(io: SignalIo): void {
    if (io.read("rst_n") === 0n) this.clear();
    io.write("o_gnt", this.gntQ);
  }

  clockEdge(_clock: string, io: SignalIo): void {
    if (io.read("rst_n") === 0n) {
      this.clear();
      return;
    }
    const req = io.read("i_req");
    const lock = io.read("i_lock");
    const weight = io.read("i_weight");

    const ownerValid = this.gntQ !== 0n;
    const ownerIdx = oneHotIndex(this.gntQ);
    const ownerReq = this.faults.has("ignore-request-drop") || (req & this.gntQ) !== 0n;
    const ownerLock = this.faults.has("honor-foreign-lock") ? lock !== 0n : (lock & this.gntQ) !== 0n;
    let cnt = this.cntQ;
    if (this.faults.has("reload-on-unlock") && ownerValid && this.lockQ && !ownerLock) {
      cnt = this.weightOf(weight, ownerIdx);
    }
    const keep = ownerValid && ownerReq && (ownerLock || cnt !== 0);

    if (keep) {
      this.cntQ = cnt === 0 ? 0 : cnt - 1;
      this.lockQ = ownerLock;
      return;
    }

    const base = ownerValid ? (ownerIdx + 1) % this.n : this.ptrQ;
    const rotated = rotateRight(req, base, this.n);
    const pick = lowestBit(rotated);
    let gnt = rotateRight(pick, this.n - base, this.n);
    if (this.faults.has("double-grant")) {
      const runnerUp = lowestBit(rotated & ~pick);
      gnt |= rotateRight(runnerUp, this.n - base, this.n);
    }

    this.ptrQ = base;
    this.gntQ = gnt;
    this.cntQ = pick === 0n ? 0 : this.weightOf(weight, oneHotIndex(rotateRight(pick, this.n - base, this.n)));
    this.lockQ = false;
  }

  private weightOf(packed: bigint, client: number): number {
    const mask = (1n << BigInt(this.w)) - 1n;
    return Number((packed >> BigInt(client * this.w)) & mask);
  }

  private clear(): void {
    this.gntQ = 0n;
    this.cntQ = 0;
    this.ptrQ = 0;
    this.lockQ = false;
  }
}

export function arbiterPorts(params: ArbiterParams): Record<string, PortInfo> {
  return {
    clk: { direction: "input", type: "clock", width: 1 },
    rst_n: { direction: "input", type: "reset_async_low", width: 1, associatedClock: "clk" },
    i_req: { direction: "input", type: "logic", width: params.clients },
    i_lock: { direction: "input", type: "logic", width: params.clients },
    i_weight: { direction: "input", type: "logic", width: params.clients * params.weightWidth },
    o_gnt: { direction: "output", type: "logic", width: params.clients },
  };
}

/** Module definition for an arbiter instance with the given parameters. */
export function arbiterModule(options: ArbiterModuleOptions): ModuleDefinition<ArbiterPorts> {
  const params: ArbiterParams = { clients: options.clients, weightWidth: options.weightWidth };
  const faults = options.faults ?? [];
  return {
    __busarb_module: true,
    name: ARBITER_MODULE_NAME,
    params: options.hideParams
      ? {}
      : { NUM_CLIENTS: params.clients, WEIGHT_WIDTH: params.weightWidth },
    ports: arbiterPorts(params),
    events: ["clk"],
    instantiate: () => new ArbiterCore(params, faults),
  };
}
