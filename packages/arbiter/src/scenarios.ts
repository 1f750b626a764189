/**
 * Directed scenarios targeting individual rule interactions.
 *
 * Every cycle is still compared against the reference model by the
 * driver; `expect` additionally pins the grant the policy must produce,
 * so a model regression cannot hide behind a matching DUT.
 */

import type { ArbiterParams } from "./config.js";
import type { ConformanceDriver, CycleRecord, CycleStimulus } from "./driver.js";
import { ConfigurationError, ScenarioExpectationError } from "./errors.js";
import { silentLogger, type StructuredLogger } from "./logger.js";

export interface ScenarioStep extends CycleStimulus {
  /** Number of consecutive cycles this stimulus is held. Default 1. */
  readonly repeat?: number;
  /**
   * Expected grant after each repeated cycle: a single value for all of
   * them, or one entry per cycle. Omitted means model comparison only.
   */
  readonly expect?: number | null | readonly (number | null)[];
  readonly label?: string;
}

export interface Scenario {
  readonly name: string;
  readonly description: string;
  readonly minClients: number;
  readonly steps: readonly ScenarioStep[];
}

export interface ScenarioResult {
  readonly name: string;
  readonly cycles: number;
  readonly grants: readonly (number | null)[];
}

const ALL_FOUR = 0b1111n;
const CLIENTS_0_1 = 0b0011n;

export const SCENARIOS: readonly Scenario[] = [
  {
    name: "basic-rotation",
    description: "all clients requesting with weight 0 rotate 0,1,2,3,0,...",
    minClients: 4,
    steps: [
      { request: ALL_FOUR, weights: [0, 0, 0, 0], repeat: 8, expect: [0, 1, 2, 3, 0, 1, 2, 3] },
    ],
  },
  {
    name: "weighted-hold",
    description: "weight k holds the grant for exactly k+1 cycles",
    minClients: 4,
    steps: [
      {
        request: ALL_FOUR,
        weights: [1, 3, 0, 0],
        repeat: 10,
        expect: [0, 0, 1, 1, 1, 1, 2, 3, 0, 0],
      },
    ],
  },
  {
    name: "early-drop",
    description: "an owner that drops its request yields at once despite a large weight",
    minClients: 4,
    steps: [
      { request: CLIENTS_0_1, weights: [15, 0, 0, 0], expect: 0 },
      { request: 0b0010n, expect: 1, label: "client 0 drops" },
    ],
  },
  {
    name: "lock-hold",
    description: "a locked owner holds far beyond its weight, then yields on unlock",
    minClients: 4,
    steps: [
      { request: CLIENTS_0_1, weights: [0, 0, 0, 0], expect: 0 },
      { request: CLIENTS_0_1, lock: 0b0001n, repeat: 10, expect: 0, label: "locked" },
      { request: CLIENTS_0_1, expect: 1, label: "unlocked" },
    ],
  },
  {
    name: "illegal-lock",
    description: "a lock from a non-owner neither steals nor extends the grant",
    minClients: 4,
    steps: [
      { request: CLIENTS_0_1, weights: [5, 0, 0, 0], expect: 0 },
      {
        request: CLIENTS_0_1,
        lock: 0b0010n,
        repeat: 6,
        expect: [0, 0, 0, 0, 0, 1],
        label: "client 1 locks",
      },
    ],
  },
  {
    name: "lock-to-switch",
    description: "unlocking after the entitlement is spent switches immediately; no reload",
    minClients: 4,
    steps: [
      { request: CLIENTS_0_1, weights: [1, 0, 0, 0], expect: 0 },
      { request: CLIENTS_0_1, lock: 0b0001n, repeat: 5, expect: 0, label: "locked" },
      { request: CLIENTS_0_1, expect: 1, label: "unlocked" },
    ],
  },
  {
    name: "lock-at-expiry",
    description: "lock raised in the cycle the counter is exhausted keeps the grant",
    minClients: 4,
    steps: [
      { request: CLIENTS_0_1, weights: [1, 0, 0, 0], repeat: 2, expect: 0 },
      { request: CLIENTS_0_1, lock: 0b0001n, repeat: 2, expect: 0, label: "locked at zero" },
      { request: CLIENTS_0_1, expect: 1, label: "unlocked" },
    ],
  },
  {
    name: "drop-while-locked",
    description: "dropping the request releases even while the lock is held",
    minClients: 4,
    steps: [
      { request: CLIENTS_0_1, weights: [0, 0, 0, 0], expect: 0 },
      { request: CLIENTS_0_1, lock: 0b0001n, expect: 0 },
      { request: 0b0010n, lock: 0b0001n, repeat: 2, expect: 1, label: "client 0 drops, lock high" },
    ],
  },
  {
    name: "weight-change-mid-grant",
    description: "a new weight table does not touch the running grant's counter",
    minClients: 4,
    steps: [
      { request: CLIENTS_0_1, weights: [3, 0, 0, 0], expect: 0 },
      { request: CLIENTS_0_1, weights: [0, 0, 0, 0], repeat: 3, expect: 0, label: "weights cleared" },
      { request: CLIENTS_0_1, repeat: 3, expect: [1, 0, 1] },
    ],
  },
  {
    name: "weight-change-at-transition",
    description: "a grant starting in the cycle the weights change loads the new weight",
    minClients: 4,
    steps: [
      { request: CLIENTS_0_1, weights: [0, 0, 0, 0], expect: 0 },
      { request: CLIENTS_0_1, weights: [0, 2, 0, 0], repeat: 4, expect: [1, 1, 1, 0] },
    ],
  },
  {
    name: "idle-rescan",
    description: "idle cycles rescan from an unchanged pointer",
    minClients: 4,
    steps: [
      { request: 0n, weights: [0, 0, 0, 0], repeat: 3, expect: null },
      { request: 0b0100n, expect: 2 },
      { request: 0b0101n, expect: 0 },
    ],
  },
];

export function findScenario(name: string): Scenario {
  const scenario = SCENARIOS.find((candidate) => candidate.name === name);
  if (!scenario) {
    throw new ConfigurationError(`Unknown scenario '${name}'`, [
      `available: ${SCENARIOS.map((s) => s.name).join(", ")}`,
    ]);
  }
  return scenario;
}

function expectationAt(step: ScenarioStep, index: number): number | null | undefined {
  const { expect } = step;
  if (expect === undefined || expect === null || typeof expect === "number") return expect;
  return expect[index];
}

/**
 * Reset the bench, then drive every step of the scenario.
 *
 * @throws ConfigurationError when the arbiter has too few clients
 * @throws ScenarioExpectationError when a pinned grant is not produced
 * @throws IllegalGrantError / GrantMismatchError from the driver
 */
export function runScenario(
  driver: ConformanceDriver,
  scenario: Scenario,
  logger: StructuredLogger = silentLogger,
): ScenarioResult {
  assertFits(scenario, driver.params);
  const log = logger.child({ scenario: scenario.name });
  driver.reset();

  const grants: (number | null)[] = [];
  for (const step of scenario.steps) {
    const repeat = step.repeat ?? 1;
    for (let i = 0; i < repeat; i++) {
      const stimulus: CycleStimulus = {
        request: step.request,
        ...(step.lock !== undefined ? { lock: step.lock } : {}),
        ...(i === 0 && step.weights ? { weights: step.weights } : {}),
      };
      const record: CycleRecord = driver.step(stimulus);
      grants.push(record.grant);
      const expected = expectationAt(step, i);
      if (expected !== undefined && record.grant !== expected) {
        log.error("scenario expectation failed", { cycle: record.cycle, expected, actual: record.grant });
        throw new ScenarioExpectationError(scenario.name, record.cycle, expected, record.grant, step.label);
      }
    }
  }

  log.info("scenario passed", { cycles: grants.length });
  return { name: scenario.name, cycles: grants.length, grants };
}

function assertFits(scenario: Scenario, params: ArbiterParams): void {
  if (params.clients < scenario.minClients) {
    throw new ConfigurationError(`Scenario '${scenario.name}' needs more clients`, [
      `clients: need at least ${scenario.minClients}, have ${params.clients}`,
    ]);
  }
}
