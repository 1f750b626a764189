/**
 * Top-level conformance run: every directed scenario, then a stress run,
 * against one DUT module on the chosen bench.
 */

import type { ModuleDefinition } from "@busarb/sim";
import { createBench, type BenchKind } from "./bench.js";
import { introspectArbiterParams, type HarnessConfig } from "./config.js";
import { ConformanceDriver } from "./driver.js";
import { silentLogger, type StructuredLogger } from "./logger.js";
import type { ArbiterPorts } from "./rtl.js";
import { runScenario, SCENARIOS, type Scenario, type ScenarioResult } from "./scenarios.js";
import { runStress, type StressReport } from "./stress.js";

export interface ConformanceOptions {
  readonly config: HarnessConfig;
  readonly bench?: BenchKind;
  /** Defaults to every scenario the arbiter has enough clients for. */
  readonly scenarios?: readonly Scenario[];
  readonly logger?: StructuredLogger;
}

export interface ConformanceReport {
  readonly module: string;
  readonly bench: BenchKind;
  readonly paramsSource: "dut" | "default";
  readonly scenarios: readonly ScenarioResult[];
  readonly skipped: readonly string[];
  readonly stress: StressReport;
}

export function runConformance(
  module: ModuleDefinition<ArbiterPorts>,
  options: ConformanceOptions,
): ConformanceReport {
  const logger = (options.logger ?? silentLogger).child({ module: module.name });
  const benchKind = options.bench ?? "clocked";
  const { params, source } = introspectArbiterParams(module, logger);
  const bench = createBench(benchKind, module, options.config.clock);

  try {
    const driver = new ConformanceDriver(bench, { params, logger });
    const candidates = options.scenarios ?? SCENARIOS;
    const runnable = candidates.filter((scenario) => scenario.minClients <= params.clients);
    const skipped = candidates
      .filter((scenario) => scenario.minClients > params.clients)
      .map((scenario) => scenario.name);
    if (skipped.length > 0) {
      logger.warn("scenarios skipped for client count", { clients: params.clients, skipped });
    }

    const scenarios = runnable.map((scenario) => runScenario(driver, scenario, logger));
    const stress = runStress(driver, options.config.stress, logger);
    logger.info("conformance passed", {
      bench: benchKind,
      scenarios: scenarios.length,
      stressCycles: stress.cycles,
    });
    return {
      module: module.name,
      bench: benchKind,
      paramsSource: source,
      scenarios,
      skipped,
      stress,
    };
  } finally {
    bench.dispose();
  }
}
