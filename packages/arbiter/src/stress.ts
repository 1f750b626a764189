import type { StressConfig } from "./config.js";
import type { ConformanceDriver, RunSummary } from "./driver.js";
import { silentLogger, type StructuredLogger } from "./logger.js";
import { randomStimulus } from "./stimulus.js";

export interface StressReport extends RunSummary {
  readonly seed: number;
}

/**
 * Reset, then drive `stress.cycles` random cycles through the driver.
 * Stops at the first illegal grant or mismatch (the driver throws).
 */
export function runStress(
  driver: ConformanceDriver,
  stress: StressConfig,
  logger: StructuredLogger = silentLogger,
): StressReport {
  const log = logger.child({ phase: "stress", seed: stress.seed });
  const stimuli = randomStimulus(driver.params, stress);
  driver.reset();
  log.info("stress run started", { cycles: stress.cycles });
  const summary = driver.run(stimuli);
  log.info("stress run passed", {
    cycles: summary.cycles,
    grantCounts: summary.grantCounts,
    coverage: summary.coverage,
  });
  return { ...summary, seed: stress.seed };
}
