/**
 * @busarb/arbiter
 *
 * Reference model and conformance harness for a weighted round-robin
 * arbiter with an atomic lock.
 */

// Reference model
export {
  ReferenceModel,
  transition,
  scanRoundRobin,
  INITIAL_STATE,
} from "./model.js";
export type {
  ArbiterState,
  CycleInputs,
  Decision,
  DecisionRule,
  OwnerRuleName,
  Transition,
} from "./model.js";

// Grant decoding and packing
export { decodeGrant, setBits, isBitSet, packWeights } from "./grant.js";
export type { GrantDecode } from "./grant.js";

// Device under test
export { arbiterModule, arbiterPorts, ARBITER_MODULE_NAME } from "./rtl.js";
export type { ArbiterPorts, ArbiterFault, ArbiterModuleOptions } from "./rtl.js";

// Benches and driver
export { createBench, createTickBench, createClockedBench } from "./bench.js";
export type { ArbiterBench, BenchKind } from "./bench.js";
export { ConformanceDriver } from "./driver.js";
export type {
  ConformanceDriverOptions,
  CycleRecord,
  CycleStimulus,
  RunSummary,
} from "./driver.js";

// Scenarios, stimulus, stress
export { SCENARIOS, findScenario, runScenario } from "./scenarios.js";
export type { Scenario, ScenarioResult, ScenarioStep } from "./scenarios.js";
export {
  randomStimulus,
  stimulusArbitrary,
  bitVectorArbitrary,
  weightTableArbitrary,
} from "./stimulus.js";
export { runStress } from "./stress.js";
export type { StressReport } from "./stress.js";
export { runConformance } from "./conformance.js";
export type { ConformanceOptions, ConformanceReport } from "./conformance.js";

// Configuration
export {
  ArbiterParamsSchema,
  StressConfigSchema,
  ClockConfigSchema,
  HarnessConfigInputSchema,
  DEFAULT_ARBITER_PARAMS,
  DEFAULT_STRESS_CONFIG,
  DEFAULT_CLOCK_CONFIG,
  resolveHarnessConfig,
  configInputFromEnv,
  loadHarnessConfig,
  introspectArbiterParams,
} from "./config.js";
export type {
  ArbiterParams,
  StressConfig,
  ClockConfig,
  HarnessConfig,
  HarnessConfigInput,
  IntrospectedParams,
} from "./config.js";

// Errors and logging
export {
  ArbiterHarnessError,
  IllegalGrantError,
  GrantMismatchError,
  ScenarioExpectationError,
  ConfigurationError,
  formatGrant,
} from "./errors.js";
export type { CycleDiagnostics, ModelSnapshot } from "./errors.js";
export { StructuredLogger, silentLogger, LOG_LEVELS } from "./logger.js";
export type { LogLevel, LogSink, StructuredLoggerOptions } from "./logger.js";
