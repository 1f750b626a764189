import { Type, type Static } from "@sinclair/typebox";
import { Ajv, type ErrorObject } from "ajv";
import type { ModuleDefinition } from "@busarb/sim";
import { ConfigurationError } from "./errors.js";
import { LOG_LEVELS, silentLogger, type LogLevel, type StructuredLogger } from "./logger.js";

// ---------------------------------------------------------------------------
// Schemas
// ---------------------------------------------------------------------------

export const ArbiterParamsSchema = Type.Object(
  {
    clients: Type.Integer({ minimum: 1, maximum: 32 }),
    weightWidth: Type.Integer({ minimum: 1, maximum: 16 }),
  },
  { additionalProperties: false },
);

export const StressConfigSchema = Type.Object(
  {
    cycles: Type.Integer({ minimum: 1 }),
    requestProbability: Type.Number({ minimum: 0, maximum: 1 }),
    lockProbability: Type.Number({ minimum: 0, maximum: 1 }),
    weightPeriod: Type.Integer({ minimum: 1 }),
    seed: Type.Integer(),
  },
  { additionalProperties: false },
);

export const ClockConfigSchema = Type.Object(
  {
    period: Type.Number({ exclusiveMinimum: 0 }),
    settle: Type.Number({ exclusiveMinimum: 0 }),
    resetDuration: Type.Number({ exclusiveMinimum: 0 }),
  },
  { additionalProperties: false },
);

const LogLevelSchema = Type.Union(LOG_LEVELS.map((level) => Type.Literal(level)));

export const HarnessConfigInputSchema = Type.Object(
  {
    arbiter: Type.Optional(ArbiterParamsSchema),
    stress: Type.Optional(Type.Partial(StressConfigSchema)),
    clock: Type.Optional(Type.Partial(ClockConfigSchema)),
    logLevel: Type.Optional(LogLevelSchema),
  },
  { additionalProperties: false },
);

export type ArbiterParams = Static<typeof ArbiterParamsSchema>;
export type StressConfig = Static<typeof StressConfigSchema>;
export type ClockConfig = Static<typeof ClockConfigSchema>;
export type HarnessConfigInput = Static<typeof HarnessConfigInputSchema>;

export interface HarnessConfig {
  readonly arbiter: ArbiterParams;
  readonly stress: StressConfig;
  readonly clock: ClockConfig;
  readonly logLevel: LogLevel;
}

// ---------------------------------------------------------------------------
// Defaults
// ---------------------------------------------------------------------------

export const DEFAULT_ARBITER_PARAMS: ArbiterParams = { clients: 4, weightWidth: 4 };

export const DEFAULT_STRESS_CONFIG: StressConfig = {
  cycles: 2000,
  requestProbability: 0.8,
  lockProbability: 0.1,
  weightPeriod: 64,
  seed: 1,
};

/** Times are in the same units as `Simulation.addClock` periods. */
export const DEFAULT_CLOCK_CONFIG: ClockConfig = {
  period: 10,
  settle: 1,
  resetDuration: 20,
};

// ---------------------------------------------------------------------------
// Validation
// ---------------------------------------------------------------------------

const ajv = new Ajv({ allErrors: true, strict: false });
const validateInput = ajv.compile<HarnessConfigInput>(HarnessConfigInputSchema);
const validateParams = ajv.compile<ArbiterParams>(ArbiterParamsSchema);

function formatError(error: ErrorObject): string {
  const instancePath = error.instancePath.length > 0 ? error.instancePath : "/";
  if (error.keyword === "additionalProperties") {
    const additionalProperty: unknown = error.params["additionalProperty"];
    if (typeof additionalProperty === "string") {
      return `${instancePath}: unknown property "${additionalProperty}"`;
    }
  }
  return `${instancePath}: ${error.message ?? "invalid value"}`;
}

/**
 * Validate raw harness configuration and merge it over the defaults.
 *
 * @throws ConfigurationError listing every schema issue
 */
export function resolveHarnessConfig(input: unknown = {}): HarnessConfig {
  if (!validateInput(input)) {
    throw new ConfigurationError(
      "Invalid harness configuration",
      (validateInput.errors ?? []).map(formatError),
    );
  }
  return {
    arbiter: { ...DEFAULT_ARBITER_PARAMS, ...input.arbiter },
    stress: { ...DEFAULT_STRESS_CONFIG, ...input.stress },
    clock: { ...DEFAULT_CLOCK_CONFIG, ...input.clock },
    logLevel: input.logLevel ?? "info",
  };
}

function parseIntegerEnv(env: NodeJS.ProcessEnv, key: string): number | undefined {
  const raw = env[key]?.trim();
  if (raw === undefined || raw.length === 0) return undefined;
  const value = Number(raw);
  if (!Number.isInteger(value)) {
    throw new ConfigurationError(`Invalid ${key}`, [`${key}: expected an integer, got "${raw}"`]);
  }
  return value;
}

/**
 * Read overrides from the environment:
 *   BUSARB_STRESS_CYCLES, BUSARB_SEED, BUSARB_LOG_LEVEL
 */
export function configInputFromEnv(env: NodeJS.ProcessEnv = process.env): HarnessConfigInput {
  const input: HarnessConfigInput = {};
  const cycles = parseIntegerEnv(env, "BUSARB_STRESS_CYCLES");
  const seed = parseIntegerEnv(env, "BUSARB_SEED");
  if (cycles !== undefined || seed !== undefined) {
    input.stress = {
      ...(cycles !== undefined ? { cycles } : {}),
      ...(seed !== undefined ? { seed } : {}),
    };
  }
  const level = env["BUSARB_LOG_LEVEL"]?.trim();
  if (level) {
    const match = LOG_LEVELS.find((candidate) => candidate === level);
    if (!match) {
      throw new ConfigurationError("Invalid BUSARB_LOG_LEVEL", [
        `BUSARB_LOG_LEVEL: expected one of ${LOG_LEVELS.join(", ")}, got "${level}"`,
      ]);
    }
    input.logLevel = match;
  }
  return input;
}

/** Merge file/programmatic input with environment overrides (env wins). */
export function loadHarnessConfig(
  input: HarnessConfigInput = {},
  env: NodeJS.ProcessEnv = process.env,
): HarnessConfig {
  const fromEnv = configInputFromEnv(env);
  return resolveHarnessConfig({
    ...input,
    ...(fromEnv.stress ? { stress: { ...input.stress, ...fromEnv.stress } } : {}),
    ...(fromEnv.logLevel ? { logLevel: fromEnv.logLevel } : {}),
  });
}

// ---------------------------------------------------------------------------
// DUT parameter introspection
// ---------------------------------------------------------------------------

export interface IntrospectedParams {
  readonly params: ArbiterParams;
  readonly source: "dut" | "default";
}

const PARAMETER_NAMES = {
  clients: "NUM_CLIENTS",
  weightWidth: "WEIGHT_WIDTH",
} as const satisfies Record<keyof ArbiterParams, string>;

/**
 * Read N and W from the DUT's `NUM_CLIENTS` / `WEIGHT_WIDTH` parameters.
 *
 * A parameter the module does not expose falls back to the documented
 * 4 x 4 default with a `warn` record. A parameter that is exposed but
 * outside the supported range is an error: driving the DUT with the
 * defaults would leave part of it unchecked.
 *
 * @throws ConfigurationError when an exposed parameter is unsupported
 */
export function introspectArbiterParams(
  module: Pick<ModuleDefinition, "name" | "params">,
  logger: StructuredLogger = silentLogger,
): IntrospectedParams {
  const clients = module.params[PARAMETER_NAMES.clients];
  const weightWidth = module.params[PARAMETER_NAMES.weightWidth];
  const candidate = {
    clients: clients ?? DEFAULT_ARBITER_PARAMS.clients,
    weightWidth: weightWidth ?? DEFAULT_ARBITER_PARAMS.weightWidth,
  };

  if (!validateParams(candidate)) {
    throw new ConfigurationError(
      `Unsupported arbiter parameters on module '${module.name}'`,
      (validateParams.errors ?? []).map((error) => {
        const key = error.instancePath.slice(1);
        if (key !== "clients" && key !== "weightWidth") return formatError(error);
        const name = PARAMETER_NAMES[key];
        return `${name}=${String(module.params[name])} ${error.message ?? "is invalid"}`;
      }),
    );
  }

  const missing = [
    ...(clients === undefined ? [PARAMETER_NAMES.clients] : []),
    ...(weightWidth === undefined ? [PARAMETER_NAMES.weightWidth] : []),
  ];
  if (missing.length === 0) {
    return { params: candidate, source: "dut" };
  }
  logger.warn("arbiter parameters not introspectable; using defaults", {
    module: module.name,
    missing,
    params: candidate,
  });
  return { params: candidate, source: "default" };
}
