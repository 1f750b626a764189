import { describe, test, expect } from "vitest";
import { resolveHarnessConfig } from "./config.js";
import { runConformance } from "./conformance.js";
import { ConfigurationError, GrantMismatchError, IllegalGrantError } from "./errors.js";
import { StructuredLogger } from "./logger.js";
import { arbiterModule } from "./rtl.js";
import { findScenario, SCENARIOS } from "./scenarios.js";

const config = resolveHarnessConfig({ stress: { cycles: 500 } });

describe("runConformance", () => {
  test("a correct DUT passes every scenario and the stress run", () => {
    const report = runConformance(arbiterModule({ clients: 4, weightWidth: 4 }), { config, bench: "tick" });

    expect(report.module).toBe("arbiter_wrr_lock");
    expect(report.bench).toBe("tick");
    expect(report.paramsSource).toBe("dut");
    expect(report.scenarios.map((result) => result.name)).toEqual(SCENARIOS.map((s) => s.name));
    expect(report.skipped).toEqual([]);
    expect(report.stress.cycles).toBe(500);
    expect(report.stress.seed).toBe(1);
  });

  test("defaults to the clocked bench", () => {
    const report = runConformance(arbiterModule({ clients: 4, weightWidth: 4 }), {
      config,
      scenarios: [findScenario("lock-to-switch")],
    });

    expect(report.bench).toBe("clocked");
    expect(report.scenarios).toEqual([
      { name: "lock-to-switch", cycles: 7, grants: [0, 0, 0, 0, 0, 0, 1] },
    ]);
  });

  test("a DUT without parameters runs with the 4 x 4 defaults", () => {
    const report = runConformance(
      arbiterModule({ clients: 4, weightWidth: 4, hideParams: true }),
      { config, bench: "tick" },
    );

    expect(report.paramsSource).toBe("default");
    expect(report.scenarios).toHaveLength(SCENARIOS.length);
  });

  test("a DUT wider than the harness supports is refused", () => {
    expect(() =>
      runConformance(arbiterModule({ clients: 64, weightWidth: 4 }), { config, bench: "tick" }),
    ).toThrow(ConfigurationError);
  });

  test("scenarios needing more clients are skipped with a warning", () => {
    const lines: string[] = [];
    const logger = new StructuredLogger({
      level: "warn",
      sink: (line) => lines.push(line),
      now: () => new Date("2026-01-01T00:00:00.000Z"),
    });

    const report = runConformance(arbiterModule({ clients: 2, weightWidth: 3 }), {
      config,
      bench: "tick",
      logger,
    });

    expect(report.scenarios).toEqual([]);
    expect(report.skipped).toEqual(SCENARIOS.map((s) => s.name));
    expect(report.stress.grantCounts).toHaveLength(3);
    expect(lines.map((line) => JSON.parse(line).message)).toEqual([
      "scenarios skipped for client count",
    ]);
  });

  test("the summary is logged at info", () => {
    const lines: string[] = [];
    const logger = new StructuredLogger({
      sink: (line) => lines.push(line),
      now: () => new Date("2026-01-01T00:00:00.000Z"),
    });

    runConformance(arbiterModule({ clients: 4, weightWidth: 4 }), {
      config,
      bench: "tick",
      scenarios: [findScenario("early-drop")],
      logger,
    });

    expect(JSON.parse(lines[lines.length - 1] ?? "")).toEqual({
      ts: "2026-01-01T00:00:00.000Z",
      level: "info",
      message: "conformance passed",
      module: "arbiter_wrr_lock",
      bench: "tick",
      scenarios: 1,
      stressCycles: 500,
    });
  });

  test("the first failure stops the run", () => {
    expect(() =>
      runConformance(arbiterModule({ clients: 4, weightWidth: 4, faults: ["double-grant"] }), { config }),
    ).toThrow(IllegalGrantError);
    expect(() =>
      runConformance(arbiterModule({ clients: 4, weightWidth: 4, faults: ["honor-foreign-lock"] }), {
        config,
      }),
    ).toThrow("cycle 7: expected grant 1, DUT granted 0");
    expect(() =>
      runConformance(arbiterModule({ clients: 4, weightWidth: 4, faults: ["reload-on-unlock"] }), {
        config,
        bench: "tick",
      }),
    ).toThrow(GrantMismatchError);
  });
});
