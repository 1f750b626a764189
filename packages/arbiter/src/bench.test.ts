import { describe, test, expect, afterEach } from "vitest";
import { createBench, createClockedBench, createTickBench, type ArbiterBench } from "./bench.js";
import { arbiterModule } from "./rtl.js";

const module = arbiterModule({ clients: 4, weightWidth: 4 });

let bench: ArbiterBench | undefined;

afterEach(() => {
  bench?.dispose();
  bench = undefined;
});

describe("tick bench", () => {
  test("counts edges as time", () => {
    bench = createTickBench(module);
    bench.reset();
    expect(bench.time()).toBe(1);
    bench.cycle();
    bench.cycle();
    expect(bench.time()).toBe(3);
  });

  test("reset leaves the inputs low and the DUT out of reset", () => {
    bench = createTickBench(module);
    bench.dut.i_req = 0b1111n;
    bench.reset();

    expect(bench.dut.i_req).toBe(0n);
    expect(bench.dut.rst_n).toBe(1n);
    expect(bench.dut.o_gnt).toBe(0n);
  });

  test("one cycle makes the grant visible", () => {
    bench = createTickBench(module);
    bench.reset();
    bench.dut.i_req = 0b1000n;
    bench.cycle();
    expect(bench.dut.o_gnt).toBe(0b1000n);
  });
});

describe("clocked bench", () => {
  test("reset runs for the configured duration", () => {
    bench = createClockedBench(module);
    bench.reset();
    expect(bench.time()).toBe(20);
  });

  test("each cycle samples just after the next rising edge", () => {
    bench = createClockedBench(module);
    bench.reset();
    bench.dut.i_req = 0b0010n;
    bench.cycle();

    expect(bench.time()).toBe(26);
    expect(bench.dut.o_gnt).toBe(0b0010n);
    bench.cycle();
    expect(bench.time()).toBe(36);
  });

  test("custom clock timing", () => {
    bench = createClockedBench(module, { period: 4, settle: 1, resetDuration: 8 });
    bench.reset();
    bench.cycle();
    // edges at 2, 6, 10
    expect(bench.time()).toBe(11);
  });

  test("settle must fit inside half a period", () => {
    expect(() => createClockedBench(module, { period: 10, settle: 5 })).toThrow(
      "settle delay 5 must be shorter than half the clock period 10",
    );
  });
});

describe("createBench", () => {
  test("selects by kind", () => {
    bench = createBench("tick", module);
    expect(bench.kind).toBe("tick");
    bench.dispose();
    bench = createBench("clocked", module, { period: 20 });
    expect(bench.kind).toBe("clocked");
  });
});
