import { describe, test, expect, vi } from "vitest";
import { bindDut, type CombState } from "./dut.js";
import { buildLayout } from "./layout.js";
import { readSignal, writeSignal } from "./signal.js";
import type { PortInfo } from "./types.js";

function bind<P>(ports: Record<string, PortInfo>, evalComb: (view: DataView) => void = () => {}) {
  const { signals, size } = buildLayout(ports);
  const view = new DataView(new ArrayBuffer(size));
  const comb: CombState = { stale: false };
  const evaluate = vi.fn(() => evalComb(view));
  const dut = bindDut<P>(view, signals, ports, evaluate, comb);
  return { dut, view, comb, evaluate };
}

function logicInput(width: number): PortInfo {
  return { direction: "input", type: "logic", width };
}

describe("bindDut: input ports", () => {
  test.each([
    [1, 1n, 1n],
    [4, 0xffn, 0x0fn],
    [12, 0xabcdn, 0xbcdn],
    [16, 0xabcdn, 0xabcdn],
    [32, 0xdead_beefn, 0xdead_beefn],
    [36, (1n << 40n) - 1n, (1n << 36n) - 1n],
  ])("a %i-bit port stores %s as %s", (width, written, read) => {
    const { dut } = bind<{ a: bigint }>({ a: logicInput(width) });

    dut.a = written;
    expect(dut.a).toBe(read);
  });

  test("numbers are accepted and read back as bigint", () => {
    const { dut } = bind<{ a: bigint | number }>({ a: logicInput(8) });

    dut.a = 200;
    expect(dut.a).toBe(200n);
  });

  test("wide ports are stored little-endian", () => {
    const { dut, view } = bind<{ a: bigint }>({ a: logicInput(40) });

    dut.a = 0x12_3456_789an;
    expect(view.getUint8(0)).toBe(0x9a);
    expect(view.getUint8(4)).toBe(0x12);
  });

  test("input writes mark outputs stale without evaluating", () => {
    const { dut, comb, evaluate } = bind<{ a: bigint }>({ a: logicInput(4) });

    dut.a = 3n;
    expect(comb.stale).toBe(true);
    expect(dut.a).toBe(3n);
    expect(evaluate).not.toHaveBeenCalled();
  });
});

describe("bindDut: output ports", () => {
  // y = a + 1
  const incrementer = () =>
    bind<{ a: bigint; readonly y: bigint }>(
      {
        a: logicInput(8),
        y: { direction: "output", type: "logic", width: 8 },
      },
      (view) => view.setUint8(1, (view.getUint8(0) + 1) & 0xff),
    );

  test("a stale read evaluates once", () => {
    const { dut, comb, evaluate } = incrementer();

    dut.a = 41n;
    expect(dut.y).toBe(42n);
    expect(dut.y).toBe(42n);
    expect(evaluate).toHaveBeenCalledTimes(1);
    expect(comb.stale).toBe(false);
  });

  test("a settled read does not evaluate", () => {
    const { dut, evaluate } = incrementer();

    expect(dut.y).toBe(0n);
    expect(evaluate).not.toHaveBeenCalled();
  });

  test("outputs reject writes", () => {
    const { dut } = bind<Record<string, bigint>>({
      y: { direction: "output", type: "logic", width: 8 },
    });

    expect(() => {
      dut["y"] = 1n;
    }).toThrow("Cannot write to output port 'y'");
  });
});

describe("bindDut: port selection", () => {
  test("clock ports get no property", () => {
    const { dut } = bind<Record<string, bigint>>({
      clk: { direction: "input", type: "clock", width: 1 },
      rst_n: { direction: "input", type: "reset_async_low", width: 1 },
      i_req: logicInput(4),
    });

    expect(Object.keys(dut)).toEqual(["rst_n", "i_req"]);
  });
});

describe("buildLayout", () => {
  test("packs signals in declaration order on byte boundaries", () => {
    const { signals, size } = buildLayout({
      clk: { direction: "input", type: "clock", width: 1 },
      w: { direction: "input", type: "logic", width: 16 },
      wide: { direction: "input", type: "logic", width: 64 },
      g: { direction: "output", type: "logic", width: 20 },
    });

    expect(signals["clk"]).toMatchObject({ offset: 0, byteSize: 1, typeKind: "clock" });
    expect(signals["w"]).toMatchObject({ offset: 1, byteSize: 2 });
    expect(signals["wide"]).toMatchObject({ offset: 3, byteSize: 8 });
    expect(signals["g"]).toMatchObject({ offset: 11, byteSize: 4, direction: "output" });
    expect(size).toBe(15);
  });

  test("rejects a zero-width port", () => {
    expect(() =>
      buildLayout({ bad: { direction: "input", type: "logic", width: 0 } }),
    ).toThrow("Port 'bad' has invalid width 0");
  });

  test("unaligned 16-bit signals round-trip through the codec", () => {
    const { signals, size } = buildLayout({
      a: { direction: "input", type: "logic", width: 1 },
      b: { direction: "input", type: "logic", width: 12 },
    });
    const view = new DataView(new ArrayBuffer(size));
    const b = signals["b"];
    if (!b) throw new Error("layout missing b");

    writeSignal(view, b, 0xfffn);
    expect(readSignal(view, b)).toBe(0xfffn);
    expect(view.getUint8(0)).toBe(0);
  });
});
