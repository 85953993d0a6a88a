import { describe, it, expect, beforeEach, afterEach, jest } from "@jest/globals";
import { LogPrinter } from "../../models/LogPrinter";

describe("LogPrinter", () => {
  let logs: string[];
  let errs: string[];

  beforeEach(() => {
    logs = [];
    errs = [];
    LogPrinter.setWriters({
      log: (msg) => logs.push(msg),
      error: (msg) => errs.push(msg),
    });
  });

  afterEach(() => {
    LogPrinter.resetWriters();
  });

  const baseLog = {
    level: "info" as const,
    message: "hello",
    timestamp: new Date("2020-01-01T00:00:00.123Z"),
  };

  it("prints a plain line to stdout", () => {
    const p = new LogPrinter({ strategy: "plain", useColors: true });
    p.print({ ...baseLog, source: "graphdump.serializer" });

    expect(logs).toEqual([
      "00:00:00.123 ● INFO    [graphdump.serializer] hello",
    ]);
    expect(errs).toEqual([]);
  });

  it("routes warn, error and critical to stderr", () => {
    const p = new LogPrinter({ strategy: "pretty", useColors: false });
    p.print({ ...baseLog, level: "warn" });
    p.print({ ...baseLog, level: "error" });
    p.print({ ...baseLog, level: "critical" });

    expect(errs).toHaveLength(3);
    expect(logs).toHaveLength(0);
  });

  it("colours pretty output when asked to", () => {
    const p = new LogPrinter({ strategy: "pretty", useColors: true });
    p.print({ ...baseLog });

    expect(logs[0]).toContain("\x1b[32m●");
  });

  it("prints data and context blocks", () => {
    const p = new LogPrinter({ strategy: "plain", useColors: false });
    p.print({ ...baseLog, data: { bytes: 12 }, context: {} });

    expect(logs).toEqual([
      "00:00:00.123 ● INFO    hello",
      "    ╰─ data:",
      "       {",
      '         "bytes": 12',
      "       }",
      "",
    ]);
  });

  it("prints json compact and pretty", () => {
    const p = new LogPrinter({ strategy: "json", useColors: false });
    p.print({ ...baseLog, message: { a: 1 } });
    expect(JSON.parse(logs[0])).toEqual({
      level: "info",
      message: { a: 1 },
      timestamp: "2020-01-01T00:00:00.123Z",
    });

    logs = [];
    const p2 = new LogPrinter({ strategy: "json_pretty", useColors: false });
    p2.print({ ...baseLog, message: { a: 1 } });
    expect(logs[0].includes("\n")).toBe(true);
  });

  it("handles cycles, bigints and byte arrays", () => {
    const p = new LogPrinter({ strategy: "json", useColors: false });
    const circular: { x: number; self?: unknown } = { x: 1 };
    circular.self = circular;

    p.print({ ...baseLog, message: circular });
    p.print({ ...baseLog, message: { big: 10n, bytes: new Uint8Array(3) } });

    expect(logs[0]).toContain('"self":"[Circular]"');
    expect(logs[1]).toContain('"big":"10","bytes":"<3 bytes>"');
  });

  it("resetWriters restores the console writers", () => {
    LogPrinter.resetWriters();
    const spyLog = jest.spyOn(console, "log").mockImplementation(() => {});
    const spyErr = jest.spyOn(console, "error").mockImplementation(() => {});

    try {
      const p = new LogPrinter({ strategy: "pretty", useColors: false });
      p.print({ ...baseLog, level: "info" });
      p.print({ ...baseLog, level: "warn" });
      expect(spyLog).toHaveBeenCalled();
      expect(spyErr).toHaveBeenCalled();
    } finally {
      spyLog.mockRestore();
      spyErr.mockRestore();
    }
  });
});
