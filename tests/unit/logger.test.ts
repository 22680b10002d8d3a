import { describe, it, expect } from "vitest";
import { JsonLogger, silentLogger } from "../../src/logger.js";

function capture(): { lines: string[]; sink: (line: string) => void } {
  const lines: string[] = [];
  return { lines, sink: (line) => lines.push(line) };
}

describe("JsonLogger", () => {
  it("writes one JSON object per line", () => {
    const { lines, sink } = capture();
    new JsonLogger({ sink }).info("memory saved", { id: "abc", memoryType: "semantic" });

    expect(lines).toHaveLength(1);
    expect(lines[0].endsWith("\n")).toBe(true);
    const entry: unknown = JSON.parse(lines[0]);
    expect(entry).toMatchObject({
      level: "info",
      service: "cognitive-memory",
      msg: "memory saved",
      id: "abc",
      memoryType: "semantic",
    });
    expect(entry).toHaveProperty("time");
  });

  it("drops messages below the configured level", () => {
    const { lines, sink } = capture();
    const logger = new JsonLogger({ level: "warn", sink });
    logger.debug("a");
    logger.info("b");
    logger.warn("c");
    logger.error("d");
    expect(lines.map((line) => JSON.parse(line).msg)).toEqual(["c", "d"]);
  });

  it("defaults to info", () => {
    const { lines, sink } = capture();
    const logger = new JsonLogger({ sink });
    logger.debug("hidden");
    logger.info("shown");
    expect(lines).toHaveLength(1);
  });

  it("uses the configured service name", () => {
    const { lines, sink } = capture();
    new JsonLogger({ serviceName: "test-service", sink }).error("boom");
    expect(JSON.parse(lines[0])).toMatchObject({ level: "error", service: "test-service", msg: "boom" });
  });
});

describe("silentLogger", () => {
  it("accepts every level without output", () => {
    expect(() => {
      silentLogger.debug("x");
      silentLogger.info("x");
      silentLogger.warn("x", { a: 1 });
      silentLogger.error("x");
    }).not.toThrow();
  });
});
