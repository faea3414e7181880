import { afterEach, beforeEach, describe, it } from "node:test";
import assert from "node:assert/strict";
import { existsSync, readFileSync, rmSync } from "fs";
import { join } from "path";
import { tmpdir } from "os";
import {
  createLogger,
  FileSink,
  formatLogEntry,
  initLogger,
  MemorySink
} from "../src/logger.js";
import type { LogSink } from "../src/logger.js";

const FIXED_NOW = () => new Date("2026-01-02T03:04:05.000Z");
const TEST_DIR = join(tmpdir(), `testnet-order-logger-${Date.now()}`);

describe("formatLogEntry", () => {
  it("joins timestamp, level, name and message", () => {
    const line = formatLogEntry({
      timestamp: "2026-01-02T03:04:05.000Z",
      level: "info",
      name: "testnet-order",
      message: "Placing order"
    });

    assert.equal(line, "2026-01-02T03:04:05.000Z - INFO - testnet-order - Placing order");
  });

  it("appends data as JSON", () => {
    const line = formatLogEntry({
      timestamp: "2026-01-02T03:04:05.000Z",
      level: "error",
      name: "testnet-order",
      message: "Futures API error: Invalid symbol.",
      data: { code: -1121 }
    });

    assert.equal(
      line,
      '2026-01-02T03:04:05.000Z - ERROR - testnet-order - Futures API error: Invalid symbol. {"code":-1121}'
    );
  });

  it("keeps a multi-line message on one line", () => {
    const line = formatLogEntry({
      timestamp: "2026-01-02T03:04:05.000Z",
      level: "error",
      name: "testnet-order",
      message: "Futures API error: first\r\nsecond"
    });

    assert.equal(
      line,
      "2026-01-02T03:04:05.000Z - ERROR - testnet-order - Futures API error: first\\r\\nsecond"
    );
  });
});

describe("createLogger", () => {
  it("writes the same line to every sink", () => {
    const first = new MemorySink();
    const second = new MemorySink();
    const logger = createLogger({ sinks: [first, second], now: FIXED_NOW });

    logger.info("Client initialized");

    assert.deepEqual(first.lines, [
      "2026-01-02T03:04:05.000Z - INFO - testnet-order - Client initialized"
    ]);
    assert.deepEqual(second.lines, first.lines);
  });

  it("drops entries below the configured level", () => {
    const sink = new MemorySink();
    const logger = createLogger({ sinks: [sink], level: "warn", now: FIXED_NOW });

    logger.debug("noise");
    logger.info("still noise");
    logger.warn("careful");
    logger.error("failed");

    assert.deepEqual(
      sink.entries.map((entry) => entry.level),
      ["warn", "error"]
    );
  });

  it("merges child context into the data of each line", () => {
    const sink = new MemorySink();
    const logger = createLogger({ sinks: [sink], name: "orders", now: FIXED_NOW });

    logger.child({ symbol: "BTCUSDT" }).info("Placing order", { side: "BUY" });

    assert.deepEqual(sink.lines, [
      '2026-01-02T03:04:05.000Z - INFO - orders - Placing order {"symbol":"BTCUSDT","side":"BUY"}'
    ]);
  });
});

describe("sink failures", () => {
  it("reports a failing sink and still writes to the others", () => {
    const failing: LogSink = {
      write() {
        throw new Error("EACCES: permission denied");
      }
    };
    const memory = new MemorySink();
    const failures: Array<{ message: string; sink: LogSink }> = [];
    const logger = createLogger({
      sinks: [failing, memory],
      now: FIXED_NOW,
      onSinkError: (error, sink) =>
        failures.push({ message: error instanceof Error ? error.message : String(error), sink })
    });

    logger.info("Order params");
    logger.info("Order response");

    assert.deepEqual(memory.lines, [
      "2026-01-02T03:04:05.000Z - INFO - testnet-order - Order params",
      "2026-01-02T03:04:05.000Z - INFO - testnet-order - Order response"
    ]);
    assert.equal(failures.length, 2);
    assert.equal(failures[0].message, "EACCES: permission denied");
    assert.equal(failures[0].sink, failing);
  });
});

describe("FileSink", () => {
  beforeEach(() => {
    if (existsSync(TEST_DIR)) {
      rmSync(TEST_DIR, { recursive: true, force: true });
    }
  });

  afterEach(() => {
    if (existsSync(TEST_DIR)) {
      rmSync(TEST_DIR, { recursive: true, force: true });
    }
  });

  it("creates the directory and appends one line per entry", () => {
    const path = join(TEST_DIR, "nested", "bot.log");
    const logger = createLogger({ sinks: [new FileSink(path)], now: FIXED_NOW });

    logger.info("first");
    logger.error("second");

    assert.equal(
      readFileSync(path, "utf-8"),
      "2026-01-02T03:04:05.000Z - INFO - testnet-order - first\n" +
        "2026-01-02T03:04:05.000Z - ERROR - testnet-order - second\n"
    );
  });
});

describe("initLogger", () => {
  it("initializes once and ignores later calls", () => {
    const first = new MemorySink();
    const second = new MemorySink();

    const logger = initLogger({ logFile: "unused.log", logLevel: "info" }, [first]);
    const again = initLogger({ logFile: "other.log", logLevel: "debug" }, [second]);

    assert.equal(again, logger);
    again.info("hello");
    assert.equal(first.lines.length, 1);
    assert.equal(second.lines.length, 0);
  });
});
