import { describe, expect, it } from "vitest";
import { Cause, FiberId, FiberRefs, HashMap, List, LogLevel, LogSpan } from "effect";
import { formatLogEntry, toLogLevel } from "../../src/lib/logger.js";

const DATE = new Date("2024-05-01T10:00:00.000Z");

const entry = (overrides: Partial<Parameters<typeof formatLogEntry>[0]> = {}) =>
	formatLogEntry({
		fiberId: FiberId.none,
		logLevel: LogLevel.Info,
		message: "Tick finished",
		cause: Cause.empty,
		context: FiberRefs.empty(),
		spans: List.empty(),
		annotations: HashMap.empty(),
		date: DATE,
		...overrides,
	});

describe("formatLogEntry", () => {
	it("formats timestamp, padded level and message", () => {
		expect(entry()).toBe("2024-05-01T10:00:00.000Z [INFO ] Tick finished");
		expect(entry({ logLevel: LogLevel.Error })).toBe(
			"2024-05-01T10:00:00.000Z [ERROR] Tick finished",
		);
	});

	it("appends annotations as JSON values", () => {
		expect(entry({ annotations: HashMap.make(["chatId", "42"]) })).toBe(
			'2024-05-01T10:00:00.000Z [INFO ] Tick finished chatId="42"',
		);
	});

	it("appends span durations relative to the entry date", () => {
		const spans = List.make(LogSpan.make("tick", DATE.getTime() - 12));
		expect(entry({ spans })).toBe(
			"2024-05-01T10:00:00.000Z [INFO ] Tick finished spans=[tick=12ms]",
		);
	});

	it("joins multi-part messages and serializes objects", () => {
		expect(entry({ message: ["Settings loaded", { pollIntervalMinutes: 5 }] })).toBe(
			'2024-05-01T10:00:00.000Z [INFO ] Settings loaded {"pollIntervalMinutes":5}',
		);
	});

	it("appends the cause", () => {
		const line = entry({ logLevel: LogLevel.Error, cause: Cause.fail(new Error("boom")) });
		expect(line.startsWith("2024-05-01T10:00:00.000Z [ERROR] Tick finished cause=Error: boom")).toBe(
			true,
		);
	});
});

describe("toLogLevel", () => {
	it("maps config levels to Effect log levels", () => {
		expect(toLogLevel("debug")).toBe(LogLevel.Debug);
		expect(toLogLevel("info")).toBe(LogLevel.Info);
		expect(toLogLevel("warning")).toBe(LogLevel.Warning);
		expect(toLogLevel("error")).toBe(LogLevel.Error);
	});
});
