/**
 * Tests for mapping GramJS failures to transport errors.
 */

import { describe, expect, it } from "@effect/vitest";
import { toTransportError } from "../../../src/services/chat/index.js";

const rpcError = (code: number, message: string) => Object.assign(new Error(message), { code });

describe("toTransportError", () => {
	it("maps an unauthorized session to auth", () => {
		const error = toTransportError("getMessages", rpcError(401, "AUTH_KEY_UNREGISTERED"));

		expect(error.source).toBe("chat");
		expect(error.kind).toBe("auth");
		expect(error.message).toBe("Telegram getMessages failed: AUTH_KEY_UNREGISTERED");
	});

	it("maps FLOOD_WAIT to rate_limit", () => {
		const error = toTransportError("sendMessage", rpcError(420, "FLOOD_WAIT_30"));

		expect(error.kind).toBe("rate_limit");
	});

	it("treats anything else as a network failure", () => {
		expect(toTransportError("connect", new Error("socket hang up")).kind).toBe("network");
		expect(toTransportError("connect", rpcError(500, "INTERNAL")).kind).toBe("network");
	});

	it("keeps the original failure as the cause", () => {
		const cause = "timeout";
		const error = toTransportError("getDialogs", cause);

		expect(error.cause).toBe(cause);
		expect(error.message).toBe("Telegram getDialogs failed: timeout");
	});
});
