/**
 * Tests for the Telegram login helpers.
 */

import { describe, expect, it } from "@effect/vitest";
import { accountName, isRetryableLoginError } from "../../../src/services/chat/index.js";

describe("accountName", () => {
	it("prefers the username", () => {
		expect(accountName({ username: "ann_k", firstName: "Ann" })).toBe("ann_k");
	});

	it("falls back to the first name, then a placeholder", () => {
		expect(accountName({ username: "", firstName: "Ann" })).toBe("Ann");
		expect(accountName({})).toBe("<user>");
	});
});

describe("isRetryableLoginError", () => {
	it("asks again after a mistyped code or password", () => {
		expect(isRetryableLoginError(new Error("400: PHONE_CODE_INVALID (caused by auth.SignIn)"))).toBe(
			true,
		);
		expect(isRetryableLoginError(new Error("400: PASSWORD_HASH_INVALID"))).toBe(true);
	});

	it("gives up on anything else", () => {
		expect(isRetryableLoginError(new Error("400: PHONE_NUMBER_BANNED"))).toBe(false);
		expect(isRetryableLoginError(new Error("socket hang up"))).toBe(false);
	});
});
