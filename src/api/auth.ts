/**
 * @fileoverview Optional HTTP Basic authentication for the dashboard API.
 */

import { timingSafeEqual } from "node:crypto";
import { Headers, type HttpApp, HttpServerRequest, HttpServerResponse } from "@effect/platform";
import { Effect, Option, Redacted } from "effect";
import type { DashboardCredentials } from "../config/index.js";

const REALM = "reply-drafter";

const safeEqual = (left: string, right: string): boolean => {
	const a = Buffer.from(left, "utf8");
	const b = Buffer.from(right, "utf8");
	return a.length === b.length && timingSafeEqual(a, b);
};

/**
 * Checks an `Authorization: Basic ...` header value against the credentials.
 */
export const isAuthorized = (
	header: Option.Option<string>,
	credentials: DashboardCredentials,
): boolean =>
	Option.match(header, {
		onNone: () => false,
		onSome: (value) => {
			const [scheme, encoded] = value.split(" ", 2);
			if (scheme?.toLowerCase() !== "basic" || encoded === undefined) {
				return false;
			}
			const decoded = Buffer.from(encoded, "base64").toString("utf8");
			const separator = decoded.indexOf(":");
			if (separator < 0) {
				return false;
			}
			const userOk = safeEqual(decoded.slice(0, separator), credentials.username);
			const passwordOk = safeEqual(
				decoded.slice(separator + 1),
				Redacted.value(credentials.password),
			);
			return userOk && passwordOk;
		},
	});

/**
 * Wraps an app so every request must carry the dashboard credentials.
 * Without credentials the app is returned unchanged.
 */
export const requireBasicAuth =
	(credentials: DashboardCredentials | undefined) =>
	<E, R>(app: HttpApp.Default<E, R>): HttpApp.Default<E, R> =>
		credentials === undefined
			? app
			: Effect.gen(function* () {
					const request = yield* HttpServerRequest.HttpServerRequest;
					if (isAuthorized(Headers.get(request.headers, "authorization"), credentials)) {
						return yield* app;
					}
					return HttpServerResponse.setHeader(
						HttpServerResponse.unsafeJson(
							{ error: { code: "UNAUTHORIZED", message: "Authentication required" } },
							{ status: 401 },
						),
						"www-authenticate",
						`Basic realm="${REALM}"`,
					);
				});
