/**
 * @fileoverview Scheduler endpoints.
 */

import { HttpServerResponse } from "@effect/platform";
import { Effect } from "effect";
import { Scheduler } from "../../services/scheduler/index.js";
import { internalError, mapSchedulerStatus, mapTickReport } from "../responses.js";

/**
 * GET /api/v1/scheduler
 */
export const schedulerStatusHandler = Effect.gen(function* () {
	const scheduler = yield* Scheduler;
	const status = yield* scheduler.status();
	return yield* HttpServerResponse.json(mapSchedulerStatus(status));
});

/**
 * POST /api/v1/scheduler/run
 *
 * Runs one tick now. Waits for a tick already in progress to finish first.
 */
export const runSchedulerHandler = Effect.gen(function* () {
	const scheduler = yield* Scheduler;
	const report = yield* scheduler.runNow();
	return yield* HttpServerResponse.json(mapTickReport(report));
}).pipe(Effect.catchTag("PersistenceError", internalError));
