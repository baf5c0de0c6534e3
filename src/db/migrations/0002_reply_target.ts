/**
 * @fileoverview Adds the reply target to suggestions.
 *
 * - suggestions.reply_to_message_id: incoming source message the model chose
 *   to answer; NULL when it chose none
 */

import { SqlClient } from "@effect/sql";
import { Effect } from "effect";

export default Effect.gen(function* () {
	const sql = yield* SqlClient.SqlClient;

	yield* sql`ALTER TABLE suggestions ADD COLUMN reply_to_message_id TEXT`;
});
