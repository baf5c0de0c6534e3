/**
 * @fileoverview Persistence error type.
 *
 * Wraps underlying SQL and row-decoding errors with the repository
 * operation that failed.
 */

import { Data } from "effect";

export class PersistenceError extends Data.TaggedError("PersistenceError")<{
	/** The repository method or operation that failed */
	readonly method: string;
	/** The underlying error cause */
	readonly cause: unknown;
}> {
	override get message(): string {
		const causeMsg = this.cause instanceof Error ? this.cause.message : String(this.cause);
		return `Database error in ${this.method}: ${causeMsg}`;
	}
}
