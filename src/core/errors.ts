// CHANGE: Typed domain error ADT for the room ledger using Effect.Data
// WHY: Domain failures travel in the error channel of Either/Effect, not as thrown exceptions
// REF: REQ-ROOM-ERRORS
// SOURCE: https://effect.website/docs/data-types/data
// PURITY: CORE
// INVARIANT: Errors are values (no throw), discriminated by `_tag`
// COMPLEXITY: O(1)

import { Data } from "effect";
import { match } from "ts-pattern";

/**
 * A supplied value violates a construction-time invariant
 * (empty identifier, non-positive cost, out-of-range discount, absent strategy).
 *
 * @pure true (Data class)
 * @invariant detail.length > 0
 */
export class InvalidValue extends Data.TaggedError("InvalidValue")<{
	readonly detail: string;
}> {}

/**
 * An identifier collides with a room already in the registry.
 *
 * @pure true (Data class)
 */
export class DuplicateRoom extends Data.TaggedError("DuplicateRoom")<{
	readonly identifier: string;
}> {}

/**
 * An aggregate was requested while the registry holds zero rooms.
 *
 * @pure true (Data class)
 */
export class EmptyRoomList extends Data.TaggedError("EmptyRoomList")<{
	readonly operation: string;
}> {}

/**
 * The input stream ended before a valid value was read.
 *
 * @pure true (Data class)
 * @invariant Never rendered to the user as an error; the session ends instead
 */
export class InputClosed extends Data.TaggedError("InputClosed")<{
	readonly prompt: string;
}> {}

/**
 * Union of the errors a ledger operation can report.
 *
 * @pure true
 */
export type RoomError = InvalidValue | DuplicateRoom | EmptyRoomList;

/**
 * Renders a domain error as the text shown after `Error: `.
 *
 * @pure true
 * @invariant ∀e ∈ RoomError: describeRoomError(e).length > 0
 * @complexity O(|detail|)
 *
 * @example
 * ```ts
 * describeRoomError(new DuplicateRoom({ identifier: "101" }));
 * // "Duplicate room: '101' already exists"
 * ```
 */
export const describeRoomError = (error: RoomError): string =>
	match(error)
		.with({ _tag: "InvalidValue" }, (e) => `Invalid value: ${e.detail}`)
		.with(
			{ _tag: "DuplicateRoom" },
			(e) => `Duplicate room: '${e.identifier}' already exists`,
		)
		.with(
			{ _tag: "EmptyRoomList" },
			(e) => `Room list is empty: nothing to ${e.operation}`,
		)
		.exhaustive();
