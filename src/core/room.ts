// CHANGE: Immutable room record with construction-time validation
// REF: REQ-ROOM-RECORD
// PURITY: CORE
// INVARIANT: ∀room: room.identifier ≠ "" ∧ room.baseCost > 0 ∧ room.discount is present
// COMPLEXITY: O(1)

import { Either } from "effect";

import { computeCost, type DiscountStrategy } from "./discount.js";
import { InvalidValue } from "./errors.js";
import type { Room, RoomRow } from "./models.js";

/**
 * Validates and builds a room.
 *
 * Identifier trimming is the caller's job; this only rejects the empty string.
 *
 * @param identifier - Display label of the room
 * @param baseCost - Undiscounted nightly price
 * @param discount - Strategy applied to the base cost
 * @returns Right(room) or Left(InvalidValue) naming the first violated invariant
 *
 * @pure true
 * @complexity O(1)
 */
export const makeRoom = (
	identifier: string,
	baseCost: number,
	discount: DiscountStrategy | undefined,
): Either.Either<Room, InvalidValue> => {
	if (identifier.length === 0) {
		return Either.left(
			new InvalidValue({ detail: "room identifier must not be empty" }),
		);
	}
	if (!Number.isFinite(baseCost) || baseCost <= 0) {
		return Either.left(new InvalidValue({ detail: "base cost must be > 0" }));
	}
	if (discount === undefined) {
		return Either.left(
			new InvalidValue({ detail: "discount strategy must be present" }),
		);
	}
	return Either.right({ identifier, baseCost, discount });
};

/**
 * Final cost of a room, recomputed on every call.
 *
 * @pure true
 */
export const roomFinalCost = (room: Room): number =>
	computeCost(room.discount, room.baseCost);

/**
 * Read-only listing row for a room.
 *
 * @pure true
 */
export const toRoomRow = (room: Room): RoomRow => ({
	identifier: room.identifier,
	baseCost: room.baseCost,
	finalCost: roomFinalCost(room),
});
