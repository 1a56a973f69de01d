// CHANGE: Pure room registry operations over an immutable value
// WHY: The registry is state of the session; CORE returns new values instead of mutating
// REF: REQ-ROOM-REGISTRY
// FORMAT THEOREM: ∀r, req: addRoom(r, req) = Right(r') → |r'.rooms| = |r.rooms| + 1 ∧ last(r'.rooms).identifier = req.identifier
// PURITY: CORE
// INVARIANT: Identifiers are unique (exact, case-sensitive); insertion order is preserved
// COMPLEXITY: O(n) per add (linear duplicate scan), O(n) per aggregate

import { Either, Option, pipe } from "effect";

import { selectDiscount } from "./discount.js";
import { DuplicateRoom, EmptyRoomList, type InvalidValue } from "./errors.js";
import type {
	AddRoomRequest,
	Room,
	RoomRegistry,
	RoomRow,
} from "./models.js";
import { makeRoom, roomFinalCost, toRoomRow } from "./room.js";

/**
 * Identifier length above which a warning is reported.
 */
export const DEFAULT_IDENTIFIER_WARN_LENGTH = 50;

export const emptyRegistry: RoomRegistry = { rooms: [] };

export const registrySize = (registry: RoomRegistry): number =>
	registry.rooms.length;

/**
 * Looks a room up by exact identifier.
 *
 * @pure true
 * @complexity O(n)
 */
export const findRoom = (
	registry: RoomRegistry,
	identifier: string,
): Option.Option<Room> =>
	Option.fromNullable(
		registry.rooms.find((room) => room.identifier === identifier),
	);

/**
 * Adds a room, returning the extended registry.
 *
 * Order of checks: duplicate identifier, then discount, then room fields.
 *
 * @param registry - Current registry (left untouched)
 * @param request - Identifier, base cost and optional discount percent
 * @returns Right(next registry) or Left(DuplicateRoom | InvalidValue)
 *
 * @pure true
 * @postcondition Left → the caller's registry is unchanged
 * @complexity O(n)
 *
 * @example
 * ```ts
 * const next = addRoom(emptyRegistry, { identifier: "101", baseCost: 1000, discountPercent: 10 });
 * // Right({ rooms: [{ identifier: "101", baseCost: 1000, discount: PercentageDiscount(10) }] })
 * ```
 */
export const addRoom = (
	registry: RoomRegistry,
	request: AddRoomRequest,
): Either.Either<RoomRegistry, DuplicateRoom | InvalidValue> => {
	if (Option.isSome(findRoom(registry, request.identifier))) {
		return Either.left(new DuplicateRoom({ identifier: request.identifier }));
	}
	return pipe(
		selectDiscount(request.discountPercent ?? 0),
		Either.flatMap((discount) =>
			makeRoom(request.identifier, request.baseCost, discount),
		),
		Either.map((room) => ({ rooms: [...registry.rooms, room] })),
	);
};

/**
 * Arithmetic mean of final costs.
 *
 * @pure true
 * @precondition registry is non-empty, otherwise Left(EmptyRoomList)
 * @complexity O(n)
 */
export const averageFinalCost = (
	registry: RoomRegistry,
): Either.Either<number, EmptyRoomList> => {
	const count = registry.rooms.length;
	if (count === 0) {
		return Either.left(new EmptyRoomList({ operation: "average" }));
	}
	const total = registry.rooms.reduce(
		(sum, room) => sum + roomFinalCost(room),
		0,
	);
	return Either.right(total / count);
};

/**
 * Listing snapshot in insertion order; empty when there are no rooms.
 *
 * @pure true
 */
export const listAll = (registry: RoomRegistry): ReadonlyArray<RoomRow> =>
	registry.rooms.map(toRoomRow);

export const isIdentifierTooLong = (
	identifier: string,
	limit: number,
): boolean => identifier.length > limit;
