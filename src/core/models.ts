// CHANGE: Functional Core domain models for the room ledger (pure, immutable)
// WHY: CORE contains only pure types/functions and invariants
// REF: REQ-ROOM-MODEL
// PURITY: CORE
// INVARIANT: CORE defines no effects; data is immutable
// COMPLEXITY: O(1)

import type { DiscountStrategy } from "./discount.js";

/**
 * Exit code for the ledger process.
 *
 * @remarks
 * - @pure true
 * - @invariant exitCode ∈ {0, 1}
 */
export type ExitCode = 0 | 1;

/**
 * Priced, uniquely identified hotel-room record.
 *
 * @remarks
 * - Built only through `makeRoom`; never mutated afterwards
 * - The final cost is derived from `discount`, not stored
 */
export interface Room {
	readonly identifier: string;
	readonly baseCost: number;
	readonly discount: DiscountStrategy;
}

/**
 * Snapshot of one room as shown in the listing.
 */
export interface RoomRow {
	readonly identifier: string;
	readonly baseCost: number;
	readonly finalCost: number;
}

/**
 * Ordered collection of rooms, insertion order preserved.
 *
 * @remarks
 * - @invariant ∀i ≠ j: rooms[i].identifier ≠ rooms[j].identifier
 */
export interface RoomRegistry {
	readonly rooms: ReadonlyArray<Room>;
}

/**
 * Request to add a room; a missing discount means no discount.
 */
export interface AddRoomRequest {
	readonly identifier: string;
	readonly baseCost: number;
	readonly discountPercent?: number;
}
