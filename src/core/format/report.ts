// CHANGE: Pure text rendering for the room listing and the average
// WHY: Output lines are data; SHELL only writes them
// REF: REQ-ROOM-DISPLAY
// PURITY: CORE
// INVARIANT: Money is always rendered with exactly two decimals
// COMPLEXITY: O(n) where n = |rows|

import type { RoomRow } from "../models.js";

const COLUMN_WIDTHS = { identifier: 12, baseCost: 14, finalCost: 16 } as const;

export const EMPTY_LIST_NOTICE = "The room list is empty.";

/**
 * @pure true
 * @example formatMoney(900) === "900.00"
 */
export const formatMoney = (value: number): string => value.toFixed(2);

const formatLine = (
	identifier: string,
	baseCost: string,
	finalCost: string,
): string =>
	[
		identifier.padEnd(COLUMN_WIDTHS.identifier),
		baseCost.padEnd(COLUMN_WIDTHS.baseCost),
		finalCost.padEnd(COLUMN_WIDTHS.finalCost),
	].join("");

/**
 * Renders the listing: a notice for no rooms, otherwise a title, a header and one line per room.
 *
 * Columns are left-aligned and padded; an identifier longer than its column pushes the rest right.
 *
 * @pure true
 * @postcondition rows.length > 0 → result.length = rows.length + 2
 */
export const formatRoomTable = (
	rows: ReadonlyArray<RoomRow>,
): ReadonlyArray<string> =>
	rows.length === 0
		? [EMPTY_LIST_NOTICE]
		: [
				"Rooms:",
				formatLine("Room", "Base cost", "Final cost"),
				...rows.map((row) =>
					formatLine(
						row.identifier,
						formatMoney(row.baseCost),
						formatMoney(row.finalCost),
					),
				),
			];

export const formatAverage = (average: number): string =>
	`Average cost (after discounts): ${formatMoney(average)}`;
