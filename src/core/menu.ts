// CHANGE: Menu model — numbered choices mapped to a tagged action union
// WHY: The session dispatches on `_tag` with ts-pattern instead of comparing raw numbers
// REF: REQ-ROOM-MENU
// PURITY: CORE
// INVARIANT: ∀n ∈ [MENU_LOW, MENU_HIGH]: menuActionOf(n) is defined
// COMPLEXITY: O(1)

import { Option } from "effect";
import { match, P } from "ts-pattern";

export type MenuAction =
	| { readonly _tag: "AddRoom" }
	| { readonly _tag: "ListRooms" }
	| { readonly _tag: "AverageCost" }
	| { readonly _tag: "Exit" };

export const MENU_LOW = 0;
export const MENU_HIGH = 3;

export const MENU_LINES: ReadonlyArray<string> = [
	"",
	"===== HOTEL ROOM LEDGER =====",
	"1. Add a room",
	"2. List all rooms",
	"3. Average cost (after discounts)",
	"0. Exit",
	"=============================",
];

export const PROMPTS = {
	choice: "Your choice: ",
	identifier: "Room identifier (e.g. 101, A-12): ",
	baseCost: "Base cost per night: ",
	discount: "Discount percent (0 for none, < 100): ",
} as const;

/**
 * Maps a validated menu number to its action.
 *
 * @pure true
 * @returns None for numbers outside the menu
 */
export const menuActionOf = (choice: number): Option.Option<MenuAction> =>
	match(choice)
		.with(1, () => Option.some<MenuAction>({ _tag: "AddRoom" }))
		.with(2, () => Option.some<MenuAction>({ _tag: "ListRooms" }))
		.with(3, () => Option.some<MenuAction>({ _tag: "AverageCost" }))
		.with(0, () => Option.some<MenuAction>({ _tag: "Exit" }))
		.with(P.number, () => Option.none<MenuAction>())
		.exhaustive();
