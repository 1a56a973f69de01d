// CHANGE: Pure parsers for user-supplied text
// WHY: Prompt loops in SHELL re-ask on Left; parsing itself stays deterministic and testable
// REF: REQ-ROOM-INPUT
// PURITY: CORE
// INVARIANT: Left carries the message shown before re-prompting; Right carries a value within bounds
// COMPLEXITY: O(|raw|)

import { Either } from "effect";

/**
 * Upper sanity bound for a base cost.
 */
export const DEFAULT_MAX_COST = 1_000_000;

const DIGITS = /^[0-9]+$/;
const DECIMAL = /^[+-]?(?:[0-9]+\.?[0-9]*|\.[0-9]+)(?:[eE][+-]?[0-9]+)?$/;

/**
 * Strips spaces, tabs, CR and LF from both ends.
 *
 * @pure true
 */
export const trimInput = (raw: string): string =>
	raw.replace(/^[ \t\r\n]+|[ \t\r\n]+$/g, "");

const parseNumber = (raw: string): Either.Either<number, string> => {
	const text = trimInput(raw);
	// Number() alone would also take 0x/0b/0o literals
	const value = DECIMAL.test(text) ? Number(text) : Number.NaN;
	return !Number.isFinite(value)
		? Either.left("enter a number.")
		: Either.right(value);
};

/**
 * @returns Right(trimmed text) unless nothing is left after trimming
 * @pure true
 */
export const parseNonEmptyString = (
	raw: string,
): Either.Either<string, string> => {
	const text = trimInput(raw);
	return text.length === 0
		? Either.left("the value must not be empty. Try again.")
		: Either.right(text);
};

/**
 * Parses a cost in (0, maxCost].
 *
 * @pure true
 * @postcondition Right(x) → 0 < x ≤ maxCost
 */
export const parsePositiveCost = (
	raw: string,
	maxCost: number = DEFAULT_MAX_COST,
): Either.Either<number, string> =>
	Either.flatMap(parseNumber(raw), (value): Either.Either<number, string> => {
		if (value <= 0) {
			return Either.left("the value must be greater than 0. Try again.");
		}
		if (value > maxCost) {
			return Either.left(`the value must not exceed ${maxCost}. Try again.`);
		}
		return Either.right(value);
	});

/**
 * Parses a discount percent in [0, 100).
 *
 * @pure true
 * @postcondition Right(p) → 0 ≤ p < 100
 */
export const parseDiscountPercent = (
	raw: string,
): Either.Either<number, string> =>
	Either.flatMap(parseNumber(raw), (value): Either.Either<number, string> => {
		if (value < 0) {
			return Either.left("the value must not be negative. Try again.");
		}
		if (value >= 100) {
			return Either.left("the discount percent must be less than 100. Try again.");
		}
		return Either.right(value);
	});

/**
 * Parses a menu choice: digits only, within [low, high] inclusive.
 *
 * @pure true
 * @postcondition Right(n) → Number.isInteger(n) ∧ low ≤ n ≤ high
 *
 * @example
 * ```ts
 * parseMenuChoice(" 2 ", 0, 3); // Right(2)
 * parseMenuChoice("-1", 0, 3);  // Left("enter a whole number.")
 * ```
 */
export const parseMenuChoice = (
	raw: string,
	low: number,
	high: number,
): Either.Either<number, string> => {
	const text = trimInput(raw);
	if (text.length === 0) {
		return Either.left("enter a number.");
	}
	if (!DIGITS.test(text)) {
		return Either.left("enter a whole number.");
	}
	const value = Number.parseInt(text, 10);
	if (value < low || value > high) {
		return Either.left(`the number must be in the range [${low}, ${high}].`);
	}
	return Either.right(value);
};
