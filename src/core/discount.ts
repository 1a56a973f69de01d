// CHANGE: Discount strategies as a closed tagged union
// WHY: Only two policies exist; dispatch is a ts-pattern match over `_tag`
// REF: REQ-ROOM-DISCOUNT
// FORMAT THEOREM: ∀b > 0, ∀p ∈ [0, 100): computeCost(PercentageDiscount(p), b) = b · (1 − p/100)
// PURITY: CORE
// INVARIANT: A PercentageDiscount value always carries 0 ≤ percent < 100
// COMPLEXITY: O(1)

import { Data, Either } from "effect";
import { match } from "ts-pattern";

import { InvalidValue } from "./errors.js";

/**
 * Policy turning a base cost into a final cost.
 *
 * @pure true
 */
export type DiscountStrategy = Data.TaggedEnum<{
	NoDiscount: {};
	PercentageDiscount: { readonly percent: number };
}>;

const { NoDiscount, PercentageDiscount } =
	Data.taggedEnum<DiscountStrategy>();

/**
 * Identity strategy: the final cost equals the base cost.
 */
export const noDiscount: DiscountStrategy = NoDiscount();

/**
 * Builds a percentage-off strategy.
 *
 * @param percent - Discount in percent
 * @returns Right(strategy) when 0 ≤ percent < 100, otherwise Left(InvalidValue)
 *
 * @pure true
 * @complexity O(1)
 */
export const makePercentageDiscount = (
	percent: number,
): Either.Either<DiscountStrategy, InvalidValue> => {
	if (!Number.isFinite(percent)) {
		return Either.left(
			new InvalidValue({ detail: "discount percent must be a finite number" }),
		);
	}
	if (percent < 0) {
		return Either.left(
			new InvalidValue({ detail: "discount percent must be >= 0" }),
		);
	}
	if (percent >= 100) {
		return Either.left(
			new InvalidValue({ detail: "discount percent must be < 100" }),
		);
	}
	return Either.right(PercentageDiscount({ percent }));
};

/**
 * Chooses the strategy for a requested discount: exactly 0 means no discount.
 *
 * @pure true
 * @postcondition percent = 0 → Right(noDiscount)
 */
export const selectDiscount = (
	percent: number,
): Either.Either<DiscountStrategy, InvalidValue> =>
	percent === 0 ? Either.right(noDiscount) : makePercentageDiscount(percent);

/**
 * Applies a strategy to a base cost.
 *
 * @pure true
 * @invariant computeCost(noDiscount, b) = b
 * @complexity O(1)
 */
export const computeCost = (
	strategy: DiscountStrategy,
	baseCost: number,
): number =>
	match(strategy)
		.with({ _tag: "NoDiscount" }, () => baseCost)
		.with(
			{ _tag: "PercentageDiscount" },
			({ percent }) => baseCost * (1 - percent / 100),
		)
		.exhaustive();

