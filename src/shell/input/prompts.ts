// CHANGE: Re-prompting input loops over the pure parsers
// WHY: Bad input never reaches the domain; the user is asked again until the parser accepts
// REF: REQ-ROOM-INPUT
// PURITY: SHELL
// EFFECT: Effect<A, InputClosed, Terminal>
// INVARIANT: Returns only values the parser accepted; fails only when input ends
// COMPLEXITY: O(k) where k = number of attempts

import { Effect, Either } from "effect";

import type { InputClosed } from "../../core/errors.js";
import {
	DEFAULT_MAX_COST,
	parseDiscountPercent,
	parseMenuChoice,
	parseNonEmptyString,
	parsePositiveCost,
} from "../../core/validation.js";
import { Terminal } from "../terminal/terminal.js";

/**
 * Reads lines until `parse` returns Right; each Left is printed as `Error: <reason>`.
 *
 * @pure false (terminal I/O)
 * @effect Effect<A, InputClosed, Terminal>
 */
export const promptUntilValid = <A>(
	prompt: string,
	parse: (raw: string) => Either.Either<A, string>,
): Effect.Effect<A, InputClosed, Terminal> =>
	Effect.gen(function* () {
		const terminal = yield* Terminal;
		for (;;) {
			const raw = yield* terminal.readLine(prompt);
			const parsed = parse(raw);
			if (Either.isRight(parsed)) {
				return parsed.right;
			}
			yield* terminal.writeLine(`Error: ${parsed.left}`);
		}
	});

export const promptNonEmptyString = (
	prompt: string,
): Effect.Effect<string, InputClosed, Terminal> =>
	promptUntilValid(prompt, parseNonEmptyString);

export const promptPositiveCost = (
	prompt: string,
	maxCost: number = DEFAULT_MAX_COST,
): Effect.Effect<number, InputClosed, Terminal> =>
	promptUntilValid(prompt, (raw) => parsePositiveCost(raw, maxCost));

export const promptDiscountPercent = (
	prompt: string,
): Effect.Effect<number, InputClosed, Terminal> =>
	promptUntilValid(prompt, parseDiscountPercent);

export const promptMenuChoice = (
	prompt: string,
	low: number,
	high: number,
): Effect.Effect<number, InputClosed, Terminal> =>
	promptUntilValid(prompt, (raw) => parseMenuChoice(raw, low, high));
