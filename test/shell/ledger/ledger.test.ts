// CHANGE: RoomLedger service over a Ref, including the long-identifier warning
// PURITY: SHELL - runs Effect programs with a capturing logger
// INVARIANT: Warnings never block insertion; failed adds leave the ledger unchanged

import { Effect, Either, Layer } from "effect";
import { describe, expect, it } from "vitest";

import {
	RoomLedger,
	RoomLedgerLive,
	type RoomLedgerOptions,
} from "../../../src/shell/ledger/ledger.js";
import { capturingLogger } from "../../utils/terminal.js";
import { leftOf } from "../../utils/either.js";

const runWithLedger = <A, E>(
	program: Effect.Effect<A, E, RoomLedger>,
	options?: RoomLedgerOptions,
) => {
	const logger = capturingLogger();
	const result = Effect.runSync(
		Effect.either(
			Effect.provide(program, Layer.merge(RoomLedgerLive(options), logger.layer)),
		),
	);
	return { result, entries: logger.entries };
};

describe("RoomLedger.addRoom", () => {
	it("rejects a second room with the same identifier and keeps one", () => {
		const { result } = runWithLedger(
			Effect.gen(function* () {
				const ledger = yield* RoomLedger;
				yield* ledger.addRoom("A", 100);
				const second = yield* Effect.either(ledger.addRoom("A", 250, 5));
				const size = yield* ledger.size;
				return { second, size };
			}),
		);
		const { second, size } = Either.getOrThrow(result);
		expect(leftOf(second)).toMatchObject({ _tag: "DuplicateRoom", identifier: "A" });
		expect(size).toBe(1);
	});

	it("warns about identifiers over 50 characters but still adds the room", () => {
		const identifier = "x".repeat(51);
		const { result, entries } = runWithLedger(
			Effect.gen(function* () {
				const ledger = yield* RoomLedger;
				yield* ledger.addRoom(identifier, 100);
				return yield* ledger.listAll;
			}),
		);
		expect(Either.getOrThrow(result)).toEqual([
			{ identifier, baseCost: 100, finalCost: 100 },
		]);
		expect(entries).toEqual([
			"WARN room identifier is longer than 50 characters",
		]);
	});

	it("stays quiet at exactly the limit", () => {
		const { entries } = runWithLedger(
			Effect.flatMap(RoomLedger, (ledger) =>
				ledger.addRoom("x".repeat(50), 100),
			),
		);
		expect(entries).toEqual([]);
	});

	it("uses the configured warning threshold", () => {
		const { entries } = runWithLedger(
			Effect.flatMap(RoomLedger, (ledger) => ledger.addRoom("Suite-9", 100)),
			{ identifierWarnLength: 5 },
		);
		expect(entries).toEqual([
			"WARN room identifier is longer than 5 characters",
		]);
	});

	it("surfaces InvalidValue without touching the ledger", () => {
		const { result } = runWithLedger(
			Effect.gen(function* () {
				const ledger = yield* RoomLedger;
				const failed = yield* Effect.either(ledger.addRoom("101", 100, -1));
				const size = yield* ledger.size;
				return { failed, size };
			}),
		);
		const { failed, size } = Either.getOrThrow(result);
		expect(leftOf(failed)).toMatchObject({
			_tag: "InvalidValue",
			detail: "discount percent must be >= 0",
		});
		expect(size).toBe(0);
	});
});

describe("RoomLedger aggregates", () => {
	it("averages the discounted costs of all rooms", () => {
		const { result } = runWithLedger(
			Effect.gen(function* () {
				const ledger = yield* RoomLedger;
				yield* ledger.addRoom("1", 100);
				yield* ledger.addRoom("2", 200);
				yield* ledger.addRoom("3", 300);
				return yield* ledger.averageFinalCost;
			}),
		);
		expect(Either.getOrThrow(result)).toBe(200);
	});

	it("fails with EmptyRoomList when nothing was added", () => {
		const { result } = runWithLedger(
			Effect.flatMap(RoomLedger, (ledger) => ledger.averageFinalCost),
		);
		expect(leftOf(result)).toMatchObject({ _tag: "EmptyRoomList" });
	});

	it("finds rooms by identifier", () => {
		const { result } = runWithLedger(
			Effect.gen(function* () {
				const ledger = yield* RoomLedger;
				yield* ledger.addRoom("B-7", 80, 25);
				return yield* ledger.findRoom("B-7");
			}),
		);
		const found = Either.getOrThrow(result);
		expect(found._tag).toBe("Some");
	});
});
