// CHANGE: Unit and property tests for the pure registry
// FORMAT THEOREM: ∀ids unique: listAll(foldl(addRoom, ∅, ids)).map(identifier) = ids
// PURITY: CORE
// INVARIANT: Failed adds leave the registry untouched

import { Either, Option } from "effect";
import fc from "fast-check";
import { describe, expect, it } from "vitest";

import { formatMoney } from "../../src/core/format/report.js";
import type { AddRoomRequest, RoomRegistry } from "../../src/core/models.js";
import {
	addRoom,
	averageFinalCost,
	emptyRegistry,
	findRoom,
	isIdentifierTooLong,
	listAll,
	registrySize,
} from "../../src/core/registry.js";
import { leftOf, rightOf } from "../utils/either.js";

const addAll = (requests: ReadonlyArray<AddRoomRequest>): RoomRegistry =>
	requests.reduce(
		(registry, request) => rightOf(addRoom(registry, request)),
		emptyRegistry,
	);

describe("addRoom", () => {
	it("adds a room with the selected discount", () => {
		const registry = addAll([
			{ identifier: "101", baseCost: 1000, discountPercent: 10 },
		]);
		expect(listAll(registry)).toEqual([
			{ identifier: "101", baseCost: 1000, finalCost: 900 },
		]);
	});

	it("defaults to no discount", () => {
		const registry = addAll([{ identifier: "102", baseCost: 500 }]);
		expect(listAll(registry)).toEqual([
			{ identifier: "102", baseCost: 500, finalCost: 500 },
		]);
	});

	it("rejects a duplicate identifier and keeps exactly one room", () => {
		const registry = addAll([{ identifier: "A", baseCost: 100 }]);
		const error = leftOf(addRoom(registry, { identifier: "A", baseCost: 200 }));
		expect(error._tag).toBe("DuplicateRoom");
		expect(error).toMatchObject({ identifier: "A" });
		expect(registrySize(registry)).toBe(1);
	});

	it("reports a duplicate before validating the discount", () => {
		const registry = addAll([{ identifier: "A", baseCost: 100 }]);
		expect(
			leftOf(
				addRoom(registry, {
					identifier: "A",
					baseCost: 100,
					discountPercent: 150,
				}),
			)._tag,
		).toBe("DuplicateRoom");
	});

	it("compares identifiers case-sensitively", () => {
		const registry = addAll([
			{ identifier: "a", baseCost: 100 },
			{ identifier: "A", baseCost: 100 },
		]);
		expect(registrySize(registry)).toBe(2);
	});

	it("propagates InvalidValue from the discount and the room", () => {
		expect(
			leftOf(
				addRoom(emptyRegistry, {
					identifier: "1",
					baseCost: 100,
					discountPercent: 100,
				}),
			),
		).toMatchObject({ _tag: "InvalidValue", detail: "discount percent must be < 100" });
		expect(
			leftOf(addRoom(emptyRegistry, { identifier: "1", baseCost: 0 })),
		).toMatchObject({ _tag: "InvalidValue", detail: "base cost must be > 0" });
		expect(registrySize(emptyRegistry)).toBe(0);
	});

	it("preserves insertion order for any set of unique identifiers", () => {
		fc.assert(
			fc.property(
				fc.uniqueArray(fc.string({ minLength: 1 }), { maxLength: 20 }),
				(identifiers) => {
					const registry = addAll(
						identifiers.map((identifier) => ({ identifier, baseCost: 10 })),
					);
					expect(listAll(registry).map((row) => row.identifier)).toEqual(
						identifiers,
					);
				},
			),
		);
	});
});

describe("averageFinalCost", () => {
	it("fails with EmptyRoomList on an empty registry", () => {
		expect(leftOf(averageFinalCost(emptyRegistry))).toMatchObject({
			_tag: "EmptyRoomList",
			operation: "average",
		});
	});

	it("averages final costs", () => {
		const registry = addAll([
			{ identifier: "1", baseCost: 100 },
			{ identifier: "2", baseCost: 200 },
			{ identifier: "3", baseCost: 300 },
		]);
		expect(rightOf(averageFinalCost(registry))).toBe(200);
	});

	it("uses discounted costs", () => {
		const registry = addAll([
			{ identifier: "101", baseCost: 1000, discountPercent: 10 },
			{ identifier: "102", baseCost: 500, discountPercent: 0 },
		]);
		const average = averageFinalCost(registry);
		expect(Either.isRight(average)).toBe(true);
		expect(formatMoney(rightOf(average))).toBe("700.00");
	});
});

describe("findRoom / isIdentifierTooLong", () => {
	it("finds rooms by exact identifier", () => {
		const registry = addAll([{ identifier: "B-7", baseCost: 80 }]);
		expect(Option.getOrUndefined(findRoom(registry, "B-7"))?.baseCost).toBe(80);
		expect(Option.isNone(findRoom(registry, "b-7"))).toBe(true);
	});

	it("flags identifiers strictly longer than the limit", () => {
		expect(isIdentifierTooLong("x".repeat(50), 50)).toBe(false);
		expect(isIdentifierTooLong("x".repeat(51), 50)).toBe(true);
	});
});
