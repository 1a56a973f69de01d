// CHANGE: Stateful room ledger service over the pure registry
// WHY: The session needs one mutable registry; CORE stays pure and the Ref holds the current value
// REF: REQ-ROOM-REGISTRY
// PURITY: SHELL
// EFFECT: Layer<RoomLedger>
// INVARIANT: The Ref is replaced only by a successful addRoom; failures leave it untouched
// COMPLEXITY: O(n) per add

import { Context, Effect, Layer, type Option, Ref } from "effect";

import type { DuplicateRoom, EmptyRoomList, InvalidValue } from "../../core/errors.js";
import type { Room, RoomRegistry, RoomRow } from "../../core/models.js";
import {
	addRoom,
	averageFinalCost,
	DEFAULT_IDENTIFIER_WARN_LENGTH,
	emptyRegistry,
	findRoom,
	isIdentifierTooLong,
	listAll,
	registrySize,
} from "../../core/registry.js";

export interface RoomLedgerService {
	readonly addRoom: (
		identifier: string,
		baseCost: number,
		discountPercent?: number,
	) => Effect.Effect<void, DuplicateRoom | InvalidValue>;
	readonly listAll: Effect.Effect<ReadonlyArray<RoomRow>>;
	readonly averageFinalCost: Effect.Effect<number, EmptyRoomList>;
	readonly findRoom: (identifier: string) => Effect.Effect<Option.Option<Room>>;
	readonly size: Effect.Effect<number>;
}

export class RoomLedger extends Context.Tag("RoomLedger")<
	RoomLedger,
	RoomLedgerService
>() {}

export interface RoomLedgerOptions {
	readonly identifierWarnLength: number;
}

/**
 * Builds the service around a registry reference.
 *
 * @pure false (reads/writes the Ref, logs)
 */
export const makeRoomLedger = (
	state: Ref.Ref<RoomRegistry>,
	options: RoomLedgerOptions,
): RoomLedgerService => ({
	addRoom: (identifier, baseCost, discountPercent = 0) =>
		Effect.gen(function* () {
			if (isIdentifierTooLong(identifier, options.identifierWarnLength)) {
				yield* Effect.logWarning(
					`room identifier is longer than ${options.identifierWarnLength} characters`,
				);
			}
			const current = yield* Ref.get(state);
			const next = yield* addRoom(current, {
				identifier,
				baseCost,
				discountPercent,
			});
			yield* Ref.set(state, next);
			yield* Effect.logDebug(`room added: ${identifier}`);
		}),
	listAll: Effect.map(Ref.get(state), listAll),
	averageFinalCost: Effect.flatMap(Ref.get(state), averageFinalCost),
	findRoom: (identifier) =>
		Effect.map(Ref.get(state), (registry) => findRoom(registry, identifier)),
	size: Effect.map(Ref.get(state), registrySize),
});

/**
 * Fresh, empty ledger for one session.
 *
 * @effect Layer<RoomLedger>
 */
export const RoomLedgerLive = (
	options: RoomLedgerOptions = {
		identifierWarnLength: DEFAULT_IDENTIFIER_WARN_LENGTH,
	},
): Layer.Layer<RoomLedger> =>
	Layer.effect(
		RoomLedger,
		Effect.map(Ref.make(emptyRegistry), (state) =>
			makeRoomLedger(state, options),
		),
	);
