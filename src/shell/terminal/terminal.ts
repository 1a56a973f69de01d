// CHANGE: Terminal service — the only place the session touches stdin/stdout
// WHY: APP composes prompts and output through a Context.Tag so tests can provide a scripted terminal
// REF: REQ-ROOM-CLI
// SOURCE: https://effect.website/docs/requirements-management/services
// PURITY: SHELL
// EFFECT: Layer<Terminal, never, Scope>
// INVARIANT: Every line read from the input stream is delivered to exactly one readLine call, in order

import { createInterface, type Interface } from "node:readline";

import { Context, Effect, Layer } from "effect";

import { InputClosed } from "../../core/errors.js";

export interface TerminalService {
	/** Prints `prompt` without a newline and waits for the next input line. */
	readonly readLine: (prompt: string) => Effect.Effect<string, InputClosed>;
	readonly writeLine: (text: string) => Effect.Effect<void>;
}

export class Terminal extends Context.Tag("Terminal")<
	Terminal,
	TerminalService
>() {}

export interface TerminalStreams {
	readonly input: NodeJS.ReadableStream;
	readonly output: NodeJS.WritableStream;
}

type Resume = (effect: Effect.Effect<string, InputClosed>) => void;

/**
 * Adapts a readline interface to the pull-style `readLine`.
 *
 * Lines that arrive while nobody is waiting are buffered; piped input
 * delivers many lines in one chunk.
 *
 * @pure false (registers listeners on the interface)
 * @complexity O(1) per line
 */
function makeReadlineTerminal(
	rl: Interface,
	output: NodeJS.WritableStream,
): TerminalService {
	const buffered: string[] = [];
	let waiting: Resume | undefined;
	let closed = false;

	rl.on("line", (line: string) => {
		if (waiting === undefined) {
			buffered.push(line);
			return;
		}
		const resume = waiting;
		waiting = undefined;
		resume(Effect.succeed(line));
	});

	rl.on("close", () => {
		closed = true;
		if (waiting !== undefined) {
			const resume = waiting;
			waiting = undefined;
			resume(Effect.fail(new InputClosed({ prompt: "" })));
		}
	});

	const nextLine = (prompt: string): Effect.Effect<string, InputClosed> =>
		Effect.async<string, InputClosed>((resume) => {
			const line = buffered.shift();
			if (line !== undefined) {
				resume(Effect.succeed(line));
				return;
			}
			if (closed) {
				resume(Effect.fail(new InputClosed({ prompt })));
				return;
			}
			waiting = resume;
			return Effect.sync(() => {
				waiting = undefined;
			});
		});

	return {
		readLine: (prompt) =>
			Effect.zipRight(
				Effect.sync(() => {
					output.write(prompt);
				}),
				nextLine(prompt),
			),
		writeLine: (text) =>
			Effect.sync(() => {
				output.write(`${text}\n`);
			}),
	};
}

const processStreams = (): TerminalStreams => ({
	input: process.stdin,
	output: process.stdout,
});

/**
 * Terminal over the given streams (stdin/stdout when omitted). The readline
 * interface is closed when the scope ends.
 *
 * @effect Layer<Terminal>
 */
export const TerminalLive = (streams?: TerminalStreams): Layer.Layer<Terminal> =>
	Layer.scoped(
		Terminal,
		Effect.map(
			Effect.acquireRelease(
				Effect.sync(() => {
					const { input, output } = streams ?? processStreams();
					const rl = createInterface({
						input,
						crlfDelay: Number.POSITIVE_INFINITY,
					});
					return { rl, output };
				}),
				({ rl }) => Effect.sync(() => rl.close()),
			),
			({ rl, output }) => makeReadlineTerminal(rl, output),
		),
	);
