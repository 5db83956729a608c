import type { StopReason } from "./types.js";

export type ControlCommand = "pause" | "resume";

type CommandListener = (command: ControlCommand) => void;

/**
 * Command channel between the control plane and one running attempt.
 * Stop requests travel through `signal`; suspend/continue through `onCommand`.
 */
export class JobControl {
	readonly #abort = new AbortController();
	readonly #listeners = new Set<CommandListener>();
	#stopReason: StopReason | undefined;
	#paused = false;

	get signal(): AbortSignal {
		return this.#abort.signal;
	}

	get stopReason(): StopReason | undefined {
		return this.#stopReason;
	}

	get paused(): boolean {
		return this.#paused;
	}

	/** First stop request wins; later ones are ignored. */
	stop(reason: StopReason): boolean {
		if (this.#stopReason) {
			return false;
		}

		this.#stopReason = reason;
		this.#abort.abort(reason);
		return true;
	}

	pause(): void {
		if (this.#paused || this.#stopReason) {
			return;
		}

		this.#paused = true;
		this.#broadcast("pause");
	}

	resume(): void {
		if (!this.#paused) {
			return;
		}

		this.#paused = false;
		this.#broadcast("resume");
	}

	onCommand(listener: CommandListener): () => void {
		this.#listeners.add(listener);
		return () => {
			this.#listeners.delete(listener);
		};
	}

	#broadcast(command: ControlCommand): void {
		for (const listener of this.#listeners) {
			listener(command);
		}
	}
}
