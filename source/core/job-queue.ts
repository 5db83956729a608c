import { EngineClosedError } from "./errors.js";

type Waiter = (id: string | undefined) => void;

export type JobQueueOptions = {
	/** Ids failing this check stay in place and are skipped by `dequeue`. */
	isEligible?: (id: string) => boolean;
	/** Runs synchronously as an id is handed out, before any other take. */
	onTake?: (id: string) => void;
};

/**
 * FIFO backlog of pending job ids. `dequeue` hands out the first eligible id,
 * waiting until one is available; it resolves `undefined` once the queue is
 * closed and drained, or at once after `close({ cancel: true })`.
 */
export class JobQueue {
	readonly #items: string[] = [];
	readonly #waiters: Waiter[] = [];
	readonly #isEligible: (id: string) => boolean;
	readonly #onTake?: (id: string) => void;
	#held = false;
	#closed = false;
	#cancelled = false;

	constructor(options: JobQueueOptions = {}) {
		this.#isEligible = options.isEligible ?? (() => true);
		this.#onTake = options.onTake;
	}

	get size(): number {
		return this.#items.length;
	}

	get closed(): boolean {
		return this.#closed;
	}

	get held(): boolean {
		return this.#held;
	}

	enqueue(id: string): void {
		if (this.#closed) {
			throw new EngineClosedError(`Cannot enqueue ${id}: queue is closed`);
		}

		this.#items.push(id);
		this.#dispatch();
	}

	dequeue(): Promise<string | undefined> {
		const next = this.#take();
		if (next !== undefined || this.#isDrained()) {
			return Promise.resolve(next);
		}

		return new Promise((resolve) => {
			this.#waiters.push(resolve);
		});
	}

	remove(id: string): boolean {
		const index = this.#items.indexOf(id);
		if (index < 0) {
			return false;
		}

		this.#items.splice(index, 1);
		if (this.#isDrained()) {
			this.#flushWaiters();
		}
		return true;
	}

	has(id: string): boolean {
		return this.#items.includes(id);
	}

	pending(): string[] {
		return [...this.#items];
	}

	hold(): void {
		this.#held = true;
	}

	release(): void {
		this.#held = false;
		this.#dispatch();
	}

	/** Re-checks eligibility for waiting workers. */
	wake(): void {
		this.#dispatch();
	}

	close(options: { cancel?: boolean } = {}): void {
		this.#closed = true;
		if (options.cancel) {
			this.#cancelled = true;
			this.#items.length = 0;
		}

		this.#dispatch();
		if (this.#isDrained()) {
			this.#flushWaiters();
		}
	}

	#take(): string | undefined {
		if (this.#held || this.#cancelled) {
			return undefined;
		}

		const index = this.#items.findIndex((id) => this.#isEligible(id));
		if (index < 0) {
			return undefined;
		}

		const [id] = this.#items.splice(index, 1);
		if (id !== undefined) {
			this.#onTake?.(id);
		}
		return id;
	}

	#dispatch(): void {
		while (this.#waiters.length > 0) {
			const next = this.#take();
			if (next === undefined) {
				return;
			}

			this.#waiters.shift()?.(next);
		}
	}

	#isDrained(): boolean {
		return this.#cancelled || (this.#closed && this.#items.length === 0);
	}

	#flushWaiters(): void {
		for (const waiter of this.#waiters.splice(0)) {
			waiter(undefined);
		}
	}
}
