import type { EngineEvent } from "./types.js";

type Slot = { event: EngineEvent };

export type SubscriptionOptions = {
	batchId?: string;
	maxBufferedLogs: number;
	onClose: (subscription: Subscription) => void;
};

/**
 * One subscriber's view of the event stream. Pushing never blocks. Unread progress
 * for a job is replaced by the newest update at the tail, and log lines past
 * the cap are dropped. Everything else is always buffered.
 */
export class Subscription implements AsyncIterableIterator<EngineEvent> {
	readonly batchId?: string;
	readonly #buffer: Slot[] = [];
	readonly #progressSlots = new Map<string, Slot>();
	readonly #maxBufferedLogs: number;
	readonly #onClose: (subscription: Subscription) => void;
	#bufferedLogs = 0;
	#dropped = 0;
	#waiter: ((result: IteratorResult<EngineEvent>) => void) | undefined;
	#done = false;

	constructor(options: SubscriptionOptions) {
		this.batchId = options.batchId;
		this.#maxBufferedLogs = options.maxBufferedLogs;
		this.#onClose = options.onClose;
	}

	get dropped(): number {
		return this.#dropped;
	}

	push(event: EngineEvent): void {
		if (this.#done) {
			return;
		}

		if (this.batchId !== undefined && event.batchId !== this.batchId) {
			return;
		}

		if (this.#waiter) {
			const waiter = this.#waiter;
			this.#waiter = undefined;
			waiter({ value: event, done: false });
			return;
		}

		if (event.type === "jobProgress") {
			const pending = this.#progressSlots.get(event.jobId);
			if (pending) {
				this.#buffer.splice(this.#buffer.indexOf(pending), 1);
				this.#dropped += 1;
			}

			const slot = { event };
			this.#progressSlots.set(event.jobId, slot);
			this.#buffer.push(slot);
			return;
		}

		if (event.type === "jobLog") {
			if (this.#bufferedLogs >= this.#maxBufferedLogs) {
				this.#dropped += 1;
				return;
			}
			this.#bufferedLogs += 1;
		}

		this.#buffer.push({ event });
	}

	next(): Promise<IteratorResult<EngineEvent>> {
		const slot = this.#buffer.shift();
		if (slot) {
			const { event } = slot;
			if (event.type === "jobProgress") {
				this.#progressSlots.delete(event.jobId);
			} else if (event.type === "jobLog") {
				this.#bufferedLogs -= 1;
			}
			return Promise.resolve({ value: event, done: false });
		}

		if (this.#done) {
			return Promise.resolve({ value: undefined, done: true });
		}

		return new Promise((resolve) => {
			this.#waiter = resolve;
		});
	}

	return(): Promise<IteratorResult<EngineEvent>> {
		this.close();
		return Promise.resolve({ value: undefined, done: true });
	}

	/** Ends the stream after the already buffered events have been read. */
	end(): void {
		this.#done = true;
		this.#onClose(this);
		if (this.#waiter) {
			const waiter = this.#waiter;
			this.#waiter = undefined;
			waiter({ value: undefined, done: true });
		}
	}

	close(): void {
		this.#buffer.length = 0;
		this.#progressSlots.clear();
		this.#bufferedLogs = 0;
		this.end();
	}

	[Symbol.asyncIterator](): AsyncIterableIterator<EngineEvent> {
		return this;
	}
}

export class ProgressReporter {
	readonly #subscriptions = new Set<Subscription>();
	readonly #maxBufferedLogs: number;
	#closed = false;

	constructor(options: { maxBufferedLogs?: number } = {}) {
		this.#maxBufferedLogs = options.maxBufferedLogs ?? 500;
	}

	get subscriberCount(): number {
		return this.#subscriptions.size;
	}

	publish(event: EngineEvent): void {
		for (const subscription of this.#subscriptions) {
			subscription.push(event);
		}
	}

	subscribe(batchId?: string): Subscription {
		const subscription = new Subscription({
			batchId,
			maxBufferedLogs: this.#maxBufferedLogs,
			onClose: (closed) => {
				this.#subscriptions.delete(closed);
			},
		});

		if (this.#closed) {
			subscription.end();
			return subscription;
		}

		this.#subscriptions.add(subscription);
		return subscription;
	}

	close(): void {
		this.#closed = true;
		for (const subscription of [...this.#subscriptions]) {
			subscription.end();
		}
	}
}
