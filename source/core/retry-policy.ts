import { DEFAULT_QUALITY_LADDER, type QualityLadder } from "./config.js";
import type { ErrorKind } from "./errors.js";
import type { MediaFormat } from "./types.js";

export type RetryPolicyOptions = {
	maxAttempts: number;
	baseBackoffMs?: number;
	qualityLadder?: QualityLadder;
	random?: () => number;
};

export type RetryInput = {
	attempt: number;
	format: MediaFormat;
	quality: string;
	error: ErrorKind;
	recoverable: boolean;
};

export type RetryDecision =
	| { action: "retry"; quality: string; delayMs: number }
	| { action: "fail"; error: ErrorKind; cause?: ErrorKind };

export class RetryPolicy {
	readonly maxAttempts: number;
	readonly #baseBackoffMs: number;
	readonly #ladder: QualityLadder;
	readonly #random: () => number;

	constructor(options: RetryPolicyOptions) {
		this.maxAttempts = Math.max(1, Math.floor(options.maxAttempts));
		this.#baseBackoffMs = options.baseBackoffMs ?? 500;
		this.#ladder = options.qualityLadder ?? DEFAULT_QUALITY_LADDER;
		this.#random = options.random ?? Math.random;
	}

	decide(input: RetryInput): RetryDecision {
		if (!input.recoverable) {
			return { action: "fail", error: input.error };
		}

		if (input.attempt >= this.maxAttempts) {
			return {
				action: "fail",
				error: "retry-ceiling-exceeded",
				cause: input.error,
			};
		}

		// A missing format will not appear on a plain retry, so relax right away.
		const relax = input.error === "format-unavailable" || input.attempt >= 2;
		return {
			action: "retry",
			quality: relax
				? this.relaxQuality(input.format, input.quality)
				: input.quality,
			delayMs: this.computeBackoff(input.attempt),
		};
	}

	relaxQuality(format: MediaFormat, quality: string): string {
		const ladder = this.#ladder[format];
		const normalized = quality.toLowerCase().trim();
		const index = ladder.indexOf(normalized);
		if (index < 0) {
			return "best";
		}

		return ladder[index + 1] ?? "best";
	}

	computeBackoff(attempt: number): number {
		if (this.#baseBackoffMs <= 0) {
			return 0;
		}

		const factor = 2 ** Math.max(0, attempt - 1);
		const jitter = 0.8 + this.#random() * 0.4;
		return Math.round(this.#baseBackoffMs * factor * jitter);
	}
}
