import { describe, expect, it } from "vitest";
import { RetryPolicy } from "./retry-policy.js";

const fixedRandom = () => 0.5;

describe("RetryPolicy", () => {
	const policy = new RetryPolicy({
		maxAttempts: 3,
		baseBackoffMs: 100,
		random: fixedRandom,
	});

	it("relaxes quality right away when the format is unavailable", () => {
		expect(
			policy.decide({
				attempt: 1,
				format: "video",
				quality: "1080p",
				error: "format-unavailable",
				recoverable: true,
			}),
		).toEqual({ action: "retry", quality: "720p", delayMs: 100 });
	});

	it("keeps parameters on the first retry of other failures", () => {
		expect(
			policy.decide({
				attempt: 1,
				format: "audio",
				quality: "320k",
				error: "transient-network",
				recoverable: true,
			}),
		).toEqual({ action: "retry", quality: "320k", delayMs: 100 });
	});

	it("relaxes from the second attempt on and doubles the delay", () => {
		expect(
			policy.decide({
				attempt: 2,
				format: "audio",
				quality: "320k",
				error: "stalled",
				recoverable: true,
			}),
		).toEqual({ action: "retry", quality: "256k", delayMs: 200 });
	});

	it("fails with the ceiling kind once attempts are used up", () => {
		expect(
			policy.decide({
				attempt: 3,
				format: "video",
				quality: "720p",
				error: "transient-network",
				recoverable: true,
			}),
		).toEqual({
			action: "fail",
			error: "retry-ceiling-exceeded",
			cause: "transient-network",
		});
	});

	it("fails fatal errors immediately with their own kind", () => {
		expect(
			policy.decide({
				attempt: 1,
				format: "video",
				quality: "best",
				error: "access-denied",
				recoverable: false,
			}),
		).toEqual({ action: "fail", error: "access-denied" });
	});

	it("falls back to best off the ladder and after the last tier", () => {
		expect(policy.relaxQuality("video", "144p")).toBe("best");
		expect(policy.relaxQuality("video", "best")).toBe("best");
		expect(policy.relaxQuality("video", "999p")).toBe("best");
		expect(policy.relaxQuality("audio", "64k")).toBe("best");
		expect(policy.relaxQuality("video", "2160P")).toBe("1440p");
	});

	it("uses a custom ladder", () => {
		const custom = new RetryPolicy({
			maxAttempts: 2,
			qualityLadder: { video: ["high", "low"], audio: [] },
		});
		expect(custom.relaxQuality("video", "high")).toBe("low");
		expect(custom.relaxQuality("audio", "192k")).toBe("best");
	});

	it("applies jitter within twenty percent and can be disabled", () => {
		const low = new RetryPolicy({
			maxAttempts: 3,
			baseBackoffMs: 1000,
			random: () => 0,
		});
		const high = new RetryPolicy({
			maxAttempts: 3,
			baseBackoffMs: 1000,
			random: () => 1,
		});
		const none = new RetryPolicy({ maxAttempts: 3, baseBackoffMs: 0 });

		expect(low.computeBackoff(1)).toBe(800);
		expect(high.computeBackoff(3)).toBe(4800);
		expect(none.computeBackoff(5)).toBe(0);
	});
});
