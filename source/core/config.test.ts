import { describe, expect, it } from "vitest";
import { DEFAULT_ENGINE_CONFIG, normalizeEngineConfig } from "./config.js";

describe("normalizeEngineConfig", () => {
	it("fills defaults", () => {
		expect(normalizeEngineConfig()).toEqual(DEFAULT_ENGINE_CONFIG);
	});

	it("runs sequential mode on a single worker", () => {
		expect(
			normalizeEngineConfig({ mode: "sequential", concurrency: 8 }).concurrency,
		).toBe(1);
	});

	it("clamps out-of-range numbers", () => {
		const config = normalizeEngineConfig({
			concurrency: 0,
			maxAttempts: -2,
			baseBackoffMs: Number.NaN,
			subscriberLogBuffer: 2.7,
		});

		expect(config.concurrency).toBe(1);
		expect(config.maxAttempts).toBe(1);
		expect(config.baseBackoffMs).toBe(0);
		expect(config.subscriberLogBuffer).toBe(2);
	});

	it("merges request defaults field by field", () => {
		const config = normalizeEngineConfig({
			requestDefaults: {
				...DEFAULT_ENGINE_CONFIG.requestDefaults,
				format: "audio",
			},
		});

		expect(config.requestDefaults.format).toBe("audio");
		expect(config.requestDefaults.checkCertificates).toBe(true);
	});
});
