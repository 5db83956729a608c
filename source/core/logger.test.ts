import chalk from "chalk";
import { afterAll, beforeAll, describe, expect, it } from "vitest";
import { createConsoleLogger } from "./logger.js";

describe("createConsoleLogger", () => {
	const level = chalk.level;

	beforeAll(() => {
		chalk.level = 0;
	});

	afterAll(() => {
		chalk.level = level;
	});

	it("writes level tags and context", () => {
		const lines: string[] = [];
		const logger = createConsoleLogger({ write: (line) => lines.push(line) });

		logger.info("batch submitted", { batchId: "batch-1", jobs: 2 });
		logger.warn("slow network", { reason: "two words", skipped: undefined });
		logger.error("boom", { error: new Error("bad thing") });

		expect(lines).toEqual([
			"info: batch submitted batchId=batch-1 jobs=2",
			'warning: slow network reason="two words"',
			'error: boom error="bad thing"',
		]);
	});

	it("prints debug lines only when verbose", () => {
		const quiet: string[] = [];
		const loud: string[] = [];
		createConsoleLogger({ write: (line) => quiet.push(line) }).debug("hidden");
		createConsoleLogger({
			verbose: true,
			write: (line) => loud.push(line),
		}).debug("shown");

		expect(quiet).toEqual([]);
		expect(loud).toEqual(["debug: shown"]);
	});
});
