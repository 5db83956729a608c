import { describe, expect, it } from "vitest";
import { canTransition, isTerminal, JOB_STATUSES } from "./state-machine.js";

describe("job state machine", () => {
	it("lets a queued job start or end without running", () => {
		expect(canTransition("queued", "running")).toBe(true);
		expect(canTransition("queued", "cancelled")).toBe(true);
		expect(canTransition("queued", "skipped")).toBe(true);
		expect(canTransition("queued", "completed")).toBe(false);
		expect(canTransition("queued", "paused")).toBe(false);
	});

	it("routes failures through retrying", () => {
		expect(canTransition("running", "retrying")).toBe(true);
		expect(canTransition("retrying", "queued")).toBe(true);
		expect(canTransition("retrying", "failed")).toBe(true);
		expect(canTransition("retrying", "running")).toBe(false);
	});

	it("allows paused jobs to continue or restart", () => {
		expect(canTransition("running", "paused")).toBe(true);
		expect(canTransition("paused", "running")).toBe(true);
		expect(canTransition("paused", "queued")).toBe(true);
		expect(canTransition("paused", "completed")).toBe(false);
	});

	it("never leaves a terminal status", () => {
		const terminal = JOB_STATUSES.filter(isTerminal);
		expect(terminal).toEqual(["completed", "failed", "cancelled", "skipped"]);

		for (const from of terminal) {
			for (const to of JOB_STATUSES) {
				expect(canTransition(from, to)).toBe(false);
			}
		}
	});
});
