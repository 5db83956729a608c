import { describe, expect, it } from "vitest";
import { type ControlCommand, JobControl } from "./job-control.js";

describe("JobControl", () => {
	it("keeps the first stop reason", () => {
		const control = new JobControl();

		expect(control.stop("cancel")).toBe(true);
		expect(control.stop("skip")).toBe(false);
		expect(control.stopReason).toBe("cancel");
		expect(control.signal.aborted).toBe(true);
	});

	it("broadcasts pause and resume once each", () => {
		const control = new JobControl();
		const commands: ControlCommand[] = [];
		const off = control.onCommand((command) => commands.push(command));

		control.pause();
		control.pause();
		control.resume();
		control.resume();
		off();
		control.pause();

		expect(commands).toEqual(["pause", "resume"]);
		expect(control.paused).toBe(true);
	});

	it("ignores pause after a stop", () => {
		const control = new JobControl();
		control.stop("skip");
		control.pause();

		expect(control.paused).toBe(false);
	});
});
