import { describe, expect, it } from "vitest";
import {
	classifyFailure,
	DependencyError,
	InvalidInputError,
	isRecoverableKind,
	toExitCode,
} from "./errors.js";

describe("classifyFailure", () => {
	it.each([
		["ERROR: [generic] 'abc' is not a valid URL", "invalid-input"],
		["ERROR: Unsupported URL: https://example.com/x", "invalid-input"],
		["ERROR: Requested format is not available", "format-unavailable"],
		["ERROR: ffmpeg not found. Please install", "merge-codec-missing"],
		["ERROR: HTTP Error 403: Forbidden", "access-denied"],
		["ERROR: Private video. Sign in if you've been granted access", "access-denied"],
		["OSError: [Errno 28] No space left on device", "disk-write"],
		["ERROR: unable to open for writing: Permission denied", "disk-write"],
		["ERROR: Connection reset by peer", "transient-network"],
		["ERROR: HTTP Error 503: Service Unavailable", "transient-network"],
	] as const)("maps %j to %s", (text, kind) => {
		expect(classifyFailure(text)).toBe(kind);
	});

	it("treats unrecognized failures as transient", () => {
		expect(classifyFailure("something odd happened")).toBe("transient-network");
		expect(classifyFailure("")).toBe("transient-network");
	});

	it("prefers the earlier rule when several match", () => {
		expect(
			classifyFailure("Requested format is not available; connection reset"),
		).toBe("format-unavailable");
	});
});

describe("error helpers", () => {
	it("splits kinds into recoverable and fatal", () => {
		expect(isRecoverableKind("stalled")).toBe(true);
		expect(isRecoverableKind("merge-codec-missing")).toBe(true);
		expect(isRecoverableKind("disk-write")).toBe(false);
		expect(isRecoverableKind("retry-ceiling-exceeded")).toBe(false);
	});

	it("maps errors to exit codes", () => {
		expect(toExitCode(new InvalidInputError("bad"))).toBe(2);
		expect(toExitCode(new DependencyError("missing"))).toBe(3);
		expect(toExitCode(new Error("boom"))).toBe(1);
	});
});
