import { describe, expect, it } from "vitest";
import { InvalidInputError } from "../core/errors.js";
import type { JobSnapshot } from "../core/types.js";
import {
	collectUrls,
	formatFinished,
	formatPlainEvent,
	parseFormat,
	toJsonLine,
} from "./headless.js";
import { parseHttpUrl, parseUrlList } from "./url-detect.js";

function snapshot(overrides: Partial<JobSnapshot> = {}): JobSnapshot {
	return {
		id: "job-1",
		batchId: "batch-1",
		request: {
			url: "https://example.com/watch?v=one",
			format: "video",
			quality: "best",
			outputDir: "/downloads",
			playlist: false,
			restrictFilenames: false,
			checkCertificates: true,
			useAccelerator: false,
		},
		status: "completed",
		attempts: 1,
		quality: "best",
		progress: {},
		enqueuedAt: 0,
		...overrides,
	};
}

describe("input parsing", () => {
	it("accepts format aliases", () => {
		expect(parseFormat("MP3")).toBe("audio");
		expect(parseFormat("video")).toBe("video");
		expect(() => parseFormat("gif")).toThrow(InvalidInputError);
	});

	it("merges positional and batch URLs without duplicates", () => {
		const batch = [
			"# favourites",
			"https://example.com/b",
			"",
			"  https://example.com/a  ",
		].join("\n");

		expect(collectUrls(["https://example.com/a", " "], batch)).toEqual([
			"https://example.com/a",
			"https://example.com/b",
		]);
	});

	it("splits batch files on any line ending", () => {
		expect(parseUrlList("a\r\nb\n#c\n")).toEqual(["a", "b"]);
	});

	it("accepts only http and https URLs", () => {
		expect(parseHttpUrl(" https://example.com/x ").hostname).toBe("example.com");
		expect(() => parseHttpUrl("ftp://example.com/x")).toThrow(
			"Unsupported URL scheme: ftp:",
		);
		expect(() => parseHttpUrl("not a url")).toThrow(InvalidInputError);
	});
});

describe("event formatting", () => {
	it("prints progress and retries", () => {
		expect(
			formatPlainEvent({
				type: "jobProgress",
				jobId: "job-1",
				batchId: "batch-1",
				progress: { percent: 42.25 },
			}),
		).toBe("[progress] job-1 downloading 42.3%");
		expect(
			formatPlainEvent({
				type: "jobRetry",
				jobId: "job-1",
				batchId: "batch-1",
				attempt: 1,
				reason: "format-unavailable",
				message: "missing",
				nextDelayMs: 500,
				quality: "720p",
			}),
		).toBe(
			"[retry] job-1 attempt=1 reason=format-unavailable next=720p in 500ms",
		);
	});

	it("hides chatter unless verbose", () => {
		const event = {
			type: "jobLog",
			jobId: "job-1",
			batchId: "batch-1",
			stream: "stderr",
			message: "WARNING: slow",
		} as const;

		expect(formatPlainEvent(event)).toBeUndefined();
		expect(formatPlainEvent(event, true)).toBe("[stderr] job-1 WARNING: slow");
	});

	it("summarizes finished jobs", () => {
		expect(formatFinished(snapshot({ outputPath: "/downloads/one.mp4" }))).toBe(
			"[completed] job-1 attempts=1 file=/downloads/one.mp4",
		);
		expect(
			formatFinished(
				snapshot({
					status: "failed",
					attempts: 3,
					error: "retry-ceiling-exceeded",
					message: "stalled: no output",
				}),
			),
		).toBe(
			"[failed] job-1 attempts=3 error=retry-ceiling-exceeded stalled: no output",
		);
		expect(formatFinished(snapshot({ status: "skipped", attempts: 0 }))).toBe(
			"[skipped] job-1 attempts=0",
		);
	});

	it("serializes events as one JSON object", () => {
		expect(
			JSON.parse(
				toJsonLine({
					type: "jobStatus",
					jobId: "job-1",
					batchId: "batch-1",
					status: "paused",
				}),
			),
		).toEqual({
			event: "jobStatus",
			jobId: "job-1",
			batchId: "batch-1",
			status: "paused",
		});
	});
});
