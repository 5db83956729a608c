import { describe, expect, it } from "vitest";
import {
	isPostprocessingLine,
	parseClock,
	parseQuantity,
	parseYtDlpProgressLine,
	YT_DLP_PROGRESS_PREFIX,
} from "./progress-parser.js";

describe("parseYtDlpProgressLine", () => {
	it("reads the structured progress template", () => {
		expect(
			parseYtDlpProgressLine(
				`${YT_DLP_PROGRESS_PREFIX} downloading|1048576|4194304|NA|524288|6|  25.0%`,
			),
		).toEqual({
			phase: "downloading",
			percent: 25,
			downloadedBytes: 1048576,
			totalBytes: 4194304,
			speedBps: 524288,
			etaSec: 6,
		});
	});

	it("derives percent from bytes and falls back to the size estimate", () => {
		const progress = parseYtDlpProgressLine(
			`${YT_DLP_PROGRESS_PREFIX} downloading|250|NA|1000|NA|NA|NA`,
		);
		expect(progress?.percent).toBe(25);
		expect(progress?.totalBytes).toBe(1000);
		expect(progress?.speedBps).toBeUndefined();
	});

	it("reports a finished transfer as complete", () => {
		expect(
			parseYtDlpProgressLine(
				`${YT_DLP_PROGRESS_PREFIX} finished|NA|NA|NA|NA|NA|NA`,
			)?.percent,
		).toBe(100);
	});

	it("ignores structured lines with missing fields", () => {
		expect(
			parseYtDlpProgressLine(`${YT_DLP_PROGRESS_PREFIX} downloading|1|2`),
		).toBeUndefined();
	});

	it("falls back to the classic download line", () => {
		const progress = parseYtDlpProgressLine(
			"[download]  42.0% of ~  10.00MiB at    1.50MiB/s ETA 01:05",
		);
		expect(progress?.percent).toBe(42);
		expect(progress?.totalBytes).toBe(10485760);
		expect(progress?.speedBps).toBe(1572864);
		expect(progress?.etaSec).toBe(65);
		expect(progress?.downloadedBytes).toBeCloseTo(4404019.2);
	});

	it("returns undefined for unrelated output", () => {
		expect(
			parseYtDlpProgressLine("[youtube] abc: Downloading webpage"),
		).toBeUndefined();
		expect(
			parseYtDlpProgressLine("[download] Destination: /tmp/clip.mp4"),
		).toBeUndefined();
	});
});

describe("unit helpers", () => {
	it("parses decimal and binary quantities", () => {
		expect(parseQuantity("1.5 KB")).toBe(1500);
		expect(parseQuantity("2KiB")).toBe(2048);
		expect(parseQuantity("12 MB")).toBe(12_000_000);
		expect(parseQuantity("fast")).toBeUndefined();
	});

	it("parses clock values", () => {
		expect(parseClock("00:09")).toBe(9);
		expect(parseClock("1:02:03")).toBe(3723);
		expect(parseClock("soon")).toBeUndefined();
	});

	it("recognizes postprocessor output", () => {
		expect(isPostprocessingLine('[Merger] Merging formats into "a.mp4"')).toBe(
			true,
		);
		expect(isPostprocessingLine("[ExtractAudio] Destination: a.mp3")).toBe(
			true,
		);
		expect(isPostprocessingLine("[FFmpegMetadata] Adding metadata")).toBe(true);
		expect(isPostprocessingLine("[download] 100% of 1.00MiB")).toBe(false);
	});
});
