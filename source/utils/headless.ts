import { InvalidInputError } from "../core/errors.js";
import type { EngineEvent, JobSnapshot, MediaFormat } from "../core/types.js";
import { parseUrlList } from "./url-detect.js";

export function parseFormat(value: string): MediaFormat {
	const normalized = value.toLowerCase().trim();
	if (normalized === "audio" || normalized === "mp3") {
		return "audio";
	}
	if (normalized === "video" || normalized === "mp4") {
		return "video";
	}

	throw new InvalidInputError(
		`Unknown format: ${value}. Use audio or video.`,
	);
}

/** Positional URLs first, then the batch file's, without duplicates. */
export function collectUrls(inputs: string[], batchText?: string): string[] {
	const urls = [
		...inputs.map((input) => input.trim()).filter(Boolean),
		...(batchText ? parseUrlList(batchText) : []),
	];
	return [...new Set(urls)];
}

export function formatPlainEvent(
	event: EngineEvent,
	verbose = false,
): string | undefined {
	switch (event.type) {
		case "jobQueued":
			return verbose ? `[queued] ${event.jobId}` : undefined;
		case "jobStarted":
			return `[started] ${event.jobId} attempt=${event.attempt} quality=${event.quality}`;
		case "jobProgress": {
			const { percent, phase } = event.progress;
			const pct = percent !== undefined ? `${percent.toFixed(1)}%` : "n/a";
			return `[progress] ${event.jobId} ${phase ?? "downloading"} ${pct}`;
		}
		case "jobStatus":
			return `[status] ${event.jobId} ${event.status}`;
		case "jobRetry":
			return `[retry] ${event.jobId} attempt=${event.attempt} reason=${event.reason} next=${event.quality} in ${event.nextDelayMs}ms`;
		case "jobLog":
			return verbose ? `[${event.stream}] ${event.jobId} ${event.message}` : undefined;
		case "jobFinished":
			return formatFinished(event.snapshot);
	}
}

export function formatFinished(snapshot: JobSnapshot): string {
	const base = `[${snapshot.status}] ${snapshot.id} attempts=${snapshot.attempts}`;
	if (snapshot.status === "completed") {
		return `${base} file=${snapshot.outputPath ?? "unknown"}`;
	}
	if (snapshot.status === "failed") {
		return `${base} error=${snapshot.error ?? "unknown"} ${snapshot.message ?? ""}`.trimEnd();
	}
	return base;
}

export function toJsonLine(event: EngineEvent): string {
	const { type, ...payload } = event;
	return JSON.stringify({ event: type, ...payload });
}
