import type { JobStatus, TerminalStatus } from "./types.js";

const TRANSITIONS: Record<JobStatus, readonly JobStatus[]> = {
	queued: ["running", "cancelled", "skipped"],
	running: ["completed", "failed", "cancelled", "skipped", "paused", "retrying"],
	paused: ["running", "queued", "cancelled", "skipped"],
	retrying: ["queued", "cancelled", "skipped", "failed"],
	completed: [],
	failed: [],
	cancelled: [],
	skipped: [],
};

const TERMINAL: ReadonlySet<JobStatus> = new Set<JobStatus>([
	"completed",
	"failed",
	"cancelled",
	"skipped",
]);

export function canTransition(from: JobStatus, to: JobStatus): boolean {
	return TRANSITIONS[from].includes(to);
}

export function isTerminal(status: JobStatus): status is TerminalStatus {
	return TERMINAL.has(status);
}

export const JOB_STATUSES: readonly JobStatus[] = [
	"queued",
	"running",
	"paused",
	"retrying",
	"completed",
	"failed",
	"cancelled",
	"skipped",
];
