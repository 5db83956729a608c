import type { ErrorKind } from "./errors.js";
import type { JobControl } from "./job-control.js";
import { canTransition, isTerminal } from "./state-machine.js";
import type {
	DownloadProgress,
	DownloadRequest,
	JobSnapshot,
	JobStatus,
} from "./types.js";

export type JobRecord = {
	readonly id: string;
	readonly batchId: string;
	readonly request: DownloadRequest;
	readonly outputKey: string;
	status: JobStatus;
	attempts: number;
	quality: string;
	progress: DownloadProgress;
	outputPath?: string;
	error?: ErrorKind;
	message?: string;
	enqueuedAt: number;
	startedAt?: number;
	finishedAt?: number;
	/** Present while a worker holds the job. */
	control?: JobControl;
	/** Accepted cancel/skip that the holding worker has not observed yet. */
	stopRequest?: "cancel" | "skip";
	/** Paused by stopping the process; the next run continues the same attempt. */
	restartOnResume: boolean;
	/** The next run continues the paused attempt instead of starting one. */
	continueAttempt: boolean;
	retryTimer?: NodeJS.Timeout;
	artifacts: Set<string>;
};

export type NewJob = Pick<
	JobRecord,
	"id" | "batchId" | "request" | "outputKey" | "enqueuedAt"
>;

/** The job status table; every status change goes through `transition`. */
export class JobTable {
	readonly #records = new Map<string, JobRecord>();
	readonly #now: () => number;

	constructor(now: () => number = Date.now) {
		this.#now = now;
	}

	add(job: NewJob): JobRecord {
		const record: JobRecord = {
			...job,
			status: "queued",
			attempts: 0,
			quality: job.request.quality,
			progress: {},
			restartOnResume: false,
			continueAttempt: false,
			artifacts: new Set(),
		};
		this.#records.set(record.id, record);
		return record;
	}

	get(id: string): JobRecord | undefined {
		return this.#records.get(id);
	}

	has(id: string): boolean {
		return this.#records.has(id);
	}

	delete(id: string): boolean {
		return this.#records.delete(id);
	}

	values(): JobRecord[] {
		return [...this.#records.values()];
	}

	live(): JobRecord[] {
		return this.values().filter((record) => !isTerminal(record.status));
	}

	transition(record: JobRecord, to: JobStatus): boolean {
		if (!canTransition(record.status, to)) {
			return false;
		}

		record.status = to;
		if (to === "running" && record.startedAt === undefined) {
			record.startedAt = this.#now();
		}
		if (isTerminal(to)) {
			record.finishedAt = this.#now();
		}
		return true;
	}

	snapshot(id: string): JobSnapshot | undefined {
		const record = this.#records.get(id);
		return record ? toSnapshot(record) : undefined;
	}
}

export function toSnapshot(record: JobRecord): JobSnapshot {
	return {
		id: record.id,
		batchId: record.batchId,
		request: { ...record.request },
		status: record.status,
		attempts: record.attempts,
		quality: record.quality,
		progress: { ...record.progress },
		outputPath: record.outputPath,
		error: record.error,
		message: record.message,
		enqueuedAt: record.enqueuedAt,
		startedAt: record.startedAt,
		finishedAt: record.finishedAt,
	};
}
