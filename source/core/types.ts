import type { ErrorKind } from "./errors.js";

export type MediaFormat = "audio" | "video";

export type JobStatus =
	| "queued"
	| "running"
	| "paused"
	| "retrying"
	| "completed"
	| "failed"
	| "cancelled"
	| "skipped";

export type TerminalStatus = Extract<
	JobStatus,
	"completed" | "failed" | "cancelled" | "skipped"
>;

export type DownloadRequest = {
	url: string;
	format: MediaFormat;
	quality: string;
	outputDir: string;
	filenameTemplate?: string;
	playlist: boolean;
	restrictFilenames: boolean;
	checkCertificates: boolean;
	cookieFile?: string;
	postprocessorArgs?: string;
	useAccelerator: boolean;
};

export type JobSpec = Partial<DownloadRequest> & {
	url: string;
	id?: string;
};

export type DownloadProgress = {
	percent?: number;
	downloadedBytes?: number;
	totalBytes?: number;
	speedBps?: number;
	etaSec?: number;
	phase?: "downloading" | "postprocessing";
};

export type JobSnapshot = {
	id: string;
	batchId: string;
	request: DownloadRequest;
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
};

export type BatchSummary = {
	batchId: string;
	total: number;
	counts: Record<JobStatus, number>;
	done: boolean;
	jobs: JobSnapshot[];
};

export type SubmitResult = {
	batchId: string;
	jobIds: string[];
};

export type ControlFailure = "not-found" | "invalid-transition";

export type ControlResult =
	| { ok: true; status: JobStatus }
	| { ok: false; reason: ControlFailure; status?: JobStatus };

/** The request of one attempt: the job's request with the effective quality. */
export type AttemptRequest = {
	jobId: string;
	attempt: number;
	request: DownloadRequest;
};

export type PreparedAttempt = {
	attempt: AttemptRequest;
	command: string;
	args: string[];
};

export type StopReason = "cancel" | "skip" | "pause";

export type FetchOutcome =
	| { kind: "success"; outputPath?: string; artifacts: string[] }
	| {
			kind: "recoverable";
			error: ErrorKind;
			message: string;
			artifacts: string[];
	  }
	| { kind: "fatal"; error: ErrorKind; message: string; artifacts: string[] }
	| { kind: "aborted"; reason: StopReason; artifacts: string[] };

export type LogStream = "stdout" | "stderr" | "system";

export type FinalizeRecord = {
	id: string;
	batchId: string;
	request: DownloadRequest;
	status: TerminalStatus;
	outputPath?: string;
	error?: ErrorKind;
	message?: string;
	attempts: number;
	enqueuedAt: number;
	startedAt?: number;
	finishedAt: number;
};

export type EngineEvents = {
	jobQueued: { jobId: string; batchId: string; attempt: number };
	jobStarted: {
		jobId: string;
		batchId: string;
		attempt: number;
		quality: string;
	};
	jobProgress: { jobId: string; batchId: string; progress: DownloadProgress };
	jobStatus: { jobId: string; batchId: string; status: JobStatus };
	jobRetry: {
		jobId: string;
		batchId: string;
		attempt: number;
		reason: ErrorKind;
		message: string;
		nextDelayMs: number;
		quality: string;
	};
	jobLog: {
		jobId: string;
		batchId: string;
		stream: LogStream;
		message: string;
	};
	jobFinished: { jobId: string; batchId: string; snapshot: JobSnapshot };
};

export type EngineEvent = {
	[K in keyof EngineEvents]: { type: K } & EngineEvents[K];
}[keyof EngineEvents];
