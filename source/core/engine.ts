import { randomUUID } from "node:crypto";
import { EventEmitter } from "node:events";
import path from "node:path";
import { outputKey, removeArtifacts } from "../utils/fs.js";
import { type EngineConfig, normalizeEngineConfig } from "./config.js";
import {
	EngineClosedError,
	type ErrorKind,
	errorMessage,
	InvalidInputError,
	isRecoverableKind,
} from "./errors.js";
import { type FetchAdapter, formatCommand } from "./fetch-adapter.js";
import type { HistoryRecorder } from "./history.js";
import { JobControl } from "./job-control.js";
import { JobQueue } from "./job-queue.js";
import { type JobRecord, JobTable, toSnapshot } from "./job-table.js";
import { type Logger, silentLogger } from "./logger.js";
import { ProgressReporter } from "./progress-reporter.js";
import type { ReachabilityProbe } from "./reachability.js";
import { RetryPolicy } from "./retry-policy.js";
import { isTerminal } from "./state-machine.js";
import type {
	BatchSummary,
	ControlResult,
	DownloadRequest,
	EngineEvent,
	EngineEvents,
	FetchOutcome,
	JobSnapshot,
	JobSpec,
	JobStatus,
	SubmitResult,
	TerminalStatus,
} from "./types.js";

/** The contract both engine modes satisfy. */
export type DownloadEngine = {
	readonly pausedAll: boolean;
	submit(specs: JobSpec[], batchId?: string): SubmitResult;
	pause(jobId: string): ControlResult;
	resume(jobId: string): ControlResult;
	cancel(jobId: string): ControlResult;
	skip(jobId: string): ControlResult;
	pauseAll(): ControlResult[];
	resumeAll(): ControlResult[];
	cancelAll(): ControlResult[];
	getStatus(jobId: string): JobSnapshot | undefined;
	getBatch(batchId: string): BatchSummary | undefined;
	subscribe(batchId?: string): AsyncIterableIterator<EngineEvent>;
	waitForBatch(batchId: string): Promise<JobSnapshot[]>;
	acknowledge(jobId: string): boolean;
	acknowledgeBatch(batchId: string): number;
	shutdown(options?: { cancel?: boolean }): Promise<void>;
	on<K extends keyof EngineEvents>(
		event: K,
		listener: (payload: EngineEvents[K]) => void,
	): unknown;
	off<K extends keyof EngineEvents>(
		event: K,
		listener: (payload: EngineEvents[K]) => void,
	): unknown;
};

export type EngineOptions = Partial<EngineConfig> & {
	adapter: FetchAdapter;
	history?: HistoryRecorder;
	reachability?: ReachabilityProbe;
	logger?: Logger;
	policy?: RetryPolicy;
	removeArtifacts?: (paths: string[]) => Promise<unknown>;
	createId?: () => string;
	now?: () => number;
};

export class DownloadOrchestrator
	extends EventEmitter
	implements DownloadEngine
{
	readonly config: EngineConfig;
	readonly #adapter: FetchAdapter;
	readonly #history?: HistoryRecorder;
	readonly #reachability?: ReachabilityProbe;
	readonly #logger: Logger;
	readonly #policy: RetryPolicy;
	readonly #removeArtifacts: (paths: string[]) => Promise<unknown>;
	readonly #createId: () => string;
	readonly #now: () => number;
	readonly #table: JobTable;
	readonly #queue: JobQueue;
	readonly #reporter: ProgressReporter;
	readonly #batches = new Map<string, Set<string>>();
	readonly #batchWaiters = new Map<string, Array<() => void>>();
	readonly #busyKeys = new Map<string, string>();
	readonly #pendingWrites = new Set<Promise<void>>();
	#idleWaiters: Array<() => void> = [];
	#workers: Promise<void>[] = [];
	#batchCounter = 0;
	#closed = false;
	#shutdown: Promise<void> | undefined;

	constructor(options: EngineOptions) {
		super();
		const {
			adapter,
			history,
			reachability,
			logger,
			policy,
			removeArtifacts: remover,
			createId,
			now,
			...config
		} = options;
		this.config = normalizeEngineConfig(config);
		this.#adapter = adapter;
		this.#history = history;
		this.#reachability = reachability;
		this.#logger = logger ?? silentLogger;
		this.#policy =
			policy ??
			new RetryPolicy({
				maxAttempts: this.config.maxAttempts,
				baseBackoffMs: this.config.baseBackoffMs,
				qualityLadder: this.config.qualityLadder,
			});
		this.#removeArtifacts = remover ?? removeArtifacts;
		this.#createId = createId ?? (() => `job-${randomUUID()}`);
		this.#now = now ?? Date.now;
		this.#table = new JobTable(this.#now);
		this.#queue = new JobQueue({
			isEligible: (id) => this.#isDispatchable(id),
			onTake: (id) => this.#claimOutput(id),
		});
		this.#reporter = new ProgressReporter({
			maxBufferedLogs: this.config.subscriberLogBuffer,
		});
		this.#forwardToReporter();
	}

	override on<K extends keyof EngineEvents>(
		event: K,
		listener: (payload: EngineEvents[K]) => void,
	): this {
		return super.on(event, listener);
	}

	override off<K extends keyof EngineEvents>(
		event: K,
		listener: (payload: EngineEvents[K]) => void,
	): this {
		return super.off(event, listener);
	}

	override emit<K extends keyof EngineEvents>(
		event: K,
		payload: EngineEvents[K],
	): boolean {
		return super.emit(event, payload);
	}

	get pausedAll(): boolean {
		return this.#queue.held;
	}

	submit(specs: JobSpec[], batchId?: string): SubmitResult {
		if (this.#closed) {
			throw new EngineClosedError();
		}

		const resolvedBatchId = batchId ?? this.#nextBatchId();
		const seen = new Set<string>();
		const jobs = specs.map((spec) => {
			const id = spec.id ?? this.#createId();
			if (seen.has(id) || this.#table.has(id)) {
				throw new InvalidInputError(`Duplicate job id: ${id}`);
			}
			seen.add(id);
			const request = this.#resolveRequest(spec);
			return { id, request };
		});

		const members = this.#batches.get(resolvedBatchId) ?? new Set<string>();
		this.#batches.set(resolvedBatchId, members);
		this.#ensureWorkers();

		for (const { id, request } of jobs) {
			this.#table.add({
				id,
				batchId: resolvedBatchId,
				request,
				outputKey: outputKey(request),
				enqueuedAt: this.#now(),
			});
			members.add(id);
			this.#queue.enqueue(id);
			this.emit("jobQueued", { jobId: id, batchId: resolvedBatchId, attempt: 0 });
		}

		this.#logger.debug("batch submitted", {
			batchId: resolvedBatchId,
			jobs: jobs.length,
		});
		return { batchId: resolvedBatchId, jobIds: jobs.map((job) => job.id) };
	}

	pause(jobId: string): ControlResult {
		const record = this.#table.get(jobId);
		if (!record) {
			return { ok: false, reason: "not-found" };
		}

		const control = record.control;
		if (record.status !== "running" || !control || record.stopRequest) {
			return invalid(record);
		}

		this.#table.transition(record, "paused");
		if (this.#adapter.canSuspend) {
			control.pause();
		} else {
			record.restartOnResume = true;
			control.stop("pause");
		}
		this.#emitStatus(record);
		return { ok: true, status: record.status };
	}

	resume(jobId: string): ControlResult {
		const record = this.#table.get(jobId);
		if (!record) {
			return { ok: false, reason: "not-found" };
		}

		if (record.status !== "paused" || record.stopRequest) {
			return invalid(record);
		}

		if (record.restartOnResume) {
			record.restartOnResume = false;
			record.continueAttempt = true;
			this.#table.transition(record, "queued");
			this.#queue.enqueue(record.id);
			this.emit("jobQueued", {
				jobId: record.id,
				batchId: record.batchId,
				attempt: record.attempts,
			});
		} else {
			this.#table.transition(record, "running");
			record.control?.resume();
		}
		this.#emitStatus(record);
		return { ok: true, status: record.status };
	}

	cancel(jobId: string): ControlResult {
		return this.#stop(jobId, "cancel");
	}

	skip(jobId: string): ControlResult {
		return this.#stop(jobId, "skip");
	}

	pauseAll(): ControlResult[] {
		this.#queue.hold();
		return this.#table
			.values()
			.filter((record) => record.status === "running")
			.map((record) => this.pause(record.id));
	}

	resumeAll(): ControlResult[] {
		const results = this.#table
			.values()
			.filter((record) => record.status === "paused")
			.map((record) => this.resume(record.id));
		this.#queue.release();
		return results;
	}

	cancelAll(): ControlResult[] {
		return this.#table.live().map((record) => this.cancel(record.id));
	}

	getStatus(jobId: string): JobSnapshot | undefined {
		return this.#table.snapshot(jobId);
	}

	getBatch(batchId: string): BatchSummary | undefined {
		const members = this.#batches.get(batchId);
		if (!members) {
			return undefined;
		}

		const jobs = [...members]
			.map((id) => this.#table.snapshot(id))
			.filter((snapshot): snapshot is JobSnapshot => snapshot !== undefined);
		const counts: Record<JobStatus, number> = {
			queued: 0,
			running: 0,
			paused: 0,
			retrying: 0,
			completed: 0,
			failed: 0,
			cancelled: 0,
			skipped: 0,
		};
		for (const job of jobs) {
			counts[job.status] += 1;
		}

		return {
			batchId,
			total: jobs.length,
			counts,
			done: jobs.every((job) => isTerminal(job.status)),
			jobs,
		};
	}

	subscribe(batchId?: string): AsyncIterableIterator<EngineEvent> {
		return this.#reporter.subscribe(batchId);
	}

	waitForBatch(batchId: string): Promise<JobSnapshot[]> {
		const summary = this.getBatch(batchId);
		if (!summary || summary.done) {
			return Promise.resolve(summary?.jobs ?? []);
		}

		return new Promise((resolve) => {
			const waiters = this.#batchWaiters.get(batchId) ?? [];
			waiters.push(() => resolve(this.getBatch(batchId)?.jobs ?? []));
			this.#batchWaiters.set(batchId, waiters);
		});
	}

	acknowledge(jobId: string): boolean {
		const record = this.#table.get(jobId);
		if (!record || !isTerminal(record.status)) {
			return false;
		}

		this.#table.delete(jobId);
		const members = this.#batches.get(record.batchId);
		members?.delete(jobId);
		if (members?.size === 0) {
			this.#batches.delete(record.batchId);
		}
		return true;
	}

	acknowledgeBatch(batchId: string): number {
		const members = this.#batches.get(batchId);
		if (!members) {
			return 0;
		}

		return [...members].filter((id) => this.acknowledge(id)).length;
	}

	shutdown(options: { cancel?: boolean } = {}): Promise<void> {
		this.#shutdown ??= this.#drain(options.cancel ?? false);
		return this.#shutdown;
	}

	async #drain(cancel: boolean): Promise<void> {
		this.#closed = true;
		if (cancel) {
			this.#queue.release();
			this.cancelAll();
		} else {
			this.resumeAll();
		}

		await this.#whenIdle();
		this.#queue.close();
		await Promise.all(this.#workers);
		await Promise.all([...this.#pendingWrites]);
		this.#reporter.close();
		this.#logger.debug("engine shut down");
	}

	#ensureWorkers(): void {
		if (this.#workers.length > 0) {
			return;
		}

		this.#workers = Array.from({ length: this.config.concurrency }, (_, slot) =>
			this.#work(slot),
		);
	}

	async #work(slot: number): Promise<void> {
		for (;;) {
			await this.#awaitReachable();
			const jobId = await this.#queue.dequeue();
			if (jobId === undefined) {
				return;
			}

			try {
				await this.#runAttempt(jobId);
			} catch (error) {
				this.#logger.error("worker crashed while running job", {
					slot,
					jobId,
					error: errorMessage(error),
				});
				this.#failUnexpectedly(jobId, error);
			}
		}
	}

	async #awaitReachable(): Promise<void> {
		const probe = this.#reachability;
		if (!probe) {
			return;
		}

		let warned = false;
		while (!this.#queue.closed) {
			let reachable: boolean;
			try {
				reachable = await probe.isReachable();
			} catch (error) {
				this.#logger.warn("reachability probe failed", {
					error: errorMessage(error),
				});
				reachable = false;
			}
			if (reachable) {
				return;
			}

			if (!warned) {
				this.#logger.warn("network unreachable, holding dispatch");
				warned = true;
			}
			await delay(this.config.reachabilityPollMs);
		}
	}

	async #runAttempt(jobId: string): Promise<void> {
		const record = this.#table.get(jobId);
		if (!record || record.status !== "queued") {
			if (record) {
				this.#releaseOutput(record);
			}
			return;
		}

		const stopped = this.#stopStatus(record);
		if (stopped) {
			this.#releaseOutput(record);
			this.#finishAfterCleanup(record, stopped);
			return;
		}

		if (record.continueAttempt) {
			record.continueAttempt = false;
		} else {
			record.attempts += 1;
		}

		const control = new JobControl();
		record.control = control;
		record.progress = {};
		this.#table.transition(record, "running");
		this.emit("jobStarted", {
			jobId: record.id,
			batchId: record.batchId,
			attempt: record.attempts,
			quality: record.quality,
		});

		let outcome: FetchOutcome;
		try {
			outcome = await this.#fetch(record, control);
		} finally {
			record.control = undefined;
			this.#releaseOutput(record);
		}

		for (const artifact of outcome.artifacts) {
			record.artifacts.add(artifact);
		}
		await this.#settle(record, control, outcome);
	}

	async #fetch(record: JobRecord, control: JobControl): Promise<FetchOutcome> {
		try {
			const prepared = await this.#adapter.prepare({
				jobId: record.id,
				attempt: record.attempts,
				request: { ...record.request, quality: record.quality },
			});
			if (control.stopReason) {
				return { kind: "aborted", reason: control.stopReason, artifacts: [] };
			}

			this.emit("jobLog", {
				jobId: record.id,
				batchId: record.batchId,
				stream: "system",
				message: `exec ${formatCommand(prepared.command, prepared.args)}`,
			});
			return await this.#adapter.download(
				prepared,
				control,
				(progress) => {
					if (record.status !== "running" && record.status !== "paused") {
						return;
					}
					record.progress = progress;
					this.emit("jobProgress", {
						jobId: record.id,
						batchId: record.batchId,
						progress,
					});
				},
				(entry) => {
					this.emit("jobLog", {
						jobId: record.id,
						batchId: record.batchId,
						...entry,
					});
				},
			);
		} catch (error) {
			return toFailureOutcome(error);
		}
	}

	async #settle(
		record: JobRecord,
		control: JobControl,
		outcome: FetchOutcome,
	): Promise<void> {
		if (isTerminal(record.status) || record.status === "queued") {
			return;
		}

		if (record.stopRequest) {
			await this.#discardPartial(record, !this.config.keepPartial);
			this.#finish(record, this.#stopStatus(record) ?? "cancelled");
			return;
		}

		if (record.status === "paused") {
			if (control.stopReason === "pause") {
				this.#logger.debug("job stopped for pause", { jobId: record.id });
				return;
			}
			// The process ended on its own while suspended.
			this.#table.transition(record, "running");
		}

		switch (outcome.kind) {
			case "success": {
				record.outputPath = outcome.outputPath;
				record.progress = { ...record.progress, percent: 100 };
				this.#finish(record, "completed");
				return;
			}
			case "aborted": {
				await this.#discardPartial(record, !this.config.keepPartial);
				this.#finish(record, this.#stopStatus(record) ?? "cancelled");
				return;
			}
			case "fatal": {
				record.error = outcome.error;
				record.message = outcome.message;
				await this.#discardPartial(record, true);
				this.#finish(record, this.#stopStatus(record) ?? "failed");
				return;
			}
			case "recoverable": {
				await this.#retryOrFail(record, outcome.error, outcome.message);
				return;
			}
		}
	}

	async #retryOrFail(
		record: JobRecord,
		error: ErrorKind,
		message: string,
	): Promise<void> {
		const decision = this.#policy.decide({
			attempt: record.attempts,
			format: record.request.format,
			quality: record.quality,
			error,
			recoverable: isRecoverableKind(error),
		});

		if (decision.action === "fail") {
			record.error = decision.error;
			record.message =
				decision.cause && decision.cause !== decision.error
					? `${decision.cause}: ${message}`
					: message;
			await this.#discardPartial(record, true);
			this.#finish(record, this.#stopStatus(record) ?? "failed");
			return;
		}

		record.error = error;
		record.message = message;
		this.#table.transition(record, "retrying");
		this.emit("jobRetry", {
			jobId: record.id,
			batchId: record.batchId,
			attempt: record.attempts,
			reason: error,
			message,
			nextDelayMs: decision.delayMs,
			quality: decision.quality,
		});
		await this.#discardPartial(record, true);
		if (record.status !== "retrying") {
			return;
		}

		record.quality = decision.quality;
		record.retryTimer = setTimeout(() => {
			record.retryTimer = undefined;
			if (!this.#table.transition(record, "queued")) {
				return;
			}
			record.error = undefined;
			record.message = undefined;
			this.#queue.enqueue(record.id);
			this.emit("jobQueued", {
				jobId: record.id,
				batchId: record.batchId,
				attempt: record.attempts,
			});
		}, decision.delayMs);
	}

	#stop(jobId: string, reason: "cancel" | "skip"): ControlResult {
		const record = this.#table.get(jobId);
		if (!record) {
			return { ok: false, reason: "not-found" };
		}

		const target: TerminalStatus = reason === "skip" ? "skipped" : "cancelled";
		if (isTerminal(record.status)) {
			return record.status === target
				? { ok: true, status: record.status }
				: invalid(record);
		}

		if (record.stopRequest) {
			return record.stopRequest === reason
				? { ok: true, status: record.status }
				: invalid(record);
		}

		switch (record.status) {
			case "queued": {
				if (this.#queue.remove(record.id)) {
					this.#finishAfterCleanup(record, target);
				} else {
					// Already handed to a worker that has not started it yet.
					record.stopRequest = reason;
				}
				break;
			}
			case "retrying": {
				clearTimeout(record.retryTimer);
				record.retryTimer = undefined;
				this.#finishAfterCleanup(record, target);
				break;
			}
			case "paused": {
				if (record.control) {
					record.stopRequest = reason;
					record.control.stop(reason);
				} else {
					this.#finishAfterCleanup(record, target);
				}
				break;
			}
			case "running": {
				record.stopRequest = reason;
				record.control?.stop(reason);
				break;
			}
		}

		return { ok: true, status: record.status };
	}

	#stopStatus(record: JobRecord): TerminalStatus | undefined {
		if (!record.stopRequest) {
			return undefined;
		}
		return record.stopRequest === "skip" ? "skipped" : "cancelled";
	}

	#finishAfterCleanup(record: JobRecord, status: TerminalStatus): void {
		const artifacts = [...record.artifacts];
		this.#finish(record, status);
		if (this.config.keepPartial || artifacts.length === 0) {
			return;
		}

		this.#track(
			Promise.resolve(this.#removeArtifacts(artifacts)).then(
				() => undefined,
				(error: unknown) => {
					this.#logger.warn("failed to remove partial output", {
						jobId: record.id,
						error: errorMessage(error),
					});
				},
			),
		);
	}

	async #discardPartial(record: JobRecord, remove: boolean): Promise<void> {
		const artifacts = [...record.artifacts];
		record.artifacts.clear();
		if (!remove || artifacts.length === 0) {
			return;
		}

		try {
			await this.#removeArtifacts(artifacts);
		} catch (error) {
			this.#logger.warn("failed to remove partial output", {
				jobId: record.id,
				error: errorMessage(error),
			});
		}
	}

	#failUnexpectedly(jobId: string, error: unknown): void {
		const record = this.#table.get(jobId);
		if (!record || isTerminal(record.status)) {
			return;
		}

		record.control?.stop("cancel");
		record.control = undefined;
		clearTimeout(record.retryTimer);
		record.error = "internal";
		record.message = errorMessage(error);
		if (record.status === "queued" || record.status === "paused") {
			this.#table.transition(record, "running");
		}
		this.#releaseOutput(record);
		this.#finish(record, "failed");
	}

	#finish(record: JobRecord, status: TerminalStatus): void {
		if (!this.#table.transition(record, status)) {
			this.#logger.warn("ignored invalid transition", {
				jobId: record.id,
				from: record.status,
				to: status,
			});
			return;
		}

		this.#finalize(record);
	}

	#finalize(record: JobRecord): void {
		const snapshot = toSnapshot(record);
		this.#logger.debug("job finished", {
			jobId: record.id,
			status: record.status,
			attempts: record.attempts,
			error: record.error,
		});
		this.emit("jobFinished", {
			jobId: record.id,
			batchId: record.batchId,
			snapshot,
		});
		this.#recordHistory(snapshot);
		this.#notifyWaiters(record.batchId);
	}

	#recordHistory(snapshot: JobSnapshot): void {
		const history = this.#history;
		if (!history || !isTerminal(snapshot.status)) {
			return;
		}

		this.#track(
			history
				.record({
					id: snapshot.id,
					batchId: snapshot.batchId,
					request: snapshot.request,
					status: snapshot.status,
					outputPath: snapshot.outputPath,
					error: snapshot.error,
					message: snapshot.message,
					attempts: snapshot.attempts,
					enqueuedAt: snapshot.enqueuedAt,
					startedAt: snapshot.startedAt,
					finishedAt: snapshot.finishedAt ?? this.#now(),
				})
				.catch((error: unknown) => {
					this.#logger.warn("failed to write history record", {
						jobId: snapshot.id,
						error: errorMessage(error),
					});
				}),
		);
	}

	#track(write: Promise<void>): void {
		this.#pendingWrites.add(write);
		void write.finally(() => {
			this.#pendingWrites.delete(write);
		});
	}

	#notifyWaiters(batchId: string): void {
		if (this.getBatch(batchId)?.done) {
			const waiters = this.#batchWaiters.get(batchId) ?? [];
			this.#batchWaiters.delete(batchId);
			for (const waiter of waiters) {
				waiter();
			}
		}

		if (this.#table.live().length === 0) {
			for (const waiter of this.#idleWaiters.splice(0)) {
				waiter();
			}
		}
	}

	#whenIdle(): Promise<void> {
		if (this.#table.live().length === 0) {
			return Promise.resolve();
		}

		return new Promise((resolve) => {
			this.#idleWaiters.push(resolve);
		});
	}

	#claimOutput(jobId: string): void {
		const record = this.#table.get(jobId);
		if (record) {
			this.#busyKeys.set(record.outputKey, record.id);
		}
	}

	#releaseOutput(record: JobRecord): void {
		if (this.#busyKeys.get(record.outputKey) === record.id) {
			this.#busyKeys.delete(record.outputKey);
			this.#queue.wake();
		}
	}

	#isDispatchable(jobId: string): boolean {
		const record = this.#table.get(jobId);
		if (!record) {
			return true;
		}

		return !this.#busyKeys.has(record.outputKey);
	}

	#resolveRequest(spec: JobSpec): DownloadRequest {
		const defaults = this.config.requestDefaults;
		return {
			url: spec.url.trim(),
			format: spec.format ?? defaults.format,
			quality: spec.quality ?? defaults.quality,
			outputDir: path.resolve(spec.outputDir ?? defaults.outputDir),
			filenameTemplate: spec.filenameTemplate ?? defaults.filenameTemplate,
			playlist: spec.playlist ?? defaults.playlist,
			restrictFilenames: spec.restrictFilenames ?? defaults.restrictFilenames,
			checkCertificates: spec.checkCertificates ?? defaults.checkCertificates,
			cookieFile: spec.cookieFile ?? defaults.cookieFile,
			postprocessorArgs: spec.postprocessorArgs ?? defaults.postprocessorArgs,
			useAccelerator: spec.useAccelerator ?? defaults.useAccelerator,
		};
	}

	#nextBatchId(): string {
		this.#batchCounter += 1;
		return `batch-${this.#batchCounter}`;
	}

	#emitStatus(record: JobRecord): void {
		this.emit("jobStatus", {
			jobId: record.id,
			batchId: record.batchId,
			status: record.status,
		});
	}

	#forwardToReporter(): void {
		const reporter = this.#reporter;
		this.on("jobQueued", (payload) =>
			reporter.publish({ type: "jobQueued", ...payload }),
		);
		this.on("jobStarted", (payload) =>
			reporter.publish({ type: "jobStarted", ...payload }),
		);
		this.on("jobProgress", (payload) =>
			reporter.publish({ type: "jobProgress", ...payload }),
		);
		this.on("jobStatus", (payload) =>
			reporter.publish({ type: "jobStatus", ...payload }),
		);
		this.on("jobRetry", (payload) =>
			reporter.publish({ type: "jobRetry", ...payload }),
		);
		this.on("jobLog", (payload) =>
			reporter.publish({ type: "jobLog", ...payload }),
		);
		this.on("jobFinished", (payload) =>
			reporter.publish({ type: "jobFinished", ...payload }),
		);
	}
}

export function createEngine(options: EngineOptions): DownloadEngine {
	return new DownloadOrchestrator(options);
}

function invalid(record: JobRecord): ControlResult {
	return { ok: false, reason: "invalid-transition", status: record.status };
}

function toFailureOutcome(error: unknown): FetchOutcome {
	if (error instanceof InvalidInputError) {
		return {
			kind: "fatal",
			error: "invalid-input",
			message: error.message,
			artifacts: [],
		};
	}

	return {
		kind: "fatal",
		error: "internal",
		message: errorMessage(error),
		artifacts: [],
	};
}

function delay(ms: number): Promise<void> {
	return new Promise((resolve) => setTimeout(resolve, ms));
}
