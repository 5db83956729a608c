import { spawn } from "node:child_process";
import { createInterface } from "node:readline";
import {
	classifyFailure,
	type ErrorKind,
	isRecoverableKind,
} from "../core/errors.js";
import type {
	FetchAdapter,
	LogEmitter,
	ProgressEmitter,
} from "../core/fetch-adapter.js";
import type { JobControl } from "../core/job-control.js";
import { type Logger, silentLogger } from "../core/logger.js";
import {
	isPostprocessingLine,
	parseYtDlpProgressLine,
	YT_DLP_PROGRESS_TEMPLATE,
} from "../core/progress-parser.js";
import type {
	AttemptRequest,
	DownloadRequest,
	FetchOutcome,
	PreparedAttempt,
} from "../core/types.js";
import { resolveFilenameTemplate } from "../utils/fs.js";
import { parseHttpUrl } from "../utils/url-detect.js";

export type YtDlpPaths = {
	ytDlpPath: string;
	ffmpegPath?: string;
	acceleratorPath?: string;
};

/** The part of a child process the adapter talks to. */
export type ChildHandle = {
	readonly stdout: NodeJS.ReadableStream;
	readonly stderr: NodeJS.ReadableStream;
	kill(signal?: NodeJS.Signals): boolean;
	once(event: "error", listener: (error: Error) => void): unknown;
	once(
		event: "close",
		listener: (code: number | null, signal: NodeJS.Signals | null) => void,
	): unknown;
};

export type SpawnProcess = (command: string, args: string[]) => ChildHandle;

export type YtDlpAdapterOptions = {
	paths: YtDlpPaths;
	stallTimeoutMs?: number;
	/** Delay between SIGTERM and SIGKILL for a child that does not exit. */
	killGraceMs?: number;
	canSuspend?: boolean;
	spawnProcess?: SpawnProcess;
	logger?: Logger;
};

export const ACCELERATOR_ARGS = "aria2c:-x 16 -s 16 -k 1M --file-allocation=none";

const STDERR_TAIL = 20;

const OUTPUT_PATTERNS = [
	/^\[download\] Destination:\s+(.+)$/,
	/^\[ExtractAudio\] Destination:\s+(.+)$/,
	/^\[Merger\] Merging formats into\s+"?(.+?)"?$/,
	/^\[download\]\s+(.+?) has already been downloaded/,
];

const spawnYtDlp: SpawnProcess = (command, args) =>
	spawn(command, args, {
		stdio: ["ignore", "pipe", "pipe"],
		shell: false,
	});

export class YtDlpAdapter implements FetchAdapter {
	readonly name = "yt-dlp";
	readonly canSuspend: boolean;
	readonly #paths: YtDlpPaths;
	readonly #stallTimeoutMs: number;
	readonly #killGraceMs: number;
	readonly #spawn: SpawnProcess;
	readonly #logger: Logger;
	#warnedAccelerator = false;

	constructor(options: YtDlpAdapterOptions) {
		this.#paths = options.paths;
		this.#stallTimeoutMs = options.stallTimeoutMs ?? 120_000;
		this.#killGraceMs = options.killGraceMs ?? 5000;
		this.canSuspend = options.canSuspend ?? process.platform !== "win32";
		this.#spawn = options.spawnProcess ?? spawnYtDlp;
		this.#logger = options.logger ?? silentLogger;
	}

	async prepare(attempt: AttemptRequest): Promise<PreparedAttempt> {
		parseHttpUrl(attempt.request.url);
		if (attempt.request.useAccelerator && !this.#paths.acceleratorPath) {
			this.#warnAcceleratorMissing();
		}

		return {
			attempt,
			command: this.#paths.ytDlpPath,
			args: buildYtDlpArgs(attempt.request, this.#paths),
		};
	}

	download(
		prepared: PreparedAttempt,
		control: JobControl,
		emit: ProgressEmitter,
		emitLog?: LogEmitter,
	): Promise<FetchOutcome> {
		const artifacts = new Set<string>();
		if (control.signal.aborted) {
			return Promise.resolve({
				kind: "aborted",
				reason: control.stopReason ?? "cancel",
				artifacts: [],
			});
		}

		return new Promise<FetchOutcome>((resolve) => {
			const stderrLines: string[] = [];
			let outputPath: string | undefined;
			let stallTimer: NodeJS.Timeout | undefined;
			let killTimer: NodeJS.Timeout | undefined;
			let suspended = false;
			let stalled = false;
			let settled = false;

			const child = this.#spawn(prepared.command, prepared.args);
			const stdoutReader = createInterface({ input: child.stdout });
			const stderrReader = createInterface({ input: child.stderr });

			const terminate = () => {
				child.kill("SIGTERM");
				if (suspended) {
					child.kill("SIGCONT");
				}
				if (killTimer) {
					return;
				}

				killTimer = setTimeout(() => {
					emitLog?.({
						stream: "system",
						message: `still running ${this.#killGraceMs}ms after SIGTERM, killing`,
					});
					child.kill("SIGKILL");
				}, this.#killGraceMs);
			};

			const armStallTimer = () => {
				clearTimeout(stallTimer);
				if (this.#stallTimeoutMs <= 0 || suspended) {
					return;
				}

				stallTimer = setTimeout(() => {
					stalled = true;
					emitLog?.({
						stream: "system",
						message: `no output for ${Math.round(this.#stallTimeoutMs / 1000)}s, stopping`,
					});
					terminate();
				}, this.#stallTimeoutMs);
			};

			const suspend = () => {
				suspended = true;
				clearTimeout(stallTimer);
				child.kill("SIGSTOP");
			};

			const onAbort = () => {
				clearTimeout(stallTimer);
				terminate();
			};

			const offCommand = control.onCommand((command) => {
				if (command === "pause") {
					suspend();
					return;
				}

				suspended = false;
				child.kill("SIGCONT");
				armStallTimer();
			});
			control.signal.addEventListener("abort", onAbort, { once: true });

			const finish = (outcome: FetchOutcome) => {
				if (settled) {
					return;
				}

				settled = true;
				clearTimeout(stallTimer);
				clearTimeout(killTimer);
				offCommand();
				control.signal.removeEventListener("abort", onAbort);
				stdoutReader.close();
				stderrReader.close();
				resolve(outcome);
			};

			stdoutReader.on("line", (line) => {
				armStallTimer();
				emitLog?.({ stream: "stdout", message: line });

				const progress = parseYtDlpProgressLine(line);
				if (progress) {
					emit(progress);
				} else if (isPostprocessingLine(line)) {
					emit({ phase: "postprocessing", percent: 100 });
				}

				const destination = matchOutputPath(line);
				if (destination) {
					artifacts.add(destination);
					outputPath = destination;
				}
			});

			stderrReader.on("line", (line) => {
				armStallTimer();
				emitLog?.({ stream: "stderr", message: line });
				stderrLines.push(line);
				if (stderrLines.length > STDERR_TAIL) {
					stderrLines.shift();
				}
			});

			child.once("error", (error) => {
				const missing = "code" in error && error.code === "ENOENT";
				finish({
					kind: "fatal",
					error: missing ? "dependency-missing" : "internal",
					message: missing
						? `${prepared.command} is not installed or not executable`
						: error.message,
					artifacts: [...artifacts],
				});
			});

			child.once("close", (code) => {
				const collected = [...artifacts];
				if (control.stopReason) {
					finish({
						kind: "aborted",
						reason: control.stopReason,
						artifacts: collected,
					});
					return;
				}

				if (stalled) {
					finish({
						kind: "recoverable",
						error: "stalled",
						message: `${prepared.command} produced no output for ${this.#stallTimeoutMs}ms`,
						artifacts: collected,
					});
					return;
				}

				if (code === 0) {
					finish({ kind: "success", outputPath, artifacts: collected });
					return;
				}

				const stderrSnippet = stderrLines.slice(-5).join("\n");
				const kind: ErrorKind = classifyFailure(stderrSnippet);
				const message = buildYtDlpErrorMessage(code, stderrSnippet);
				finish(
					isRecoverableKind(kind)
						? { kind: "recoverable", error: kind, message, artifacts: collected }
						: { kind: "fatal", error: kind, message, artifacts: collected },
				);
			});

			if (control.paused) {
				suspend();
			} else {
				armStallTimer();
			}
		});
	}

	#warnAcceleratorMissing(): void {
		if (this.#warnedAccelerator) {
			return;
		}

		this.#warnedAccelerator = true;
		this.#logger.warn(
			"aria2c not found, downloading without the accelerator",
		);
	}
}

export function buildYtDlpArgs(
	request: DownloadRequest,
	paths: YtDlpPaths,
): string[] {
	const hasFfmpeg = Boolean(paths.ffmpegPath);
	const args = [
		"--newline",
		"--progress",
		"--progress-delta",
		"1",
		"--progress-template",
		YT_DLP_PROGRESS_TEMPLATE,
		"--no-warnings",
		"-P",
		request.outputDir,
		"-o",
		`${resolveFilenameTemplate(request.filenameTemplate)}.%(ext)s`,
		request.playlist ? "--yes-playlist" : "--no-playlist",
	];

	if (request.restrictFilenames) {
		args.push("--restrict-filenames");
	}

	if (!request.checkCertificates) {
		args.push("--no-check-certificates");
	}

	if (request.cookieFile) {
		args.push("--cookies", request.cookieFile);
	}

	if (paths.ffmpegPath) {
		args.push("--ffmpeg-location", paths.ffmpegPath);
	}

	if (request.format === "audio") {
		args.push(
			"-f",
			"bestaudio/best",
			"--extract-audio",
			"--audio-format",
			"mp3",
			"--audio-quality",
			toAudioQuality(request.quality),
			"--embed-thumbnail",
			"--embed-metadata",
		);
	} else {
		args.push("-f", toFormatSelector(request.quality, hasFfmpeg));
		if (hasFfmpeg) {
			args.push("--merge-output-format", "mp4");
		}
		args.push("--embed-metadata");
	}

	const postprocessorArgs = request.postprocessorArgs?.trim();
	if (postprocessorArgs) {
		args.push("--postprocessor-args", `ffmpeg:${postprocessorArgs}`);
	}

	if (request.useAccelerator && paths.acceleratorPath) {
		args.push(
			"--downloader",
			paths.acceleratorPath,
			"--downloader-args",
			ACCELERATOR_ARGS,
		);
	}

	args.push(request.url);
	return args;
}

export function toFormatSelector(quality: string, hasFfmpeg: boolean): string {
	const normalized = quality.toLowerCase().trim();
	const heightMatch = normalized.match(/^(\d{3,4})p$/);
	const height = heightMatch ? Number(heightMatch[1]) : undefined;

	if (!hasFfmpeg) {
		if (normalized === "worst") {
			return "worst";
		}
		return height ? `best[height<=${height}]/best` : "best";
	}

	if (normalized === "worst") {
		return "worstvideo+worstaudio/worst";
	}

	if (height) {
		return `bestvideo[height<=${height}]+bestaudio/best[height<=${height}]`;
	}

	return "bestvideo+bestaudio/best";
}

export function toAudioQuality(quality: string): string {
	const normalized = quality.toLowerCase().trim();
	if (normalized === "best") {
		return "0";
	}
	if (normalized === "worst") {
		return "9";
	}

	const bitrate = normalized.match(/^(\d{2,3})k?$/);
	return bitrate?.[1] ? `${bitrate[1]}K` : "192K";
}

function matchOutputPath(line: string): string | undefined {
	for (const pattern of OUTPUT_PATTERNS) {
		const match = line.match(pattern);
		if (match?.[1]) {
			return match[1].trim();
		}
	}
	return undefined;
}

function buildYtDlpErrorMessage(
	code: number | null,
	stderrSnippet: string,
): string {
	const hint = getMostRelevantErrorLine(stderrSnippet);
	if (!hint) {
		return `yt-dlp failed with exit code ${code ?? "unknown"}`;
	}

	return `yt-dlp failed with exit code ${code ?? "unknown"}: ${hint}`;
}

function getMostRelevantErrorLine(stderrSnippet: string): string | undefined {
	const lines = stderrSnippet
		.split("\n")
		.map((line) => line.trim())
		.filter(Boolean);
	if (lines.length === 0) {
		return undefined;
	}

	return (
		lines.findLast((line) => line.toLowerCase().includes("error:")) ??
		lines[lines.length - 1]
	);
}
