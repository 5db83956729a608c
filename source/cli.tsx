#!/usr/bin/env node
import { readFile } from "node:fs/promises";
import { homedir } from "node:os";
import path from "node:path";
import { createInterface } from "node:readline/promises";
import chalk from "chalk";
import { render } from "ink";
import meow from "meow";
import { YtDlpAdapter } from "./adapters/yt-dlp.js";
import App from "./app.js";
import { BinaryManager } from "./core/binary-manager.js";
import { createEngine, type DownloadEngine } from "./core/engine.js";
import { errorMessage, InvalidInputError, toExitCode } from "./core/errors.js";
import { type HistoryRecorder, JsonlHistory, MemoryHistory } from "./core/history.js";
import { createConsoleLogger } from "./core/logger.js";
import { TcpReachabilityProbe } from "./core/reachability.js";
import type { JobSnapshot, MediaFormat } from "./core/types.js";
import { ensureOutputDir } from "./utils/fs.js";
import {
	collectUrls,
	formatPlainEvent,
	parseFormat,
	toJsonLine,
} from "./utils/headless.js";

const DEFAULT_HISTORY_DIR = path.join(homedir(), ".grabline");

const cli = meow(
	`
	Usage
	  $ grabline [url...] [options]

	Options
	  --format <kind>              audio|video (default: video)
	  --quality <value>            best|worst|1080p|720p|192k... (default: best)
	  --output <dir>               Output directory (default: ./output)
	  --filename <template>        Output filename template
	  --batch-file <path>          Read URLs from a file, one per line
	  --concurrency <n>            Worker pool size (default: 4)
	  --sequential                 Run one job at a time
	  --retries <n>                Maximum attempts per job (default: 3)
	  --timeout <sec>              Stop an attempt after this long without output (default: 120)
	  --playlist                   Download whole playlists
	  --restrict-filenames         ASCII-only file names
	  --no-check-certificate       Skip TLS certificate checks
	  --cookies <path>             Cookie file passed to yt-dlp
	  --postprocessor-args <args>  Extra ffmpeg arguments
	  --accelerator                Use aria2c when it is installed
	  --keep-partial               Keep partial files of cancelled jobs
	  --history-file <path>        History log (default: ~/.grabline/history.jsonl)
	  --no-history                 Do not record history
	  --export-failed <path>       Write failed URLs from history to a file and exit
	  --no-progress                Disable the live view
	  --json                       Emit JSON events
	  --verbose                    Verbose logs

	Examples
	  $ grabline "https://example.com/watch?v=abc" --quality 720p --output ./videos
	  $ grabline --batch-file urls.txt --format audio --concurrency 2
	`,
	{
		importMeta: import.meta,
		flags: {
			format: {
				type: "string",
				default: "video",
			},
			quality: {
				type: "string",
				default: "best",
			},
			output: {
				type: "string",
				default: "./output",
			},
			filename: {
				type: "string",
			},
			batchFile: {
				type: "string",
			},
			concurrency: {
				type: "number",
				default: 4,
			},
			sequential: {
				type: "boolean",
				default: false,
			},
			retries: {
				type: "number",
				default: 3,
			},
			timeout: {
				type: "number",
				default: 120,
			},
			playlist: {
				type: "boolean",
				default: false,
			},
			restrictFilenames: {
				type: "boolean",
				default: false,
			},
			checkCertificate: {
				type: "boolean",
				default: true,
			},
			cookies: {
				type: "string",
			},
			postprocessorArgs: {
				type: "string",
			},
			accelerator: {
				type: "boolean",
				default: false,
			},
			keepPartial: {
				type: "boolean",
				default: false,
			},
			historyFile: {
				type: "string",
			},
			history: {
				type: "boolean",
				default: true,
			},
			exportFailed: {
				type: "string",
			},
			progress: {
				type: "boolean",
				default: true,
			},
			json: {
				type: "boolean",
				default: false,
			},
			verbose: {
				type: "boolean",
				default: false,
			},
		},
	},
);

const logger = createConsoleLogger({ verbose: cli.flags.verbose });

try {
	await main();
} catch (error) {
	logger.error(errorMessage(error));
	process.exitCode = toExitCode(error);
}

async function main(): Promise<void> {
	const interactive =
		!cli.flags.json && cli.flags.progress && Boolean(process.stdout.isTTY);
	if (interactive) {
		printStartupBanner(await getCliVersion());
	}

	const history = createHistory();
	await history.open();
	try {
		if (cli.flags.exportFailed) {
			await exportFailed(history, cli.flags.exportFailed);
			return;
		}

		await runDownloads(history, interactive);
	} finally {
		await history.close();
	}
}

function createHistory(): HistoryRecorder {
	if (!cli.flags.history) {
		return new MemoryHistory();
	}

	const filePath =
		cli.flags.historyFile ?? path.join(DEFAULT_HISTORY_DIR, "history.jsonl");
	return new JsonlHistory(path.resolve(filePath), {
		legacyJsonPath: path.join(DEFAULT_HISTORY_DIR, "history.json"),
	});
}

async function exportFailed(
	history: HistoryRecorder,
	outputPath: string,
): Promise<void> {
	if (!(history instanceof JsonlHistory)) {
		throw new InvalidInputError("--export-failed needs history enabled");
	}

	const count = await history.exportFailed(path.resolve(outputPath));
	console.log(`exported ${count} failed URL(s) to ${outputPath}`);
}

async function runDownloads(
	history: HistoryRecorder,
	interactive: boolean,
): Promise<void> {
	const format = parseFormat(cli.flags.format);
	const batchText = cli.flags.batchFile
		? await readFile(cli.flags.batchFile, "utf8")
		: undefined;
	let urls = collectUrls(cli.input, batchText);
	let quality = cli.flags.quality;
	let outputRoot = cli.flags.output;

	if (urls.length === 0) {
		if (!process.stdin.isTTY || cli.flags.json) {
			throw new InvalidInputError(
				"At least one URL is required in non-interactive mode: grabline <url...> [options]",
			);
		}

		const answers = await promptInteractiveRequest(format, quality, outputRoot);
		urls = [answers.url];
		quality = answers.quality;
		outputRoot = answers.output;
	}

	const outputDir = await ensureOutputDir(outputRoot);
	const binaries = await new BinaryManager({ logger }).ensureBinaries();
	const adapter = new YtDlpAdapter({
		paths: binaries,
		stallTimeoutMs: Math.max(1, Math.floor(cli.flags.timeout)) * 1000,
		logger,
	});

	const engine = createEngine({
		adapter,
		history,
		logger,
		reachability: new TcpReachabilityProbe(),
		mode: cli.flags.sequential ? "sequential" : "concurrent",
		concurrency: cli.flags.concurrency,
		maxAttempts: cli.flags.retries,
		keepPartial: cli.flags.keepPartial,
		requestDefaults: {
			format,
			quality,
			outputDir,
			filenameTemplate: cli.flags.filename,
			playlist: cli.flags.playlist,
			restrictFilenames: cli.flags.restrictFilenames,
			checkCertificates: cli.flags.checkCertificate,
			cookieFile: cli.flags.cookies,
			postprocessorArgs: cli.flags.postprocessorArgs,
			useAccelerator: cli.flags.accelerator,
		},
	});

	const { batchId } = engine.submit(urls.map((url) => ({ url })));
	const jobs = interactive
		? await runLiveView(engine, batchId)
		: await runHeadless(engine, batchId, cli.flags.json);

	if (jobs.some((job) => job.status === "failed")) {
		process.exitCode = 1;
	}
}

async function runLiveView(
	engine: DownloadEngine,
	batchId: string,
): Promise<JobSnapshot[]> {
	console.clear();
	const ui = render(<App engine={engine} batchId={batchId} />);
	await ui.waitUntilExit();
	const jobs = engine.getBatch(batchId)?.jobs ?? [];
	await engine.shutdown({ cancel: true });
	return jobs;
}

async function runHeadless(
	engine: DownloadEngine,
	batchId: string,
	asJson: boolean,
): Promise<JobSnapshot[]> {
	const onSignal = () => {
		logger.warn("interrupted, cancelling downloads");
		engine.shutdown({ cancel: true }).catch((error: unknown) => {
			logger.error(`shutdown failed: ${errorMessage(error)}`);
		});
	};
	process.once("SIGINT", onSignal);

	const printing = (async () => {
		for await (const event of engine.subscribe(batchId)) {
			const line = asJson
				? toJsonLine(event)
				: formatPlainEvent(event, cli.flags.verbose);
			if (line) {
				console.log(line);
			}
		}
	})();

	try {
		const jobs = await engine.waitForBatch(batchId);
		await engine.shutdown();
		await printing;
		return jobs;
	} finally {
		process.off("SIGINT", onSignal);
	}
}

async function getCliVersion(): Promise<string> {
	const { npm_package_version: envVersion } = process.env;
	if (envVersion) {
		return envVersion;
	}

	try {
		const packageJsonPath = new URL("../package.json", import.meta.url);
		const parsed: unknown = JSON.parse(await readFile(packageJsonPath, "utf8"));
		const version =
			typeof parsed === "object" && parsed !== null
				? Reflect.get(parsed, "version")
				: undefined;
		return typeof version === "string" ? version : "0.0.0";
	} catch {
		return "0.0.0";
	}
}

function printStartupBanner(version: string): void {
	const bannerLines = String.raw`
                 _     _ _
  __ _ _ __ __ _| |__ | (_)_ __   ___
 / _${"`"} | '__/ _${"`"} | '_ \| | | '_ \ / _ \
| (_| | | | (_| | |_) | | | | | |  __/
 \__, |_|  \__,_|_.__/|_|_|_| |_|\___|
 |___/
`
		.split("\n")
		.filter((line) => line.trim());

	const gradient = [
		[0, 170, 255],
		[40, 190, 255],
		[80, 205, 255],
		[120, 220, 255],
		[160, 232, 255],
		[200, 242, 255],
	] as const;
	const fallbackColor: readonly [number, number, number] = [200, 242, 255];

	for (const [index, line] of bannerLines.entries()) {
		const [r, g, b] = gradient[index] ?? fallbackColor;
		console.log(chalk.rgb(r, g, b).bold(line));
	}

	console.log(chalk.rgb(80, 205, 255)(`grabline v${version}`));
	console.log(
		chalk.rgb(
			145,
			170,
			205,
		)("Concurrent media downloads with live pause, resume and cancel."),
	);
	console.log("");
}

type InteractiveAnswers = {
	url: string;
	quality: string;
	output: string;
};

async function promptInteractiveRequest(
	format: MediaFormat,
	defaultQuality: string,
	defaultOutput: string,
): Promise<InteractiveAnswers> {
	const rl = createInterface({
		input: process.stdin,
		output: process.stdout,
	});

	try {
		console.log(`grabline interactive setup (${format})`);
		console.log("");

		const url = await askRequired(rl, "Media URL");
		const quality = await askWithDefault(
			rl,
			format === "audio"
				? "Quality (best, 320k, 192k, 128k)"
				: "Quality (best, worst, 1080p, 720p)",
			defaultQuality,
		);
		const output = await askWithDefault(rl, "Output directory", defaultOutput);
		return { url, quality: quality || "best", output };
	} finally {
		rl.close();
	}
}

async function askWithDefault(
	rl: ReturnType<typeof createInterface>,
	label: string,
	defaultValue: string,
): Promise<string> {
	const answer = await rl.question(
		`${label}${defaultValue ? ` [${defaultValue}]` : ""}: `,
	);
	return answer.trim() || defaultValue;
}

async function askRequired(
	rl: ReturnType<typeof createInterface>,
	label: string,
): Promise<string> {
	for (;;) {
		const value = await askWithDefault(rl, label, "");
		if (value) {
			return value;
		}
		console.log(`${label} is required.`);
	}
}
