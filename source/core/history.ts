import { access, appendFile, mkdir, readFile, writeFile } from "node:fs/promises";
import path from "node:path";
import type { FinalizeRecord, TerminalStatus } from "./types.js";

/**
 * Receives one record per job that reached a terminal status. The engine
 * only writes; opening, migrating and closing belong to the caller.
 */
export type HistoryRecorder = {
	open(): Promise<void>;
	record(entry: FinalizeRecord): Promise<void>;
	close(): Promise<void>;
};

export class MemoryHistory implements HistoryRecorder {
	readonly records: FinalizeRecord[] = [];

	async open(): Promise<void> {}

	async record(entry: FinalizeRecord): Promise<void> {
		this.records.push(entry);
	}

	async close(): Promise<void> {}
}

export type JsonlHistoryOptions = {
	/** A history file in the older single JSON array layout. */
	legacyJsonPath?: string;
};

/** Append-only history, one JSON object per line. */
export class JsonlHistory implements HistoryRecorder {
	readonly filePath: string;
	readonly #legacyJsonPath?: string;
	#opened = false;

	constructor(filePath: string, options: JsonlHistoryOptions = {}) {
		this.filePath = filePath;
		this.#legacyJsonPath = options.legacyJsonPath;
	}

	async open(): Promise<void> {
		await mkdir(path.dirname(this.filePath), { recursive: true });
		if (this.#legacyJsonPath && !(await exists(this.filePath))) {
			await this.#migrateLegacy(this.#legacyJsonPath);
		}
		this.#opened = true;
	}

	async record(entry: FinalizeRecord): Promise<void> {
		if (!this.#opened) {
			throw new Error(`History ${this.filePath} is not open`);
		}

		await appendFile(this.filePath, `${JSON.stringify(entry)}\n`, "utf8");
	}

	async close(): Promise<void> {
		this.#opened = false;
	}

	async readAll(): Promise<FinalizeRecord[]> {
		let raw: string;
		try {
			raw = await readFile(this.filePath, "utf8");
		} catch (error) {
			if (isMissingFile(error)) {
				return [];
			}
			throw error;
		}

		const records: FinalizeRecord[] = [];
		for (const line of raw.split("\n")) {
			if (!line.trim()) {
				continue;
			}

			const parsed = parseJson(line);
			if (isFinalizeRecord(parsed)) {
				records.push(parsed);
			}
		}
		return records;
	}

	async failedUrls(): Promise<string[]> {
		const records = await this.readAll();
		const urls = records
			.filter((record) => record.status === "failed")
			.map((record) => record.request.url);
		return [...new Set(urls)];
	}

	async exportFailed(outputPath: string): Promise<number> {
		const urls = await this.failedUrls();
		await writeFile(outputPath, urls.map((url) => `${url}\n`).join(""), "utf8");
		return urls.length;
	}

	async #migrateLegacy(legacyPath: string): Promise<number> {
		let raw: string;
		try {
			raw = await readFile(legacyPath, "utf8");
		} catch (error) {
			if (isMissingFile(error)) {
				return 0;
			}
			throw error;
		}

		const parsed = parseJson(raw);
		const items = Array.isArray(parsed)
			? parsed
			: isObject(parsed) && Array.isArray(parsed.records)
				? parsed.records
				: [];

		const migrated = items
			.map((item: unknown, index: number) => fromLegacyRecord(item, index))
			.filter((record): record is FinalizeRecord => record !== undefined);
		await writeFile(
			this.filePath,
			migrated.map((record) => `${JSON.stringify(record)}\n`).join(""),
			"utf8",
		);
		return migrated.length;
	}
}

function fromLegacyRecord(
	value: unknown,
	index: number,
): FinalizeRecord | undefined {
	if (!isObject(value) || typeof value.url !== "string") {
		return undefined;
	}

	const timestamp =
		typeof value.timestamp === "string" ? Date.parse(value.timestamp) : NaN;
	const finishedAt = Number.isNaN(timestamp) ? 0 : timestamp;
	const outputPath =
		typeof value.output_path === "string" && value.output_path
			? value.output_path
			: undefined;
	const retries = typeof value.retry_count === "number" ? value.retry_count : 0;
	const message =
		typeof value.error_message === "string" && value.error_message
			? value.error_message
			: undefined;

	return {
		id: `legacy-${index + 1}`,
		batchId: "legacy",
		request: {
			url: value.url,
			format: value.format === "mp3" ? "audio" : "video",
			quality: typeof value.quality === "string" ? value.quality : "best",
			outputDir: outputPath ? path.dirname(outputPath) : "",
			playlist: false,
			restrictFilenames: false,
			checkCertificates: true,
			useAccelerator: false,
		},
		status: value.success === true ? "completed" : "failed",
		outputPath,
		message,
		attempts: retries + 1,
		enqueuedAt: finishedAt,
		finishedAt,
	};
}

const TERMINAL_STATUSES: readonly TerminalStatus[] = [
	"completed",
	"failed",
	"cancelled",
	"skipped",
];

function isFinalizeRecord(value: unknown): value is FinalizeRecord {
	return (
		isObject(value) &&
		typeof value.id === "string" &&
		typeof value.batchId === "string" &&
		typeof value.attempts === "number" &&
		TERMINAL_STATUSES.some((status) => status === value.status) &&
		isObject(value.request) &&
		typeof value.request.url === "string"
	);
}

function isObject(value: unknown): value is Record<string, unknown> {
	return typeof value === "object" && value !== null && !Array.isArray(value);
}

function parseJson(text: string): unknown {
	try {
		return JSON.parse(text);
	} catch {
		return undefined;
	}
}

function isMissingFile(error: unknown): boolean {
	return isObject(error) && error.code === "ENOENT";
}

async function exists(filePath: string): Promise<boolean> {
	try {
		await access(filePath);
		return true;
	} catch {
		return false;
	}
}
