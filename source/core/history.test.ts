import { mkdtemp, readFile, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { JsonlHistory, MemoryHistory } from "./history.js";
import type { FinalizeRecord } from "./types.js";

function record(overrides: Partial<FinalizeRecord> = {}): FinalizeRecord {
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
		enqueuedAt: 1000,
		startedAt: 1100,
		finishedAt: 2000,
		...overrides,
	};
}

describe("MemoryHistory", () => {
	it("keeps records in order", async () => {
		const history = new MemoryHistory();
		await history.open();
		await history.record(record({ id: "a" }));
		await history.record(record({ id: "b" }));
		await history.close();

		expect(history.records.map((entry) => entry.id)).toEqual(["a", "b"]);
	});
});

describe("JsonlHistory", () => {
	let dir: string;

	beforeEach(async () => {
		dir = await mkdtemp(path.join(tmpdir(), "grabline-history-"));
	});

	afterEach(async () => {
		await rm(dir, { recursive: true, force: true });
	});

	it("appends one line per record and reads them back", async () => {
		const filePath = path.join(dir, "nested", "history.jsonl");
		const history = new JsonlHistory(filePath);
		await history.open();
		await history.record(record({ id: "a" }));
		await history.record(
			record({ id: "b", status: "failed", error: "access-denied" }),
		);
		await history.close();

		const raw = await readFile(filePath, "utf8");
		expect(raw.trim().split("\n")).toHaveLength(2);

		const records = await history.readAll();
		expect(records.map((entry) => [entry.id, entry.status])).toEqual([
			["a", "completed"],
			["b", "failed"],
		]);
	});

	it("refuses to record before open", async () => {
		const history = new JsonlHistory(path.join(dir, "history.jsonl"));

		await expect(history.record(record())).rejects.toThrow("is not open");
	});

	it("skips malformed lines", async () => {
		const filePath = path.join(dir, "history.jsonl");
		await writeFile(
			filePath,
			`${JSON.stringify(record({ id: "ok" }))}\nnot json\n{"id":"partial"}\n`,
			"utf8",
		);

		const records = await new JsonlHistory(filePath).readAll();
		expect(records.map((entry) => entry.id)).toEqual(["ok"]);
	});

	it("exports unique failed URLs", async () => {
		const filePath = path.join(dir, "history.jsonl");
		const history = new JsonlHistory(filePath);
		await history.open();
		const failedRequest = {
			...record().request,
			url: "https://example.com/watch?v=broken",
		};
		await history.record(record({ id: "a", status: "failed", request: failedRequest }));
		await history.record(record({ id: "b", status: "failed", request: failedRequest }));
		await history.record(record({ id: "c" }));

		const exportPath = path.join(dir, "failed.txt");
		expect(await history.exportFailed(exportPath)).toBe(1);
		expect(await readFile(exportPath, "utf8")).toBe(
			"https://example.com/watch?v=broken\n",
		);
	});

	it("migrates a legacy JSON array once", async () => {
		const legacyPath = path.join(dir, "history.json");
		const filePath = path.join(dir, "history.jsonl");
		await writeFile(
			legacyPath,
			JSON.stringify([
				{
					url: "https://example.com/watch?v=old",
					title: "Old clip",
					format: "mp3",
					quality: "192",
					timestamp: "2024-03-01T10:00:00.000Z",
					output_path: "/music/Old clip.mp3",
					success: true,
					error_message: "",
					retry_count: 1,
				},
				{ title: "no url" },
			]),
			"utf8",
		);

		const history = new JsonlHistory(filePath, { legacyJsonPath: legacyPath });
		await history.open();
		await history.close();

		const [migrated, ...rest] = await history.readAll();
		expect(rest).toEqual([]);
		expect(migrated).toEqual({
			id: "legacy-1",
			batchId: "legacy",
			request: {
				url: "https://example.com/watch?v=old",
				format: "audio",
				quality: "192",
				outputDir: "/music",
				playlist: false,
				restrictFilenames: false,
				checkCertificates: true,
				useAccelerator: false,
			},
			status: "completed",
			outputPath: "/music/Old clip.mp3",
			attempts: 2,
			enqueuedAt: Date.parse("2024-03-01T10:00:00.000Z"),
			finishedAt: Date.parse("2024-03-01T10:00:00.000Z"),
		});

		await writeFile(legacyPath, "[]", "utf8");
		await history.open();
		expect(await history.readAll()).toHaveLength(1);
	});
});
