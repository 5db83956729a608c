import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { BinaryManager, pickAsset, readReleaseAssets } from "./binary-manager.js";
import { DependencyError } from "./errors.js";
import type { Logger } from "./logger.js";

describe("release assets", () => {
	it("keeps well-formed assets only", () => {
		expect(
			readReleaseAssets({
				assets: [
					{ name: "ffmpeg-linux-x64", browser_download_url: "https://dl/x64" },
					{ name: "broken" },
					"noise",
				],
			}),
		).toEqual([{ name: "ffmpeg-linux-x64", url: "https://dl/x64" }]);
		expect(readReleaseAssets(null)).toEqual([]);
		expect(readReleaseAssets({ assets: "none" })).toEqual([]);
	});

	it("prefers exact names, then a matching stem", () => {
		const assets = [
			{ name: "ffmpeg-win32-x64.gz", url: "https://dl/gz" },
			{ name: "ffmpeg-win32-x64-build", url: "https://dl/build" },
			{ name: "ffmpeg-linux-x64", url: "https://dl/linux" },
		];

		expect(pickAsset(assets, ["ffmpeg-linux-x64"])).toBe("https://dl/linux");
		expect(pickAsset(assets, ["ffmpeg-win32-x64.exe"])).toBe("https://dl/build");
		expect(pickAsset(assets, ["ffmpeg-darwin-arm64"])).toBeUndefined();
	});
});

describe("BinaryManager", () => {
	let dir: string;
	let logger: Logger;

	beforeEach(async () => {
		dir = await mkdtemp(path.join(tmpdir(), "grabline-bin-"));
		logger = { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
	});

	afterEach(async () => {
		await rm(dir, { recursive: true, force: true });
	});

	it.skipIf(process.platform === "win32")(
		"finds tools on the search path",
		async () => {
			await writeFile(path.join(dir, "yt-dlp"), "", { mode: 0o755 });
			await writeFile(path.join(dir, "aria2c"), "", { mode: 0o755 });
			const manager = new BinaryManager({
				cacheDir: path.join(dir, "cache"),
				searchPath: dir,
				bootstrap: false,
				logger,
			});

			expect(await manager.ensureBinaries()).toEqual({
				ytDlpPath: path.join(dir, "yt-dlp"),
				ffmpegPath: undefined,
				acceleratorPath: path.join(dir, "aria2c"),
			});
			expect(logger.warn).toHaveBeenCalledTimes(1);
		},
	);

	it("fails when yt-dlp is missing and bootstrapping is off", async () => {
		const manager = new BinaryManager({
			cacheDir: path.join(dir, "cache"),
			searchPath: "",
			bootstrap: false,
			logger,
		});

		await expect(manager.ensureBinaries()).rejects.toBeInstanceOf(
			DependencyError,
		);
	});
});
