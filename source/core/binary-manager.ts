import { createWriteStream } from "node:fs";
import { access, chmod, mkdir, stat } from "node:fs/promises";
import { arch, homedir, platform } from "node:os";
import path from "node:path";
import { Readable } from "node:stream";
import { pipeline } from "node:stream/promises";
import { DependencyError, errorMessage } from "./errors.js";
import { type Logger, silentLogger } from "./logger.js";

export type BinaryPaths = {
	ytDlpPath: string;
	ffmpegPath?: string;
	acceleratorPath?: string;
};

export type BinaryManagerOptions = {
	cacheDir?: string;
	logger?: Logger;
	/** Search path; defaults to `process.env.PATH`. */
	searchPath?: string;
	/** Set to false to fail instead of downloading a missing yt-dlp. */
	bootstrap?: boolean;
};

type ReleaseAsset = { name: string; url: string };

const USER_AGENT = "grabline/0.1";

const YT_DLP_RELEASE_BASE =
	"https://github.com/yt-dlp/yt-dlp/releases/latest/download";

const FFMPEG_RELEASE_API =
	"https://api.github.com/repos/eugeneware/ffmpeg-static/releases/latest";

/** Finds the external tools on PATH or in the cache, bootstrapping where it can. */
export class BinaryManager {
	readonly #cacheDir: string;
	readonly #logger: Logger;
	readonly #searchPath: string | undefined;
	readonly #bootstrap: boolean;

	constructor(options: BinaryManagerOptions = {}) {
		this.#cacheDir =
			options.cacheDir ?? path.join(homedir(), ".cache", "grabline", "bin");
		this.#logger = options.logger ?? silentLogger;
		this.#searchPath = options.searchPath ?? process.env.PATH;
		this.#bootstrap = options.bootstrap ?? true;
	}

	async ensureBinaries(): Promise<BinaryPaths> {
		await mkdir(this.#cacheDir, { recursive: true });

		const ytDlpPath = await this.#ensureYtDlp();
		const ffmpegPath = await this.#ensureFfmpeg();
		const acceleratorPath = await this.findOnPath("aria2c");

		if (!ffmpegPath) {
			this.#logger.warn("ffmpeg is unavailable, merges and audio extraction may fail");
		}

		this.#logger.debug("binaries resolved", {
			ytDlp: ytDlpPath,
			ffmpeg: ffmpegPath,
			aria2c: acceleratorPath,
		});
		return { ytDlpPath, ffmpegPath, acceleratorPath };
	}

	async findOnPath(name: string): Promise<string | undefined> {
		if (!this.#searchPath) {
			return undefined;
		}

		const extensions =
			platform() === "win32" ? [".exe", ".cmd", ".bat", ""] : [""];
		for (const dir of this.#searchPath.split(path.delimiter)) {
			if (!dir) {
				continue;
			}
			for (const extension of extensions) {
				const candidate = path.join(dir, `${name}${extension}`);
				if (await isExecutableFile(candidate)) {
					return candidate;
				}
			}
		}

		return undefined;
	}

	async #ensureYtDlp(): Promise<string> {
		const found = await this.#findLocal("yt-dlp");
		if (found) {
			return found;
		}

		const url = ytDlpReleaseUrl();
		if (!this.#bootstrap || !url) {
			throw new DependencyError(
				"yt-dlp was not found on PATH and cannot be bootstrapped here",
			);
		}

		const target = this.#cachePath("yt-dlp");
		this.#logger.info("bootstrapping yt-dlp", { url });
		await downloadToFile(url, target);
		await chmod(target, 0o755);

		if (!(await isExecutableFile(target))) {
			throw new DependencyError("Failed to bootstrap the yt-dlp binary");
		}

		return target;
	}

	async #ensureFfmpeg(): Promise<string | undefined> {
		const found = await this.#findLocal("ffmpeg");
		if (found || !this.#bootstrap) {
			return found;
		}

		const target = this.#cachePath("ffmpeg");
		try {
			const url = await resolveFfmpegUrl(ffmpegAssetCandidates());
			if (!url) {
				return undefined;
			}

			this.#logger.info("bootstrapping ffmpeg", { url });
			await downloadToFile(url, target);
			if (platform() !== "win32") {
				await chmod(target, 0o755);
			}
		} catch (error) {
			this.#logger.warn(`failed to bootstrap ffmpeg: ${errorMessage(error)}`);
			return undefined;
		}

		return (await isExecutableFile(target)) ? target : undefined;
	}

	async #findLocal(name: string): Promise<string | undefined> {
		const onPath = await this.findOnPath(name);
		if (onPath) {
			return onPath;
		}

		const cached = this.#cachePath(name);
		return (await isExecutableFile(cached)) ? cached : undefined;
	}

	#cachePath(name: string): string {
		return path.join(
			this.#cacheDir,
			platform() === "win32" ? `${name}.exe` : name,
		);
	}
}

function ytDlpReleaseUrl(): string | undefined {
	switch (platform()) {
		case "linux":
			return `${YT_DLP_RELEASE_BASE}/yt-dlp`;
		case "darwin":
			return `${YT_DLP_RELEASE_BASE}/yt-dlp_macos`;
		case "win32":
			return `${YT_DLP_RELEASE_BASE}/yt-dlp.exe`;
		default:
			return undefined;
	}
}

const FFMPEG_ASSETS: Record<string, Record<string, string[]>> = {
	linux: {
		x64: ["ffmpeg-linux-x64"],
		arm64: ["ffmpeg-linux-arm64"],
		arm: ["ffmpeg-linux-armhf", "ffmpeg-linux-arm"],
		ia32: ["ffmpeg-linux-ia32", "ffmpeg-linux-x86"],
	},
	darwin: {
		x64: ["ffmpeg-darwin-x64"],
		arm64: ["ffmpeg-darwin-arm64"],
	},
	win32: {
		x64: ["ffmpeg-win32-x64.exe", "ffmpeg-win32-x64"],
		ia32: ["ffmpeg-win32-ia32.exe", "ffmpeg-win32-ia32"],
		arm64: ["ffmpeg-win32-arm64.exe", "ffmpeg-win32-arm64"],
	},
};

function ffmpegAssetCandidates(): string[] {
	return FFMPEG_ASSETS[platform()]?.[arch()] ?? [];
}

async function resolveFfmpegUrl(
	candidates: string[],
): Promise<string | undefined> {
	if (candidates.length === 0) {
		return undefined;
	}

	const response = await fetch(FFMPEG_RELEASE_API, {
		headers: {
			accept: "application/vnd.github+json",
			"user-agent": USER_AGENT,
		},
	});
	if (!response.ok) {
		throw new DependencyError(
			`Failed to resolve ffmpeg release metadata (${response.status})`,
		);
	}

	return pickAsset(readReleaseAssets(await response.json()), candidates);
}

export function readReleaseAssets(payload: unknown): ReleaseAsset[] {
	if (typeof payload !== "object" || payload === null) {
		return [];
	}

	const assets: unknown = Reflect.get(payload, "assets");
	if (!Array.isArray(assets)) {
		return [];
	}

	const result: ReleaseAsset[] = [];
	for (const asset of assets) {
		if (typeof asset !== "object" || asset === null) {
			continue;
		}
		const name: unknown = Reflect.get(asset, "name");
		const url: unknown = Reflect.get(asset, "browser_download_url");
		if (typeof name === "string" && typeof url === "string" && url) {
			result.push({ name, url });
		}
	}
	return result;
}

/** Exact names first, then the first asset sharing a candidate's stem. */
export function pickAsset(
	assets: ReleaseAsset[],
	candidates: string[],
): string | undefined {
	for (const name of candidates) {
		const exact = assets.find((asset) => asset.name === name);
		if (exact) {
			return exact.url;
		}
	}

	for (const name of candidates) {
		const stem = name.endsWith(".exe") ? name.slice(0, -4) : name;
		const relaxed = assets.find(
			(asset) =>
				asset.name.startsWith(stem) &&
				!asset.name.endsWith(".gz") &&
				!asset.name.includes(".README") &&
				!asset.name.includes(".LICENSE"),
		);
		if (relaxed) {
			return relaxed.url;
		}
	}

	return undefined;
}

async function isExecutableFile(filePath: string): Promise<boolean> {
	try {
		await access(filePath);
		return (await stat(filePath)).isFile();
	} catch {
		return false;
	}
}

async function downloadToFile(url: string, destination: string): Promise<void> {
	const response = await fetch(url, {
		headers: { "user-agent": USER_AGENT },
	});

	if (!response.ok || !response.body) {
		throw new DependencyError(
			`Failed to download dependency from ${url} (${response.status})`,
		);
	}

	const body = Readable.fromWeb(response.body as never);
	await pipeline(body, createWriteStream(destination));
}
