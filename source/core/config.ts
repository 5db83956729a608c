import type { DownloadRequest, MediaFormat } from "./types.js";

export type EngineMode = "concurrent" | "sequential";

export type QualityLadder = Record<MediaFormat, readonly string[]>;

export type EngineConfig = {
	mode: EngineMode;
	concurrency: number;
	maxAttempts: number;
	baseBackoffMs: number;
	keepPartial: boolean;
	reachabilityPollMs: number;
	subscriberLogBuffer: number;
	qualityLadder: QualityLadder;
	requestDefaults: Omit<DownloadRequest, "url">;
};

export const DEFAULT_QUALITY_LADDER: QualityLadder = {
	video: ["2160p", "1440p", "1080p", "720p", "480p", "360p", "240p", "144p"],
	audio: ["320k", "256k", "192k", "160k", "128k", "96k", "64k"],
};

export const DEFAULT_ENGINE_CONFIG: EngineConfig = {
	mode: "concurrent",
	concurrency: 4,
	maxAttempts: 3,
	baseBackoffMs: 500,
	keepPartial: false,
	reachabilityPollMs: 5000,
	subscriberLogBuffer: 500,
	qualityLadder: DEFAULT_QUALITY_LADDER,
	requestDefaults: {
		format: "video",
		quality: "best",
		outputDir: "./output",
		playlist: false,
		restrictFilenames: false,
		checkCertificates: true,
		useAccelerator: false,
	},
};

export function normalizeEngineConfig(
	input: Partial<EngineConfig> = {},
): EngineConfig {
	const merged: EngineConfig = {
		...DEFAULT_ENGINE_CONFIG,
		...input,
		requestDefaults: {
			...DEFAULT_ENGINE_CONFIG.requestDefaults,
			...input.requestDefaults,
		},
	};

	return {
		...merged,
		concurrency:
			merged.mode === "sequential" ? 1 : atLeast(1, merged.concurrency),
		maxAttempts: atLeast(1, merged.maxAttempts),
		baseBackoffMs: atLeast(0, merged.baseBackoffMs),
		reachabilityPollMs: atLeast(10, merged.reachabilityPollMs),
		subscriberLogBuffer: atLeast(0, merged.subscriberLogBuffer),
	};
}

function atLeast(min: number, value: number): number {
	return Number.isFinite(value) ? Math.max(min, Math.floor(value)) : min;
}
