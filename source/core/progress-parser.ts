import type { DownloadProgress } from "./types.js";

export const YT_DLP_PROGRESS_PREFIX = "[grabline-progress]";

export const YT_DLP_PROGRESS_TEMPLATE = `download:${YT_DLP_PROGRESS_PREFIX} %(progress.status)s|%(progress.downloaded_bytes)s|%(progress.total_bytes)s|%(progress.total_bytes_estimate)s|%(progress.speed)s|%(progress.eta)s|%(progress._percent_str)s`;

// Binary units carry an "i" (KiB); decimal ones do not (KB).
const UNIT_MULTIPLIERS: Record<string, number> = {
	b: 1,
	kib: 1024,
	mib: 1024 ** 2,
	gib: 1024 ** 3,
	tib: 1024 ** 4,
	kb: 1000,
	mb: 1000 ** 2,
	gb: 1000 ** 3,
	tb: 1000 ** 4,
};

const QUANTITY_PATTERN = /([\d.]+)\s*(B|KiB|MiB|GiB|TiB|KB|MB|GB|TB)/i;

const POSTPROCESSOR_PATTERN =
	/^\[(?:Merger|ExtractAudio|EmbedThumbnail|Metadata|FFmpeg\w*|VideoConvertor|VideoRemuxer)\]/;

export function parseQuantity(value: string): number | undefined {
	const match = value.match(QUANTITY_PATTERN);
	const amount = match?.[1];
	const unit = match?.[2]?.toLowerCase();
	if (!amount || !unit) {
		return undefined;
	}

	const multiplier = UNIT_MULTIPLIERS[unit];
	const parsed = Number(amount);
	if (multiplier === undefined || !Number.isFinite(parsed)) {
		return undefined;
	}

	return parsed * multiplier;
}

export function parseClock(value: string): number | undefined {
	const parts = value.split(":").map(Number);
	if (parts.length < 2 || parts.length > 3 || parts.some(Number.isNaN)) {
		return undefined;
	}

	return parts.reduce((total, part) => total * 60 + part, 0);
}

function parseNullableNumber(value?: string): number | undefined {
	const normalized = value?.trim().toLowerCase();
	if (!normalized || normalized === "none" || normalized === "na") {
		return undefined;
	}

	const parsed = Number(normalized);
	return Number.isFinite(parsed) ? parsed : undefined;
}

function parsePercent(value?: string): number | undefined {
	const match = value?.match(/(\d+(?:\.\d+)?)/);
	if (!match?.[1]) {
		return undefined;
	}

	const parsed = Number(match[1]);
	return Number.isFinite(parsed) ? parsed : undefined;
}

function parseStructuredLine(line: string): DownloadProgress | undefined {
	const markerIndex = line.indexOf(YT_DLP_PROGRESS_PREFIX);
	if (markerIndex < 0) {
		return undefined;
	}

	const fields = line
		.slice(markerIndex + YT_DLP_PROGRESS_PREFIX.length)
		.trim()
		.split("|");
	if (fields.length < 7) {
		return undefined;
	}

	const [statusRaw, downloaded, total, estimate, speed, eta, percentRaw] =
		fields;
	const downloadedBytes = parseNullableNumber(downloaded);
	const totalBytes = parseNullableNumber(total) ?? parseNullableNumber(estimate);
	let percent = parsePercent(percentRaw);

	if (
		percent === undefined &&
		downloadedBytes !== undefined &&
		totalBytes !== undefined &&
		totalBytes > 0
	) {
		percent = (downloadedBytes / totalBytes) * 100;
	}

	if (statusRaw?.trim().toLowerCase() === "finished") {
		percent = percent ?? 100;
	}

	return {
		phase: "downloading",
		percent,
		downloadedBytes,
		totalBytes,
		speedBps: parseNullableNumber(speed),
		etaSec: parseNullableNumber(eta),
	};
}

function parseClassicLine(line: string): DownloadProgress | undefined {
	if (!line.includes("[download]")) {
		return undefined;
	}

	const percentMatch = line.match(/(\d+(?:\.\d+)?)%/);
	if (!percentMatch?.[1]) {
		return undefined;
	}

	const percent = Number(percentMatch[1]);
	const totalMatch = line.match(
		/\bof\s+~?\s*([\d.]+\s*(?:B|KiB|MiB|GiB|TiB|KB|MB|GB|TB))/i,
	);
	const speedMatch = line.match(
		/\bat\s+([\d.]+\s*(?:B|KiB|MiB|GiB|TiB|KB|MB|GB|TB))\/s\b/i,
	);
	const etaMatch = line.match(/\bETA\s+((?:\d+:){1,2}\d+)\b/i);
	const totalBytes = totalMatch?.[1] ? parseQuantity(totalMatch[1]) : undefined;

	return {
		phase: "downloading",
		percent,
		totalBytes,
		speedBps: speedMatch?.[1] ? parseQuantity(speedMatch[1]) : undefined,
		etaSec: etaMatch?.[1] ? parseClock(etaMatch[1]) : undefined,
		downloadedBytes:
			totalBytes !== undefined ? (totalBytes * percent) / 100 : undefined,
	};
}

/** Lines announcing that the transfer is done and ffmpeg is working. */
export function isPostprocessingLine(line: string): boolean {
	return POSTPROCESSOR_PATTERN.test(line.trim());
}

export function parseYtDlpProgressLine(
	line: string,
): DownloadProgress | undefined {
	return parseStructuredLine(line) ?? parseClassicLine(line);
}
