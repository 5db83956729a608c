import { mkdir, rm, stat } from "node:fs/promises";
import path from "node:path";

export const DEFAULT_FILENAME_TEMPLATE = "%(title).150s";

const PARTIAL_SUFFIXES = [".part", ".ytdl", ".temp", ".tmp"] as const;

export async function ensureOutputDir(outputDir: string): Promise<string> {
	const resolved = path.resolve(outputDir);
	await mkdir(resolved, { recursive: true });
	const info = await stat(resolved);
	if (!info.isDirectory()) {
		throw new Error(`Output path is not a directory: ${resolved}`);
	}
	return resolved;
}

export function resolveFilenameTemplate(template?: string): string {
	const trimmed = template?.trim();
	return trimmed || DEFAULT_FILENAME_TEMPLATE;
}

/**
 * Identity of the file(s) a request writes. Two requests with the same key
 * must not run at the same time.
 */
export function outputKey(request: {
	url: string;
	format: string;
	outputDir: string;
	filenameTemplate?: string;
}): string {
	const dir = path.resolve(request.outputDir);
	const template = resolveFilenameTemplate(request.filenameTemplate);
	const parts = [dir, template, request.format];
	if (template.includes("%(")) {
		parts.push(request.url);
	}
	return parts.join("\u0000");
}

/** Every file a partial attempt may leave behind for the given outputs. */
export function partialArtifactPaths(outputs: Iterable<string>): string[] {
	const paths = new Set<string>();
	for (const output of outputs) {
		paths.add(output);
		for (const suffix of PARTIAL_SUFFIXES) {
			paths.add(`${output}${suffix}`);
		}
	}
	return [...paths];
}

export async function removeArtifacts(paths: Iterable<string>): Promise<string[]> {
	const removed: string[] = [];
	for (const filePath of partialArtifactPaths(paths)) {
		try {
			const info = await stat(filePath);
			if (!info.isFile()) {
				continue;
			}
		} catch {
			continue;
		}

		await rm(filePath, { force: true });
		removed.push(filePath);
	}
	return removed;
}
