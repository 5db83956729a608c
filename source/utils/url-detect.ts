import { InvalidInputError } from "../core/errors.js";

export function parseHttpUrl(input: string): URL {
	let parsed: URL;
	try {
		parsed = new URL(input.trim());
	} catch {
		throw new InvalidInputError(`Invalid URL: ${input}`);
	}

	if (parsed.protocol !== "http:" && parsed.protocol !== "https:") {
		throw new InvalidInputError(
			`Unsupported URL scheme: ${parsed.protocol}. Use http/https.`,
		);
	}

	return parsed;
}

/** Splits a batch file into URLs, ignoring blank lines and `#` comments. */
export function parseUrlList(text: string): string[] {
	return text
		.split(/\r?\n/)
		.map((line) => line.trim())
		.filter((line) => line.length > 0 && !line.startsWith("#"));
}
