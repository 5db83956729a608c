export type RecoverableErrorKind =
	| "transient-network"
	| "format-unavailable"
	| "merge-codec-missing"
	| "stalled";

export type FatalErrorKind =
	| "invalid-input"
	| "access-denied"
	| "disk-write"
	| "retry-ceiling-exceeded"
	| "dependency-missing"
	| "internal";

export type ErrorKind = RecoverableErrorKind | FatalErrorKind;

const RECOVERABLE_KINDS: ReadonlySet<ErrorKind> = new Set<ErrorKind>([
	"transient-network",
	"format-unavailable",
	"merge-codec-missing",
	"stalled",
]);

export function isRecoverableKind(
	kind: ErrorKind,
): kind is RecoverableErrorKind {
	return RECOVERABLE_KINDS.has(kind);
}

export class GrablineError extends Error {
	readonly exitCode: 1 | 2 | 3;

	constructor(message: string, exitCode: 1 | 2 | 3) {
		super(message);
		this.name = this.constructor.name;
		this.exitCode = exitCode;
	}
}

export class InvalidInputError extends GrablineError {
	constructor(message: string) {
		super(message, 2);
	}
}

export class DependencyError extends GrablineError {
	constructor(message: string) {
		super(message, 3);
	}
}

export class EngineClosedError extends GrablineError {
	constructor(message = "Engine has been shut down") {
		super(message, 1);
	}
}

type ClassificationRule = {
	kind: ErrorKind;
	patterns: string[];
};

// Order matters: the first rule with a matching pattern wins.
const CLASSIFICATION_RULES: ClassificationRule[] = [
	{
		kind: "invalid-input",
		patterns: [
			"is not a valid url",
			"unsupported url",
			"invalid url",
		],
	},
	{
		kind: "format-unavailable",
		patterns: [
			"requested format is not available",
			"requested format not available",
			"no video formats found",
			"format not available",
		],
	},
	{
		kind: "merge-codec-missing",
		patterns: [
			"ffmpeg not found",
			"ffprobe and ffmpeg not found",
			"ffmpeg is not installed",
			"you have requested merging of multiple formats",
			"postprocessing: error opening output",
		],
	},
	{
		kind: "access-denied",
		patterns: [
			"http error 401",
			"http error 403",
			"sign in to confirm",
			"login required",
			"private video",
			"members-only",
			"not available in your country",
			"geo restricted",
			"geo-restricted",
		],
	},
	{
		kind: "disk-write",
		patterns: [
			"no space left on device",
			"errno 28",
			"permission denied",
			"read-only file system",
			"unable to write",
			"unable to open for writing",
		],
	},
	{
		kind: "transient-network",
		patterns: [
			"timed out",
			"timeout",
			"connection reset",
			"connection refused",
			"connection aborted",
			"temporary failure",
			"name resolution",
			"getaddrinfo",
			"econnreset",
			"econnrefused",
			"http error 5",
			"http error 429",
			"too many requests",
			"unable to download",
			"incomplete read",
		],
	},
];

/** Maps the tail of the fetch tool's stderr to an error kind. */
export function classifyFailure(text: string): ErrorKind {
	const normalized = text.toLowerCase();
	for (const rule of CLASSIFICATION_RULES) {
		if (rule.patterns.some((pattern) => normalized.includes(pattern))) {
			return rule.kind;
		}
	}

	return "transient-network";
}

export function toExitCode(error: unknown): 1 | 2 | 3 {
	if (error instanceof GrablineError) {
		return error.exitCode;
	}

	return 1;
}

export function errorMessage(error: unknown): string {
	return error instanceof Error ? error.message : String(error);
}
