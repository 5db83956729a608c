import type { JobControl } from "./job-control.js";
import type {
	AttemptRequest,
	DownloadProgress,
	FetchOutcome,
	LogStream,
	PreparedAttempt,
} from "./types.js";

export type ProgressEmitter = (progress: DownloadProgress) => void;

export type LogEmitter = (entry: { stream: LogStream; message: string }) => void;

export type FetchAdapter = {
	readonly name: string;
	/** Whether a running attempt can be suspended without stopping it. */
	readonly canSuspend: boolean;
	prepare(attempt: AttemptRequest): Promise<PreparedAttempt>;
	download(
		prepared: PreparedAttempt,
		control: JobControl,
		emit: ProgressEmitter,
		emitLog?: LogEmitter,
	): Promise<FetchOutcome>;
};

export function formatCommand(command: string, args: string[]): string {
	return [command, ...args.map(quoteArg)].join(" ");
}

function quoteArg(arg: string): string {
	return /\s|["'`$\\]/.test(arg)
		? `"${arg.replaceAll("\\", "\\\\").replaceAll('"', '\\"')}"`
		: arg;
}
