import { Box, Static, Text, useApp, useInput } from "ink";
import { useEffect, useMemo, useState } from "react";
import type { DownloadEngine } from "./core/engine.js";
import type {
	ControlResult,
	EngineEvents,
	JobSnapshot,
	JobStatus,
} from "./core/types.js";

type Props = {
	engine: DownloadEngine;
	batchId: string;
};

type EventLog = {
	id: string;
	color: "green" | "yellow" | "red" | "cyan" | "gray";
	message: string;
};

type StatusColor = "gray" | "blue" | "cyan" | "yellow" | "green" | "red" | "magenta";

const SPINNER_FRAMES = ["-", "\\", "|", "/"] as const;
const REFRESH_MS = 200;

export default function App({ engine, batchId }: Props) {
	const { exit } = useApp();
	const [startedAt] = useState(() => Date.now());
	const [now, setNow] = useState(() => Date.now());
	const [tick, setTick] = useState(0);
	const [showDetails, setShowDetails] = useState(true);
	const [selected, setSelected] = useState(0);
	const [eventLogs, setEventLogs] = useState<EventLog[]>([]);
	const [jobs, setJobs] = useState<JobSnapshot[]>(
		() => engine.getBatch(batchId)?.jobs ?? [],
	);

	const pushEvent = (color: EventLog["color"], message: string) => {
		setEventLogs((prev) => [
			...prev,
			{ id: `${Date.now()}-${prev.length}`, color, message },
		]);
	};

	const report = (action: string, jobId: string, result: ControlResult) => {
		if (!result.ok) {
			pushEvent(
				"gray",
				`${action} ${jobId} ignored (${result.reason}${result.status ? `, ${result.status}` : ""})`,
			);
		}
	};

	useInput((input, key) => {
		const current = jobs[selected];

		if (key.upArrow) {
			setSelected((value) => Math.max(0, value - 1));
			return;
		}

		if (key.downArrow) {
			setSelected((value) => Math.min(Math.max(0, jobs.length - 1), value + 1));
			return;
		}

		if (input === "d") {
			setShowDetails((value) => !value);
			return;
		}

		if (input === "p" && current) {
			const result =
				current.status === "paused"
					? engine.resume(current.id)
					: engine.pause(current.id);
			report(current.status === "paused" ? "resume" : "pause", current.id, result);
			return;
		}

		if (input === "x" && current) {
			report("cancel", current.id, engine.cancel(current.id));
			return;
		}

		if (input === "s" && current) {
			report("skip", current.id, engine.skip(current.id));
			return;
		}

		if (input === "P") {
			if (engine.pausedAll) {
				engine.resumeAll();
				pushEvent("cyan", "resumed all downloads");
			} else {
				engine.pauseAll();
				pushEvent("yellow", "paused all downloads");
			}
			setTick((value) => value + 1);
			return;
		}

		if (input === "X") {
			engine.cancelAll();
			pushEvent("red", "cancelled all downloads");
			return;
		}

		if (input === "q" || key.escape || (key.ctrl && input === "c")) {
			engine.cancelAll();
			process.exitCode = 130;
			exit();
		}
	});

	useEffect(() => {
		const timeInterval = setInterval(() => setNow(Date.now()), 1000);
		const spinnerInterval = setInterval(
			() => setTick((value) => value + 1),
			120,
		);
		const refreshInterval = setInterval(() => {
			setJobs(engine.getBatch(batchId)?.jobs ?? []);
		}, REFRESH_MS);

		return () => {
			clearInterval(timeInterval);
			clearInterval(spinnerInterval);
			clearInterval(refreshInterval);
		};
	}, [engine, batchId]);

	useEffect(() => {
		const onRetry = (payload: EngineEvents["jobRetry"]) => {
			if (payload.batchId !== batchId) {
				return;
			}
			pushEvent(
				"yellow",
				`retry ${payload.jobId} after ${payload.reason}, attempt ${payload.attempt + 1} at ${payload.quality} in ${Math.round(payload.nextDelayMs / 1000)}s`,
			);
		};

		const onFinished = (payload: EngineEvents["jobFinished"]) => {
			if (payload.batchId !== batchId) {
				return;
			}
			const { snapshot } = payload;
			pushEvent(
				snapshot.status === "completed" ? "green" : snapshot.status === "failed" ? "red" : "gray",
				snapshot.status === "failed"
					? `failed ${snapshot.id}: ${snapshot.message ?? snapshot.error ?? "unknown"}`
					: `${snapshot.status} ${snapshot.id}`,
			);
		};

		engine.on("jobRetry", onRetry);
		engine.on("jobFinished", onFinished);

		let active = true;
		engine
			.waitForBatch(batchId)
			.then(() => {
				if (active) {
					exit();
				}
			})
			.catch((error: unknown) => {
				process.exitCode = 1;
				exit(error instanceof Error ? error : new Error(String(error)));
			});

		return () => {
			active = false;
			engine.off("jobRetry", onRetry);
			engine.off("jobFinished", onFinished);
		};
	}, [engine, batchId, exit]);

	const summary = useMemo(() => {
		const count = (status: JobStatus) =>
			jobs.filter((job) => job.status === status).length;
		const aggregateSpeed = jobs.reduce(
			(sum, job) =>
				sum + (job.status === "running" ? (job.progress.speedBps ?? 0) : 0),
			0,
		);
		const averagePercent =
			jobs.length === 0
				? 0
				: jobs.reduce((sum, job) => sum + displayPercent(job), 0) / jobs.length;

		return {
			total: jobs.length,
			active: count("running") + count("retrying"),
			paused: count("paused"),
			completed: count("completed"),
			failed: count("failed"),
			aggregateSpeed,
			averagePercent,
		};
	}, [jobs]);

	const spinner = SPINNER_FRAMES[tick % SPINNER_FRAMES.length] ?? "-";
	const elapsedSec = Math.max(0, Math.floor((now - startedAt) / 1000));

	return (
		<Box flexDirection="column" width="100%">
			<Box
				borderStyle="round"
				borderColor="cyan"
				flexDirection="column"
				paddingX={1}
			>
				<Box justifyContent="space-between">
					<Text color="cyan" bold>
						{spinner} grabline {engine.pausedAll ? "(paused)" : ""}
					</Text>
					<Text color="gray">elapsed {formatDuration(elapsedSec)}</Text>
				</Box>
				<Box justifyContent="space-between">
					<Text color="gray">
						↑/↓ select | p pause | x cancel | s skip | P pause all | X cancel
						all | d details | q quit
					</Text>
					<Text color={summary.failed > 0 ? "red" : "green"}>
						{summary.completed}/{summary.total} completed
					</Text>
				</Box>
			</Box>

			<Box marginTop={1}>
				<MetricCard
					label="Active"
					value={String(summary.active)}
					color="cyan"
				/>
				<Box marginLeft={1}>
					<MetricCard
						label="Throughput"
						value={formatSpeed(summary.aggregateSpeed)}
						color="blue"
					/>
				</Box>
				<Box marginLeft={1}>
					<MetricCard
						label="Overall"
						value={`${summary.averagePercent.toFixed(1)}%`}
						color="magenta"
					/>
				</Box>
				<Box marginLeft={1}>
					<MetricCard
						label="Paused"
						value={String(summary.paused)}
						color="blue"
					/>
				</Box>
				<Box marginLeft={1}>
					<MetricCard
						label="Failed"
						value={String(summary.failed)}
						color={summary.failed > 0 ? "red" : "green"}
					/>
				</Box>
			</Box>

			<Box
				marginTop={1}
				borderStyle="round"
				borderColor="blue"
				flexDirection="column"
				paddingX={1}
			>
				<Text color="blue" bold>
					Jobs
				</Text>
				{jobs.map((job, index) => (
					<JobRow
						key={job.id}
						job={job}
						selected={index === selected}
						showDetails={showDetails}
						spinner={spinner}
					/>
				))}
			</Box>

			{eventLogs.length > 0 ? (
				<Box
					marginTop={1}
					borderStyle="round"
					borderColor="magenta"
					flexDirection="column"
					paddingX={1}
				>
					<Text color="magenta" bold>
						Events
					</Text>
					<Static items={eventLogs}>
						{(log) => (
							<Text key={log.id} color={log.color}>
								- {log.message}
							</Text>
						)}
					</Static>
				</Box>
			) : null}
		</Box>
	);
}

function MetricCard(props: {
	label: string;
	value: string;
	color: "cyan" | "blue" | "magenta" | "red" | "green";
}) {
	return (
		<Box borderStyle="round" borderColor={props.color} paddingX={1}>
			<Text>
				<Text color="gray">{props.label}: </Text>
				<Text color={props.color} bold>
					{props.value}
				</Text>
			</Text>
		</Box>
	);
}

function JobRow(props: {
	job: JobSnapshot;
	selected: boolean;
	showDetails: boolean;
	spinner: string;
}) {
	const { job } = props;
	const statusColor = statusToColor(job.status);
	const percent = displayPercent(job);
	const statusLabel =
		job.status === "running"
			? `${props.spinner} ${job.progress.phase === "postprocessing" ? "processing" : "running"}`
			: job.status;

	return (
		<Box
			marginTop={1}
			flexDirection="column"
			borderStyle={props.selected ? "double" : "single"}
			borderColor={props.selected ? "white" : statusColor}
			paddingX={1}
		>
			<Box justifyContent="space-between">
				<Text color="gray">
					{props.selected ? "> " : ""}
					{job.id} [{job.request.format} {job.quality}]
				</Text>
				<Text color={statusColor} bold>
					{statusLabel}
				</Text>
			</Box>
			<Text color="gray">{job.request.url}</Text>
			<Text color={statusColor}>
				{renderBar(percent, 28)} {percent.toFixed(1)}%
			</Text>
			{props.showDetails ? (
				<Text color="gray">
					attempt {job.attempts} | speed {formatSpeed(job.progress.speedBps)} |
					eta {formatEta(job.progress.etaSec)} | downloaded{" "}
					{formatBytes(job.progress.downloadedBytes)}/
					{formatBytes(job.progress.totalBytes)}
				</Text>
			) : null}
			{job.status === "failed" && job.message ? (
				<Text color="red">{job.message}</Text>
			) : null}
		</Box>
	);
}

function displayPercent(job: JobSnapshot): number {
	if (job.status === "completed") {
		return 100;
	}
	return Math.max(0, Math.min(100, job.progress.percent ?? 0));
}

function statusToColor(status: JobStatus): StatusColor {
	switch (status) {
		case "queued":
			return "gray";
		case "running":
			return "cyan";
		case "paused":
			return "blue";
		case "retrying":
			return "yellow";
		case "completed":
			return "green";
		case "failed":
			return "red";
		case "cancelled":
		case "skipped":
			return "magenta";
	}
}

function renderBar(percent: number, width: number): string {
	const filled = Math.round((percent / 100) * width);
	return `[${"=".repeat(filled)}${"-".repeat(Math.max(0, width - filled))}]`;
}

function formatBytes(bytes?: number): string {
	if (!bytes || bytes <= 0) {
		return "0 B";
	}

	const units = ["B", "KB", "MB", "GB", "TB"] as const;
	let value = bytes;
	let unitIndex = 0;
	while (value >= 1024 && unitIndex < units.length - 1) {
		value /= 1024;
		unitIndex += 1;
	}

	return `${value.toFixed(value >= 10 ? 0 : 1)} ${units[unitIndex]}`;
}

function formatSpeed(speedBps?: number): string {
	if (!speedBps || speedBps <= 0) {
		return "n/a";
	}
	return `${formatBytes(speedBps)}/s`;
}

function formatEta(etaSec?: number): string {
	if (!etaSec || etaSec <= 0) {
		return "n/a";
	}
	return formatDuration(Math.floor(etaSec));
}

function formatDuration(totalSeconds: number): string {
	const seconds = Math.max(0, totalSeconds);
	const hours = Math.floor(seconds / 3600);
	const minutes = Math.floor((seconds % 3600) / 60);
	const remainderSeconds = seconds % 60;

	if (hours > 0) {
		return `${String(hours).padStart(2, "0")}:${String(minutes).padStart(2, "0")}:${String(remainderSeconds).padStart(2, "0")}`;
	}

	return `${String(minutes).padStart(2, "0")}:${String(remainderSeconds).padStart(2, "0")}`;
}
