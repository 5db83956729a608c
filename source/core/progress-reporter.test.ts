import { describe, expect, it } from "vitest";
import { ProgressReporter } from "./progress-reporter.js";
import type { EngineEvent } from "./types.js";

function progress(jobId: string, percent: number, batchId = "b1"): EngineEvent {
	return { type: "jobProgress", jobId, batchId, progress: { percent } };
}

function log(jobId: string, message: string): EngineEvent {
	return { type: "jobLog", jobId, batchId: "b1", stream: "stdout", message };
}

async function drain(iterator: AsyncIterator<EngineEvent>): Promise<EngineEvent[]> {
	const events: EngineEvent[] = [];
	for (;;) {
		const result = await iterator.next();
		if (result.done) {
			return events;
		}
		events.push(result.value);
	}
}

describe("ProgressReporter", () => {
	it("keeps only the newest unread progress per job", async () => {
		const reporter = new ProgressReporter();
		const subscription = reporter.subscribe();

		reporter.publish(progress("a", 10));
		reporter.publish(progress("b", 5));
		reporter.publish(progress("a", 20));
		reporter.publish(progress("a", 30));
		reporter.close();

		expect(await drain(subscription)).toEqual([progress("b", 5), progress("a", 30)]);
		expect(subscription.dropped).toBe(2);
	});

	it("delivers coalesced progress after the lifecycle events published before it", async () => {
		const reporter = new ProgressReporter();
		const subscription = reporter.subscribe();
		const retry: EngineEvent = {
			type: "jobRetry",
			jobId: "a",
			batchId: "b1",
			attempt: 1,
			reason: "stalled",
			message: "no output",
			nextDelayMs: 0,
			quality: "best",
		};
		const started: EngineEvent = {
			type: "jobStarted",
			jobId: "a",
			batchId: "b1",
			attempt: 2,
			quality: "best",
		};

		reporter.publish(progress("a", 40));
		reporter.publish(retry);
		reporter.publish(started);
		reporter.publish(progress("a", 5));
		reporter.close();

		expect(await drain(subscription)).toEqual([retry, started, progress("a", 5)]);
	});

	it("drops log lines past the cap but never lifecycle events", async () => {
		const reporter = new ProgressReporter({ maxBufferedLogs: 1 });
		const subscription = reporter.subscribe();
		const started: EngineEvent = {
			type: "jobStarted",
			jobId: "a",
			batchId: "b1",
			attempt: 1,
			quality: "best",
		};

		reporter.publish(log("a", "one"));
		reporter.publish(log("a", "two"));
		reporter.publish(started);
		reporter.close();

		expect(await drain(subscription)).toEqual([log("a", "one"), started]);
		expect(subscription.dropped).toBe(1);
	});

	it("delivers directly to a waiting reader", async () => {
		const reporter = new ProgressReporter();
		const subscription = reporter.subscribe();
		const next = subscription.next();

		reporter.publish(progress("a", 50));

		await expect(next).resolves.toEqual({
			value: progress("a", 50),
			done: false,
		});
	});

	it("filters by batch", async () => {
		const reporter = new ProgressReporter();
		const subscription = reporter.subscribe("b2");

		reporter.publish(progress("a", 10, "b1"));
		reporter.publish(progress("c", 40, "b2"));
		reporter.close();

		expect(await drain(subscription)).toEqual([progress("c", 40, "b2")]);
	});

	it("forgets a subscriber that stops reading", async () => {
		const reporter = new ProgressReporter();
		const subscription = reporter.subscribe();
		expect(reporter.subscriberCount).toBe(1);

		reporter.publish(progress("a", 1));
		for await (const event of subscription) {
			expect(event.type).toBe("jobProgress");
			break;
		}
		expect(reporter.subscriberCount).toBe(0);

		reporter.publish(progress("a", 99));
		await expect(subscription.next()).resolves.toEqual({
			value: undefined,
			done: true,
		});
	});

	it("ends new subscriptions once closed", async () => {
		const reporter = new ProgressReporter();
		reporter.close();

		expect(await drain(reporter.subscribe())).toEqual([]);
	});
});
