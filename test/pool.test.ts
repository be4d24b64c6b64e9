import assert from "node:assert/strict";
import { test } from "node:test";
import { ConsoleLogger } from "../logger.js";
import { WorkerPool } from "../pool.js";

function tick(): Promise<void> {
	return new Promise((resolve) => setImmediate(resolve));
}

test("WorkerPool caps the number of running tasks", async () => {
	const pool = new WorkerPool(2);
	let inFlight = 0;
	let peak = 0;
	let completed = 0;
	for (let i = 0; i < 5; i++) {
		pool.submit(async () => {
			inFlight += 1;
			peak = Math.max(peak, inFlight);
			await tick();
			await tick();
			inFlight -= 1;
			completed += 1;
		});
	}
	assert.equal(pool.activeCount, 2);
	assert.equal(pool.queuedCount, 3);
	assert.equal(await pool.shutdown(1000), true);
	assert.equal(peak, 2);
	assert.equal(completed, 5);
});

test("WorkerPool starts queued tasks in submission order", async () => {
	const pool = new WorkerPool(1);
	const order: number[] = [];
	for (const id of [1, 2, 3]) {
		pool.submit(async () => {
			await tick();
			order.push(id);
		});
	}
	await pool.shutdown(1000);
	assert.deepEqual(order, [1, 2, 3]);
});

test("WorkerPool logs a failing task and keeps going", async () => {
	const lines: string[] = [];
	const pool = new WorkerPool(
		1,
		new ConsoleLogger("info", undefined, (_level, line) => lines.push(line)),
	);
	let ranAfterFailure = false;
	pool.submit(async () => {
		throw new Error("boom");
	});
	pool.submit(async () => {
		ranAfterFailure = true;
	});
	assert.equal(await pool.shutdown(1000), true);
	assert.equal(ranAfterFailure, true);
	assert.deepEqual(lines, ['Worker task failed {"error":"boom"}']);
});

test("WorkerPool refuses work once shutting down", async () => {
	const pool = new WorkerPool(1);
	assert.equal(await pool.shutdown(10), true);
	assert.equal(
		pool.submit(async () => {}),
		false,
	);
});

test("WorkerPool aborts running and queued tasks after grace", async () => {
	const pool = new WorkerPool(1);
	let runningSawAbort = false;
	let queuedSignalAborted: boolean | undefined;
	pool.submit(
		(signal) =>
			new Promise<void>((resolve) => {
				signal.addEventListener("abort", () => {
					runningSawAbort = true;
					resolve();
				});
			}),
	);
	pool.submit(async (signal) => {
		queuedSignalAborted = signal.aborted;
	});

	assert.equal(await pool.shutdown(20), false);
	assert.equal(runningSawAbort, true);
	assert.equal(queuedSignalAborted, true);
});

test("WorkerPool rejects a non-positive size", () => {
	assert.throws(() => new WorkerPool(0), RangeError);
});
