import { errorMessage } from "./errors.js";
import { type Logger, silentLogger } from "./logger.js";

export type PoolTask = (signal: AbortSignal) => Promise<void>;

/**
 * Runs submitted tasks with at most `size` in flight; the rest wait in FIFO
 * order. Submitting never waits for a task to finish.
 */
export class WorkerPool {
	private readonly queue: PoolTask[] = [];
	private readonly active = new Set<Promise<void>>();
	private readonly abort = new AbortController();
	private accepting = true;
	private drainWaiters: Array<() => void> = [];

	constructor(
		readonly size: number,
		private readonly logger: Logger = silentLogger,
	) {
		if (!Number.isInteger(size) || size < 1) {
			throw new RangeError(`Pool size must be a positive integer, got ${size}`);
		}
	}

	get activeCount(): number {
		return this.active.size;
	}

	get queuedCount(): number {
		return this.queue.length;
	}

	/** Returns false once the pool is shutting down. */
	submit(task: PoolTask): boolean {
		if (!this.accepting) return false;
		this.queue.push(task);
		this.pump();
		return true;
	}

	/**
	 * Stops accepting work and waits up to `graceMs` for queued and running
	 * tasks. On timeout the shared signal is aborted and queued tasks are
	 * handed that aborted signal. Resolves true when everything finished within
	 * the grace period.
	 */
	async shutdown(graceMs: number): Promise<boolean> {
		this.accepting = false;
		if (this.isDrained()) return true;

		let timer: NodeJS.Timeout | undefined;
		const finished = await Promise.race([
			new Promise<true>((resolve) => this.drainWaiters.push(() => resolve(true))),
			new Promise<false>((resolve) => {
				timer = setTimeout(() => resolve(false), graceMs);
			}),
		]);
		clearTimeout(timer);
		if (finished) return true;

		const dropped = this.queue.splice(0);
		this.logger.warn("Forcing worker shutdown", {
			running: this.active.size,
			dropped: dropped.length,
		});
		this.abort.abort();
		// Dropped tasks still run once, with the aborted signal, to release
		// what they hold.
		await Promise.allSettled([
			...this.active,
			...dropped.map((task) => this.run(task)),
		]);
		return false;
	}

	private pump(): void {
		while (this.active.size < this.size) {
			const task = this.queue.shift();
			if (!task) break;
			const running: Promise<void> = this.run(task).then(() => {
				this.active.delete(running);
				this.pump();
				this.notifyIfDrained();
			});
			this.active.add(running);
		}
	}

	private async run(task: PoolTask): Promise<void> {
		try {
			await task(this.abort.signal);
		} catch (error) {
			this.logger.error("Worker task failed", { error: errorMessage(error) });
		}
	}

	private isDrained(): boolean {
		return this.active.size === 0 && this.queue.length === 0;
	}

	private notifyIfDrained(): void {
		if (!this.isDrained()) return;
		const waiters = this.drainWaiters;
		this.drainWaiters = [];
		for (const wake of waiters) wake();
	}
}
