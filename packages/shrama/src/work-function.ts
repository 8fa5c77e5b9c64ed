/**
 * WorkFunction: a named async function with its own WorkLog.
 *
 * Calls made through {@link WorkFunction.perform} get a per-attempt timeout
 * and exponential-backoff retries. Scheduling goes through the log:
 * {@link WorkFunction.forward} moves pending work into the queue and runs
 * one batch.
 */

import { KaryaError, createLogger, sleep } from "@karya/core";
import type { Logger } from "@karya/core";
import { WorkLog } from "./work-log.js";

// ─── Types ───────────────────────────────────────────────────────────────────

export interface RetryOptions {
	/** Extra attempts after the first failure. Default: 0 */
	maxRetries?: number;
	/** Delay before the first retry, in ms. Default: 0 */
	delay?: number;
	/** Multiplier applied to the delay on each further retry. Default: 2 */
	backoff?: number;
}

export interface WorkFunctionOptions {
	/** Items admitted per batch. */
	capacity?: number;
	refreshInterval?: number;
	retry?: RetryOptions;
	/** Per-attempt timeout in ms. No timeout when omitted. */
	timeout?: number;
	/** Free-form description of what the function is for. */
	guidance?: string;
	logger?: Logger;
}

/** What a {@link Worker} needs from a work function, whatever its signature. */
export interface WorkFunctionHandle {
	readonly name: string;
	readonly worklog: WorkLog;
	readonly guidance?: string;
	forward(): Promise<number>;
	isProgressable(): boolean;
}

// ─── WorkFunction ────────────────────────────────────────────────────────────

export class WorkFunction<A extends unknown[] = unknown[], R = unknown> implements WorkFunctionHandle {
	readonly name: string;
	readonly worklog: WorkLog;
	readonly guidance?: string;

	private readonly fn: (...args: A) => Promise<R>;
	private readonly maxRetries: number;
	private readonly delay: number;
	private readonly backoff: number;
	private readonly timeout?: number;
	private readonly log: Logger;

	constructor(name: string, fn: (...args: A) => Promise<R>, opts: WorkFunctionOptions = {}) {
		this.name = name;
		this.fn = fn;
		this.guidance = opts.guidance;
		this.maxRetries = opts.retry?.maxRetries ?? 0;
		this.delay = opts.retry?.delay ?? 0;
		this.backoff = opts.retry?.backoff ?? 2;
		this.timeout = opts.timeout;
		this.log = opts.logger ?? createLogger(`shrama:work-function:${name}`);
		this.worklog = new WorkLog({
			capacity: opts.capacity,
			refreshInterval: opts.refreshInterval,
			logger: this.log.child("queue"),
		});
	}

	/**
	 * Call the function, retrying failures.
	 *
	 * @throws The last attempt's error once retries are exhausted. A timed
	 * out attempt fails with a KaryaError coded `WORK_TIMEOUT`.
	 */
	async perform(...args: A): Promise<R> {
		let attempt = 0;
		for (;;) {
			try {
				return await this.attempt(args);
			} catch (err) {
				if (attempt >= this.maxRetries) throw err;
				const wait = this.delay * Math.pow(this.backoff, attempt);
				attempt++;
				this.log.warn("Work attempt failed, retrying", {
					attempt,
					maxRetries: this.maxRetries,
					delayMs: wait,
					error: err instanceof Error ? err.message : String(err),
				});
				if (wait > 0) await sleep(wait);
			}
		}
	}

	/**
	 * Queue pending work and run one batch.
	 *
	 * @returns The number of items performed.
	 */
	async forward(): Promise<number> {
		await this.worklog.forward();
		return this.worklog.queue.process();
	}

	/** True while work is waiting and the log has not been stopped. */
	isProgressable(): boolean {
		return this.worklog.pendingWork.length > 0 && !this.worklog.stopped;
	}

	private attempt(args: A): Promise<R> {
		const call = this.fn(...args);
		const ms = this.timeout;
		if (ms === undefined) return call;
		return new Promise<R>((resolve, reject) => {
			const timer = setTimeout(() => {
				reject(new KaryaError(`Work function ${this.name} timed out after ${ms}ms`, "WORK_TIMEOUT"));
			}, ms);
			call.then(
				(value) => {
					clearTimeout(timer);
					resolve(value);
				},
				(err: unknown) => {
					clearTimeout(timer);
					reject(err);
				},
			);
		});
	}
}
