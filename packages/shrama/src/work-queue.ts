/**
 * WorkQueue: capacity-bounded batch execution of {@link Work} items.
 *
 * Each {@link WorkQueue.process} call admits up to `availableCapacity`
 * items, runs them concurrently and waits for the whole batch before
 * restoring capacity. A slow item therefore holds back the next batch.
 */

import {
	DEFAULT_RUNTIME_SETTINGS,
	InvalidTransitionError,
	ItemExistsError,
	assertValid,
	createDeferred,
	createLogger,
	sleep,
	v,
} from "@karya/core";
import type { Deferred, IdType, Logger } from "@karya/core";
import { WorkStatus } from "./work.js";
import type { Work } from "./work.js";

export interface WorkQueueOptions {
	/** Items admitted per batch. */
	capacity?: number;
	/** Sleep between batches of {@link WorkQueue.execute}, in ms. */
	refreshInterval?: number;
	logger?: Logger;
}

const capacityV = v.number().integer().min(1).validate;
const intervalV = v.number().min(0).validate;

export class WorkQueue {
	readonly capacity: number;
	readonly refreshInterval: number;

	private readonly queue: Work[] = [];
	private readonly queuedIds = new Set<IdType>();
	private readonly idleWaiters: Array<Deferred<void>> = [];
	private readonly log: Logger;
	private available: number;
	private inBatch = false;
	private execStop = false;
	private executing = false;

	constructor(opts: WorkQueueOptions = {}) {
		this.capacity = assertValid(opts.capacity ?? DEFAULT_RUNTIME_SETTINGS.work.capacity, capacityV, "WorkQueue capacity");
		this.refreshInterval = assertValid(
			opts.refreshInterval ?? DEFAULT_RUNTIME_SETTINGS.work.refreshInterval,
			intervalV,
			"WorkQueue refreshInterval",
		);
		this.available = this.capacity;
		this.log = opts.logger ?? createLogger("shrama:work-queue");
	}

	/** Items waiting for admission. */
	get size(): number {
		return this.queue.length;
	}

	get availableCapacity(): number {
		return this.available;
	}

	get stopped(): boolean {
		return this.execStop;
	}

	/** True while {@link execute} is looping. */
	get executionMode(): boolean {
		return this.executing;
	}

	/**
	 * @throws InvalidTransitionError if the item is not PENDING.
	 * @throws ItemExistsError if the item is already queued.
	 */
	enqueue(work: Work): void {
		if (work.status !== WorkStatus.PENDING) {
			throw new InvalidTransitionError(work.status, WorkStatus.IN_PROGRESS);
		}
		if (this.queuedIds.has(work.id)) throw new ItemExistsError(work.id);
		this.queuedIds.add(work.id);
		this.queue.push(work);
	}

	dequeue(): Work | undefined {
		const work = this.queue.shift();
		if (work !== undefined) this.queuedIds.delete(work.id);
		return work;
	}

	/**
	 * Run one batch. Every item settles before capacity comes back, even
	 * when one of them could not be started.
	 *
	 * @returns The number of items performed.
	 * @throws The first error raised while starting an item, after the batch settles.
	 */
	async process(): Promise<number> {
		const batch: Array<Promise<void>> = [];
		this.inBatch = true;
		while (this.available > 0) {
			const work = this.dequeue();
			if (work === undefined) break;
			this.available--;
			batch.push(work.perform());
		}

		const settled = await Promise.allSettled(batch);
		this.available = this.capacity;
		this.inBatch = false;
		if (batch.length > 0) {
			this.log.debug("Batch complete", { size: batch.length, queued: this.queue.length });
		}
		if (this.queue.length === 0) this.notifyIdle();

		for (const outcome of settled) {
			if (outcome.status === "rejected") throw outcome.reason;
		}
		return batch.length;
	}

	/** Loop {@link process} until {@link stop} is called. */
	async execute(refreshInterval = this.refreshInterval): Promise<void> {
		this.execStop = false;
		this.executing = true;
		this.log.info("Work queue started", { capacity: this.capacity, refreshInterval });
		try {
			while (!this.execStop) {
				await this.process();
				await sleep(refreshInterval);
			}
		} finally {
			this.executing = false;
			this.log.info("Work queue stopped");
		}
	}

	/** Resolve once the queue is empty and no batch is running. */
	join(): Promise<void> {
		if (this.queue.length === 0 && !this.inBatch) return Promise.resolve();
		const waiter = createDeferred<void>();
		this.idleWaiters.push(waiter);
		return waiter.promise;
	}

	stop(): void {
		this.execStop = true;
	}

	private notifyIdle(): void {
		for (const waiter of this.idleWaiters.splice(0)) waiter.resolve();
	}
}
