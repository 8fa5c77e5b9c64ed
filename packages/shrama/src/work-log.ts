/**
 * WorkLog: in-process ledger of submitted work.
 *
 * Every item is kept in `pile` for its whole life. New items also wait in
 * `pending` until {@link WorkLog.forward} hands them to the queue.
 */

import type { IdRef } from "@karya/core";
import { Pile, Progression } from "@karya/sangraha";
import { Work, WorkStatus } from "./work.js";
import { WorkQueue } from "./work-queue.js";
import type { WorkQueueOptions } from "./work-queue.js";

export type WorkLogOptions = WorkQueueOptions;

export class WorkLog {
	readonly pile = new Pile<Work>({ itemTypes: [Work], name: "work" });
	readonly pending = new Progression({ name: "pending" });
	readonly queue: WorkQueue;

	constructor(opts: WorkLogOptions = {}) {
		this.queue = new WorkQueue(opts);
	}

	get length(): number {
		return this.pile.length;
	}

	get stopped(): boolean {
		return this.queue.stopped;
	}

	/** @throws ItemExistsError if the item was appended before. */
	async append(work: Work): Promise<void> {
		await this.pile.withLock(() => {
			this.pile.append(work);
			this.pending.append(work);
		});
	}

	/**
	 * Move every pending item into the queue, oldest first.
	 *
	 * @returns The number of items moved.
	 */
	async forward(): Promise<number> {
		return this.pile.withLock(() => {
			let moved = 0;
			while (this.pending.length > 0) {
				this.queue.enqueue(this.pile.get(this.pending.popLeft()));
				moved++;
			}
			return moved;
		});
	}

	stop(): void {
		this.queue.stop();
	}

	has(ref: IdRef): boolean {
		return this.pile.has(ref);
	}

	/** Items not yet started, including those still waiting in `pending`. */
	get pendingWork(): Work[] {
		return this.withStatus(WorkStatus.PENDING);
	}

	get completedWork(): Work[] {
		return this.withStatus(WorkStatus.COMPLETED);
	}

	get failedWork(): Work[] {
		return this.withStatus(WorkStatus.FAILED);
	}

	[Symbol.iterator](): Iterator<Work> {
		return this.pile[Symbol.iterator]();
	}

	private withStatus(status: WorkStatus): Work[] {
		return this.pile.values().filter((work) => work.status === status);
	}
}
