/**
 * Work: one unit of scheduled asynchronous work.
 *
 * Status only moves forward: PENDING → IN_PROGRESS → COMPLETED | FAILED.
 * A failing task leaves its error on the item; {@link Work.perform} never
 * rejects because of it.
 */

import { Element, InvalidTransitionError } from "@karya/core";
import type { ElementInit, ElementJSON } from "@karya/core";

// ─── Status ──────────────────────────────────────────────────────────────────

export const WorkStatus = {
	PENDING: "PENDING",
	IN_PROGRESS: "IN_PROGRESS",
	COMPLETED: "COMPLETED",
	FAILED: "FAILED",
} as const;

export type WorkStatus = (typeof WorkStatus)[keyof typeof WorkStatus];

const TRANSITIONS: Record<WorkStatus, readonly WorkStatus[]> = {
	PENDING: ["IN_PROGRESS"],
	IN_PROGRESS: ["COMPLETED", "FAILED"],
	COMPLETED: [],
	FAILED: [],
};

export function isTerminalStatus(status: WorkStatus): boolean {
	return TRANSITIONS[status].length === 0;
}

// ─── Types ───────────────────────────────────────────────────────────────────

export type WorkTask<R> = () => Promise<R>;

export interface WorkInit<R> extends ElementInit {
	task: WorkTask<R>;
	/** Name of the function that produced the task. */
	name?: string;
}

export interface WorkJSON extends ElementJSON {
	name?: string;
	status: WorkStatus;
	duration?: number;
	completionTime?: number;
	error?: string;
}

// ─── Work ────────────────────────────────────────────────────────────────────

export class Work<R = unknown> extends Element {
	readonly name?: string;

	private readonly task: WorkTask<R>;
	private state: WorkStatus = WorkStatus.PENDING;
	private performed = false;
	private value?: R;
	private failure?: unknown;
	private elapsed?: number;
	private completedAt?: number;

	constructor(init: WorkInit<R>) {
		super(init);
		this.task = init.task;
		this.name = init.name;
	}

	get status(): WorkStatus {
		return this.state;
	}

	/** Task result once COMPLETED. */
	get result(): R | undefined {
		return this.value;
	}

	/** Whatever the task threw, once FAILED. */
	get error(): unknown {
		return this.failure;
	}

	/** Task run time in ms, once terminal. */
	get duration(): number | undefined {
		return this.elapsed;
	}

	/** Epoch ms at which the item became terminal. */
	get completionTime(): number | undefined {
		return this.completedAt;
	}

	get isTerminal(): boolean {
		return isTerminalStatus(this.state);
	}

	/**
	 * Run the task once and record the outcome.
	 *
	 * The item is IN_PROGRESS as soon as this is called, before the first
	 * await.
	 *
	 * @throws InvalidTransitionError if the item already ran or is running.
	 */
	async perform(): Promise<void> {
		if (this.performed) {
			throw new InvalidTransitionError(this.state, WorkStatus.IN_PROGRESS);
		}
		this.performed = true;
		this.transition(WorkStatus.IN_PROGRESS);

		const started = Date.now();
		try {
			this.value = await this.task();
			this.elapsed = Date.now() - started;
			this.transition(WorkStatus.COMPLETED);
		} catch (err) {
			this.failure = err;
			this.elapsed = Date.now() - started;
			this.transition(WorkStatus.FAILED);
		}
		this.completedAt = Date.now();
	}

	toJSON(): WorkJSON {
		return {
			...super.toJSON(),
			name: this.name,
			status: this.state,
			duration: this.elapsed,
			completionTime: this.completedAt,
			error: this.failure === undefined
				? undefined
				: this.failure instanceof Error ? this.failure.message : String(this.failure),
		};
	}

	private transition(to: WorkStatus): void {
		if (!TRANSITIONS[this.state].includes(to)) {
			throw new InvalidTransitionError(this.state, to);
		}
		this.state = to;
	}
}
