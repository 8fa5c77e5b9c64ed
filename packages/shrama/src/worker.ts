/**
 * Worker: an element that exposes named work functions.
 *
 * {@link Worker.registerWork} returns a submitter: calling it wraps one
 * call of the function in a {@link Work} item and appends it to that
 * function's log. Nothing runs until {@link Worker.forward}.
 */

import { Element, ItemExistsError, createLogger } from "@karya/core";
import type { ElementInit, Logger } from "@karya/core";
import { Work } from "./work.js";
import { WorkFunction } from "./work-function.js";
import type { WorkFunctionHandle, WorkFunctionOptions } from "./work-function.js";

export interface WorkerInit extends ElementInit {
	name?: string;
	logger?: Logger;
}

export type WorkSubmitter<A extends unknown[], R> = (...args: A) => Promise<Work<R>>;

export class Worker extends Element {
	readonly name: string;

	private readonly functions = new Map<string, WorkFunctionHandle>();
	private readonly log: Logger;

	constructor(init: WorkerInit = {}) {
		super(init);
		this.name = init.name ?? "Worker";
		this.log = init.logger ?? createLogger("shrama:worker");
	}

	get workFunctions(): WorkFunctionHandle[] {
		return [...this.functions.values()];
	}

	getWorkFunction(name: string): WorkFunctionHandle | undefined {
		return this.functions.get(name);
	}

	/** @throws ItemExistsError if a function with this name is registered. */
	registerWork<A extends unknown[], R>(
		name: string,
		fn: (...args: A) => Promise<R>,
		opts: WorkFunctionOptions = {},
	): WorkSubmitter<A, R> {
		if (this.functions.has(name)) throw new ItemExistsError(name);
		const workFunction = new WorkFunction(name, fn, {
			...opts,
			logger: opts.logger ?? this.log.child(name),
		});
		this.functions.set(name, workFunction);

		return async (...args: A) => {
			const work = new Work<R>({ name, task: () => workFunction.perform(...args) });
			await workFunction.worklog.append(work);
			return work;
		};
	}

	/**
	 * Run one batch on every work function.
	 *
	 * @returns The number of items performed.
	 */
	async forward(): Promise<number> {
		const counts = await Promise.all(this.workFunctions.map((f) => f.forward()));
		return counts.reduce((sum, n) => sum + n, 0);
	}

	isProgressable(): boolean {
		return this.workFunctions.some((f) => f.isProgressable());
	}

	stop(): void {
		this.log.info("Stopping worker", { worker: this.name, functions: this.functions.size });
		for (const f of this.functions.values()) f.worklog.stop();
	}
}
