/**
 * WorkflowRunner: drives one graph to completion in-process.
 *
 * Wires a MailManager, an Executor and a root Coordinator, then repeats
 * collect → send → step until the root coordinator completes. The executor
 * step runs alongside the routing rounds so that executable conditions can
 * be answered while it waits.
 */

import {
	DEFAULT_RUNTIME_SETTINGS,
	KaryaError,
	StructureError,
	TraversalError,
	createLogger,
	sleep,
} from "@karya/core";
import type { IdType, Logger, RuntimeSettings } from "@karya/core";
import type { Graph } from "@karya/jaala";
import { MailManager } from "@karya/patra";
import { Coordinator } from "./coordinator.js";
import type { ConditionEvaluator, HistoryEntry, Performer } from "./coordinator.js";
import { Executor } from "./executor.js";

// ─── Types ───────────────────────────────────────────────────────────────────

export interface WorkflowRunnerOptions {
	graph: Graph;
	performer: Performer;
	conditionEvaluator?: ConditionEvaluator;
	/** Defaults to {@link DEFAULT_RUNTIME_SETTINGS}. */
	settings?: RuntimeSettings;
	logger?: Logger;
}

export interface BranchResult {
	coordinatorId: IdType;
	parentId?: IdType;
	/** Child branches forked from this one. Empty for a leaf. */
	children: readonly IdType[];
	history: readonly HistoryEntry[];
}

export interface WorkflowResult {
	rootId: IdType;
	/** Routing rounds in which something moved. */
	steps: number;
	branches: BranchResult[];
}

function yieldToEventLoop(): Promise<void> {
	return new Promise((resolve) => setImmediate(resolve));
}

// ─── Runner ──────────────────────────────────────────────────────────────────

export class WorkflowRunner {
	readonly manager: MailManager;
	readonly executor: Executor;
	readonly root: Coordinator;

	private readonly graph: Graph;
	private readonly maxSteps: number;
	private readonly idleInterval: number;
	private readonly log: Logger;
	private ran = false;

	constructor(opts: WorkflowRunnerOptions) {
		const settings = opts.settings ?? DEFAULT_RUNTIME_SETTINGS;
		this.log = opts.logger ?? createLogger("pravaha:runner");
		this.graph = opts.graph;
		this.maxSteps = settings.runner.maxSteps;
		this.idleInterval = settings.mail.refreshInterval;

		this.manager = new MailManager({
			refreshInterval: settings.mail.refreshInterval,
			logger: this.log.child("mail"),
		});
		this.executor = new Executor({
			graph: opts.graph,
			refreshInterval: settings.executor.refreshInterval,
			conditionTimeout: settings.executor.conditionTimeout,
			logger: this.log.child("executor"),
		});
		this.root = new Coordinator({
			executor: this.executor,
			performer: opts.performer,
			conditionEvaluator: opts.conditionEvaluator,
			manager: this.manager,
			logger: this.log.child("coordinator"),
		});
		this.manager.addSources([this.executor, this.root]);
	}

	/**
	 * Run the graph to completion.
	 *
	 * @throws StructureError if the graph has a cycle.
	 * @throws TraversalError if a traversal fails or the workflow stalls.
	 * @throws KaryaError (`STEP_LIMIT_EXCEEDED`) after `runner.maxSteps` rounds.
	 */
	async run(): Promise<WorkflowResult> {
		if (this.ran) {
			throw new KaryaError("WorkflowRunner instances run once", "RUNNER_REUSED");
		}
		this.ran = true;
		if (!this.graph.isAcyclic()) {
			throw new StructureError(`Graph ${this.graph.id} is not acyclic`);
		}

		const started = Date.now();
		this.log.info("Workflow started", { graph: this.graph.id, nodes: this.graph.nodeCount });

		// Written from the executor step's callbacks, so kept off the stack.
		const step: { inflight?: Promise<void>; failure?: { error: unknown } } = {};
		let steps = 0;

		this.root.start();
		try {
			while (!this.root.complete) {
				if (step.failure) throw step.failure.error;
				if (steps >= this.maxSteps) {
					throw new KaryaError(`Workflow exceeded ${this.maxSteps} steps`, "STEP_LIMIT_EXCEEDED");
				}

				let progress = this.manager.collectAll() + this.manager.sendAll();

				if (!step.inflight && this.executor.mailbox.hasIncoming) {
					progress++;
					step.inflight = this.executor.forward().then(
						() => {
							step.inflight = undefined;
						},
						(err: unknown) => {
							step.failure = { error: err };
							step.inflight = undefined;
						},
					);
				}

				const handled = await Promise.all(this.coordinators().map((c) => c.forward()));
				progress += handled.reduce((sum, n) => sum + n, 0);

				if (progress > 0) {
					steps++;
					await yieldToEventLoop();
				} else if (step.inflight) {
					await Promise.race([step.inflight, sleep(this.idleInterval)]);
				} else if (!step.failure) {
					throw new TraversalError(`Workflow on graph ${this.graph.id} stalled before completing`);
				}
			}

			// Deliver the root's final `end` so the executor stops itself.
			this.manager.collectAll();
			this.manager.sendAll();
			if (step.inflight) await step.inflight;
			if (step.failure) throw step.failure.error;
			await this.executor.forward();
		} finally {
			if (!this.executor.stopped) this.executor.stop();
			if (step.inflight) await step.inflight;
		}

		this.log.info("Workflow complete", { graph: this.graph.id, steps, duration: Date.now() - started });
		return {
			rootId: this.root.id,
			steps,
			branches: this.coordinators().map((c) => ({
				coordinatorId: c.id,
				parentId: c.parentId,
				children: c.children,
				history: c.history,
			})),
		};
	}

	private coordinators(): Coordinator[] {
		return this.manager.sources.values().filter((s): s is Coordinator => s instanceof Coordinator);
	}
}
