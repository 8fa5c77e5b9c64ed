/**
 * Coordinator: the actor on the other end of an Executor traversal.
 *
 * It performs every node the executor hands it, records the outcome, and
 * mails the node back so the executor can advance. When the executor
 * answers with several nodes the coordinator forks one child per node;
 * children carry a copy of the history and run on their own branch.
 */

import {
	Element,
	TraversalError,
	createLogger,
	getId,
} from "@karya/core";
import type { IdRef, IdType, Logger } from "@karya/core";
import type { Edge, Node } from "@karya/jaala";
import { Mailbox, createMail } from "@karya/patra";
import type { Mail, MailBody, MailManager, MailSource } from "@karya/patra";

// ─── Types ───────────────────────────────────────────────────────────────────

export interface HistoryEntry {
	nodeId: IdType;
	kind: string;
	label?: string;
	result: unknown;
	completedAt: number;
}

export interface PerformContext {
	node: Node;
	history: readonly HistoryEntry[];
	coordinatorId: IdType;
}

/** Does the work a node stands for. */
export interface Performer {
	perform(ctx: PerformContext): unknown;
}

export interface ConditionRequest {
	edge: Edge;
	context?: Readonly<Record<string, unknown>>;
	history: readonly HistoryEntry[];
}

/** Answers executable edge conditions on behalf of a coordinator. */
export interface ConditionEvaluator {
	evaluate(request: ConditionRequest): boolean | Promise<boolean>;
}

export interface CoordinatorOptions {
	executor: IdRef;
	performer: Performer;
	conditionEvaluator?: ConditionEvaluator;
	/** Children are registered here when the coordinator forks. */
	manager?: MailManager;
	parent?: IdRef;
	history?: readonly HistoryEntry[];
	logger?: Logger;
}

// ─── Coordinator ─────────────────────────────────────────────────────────────

export class Coordinator extends Element implements MailSource {
	readonly mailbox = new Mailbox();
	readonly executorId: IdType;
	readonly parentId?: IdType;

	private readonly performer: Performer;
	private readonly conditionEvaluator?: ConditionEvaluator;
	private readonly manager?: MailManager;
	private readonly log: Logger;
	private readonly entries: HistoryEntry[];
	private readonly childIds: IdType[] = [];
	private readonly endedChildren = new Set<IdType>();
	private started = false;
	private done = false;

	constructor(opts: CoordinatorOptions) {
		super();
		this.executorId = getId(opts.executor);
		this.parentId = opts.parent === undefined ? undefined : getId(opts.parent);
		this.performer = opts.performer;
		this.conditionEvaluator = opts.conditionEvaluator;
		this.manager = opts.manager;
		this.entries = [...(opts.history ?? [])];
		this.log = opts.logger ?? createLogger("pravaha:coordinator");
	}

	/** Outcomes recorded on this branch, oldest first. */
	get history(): readonly HistoryEntry[] {
		return [...this.entries];
	}

	get children(): readonly IdType[] {
		return [...this.childIds];
	}

	/** True once this branch ended, or every child it forked has. */
	get complete(): boolean {
		return this.done;
	}

	/** Ask the executor for the graph heads. */
	start(): void {
		if (this.started) {
			throw new TraversalError(`Coordinator ${this.id} already started`);
		}
		this.started = true;
		this.post(this.executorId, { category: "start", requestSource: this.id });
	}

	receive(mail: Mail): void {
		this.mailbox.deliver(mail);
	}

	/**
	 * Handle every queued mail.
	 *
	 * @returns The number of mails handled.
	 */
	async forward(): Promise<number> {
		let handled = 0;
		let mail = this.mailbox.nextIncoming();
		while (mail !== undefined) {
			await this.handle(mail);
			handled++;
			mail = this.mailbox.nextIncoming();
		}
		return handled;
	}

	// ─── Handlers ────────────────────────────────────────────────────────

	private async handle(mail: Mail): Promise<void> {
		const body = mail.body;
		switch (body.category) {
			case "node":
				await this.performNode(body.node);
				this.started = true;
				this.post(this.executorId, { category: "node", requestSource: this.id, node: body.node });
				return;
			case "node_list":
				this.fork(body.nodes);
				return;
			case "end":
				this.onEnd(mail);
				return;
			case "condition":
				if (body.kind === "reply") {
					throw new TraversalError(`Coordinator ${this.id} received an unexpected condition reply`, {
						mailId: mail.id,
						category: mail.category,
					});
				}
				await this.answerCondition(mail, body.edge, body.context);
				return;
			case "start":
			case "node_id":
				throw new TraversalError(`Coordinator cannot handle ${body.category} mail`, {
					mailId: mail.id,
					category: mail.category,
				});
		}
	}

	private async performNode(node: Node): Promise<void> {
		let result: unknown;
		try {
			result = await this.performer.perform({ node, history: this.history, coordinatorId: this.id });
		} catch (err) {
			const reason = err instanceof Error ? err.message : String(err);
			throw new TraversalError(`Performing node ${node.id} failed: ${reason}`, { nodeId: node.id, category: "node" }, err);
		}
		this.entries.push({
			nodeId: node.id,
			kind: node.kind,
			label: node.label,
			result,
			completedAt: Date.now(),
		});
		this.log.debug("Node performed", { coordinator: this.id, nodeId: node.id });
	}

	private fork(nodes: readonly Node[]): void {
		if (!this.manager) {
			throw new TraversalError(`Coordinator ${this.id} cannot fork without a mail manager`);
		}
		for (const node of nodes) {
			const child = new Coordinator({
				executor: this.executorId,
				performer: this.performer,
				conditionEvaluator: this.conditionEvaluator,
				manager: this.manager,
				parent: this,
				history: this.entries,
				logger: this.log,
			});
			this.manager.addSources(child);
			this.childIds.push(child.id);
			child.receive(createMail(this.executorId, child, { category: "node", requestSource: child.id, node }));
		}
		this.log.debug("Forked branches", { coordinator: this.id, children: nodes.length });
	}

	private onEnd(mail: Mail): void {
		if (this.childIds.includes(mail.sender)) {
			this.endedChildren.add(mail.sender);
			if (this.endedChildren.size === this.childIds.length) this.finish();
			return;
		}
		if (mail.requestSource === this.id && this.childIds.length === 0) {
			this.finish();
		}
	}

	private finish(): void {
		if (this.done) return;
		this.done = true;
		this.log.debug("Branch complete", { coordinator: this.id, steps: this.entries.length });
		this.post(this.parentId ?? this.executorId, { category: "end", requestSource: this.id });
	}

	private async answerCondition(
		mail: Mail,
		edge: Edge,
		context: Readonly<Record<string, unknown>> | undefined,
	): Promise<void> {
		if (!this.conditionEvaluator) {
			throw new TraversalError(`Coordinator ${this.id} has no condition evaluator for edge ${edge.id}`, {
				mailId: mail.id,
				category: mail.category,
			});
		}
		const result = await this.conditionEvaluator.evaluate({ edge, context, history: this.history });
		this.post(mail.sender, {
			category: "condition",
			kind: "reply",
			requestSource: mail.requestSource,
			edgeId: edge.id,
			result,
		});
	}

	private post(recipient: IdType, body: MailBody): void {
		this.mailbox.post(createMail(this, recipient, body));
	}
}
