/**
 * Executor: walks a Graph on behalf of the actors that mail it.
 *
 * Each traversal is keyed by the `requestSource` of its mail. A `start`
 * mail answers with the graph heads; a `node` or `node_id` mail answers
 * with the nodes reachable through passing, non-bundle edges. An empty
 * answer is sent as `end` and closes that traversal. An `end` mail
 * addressed to the executor stops it.
 *
 * Executable edge conditions are asked of another actor by mail. The
 * reply arrives through {@link Executor.receive}, which settles the
 * pending request directly instead of queuing it.
 */

import {
	DEFAULT_RUNTIME_SETTINGS,
	ConditionTimeoutError,
	Element,
	KaryaError,
	StructureError,
	TraversalError,
	createDeferred,
	createLogger,
	sleep,
} from "@karya/core";
import type { Deferred, IdType, Logger } from "@karya/core";
import { ActionNode } from "@karya/jaala";
import type { Edge, Graph, Node } from "@karya/jaala";
import { Mailbox, createMail } from "@karya/patra";
import type { Mail, MailBody, MailSource } from "@karya/patra";

// ─── Types ───────────────────────────────────────────────────────────────────

export type TraversalState = "running" | "terminal";

export interface ExecutorOptions {
	graph: Graph;
	/** Sleep between {@link Executor.execute} steps, in ms. */
	refreshInterval?: number;
	/** How long to wait for an executable condition reply, in ms. */
	conditionTimeout?: number;
	/** Ended traversal ids remembered for duplicate detection. Default: 1000 */
	endedHistory?: number;
	logger?: Logger;
}

interface PendingCondition {
	deferred: Deferred<boolean>;
	timer: ReturnType<typeof setTimeout>;
}

// ─── Executor ────────────────────────────────────────────────────────────────

export class Executor extends Element implements MailSource {
	readonly mailbox = new Mailbox();
	readonly graph: Graph;

	private readonly running = new Set<IdType>();
	// insertion order doubles as age; the oldest id is evicted first
	private readonly ended = new Set<IdType>();
	private readonly endedHistory: number;
	private readonly pendingConditions = new Map<string, PendingCondition>();
	private readonly refreshInterval: number;
	private readonly conditionTimeout: number;
	private readonly log: Logger;
	private execStop = false;

	constructor(opts: ExecutorOptions) {
		super();
		this.graph = opts.graph;
		this.refreshInterval = opts.refreshInterval ?? DEFAULT_RUNTIME_SETTINGS.executor.refreshInterval;
		this.conditionTimeout = opts.conditionTimeout ?? DEFAULT_RUNTIME_SETTINGS.executor.conditionTimeout;
		this.endedHistory = opts.endedHistory ?? 1000;
		this.log = opts.logger ?? createLogger("pravaha:executor");
	}

	get stopped(): boolean {
		return this.execStop;
	}

	/**
	 * State of one traversal, or `undefined` if it never started or ended
	 * long enough ago to have been forgotten.
	 */
	traversalState(requestSource: IdType): TraversalState | undefined {
		if (this.running.has(requestSource)) return "running";
		return this.ended.has(requestSource) ? "terminal" : undefined;
	}

	get activeTraversalCount(): number {
		return this.running.size;
	}

	/** Number of executable conditions awaiting a reply. */
	get pendingConditionCount(): number {
		return this.pendingConditions.size;
	}

	// ─── Mail intake ─────────────────────────────────────────────────────

	receive(mail: Mail): void {
		const body = mail.body;
		if (body.category === "condition" && body.kind === "reply") {
			const key = conditionKey(body.requestSource, body.edgeId);
			const pending = this.pendingConditions.get(key);
			if (!pending) {
				this.log.warn("Dropping condition reply with no pending request", {
					edgeId: body.edgeId,
					requestSource: body.requestSource,
				});
				return;
			}
			clearTimeout(pending.timer);
			this.pendingConditions.delete(key);
			pending.deferred.resolve(body.result);
			return;
		}
		this.mailbox.deliver(mail);
	}

	// ─── Stepping ────────────────────────────────────────────────────────

	/**
	 * Interpret queued mail, oldest first within each sender, until the inbox
	 * is empty or an `end` mail stops the executor. Does nothing once stopped.
	 *
	 * @throws TraversalError wrapping whatever failed while interpreting a mail.
	 */
	async forward(): Promise<void> {
		if (this.execStop) return;
		let mail = this.mailbox.nextIncoming();
		while (mail !== undefined) {
			if (mail.category === "end") {
				this.log.info("Stop requested", { sender: mail.sender });
				this.stop();
				return;
			}
			try {
				await this.interpret(mail);
			} catch (err) {
				throw this.wrap(err, mail);
			}
			if (this.execStop) return;
			mail = this.mailbox.nextIncoming();
		}
	}

	/**
	 * Run {@link forward} in a loop until stopped.
	 *
	 * @throws StructureError if the graph has a cycle.
	 */
	async execute(refreshInterval = this.refreshInterval): Promise<void> {
		if (!this.graph.isAcyclic()) {
			throw new StructureError(`Graph ${this.graph.id} is not acyclic`);
		}
		this.execStop = false;
		this.log.info("Executor started", { graph: this.graph.id, nodes: this.graph.nodeCount });
		while (!this.execStop) {
			await this.forward();
			await sleep(refreshInterval);
		}
		this.log.info("Executor stopped", { graph: this.graph.id });
	}

	/** Stop looping and fail every condition still waiting for a reply. */
	stop(): void {
		this.execStop = true;
		for (const [key, pending] of this.pendingConditions) {
			clearTimeout(pending.timer);
			pending.deferred.reject(new KaryaError("Executor stopped while awaiting a condition reply", "EXECUTOR_STOPPED"));
			this.pendingConditions.delete(key);
		}
	}

	// ─── Interpretation ──────────────────────────────────────────────────

	private async interpret(mail: Mail): Promise<void> {
		const body = mail.body;
		switch (body.category) {
			case "start": {
				if (this.traversalState(body.requestSource) !== undefined) {
					throw new TraversalError(`Traversal ${body.requestSource} was already started`);
				}
				this.running.add(body.requestSource);
				this.reply(mail, this.graph.getHeads().map((head) => this.outgoing(head)));
				return;
			}
			case "node":
				return this.advance(mail, body.node.id);
			case "node_id":
				return this.advance(mail, body.nodeId);
			case "node_list":
			case "condition":
				throw new TraversalError(`Executor cannot interpret ${describeBody(body)} mail`);
			case "end":
				// handled by forward()
				return;
		}
	}

	private async advance(mail: Mail, nodeId: IdType): Promise<void> {
		const requestSource = mail.requestSource;
		if (this.ended.has(requestSource)) {
			throw new TraversalError(`Traversal ${requestSource} has already ended`);
		}
		if (!this.graph.has(nodeId)) {
			throw new TraversalError(`Node ${nodeId} does not exist in graph ${this.graph.id}`);
		}
		this.running.add(requestSource);

		const current = this.graph.getNode(nodeId);
		const next: Node[] = [];
		for (const edge of this.graph.findNodeEdges(current, "out")) {
			if (edge.bundle) continue;
			if (edge.condition && !(await this.checkCondition(edge, mail))) continue;
			next.push(this.outgoing(this.graph.getNode(edge.tail)));
		}
		this.reply(mail, next);
	}

	/**
	 * Copy of a node for mailing, with its outgoing bundle targets folded
	 * into an ActionNode. Graph nodes never leave the executor themselves.
	 */
	private outgoing(node: Node): Node {
		const bundled = this.graph
			.findNodeEdges(node, "out")
			.filter((edge) => edge.bundle)
			.map((edge) => this.graph.getNode(edge.tail).copy());
		return bundled.length > 0 ? ActionNode.fromBundle(node.copy(), bundled) : node.copy();
	}

	private reply(mail: Mail, next: Node[]): void {
		const requestSource = mail.requestSource;
		let body: MailBody;
		if (next.length === 0) {
			body = { category: "end", requestSource };
			this.markEnded(requestSource);
		} else if (next.length === 1) {
			body = { category: "node", requestSource, node: next[0] };
		} else {
			body = { category: "node_list", requestSource, nodes: next };
		}
		this.mailbox.post(createMail(this, mail.sender, body));
		this.log.debug("Traversal step", { requestSource, category: body.category, next: next.length });
	}

	private markEnded(requestSource: IdType): void {
		this.running.delete(requestSource);
		this.ended.add(requestSource);
		if (this.ended.size > this.endedHistory) {
			const oldest = this.ended.values().next();
			if (!oldest.done) this.ended.delete(oldest.value);
		}
	}

	// ─── Conditions ──────────────────────────────────────────────────────

	private async checkCondition(edge: Edge, mail: Mail): Promise<boolean> {
		const condition = edge.condition;
		if (!condition) return true;
		if (condition.sourceType === "structure") {
			return condition.check(this.graph);
		}

		const requestSource = mail.requestSource;
		const key = conditionKey(requestSource, edge.id);
		if (this.pendingConditions.has(key)) {
			throw new TraversalError(`Condition for edge ${edge.id} is already pending`);
		}

		const deferred = createDeferred<boolean>();
		const timeoutMs = this.conditionTimeout;
		const timer = setTimeout(() => {
			this.pendingConditions.delete(key);
			deferred.reject(new ConditionTimeoutError(edge.id, timeoutMs));
		}, timeoutMs);
		this.pendingConditions.set(key, { deferred, timer });

		this.mailbox.post(createMail(this, condition.executableId ?? mail.sender, {
			category: "condition",
			kind: "request",
			requestSource,
			edge: edge.copy(),
			context: condition.context,
		}));
		this.log.debug("Condition requested", { edgeId: edge.id, requestSource });
		return deferred.promise;
	}

	private wrap(err: unknown, mail: Mail): TraversalError {
		const body = mail.body;
		const nodeId = body.category === "node"
			? body.node.id
			: body.category === "node_id" ? body.nodeId : undefined;
		const reason = err instanceof Error ? err.message : String(err);
		this.log.error("Failed to interpret mail", err, { mailId: mail.id, category: mail.category, nodeId });
		return new TraversalError(
			`Error handling ${mail.category} mail ${mail.id}: ${reason}`,
			{ mailId: mail.id, category: mail.category, nodeId },
			err,
		);
	}
}

function conditionKey(requestSource: IdType, edgeId: IdType): string {
	return `${requestSource}:${edgeId}`;
}

function describeBody(body: Readonly<MailBody>): string {
	return body.category === "condition" ? `condition ${body.kind}` : body.category;
}
