import { describe, it, expect } from "vitest";
import { DEFAULT_RUNTIME_SETTINGS, KaryaError, StructureError, TraversalError } from "@karya/core";
import type { RuntimeSettings } from "@karya/core";
import { ActionNode, ActionSelectionNode, Graph, Node, ToolNode, executableCondition } from "@karya/jaala";
import type { ConditionRequest, PerformContext, Performer } from "../src/coordinator.js";
import { WorkflowRunner } from "../src/runner.js";

function node(label: string): Node<string> {
	return new Node({ content: label, label });
}

const fast: RuntimeSettings = {
	...DEFAULT_RUNTIME_SETTINGS,
	mail: { refreshInterval: 1 },
	executor: { refreshInterval: 1, conditionTimeout: 1000 },
};

class Recorder implements Performer {
	readonly calls: Array<{ label?: string; seen: number }> = [];

	perform(ctx: PerformContext): string {
		this.calls.push({ label: ctx.node.label, seen: ctx.history.length });
		return `done:${ctx.node.label ?? ""}`;
	}
}

function labels(history: ReadonlyArray<{ label?: string }>): Array<string | undefined> {
	return history.map((h) => h.label);
}

describe("WorkflowRunner", () => {
	it("should walk a chain in order on a single branch", async () => {
		const nodes = ["a", "b", "c"].map(node);
		const graph = new Graph({ nodes });
		graph.addEdge(nodes[0], nodes[1]);
		graph.addEdge(nodes[1], nodes[2]);
		const performer = new Recorder();
		const runner = new WorkflowRunner({ graph, performer, settings: fast });

		const result = await runner.run();

		expect(result.rootId).toBe(runner.root.id);
		expect(result.branches).toHaveLength(1);
		expect(labels(result.branches[0].history)).toEqual(["a", "b", "c"]);
		expect(result.branches[0].history.map((h) => h.result)).toEqual(["done:a", "done:b", "done:c"]);
		expect(performer.calls.map((c) => c.seen)).toEqual([0, 1, 2]);
		expect(result.steps).toBeGreaterThan(0);
		expect(runner.executor.stopped).toBe(true);
		expect(runner.manager.pendingCount).toBe(0);
	});

	it("should finish at once on an empty graph", async () => {
		const runner = new WorkflowRunner({ graph: new Graph(), performer: new Recorder(), settings: fast });
		const result = await runner.run();
		expect(result.branches).toEqual([
			{ coordinatorId: runner.root.id, parentId: undefined, children: [], history: [] },
		]);
		expect(runner.executor.stopped).toBe(true);
	});

	it("should fork a branch per successor and join when all end", async () => {
		const [start, left, right, tail] = ["start", "left", "right", "tail"].map(node);
		const graph = new Graph({ nodes: [start, left, right, tail] });
		graph.addEdge(start, left);
		graph.addEdge(start, right);
		graph.addEdge(right, tail);

		const result = await new WorkflowRunner({ graph, performer: new Recorder(), settings: fast }).run();

		expect(result.branches).toHaveLength(3);
		const [root, leftBranch, rightBranch] = result.branches;
		expect(labels(root.history)).toEqual(["start"]);
		expect(root.children).toEqual([leftBranch.coordinatorId, rightBranch.coordinatorId]);
		expect(leftBranch.parentId).toBe(root.coordinatorId);
		expect(labels(leftBranch.history)).toEqual(["start", "left"]);
		expect(labels(rightBranch.history)).toEqual(["start", "right", "tail"]);
	});

	it("should start one branch per head", async () => {
		const graph = new Graph({ nodes: [node("x"), node("y")] });
		const result = await new WorkflowRunner({ graph, performer: new Recorder(), settings: fast }).run();
		const [root, ...children] = result.branches;
		expect(root.history).toEqual([]);
		expect(children.map((c) => labels(c.history))).toEqual([["x"], ["y"]]);
	});

	it("should follow only the edges the evaluator accepts", async () => {
		const [a, b, c] = ["a", "b", "c"].map(node);
		const graph = new Graph({ nodes: [a, b, c] });
		graph.addEdge(a, b, { condition: executableCondition({ context: { route: "b" } }) });
		graph.addEdge(a, c, { condition: executableCondition({ context: { route: "c" } }) });

		const asked: ConditionRequest[] = [];
		const runner = new WorkflowRunner({
			graph,
			performer: new Recorder(),
			conditionEvaluator: {
				evaluate: (request) => {
					asked.push(request);
					return request.context?.route === "c";
				},
			},
			settings: fast,
		});
		const result = await runner.run();

		expect(asked.map((r) => r.context?.route)).toEqual(["b", "c"]);
		expect(asked.map((r) => labels(r.history))).toEqual([["a"], ["a"]]);
		expect(result.branches).toHaveLength(1);
		expect(labels(result.branches[0].history)).toEqual(["a", "c"]);
		expect(runner.executor.pendingConditionCount).toBe(0);
	});

	it("should hand bundled instructions to the performer as action nodes", async () => {
		const instruction = node("instruction");
		const tool = new ToolNode({ name: "lookup" });
		const graph = new Graph({ nodes: [instruction, tool] });
		graph.addEdge(instruction, tool, { bundle: true });

		const performed: Node[] = [];
		const result = await new WorkflowRunner({
			graph,
			performer: {
				perform: (ctx) => {
					performed.push(ctx.node);
					return ctx.node.kind;
				},
			},
			settings: fast,
		}).run();

		expect(performed).toHaveLength(1);
		expect(performed[0]).toBeInstanceOf(ActionNode);
		expect(performed[0].id).toBe(instruction.id);
		expect(result.branches[0].history.map((h) => h.result)).toEqual(["ActionNode"]);
	});

	it("should fold an action selection into the performed node", async () => {
		const instruction = node("pick");
		const choice = new ActionSelectionNode({ action: "lookup", args: { key: "placeholder" } });
		const graph = new Graph({ nodes: [instruction, choice] });
		graph.addEdge(instruction, choice, { bundle: true });

		const actions: Array<string | undefined> = [];
		await new WorkflowRunner({
			graph,
			performer: {
				perform: (ctx) => {
					if (ctx.node instanceof ActionNode) actions.push(ctx.node.action);
					return null;
				},
			},
			settings: fast,
		}).run();
		expect(actions).toEqual(["lookup"]);
	});

	it("should keep performer edits to a node out of the graph", async () => {
		const a = new Node({ content: "a", label: "a", metadata: { step: 1 } });
		const graph = new Graph({ nodes: [a] });

		const result = await new WorkflowRunner({
			graph,
			performer: {
				perform: (ctx) => {
					ctx.node.metadata.step = 999;
					return null;
				},
			},
			settings: fast,
		}).run();

		expect(labels(result.branches[0].history)).toEqual(["a"]);
		expect(graph.getNode(a.id)).toBe(a);
		expect(graph.getNode(a.id).metadata).toEqual({ step: 1 });
	});

	describe("failures", () => {
		it("should refuse a cyclic graph", async () => {
			const [a, b] = [node("a"), node("b")];
			const graph = new Graph({ nodes: [a, b] });
			graph.addEdge(a, b);
			graph.addEdge(b, a);
			await expect(new WorkflowRunner({ graph, performer: new Recorder() }).run()).rejects.toThrow(StructureError);
		});

		it("should run only once", async () => {
			const runner = new WorkflowRunner({ graph: new Graph(), performer: new Recorder(), settings: fast });
			await runner.run();
			await expect(runner.run()).rejects.toMatchObject({ code: "RUNNER_REUSED" });
		});

		it("should surface performer failures and stop the executor", async () => {
			const a = node("a");
			const runner = new WorkflowRunner({
				graph: new Graph({ nodes: [a] }),
				performer: {
					perform: () => {
						throw new Error("boom");
					},
				},
				settings: fast,
			});
			await expect(runner.run()).rejects.toThrow(`Performing node ${a.id} failed: boom`);
			expect(runner.executor.stopped).toBe(true);
		});

		it("should fail when a condition has nobody to answer it", async () => {
			const [a, b] = [node("a"), node("b")];
			const graph = new Graph({ nodes: [a, b] });
			graph.addEdge(a, b, { condition: executableCondition() });
			const runner = new WorkflowRunner({ graph, performer: new Recorder(), settings: fast });

			const err = await runner.run().then(
				() => undefined,
				(e: unknown) => e,
			);
			expect(err).toBeInstanceOf(TraversalError);
			expect(runner.executor.stopped).toBe(true);
			expect(runner.executor.pendingConditionCount).toBe(0);
		});

		it("should give up after the step limit", async () => {
			const nodes = ["a", "b", "c"].map(node);
			const graph = new Graph({ nodes });
			graph.addEdge(nodes[0], nodes[1]);
			graph.addEdge(nodes[1], nodes[2]);
			const settings: RuntimeSettings = { ...fast, runner: { maxSteps: 2 } };

			const err = await new WorkflowRunner({ graph, performer: new Recorder(), settings }).run().then(
				() => undefined,
				(e: unknown) => e,
			);
			expect(err).toBeInstanceOf(KaryaError);
			expect(err).toMatchObject({ code: "STEP_LIMIT_EXCEEDED", message: "Workflow exceeded 2 steps" });
		});
	});
});
