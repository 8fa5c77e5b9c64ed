import { describe, it, expect, vi } from "vitest";
import { Element, ItemNotFoundError } from "@karya/core";
import { createMail } from "../src/mail.js";
import type { Mail } from "../src/mail.js";
import { Mailbox } from "../src/mailbox.js";
import { MailManager } from "../src/mail-manager.js";
import type { MailManagerEvent, MailSource } from "../src/mail-manager.js";

class Actor extends Element implements MailSource {
	readonly mailbox = new Mailbox();
	readonly received: Mail[] = [];

	receive(mail: Mail): void {
		this.received.push(mail);
		this.mailbox.deliver(mail);
	}

	say(to: Element, tag: string): Mail {
		const mail = createMail(this, to, { category: "end", requestSource: this.id });
		tags.set(mail.id, tag);
		this.mailbox.post(mail);
		return mail;
	}
}

const tags = new Map<string, string>();

function tagsOf(mails: readonly Mail[]): Array<string | undefined> {
	return mails.map((m) => tags.get(m.id));
}

describe("MailManager", () => {
	it("should register sources with empty buckets", () => {
		const [a, b] = [new Actor(), new Actor()];
		const manager = new MailManager({ sources: [a, b] });
		expect(manager.sources.length).toBe(2);
		expect(manager.mails.get(a.id)?.size).toBe(0);
	});

	it("should collect into recipient/sender buckets and empty the outbox", () => {
		const [a, b] = [new Actor(), new Actor()];
		const manager = new MailManager({ sources: [a, b] });
		a.say(b, "a1");
		a.say(b, "a2");
		expect(manager.collect(a)).toBe(2);
		expect(a.mailbox.outgoingCount).toBe(0);
		expect(manager.mails.get(b.id)?.get(a.id)?.length).toBe(2);
		expect(manager.pendingCount).toBe(2);
	});

	it("should deliver FIFO per sender and delete drained buckets", () => {
		const [a, b, c] = [new Actor(), new Actor(), new Actor()];
		const manager = new MailManager({ sources: [a, b, c] });
		a.say(c, "a1");
		b.say(c, "b1");
		a.say(c, "a2");
		manager.collectAll();
		expect(manager.send(c)).toBe(3);
		expect(tagsOf(c.received)).toEqual(["a1", "a2", "b1"]);
		expect(manager.mails.get(c.id)?.size).toBe(0);
		expect(manager.pendingCount).toBe(0);
		expect(manager.send(c)).toBe(0);
	});

	it("should keep the rest of a bucket queued when receive throws", () => {
		let refuse = true;
		class Flaky extends Actor {
			receive(mail: Mail): void {
				if (refuse) {
					refuse = false;
					throw new Error("inbox unavailable");
				}
				super.receive(mail);
			}
		}
		const [a, b] = [new Actor(), new Flaky()];
		const manager = new MailManager({ sources: [a, b] });
		a.say(b, "a1");
		a.say(b, "a2");
		a.say(b, "a3");
		manager.collect(a);

		expect(() => manager.send(b)).toThrow("inbox unavailable");
		expect(manager.pendingCount).toBe(2);
		expect(manager.mails.get(b.id)?.get(a.id)?.length).toBe(2);

		expect(manager.send(b)).toBe(2);
		expect(tagsOf(b.received)).toEqual(["a2", "a3"]);
		expect(manager.pendingCount).toBe(0);
		expect(manager.mails.get(b.id)?.size).toBe(0);
	});

	it("should deliver each mail at most once", () => {
		const [a, b] = [new Actor(), new Actor()];
		const manager = new MailManager({ sources: [a, b] });
		a.say(b, "once");
		manager.collectAll();
		manager.sendAll();
		manager.collectAll();
		manager.sendAll();
		expect(tagsOf(b.received)).toEqual(["once"]);
	});

	it("should reject an unknown sender", () => {
		const manager = new MailManager();
		expect(() => manager.collect(new Actor())).toThrow(ItemNotFoundError);
	});

	it("should reject mail for an unregistered recipient and keep the outbox", () => {
		const a = new Actor();
		const manager = new MailManager({ sources: a });
		a.say(new Actor(), "lost");
		expect(() => manager.collect(a)).toThrow(ItemNotFoundError);
		expect(a.mailbox.outgoingCount).toBe(1);
	});

	it("should reject send to an unknown recipient", () => {
		const manager = new MailManager();
		expect(() => manager.send(new Actor())).toThrow(ItemNotFoundError);
	});

	it("should delete sources and drop their pending mail", () => {
		const [a, b] = [new Actor(), new Actor()];
		const manager = new MailManager({ sources: [a, b] });
		a.say(b, "x");
		manager.collect(a);
		manager.deleteSource(b);
		expect(manager.sources.has(b)).toBe(false);
		expect(manager.pendingCount).toBe(0);
		expect(() => manager.deleteSource(b)).toThrow(ItemNotFoundError);
	});

	it("should emit collected and delivered events", () => {
		const [a, b] = [new Actor(), new Actor()];
		const manager = new MailManager({ sources: [a, b] });
		const events: MailManagerEvent[] = [];
		const off = manager.on((e) => events.push(e));
		a.say(b, "x");
		manager.collectAll();
		manager.sendAll();
		expect(events).toEqual([
			{ type: "collected", sender: a.id, count: 1 },
			{ type: "delivered", recipient: b.id, count: 1 },
		]);
		off();
		a.say(b, "y");
		manager.collectAll();
		expect(events).toHaveLength(2);
	});

	it("should keep routing when an event handler throws", () => {
		const [a, b] = [new Actor(), new Actor()];
		const manager = new MailManager({ sources: [a, b] });
		manager.on(() => {
			throw new Error("observer failed");
		});
		a.say(b, "x");
		expect(() => manager.collectAll()).not.toThrow();
		expect(manager.sendAll()).toBe(1);
	});

	it("should loop until stopped", async () => {
		vi.useFakeTimers();
		try {
			const [a, b] = [new Actor(), new Actor()];
			const manager = new MailManager({ sources: [a, b], refreshInterval: 10 });
			const running = manager.execute();
			a.say(b, "late");
			await vi.advanceTimersByTimeAsync(10);
			expect(tagsOf(b.received)).toEqual(["late"]);
			manager.stop();
			await vi.advanceTimersByTimeAsync(10);
			await running;
			expect(manager.stopped).toBe(true);
		} finally {
			vi.useRealTimers();
		}
	});
});
