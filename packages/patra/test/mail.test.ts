import { describe, it, expect } from "vitest";
import { Element } from "@karya/core";
import { Node } from "@karya/jaala";
import { Mail, createMail } from "../src/mail.js";
import { Mailbox } from "../src/mailbox.js";

const source = new Element().id;

describe("Mail", () => {
	it("should resolve sender and recipient ids", () => {
		const a = new Element();
		const b = new Element();
		const mail = createMail(a, b.id, { category: "start", requestSource: source });
		expect(mail.sender).toBe(a.id);
		expect(mail.recipient).toBe(b.id);
		expect(mail.category).toBe("start");
		expect(mail.requestSource).toBe(source);
	});

	it("should be frozen once created", () => {
		const mail = createMail(new Element(), new Element(), { category: "end", requestSource: source });
		expect(Object.isFrozen(mail)).toBe(true);
		expect(Object.isFrozen(mail.body)).toBe(true);
	});

	it("should narrow bodies by category", () => {
		const node = new Node({ content: "x" });
		const mail = createMail(new Element(), new Element(), { category: "node", requestSource: source, node });
		const body = mail.body;
		expect(body.category === "node" ? body.node : undefined).toBe(node);
	});

	it("should serialize routing fields", () => {
		const mail = new Mail(new Element(), new Element(), { category: "end", requestSource: source });
		expect(mail.toJSON()).toEqual({
			id: mail.id,
			createdAt: mail.createdAt,
			sender: mail.sender,
			recipient: mail.recipient,
			category: "end",
			requestSource: source,
		});
	});
});

describe("Mailbox", () => {
	function mail(sender: Element): Mail {
		return createMail(sender, new Element(), { category: "node_id", requestSource: source, nodeId: new Element().id });
	}

	it("should drain the outbox in posting order", () => {
		const box = new Mailbox();
		const me = new Element();
		const [m1, m2] = [mail(me), mail(me)];
		box.post(m1);
		box.post(m2);
		expect(box.outgoingCount).toBe(2);
		expect(box.peekOutgoing()).toEqual([m1, m2]);
		expect(box.takeOutgoing()).toEqual([m1, m2]);
		expect(box.outgoingCount).toBe(0);
		expect(box.pile.length).toBe(0);
	});

	it("should queue incoming mail per sender", () => {
		const box = new Mailbox();
		const a = new Element();
		const b = new Element();
		const [a1, b1, a2] = [mail(a), mail(b), mail(a)];
		box.deliver(a1);
		box.deliver(b1);
		box.deliver(a2);
		expect(box.incomingCount).toBe(3);
		expect(box.senders()).toEqual([a.id, b.id]);
		expect(box.takeIncoming(a)).toEqual([a1, a2]);
		expect(box.senders()).toEqual([b.id]);
		expect(box.takeIncoming(a)).toEqual([]);
	});

	it("should hand out the oldest mail of the first sender", () => {
		const box = new Mailbox();
		const a = new Element();
		const b = new Element();
		const [a1, b1, a2] = [mail(a), mail(b), mail(a)];
		box.deliver(a1);
		box.deliver(b1);
		box.deliver(a2);
		expect(box.nextIncoming()).toBe(a1);
		expect(box.nextIncoming()).toBe(a2);
		expect(box.nextIncoming()).toBe(b1);
		expect(box.nextIncoming()).toBeUndefined();
		expect(box.hasIncoming).toBe(false);
	});
});
