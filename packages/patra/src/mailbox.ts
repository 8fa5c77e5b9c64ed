/**
 * Mailbox: an actor's outbox and per-sender inboxes.
 *
 * Outgoing mail waits in `pendingOuts` until a MailManager collects it.
 * Incoming mail is queued per sender in `pendingIns`, FIFO within each
 * sender. The mails themselves live in `pile` while they sit in the box.
 */

import { getId } from "@karya/core";
import type { IdRef, IdType } from "@karya/core";
import { Pile, Progression } from "@karya/sangraha";
import { Mail } from "./mail.js";

export class Mailbox {
	readonly pile = new Pile<Mail>({ itemTypes: [Mail] });
	readonly pendingOuts = new Progression({ name: "outbox" });
	readonly pendingIns = new Map<IdType, Progression>();

	get outgoingCount(): number {
		return this.pendingOuts.length;
	}

	get incomingCount(): number {
		let total = 0;
		for (const queue of this.pendingIns.values()) total += queue.length;
		return total;
	}

	get hasIncoming(): boolean {
		return this.incomingCount > 0;
	}

	/** Senders with queued incoming mail, in first-arrival order. */
	senders(): IdType[] {
		return [...this.pendingIns.entries()]
			.filter(([, queue]) => queue.length > 0)
			.map(([sender]) => sender);
	}

	// ─── Outbox ──────────────────────────────────────────────────────────

	post(mail: Mail): void {
		this.pile.append(mail);
		this.pendingOuts.append(mail);
	}

	/** Outgoing mail in posting order, without removing it. */
	peekOutgoing(): Mail[] {
		return this.pendingOuts.toArray().map((id) => this.pile.get(id));
	}

	/** Drain the outbox in posting order. */
	takeOutgoing(): Mail[] {
		const out: Mail[] = [];
		while (this.pendingOuts.length > 0) {
			out.push(this.pile.pop(this.pendingOuts.popLeft()));
		}
		return out;
	}

	// ─── Inbox ───────────────────────────────────────────────────────────

	deliver(mail: Mail): void {
		let queue = this.pendingIns.get(mail.sender);
		if (!queue) {
			queue = new Progression({ name: mail.sender });
			this.pendingIns.set(mail.sender, queue);
		}
		this.pile.append(mail);
		queue.append(mail);
	}

	/** Drain every mail queued from one sender, oldest first. */
	takeIncoming(sender: IdRef): Mail[] {
		const id = getId(sender);
		const queue = this.pendingIns.get(id);
		if (!queue) return [];
		const out: Mail[] = [];
		while (queue.length > 0) {
			out.push(this.pile.pop(queue.popLeft()));
		}
		this.pendingIns.delete(id);
		return out;
	}

	/** Oldest mail from the first sender that has any, or `undefined`. */
	nextIncoming(): Mail | undefined {
		for (const [sender, queue] of this.pendingIns) {
			if (queue.length === 0) continue;
			const mail = this.pile.pop(queue.popLeft());
			if (queue.length === 0) this.pendingIns.delete(sender);
			return mail;
		}
		return undefined;
	}
}
