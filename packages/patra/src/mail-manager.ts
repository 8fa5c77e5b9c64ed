/**
 * MailManager: moves mail between registered sources.
 *
 * `collect` drains a sender's outbox into per-recipient, per-sender buckets;
 * `send` empties every bucket addressed to a recipient into its `receive`.
 * Delivery is FIFO within a (sender, recipient) pair and at most once per
 * call. Nothing is ordered across senders.
 *
 * Events are emitted through a simple callback array (no EventEmitter).
 */

import {
	DEFAULT_RUNTIME_SETTINGS,
	Element,
	ItemNotFoundError,
	createLogger,
	getId,
	sleep,
} from "@karya/core";
import type { IdRef, IdType, Logger } from "@karya/core";
import { Pile, Progression } from "@karya/sangraha";
import { Mail } from "./mail.js";
import type { Mailbox } from "./mailbox.js";

// ─── Types ───────────────────────────────────────────────────────────────────

/** Anything that owns a mailbox and accepts delivered mail. */
export interface MailSource extends Element {
	readonly mailbox: Mailbox;
	receive(mail: Mail): void;
}

export type MailManagerEvent =
	| { type: "collected"; sender: IdType; count: number }
	| { type: "delivered"; recipient: IdType; count: number };

export type MailManagerEventHandler = (event: MailManagerEvent) => void;

export interface MailManagerOptions {
	sources?: MailSource | Iterable<MailSource>;
	/** Sleep between rounds of {@link MailManager.execute}, in ms. */
	refreshInterval?: number;
	logger?: Logger;
}

// ─── MailManager ─────────────────────────────────────────────────────────────

export class MailManager extends Element {
	readonly sources = new Pile<MailSource>({ name: "sources" });
	/** recipient id → sender id → queued mail ids */
	readonly mails = new Map<IdType, Map<IdType, Progression>>();

	private readonly inTransit = new Pile<Mail>({ itemTypes: [Mail] });
	private readonly eventHandlers: MailManagerEventHandler[] = [];
	private readonly refreshInterval: number;
	private readonly log: Logger;
	private execStop = false;

	constructor(opts: MailManagerOptions = {}) {
		super();
		this.refreshInterval = opts.refreshInterval ?? DEFAULT_RUNTIME_SETTINGS.mail.refreshInterval;
		this.log = opts.logger ?? createLogger("patra:mail-manager");
		if (opts.sources) this.addSources(opts.sources);
	}

	/** Mail collected but not yet sent. */
	get pendingCount(): number {
		return this.inTransit.length;
	}

	get stopped(): boolean {
		return this.execStop;
	}

	// ─── Events ──────────────────────────────────────────────────────────

	/**
	 * Register a handler for manager events.
	 * @returns An unsubscribe function.
	 */
	on(handler: MailManagerEventHandler): () => void {
		this.eventHandlers.push(handler);
		return () => {
			const idx = this.eventHandlers.indexOf(handler);
			if (idx >= 0) this.eventHandlers.splice(idx, 1);
		};
	}

	private emit(event: MailManagerEvent): void {
		for (const h of this.eventHandlers) {
			try {
				h(event);
			} catch (err) {
				this.log.warn("Mail event handler failed", { event: event.type, error: String(err) });
			}
		}
	}

	// ─── Registry ────────────────────────────────────────────────────────

	addSources(sources: MailSource | Iterable<MailSource>): void {
		this.sources.include(sources);
		for (const source of this.sources) {
			if (!this.mails.has(source.id)) this.mails.set(source.id, new Map());
		}
	}

	/**
	 * Unregister a source and drop any mail still waiting for it.
	 *
	 * @throws ItemNotFoundError if the source is not registered.
	 */
	deleteSource(ref: IdRef): void {
		const source = this.sources.pop(getId(ref), undefined);
		if (source === undefined) throw new ItemNotFoundError(ref);
		const buckets = this.mails.get(source.id);
		if (buckets) {
			for (const queue of buckets.values()) this.inTransit.exclude(queue.toArray());
		}
		this.mails.delete(source.id);
	}

	// ─── Routing ─────────────────────────────────────────────────────────

	/**
	 * Drain a sender's outbox into the recipients' buckets.
	 *
	 * @throws ItemNotFoundError if the sender, or the recipient of any
	 * outgoing mail, is not registered. The outbox is left untouched then.
	 */
	collect(senderRef: IdRef): number {
		const sender = this.sources.get(senderRef);
		for (const mail of sender.mailbox.peekOutgoing()) {
			if (!this.mails.has(mail.recipient)) {
				throw new ItemNotFoundError(mail.recipient, `Recipient source ${mail.recipient} does not exist`);
			}
		}

		const outgoing = sender.mailbox.takeOutgoing();
		for (const mail of outgoing) {
			const buckets = this.bucketsFor(mail.recipient);
			let queue = buckets.get(sender.id);
			if (!queue) {
				queue = new Progression({ name: sender.id });
				buckets.set(sender.id, queue);
			}
			queue.append(mail);
			this.inTransit.append(mail);
		}

		if (outgoing.length > 0) {
			this.log.debug("Collected mail", { sender: sender.id, count: outgoing.length });
			this.emit({ type: "collected", sender: sender.id, count: outgoing.length });
		}
		return outgoing.length;
	}

	/**
	 * Deliver every bucket addressed to a recipient, one mail at a time. A
	 * bucket is deleted once drained. If `receive` throws, the mail behind
	 * the failing one stays queued for the next send.
	 *
	 * @throws ItemNotFoundError if the recipient is not registered.
	 */
	send(recipientRef: IdRef): number {
		const recipient = this.sources.get(recipientRef);
		const buckets = this.bucketsFor(recipient.id);
		let count = 0;

		for (const [senderId, queue] of [...buckets]) {
			while (queue.length > 0) {
				const mail = this.inTransit.pop(queue.popLeft(), undefined);
				if (mail === undefined) continue;
				recipient.receive(mail);
				count++;
			}
			buckets.delete(senderId);
		}

		if (count > 0) {
			this.log.debug("Delivered mail", { recipient: recipient.id, count });
			this.emit({ type: "delivered", recipient: recipient.id, count });
		}
		return count;
	}

	collectAll(): number {
		let total = 0;
		for (const source of this.sources) total += this.collect(source);
		return total;
	}

	sendAll(): number {
		let total = 0;
		for (const source of this.sources) total += this.send(source);
		return total;
	}

	// ─── Loop ────────────────────────────────────────────────────────────

	/** Collect and send on every source until {@link stop} is called. */
	async execute(refreshInterval = this.refreshInterval): Promise<void> {
		this.execStop = false;
		this.log.info("Mail loop started", { sources: this.sources.length, refreshInterval });
		while (!this.execStop) {
			this.collectAll();
			this.sendAll();
			await sleep(refreshInterval);
		}
		this.log.info("Mail loop stopped");
	}

	stop(): void {
		this.execStop = true;
	}

	private bucketsFor(recipient: IdType): Map<IdType, Progression> {
		const buckets = this.mails.get(recipient);
		if (!buckets) throw new ItemNotFoundError(recipient, `Recipient source ${recipient} does not exist`);
		return buckets;
	}
}
