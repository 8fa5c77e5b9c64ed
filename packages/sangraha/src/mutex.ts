/**
 * Async mutual exclusion with a fair FIFO wait queue.
 *
 * Waiters are promoted in arrival order when the holder releases. Not
 * re-entrant: acquiring twice from the same async flow deadlocks.
 */
export class Mutex {
	private locked = false;
	private readonly waiters: Array<() => void> = [];

	/** Whether the mutex is currently held. */
	get isLocked(): boolean {
		return this.locked;
	}

	/** Number of callers waiting for the lock. */
	get pending(): number {
		return this.waiters.length;
	}

	/**
	 * Wait for the lock. Resolves with a release function that must be
	 * called exactly once; extra calls are ignored.
	 */
	acquire(): Promise<() => void> {
		return new Promise((resolve) => {
			const grant = (): void => {
				this.locked = true;
				let released = false;
				resolve(() => {
					if (released) return;
					released = true;
					this.release();
				});
			};

			if (!this.locked) {
				grant();
			} else {
				this.waiters.push(grant);
			}
		});
	}

	/** Run `fn` while holding the lock, releasing it however `fn` settles. */
	async runExclusive<R>(fn: () => R | Promise<R>): Promise<R> {
		const release = await this.acquire();
		try {
			return await fn();
		} finally {
			release();
		}
	}

	private release(): void {
		const next = this.waiters.shift();
		if (next) {
			next();
		} else {
			this.locked = false;
		}
	}
}
