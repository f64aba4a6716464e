/**
 * Promise-based mutual exclusion.
 *
 * Waiters are served in FIFO order; the lock is handed directly to the next
 * waiter on release so no third caller can slip in between.
 */
export class AsyncLock {
	private queue: Array<() => void> = [];
	private locked = false;

	acquire(): Promise<void> {
		return new Promise<void>(resolve => {
			if (!this.locked) {
				this.locked = true;
				resolve();
			} else {
				this.queue.push(resolve);
			}
		});
	}

	release(): void {
		if (!this.locked) {
			throw new Error('Cannot release a lock that is not acquired');
		}

		const next = this.queue.shift();
		if (next) {
			next();
		} else {
			this.locked = false;
		}
	}

	/**
	 * Run `fn` while holding the lock, releasing it even if `fn` throws.
	 */
	async withLock<T>(fn: () => Promise<T>): Promise<T> {
		await this.acquire();
		try {
			return await fn();
		} finally {
			this.release();
		}
	}

	isLocked(): boolean {
		return this.locked;
	}

	getQueueLength(): number {
		return this.queue.length;
	}
}
