/**
 * Exclusive lock for writers of one index instance. Callers queue in arrival order.
 */
export class WriteLock {
	private tail: Promise<void> = Promise.resolve()
	private pending = 0

	/** Runs `task` once every earlier holder has released the lock. */
	async runExclusive<T>(task: () => T | Promise<T>): Promise<T> {
		const previous = this.tail
		let release: () => void = () => {}
		this.tail = new Promise<void>((resolve) => {
			release = resolve
		})
		this.pending++

		try {
			await previous
			return await task()
		}
		finally {
			this.pending--
			release()
		}
	}

	/** Number of holders and waiters. */
	get queueLength(): number {
		return this.pending
	}
}
