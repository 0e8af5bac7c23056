/**
 * Bridges callback-style progress into an async generator.
 *
 * Work running in a promise pushes events; the generator side yields them as
 * they arrive and finally returns the work's result (or rethrows its error).
 */
export class EventChannel<E> {
	private readonly queue: E[] = []
	private wake: (() => void) | null = null

	push(event: E): void {
		this.queue.push(event)
		this.notify()
	}

	async *drain<T>(work: Promise<T>): AsyncGenerator<E, T> {
		let settled = false
		const markSettled = (): void => {
			settled = true
			this.notify()
		}
		// Only tracks completion; the outcome is observed by the await below
		void work.then(markSettled, markSettled)

		while (!settled || this.queue.length > 0) {
			const next = this.queue.shift()
			if (next !== undefined) {
				yield next
			} else if (!settled) {
				await new Promise<void>(resolve => {
					this.wake = resolve
				})
			}
		}

		return await work
	}

	private notify(): void {
		if (this.wake) {
			const wake = this.wake
			this.wake = null
			wake()
		}
	}
}
