/**
 * Concurrency control for running specialists side by side.
 */

/**
 * Simple counting semaphore for limiting concurrency across independently-scheduled async work.
 */
export class Semaphore {
	#max: number;
	#current = 0;
	#queue: Array<() => void> = [];

	constructor(max: number) {
		this.#max = Math.max(1, Math.floor(max) || 1);
	}

	get active(): number {
		return this.#current;
	}

	async acquire(): Promise<void> {
		if (this.#current < this.#max) {
			this.#current++;
			return;
		}
		return new Promise<void>(resolve => {
			this.#queue.push(resolve);
		});
	}

	release(): void {
		const next = this.#queue.shift();
		if (next) {
			next();
		} else {
			this.#current--;
		}
	}

	async run<T>(fn: () => Promise<T>): Promise<T> {
		await this.acquire();
		try {
			return await fn();
		} finally {
			this.release();
		}
	}
}

/**
 * Map `items` through `fn` with at most `concurrency` calls in flight.
 * Results keep the input order. The first rejection rejects the whole call.
 */
export function mapWithConcurrencyLimit<T, R>(
	items: readonly T[],
	concurrency: number,
	fn: (item: T, index: number) => Promise<R>,
): Promise<R[]> {
	const semaphore = new Semaphore(concurrency);
	return Promise.all(items.map((item, index) => semaphore.run(() => fn(item, index))));
}
