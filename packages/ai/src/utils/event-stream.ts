/**
 * Push-based async event queue with a final result.
 *
 * Producers `push` events and finally `end(result)`; consumers iterate with
 * `for await` and/or await `result()`. An event matching `isComplete` also
 * settles the result through `extractResult`.
 */
export class EventStream<TEvent, TResult> implements AsyncIterable<TEvent> {
	#queue: TEvent[] = [];
	#waiters: Array<(item: IteratorResult<TEvent>) => void> = [];
	#done = false;
	readonly #resolveResult: (value: TResult) => void;
	readonly #result: Promise<TResult>;

	constructor(
		private readonly isComplete: (event: TEvent) => boolean,
		private readonly extractResult: (event: TEvent) => TResult,
	) {
		let settle: (value: TResult) => void = () => {};
		this.#result = new Promise<TResult>(resolve => {
			settle = resolve;
		});
		this.#resolveResult = settle;
	}

	push(event: TEvent): void {
		if (this.#done) return;
		if (this.isComplete(event)) {
			this.#done = true;
			this.#resolveResult(this.extractResult(event));
		}
		const waiter = this.#waiters.shift();
		if (waiter) {
			waiter({ value: event, done: false });
		} else {
			this.#queue.push(event);
		}
		if (this.#done) this.#flushWaiters();
	}

	end(result?: TResult): void {
		if (!this.#done && result !== undefined) {
			this.#resolveResult(result);
		}
		this.#done = true;
		this.#flushWaiters();
	}

	result(): Promise<TResult> {
		return this.#result;
	}

	#flushWaiters(): void {
		for (const waiter of this.#waiters.splice(0)) {
			waiter({ value: undefined, done: true });
		}
	}

	async *[Symbol.asyncIterator](): AsyncIterator<TEvent> {
		while (true) {
			const queued = this.#queue.shift();
			if (queued !== undefined) {
				yield queued;
				continue;
			}
			if (this.#done) return;
			const next = await new Promise<IteratorResult<TEvent>>(resolve => this.#waiters.push(resolve));
			if (next.done) return;
			yield next.value;
		}
	}
}
