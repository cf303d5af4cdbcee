/**
 * Wrap a promise with a timeout and optional abort signal.
 * Rejects with the given message if the timeout fires first.
 * Cleans up all listeners on settlement.
 */
export function withTimeout<T>(promise: Promise<T>, ms: number, message: string, signal?: AbortSignal): Promise<T> {
	if (signal?.aborted) {
		return Promise.reject(abortReason(signal));
	}

	return new Promise<T>((resolve, reject) => {
		let settled = false;
		const finish = () => {
			settled = true;
			clearTimeout(timeoutId);
			signal?.removeEventListener("abort", onAbort);
		};
		const timeoutId = setTimeout(() => {
			if (settled) return;
			finish();
			reject(new TimeoutError(message, ms));
		}, ms);
		const onAbort = () => {
			if (settled) return;
			finish();
			reject(abortReason(signal));
		};
		signal?.addEventListener("abort", onAbort, { once: true });

		promise.then(
			value => {
				if (settled) return;
				finish();
				resolve(value);
			},
			(err: unknown) => {
				if (settled) return;
				finish();
				reject(err);
			},
		);
	});
}

export class TimeoutError extends Error {
	constructor(
		message: string,
		readonly timeoutMs: number,
	) {
		super(message);
		this.name = "TimeoutError";
	}
}

/** Sleep for `ms`, rejecting early when the signal aborts. */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
	if (signal?.aborted) return Promise.reject(abortReason(signal));
	return new Promise<void>((resolve, reject) => {
		const onAbort = () => {
			clearTimeout(timer);
			reject(abortReason(signal));
		};
		const timer = setTimeout(() => {
			signal?.removeEventListener("abort", onAbort);
			resolve();
		}, ms);
		signal?.addEventListener("abort", onAbort, { once: true });
	});
}

function abortReason(signal: AbortSignal | undefined): Error {
	return signal?.reason instanceof Error ? signal.reason : new Error("Aborted");
}

/**
 * Serializes async work: each `run` starts only after every earlier one settled.
 */
export class SerialQueue {
	#tail: Promise<unknown> = Promise.resolve();
	#pending = 0;

	get pending(): number {
		return this.#pending;
	}

	run<T>(task: () => Promise<T>): Promise<T> {
		this.#pending++;
		const next = this.#tail.then(task, task);
		this.#tail = next.then(
			() => this.#pending--,
			() => this.#pending--,
		);
		return next;
	}
}
