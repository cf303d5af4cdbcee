import { SerialQueue, logger } from "@finch/utils";
import { type ShellExecResult, ShellExitedError, ShellSession } from "./shell-session";

export interface ShellSessionInfo {
	id: string;
	cwd: string;
	alive: boolean;
	/** A command that outlived its timeout is still running. */
	busy: boolean;
	pid?: number;
	/** Epoch milliseconds */
	startedAt: number;
	lastUsedAt: number;
	ageSeconds: number;
	idleSeconds: number;
	envOverrides: Record<string, string>;
}

export interface ShellManagerOptions {
	/** Working directory new shells start in. */
	cwd: string;
	/** Sessions unused for longer than this are terminated by the sweep. */
	idleTimeoutMs: number;
	/** Used when `execute` gets no timeout. */
	defaultTimeoutMs: number;
	shell?: string;
	now?: () => number;
}

export interface ShellRunOptions {
	timeoutMs?: number;
	env?: Record<string, string>;
}

export interface ShellRunResult extends ShellExecResult {
	sessionId: string;
}

interface ManagedShell {
	session: ShellSession;
	queue: SerialQueue;
	startedAt: number;
	lastUsedAt: number;
}

/**
 * Persistent shells keyed by session id.
 *
 * A shell is spawned on first reference and reused until it is terminated, swept for
 * idleness or dies (then the next reference spawns a fresh one). Commands on one id
 * run one at a time; different ids run independently. Commands queued when their
 * session is terminated reject with `ShellExitedError`; only a later call starts a
 * new shell under that id.
 */
export class ShellSessionManager {
	readonly #shells = new Map<string, ManagedShell>();
	readonly #options: ShellManagerOptions;
	readonly #now: () => number;
	#sweepTimer?: NodeJS.Timeout;

	constructor(options: ShellManagerOptions) {
		this.#options = options;
		this.#now = options.now ?? Date.now;
	}

	get size(): number {
		return this.#shells.size;
	}

	has(id: string): boolean {
		return this.#shells.has(id);
	}

	getOrCreate(id: string): ShellSession {
		return this.#acquire(id).session;
	}

	execute(id: string, command: string, options: ShellRunOptions = {}): Promise<ShellRunResult> {
		const managed = this.#acquire(id);
		return managed.queue.run(async () => {
			// terminate() drops the entry, and a later reference starts a new queue.
			if (this.#shells.get(id)?.queue !== managed.queue) {
				throw new ShellExitedError(`Shell session ${id} was terminated`);
			}
			// The shell may have died while this call waited in the queue.
			const current = managed.session.alive ? managed : this.#acquire(id);
			current.lastUsedAt = this.#now();
			try {
				const result = await current.session.execute(command, {
					timeoutMs: options.timeoutMs ?? this.#options.defaultTimeoutMs,
					env: options.env,
				});
				return { ...result, sessionId: id };
			} finally {
				current.lastUsedAt = this.#now();
			}
		});
	}

	getInfo(id: string): ShellSessionInfo | undefined {
		const managed = this.#shells.get(id);
		return managed ? this.#describe(managed) : undefined;
	}

	/** Active sessions, oldest first. */
	list(): ShellSessionInfo[] {
		return [...this.#shells.values()].map(m => this.#describe(m)).sort((a, b) => a.startedAt - b.startedAt);
	}

	terminate(id: string): boolean {
		const managed = this.#shells.get(id);
		if (!managed) return false;
		this.#shells.delete(id);
		managed.session.kill();
		logger.info("Shell session terminated", { sessionId: id });
		return true;
	}

	terminateAll(): number {
		const ids = [...this.#shells.keys()];
		for (const id of ids) this.terminate(id);
		return ids.length;
	}

	/**
	 * Terminate sessions idle past the threshold, together with any timed-out
	 * command still running in them. Sessions with queued calls are left alone.
	 * Returns the terminated ids.
	 */
	sweepIdle(now = this.#now()): string[] {
		const swept: string[] = [];
		for (const [id, managed] of this.#shells) {
			if (managed.queue.pending > 0) continue;
			if (now - managed.lastUsedAt > this.#options.idleTimeoutMs) {
				this.terminate(id);
				swept.push(id);
			}
		}
		if (swept.length > 0) logger.debug("Idle shell sessions swept", { ids: swept });
		return swept;
	}

	startIdleSweep(intervalMs: number): void {
		this.stopIdleSweep();
		this.#sweepTimer = setInterval(() => this.sweepIdle(), intervalMs);
		this.#sweepTimer.unref();
	}

	stopIdleSweep(): void {
		if (this.#sweepTimer) clearInterval(this.#sweepTimer);
		this.#sweepTimer = undefined;
	}

	dispose(): void {
		this.stopIdleSweep();
		this.terminateAll();
	}

	#acquire(id: string): ManagedShell {
		const existing = this.#shells.get(id);
		if (existing?.session.alive) return existing;
		if (existing) logger.info("Shell session died; starting a new one", { sessionId: id });
		const managed: ManagedShell = {
			session: new ShellSession(id, { cwd: this.#options.cwd, shell: this.#options.shell }),
			queue: existing?.queue ?? new SerialQueue(),
			startedAt: this.#now(),
			lastUsedAt: this.#now(),
		};
		this.#shells.set(id, managed);
		return managed;
	}

	#describe(managed: ManagedShell): ShellSessionInfo {
		const now = this.#now();
		const { session } = managed;
		return {
			id: session.id,
			cwd: session.cwd,
			alive: session.alive,
			busy: session.busy,
			pid: session.pid,
			startedAt: managed.startedAt,
			lastUsedAt: managed.lastUsedAt,
			ageSeconds: Math.floor((now - managed.startedAt) / 1000),
			idleSeconds: Math.floor((now - managed.lastUsedAt) / 1000),
			envOverrides: { ...session.envOverrides },
		};
	}
}
