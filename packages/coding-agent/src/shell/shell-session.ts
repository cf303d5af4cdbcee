/**
 * One long-lived bash process.
 *
 * Commands are written to the shell's stdin, followed by a marker line printed with
 * the exit status and working directory on stdout and a bare marker on stderr. A
 * command is complete once both markers arrived. A command that outlives its timeout
 * keeps running; the next command first waits for that command's markers.
 */
import { type ChildProcessWithoutNullStreams, spawn } from "node:child_process";
import { randomUUID } from "node:crypto";
import { TimeoutError, logger, withTimeout } from "@finch/utils";
import { NON_INTERACTIVE_ENV, TailBuffer, terminateTree } from "../exec/bash-executor";

export interface ShellExecOptions {
	timeoutMs: number;
	/** Exported into the shell before the command and kept for later commands. */
	env?: Record<string, string>;
}

export interface ShellExecResult {
	stdout: string;
	stderr: string;
	/** `null` when the command did not finish within its timeout. */
	exitCode: number | null;
	timedOut: boolean;
	/** Working directory after the command (before it, on timeout). */
	cwd: string;
	/** Output was cut to its last `MAX_OUTPUT_CHARS` characters. */
	truncated: boolean;
	durationMs: number;
}

interface PendingCommand {
	marker: string;
	resolve: (result: CompletedCommand) => void;
	reject: (err: Error) => void;
}

interface CompletedCommand {
	stdout: string;
	stderr: string;
	exitCode: number;
	cwd: string;
	truncated: boolean;
}

const ENV_NAME = /^[A-Za-z_][A-Za-z0-9_]*$/;

export class ShellExitedError extends Error {
	constructor(message: string) {
		super(message);
		this.name = "ShellExitedError";
	}

	static fromExit(code: number | null, signal: NodeJS.Signals | null): ShellExitedError {
		return new ShellExitedError(`Shell exited (${signal ?? `code ${code ?? "unknown"}`})`);
	}
}

/** Single-quote a value for bash. */
export function shellQuote(value: string): string {
	return `'${value.replace(/'/g, `'\\''`)}'`;
}

export function buildEnvExports(env: Record<string, string>): string {
	return Object.entries(env)
		.map(([name, value]) => {
			if (!ENV_NAME.test(name)) throw new Error(`Invalid environment variable name: ${name}`);
			return `export ${name}=${shellQuote(value)}\n`;
		})
		.join("");
}

export class ShellSession {
	readonly id: string;
	readonly #process: ChildProcessWithoutNullStreams;
	readonly #envOverrides: Record<string, string> = {};
	readonly #stdout = new TailBuffer();
	readonly #stderr = new TailBuffer();
	#cwd: string;
	#alive = true;
	#current?: PendingCommand;
	/** Settles `true` once a command that outlived its timeout finishes. */
	#stale?: Promise<boolean>;

	constructor(id: string, options: { cwd: string; shell?: string }) {
		this.id = id;
		this.#cwd = options.cwd;
		this.#process = spawn(options.shell ?? "/bin/bash", ["--noprofile", "--norc"], {
			cwd: options.cwd,
			env: { ...process.env, ...NON_INTERACTIVE_ENV, PS1: "", PS2: "" },
			// Own process group, so kill() takes the commands the shell started with it.
			detached: process.platform !== "win32",
		});
		this.#process.stdout.setEncoding("utf8").on("data", (chunk: string) => {
			this.#stdout.push(chunk);
			this.#checkComplete();
		});
		this.#process.stderr.setEncoding("utf8").on("data", (chunk: string) => {
			this.#stderr.push(chunk);
			this.#checkComplete();
		});
		this.#process.stdin.on("error", err => {
			logger.debug("Shell stdin closed", { sessionId: id, error: err.message });
		});
		this.#process.once("error", err => this.#handleExit(err));
		this.#process.once("exit", (code, signal) => this.#handleExit(ShellExitedError.fromExit(code, signal)));
		logger.debug("Shell session started", { sessionId: id, pid: this.#process.pid, cwd: options.cwd });
	}

	get pid(): number | undefined {
		return this.#process.pid;
	}

	get alive(): boolean {
		return this.#alive;
	}

	get cwd(): string {
		return this.#cwd;
	}

	/** Variables exported through `env` so far. */
	get envOverrides(): Readonly<Record<string, string>> {
		return this.#envOverrides;
	}

	/** True while a timed-out command is still running. */
	get busy(): boolean {
		return this.#stale !== undefined;
	}

	/**
	 * Run one command. Callers serialize calls per session; the manager does this.
	 * @throws ShellExitedError when the shell is gone
	 */
	async execute(command: string, options: ShellExecOptions): Promise<ShellExecResult> {
		const started = Date.now();
		const deadline = started + options.timeoutMs;

		if (this.#stale) {
			const drained = await this.#waitFor(this.#stale, options.timeoutMs);
			if (!drained) {
				return {
					stdout: "",
					stderr: "A previous command in this session is still running.",
					exitCode: null,
					timedOut: true,
					cwd: this.#cwd,
					truncated: false,
					durationMs: Date.now() - started,
				};
			}
		}
		if (!this.#alive) throw ShellExitedError.fromExit(this.#process.exitCode, this.#process.signalCode);

		const exports = options.env ? buildEnvExports(options.env) : "";
		if (options.env) Object.assign(this.#envOverrides, options.env);

		const completion = this.#start(command, exports);
		const result = await this.#waitFor(completion, Math.max(0, deadline - Date.now()));
		if (result) {
			this.#cwd = result.cwd;
			return { ...result, timedOut: false, durationMs: Date.now() - started };
		}

		// Leave the command running; collect its markers before the next one starts.
		const partial = {
			stdout: this.#stdout.toString(),
			stderr: this.#stderr.toString(),
			truncated: this.#stdout.truncated || this.#stderr.truncated,
		};
		const stale = completion.then(
			() => true,
			() => true,
		);
		this.#stale = stale;
		void stale.then(() => {
			if (this.#stale === stale) this.#stale = undefined;
		});
		logger.warn("Shell command timed out; session kept alive", {
			sessionId: this.id,
			timeoutMs: options.timeoutMs,
		});
		return {
			stdout: partial.stdout,
			stderr: partial.stderr,
			exitCode: null,
			timedOut: true,
			cwd: this.#cwd,
			truncated: partial.truncated,
			durationMs: Date.now() - started,
		};
	}

	/** Kill the shell and everything it started. */
	kill(): void {
		if (!this.#alive) return;
		this.#alive = false;
		this.#process.stdin.end();
		terminateTree(this.#process.pid, "SIGKILL");
		this.#current?.reject(ShellExitedError.fromExit(null, "SIGKILL"));
		this.#current = undefined;
		logger.debug("Shell session killed", { sessionId: this.id });
	}

	#start(command: string, exports: string): Promise<CompletedCommand> {
		const marker = `__FINCH_DONE_${randomUUID().replace(/-/g, "")}__`;
		this.#stdout.reset();
		this.#stderr.reset();
		const completion = new Promise<CompletedCommand>((resolve, reject) => {
			this.#current = { marker, resolve, reject };
		});
		// eval runs in this shell, so cd and export persist, and a syntax error in the
		// command stays inside it instead of eating the marker lines. stdin is detached
		// so the command cannot read them either.
		const script =
			`${exports}{ eval ${shellQuote(command)}\n} < /dev/null\n` +
			`__finch_status=$?\n` +
			`printf '\\n%s %s %s\\n' '${marker}' "$__finch_status" "$PWD"\n` +
			`printf '\\n%s\\n' '${marker}' >&2\n`;
		this.#process.stdin.write(script);
		return completion;
	}

	#checkComplete(): void {
		const current = this.#current;
		if (!current) return;
		const stdoutMarker = `\n${current.marker} `;
		const stderrMarker = `\n${current.marker}\n`;
		const stdout = this.#stdout.toString();
		const stderr = this.#stderr.toString();
		const stdoutAt = stdout.indexOf(stdoutMarker);
		const stderrAt = stderr.indexOf(stderrMarker);
		if (stdoutAt < 0 || stderrAt < 0) return;
		const lineEnd = stdout.indexOf("\n", stdoutAt + stdoutMarker.length);
		if (lineEnd < 0) return;

		const trailer = stdout.slice(stdoutAt + stdoutMarker.length, lineEnd);
		const space = trailer.indexOf(" ");
		const status = Number.parseInt(space < 0 ? trailer : trailer.slice(0, space), 10);
		const cwd = space < 0 ? this.#cwd : trailer.slice(space + 1);
		const completed: CompletedCommand = {
			stdout: stdout.slice(0, stdoutAt),
			stderr: stderr.slice(0, stderrAt),
			exitCode: Number.isNaN(status) ? -1 : status,
			cwd,
			truncated: this.#stdout.truncated || this.#stderr.truncated,
		};
		this.#stdout.reset(stdout.slice(lineEnd + 1));
		this.#stderr.reset(stderr.slice(stderrAt + stderrMarker.length));
		this.#current = undefined;
		current.resolve(completed);
	}

	async #waitFor<T>(promise: Promise<T>, timeoutMs: number): Promise<T | undefined> {
		try {
			return await withTimeout(promise, timeoutMs, "Shell command timed out");
		} catch (err) {
			if (err instanceof TimeoutError) return undefined;
			throw err;
		}
	}

	#handleExit(err: Error): void {
		if (!this.#alive && !this.#current) return;
		this.#alive = false;
		// Background jobs of a shell that exited on its own would outlive it.
		terminateTree(this.#process.pid, "SIGKILL");
		logger.debug("Shell session exited", { sessionId: this.id, reason: err.message });
		this.#current?.reject(err);
		this.#current = undefined;
	}
}
