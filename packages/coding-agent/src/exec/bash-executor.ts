/**
 * One-off subprocess execution with a timeout and cancellation.
 *
 * Persistent shells live in ../shell; this runs a command to completion and returns
 * its captured output.
 */
import { spawn } from "node:child_process";
import { logger } from "@finch/utils";

/** Keeps pagers and prompts from blocking a command nobody can answer. */
export const NON_INTERACTIVE_ENV: Readonly<Record<string, string>> = {
	PAGER: "cat",
	GIT_PAGER: "cat",
	GIT_TERMINAL_PROMPT: "0",
	DEBIAN_FRONTEND: "noninteractive",
	PYTHONUNBUFFERED: "1",
};

/** Output past this many characters per stream is cut from the front. */
export const MAX_OUTPUT_CHARS = 50_000;

const KILL_GRACE_MS = 2_000;

export interface ProcessOptions {
	cwd: string;
	timeoutMs: number;
	env?: Record<string, string>;
	signal?: AbortSignal;
}

export interface ProcessResult {
	stdout: string;
	stderr: string;
	/** `null` when the process was killed (timeout, abort) before exiting. */
	exitCode: number | null;
	timedOut: boolean;
	cancelled: boolean;
	truncated: boolean;
	durationMs: number;
}

/** Keeps the last `limit` characters written to it. */
export class TailBuffer {
	#text = "";
	truncated = false;

	constructor(private readonly limit = MAX_OUTPUT_CHARS) {}

	push(chunk: string): void {
		this.#text += chunk;
		if (this.#text.length > this.limit) {
			this.#text = this.#text.slice(-this.limit);
			this.truncated = true;
		}
	}

	/** Replace the contents and clear the truncation flag. */
	reset(text = ""): void {
		this.#text = text;
		this.truncated = false;
	}

	toString(): string {
		return this.#text;
	}
}

/**
 * Run `file` with `args` and collect its output. Spawn failures (missing binary)
 * reject; a non-zero exit, a timeout or an abort resolve with the partial result.
 */
export function runProcess(file: string, args: readonly string[], options: ProcessOptions): Promise<ProcessResult> {
	const started = Date.now();
	return new Promise<ProcessResult>((resolve, reject) => {
		const child = spawn(file, args, {
			cwd: options.cwd,
			env: { ...process.env, ...NON_INTERACTIVE_ENV, ...options.env },
			stdio: ["ignore", "pipe", "pipe"],
			detached: process.platform !== "win32",
		});
		const stdout = new TailBuffer();
		const stderr = new TailBuffer();
		let timedOut = false;
		let cancelled = false;
		let killTimer: NodeJS.Timeout | undefined;

		child.stdout.setEncoding("utf8").on("data", (chunk: string) => stdout.push(chunk));
		child.stderr.setEncoding("utf8").on("data", (chunk: string) => stderr.push(chunk));

		const kill = () => {
			terminateTree(child.pid, "SIGTERM");
			killTimer = setTimeout(() => terminateTree(child.pid, "SIGKILL"), KILL_GRACE_MS);
			killTimer.unref();
		};
		const timer = setTimeout(() => {
			timedOut = true;
			kill();
		}, options.timeoutMs);
		const onAbort = () => {
			cancelled = true;
			kill();
		};
		options.signal?.addEventListener("abort", onAbort, { once: true });

		const cleanup = () => {
			clearTimeout(timer);
			if (killTimer) clearTimeout(killTimer);
			options.signal?.removeEventListener("abort", onAbort);
		};

		child.once("error", err => {
			cleanup();
			reject(err);
		});
		child.once("close", code => {
			cleanup();
			resolve({
				stdout: stdout.toString(),
				stderr: stderr.toString(),
				exitCode: timedOut || cancelled ? null : code,
				timedOut,
				cancelled,
				truncated: stdout.truncated || stderr.truncated,
				durationMs: Date.now() - started,
			});
		});
		if (options.signal?.aborted) onAbort();
	});
}

export function executeBash(command: string, options: ProcessOptions): Promise<ProcessResult> {
	return runProcess("/bin/bash", ["-c", command], options);
}

/** Signal the whole process group so children of the shell go too. */
export function terminateTree(pid: number | undefined, signal: NodeJS.Signals): void {
	if (pid === undefined) return;
	try {
		process.kill(process.platform === "win32" ? pid : -pid, signal);
	} catch (err) {
		logger.debug("Process already exited", { pid, signal, error: String(err) });
	}
}

/** Combined stdout/stderr text in the shape tools return to the model. */
export function formatProcessOutput(result: { stdout: string; stderr: string; truncated?: boolean }): string {
	const parts: string[] = [];
	if (result.stdout.trim()) parts.push(result.stdout.trimEnd());
	if (result.stderr.trim()) parts.push(`[stderr]\n${result.stderr.trimEnd()}`);
	if (result.truncated) parts.unshift(`[output truncated to the last ${MAX_OUTPUT_CHARS} characters]`);
	return parts.join("\n") || "(no output)";
}
