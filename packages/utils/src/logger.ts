/**
 * File logger for finch.
 *
 * Writes JSON lines to ~/.finch/logs/ with daily rotation. The terminal is never
 * touched: it belongs to the interactive prompt.
 */
import * as fs from "node:fs";
import winston from "winston";
import DailyRotateFile from "winston-daily-rotate-file";
import { getLogsDir } from "./dirs";
import { $pickenv } from "./env";

export type LogContext = Record<string, unknown>;

function ensureLogsDir(): string {
	const logsDir = getLogsDir();
	fs.mkdirSync(logsDir, { recursive: true });
	return logsDir;
}

const logFormat = winston.format.combine(
	winston.format.timestamp({ format: "YYYY-MM-DDTHH:mm:ss.SSSZ" }),
	winston.format.printf(({ timestamp, level, message, ...meta }) => {
		const entry: Record<string, unknown> = { timestamp, level, pid: process.pid, message };
		for (const [key, value] of Object.entries(meta)) {
			entry[key] = value instanceof Error ? { name: value.name, message: value.message } : value;
		}
		return JSON.stringify(entry);
	}),
);

let instance: winston.Logger | undefined;

function getWinston(): winston.Logger {
	if (instance) return instance;
	const transport = new DailyRotateFile({
		dirname: ensureLogsDir(),
		filename: "finch.%DATE%.log",
		datePattern: "YYYY-MM-DD",
		maxSize: "10m",
		maxFiles: "7d",
	});
	instance = winston.createLogger({
		level: $pickenv("FINCH_LOG_LEVEL", "LOG_LEVEL") ?? "debug",
		format: logFormat,
		transports: [transport],
		exitOnError: false,
	});
	return instance;
}

function write(level: "error" | "warn" | "info" | "debug", message: string, context?: LogContext): void {
	try {
		getWinston().log(level, message, context);
	} catch {
		// Logging never fails the caller, and the terminal belongs to the UI.
	}
}

/**
 * @example
 * ```typescript
 * import { logger } from "@finch/utils";
 *
 * logger.warn("Session file unreadable, skipping", { path });
 * ```
 */
export interface Logger {
	error(message: string, context?: LogContext): void;
	warn(message: string, context?: LogContext): void;
	info(message: string, context?: LogContext): void;
	debug(message: string, context?: LogContext): void;
	timeAsync<T>(op: string, fn: () => PromiseLike<T>): Promise<T>;
}

export function error(message: string, context?: LogContext): void {
	write("error", message, context);
}

export function warn(message: string, context?: LogContext): void {
	write("warn", message, context);
}

export function info(message: string, context?: LogContext): void {
	write("info", message, context);
}

export function debug(message: string, context?: LogContext): void {
	write("debug", message, context);
}

const SLOW_OPERATION_MS = 2_000;

/** Time an asynchronous operation; slow ones are logged as warnings. */
export async function timeAsync<T>(op: string, fn: () => PromiseLike<T>): Promise<T> {
	const start = performance.now();
	try {
		return await fn();
	} finally {
		const duration = Math.round((performance.now() - start) * 100) / 100;
		if (duration > SLOW_OPERATION_MS) {
			warn(`${op} done`, { op, duration });
		} else {
			debug(`${op} done`, { op, duration });
		}
	}
}
