import { isRecord, logger, sleep } from "@finch/utils";
import { EndpointError } from "../errors";

const TRANSIENT_MESSAGE_PATTERN =
	/overloaded|rate.?limit|too many requests|service.?unavailable|server error|internal error|connection.?error|unable to connect|fetch failed|econnrefused|econnreset|socket hang up/i;

const VALIDATION_MESSAGE_PATTERN = /invalid|validation|bad request|unsupported|schema|missing required|not found|unauthorized|forbidden/i;

/**
 * Identify errors that should be retried (timeouts, 5xx, 408, 429, transient network failures).
 */
export function isRetryableError(error: unknown): boolean {
	const message = isRecord(error) && typeof error.message === "string" ? error.message : "";
	const name = isRecord(error) && typeof error.name === "string" ? error.name : "";
	if (/timeout|timed out/i.test(message) || name === "APIConnectionTimeoutError") return true;

	const status = extractHttpStatusFromError(error);
	if (status !== undefined) {
		if (status >= 500) return true;
		if (status === 408 || status === 429) return true;
		if (status >= 400 && status < 500) return false;
	}

	if (name === "APIConnectionError") return true;
	if (VALIDATION_MESSAGE_PATTERN.test(message)) return false;
	return TRANSIENT_MESSAGE_PATTERN.test(message);
}

export function extractHttpStatusFromError(error: unknown, depth = 0): number | undefined {
	if (!isRecord(error) || depth > 3) return undefined;
	const response = error.response;
	const status = error.status ?? error.statusCode ?? (isRecord(response) ? response.status : undefined);
	if (typeof status === "number" && status >= 100 && status <= 599) {
		return status;
	}
	if (typeof error.message === "string") {
		const extracted = extractStatusFromMessage(error.message);
		if (extracted !== undefined) return extracted;
	}
	return extractHttpStatusFromError(error.cause, depth + 1);
}

function extractStatusFromMessage(message: string): number | undefined {
	const patterns = [/error\s*\((\d{3})\)/i, /status\s*[:=]?\s*(\d{3})/i, /\bhttp\s*(\d{3})\b/i, /^(\d{3})\s/];
	for (const pattern of patterns) {
		const match = pattern.exec(message);
		if (!match) continue;
		const value = Number(match[1]);
		if (value >= 100 && value <= 599) return value;
	}
	return undefined;
}

export interface RetryOptions {
	/** Extra attempts after the first one. */
	maxRetries: number;
	/** Delay before the first retry; doubles on every further retry. */
	baseDelayMs: number;
	signal?: AbortSignal;
	label?: string;
	onRetry?: (attempt: number, delayMs: number, error: unknown) => void;
}

/**
 * Run `fn`, retrying transient failures with exponential backoff.
 * @throws EndpointError once retries are exhausted or the failure is not transient
 */
export async function withRetry<T>(fn: () => Promise<T>, options: RetryOptions): Promise<T> {
	const label = options.label ?? "model request";
	for (let attempt = 0; ; attempt++) {
		try {
			return await fn();
		} catch (err) {
			if (options.signal?.aborted) throw err;
			const status = extractHttpStatusFromError(err);
			const reason = err instanceof Error ? err.message : String(err);
			const retryable = isRetryableError(err);
			if (!retryable || attempt >= options.maxRetries) {
				logger.error("Endpoint request failed", { label, attempts: attempt + 1, status, reason });
				throw new EndpointError(`${label} failed after ${attempt + 1} attempt(s): ${reason}`, {
					attempts: attempt + 1,
					status,
					cause: err,
				});
			}
			const delayMs = options.baseDelayMs * 2 ** attempt;
			logger.warn("Retrying endpoint request", { label, attempt: attempt + 1, delayMs, reason });
			options.onRetry?.(attempt + 1, delayMs, err);
			await sleep(delayMs, options.signal);
		}
	}
}
