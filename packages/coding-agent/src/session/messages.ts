/**
 * Message helpers for persisted conversations: shape checks for records read back
 * from disk, previews for session listings and the pinned project-context message.
 */
import type { Message, UserMessage } from "@finch/ai";
import { isRecord } from "@finch/utils";

const PREVIEW_LENGTH = 60;

function isTextBlock(value: unknown): boolean {
	return isRecord(value) && value.type === "text" && typeof value.text === "string";
}

function isToolCallBlock(value: unknown): boolean {
	return (
		isRecord(value) &&
		value.type === "toolCall" &&
		typeof value.id === "string" &&
		typeof value.name === "string" &&
		isRecord(value.arguments)
	);
}

export function isMessage(value: unknown): value is Message {
	if (!isRecord(value) || typeof value.timestamp !== "number") return false;
	switch (value.role) {
		case "user":
			return typeof value.content === "string";
		case "assistant":
			return (
				Array.isArray(value.content) &&
				value.content.every(block => isTextBlock(block) || isToolCallBlock(block)) &&
				typeof value.stopReason === "string"
			);
		case "toolResult":
			return (
				typeof value.toolCallId === "string" &&
				typeof value.toolName === "string" &&
				typeof value.isError === "boolean" &&
				Array.isArray(value.content) &&
				value.content.every(isTextBlock)
			);
		default:
			return false;
	}
}

/** First line of the first user message, clipped for listings. */
export function previewOf(messages: readonly Message[]): string {
	const first = messages.find((m): m is UserMessage => m.role === "user" && !m.pinned);
	if (!first) return "";
	const line = first.content.trim().split("\n")[0] ?? "";
	return line.length > PREVIEW_LENGTH ? `${line.slice(0, PREVIEW_LENGTH - 3)}...` : line;
}

export function countUserMessages(messages: readonly Message[]): number {
	return messages.filter(m => m.role === "user" && !m.pinned).length;
}

export function createContextMessage(context: string, timestamp = Date.now()): UserMessage {
	return { role: "user", content: `# Project context\n\n${context}`, timestamp, pinned: true };
}
