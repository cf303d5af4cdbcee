import type { AgentTool, AgentToolResult } from "@finch/agent";
import { type Static, Type } from "@sinclair/typebox";
import Database from "better-sqlite3";
import type { ToolSession } from ".";
import { displayPath, resolveToCwd } from "./path-utils";
import { renderError, ToolError, throwIfAborted } from "./tool-errors";
import { jsonResult } from "./tool-result";

const MAX_ROWS = 200;

const WRITE_STATEMENT = /^\s*(insert|update|delete|drop|create|alter|replace|truncate)\b/i;

const sqliteQuerySchema = Type.Object({
	database: Type.String({ description: "Path to the SQLite database file" }),
	query: Type.String({ description: "One SQL statement" }),
	params: Type.Optional(
		Type.Array(Type.Union([Type.String(), Type.Number(), Type.Null()]), {
			description: "Values for ? placeholders",
		}),
	),
});

type SqliteQueryParams = Static<typeof sqliteQuerySchema>;

export interface SqliteQueryDetails {
	database: string;
	write: boolean;
	rowCount?: number;
	changes?: number;
}

/** Statements that change data or schema need confirmation; reads do not. */
export function isWriteStatement(query: string): boolean {
	return WRITE_STATEMENT.test(query);
}

export class SqliteQueryTool implements AgentTool<typeof sqliteQuerySchema, SqliteQueryDetails> {
	readonly name = "sqlite_query";
	readonly label = "SQLite";
	readonly description = `Run one SQL statement against a SQLite database file. Reads return up to ${MAX_ROWS} rows; writes return the number of changed rows and need user approval.`;
	readonly parameters = sqliteQuerySchema;

	constructor(private readonly session: ToolSession) {}

	requiresConfirmation(args: SqliteQueryParams): boolean {
		return isWriteStatement(args.query);
	}

	describeCall(args: SqliteQueryParams): string {
		return `${args.database}: ${args.query.trim()}`;
	}

	async execute(
		_toolCallId: string,
		params: SqliteQueryParams,
		signal?: AbortSignal,
	): Promise<AgentToolResult<SqliteQueryDetails>> {
		throwIfAborted(signal);
		const file = resolveToCwd(params.database, this.session.cwd);
		const shown = displayPath(file, this.session.cwd);
		const write = isWriteStatement(params.query);
		const bindings = params.params ?? [];

		let db: Database.Database;
		try {
			// Reads open read-only, so a statement the write check misses still cannot modify anything.
			db = new Database(file, { readonly: !write, fileMustExist: !write });
		} catch (err) {
			throw new ToolError(`Cannot open database ${shown}: ${renderError(err)}`);
		}
		try {
			const statement = db.prepare(params.query);
			if (statement.reader) {
				const rows = statement.all(...bindings);
				const truncated = rows.length > MAX_ROWS;
				return jsonResult(
					{
						rows: truncated ? rows.slice(0, MAX_ROWS) : rows,
						row_count: rows.length,
						...(truncated && { note: `Showing the first ${MAX_ROWS} rows` }),
					},
					{ database: shown, write, rowCount: rows.length },
				);
			}
			const info = statement.run(...bindings);
			return jsonResult(
				{ changes: info.changes, last_insert_rowid: Number(info.lastInsertRowid) },
				{ database: shown, write, changes: info.changes },
			);
		} catch (err) {
			throw new ToolError(`SQL error: ${renderError(err)}`);
		} finally {
			db.close();
		}
	}
}
