// D1-style async statement API over better-sqlite3.
// Statements are prepared per call; transactions are queued per handle and
// nest through savepoints.

import { AsyncLocalStorage } from "node:async_hooks";
import Database from "better-sqlite3";
import { RepositoryError } from "../lib/errors";

export type SqlValue = string | number | bigint | null;
export type Row = Record<string, unknown>;

export interface RunResult {
	changes: number;
	lastRowId: number;
}

export interface SqlStatement {
	readonly sql: string;
	readonly params: readonly SqlValue[];
	bind(...params: SqlValue[]): SqlStatement;
	first(): Promise<Row | null>;
	all(): Promise<{ results: Row[] }>;
	run(): Promise<RunResult>;
}

export interface SqlDatabase {
	prepare(sql: string): SqlStatement;
	batch(stmts: SqlStatement[]): Promise<RunResult[]>;
	exec(sql: string): Promise<void>;
	transaction<T>(fn: () => Promise<T>): Promise<T>;
	close(): void;
	readonly open: boolean;
}

export interface OpenDatabaseOptions {
	busyTimeoutMs?: number;
	readonly?: boolean;
}

const BUSY_CODES = new Set(["SQLITE_BUSY", "SQLITE_LOCKED"]);
const UNAVAILABLE_PREFIXES = [
	"SQLITE_CANTOPEN",
	"SQLITE_IOERR",
	"SQLITE_CORRUPT",
	"SQLITE_NOTADB",
	"SQLITE_FULL",
	"SQLITE_READONLY",
];

/** Map driver errors onto the repository taxonomy; anything else passes through. */
export function translateError(err: unknown): unknown {
	if (err instanceof RepositoryError) return err;
	if (err instanceof Error && "code" in err && typeof err.code === "string") {
		const code = err.code;
		if (BUSY_CODES.has(code) || code.startsWith("SQLITE_BUSY_")) {
			return RepositoryError.storageBusy(`Storage busy (${code}): ${err.message}`);
		}
		if (UNAVAILABLE_PREFIXES.some((prefix) => code.startsWith(prefix))) {
			return RepositoryError.storageUnavailable(`Storage unavailable (${code}): ${err.message}`);
		}
	}
	if (err instanceof TypeError && /connection is not open/i.test(err.message)) {
		return RepositoryError.storageUnavailable("Storage unavailable: database connection is closed");
	}
	if (err instanceof TypeError && /cannot open database/i.test(err.message)) {
		return RepositoryError.storageUnavailable(`Storage unavailable: ${err.message}`);
	}
	return err;
}

function guard<T>(op: () => T): T {
	try {
		return op();
	} catch (err) {
		throw translateError(err);
	}
}

function isRow(value: unknown): value is Row {
	return typeof value === "object" && value !== null && !Array.isArray(value);
}

function toRunResult(info: Database.RunResult): RunResult {
	return { changes: info.changes, lastRowId: Number(info.lastInsertRowid) };
}

export function openDatabase(path: string, options: OpenDatabaseOptions = {}): SqlDatabase {
	const sqlite = guard(() => new Database(path, {
		readonly: options.readonly ?? false,
		timeout: options.busyTimeoutMs ?? 5000,
	}));
	guard(() => {
		if (path !== ":memory:" && !options.readonly) sqlite.pragma("journal_mode = WAL");
		sqlite.pragma("foreign_keys = ON");
		// lower() only folds ASCII
		sqlite.function("fold", { deterministic: true }, (value: unknown) =>
			typeof value === "string" ? value.toLowerCase() : null,
		);
	});

	const scope = new AsyncLocalStorage<number>();
	let queue: Promise<unknown> = Promise.resolve();
	let savepointSeq = 0;

	function statement(sql: string, params: readonly SqlValue[] = []): SqlStatement {
		return {
			sql,
			params,
			bind(...next: SqlValue[]) {
				return statement(sql, next);
			},
			async first() {
				const row: unknown = guard(() => sqlite.prepare(sql).get(...params));
				return isRow(row) ? row : null;
			},
			async all() {
				const rows: unknown[] = guard(() => sqlite.prepare(sql).all(...params));
				return { results: rows.filter(isRow) };
			},
			async run() {
				return toRunResult(guard(() => sqlite.prepare(sql).run(...params)));
			},
		};
	}

	async function runTopLevel<T>(fn: () => Promise<T>): Promise<T> {
		guard(() => sqlite.exec("BEGIN IMMEDIATE"));
		try {
			const result = await scope.run(1, fn);
			guard(() => sqlite.exec("COMMIT"));
			return result;
		} catch (err) {
			if (sqlite.open && sqlite.inTransaction) sqlite.exec("ROLLBACK");
			throw translateError(err);
		}
	}

	async function runNested<T>(depth: number, fn: () => Promise<T>): Promise<T> {
		const name = `sp_${++savepointSeq}`;
		guard(() => sqlite.exec(`SAVEPOINT ${name}`));
		try {
			const result = await scope.run(depth + 1, fn);
			guard(() => sqlite.exec(`RELEASE ${name}`));
			return result;
		} catch (err) {
			if (sqlite.open && sqlite.inTransaction) {
				sqlite.exec(`ROLLBACK TO ${name}`);
				sqlite.exec(`RELEASE ${name}`);
			}
			throw translateError(err);
		}
	}

	return {
		prepare(sql: string) {
			return statement(sql);
		},
		async batch(stmts: SqlStatement[]) {
			const tx = sqlite.transaction(() =>
				stmts.map((s) => toRunResult(sqlite.prepare(s.sql).run(...s.params))),
			);
			return guard(() => tx());
		},
		async exec(sql: string) {
			guard(() => sqlite.exec(sql));
		},
		transaction<T>(fn: () => Promise<T>): Promise<T> {
			const depth = scope.getStore();
			if (depth !== undefined) return runNested(depth, fn);
			const next = queue.then(() => runTopLevel(fn));
			queue = next.catch(() => undefined);
			return next;
		},
		close() {
			if (sqlite.open) sqlite.close();
		},
		get open() {
			return sqlite.open;
		},
	};
}

// --- Row readers ---

export function readString(row: Row, column: string): string {
	const value = row[column];
	if (typeof value !== "string") {
		throw new Error(`Column ${column} expected text, got ${value === null ? "null" : typeof value}`);
	}
	return value;
}

export function readNullableString(row: Row, column: string): string | null {
	const value = row[column];
	if (value === null || value === undefined) return null;
	return typeof value === "string" ? value : String(value);
}

export function readNumber(row: Row, column: string): number {
	const value = row[column];
	if (typeof value === "number") return value;
	if (typeof value === "bigint") return Number(value);
	throw new Error(`Column ${column} expected a number, got ${value === null ? "null" : typeof value}`);
}

export function readNullableNumber(row: Row, column: string): number | null {
	const value = row[column];
	if (value === null || value === undefined) return null;
	return readNumber(row, column);
}
