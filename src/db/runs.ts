// Ingest run records. A run moves open -> ingesting -> finished | aborted and
// is otherwise never mutated.

import { z } from "zod";
import type { Row, SqlDatabase } from "./client";
import { readNullableString, readNumber, readString } from "./client";
import type { IngestRun, IngestSource, IngestSummary, RunStatus, SourceKind } from "../lib/types";

function readSourceKind(row: Row): SourceKind {
	const kind = readString(row, "source_kind");
	if (kind !== "bundle" && kind !== "package") throw new Error(`Unexpected source_kind ${kind}`);
	return kind;
}

function readStatus(row: Row): RunStatus {
	const status = readString(row, "status");
	switch (status) {
		case "open":
		case "ingesting":
		case "finished":
		case "aborted":
			return status;
		default:
			throw new Error(`Unexpected run status ${status}`);
	}
}

const count = z.number().int().min(0);

const SummarySchema = z.object({
	documents_seen: count,
	new_raw_documents: count,
	duplicate_raw_documents: count,
	new_curated_identities: count,
	new_conflicts: count,
	reference_edges: count,
	busy_retries: count,
	skipped: z.array(z.object({
		index: count,
		full_url: z.string().nullable(),
		origin: z.string().nullable(),
		reason: z.enum(["malformed_document", "unidentifiable_document"]),
		message: z.string(),
	})),
});

function readSummary(row: Row, runId: number): IngestSummary | null {
	const json = readNullableString(row, "summary_json");
	if (!json) return null;
	let raw: unknown;
	try {
		raw = JSON.parse(json);
	} catch (err) {
		throw new Error(`Run ${runId} has an invalid summary: ${err instanceof Error ? err.message : String(err)}`);
	}
	const parsed = SummarySchema.safeParse(raw);
	if (!parsed.success) {
		const detail = parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; ");
		throw new Error(`Run ${runId} has an invalid summary: ${detail}`);
	}
	return parsed.data;
}

export function rowToRun(r: Row): IngestRun {
	const runId = readNumber(r, "run_id");
	return {
		run_id: runId,
		started_ts: readString(r, "started_ts"),
		finished_ts: readNullableString(r, "finished_ts"),
		source_name: readString(r, "source_name"),
		source_kind: readSourceKind(r),
		schema_major: readString(r, "schema_major"),
		partition_key: readNullableString(r, "partition_key"),
		status: readStatus(r),
		summary: readSummary(r, runId),
		error: readNullableString(r, "error"),
	};
}

export async function openRun(
	db: SqlDatabase,
	source: IngestSource,
	schemaMajor: string,
	now: string,
): Promise<number> {
	const { lastRowId } = await db.prepare(
		`INSERT INTO ingest_run (started_ts, source_name, source_kind, schema_major, partition_key, status)
		 VALUES (?, ?, ?, ?, ?, 'open')`,
	).bind(now, source.name, source.kind, schemaMajor, source.partitionKey ?? null).run();
	return lastRowId;
}

export async function markIngesting(db: SqlDatabase, runId: number): Promise<void> {
	await db.prepare(
		`UPDATE ingest_run SET status = 'ingesting' WHERE run_id = ? AND status = 'open'`,
	).bind(runId).run();
}

export async function finishRun(
	db: SqlDatabase,
	runId: number,
	summary: IngestSummary,
	now: string,
): Promise<void> {
	await db.prepare(
		`UPDATE ingest_run SET status = 'finished', finished_ts = ?, summary_json = ?
		 WHERE run_id = ? AND status IN ('open', 'ingesting')`,
	).bind(now, JSON.stringify(summary), runId).run();
}

export async function abortRun(
	db: SqlDatabase,
	runId: number,
	summary: IngestSummary,
	error: string,
	now: string,
): Promise<void> {
	await db.prepare(
		`UPDATE ingest_run SET status = 'aborted', finished_ts = ?, summary_json = ?, error = ?
		 WHERE run_id = ? AND status IN ('open', 'ingesting')`,
	).bind(now, JSON.stringify(summary), error, runId).run();
}

export async function getRun(db: SqlDatabase, runId: number): Promise<IngestRun | null> {
	const row = await db.prepare(`SELECT * FROM ingest_run WHERE run_id = ?`).bind(runId).first();
	return row ? rowToRun(row) : null;
}

export async function listRuns(db: SqlDatabase, limit = 50): Promise<IngestRun[]> {
	const { results } = await db.prepare(
		`SELECT * FROM ingest_run ORDER BY run_id DESC LIMIT ?`,
	).bind(limit).all();
	return results.map(rowToRun);
}
