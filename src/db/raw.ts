// Raw store: append-only records of every document and bundle a run saw.
// Rows are never updated; a repeated (run, digest) pair resolves to the
// existing row.

import type { Row, SqlDatabase, SqlValue } from "./client";
import { readNullableNumber, readNullableString, readNumber, readString } from "./client";
import type { DocumentEncoding, DocumentIdentity, RawDocument, ReferenceEdge } from "../lib/types";

export interface AppendRawDocumentInput {
	runId: number;
	bundleId?: number | null;
	fullUrl?: string | null;
	identity: DocumentIdentity;
	digest: string;
	encoding: DocumentEncoding;
	contentText: string;
	now: string;
}

export interface AppendRawBundleInput {
	bundleType: string | null;
	digest: string;
	encoding: DocumentEncoding;
	text: string;
}

function readEncoding(row: Row): DocumentEncoding {
	const encoding = readString(row, "encoding");
	if (encoding !== "json" && encoding !== "xml") throw new Error(`Unexpected encoding ${encoding}`);
	return encoding;
}

export function rowToRawDocument(r: Row): RawDocument {
	return {
		raw_id: readNumber(r, "raw_id"),
		run_id: readNumber(r, "run_id"),
		bundle_id: readNullableNumber(r, "bundle_id"),
		full_url: readNullableString(r, "full_url"),
		resource_type: readString(r, "resource_type"),
		logical_id: readNullableString(r, "logical_id"),
		canonical_url: readNullableString(r, "canonical_url"),
		artefact_version: readNullableString(r, "artefact_version"),
		meta_version_id: readNullableString(r, "meta_version_id"),
		meta_last_updated: readNullableString(r, "meta_last_updated"),
		content_sha256: readString(r, "content_sha256"),
		encoding: readEncoding(r),
		content_text: readString(r, "content_text"),
		first_seen_ts: readString(r, "first_seen_ts"),
	};
}

function rowToEdge(r: Row): ReferenceEdge {
	return {
		edge_id: readNumber(r, "edge_id"),
		run_id: readNumber(r, "run_id"),
		from_raw_id: readNumber(r, "from_raw_id"),
		from_path: readString(r, "from_path"),
		to_reference: readString(r, "to_reference"),
	};
}

export async function appendRawBundle(
	db: SqlDatabase,
	runId: number,
	input: AppendRawBundleInput,
): Promise<number> {
	const { lastRowId } = await db.prepare(
		`INSERT INTO raw_bundle (run_id, bundle_type, bundle_sha256, encoding, bundle_text)
		 VALUES (?, ?, ?, ?, ?)`,
	).bind(runId, input.bundleType, input.digest, input.encoding, input.text).run();
	return lastRowId;
}

/** Insert a raw document unless this run already holds the same digest. */
export async function appendRawDocument(
	db: SqlDatabase,
	input: AppendRawDocumentInput,
): Promise<{ rawId: number; created: boolean }> {
	const { identity } = input;
	const { changes } = await db.prepare(
		`INSERT INTO raw_document (
			run_id, bundle_id, full_url, resource_type, logical_id, canonical_url, artefact_version,
			meta_version_id, meta_last_updated, content_sha256, encoding, content_text, first_seen_ts
		) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
		ON CONFLICT (run_id, content_sha256) DO NOTHING`,
	).bind(
		input.runId,
		input.bundleId ?? null,
		input.fullUrl ?? null,
		identity.resourceType,
		identity.logicalId,
		identity.canonicalUrl,
		identity.artefactVersion,
		identity.metaVersionId,
		identity.metaLastUpdated,
		input.digest,
		input.encoding,
		input.contentText,
		input.now,
	).run();

	const row = await db.prepare(
		`SELECT raw_id FROM raw_document WHERE run_id = ? AND content_sha256 = ?`,
	).bind(input.runId, input.digest).first();
	if (!row) throw new Error(`Raw document for run ${input.runId} vanished after insert`);
	return { rawId: readNumber(row, "raw_id"), created: changes > 0 };
}

export async function appendReferenceEdge(
	db: SqlDatabase,
	runId: number,
	fromRawId: number,
	fromPath: string,
	toReference: string,
): Promise<number> {
	const { lastRowId } = await db.prepare(
		`INSERT INTO reference_edge (run_id, from_raw_id, from_path, to_reference) VALUES (?, ?, ?, ?)`,
	).bind(runId, fromRawId, fromPath, toReference).run();
	return lastRowId;
}

export async function getRawDocument(db: SqlDatabase, rawId: number): Promise<RawDocument | null> {
	const row = await db.prepare(`SELECT * FROM raw_document WHERE raw_id = ?`).bind(rawId).first();
	return row ? rowToRawDocument(row) : null;
}

/** Most recent raw row linked to a curated record with the given digest. */
export async function findRawForCurated(
	db: SqlDatabase,
	curatedId: number,
	digest: string,
): Promise<RawDocument | null> {
	const row = await db.prepare(
		`SELECT r.* FROM raw_document r
		 JOIN raw_to_curated l ON l.raw_id = r.raw_id
		 WHERE l.curated_id = ? AND r.content_sha256 = ?
		 ORDER BY r.raw_id DESC LIMIT 1`,
	).bind(curatedId, digest).first();
	return row ? rowToRawDocument(row) : null;
}

export async function listRawDocuments(db: SqlDatabase, runId: number): Promise<RawDocument[]> {
	const { results } = await db.prepare(
		`SELECT * FROM raw_document WHERE run_id = ? ORDER BY raw_id ASC`,
	).bind(runId).all();
	return results.map(rowToRawDocument);
}

export async function listReferenceEdges(
	db: SqlDatabase,
	filter: { runId?: number; fromRawId?: number } = {},
): Promise<ReferenceEdge[]> {
	const conditions: string[] = [];
	const params: SqlValue[] = [];
	if (filter.runId !== undefined) {
		conditions.push("run_id = ?");
		params.push(filter.runId);
	}
	if (filter.fromRawId !== undefined) {
		conditions.push("from_raw_id = ?");
		params.push(filter.fromRawId);
	}
	const where = conditions.length ? `WHERE ${conditions.join(" AND ")}` : "";
	const { results } = await db.prepare(
		`SELECT * FROM reference_edge ${where} ORDER BY edge_id ASC`,
	).bind(...params).all();
	return results.map(rowToEdge);
}
