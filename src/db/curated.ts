// Curated records, their variants and raw links. Only the resolver writes
// through these helpers.

import type { Row, SqlDatabase } from "./client";
import { readNullableString, readNumber, readString } from "./client";
import type { CuratedResource, DocumentIdentity, Variant } from "../lib/types";

export function rowToCurated(r: Row): CuratedResource {
	return {
		curated_id: readNumber(r, "curated_id"),
		resource_type: readString(r, "resource_type"),
		logical_id: readNullableString(r, "logical_id"),
		canonical_url: readNullableString(r, "canonical_url"),
		artefact_version: readNullableString(r, "artefact_version"),
		partition_key: readNullableString(r, "partition_key"),
		current_sha256: readString(r, "current_sha256"),
		has_conflict: readNumber(r, "has_conflict") === 1,
		first_seen_ts: readString(r, "first_seen_ts"),
		last_seen_ts: readString(r, "last_seen_ts"),
	};
}

export function rowToVariant(r: Row): Variant {
	return {
		curated_id: readNumber(r, "curated_id"),
		content_sha256: readString(r, "content_sha256"),
		occurrences: readNumber(r, "occurrences"),
		first_seen_run_id: readNumber(r, "first_seen_run_id"),
		last_seen_run_id: readNumber(r, "last_seen_run_id"),
		note: readNullableString(r, "note"),
	};
}

/**
 * Look up a curated record by identity key. The lookups mirror the partial
 * unique indexes: canonical identities match on (type, url, version), the rest
 * on (type, logical id); both within the partition.
 */
export async function findCuratedByKey(
	db: SqlDatabase,
	identity: DocumentIdentity,
	partitionKey: string | null,
): Promise<CuratedResource | null> {
	const row = identity.canonicalUrl !== null
		? await db.prepare(
			`SELECT * FROM curated_resource
			 WHERE resource_type = ? AND canonical_url = ?
			   AND IFNULL(artefact_version, '') = ? AND IFNULL(partition_key, '') = ?`,
		).bind(identity.resourceType, identity.canonicalUrl, identity.artefactVersion ?? "", partitionKey ?? "").first()
		: await db.prepare(
			`SELECT * FROM curated_resource
			 WHERE canonical_url IS NULL AND resource_type = ? AND logical_id = ?
			   AND IFNULL(partition_key, '') = ?`,
		).bind(identity.resourceType, identity.logicalId, partitionKey ?? "").first();
	return row ? rowToCurated(row) : null;
}

export async function insertCurated(
	db: SqlDatabase,
	identity: DocumentIdentity,
	partitionKey: string | null,
	digest: string,
	now: string,
): Promise<number> {
	const { lastRowId } = await db.prepare(
		`INSERT INTO curated_resource (
			resource_type, logical_id, canonical_url, artefact_version, partition_key,
			current_sha256, has_conflict, first_seen_ts, last_seen_ts
		) VALUES (?, ?, ?, ?, ?, ?, 0, ?, ?)`,
	).bind(
		identity.resourceType,
		identity.logicalId,
		identity.canonicalUrl,
		identity.artefactVersion,
		partitionKey,
		digest,
		now,
		now,
	).run();
	return lastRowId;
}

/** Record a sighting. `raiseConflict` only ever sets the flag. */
export async function touchCurated(
	db: SqlDatabase,
	curatedId: number,
	digest: string,
	raiseConflict: boolean,
	now: string,
): Promise<void> {
	await db.prepare(
		`UPDATE curated_resource
		 SET last_seen_ts = ?, current_sha256 = ?, has_conflict = MAX(has_conflict, ?)
		 WHERE curated_id = ?`,
	).bind(now, digest, raiseConflict ? 1 : 0, curatedId).run();
}

export async function getVariant(
	db: SqlDatabase,
	curatedId: number,
	digest: string,
): Promise<Variant | null> {
	const row = await db.prepare(
		`SELECT * FROM curated_variant WHERE curated_id = ? AND content_sha256 = ?`,
	).bind(curatedId, digest).first();
	return row ? rowToVariant(row) : null;
}

export async function insertVariant(
	db: SqlDatabase,
	curatedId: number,
	digest: string,
	runId: number,
): Promise<void> {
	await db.prepare(
		`INSERT INTO curated_variant (curated_id, content_sha256, occurrences, first_seen_run_id, last_seen_run_id)
		 VALUES (?, ?, 1, ?, ?)`,
	).bind(curatedId, digest, runId, runId).run();
}

export async function bumpVariant(
	db: SqlDatabase,
	curatedId: number,
	digest: string,
	runId: number,
): Promise<void> {
	await db.prepare(
		`UPDATE curated_variant SET occurrences = occurrences + 1, last_seen_run_id = ?
		 WHERE curated_id = ? AND content_sha256 = ?`,
	).bind(runId, curatedId, digest).run();
}

export async function linkRaw(
	db: SqlDatabase,
	rawId: number,
	curatedId: number,
	now: string,
): Promise<void> {
	await db.prepare(
		`INSERT INTO raw_to_curated (raw_id, curated_id, linked_ts) VALUES (?, ?, ?)
		 ON CONFLICT (raw_id) DO NOTHING`,
	).bind(rawId, curatedId, now).run();
}
