// Read paths over the curated projection. Nothing here writes.

import { z } from "zod";
import type { SqlDatabase, SqlValue } from "./client";
import { readNullableString, readNumber, readString } from "./client";
import { rowToCurated, rowToVariant } from "./curated";
import { RepositoryError } from "../lib/errors";
import { escapeLike } from "../lib/format";
import type { ArtefactConflict, CuratedResource, Variant } from "../lib/types";

const ANY_RESOURCE_TYPE = new Set(["all", "*"]);

export const CuratedFilterSchema = z.object({
	resourceType: z.string().trim().optional(),
	conflict: z.boolean().optional(),
	text: z.string().optional(),
	partitionKey: z.string().optional(),
	sort: z.enum(["last_seen_desc", "last_seen_asc"]).default("last_seen_desc"),
	limit: z.number().int().min(1).optional(),
});

export type CuratedFilter = z.input<typeof CuratedFilterSchema>;

export interface QueryLimits {
	defaultLimit: number;
	maxLimit: number;
}

/**
 * Filter curated records. Filters combine with AND; an absent filter does not
 * restrict. Text matches canonical url or logical id as a case-insensitive
 * substring, with LIKE wildcards taken literally. Ties on last_seen_ts break
 * by curated_id ascending in either sort direction.
 */
export async function queryCurated(
	db: SqlDatabase,
	filter: CuratedFilter,
	limits: QueryLimits,
): Promise<CuratedResource[]> {
	const parsed = CuratedFilterSchema.safeParse(filter);
	if (!parsed.success) {
		const detail = parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; ");
		throw RepositoryError.validation(`Invalid filter: ${detail}`);
	}
	const f = parsed.data;
	const limit = Math.min(f.limit ?? limits.defaultLimit, limits.maxLimit);

	const conditions: string[] = [];
	const binds: SqlValue[] = [];

	if (f.resourceType && !ANY_RESOURCE_TYPE.has(f.resourceType.toLowerCase())) {
		conditions.push("resource_type = ?");
		binds.push(f.resourceType);
	}
	if (f.conflict !== undefined) {
		conditions.push("has_conflict = ?");
		binds.push(f.conflict ? 1 : 0);
	}
	const text = f.text?.trim();
	if (text) {
		const pattern = `%${escapeLike(text.toLowerCase())}%`;
		conditions.push(
			"(fold(IFNULL(canonical_url, '')) LIKE ? ESCAPE '\\' OR fold(IFNULL(logical_id, '')) LIKE ? ESCAPE '\\')",
		);
		binds.push(pattern, pattern);
	}
	if (f.partitionKey !== undefined) {
		conditions.push("partition_key = ?");
		binds.push(f.partitionKey);
	}

	const where = conditions.length ? `WHERE ${conditions.join(" AND ")}` : "";
	const direction = f.sort === "last_seen_asc" ? "ASC" : "DESC";
	const { results } = await db.prepare(
		`SELECT * FROM curated_resource ${where}
		 ORDER BY last_seen_ts ${direction}, curated_id ASC LIMIT ?`,
	).bind(...binds, limit).all();
	return results.map(rowToCurated);
}

export async function getCurated(db: SqlDatabase, curatedId: number): Promise<CuratedResource | null> {
	const row = await db.prepare(`SELECT * FROM curated_resource WHERE curated_id = ?`).bind(curatedId).first();
	return row ? rowToCurated(row) : null;
}

/**
 * Look up by canonical url, or by logical id for records without one. Without
 * a partition key every partition matches.
 */
export async function findCuratedByIdent(
	db: SqlDatabase,
	ident: string,
	partitionKey?: string | null,
): Promise<CuratedResource[]> {
	const conditions = ["IFNULL(canonical_url, logical_id) = ?"];
	const binds: SqlValue[] = [ident];
	if (partitionKey !== undefined) {
		conditions.push("IFNULL(partition_key, '') = ?");
		binds.push(partitionKey ?? "");
	}
	const { results } = await db.prepare(
		`SELECT * FROM curated_resource WHERE ${conditions.join(" AND ")}
		 ORDER BY last_seen_ts DESC, curated_id ASC`,
	).bind(...binds).all();
	return results.map(rowToCurated);
}

export async function listVariants(db: SqlDatabase, curatedId: number): Promise<Variant[]> {
	const { results } = await db.prepare(
		`SELECT * FROM curated_variant WHERE curated_id = ?
		 ORDER BY occurrences DESC, first_seen_run_id ASC, content_sha256 ASC`,
	).bind(curatedId).all();
	return results.map(rowToVariant);
}

/** Canonical identities with more than one distinct digest in raw history. */
export async function listArtefactConflicts(db: SqlDatabase): Promise<ArtefactConflict[]> {
	const { results } = await db.prepare(
		`SELECT * FROM v_artefact_conflicts
		 ORDER BY resource_type, canonical_url, IFNULL(artefact_version, '')`,
	).all();
	return results.map((r) => ({
		resource_type: readString(r, "resource_type"),
		canonical_url: readString(r, "canonical_url"),
		artefact_version: readNullableString(r, "artefact_version"),
		variant_count: readNumber(r, "variant_count"),
	}));
}
