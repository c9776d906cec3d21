// Bundle exporter: assembles a collection Bundle from the current content of
// selected curated records.

import { findRawForCurated } from "../db/raw";
import { getCurated, queryCurated } from "../db/query";
import type { CuratedFilter } from "../db/query";
import { RepositoryError } from "../lib/errors";
import { logEvent } from "../lib/observe";
import type { CuratedResource, DocumentEncoding, JsonObject } from "../lib/types";
import type { Repository } from "../repository";
import { DECODERS, decodeDocument } from "./codec";
import type { XmlMode } from "./codec";

const XML_DECLARATION = `<?xml version="1.0" encoding="UTF-8"?>\n`;

export interface ExportOptions {
	/** Indented output. Defaults to true. */
	pretty?: boolean;
	/** Element layout for XML output; strict layouts reject resources they cannot order. */
	mode?: XmlMode;
}

export interface ExportResult {
	format: DocumentEncoding;
	count: number;
	bundle: JsonObject;
	text: string;
}

async function loadCurated(repo: Repository, curatedIds: readonly number[]): Promise<Map<number, CuratedResource>> {
	const found = new Map<number, CuratedResource>();
	const missing: number[] = [];
	for (const id of new Set(curatedIds)) {
		const curated = await getCurated(repo.db, id);
		if (curated) found.set(id, curated);
		else missing.push(id);
	}
	if (missing.length) throw RepositoryError.unknownCuratedId(missing);
	return found;
}

async function currentEntry(repo: Repository, curated: CuratedResource): Promise<JsonObject> {
	const raw = await findRawForCurated(repo.db, curated.curated_id, curated.current_sha256);
	if (!raw) {
		throw new Error(`Curated record ${curated.curated_id} has no raw content for ${curated.current_sha256}`);
	}
	const { resource } = decodeDocument({ text: raw.content_text, encoding: raw.encoding });
	return raw.full_url ? { fullUrl: raw.full_url, resource } : { resource };
}

/**
 * Export curated records as a collection Bundle, entries in the order given
 * (repeated ids repeat). Fails as a whole when any id is unknown.
 */
export async function exportCurated(
	repo: Repository,
	curatedIds: readonly number[],
	format: DocumentEncoding,
	options: ExportOptions = {},
): Promise<ExportResult> {
	const curated = await loadCurated(repo, curatedIds);

	const entry: JsonObject[] = [];
	for (const id of curatedIds) {
		const record = curated.get(id);
		if (record) entry.push(await currentEntry(repo, record));
	}

	const bundle: JsonObject = { resourceType: "Bundle", type: "collection", entry };
	const body = DECODERS[format].encode(bundle, { pretty: options.pretty ?? true, mode: options.mode });
	const text = format === "xml" ? XML_DECLARATION + body : body;

	logEvent("bundle_exported", { format, count: entry.length });
	return { format, count: entry.length, bundle, text };
}

/** Export whatever a curated query selects, in query order. */
export async function exportQuery(
	repo: Repository,
	filter: CuratedFilter,
	format: DocumentEncoding,
	options: ExportOptions = {},
): Promise<ExportResult> {
	const rows = await queryCurated(repo.db, filter, {
		defaultLimit: repo.config.queryDefaultLimit,
		maxLimit: repo.config.queryMaxLimit,
	});
	return exportCurated(repo, rows.map((r) => r.curated_id), format, options);
}
