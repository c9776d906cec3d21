// Shared interfaces for the artefact repository.

export type JsonPrimitive = string | number | boolean | null;
export type JsonValue = JsonPrimitive | JsonValue[] | JsonObject;
export interface JsonObject {
	[key: string]: JsonValue;
}

export type DocumentEncoding = "json" | "xml";
export type SourceKind = "bundle" | "package";
export type RunStatus = "open" | "ingesting" | "finished" | "aborted";
export type DigestPolicy = "encoding" | "canonical";

export interface DocumentIdentity {
	resourceType: string;
	logicalId: string | null;
	canonicalUrl: string | null;
	artefactVersion: string | null;
	metaVersionId: string | null;
	metaLastUpdated: string | null;
}

export interface DecodedDocument {
	encoding: DocumentEncoding;
	resource: JsonObject;
	/** Exactly what was submitted, or the serialization of an already parsed value. */
	text: string;
}

export interface IngestSource {
	name: string;
	kind: SourceKind;
	partitionKey?: string | null;
}

export interface IngestRun {
	run_id: number;
	started_ts: string;
	finished_ts: string | null;
	source_name: string;
	source_kind: SourceKind;
	schema_major: string;
	partition_key: string | null;
	status: RunStatus;
	summary: IngestSummary | null;
	error: string | null;
}

export interface RawDocument {
	raw_id: number;
	run_id: number;
	bundle_id: number | null;
	full_url: string | null;
	resource_type: string;
	logical_id: string | null;
	canonical_url: string | null;
	artefact_version: string | null;
	meta_version_id: string | null;
	meta_last_updated: string | null;
	content_sha256: string;
	encoding: DocumentEncoding;
	content_text: string;
	first_seen_ts: string;
}

export interface CuratedResource {
	curated_id: number;
	resource_type: string;
	logical_id: string | null;
	canonical_url: string | null;
	artefact_version: string | null;
	partition_key: string | null;
	current_sha256: string;
	has_conflict: boolean;
	first_seen_ts: string;
	last_seen_ts: string;
}

export interface Variant {
	curated_id: number;
	content_sha256: string;
	occurrences: number;
	first_seen_run_id: number;
	last_seen_run_id: number;
	note: string | null;
}

export interface ReferenceEdge {
	edge_id: number;
	run_id: number;
	from_raw_id: number;
	from_path: string;
	to_reference: string;
}

export interface ArtefactConflict {
	resource_type: string;
	canonical_url: string;
	artefact_version: string | null;
	variant_count: number;
}

export type SkipReason = "malformed_document" | "unidentifiable_document";

export interface SkippedDocument {
	index: number;
	full_url: string | null;
	/** Caller-side locator such as a package file path. */
	origin: string | null;
	reason: SkipReason;
	message: string;
}

export interface IngestSummary {
	documents_seen: number;
	new_raw_documents: number;
	duplicate_raw_documents: number;
	new_curated_identities: number;
	new_conflicts: number;
	reference_edges: number;
	busy_retries: number;
	skipped: SkippedDocument[];
}

export interface IngestOutcome extends IngestSummary {
	run_id: number;
	status: "finished" | "aborted";
	error: string | null;
}
