// Ingest run controller. A run walks open -> ingesting -> finished | aborted.
// Each document is one write unit: raw append, resolve and reference edges
// commit together or not at all. Units that hit lock contention are retried
// with exponential backoff; exhausted retries or an unusable store abort the
// run, keeping whatever already committed.

import { setTimeout as sleep } from "node:timers/promises";
import { z } from "zod";
import { appendRawBundle, appendRawDocument, appendReferenceEdge } from "../db/raw";
import { abortRun, finishRun, markIngesting, openRun } from "../db/runs";
import { RepositoryError, isRepositoryError } from "../lib/errors";
import { logEvent } from "../lib/observe";
import type {
	DecodedDocument,
	DocumentEncoding,
	DocumentIdentity,
	IngestOutcome,
	IngestSource,
	IngestSummary,
	JsonObject,
	SkipReason,
} from "../lib/types";
import type { Repository } from "../repository";
import { decodeDocument, isJsonObject } from "./codec";
import type { SourceDocument } from "./codec";
import { computeDigest } from "./hasher";
import { extractIdentity } from "./identity";
import { scanReferences } from "./references";
import { isIdentifiable, resolve } from "./resolver";

export interface IngestOptions {
	/** Record reference edges. Defaults to on for bundles, off for packages. */
	extractReferences?: boolean;
}

export interface DriverOptions extends IngestOptions {
	sourceName?: string;
	partitionKey?: string | null;
}

export interface BundleIngestOptions extends DriverOptions {
	encoding?: DocumentEncoding;
}

export interface PackageFile {
	path: string;
	text: string | Uint8Array;
}

type DocumentStream = Iterable<SourceDocument> | AsyncIterable<SourceDocument>;

const SourceSchema = z.object({
	name: z.string().trim().min(1, "source name is required"),
	kind: z.enum(["bundle", "package"]),
	partitionKey: z.string().min(1).nullable().optional(),
});

const PACKAGE_METADATA_FILES = new Set(["package.json", ".index.json"]);

function parseSource(source: IngestSource): IngestSource {
	const parsed = SourceSchema.safeParse(source);
	if (!parsed.success) {
		const detail = parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; ");
		throw RepositoryError.validation(`Invalid ingest source: ${detail}`);
	}
	return parsed.data;
}

function emptySummary(): IngestSummary {
	return {
		documents_seen: 0,
		new_raw_documents: 0,
		duplicate_raw_documents: 0,
		new_curated_identities: 0,
		new_conflicts: 0,
		reference_edges: 0,
		busy_retries: 0,
		skipped: [],
	};
}

function errorMessage(err: unknown): string {
	return err instanceof Error ? err.message : String(err);
}

type UnitResult =
	| { kind: "duplicate"; rawId: number }
	| { kind: "resolved"; rawId: number; edges: number; isNewIdentity: boolean; conflictRaised: boolean }
	| { kind: "unidentifiable"; rawId: number; edges: number; message: string };

/** Run one write unit, retrying while the store reports lock contention. */
async function withBusyRetry<T>(
	repo: Repository,
	summary: IngestSummary,
	context: Record<string, unknown>,
	unit: () => Promise<T>,
): Promise<T> {
	const { maxBusyRetries, retryDelayMs, retryBackoffMultiplier } = repo.config;
	for (let attempt = 0; ; attempt++) {
		try {
			return await unit();
		} catch (err) {
			if (!isRepositoryError(err, "storage_busy") || attempt >= maxBusyRetries) throw err;
			const delay = retryDelayMs * retryBackoffMultiplier ** attempt;
			summary.busy_retries++;
			logEvent("storage_busy_retry", { ...context, attempt: attempt + 1, delay_ms: delay });
			await sleep(delay);
		}
	}
}

interface PreparedDocument {
	source: SourceDocument;
	decoded: DecodedDocument;
	identity: DocumentIdentity;
	digest: string;
}

function prepareDocument(repo: Repository, source: SourceDocument): PreparedDocument {
	const decoded = decodeDocument(source);
	const identity = extractIdentity(decoded.resource);
	return { source, decoded, identity, digest: computeDigest(decoded, repo.config.digestPolicy) };
}

function writeDocument(
	repo: Repository,
	runId: number,
	partitionKey: string | null,
	doc: PreparedDocument,
	extractReferences: boolean,
): Promise<UnitResult> {
	const { db } = repo;
	const { identity, digest, decoded } = doc;

	return db.transaction(async (): Promise<UnitResult> => {
		const now = repo.now();
		const { rawId, created } = await appendRawDocument(db, {
			runId,
			bundleId: doc.source.bundleId,
			fullUrl: doc.source.fullUrl,
			identity,
			digest,
			encoding: decoded.encoding,
			contentText: decoded.text,
			now,
		});
		if (!created) return { kind: "duplicate", rawId };

		let edges = 0;
		if (extractReferences) {
			for (const ref of scanReferences(decoded.resource)) {
				await appendReferenceEdge(db, runId, rawId, ref.path, ref.reference);
				edges++;
			}
		}

		try {
			const resolved = await resolve(db, { identity, digest, runId, rawId, partitionKey, now });
			return {
				kind: "resolved",
				rawId,
				edges,
				isNewIdentity: resolved.isNewIdentity,
				conflictRaised: resolved.conflictRaised,
			};
		} catch (err) {
			if (!isRepositoryError(err, "unidentifiable_document")) throw err;
			return { kind: "unidentifiable", rawId, edges, message: err.message };
		}
	});
}

function recordSkip(
	summary: IngestSummary,
	runId: number,
	index: number,
	doc: SourceDocument,
	reason: SkipReason,
	message: string,
): void {
	const skip = { index, full_url: doc.fullUrl ?? null, origin: doc.origin ?? null, reason, message };
	summary.skipped.push(skip);
	const event = reason === "malformed_document" ? "document_malformed" : "document_unidentifiable";
	logEvent(event, { run_id: runId, ...skip });
}

async function runIngest(
	repo: Repository,
	input: IngestSource,
	produce: (runId: number) => DocumentStream,
	options: IngestOptions,
): Promise<IngestOutcome> {
	const source = parseSource(input);
	const partitionKey = source.partitionKey ?? null;
	const extractReferences = options.extractReferences ?? source.kind === "bundle";
	const { db } = repo;

	const runId = await db.transaction(async () => {
		const id = await openRun(db, source, repo.config.schemaMajor, repo.now());
		await markIngesting(db, id);
		return id;
	});
	logEvent("ingest_run_opened", {
		run_id: runId,
		source_name: source.name,
		source_kind: source.kind,
		partition_key: partitionKey,
	});

	const summary = emptySummary();
	try {
		for await (const doc of produce(runId)) {
			const index = summary.documents_seen++;

			let prepared: PreparedDocument;
			try {
				prepared = prepareDocument(repo, doc);
			} catch (err) {
				if (!isRepositoryError(err, "malformed_document")) throw err;
				recordSkip(summary, runId, index, doc, "malformed_document", err.message);
				continue;
			}

			const result = await withBusyRetry(repo, summary, { run_id: runId, index }, () =>
				writeDocument(repo, runId, partitionKey, prepared, extractReferences),
			);

			if (result.kind === "duplicate") {
				summary.duplicate_raw_documents++;
				// repeats of an unidentifiable document are reported each time
				if (!isIdentifiable(prepared.identity)) {
					const { message } = RepositoryError.unidentifiable(prepared.identity.resourceType);
					recordSkip(summary, runId, index, doc, "unidentifiable_document", message);
				}
				continue;
			}
			summary.new_raw_documents++;
			summary.reference_edges += result.edges;
			if (result.kind === "unidentifiable") {
				recordSkip(summary, runId, index, doc, "unidentifiable_document", result.message);
				continue;
			}
			if (result.isNewIdentity) summary.new_curated_identities++;
			if (result.conflictRaised) summary.new_conflicts++;
		}
	} catch (err) {
		const message = errorMessage(err);
		try {
			await db.transaction(() => abortRun(db, runId, summary, message, repo.now()));
			logEvent("ingest_run_aborted", { run_id: runId, error: message, ...counts(summary) });
		} catch (recordErr) {
			logEvent("ingest_run_aborted", {
				run_id: runId,
				error: message,
				recorded: false,
				record_error: errorMessage(recordErr),
			});
		}
		if (isRepositoryError(err, "storage_busy") || isRepositoryError(err, "storage_unavailable")) {
			return { run_id: runId, status: "aborted", error: message, ...summary };
		}
		throw err;
	}

	await db.transaction(() => finishRun(db, runId, summary, repo.now()));
	logEvent("ingest_run_finished", { run_id: runId, ...counts(summary) });
	return { run_id: runId, status: "finished", error: null, ...summary };
}

function counts(summary: IngestSummary): Record<string, number> {
	return {
		documents_seen: summary.documents_seen,
		new_raw_documents: summary.new_raw_documents,
		duplicate_raw_documents: summary.duplicate_raw_documents,
		new_curated_identities: summary.new_curated_identities,
		new_conflicts: summary.new_conflicts,
		reference_edges: summary.reference_edges,
		busy_retries: summary.busy_retries,
		skipped: summary.skipped.length,
	};
}

/** Ingest a stream of documents as one run, in source order. */
export function ingestDocuments(
	repo: Repository,
	source: IngestSource,
	documents: DocumentStream,
	options: IngestOptions = {},
): Promise<IngestOutcome> {
	return runIngest(repo, source, () => documents, options);
}

// --- Bundle and package drivers ---

function bundleEntries(bundle: JsonObject): { fullUrl: string | null; resource: unknown }[] {
	// a lone XML <entry> decodes to an object
	const entries = Array.isArray(bundle.entry) ? bundle.entry : isJsonObject(bundle.entry) ? [bundle.entry] : [];
	return entries.map((entry) => {
		if (!isJsonObject(entry)) return { fullUrl: null, resource: undefined };
		return {
			fullUrl: typeof entry.fullUrl === "string" ? entry.fullUrl : null,
			resource: entry.resource,
		};
	});
}

/** Record the bundle row and yield its entries as source documents. */
async function* expandBundle(
	repo: Repository,
	runId: number,
	bundle: DecodedDocument,
	origin: string | null = null,
): AsyncGenerator<SourceDocument> {
	const { db } = repo;
	const bundleType = typeof bundle.resource.type === "string" ? bundle.resource.type : null;
	const digest = computeDigest(bundle, repo.config.digestPolicy);
	const bundleId = await db.transaction(() =>
		appendRawBundle(db, runId, { bundleType, digest, encoding: bundle.encoding, text: bundle.text }),
	);
	for (const entry of bundleEntries(bundle.resource)) {
		if (entry.resource === undefined) {
			// no text and no resource: decoding reports it as malformed
			yield { fullUrl: entry.fullUrl, bundleId, origin };
			continue;
		}
		yield { resource: entry.resource, encoding: bundle.encoding, fullUrl: entry.fullUrl, bundleId, origin };
	}
}

/**
 * Ingest a Bundle document (JSON or XML text, or an already parsed object).
 * Anything other than a Bundle is rejected before a run is opened.
 */
export async function ingestBundle(
	repo: Repository,
	bundle: string | Uint8Array | JsonObject,
	options: BundleIngestOptions = {},
): Promise<IngestOutcome> {
	const decoded = typeof bundle === "string" || bundle instanceof Uint8Array
		? decodeDocument({ text: bundle, encoding: options.encoding })
		: decodeDocument({ resource: bundle, encoding: options.encoding });
	if (decoded.resource.resourceType !== "Bundle") {
		const actual = typeof decoded.resource.resourceType === "string" ? decoded.resource.resourceType : "unknown";
		throw RepositoryError.malformed(`Not a Bundle document (resourceType ${actual})`);
	}

	const source: IngestSource = {
		name: options.sourceName ?? "bundle",
		kind: "bundle",
		partitionKey: options.partitionKey ?? null,
	};
	return runIngest(repo, source, (runId) => expandBundle(repo, runId, decoded), options);
}

function packageEncoding(path: string): DocumentEncoding | null {
	const lower = path.toLowerCase();
	if (lower.endsWith(".json")) return "json";
	if (lower.endsWith(".xml")) return "xml";
	return null;
}

function baseName(path: string): string {
	const parts = path.split(/[\\/]/);
	return parts[parts.length - 1];
}

async function* expandPackage(
	repo: Repository,
	runId: number,
	files: Iterable<PackageFile> | AsyncIterable<PackageFile>,
): AsyncGenerator<SourceDocument> {
	for await (const file of files) {
		const encoding = packageEncoding(file.path);
		if (!encoding || PACKAGE_METADATA_FILES.has(baseName(file.path))) continue;

		const doc: SourceDocument = { text: file.text, encoding, origin: file.path };
		let decoded: DecodedDocument;
		try {
			decoded = decodeDocument(doc);
		} catch (err) {
			if (!isRepositoryError(err, "malformed_document")) throw err;
			// re-decoded by the run loop, which records the failure
			yield doc;
			continue;
		}

		if (decoded.resource.resourceType === "Bundle") {
			yield* expandBundle(repo, runId, decoded, file.path);
		} else {
			yield doc;
		}
	}
}

/**
 * Ingest the files of an already unpacked package. Package metadata files and
 * anything that is not .json or .xml are ignored; Bundles are expanded.
 */
export function ingestPackage(
	repo: Repository,
	files: Iterable<PackageFile> | AsyncIterable<PackageFile>,
	options: DriverOptions = {},
): Promise<IngestOutcome> {
	const source: IngestSource = {
		name: options.sourceName ?? "package",
		kind: "package",
		partitionKey: options.partitionKey ?? null,
	};
	return runIngest(repo, source, (runId) => expandPackage(repo, runId, files), options);
}
