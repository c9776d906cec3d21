export { openRepository, closeRepository, withRepository } from "./repository";
export type { Repository, OpenRepositoryOptions } from "./repository";
export { loadConfig } from "./lib/config";
export type { RepositoryConfig, ConfigOverrides } from "./lib/config";
export { systemClock } from "./lib/clock";
export type { Clock } from "./lib/clock";
export { RepositoryError, isRepositoryError } from "./lib/errors";
export type { ErrorCode } from "./lib/errors";
export { formatError } from "./lib/format";
export { logEvent } from "./lib/observe";

export { openDatabase } from "./db/client";
export type { SqlDatabase, OpenDatabaseOptions } from "./db/client";
export { migrate, getSchemaVersion, LATEST_SCHEMA_VERSION } from "./db/schema";
export { getRun, listRuns } from "./db/runs";
export {
	appendRawDocument,
	appendRawBundle,
	appendReferenceEdge,
	getRawDocument,
	findRawForCurated,
	listRawDocuments,
	listReferenceEdges,
} from "./db/raw";
export {
	queryCurated,
	getCurated,
	findCuratedByIdent,
	listVariants,
	listArtefactConflicts,
	CuratedFilterSchema,
} from "./db/query";
export type { CuratedFilter, QueryLimits } from "./db/query";

export { decodeDocument, jsonDecoder, xmlDecoder, DECODERS, sniffEncoding, XML_NAMESPACE } from "./domain/codec";
export type { DocumentDecoder, SourceDocument, EncodeOptions, XmlMode } from "./domain/codec";
export { extractIdentity } from "./domain/identity";
export { computeDigest, canonicalText, stableJson, sha256Hex } from "./domain/hasher";
export { scanReferences } from "./domain/references";
export { resolve, identityKey, isIdentifiable } from "./domain/resolver";
export type { ResolveInput, ResolveResult } from "./domain/resolver";
export { ingestDocuments, ingestBundle, ingestPackage } from "./domain/ingestion";
export type { IngestOptions, DriverOptions, BundleIngestOptions, PackageFile } from "./domain/ingestion";
export { exportCurated, exportQuery } from "./domain/export";
export type { ExportOptions, ExportResult } from "./domain/export";

export type * from "./lib/types";
