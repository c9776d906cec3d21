// Schema migrations for the artefact repository.
// migrate() is the explicit bootstrap step; openRepository() only checks that
// the database is at LATEST_SCHEMA_VERSION.

import type { SqlDatabase } from "./client";
import { readNullableNumber } from "./client";
import { logEvent } from "../lib/observe";

export interface Migration {
	readonly version: number;
	readonly name: string;
	readonly sql: string;
}

const MIGRATIONS: readonly Migration[] = [
	{
		version: 1,
		name: "ingest_and_curation",
		sql: `
			CREATE TABLE ingest_run (
				run_id INTEGER PRIMARY KEY AUTOINCREMENT,
				started_ts TEXT NOT NULL,
				finished_ts TEXT,
				source_name TEXT NOT NULL,
				source_kind TEXT NOT NULL CHECK (source_kind IN ('bundle', 'package')),
				schema_major TEXT NOT NULL DEFAULT 'R4',
				partition_key TEXT,
				status TEXT NOT NULL DEFAULT 'open' CHECK (status IN ('open', 'ingesting', 'finished', 'aborted')),
				summary_json TEXT,
				error TEXT
			);
			CREATE INDEX idx_ingest_run_started_ts ON ingest_run(started_ts);

			CREATE TABLE raw_bundle (
				bundle_id INTEGER PRIMARY KEY,
				run_id INTEGER NOT NULL REFERENCES ingest_run(run_id) ON DELETE CASCADE,
				bundle_type TEXT,
				bundle_sha256 TEXT NOT NULL,
				encoding TEXT NOT NULL CHECK (encoding IN ('json', 'xml')),
				bundle_text TEXT NOT NULL
			);

			CREATE TABLE raw_document (
				raw_id INTEGER PRIMARY KEY,
				run_id INTEGER NOT NULL REFERENCES ingest_run(run_id) ON DELETE CASCADE,
				bundle_id INTEGER REFERENCES raw_bundle(bundle_id) ON DELETE SET NULL,
				full_url TEXT,
				resource_type TEXT NOT NULL,
				logical_id TEXT,
				canonical_url TEXT,
				artefact_version TEXT,
				meta_version_id TEXT,
				meta_last_updated TEXT,
				content_sha256 TEXT NOT NULL,
				encoding TEXT NOT NULL CHECK (encoding IN ('json', 'xml')),
				content_text TEXT NOT NULL,
				first_seen_ts TEXT NOT NULL,
				UNIQUE (run_id, content_sha256)
			);
			CREATE INDEX idx_raw_document_type_id ON raw_document(resource_type, logical_id);
			CREATE INDEX idx_raw_document_canonical ON raw_document(resource_type, canonical_url, artefact_version);
			CREATE INDEX idx_raw_document_sha ON raw_document(content_sha256);

			CREATE TABLE curated_resource (
				curated_id INTEGER PRIMARY KEY,
				resource_type TEXT NOT NULL,
				logical_id TEXT,
				canonical_url TEXT,
				artefact_version TEXT,
				partition_key TEXT,
				current_sha256 TEXT NOT NULL,
				has_conflict INTEGER NOT NULL DEFAULT 0 CHECK (has_conflict IN (0, 1)),
				first_seen_ts TEXT NOT NULL,
				last_seen_ts TEXT NOT NULL,
				CHECK (canonical_url IS NOT NULL OR logical_id IS NOT NULL)
			);
			CREATE UNIQUE INDEX ux_curated_canonical ON curated_resource(
				resource_type, canonical_url, IFNULL(artefact_version, ''), IFNULL(partition_key, '')
			) WHERE canonical_url IS NOT NULL;
			CREATE UNIQUE INDEX ux_curated_logical ON curated_resource(
				resource_type, logical_id, IFNULL(partition_key, '')
			) WHERE canonical_url IS NULL;
			CREATE INDEX idx_curated_last_seen ON curated_resource(last_seen_ts, curated_id);

			CREATE TABLE curated_variant (
				curated_id INTEGER NOT NULL REFERENCES curated_resource(curated_id) ON DELETE CASCADE,
				content_sha256 TEXT NOT NULL,
				occurrences INTEGER NOT NULL DEFAULT 1 CHECK (occurrences >= 1),
				first_seen_run_id INTEGER NOT NULL REFERENCES ingest_run(run_id) ON DELETE RESTRICT,
				last_seen_run_id INTEGER NOT NULL REFERENCES ingest_run(run_id) ON DELETE RESTRICT,
				note TEXT,
				PRIMARY KEY (curated_id, content_sha256)
			);

			CREATE TABLE raw_to_curated (
				raw_id INTEGER PRIMARY KEY REFERENCES raw_document(raw_id) ON DELETE CASCADE,
				curated_id INTEGER NOT NULL REFERENCES curated_resource(curated_id) ON DELETE CASCADE,
				linked_ts TEXT NOT NULL
			);
			CREATE INDEX idx_raw_to_curated_curated ON raw_to_curated(curated_id);

			CREATE TABLE reference_edge (
				edge_id INTEGER PRIMARY KEY,
				run_id INTEGER NOT NULL REFERENCES ingest_run(run_id) ON DELETE CASCADE,
				from_raw_id INTEGER NOT NULL REFERENCES raw_document(raw_id) ON DELETE CASCADE,
				from_path TEXT NOT NULL,
				to_reference TEXT NOT NULL
			);
			CREATE INDEX idx_reference_edge_run ON reference_edge(run_id);
			CREATE INDEX idx_reference_edge_raw ON reference_edge(from_raw_id);

			CREATE VIEW v_artefact_conflicts AS
			SELECT
				resource_type,
				canonical_url,
				artefact_version,
				COUNT(DISTINCT content_sha256) AS variant_count
			FROM raw_document
			WHERE canonical_url IS NOT NULL
			GROUP BY resource_type, canonical_url, artefact_version
			HAVING COUNT(DISTINCT content_sha256) > 1;
		`,
	},
];

export const LATEST_SCHEMA_VERSION = MIGRATIONS[MIGRATIONS.length - 1].version;

export async function getSchemaVersion(db: SqlDatabase): Promise<number> {
	const table = await db.prepare(
		`SELECT name FROM sqlite_master WHERE type = 'table' AND name = 'schema_migrations'`,
	).first();
	if (!table) return 0;
	const row = await db.prepare(`SELECT MAX(version) AS version FROM schema_migrations`).first();
	return row ? (readNullableNumber(row, "version") ?? 0) : 0;
}

/** Apply pending migrations. Safe to call repeatedly. Returns the versions applied. */
export async function migrate(db: SqlDatabase, now: string = new Date().toISOString()): Promise<number[]> {
	await db.exec(`CREATE TABLE IF NOT EXISTS schema_migrations (
		version INTEGER PRIMARY KEY,
		name TEXT NOT NULL,
		applied_at TEXT NOT NULL
	)`);

	const applied: number[] = [];
	await db.transaction(async () => {
		const current = await getSchemaVersion(db);
		for (const migration of MIGRATIONS) {
			if (migration.version <= current) continue;
			await db.exec(migration.sql);
			await db.prepare(
				`INSERT INTO schema_migrations (version, name, applied_at) VALUES (?, ?, ?)`,
			).bind(migration.version, migration.name, now).run();
			applied.push(migration.version);
		}
	});

	for (const version of applied) {
		logEvent("migration_applied", { version });
	}
	return applied;
}
