// Explicit repository handle: one database connection, its configuration and
// a clock. There is no process-wide connection; callers open and close handles.

import { openDatabase } from "./db/client";
import type { SqlDatabase } from "./db/client";
import { LATEST_SCHEMA_VERSION, getSchemaVersion, migrate } from "./db/schema";
import type { Clock } from "./lib/clock";
import { systemClock } from "./lib/clock";
import type { RepositoryConfig } from "./lib/config";
import { RepositoryError } from "./lib/errors";

export interface Repository {
	readonly db: SqlDatabase;
	readonly config: RepositoryConfig;
	readonly now: Clock;
}

export interface OpenRepositoryOptions {
	clock?: Clock;
	/** Apply pending migrations instead of failing on an outdated schema. */
	migrate?: boolean;
}

export async function openRepository(
	config: RepositoryConfig,
	options: OpenRepositoryOptions = {},
): Promise<Repository> {
	const db = openDatabase(config.databasePath, { busyTimeoutMs: config.busyTimeoutMs });
	try {
		if (options.migrate) await migrate(db);
		const version = await getSchemaVersion(db);
		if (version !== LATEST_SCHEMA_VERSION) {
			throw RepositoryError.storageUnavailable(
				`Schema version ${version} does not match ${LATEST_SCHEMA_VERSION}; run migrations first`,
			);
		}
	} catch (err) {
		db.close();
		throw err;
	}
	return { db, config, now: options.clock ?? systemClock };
}

export function closeRepository(repo: Repository): void {
	repo.db.close();
}

/** Open a repository for the duration of `fn`, closing it afterwards. */
export async function withRepository<T>(
	config: RepositoryConfig,
	fn: (repo: Repository) => Promise<T>,
	options: OpenRepositoryOptions = {},
): Promise<T> {
	const repo = await openRepository(config, options);
	try {
		return await fn(repo);
	} finally {
		closeRepository(repo);
	}
}
