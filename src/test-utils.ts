// Shared fixtures for tests: an in-memory repository with a ticking clock, so
// every timestamp a test sees is distinct and predictable.

import { openDatabase } from "./db/client";
import { migrate } from "./db/schema";
import type { Clock } from "./lib/clock";
import { loadConfig } from "./lib/config";
import type { ConfigOverrides } from "./lib/config";
import type { JsonObject } from "./lib/types";
import type { Repository } from "./repository";

const EPOCH = Date.UTC(2024, 0, 1);

/** Each call returns the next second after 2024-01-01T00:00:00.000Z, starting at +1s. */
export function tickingClock(start = EPOCH): Clock {
	let tick = 0;
	return () => new Date(start + ++tick * 1000).toISOString();
}

export async function createTestRepository(overrides: ConfigOverrides = {}): Promise<Repository> {
	const config = loadConfig({}, { databasePath: ":memory:", retryDelayMs: 0, ...overrides });
	const db = openDatabase(config.databasePath);
	await migrate(db, "2024-01-01T00:00:00.000Z");
	return { db, config, now: tickingClock() };
}

export function valueSet(url: string, version: string | null, extra: JsonObject = {}): JsonObject {
	const resource: JsonObject = { resourceType: "ValueSet", url, status: "active", ...extra };
	if (version !== null) resource.version = version;
	return resource;
}

export function bundleOf(resources: JsonObject[], fullUrls: (string | null)[] = []): JsonObject {
	return {
		resourceType: "Bundle",
		type: "collection",
		entry: resources.map((resource, i): JsonObject => {
			const fullUrl = fullUrls[i];
			return fullUrl ? { fullUrl, resource } : { resource };
		}),
	};
}
