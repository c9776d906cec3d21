import { describe, test, expect, beforeEach, afterEach } from "vitest";
import { mkdtempSync, rmSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { createTestRepository } from "./test-utils";
import { openDatabase, readNumber, translateError } from "./db/client";
import type { SqlDatabase } from "./db/client";
import { LATEST_SCHEMA_VERSION, getSchemaVersion, migrate } from "./db/schema";
import { getRun, listRuns, openRun } from "./db/runs";
import {
	appendRawDocument,
	appendReferenceEdge,
	findRawForCurated,
	getRawDocument,
	listRawDocuments,
	listReferenceEdges,
} from "./db/raw";
import { insertCurated } from "./db/curated";
import {
	findCuratedByIdent,
	getCurated,
	listArtefactConflicts,
	listVariants,
	queryCurated,
} from "./db/query";
import type { QueryLimits } from "./db/query";
import { identityKey, resolve } from "./domain/resolver";
import { RepositoryError } from "./lib/errors";
import type { DocumentIdentity } from "./lib/types";
import type { Repository } from "./repository";

let repo: Repository;
let db: SqlDatabase;
let runId: number;

const LIMITS: QueryLimits = { defaultLimit: 500, maxLimit: 5000 };

function ident(fields: Partial<DocumentIdentity> = {}): DocumentIdentity {
	return {
		resourceType: "StructureDefinition",
		logicalId: null,
		canonicalUrl: null,
		artefactVersion: null,
		metaVersionId: null,
		metaLastUpdated: null,
		...fields,
	};
}

async function newRun(name = "test"): Promise<number> {
	return openRun(db, { name, kind: "bundle" }, "R4", repo.now());
}

async function rawFor(run: number, identity: DocumentIdentity, digest: string, now = repo.now()): Promise<number> {
	const { rawId } = await appendRawDocument(db, {
		runId: run,
		identity,
		digest,
		encoding: "json",
		contentText: `{"digest":"${digest}"}`,
		now,
	});
	return rawId;
}

/** Append a raw row and resolve it, returning the curated id. */
async function sighting(
	identity: DocumentIdentity,
	digest: string,
	options: { run?: number; now?: string; partitionKey?: string | null } = {},
) {
	const run = options.run ?? runId;
	const now = options.now ?? repo.now();
	const rawId = await rawFor(run, identity, digest, now);
	return resolve(db, { identity, digest, runId: run, rawId, partitionKey: options.partitionKey ?? null, now });
}

beforeEach(async () => {
	repo = await createTestRepository();
	db = repo.db;
	runId = await newRun();
});

afterEach(() => {
	db.close();
});

// ---- Schema and client ----

describe("schema", () => {
	test("fresh database is at version 0 and migrates to the latest", async () => {
		const fresh = openDatabase(":memory:");
		expect(await getSchemaVersion(fresh)).toBe(0);
		expect(await migrate(fresh)).toEqual([1]);
		expect(await getSchemaVersion(fresh)).toBe(LATEST_SCHEMA_VERSION);
		fresh.close();
	});

	test("migrate is idempotent", async () => {
		expect(await migrate(db)).toEqual([]);
		expect(await getSchemaVersion(db)).toBe(LATEST_SCHEMA_VERSION);
	});

	test("curated records need a canonical url or a logical id", async () => {
		await expect(insertCurated(db, ident(), null, "sha-x", repo.now())).rejects.toThrow(/CHECK constraint failed/);
	});

	test("raw documents are unique per run and digest", async () => {
		const now = repo.now();
		await db.prepare(
			`INSERT INTO raw_document (run_id, resource_type, content_sha256, encoding, content_text, first_seen_ts)
			 VALUES (?, 'ValueSet', 'sha-1', 'json', '{}', ?)`,
		).bind(runId, now).run();
		await expect(db.prepare(
			`INSERT INTO raw_document (run_id, resource_type, content_sha256, encoding, content_text, first_seen_ts)
			 VALUES (?, 'ValueSet', 'sha-1', 'json', '{}', ?)`,
		).bind(runId, now).run()).rejects.toThrow(/UNIQUE constraint failed/);
	});
});

describe("client", () => {
	test("transaction rolls back on error", async () => {
		await expect(db.transaction(async () => {
			await newRun("doomed");
			throw new Error("boom");
		})).rejects.toThrow("boom");
		expect((await listRuns(db)).map((r) => r.source_name)).toEqual(["test"]);
	});

	test("nested transaction failure only rolls back its savepoint", async () => {
		await db.transaction(async () => {
			await newRun("outer");
			await expect(db.transaction(async () => {
				await newRun("inner");
				throw new Error("inner failed");
			})).rejects.toThrow("inner failed");
		});
		expect((await listRuns(db)).map((r) => r.source_name)).toEqual(["outer", "test"]);
	});

	test("transactions on one handle run one after another", async () => {
		const order: string[] = [];
		await Promise.all([
			db.transaction(async () => {
				order.push("a:start");
				await new Promise((done) => setTimeout(done, 5));
				order.push("a:end");
			}),
			db.transaction(async () => {
				order.push("b:start");
				order.push("b:end");
			}),
		]);
		expect(order).toEqual(["a:start", "a:end", "b:start", "b:end"]);
	});

	test("maps driver errors onto the repository taxonomy", () => {
		const busy = translateError(Object.assign(new Error("database is locked"), { code: "SQLITE_BUSY" }));
		expect(busy).toBeInstanceOf(RepositoryError);
		expect(busy).toMatchObject({ code: "storage_busy", retryable: true });

		const io = translateError(Object.assign(new Error("disk I/O error"), { code: "SQLITE_IOERR_WRITE" }));
		expect(io).toMatchObject({ code: "storage_unavailable", retryable: false });

		const other = new Error("no such table: nope");
		expect(translateError(other)).toBe(other);
	});

	test("a closed handle reports storage unavailable", async () => {
		db.close();
		expect(db.open).toBe(false);
		await expect(db.prepare("SELECT 1").first()).rejects.toMatchObject({ code: "storage_unavailable" });
	});

	test("a competing writer surfaces as storage busy", async () => {
		const dir = mkdtempSync(join(tmpdir(), "vault-busy-"));
		const path = join(dir, "busy.sqlite");
		const holder = openDatabase(path);
		const contender = openDatabase(path, { busyTimeoutMs: 0 });
		try {
			await migrate(holder);
			let release: () => void = () => {};
			const gate = new Promise<void>((done) => {
				release = done;
			});
			let started: () => void = () => {};
			const holding = new Promise<void>((done) => {
				started = done;
			});
			const held = holder.transaction(async () => {
				await openRun(holder, { name: "holder", kind: "bundle" }, "R4", "2024-01-01T00:00:00.000Z");
				started();
				await gate;
			});
			await holding;
			await expect(contender.transaction(() =>
				openRun(contender, { name: "contender", kind: "bundle" }, "R4", "2024-01-01T00:00:00.000Z"),
			)).rejects.toMatchObject({ code: "storage_busy" });
			release();
			await held;
		} finally {
			holder.close();
			contender.close();
			rmSync(dir, { recursive: true, force: true });
		}
	});
});

// ---- Run records ----

describe("runs", () => {
	test("open run is recorded with its source", async () => {
		const run = await getRun(db, runId);
		expect(run).toEqual({
			run_id: runId,
			started_ts: "2024-01-01T00:00:01.000Z",
			finished_ts: null,
			source_name: "test",
			source_kind: "bundle",
			schema_major: "R4",
			partition_key: null,
			status: "open",
			summary: null,
			error: null,
		});
	});

	test("unknown run is null", async () => {
		expect(await getRun(db, 9999)).toBeNull();
	});

	test("a stored summary that does not match the summary shape is an error", async () => {
		await db.prepare(`UPDATE ingest_run SET summary_json = ? WHERE run_id = ?`)
			.bind(`{"documents_seen":"many"}`, runId).run();
		await expect(getRun(db, runId)).rejects.toThrow(`Run ${runId} has an invalid summary: documents_seen: `);

		await db.prepare(`UPDATE ingest_run SET summary_json = ? WHERE run_id = ?`).bind("not json", runId).run();
		await expect(getRun(db, runId)).rejects.toThrow(`Run ${runId} has an invalid summary: `);
	});

	test("listRuns is newest first", async () => {
		const second = await newRun("second");
		expect((await listRuns(db)).map((r) => r.run_id)).toEqual([second, runId]);
		expect((await listRuns(db, 1)).map((r) => r.run_id)).toEqual([second]);
	});
});

// ---- Raw store ----

describe("raw store", () => {
	test("append stores every identity field", async () => {
		const identity = ident({
			logicalId: "sd1",
			canonicalUrl: "http://x/sd1",
			artefactVersion: "1.0",
			metaVersionId: "2",
			metaLastUpdated: "2023-12-31T00:00:00Z",
		});
		const { rawId, created } = await appendRawDocument(db, {
			runId,
			fullUrl: "urn:uuid:1",
			identity,
			digest: "sha-1",
			encoding: "xml",
			contentText: "<StructureDefinition/>",
			now: "2024-03-01T00:00:00.000Z",
		});
		expect(created).toBe(true);
		expect(await getRawDocument(db, rawId)).toEqual({
			raw_id: rawId,
			run_id: runId,
			bundle_id: null,
			full_url: "urn:uuid:1",
			resource_type: "StructureDefinition",
			logical_id: "sd1",
			canonical_url: "http://x/sd1",
			artefact_version: "1.0",
			meta_version_id: "2",
			meta_last_updated: "2023-12-31T00:00:00Z",
			content_sha256: "sha-1",
			encoding: "xml",
			content_text: "<StructureDefinition/>",
			first_seen_ts: "2024-03-01T00:00:00.000Z",
		});
	});

	test("same digest in the same run returns the existing row", async () => {
		const identity = ident({ logicalId: "sd1" });
		const first = await appendRawDocument(db, {
			runId, identity, digest: "sha-1", encoding: "json", contentText: "{}", now: repo.now(),
		});
		const again = await appendRawDocument(db, {
			runId, identity, digest: "sha-1", encoding: "json", contentText: "{ }", now: repo.now(),
		});
		expect(again).toEqual({ rawId: first.rawId, created: false });
		expect(await listRawDocuments(db, runId)).toHaveLength(1);
		expect((await getRawDocument(db, first.rawId))?.content_text).toBe("{}");
	});

	test("same digest in another run is a new row", async () => {
		const identity = ident({ logicalId: "sd1" });
		const a = await rawFor(runId, identity, "sha-1");
		const b = await rawFor(await newRun(), identity, "sha-1");
		expect(b).not.toBe(a);
	});

	test("reference edges filter by run and source row", async () => {
		const run2 = await newRun();
		const raw1 = await rawFor(runId, ident({ logicalId: "a" }), "sha-a");
		const raw2 = await rawFor(run2, ident({ logicalId: "b" }), "sha-b");
		await appendReferenceEdge(db, runId, raw1, "subject", "Patient/1");
		await appendReferenceEdge(db, runId, raw1, "performer[0]", "Practitioner/2");
		await appendReferenceEdge(db, run2, raw2, "subject", "Patient/3");

		expect((await listReferenceEdges(db)).map((e) => e.to_reference))
			.toEqual(["Patient/1", "Practitioner/2", "Patient/3"]);
		expect((await listReferenceEdges(db, { runId: run2 })).map((e) => e.to_reference)).toEqual(["Patient/3"]);
		const fromRaw1 = await listReferenceEdges(db, { runId, fromRawId: raw1 });
		expect(fromRaw1.map((e) => [e.from_path, e.to_reference])).toEqual([
			["subject", "Patient/1"],
			["performer[0]", "Practitioner/2"],
		]);
	});

	test("findRawForCurated follows links to the requested digest", async () => {
		const identity = ident({ canonicalUrl: "http://x/sd1" });
		const first = await sighting(identity, "sha-1");
		await sighting(identity, "sha-2");
		const raw = await findRawForCurated(db, first.curatedId, "sha-1");
		expect(raw?.content_text).toBe(`{"digest":"sha-1"}`);
		expect(await findRawForCurated(db, first.curatedId, "sha-missing")).toBeNull();
	});
});

// ---- Resolver ----

describe("resolver", () => {
	const sd1 = ident({ canonicalUrl: "http://x/sd1", artefactVersion: "1.0" });

	test("identity key prefers the canonical url", () => {
		expect(identityKey(sd1, null)).toBe("StructureDefinition:http://x/sd1|1.0");
		expect(identityKey(ident({ logicalId: "sd1" }), "tenant")).toBe("tenant:StructureDefinition/sd1");
		expect(() => identityKey(ident({ resourceType: "Questionnaire" }), null)).toThrow(
			"Questionnaire has neither a canonical url nor a logical id",
		);
	});

	test("first sighting creates the curated record, its variant and the link", async () => {
		const result = await sighting(sd1, "sha-1", { now: "2024-02-01T00:00:00.000Z" });
		expect(result).toMatchObject({
			isNewIdentity: true,
			isNewVariant: true,
			conflictNow: false,
			conflictRaised: false,
		});
		expect(await getCurated(db, result.curatedId)).toEqual({
			curated_id: result.curatedId,
			resource_type: "StructureDefinition",
			logical_id: null,
			canonical_url: "http://x/sd1",
			artefact_version: "1.0",
			partition_key: null,
			current_sha256: "sha-1",
			has_conflict: false,
			first_seen_ts: "2024-02-01T00:00:00.000Z",
			last_seen_ts: "2024-02-01T00:00:00.000Z",
		});
		expect(await listVariants(db, result.curatedId)).toEqual([{
			curated_id: result.curatedId,
			content_sha256: "sha-1",
			occurrences: 1,
			first_seen_run_id: runId,
			last_seen_run_id: runId,
			note: null,
		}]);
	});

	test("same content in a later run bumps the variant", async () => {
		const first = await sighting(sd1, "sha-1", { now: "2024-02-01T00:00:00.000Z" });
		const run2 = await newRun();
		const again = await sighting(sd1, "sha-1", { run: run2, now: "2024-02-02T00:00:00.000Z" });
		expect(again).toEqual({
			curatedId: first.curatedId,
			isNewIdentity: false,
			isNewVariant: false,
			conflictNow: false,
			conflictRaised: false,
		});
		const [variant] = await listVariants(db, first.curatedId);
		expect(variant).toMatchObject({ occurrences: 2, first_seen_run_id: runId, last_seen_run_id: run2 });
		expect(await getCurated(db, first.curatedId)).toMatchObject({
			first_seen_ts: "2024-02-01T00:00:00.000Z",
			last_seen_ts: "2024-02-02T00:00:00.000Z",
		});
	});

	test("a second digest raises a sticky conflict and becomes current", async () => {
		const first = await sighting(sd1, "sha-1");
		const second = await sighting(sd1, "sha-2");
		expect(second).toMatchObject({ isNewVariant: true, conflictNow: true, conflictRaised: true });
		expect(await getCurated(db, first.curatedId)).toMatchObject({ has_conflict: true, current_sha256: "sha-2" });

		const back = await sighting(sd1, "sha-1", { run: await newRun() });
		expect(back).toMatchObject({ isNewVariant: false, conflictNow: true, conflictRaised: false });
		expect(await getCurated(db, first.curatedId)).toMatchObject({ has_conflict: true, current_sha256: "sha-1" });
		expect((await listVariants(db, first.curatedId)).map((v) => [v.content_sha256, v.occurrences]))
			.toEqual([["sha-1", 2], ["sha-2", 1]]);
	});

	test("version, partition and type are part of the identity", async () => {
		const a = await sighting(sd1, "sha-1");
		const b = await sighting(ident({ canonicalUrl: "http://x/sd1", artefactVersion: "2.0" }), "sha-2");
		const c = await sighting(sd1, "sha-3", { partitionKey: "tenant-a" });
		const d = await sighting(ident({ resourceType: "ValueSet", canonicalUrl: "http://x/sd1", artefactVersion: "1.0" }), "sha-4");
		const ids = new Set([a.curatedId, b.curatedId, c.curatedId, d.curatedId]);
		expect(ids.size).toBe(4);
		expect([a, b, c, d].every((r) => r.isNewIdentity && !r.conflictNow)).toBe(true);
	});

	test("canonical identities ignore the logical id", async () => {
		const a = await sighting(ident({ canonicalUrl: "http://x/sd1", logicalId: "one" }), "sha-1");
		const b = await sighting(ident({ canonicalUrl: "http://x/sd1", logicalId: "two" }), "sha-2");
		expect(b.curatedId).toBe(a.curatedId);
		expect(b.conflictRaised).toBe(true);
	});

	test("logical identities match on type and id", async () => {
		const a = await sighting(ident({ resourceType: "Patient", logicalId: "p1" }), "sha-1");
		const b = await sighting(ident({ resourceType: "Patient", logicalId: "p1" }), "sha-1b");
		const c = await sighting(ident({ resourceType: "Group", logicalId: "p1" }), "sha-2");
		expect(b.curatedId).toBe(a.curatedId);
		expect(c.curatedId).not.toBe(a.curatedId);
	});

	test("unidentifiable documents are rejected without curated writes", async () => {
		const identity = ident({ resourceType: "Questionnaire" });
		const rawId = await rawFor(runId, identity, "sha-q");
		await expect(resolve(db, { identity, digest: "sha-q", runId, rawId, partitionKey: null, now: repo.now() }))
			.rejects.toMatchObject({ code: "unidentifiable_document" });
		expect(await queryCurated(db, {}, LIMITS)).toEqual([]);
		expect(await getRawDocument(db, rawId)).not.toBeNull();
	});

	test("variant occurrences add up to the linked raw rows", async () => {
		const first = await sighting(sd1, "sha-1");
		await sighting(sd1, "sha-2");
		const run2 = await newRun();
		await sighting(sd1, "sha-1", { run: run2 });
		await sighting(sd1, "sha-2", { run: run2 });
		await sighting(sd1, "sha-1", { run: await newRun() });

		const variants = await listVariants(db, first.curatedId);
		const total = variants.reduce((sum, v) => sum + v.occurrences, 0);
		const row = await db.prepare(`SELECT COUNT(*) AS n FROM raw_to_curated WHERE curated_id = ?`)
			.bind(first.curatedId).first();
		expect(row).not.toBeNull();
		expect(total).toBe(row ? readNumber(row, "n") : -1);
		expect(total).toBe(5);
	});
});

// ---- Query ----

describe("queryCurated", () => {
	const T1 = "2024-02-01T00:00:00.000Z";
	const T2 = "2024-02-02T00:00:00.000Z";
	const T3 = "2024-02-03T00:00:00.000Z";
	let alpha: number;
	let beta: number;
	let percent: number;
	let tenant: number;

	beforeEach(async () => {
		const alphaIdent = ident({ resourceType: "ValueSet", canonicalUrl: "http://x/vs/alpha", artefactVersion: "1.0" });
		alpha = (await sighting(alphaIdent, "sha-a1", { now: T1 })).curatedId;
		beta = (await sighting(ident({ resourceType: "CodeSystem", canonicalUrl: "http://x/cs/beta" }), "sha-b", { now: T2 })).curatedId;
		percent = (await sighting(ident({ resourceType: "ValueSet", logicalId: "vs_100%" }), "sha-p", { now: T2 })).curatedId;
		await sighting(alphaIdent, "sha-a2", { now: T3 });
		tenant = (await sighting(
			ident({ resourceType: "ValueSet", canonicalUrl: "http://x/vs/alpha", artefactVersion: "2.0" }),
			"sha-t",
			{ now: T1, partitionKey: "tenant-a" },
		)).curatedId;
	});

	async function ids(filter: Parameters<typeof queryCurated>[1], limits = LIMITS): Promise<number[]> {
		return (await queryCurated(db, filter, limits)).map((c) => c.curated_id);
	}

	test("default order is last seen descending with ties by id", async () => {
		expect(await ids({})).toEqual([alpha, beta, percent, tenant]);
	});

	test("ascending order still breaks ties by id ascending", async () => {
		expect(await ids({ sort: "last_seen_asc" })).toEqual([tenant, beta, percent, alpha]);
	});

	test("resource type filter, with all and * unrestricted", async () => {
		expect(await ids({ resourceType: "ValueSet" })).toEqual([alpha, percent, tenant]);
		expect(await ids({ resourceType: "All" })).toEqual([alpha, beta, percent, tenant]);
		expect(await ids({ resourceType: "*" })).toEqual([alpha, beta, percent, tenant]);
	});

	test("conflict flag filter", async () => {
		expect(await ids({ conflict: true })).toEqual([alpha]);
		expect(await ids({ conflict: false })).toEqual([beta, percent, tenant]);
	});

	test("text matches url or id case-insensitively with literal wildcards", async () => {
		expect(await ids({ text: "ALPHA" })).toEqual([alpha, tenant]);
		expect(await ids({ text: "100%" })).toEqual([percent]);
		expect(await ids({ text: "_1" })).toEqual([percent]);
		expect(await ids({ text: "s%b" })).toEqual([]);
		expect(await ids({ text: "   " })).toEqual([alpha, beta, percent, tenant]);
	});

	test("text matching folds non-ASCII case", async () => {
		const email = (await sighting(ident({ resourceType: "CodeSystem", canonicalUrl: "http://x/Émail" }), "sha-e", { now: T1 })).curatedId;
		expect(await ids({ text: "émail" })).toEqual([email]);
		expect(await ids({ text: "ÉMAIL" })).toEqual([email]);
	});

	test("partition filter", async () => {
		expect(await ids({ partitionKey: "tenant-a" })).toEqual([tenant]);
	});

	test("filters combine with AND", async () => {
		expect(await ids({ resourceType: "ValueSet", text: "alpha" })).toEqual([alpha, tenant]);
		expect(await ids({ resourceType: "ValueSet", text: "alpha", conflict: true })).toEqual([alpha]);
		expect(await ids({ resourceType: "CodeSystem", conflict: true })).toEqual([]);
	});

	test("limit defaults from configuration and is capped at the maximum", async () => {
		expect(await ids({ limit: 2 })).toEqual([alpha, beta]);
		expect(await ids({}, { defaultLimit: 2, maxLimit: 3 })).toEqual([alpha, beta]);
		expect(await ids({ limit: 10 }, { defaultLimit: 2, maxLimit: 3 })).toEqual([alpha, beta, percent]);
	});

	test("invalid filters are rejected", async () => {
		await expect(queryCurated(db, { limit: 0 }, LIMITS)).rejects.toMatchObject({ code: "validation" });
		await expect(queryCurated(db, { limit: 1.5 }, LIMITS)).rejects.toThrow(/^Invalid filter: limit/);
	});

	test("repeated queries return the same order", async () => {
		const filter = { resourceType: "ValueSet", sort: "last_seen_asc" } as const;
		const first = await queryCurated(db, filter, LIMITS);
		const second = await queryCurated(db, filter, LIMITS);
		expect(second).toEqual(first);
	});

	test("findCuratedByIdent looks up by canonical url or logical id", async () => {
		expect((await findCuratedByIdent(db, "http://x/vs/alpha")).map((c) => c.curated_id)).toEqual([alpha, tenant]);
		expect((await findCuratedByIdent(db, "http://x/vs/alpha", null)).map((c) => c.curated_id)).toEqual([alpha]);
		expect((await findCuratedByIdent(db, "http://x/vs/alpha", "tenant-a")).map((c) => c.curated_id)).toEqual([tenant]);
		expect((await findCuratedByIdent(db, "vs_100%")).map((c) => c.curated_id)).toEqual([percent]);
		expect(await findCuratedByIdent(db, "nothing")).toEqual([]);
	});

	test("conflict view lists canonical identities with several digests", async () => {
		expect(await listArtefactConflicts(db)).toEqual([{
			resource_type: "ValueSet",
			canonical_url: "http://x/vs/alpha",
			artefact_version: "1.0",
			variant_count: 2,
		}]);
	});

	test("getCurated returns null for unknown ids", async () => {
		expect(await getCurated(db, 9999)).toBeNull();
	});
});
