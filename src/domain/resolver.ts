// Curated resolver: folds one raw sighting into the curated projection.
// Conflicts are advisory and sticky; a second distinct digest for an identity
// raises has_conflict and nothing ever clears it.

import type { SqlDatabase } from "../db/client";
import {
	bumpVariant,
	findCuratedByKey,
	getVariant,
	insertCurated,
	insertVariant,
	linkRaw,
	touchCurated,
} from "../db/curated";
import { RepositoryError } from "../lib/errors";
import { logEvent } from "../lib/observe";
import type { DocumentIdentity } from "../lib/types";

export interface ResolveInput {
	identity: DocumentIdentity;
	digest: string;
	runId: number;
	rawId: number;
	partitionKey: string | null;
	now: string;
}

export interface ResolveResult {
	curatedId: number;
	isNewIdentity: boolean;
	isNewVariant: boolean;
	conflictNow: boolean;
	conflictRaised: boolean;
}

/** Human-readable identity key, used in logs and errors. */
export function isIdentifiable(identity: DocumentIdentity): boolean {
	return identity.canonicalUrl !== null || identity.logicalId !== null;
}

export function identityKey(identity: DocumentIdentity, partitionKey: string | null): string {
	const scope = partitionKey ? `${partitionKey}:` : "";
	if (identity.canonicalUrl !== null) {
		const version = identity.artefactVersion ? `|${identity.artefactVersion}` : "";
		return `${scope}${identity.resourceType}:${identity.canonicalUrl}${version}`;
	}
	if (identity.logicalId !== null) {
		return `${scope}${identity.resourceType}/${identity.logicalId}`;
	}
	throw RepositoryError.unidentifiable(identity.resourceType);
}

export async function resolve(db: SqlDatabase, input: ResolveInput): Promise<ResolveResult> {
	const { identity, digest, runId, rawId, partitionKey, now } = input;
	const key = identityKey(identity, partitionKey);

	return db.transaction(async () => {
		const existing = await findCuratedByKey(db, identity, partitionKey);

		if (!existing) {
			const curatedId = await insertCurated(db, identity, partitionKey, digest, now);
			await insertVariant(db, curatedId, digest, runId);
			await linkRaw(db, rawId, curatedId, now);
			return {
				curatedId,
				isNewIdentity: true,
				isNewVariant: true,
				conflictNow: false,
				conflictRaised: false,
			};
		}

		const curatedId = existing.curated_id;
		const variant = await getVariant(db, curatedId, digest);
		if (variant) {
			await bumpVariant(db, curatedId, digest, runId);
		} else {
			await insertVariant(db, curatedId, digest, runId);
		}
		const isNewVariant = variant === null;
		await touchCurated(db, curatedId, digest, isNewVariant, now);
		await linkRaw(db, rawId, curatedId, now);

		const conflictNow = existing.has_conflict || isNewVariant;
		const conflictRaised = conflictNow && !existing.has_conflict;
		if (conflictRaised) {
			logEvent("conflict_detected", { curated_id: curatedId, identity: key, run_id: runId, digest });
		}
		return { curatedId, isNewIdentity: false, isNewVariant, conflictNow, conflictRaised };
	});
}
