// Identity extraction for a decoded conformance document.

import { RepositoryError } from "../lib/errors";
import type { DocumentIdentity, JsonObject, JsonValue } from "../lib/types";

function stringOrNull(value: JsonValue | undefined): string | null {
	return typeof value === "string" && value !== "" ? value : null;
}

export function extractIdentity(resource: JsonObject): DocumentIdentity {
	const resourceType = stringOrNull(resource.resourceType);
	if (!resourceType) {
		throw RepositoryError.malformed("Document has no recognizable resourceType");
	}

	const meta = resource.meta;
	const metaObject: JsonObject = typeof meta === "object" && meta !== null && !Array.isArray(meta) ? meta : {};

	return {
		resourceType,
		logicalId: stringOrNull(resource.id),
		canonicalUrl: stringOrNull(resource.url),
		artefactVersion: stringOrNull(resource.version),
		metaVersionId: stringOrNull(metaObject.versionId),
		metaLastUpdated: stringOrNull(metaObject.lastUpdated),
	};
}
