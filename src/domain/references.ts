import type { JsonValue } from "../lib/types";

export interface FoundReference {
	path: string;
	reference: string;
}

/**
 * Collect every `{ "reference": "<string>" }` in a document. The path is that
 * of the object holding the reference, e.g. `entry[0].resource.subject`.
 */
export function scanReferences(value: JsonValue, basePath = ""): FoundReference[] {
	const found: FoundReference[] = [];
	if (Array.isArray(value)) {
		value.forEach((item, i) => found.push(...scanReferences(item, `${basePath}[${i}]`)));
	} else if (value !== null && typeof value === "object") {
		for (const [key, child] of Object.entries(value)) {
			if (key === "reference" && typeof child === "string") {
				found.push({ path: basePath, reference: child });
			} else {
				found.push(...scanReferences(child, basePath ? `${basePath}.${key}` : key));
			}
		}
	}
	return found;
}
