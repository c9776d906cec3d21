// Content digests over a canonical serialization of a decoded document.
//
// "encoding" keeps digests per source encoding: JSON hashes its sorted-key
// serialization, XML hashes its re-serialized form. "canonical" hashes a
// normalized form shared by both encodings, where every primitive is a string
// and single-element arrays are collapsed, so "1" and 1 hash alike.

import { createHash } from "node:crypto";
import { xmlDecoder } from "./codec";
import type { DecodedDocument, DigestPolicy, JsonValue } from "../lib/types";

export function sha256Hex(text: string): string {
	return createHash("sha256").update(text, "utf8").digest("hex");
}

/** Deterministic JSON: sorted keys, no whitespace. */
export function stableJson(value: JsonValue): string {
	if (value === null || typeof value !== "object") return JSON.stringify(value);
	if (Array.isArray(value)) return `[${value.map(stableJson).join(",")}]`;
	const keys = Object.keys(value).sort();
	return `{${keys.map((k) => `${JSON.stringify(k)}:${stableJson(value[k])}`).join(",")}}`;
}

export function normalizeForDigest(value: JsonValue): JsonValue {
	if (value === null) return null;
	if (Array.isArray(value)) {
		const items = value.map(normalizeForDigest);
		return items.length === 1 ? items[0] : items;
	}
	if (typeof value === "object") {
		return Object.fromEntries(Object.entries(value).map(([key, child]): [string, JsonValue] => [key, normalizeForDigest(child)]));
	}
	return String(value);
}

export function canonicalText(doc: DecodedDocument, policy: DigestPolicy): string {
	if (policy === "canonical") return stableJson(normalizeForDigest(doc.resource));
	return doc.encoding === "xml" ? xmlDecoder.encode(doc.resource) : stableJson(doc.resource);
}

export function computeDigest(doc: DecodedDocument, policy: DigestPolicy): string {
	return sha256Hex(canonicalText(doc, policy));
}
