// Decode strategies that turn source encodings into one in-memory document
// shape (a JSON object with a resourceType), and encode it back out.
//
// The XML mapping follows the FHIR XML conventions: the root element names the
// resource type, primitives live in a `value` attribute, repeated elements
// become arrays and `resource`/`contained` wrap a nested resource element.
// Ids and extensions on primitive elements go to the `_field` companion, as in
// FHIR JSON. Narrative XHTML is kept as a string.

import { XMLBuilder, XMLParser, XMLValidator } from "fast-xml-parser";
import { RepositoryError } from "../lib/errors";
import type { DecodedDocument, DocumentEncoding, JsonObject, JsonValue } from "../lib/types";
import fieldOrder from "./xml-field-order.json";

export const XML_NAMESPACE = "http://hl7.org/fhir";

const ATTR = "@_";
const VALUE_ATTR = `${ATTR}value`;
const RESOURCE_WRAPPERS = new Set(["resource", "contained"]);
const EXTENSION_KEYS = new Set(["extension", "modifierExtension"]);

/** R4 element order per resource type, used by the strict XML layouts. */
const FIELD_ORDER: Record<string, string[]> = fieldOrder;

/**
 * XML element layout. `best-effort` writes fields in object order;
 * `strict` writes the known resource types in R4 element order and rejects
 * anything else; `strictish` does the same but falls back to object order.
 */
export type XmlMode = "best-effort" | "strict" | "strictish";

export interface EncodeOptions {
	pretty?: boolean;
	/** XML only. Defaults to best-effort. */
	mode?: XmlMode;
}

export interface DocumentDecoder {
	readonly encoding: DocumentEncoding;
	decode(text: string): JsonObject;
	encode(resource: JsonObject, options?: EncodeOptions): string;
}

/** Raw input for one document: either text/bytes or an already parsed value. */
export interface SourceDocument {
	text?: string | Uint8Array;
	resource?: unknown;
	encoding?: DocumentEncoding;
	fullUrl?: string | null;
	bundleId?: number | null;
	origin?: string | null;
}

export function isJsonObject(value: unknown): value is JsonObject {
	return typeof value === "object" && value !== null && !Array.isArray(value)
		&& Object.values(value).every(isJsonValue);
}

export function isJsonValue(value: unknown): value is JsonValue {
	if (value === null || typeof value === "string" || typeof value === "boolean") return true;
	if (typeof value === "number") return Number.isFinite(value);
	if (Array.isArray(value)) return value.every(isJsonValue);
	return isJsonObject(value);
}

// --- JSON ---

export const jsonDecoder: DocumentDecoder = {
	encoding: "json",
	decode(text) {
		let parsed: unknown;
		try {
			parsed = JSON.parse(text);
		} catch (e) {
			throw RepositoryError.malformed(`Invalid JSON: ${e instanceof Error ? e.message : String(e)}`);
		}
		if (!isJsonObject(parsed)) {
			throw RepositoryError.malformed("JSON document root must be an object");
		}
		return parsed;
	},
	encode(resource, options = {}) {
		return options.pretty ? JSON.stringify(resource, null, 2) : JSON.stringify(resource);
	},
};

// --- XML ---

const parser = new XMLParser({
	ignoreAttributes: false,
	attributeNamePrefix: ATTR,
	parseTagValue: false,
	parseAttributeValue: false,
	ignoreDeclaration: true,
	ignorePiTags: true,
	removeNSPrefix: true,
	trimValues: true,
});

function isRecord(value: unknown): value is Record<string, unknown> {
	return typeof value === "object" && value !== null && !Array.isArray(value);
}

/** Plain assignment would treat a "__proto__" key as the prototype. */
function setOwn<T>(target: Record<string, T>, key: string, value: T): void {
	Object.defineProperty(target, key, { value, enumerable: true, writable: true, configurable: true });
}

function ownValue(obj: JsonObject, key: string): JsonValue | undefined {
	return Object.hasOwn(obj, key) ? obj[key] : undefined;
}

function isNamespaceKey(key: string): boolean {
	return key === ATTR || key === `${ATTR}xmlns` || key.startsWith(`${ATTR}xmlns:`);
}

function xhtmlToString(node: unknown): string {
	const builder = new XMLBuilder({ ignoreAttributes: false, attributeNamePrefix: ATTR, suppressEmptyNode: true });
	return builder.build({ div: node });
}

function isResourceWrapper(node: Record<string, unknown>): string | null {
	const keys = Object.keys(node).filter((k) => !k.startsWith(ATTR));
	if (keys.length !== 1) return null;
	return /^[A-Z]/.test(keys[0]) ? keys[0] : null;
}

function xmlResource(resourceType: string, body: unknown): JsonObject {
	const converted = xmlNodeToJson(body);
	return isJsonObject(converted) ? { resourceType, ...converted } : { resourceType };
}

function primitiveValue(node: unknown): string | null {
	if (!isRecord(node)) return null;
	const value = node[VALUE_ATTR];
	return typeof value === "string" ? value : null;
}

/** Everything on a primitive element besides its value: id and extensions. */
function primitiveCompanion(node: unknown, key: string): JsonObject | null {
	if (!isRecord(node)) return null;
	const rest: Record<string, unknown> = {};
	for (const [childKey, child] of Object.entries(node)) {
		if (childKey !== VALUE_ATTR) setOwn(rest, childKey, child);
	}
	const converted = xmlNodeToJson(rest, key);
	return isJsonObject(converted) ? converted : null;
}

function xmlNodeToJson(node: unknown, key?: string): JsonValue | undefined {
	if (typeof node === "string") return node === "" ? undefined : node;
	if (Array.isArray(node)) {
		const items = node
			.map((item) => xmlNodeToJson(item, key))
			.filter((item): item is JsonValue => item !== undefined);
		return items.length ? items : undefined;
	}
	if (!isRecord(node)) return undefined;

	if (key === "div") return xhtmlToString(node);

	if (key !== undefined && RESOURCE_WRAPPERS.has(key)) {
		const inner = isResourceWrapper(node);
		if (inner) return xmlResource(inner, node[inner]);
	}

	const out: JsonObject = {};
	for (const [childKey, child] of Object.entries(node)) {
		if (childKey === "#text" || isNamespaceKey(childKey)) continue;
		if (childKey.startsWith(ATTR)) {
			if (typeof child === "string") setOwn<JsonValue>(out, childKey.slice(ATTR.length), child);
			continue;
		}

		const items = Array.isArray(child) ? child : [child];
		if (items.some((item) => primitiveValue(item) !== null)) {
			const values = items.map(primitiveValue);
			const companions = items.map((item) => primitiveCompanion(item, childKey));
			setOwn<JsonValue>(out, childKey, Array.isArray(child) ? values : values[0]);
			if (companions.some((c) => c !== null)) {
				setOwn<JsonValue>(out, `_${childKey}`, Array.isArray(child) ? companions : companions[0]);
			}
			continue;
		}

		const converted = xmlNodeToJson(child, childKey);
		if (converted !== undefined) setOwn<JsonValue>(out, childKey, converted);
	}
	return Object.keys(out).length ? out : undefined;
}

/** Field names in output order, with `_field` companions folded into their field. */
function fieldNames(obj: JsonObject, mode: XmlMode): string[] {
	const names: string[] = [];
	for (const key of Object.keys(obj)) {
		const name = key.startsWith("_") && !key.startsWith("__") ? key.slice(1) : key;
		if (name !== "resourceType" && !names.includes(name)) names.push(name);
	}
	const rt = obj.resourceType;
	if (mode === "best-effort" || typeof rt !== "string") return names;

	const order = Object.hasOwn(FIELD_ORDER, rt) ? FIELD_ORDER[rt] : null;
	if (!order) {
		if (mode === "strictish") return names;
		const supported = Object.keys(FIELD_ORDER).sort().join(", ");
		throw RepositoryError.validation(`Strict XML supports only: ${supported} (got ${rt})`);
	}
	const unknown = names.filter((name) => !order.includes(name)).sort();
	if (unknown.length) {
		if (mode === "strictish") return names;
		throw RepositoryError.validation(`Strict XML: unknown fields for ${rt}: ${unknown.join(", ")}`);
	}
	return order.filter((name) => names.includes(name));
}

function primitiveXmlElement(value: JsonValue | undefined, companion: JsonValue | undefined, key: string): unknown {
	const node: Record<string, unknown> = {};
	if (value !== undefined && value !== null) node[VALUE_ATTR] = String(value);
	if (isJsonObject(companion)) {
		for (const [childKey, child] of Object.entries(jsonToXmlBody(companion, "best-effort", key))) {
			setOwn(node, childKey, child);
		}
	}
	return node;
}

function primitiveXmlNode(value: JsonValue | undefined, companion: JsonValue, key: string): unknown {
	if (!Array.isArray(value) && !Array.isArray(companion)) return primitiveXmlElement(value, companion, key);
	const values = Array.isArray(value) ? value : [];
	const companions = Array.isArray(companion) ? companion : [];
	const length = Math.max(values.length, companions.length);
	return Array.from({ length }, (_, i) => primitiveXmlElement(values[i], companions[i], key));
}

function jsonToXmlNode(value: JsonValue, key: string, mode: XmlMode): unknown {
	if (Array.isArray(value)) return value.map((item) => jsonToXmlNode(item, key, mode));
	if (value === null) return {};
	if (typeof value !== "object") return { [VALUE_ATTR]: String(value) };

	const rt = value.resourceType;
	if (RESOURCE_WRAPPERS.has(key) && typeof rt === "string") {
		// contained resources are always laid out in object order
		return { [rt]: jsonToXmlBody(value, key === "resource" ? mode : "best-effort") };
	}
	return jsonToXmlBody(value, mode, key);
}

function jsonToXmlBody(obj: JsonObject, mode: XmlMode, parentKey?: string): Record<string, unknown> {
	const isResource = typeof obj.resourceType === "string";
	const out: Record<string, unknown> = {};
	for (const name of fieldNames(obj, mode)) {
		const value = ownValue(obj, name);
		const companion = ownValue(obj, `_${name}`);
		if (companion !== undefined && (value === undefined || value === null || typeof value !== "object" || Array.isArray(value))) {
			setOwn(out, name, primitiveXmlNode(value, companion, name));
			continue;
		}
		if (value === undefined) continue;
		// element ids and extension urls are attributes in XML
		const isAttribute = typeof value === "string" && (
			(name === "id" && !isResource)
			|| (name === "url" && parentKey !== undefined && EXTENSION_KEYS.has(parentKey))
		);
		if (isAttribute) {
			setOwn(out, `${ATTR}${name}`, value);
			continue;
		}
		setOwn(out, name, jsonToXmlNode(value, name, mode));
	}
	return out;
}

export const xmlDecoder: DocumentDecoder = {
	encoding: "xml",
	decode(text) {
		const valid = XMLValidator.validate(text);
		if (valid !== true) {
			throw RepositoryError.malformed(`Invalid XML at line ${valid.err.line}: ${valid.err.msg}`);
		}
		const parsed: unknown = parser.parse(text);
		if (!isRecord(parsed)) throw RepositoryError.malformed("XML document has no root element");
		const roots = Object.keys(parsed).filter((k) => !k.startsWith("?") && k !== "#text");
		if (roots.length !== 1) throw RepositoryError.malformed("XML document must have exactly one root element");
		return xmlResource(roots[0], parsed[roots[0]]);
	},
	encode(resource, options = {}) {
		const rt = typeof resource.resourceType === "string" && resource.resourceType ? resource.resourceType : "Resource";
		const builder = new XMLBuilder({
			ignoreAttributes: false,
			attributeNamePrefix: ATTR,
			suppressEmptyNode: true,
			format: options.pretty ?? false,
			indentBy: "  ",
		});
		const body = jsonToXmlBody(resource, options.mode ?? "best-effort");
		return builder.build({ [rt]: { [`${ATTR}xmlns`]: XML_NAMESPACE, ...body } });
	},
};

export const DECODERS: Record<DocumentEncoding, DocumentDecoder> = {
	json: jsonDecoder,
	xml: xmlDecoder,
};

export function sniffEncoding(text: string): DocumentEncoding {
	return text.trimStart().startsWith("<") ? "xml" : "json";
}

function toText(input: string | Uint8Array): string {
	if (typeof input === "string") return input.replace(/^\uFEFF/, "");
	try {
		return new TextDecoder("utf-8", { fatal: true, ignoreBOM: false }).decode(input);
	} catch {
		throw RepositoryError.malformed("Document bytes are not valid UTF-8");
	}
}

/** Decode one source document into the shared in-memory shape. */
export function decodeDocument(source: SourceDocument): DecodedDocument {
	if (source.resource !== undefined) {
		if (!isJsonObject(source.resource)) {
			throw RepositoryError.malformed("Parsed document must be a JSON object");
		}
		const encoding = source.encoding ?? "json";
		return { encoding, resource: source.resource, text: DECODERS[encoding].encode(source.resource) };
	}
	if (source.text === undefined) {
		throw RepositoryError.malformed("Document has neither text nor a parsed resource");
	}
	const text = toText(source.text);
	if (!text.trim()) throw RepositoryError.malformed("Document is empty");
	const encoding = source.encoding ?? sniffEncoding(text);
	return { encoding, resource: DECODERS[encoding].decode(text), text };
}
