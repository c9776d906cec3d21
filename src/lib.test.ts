import { describe, test, expect, afterEach, vi } from "vitest";
import { loadConfig } from "./lib/config";
import { RepositoryError, isRepositoryError } from "./lib/errors";
import { escapeLike, formatError } from "./lib/format";
import { logEvent } from "./lib/observe";

afterEach(() => {
	vi.restoreAllMocks();
});

describe("loadConfig", () => {
	test("defaults", () => {
		expect(loadConfig({})).toEqual({
			databasePath: "vault.sqlite",
			busyTimeoutMs: 5000,
			maxBusyRetries: 3,
			retryDelayMs: 100,
			retryBackoffMultiplier: 2,
			digestPolicy: "encoding",
			schemaMajor: "R4",
			queryDefaultLimit: 500,
			queryMaxLimit: 5000,
		});
	});

	test("reads and coerces environment variables", () => {
		const config = loadConfig({
			VAULT_DB_PATH: "/data/vault.db",
			VAULT_MAX_BUSY_RETRIES: "5",
			VAULT_RETRY_BACKOFF: "1.5",
			VAULT_DIGEST_POLICY: "canonical",
			VAULT_SCHEMA_MAJOR: "R5",
		});
		expect(config).toMatchObject({
			databasePath: "/data/vault.db",
			maxBusyRetries: 5,
			retryBackoffMultiplier: 1.5,
			digestPolicy: "canonical",
			schemaMajor: "R5",
		});
	});

	test("overrides win over the environment", () => {
		const config = loadConfig({ VAULT_QUERY_LIMIT: "20" }, { queryDefaultLimit: 7, databasePath: ":memory:" });
		expect(config.queryDefaultLimit).toBe(7);
		expect(config.databasePath).toBe(":memory:");
	});

	test("empty variables fall back to defaults", () => {
		expect(loadConfig({ VAULT_DB_PATH: "", VAULT_MAX_BUSY_RETRIES: "" })).toMatchObject({
			databasePath: "vault.sqlite",
			maxBusyRetries: 3,
		});
	});

	test("rejects invalid values", () => {
		expect(() => loadConfig({ VAULT_DIGEST_POLICY: "bogus" })).toThrow(/^Invalid configuration: digestPolicy: /);
		expect(() => loadConfig({ VAULT_MAX_BUSY_RETRIES: "-1" })).toThrow(/^Invalid configuration: maxBusyRetries: /);
		expect(() => loadConfig({ VAULT_RETRY_DELAY_MS: "soon" })).toThrow(RepositoryError);
	});

	test("default limit may not exceed the maximum", () => {
		expect(() => loadConfig({ VAULT_QUERY_LIMIT: "10", VAULT_QUERY_MAX_LIMIT: "5" })).toThrow(
			"Invalid configuration: queryDefaultLimit 10 exceeds queryMaxLimit 5",
		);
	});
});

describe("errors", () => {
	test("factories set code and retryability", () => {
		expect(RepositoryError.storageBusy("locked")).toMatchObject({ code: "storage_busy", retryable: true });
		expect(RepositoryError.storageUnavailable("gone")).toMatchObject({ code: "storage_unavailable", retryable: false });
		expect(RepositoryError.unidentifiable("Questionnaire").message).toBe(
			"Questionnaire has neither a canonical url nor a logical id",
		);
		expect(RepositoryError.unknownCuratedId([4, 9]).message).toBe("Unknown curated id(s): 4, 9");
	});

	test("isRepositoryError narrows by code", () => {
		const err = RepositoryError.malformed("bad");
		expect(isRepositoryError(err)).toBe(true);
		expect(isRepositoryError(err, "malformed_document")).toBe(true);
		expect(isRepositoryError(err, "validation")).toBe(false);
		expect(isRepositoryError(new Error("bad"))).toBe(false);
	});

	test("formatError summarizes any thrown value", () => {
		expect(formatError(RepositoryError.storageBusy("locked"))).toEqual({
			error: "storage_busy",
			message: "locked",
			retryable: true,
		});
		expect(formatError(new Error("boom"))).toEqual({ error: "internal", message: "boom", retryable: false });
		expect(formatError("plain")).toEqual({ error: "internal", message: "plain", retryable: false });
	});
});

describe("escapeLike", () => {
	test("escapes wildcards and the escape character", () => {
		expect(escapeLike("50%_a\\b")).toBe("50\\%\\_a\\\\b");
		expect(escapeLike("plain")).toBe("plain");
	});
});

describe("logEvent", () => {
	test("writes one JSON line with event name and timestamp", () => {
		const log = vi.spyOn(console, "log").mockImplementation(() => {});
		vi.spyOn(Date, "now").mockReturnValue(1700000000000);
		logEvent("ingest_run_opened", { run_id: 3 });
		expect(log).toHaveBeenCalledTimes(1);
		expect(log.mock.calls[0][0]).toBe(`{"event":"ingest_run_opened","ts":1700000000000,"run_id":3}`);
	});
});
