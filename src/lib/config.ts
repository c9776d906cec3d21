// Repository configuration, read from VAULT_* environment variables.

import { z } from "zod";
import { RepositoryError } from "./errors";

const ConfigSchema = z.object({
	databasePath: z.string().min(1).default("vault.sqlite"),
	busyTimeoutMs: z.coerce.number().int().min(0).default(5000),
	maxBusyRetries: z.coerce.number().int().min(0).default(3),
	retryDelayMs: z.coerce.number().int().min(0).default(100),
	retryBackoffMultiplier: z.coerce.number().min(1).default(2),
	digestPolicy: z.enum(["encoding", "canonical"]).default("encoding"),
	schemaMajor: z.string().min(1).default("R4"),
	queryDefaultLimit: z.coerce.number().int().min(1).default(500),
	queryMaxLimit: z.coerce.number().int().min(1).default(5000),
});

export type RepositoryConfig = z.infer<typeof ConfigSchema>;
export type ConfigOverrides = Partial<RepositoryConfig>;

const ENV_KEYS: Record<keyof RepositoryConfig, string> = {
	databasePath: "VAULT_DB_PATH",
	busyTimeoutMs: "VAULT_BUSY_TIMEOUT_MS",
	maxBusyRetries: "VAULT_MAX_BUSY_RETRIES",
	retryDelayMs: "VAULT_RETRY_DELAY_MS",
	retryBackoffMultiplier: "VAULT_RETRY_BACKOFF",
	digestPolicy: "VAULT_DIGEST_POLICY",
	schemaMajor: "VAULT_SCHEMA_MAJOR",
	queryDefaultLimit: "VAULT_QUERY_LIMIT",
	queryMaxLimit: "VAULT_QUERY_MAX_LIMIT",
};

export function loadConfig(
	env: Record<string, string | undefined> = process.env,
	overrides: ConfigOverrides = {},
): RepositoryConfig {
	const input: Record<string, unknown> = {};
	for (const [key, envKey] of Object.entries(ENV_KEYS)) {
		const value = env[envKey];
		if (value !== undefined && value !== "") input[key] = value;
	}
	for (const [key, value] of Object.entries(overrides)) {
		if (value !== undefined) input[key] = value;
	}

	const parsed = ConfigSchema.safeParse(input);
	if (!parsed.success) {
		const detail = parsed.error.issues
			.map((issue) => `${issue.path.join(".")}: ${issue.message}`)
			.join("; ");
		throw RepositoryError.validation(`Invalid configuration: ${detail}`);
	}
	if (parsed.data.queryDefaultLimit > parsed.data.queryMaxLimit) {
		throw RepositoryError.validation(
			`Invalid configuration: queryDefaultLimit ${parsed.data.queryDefaultLimit} exceeds queryMaxLimit ${parsed.data.queryMaxLimit}`,
		);
	}
	return parsed.data;
}
