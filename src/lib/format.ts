import { RepositoryError } from "./errors";

export interface ErrorSummary {
	error: string;
	message: string;
	retryable: boolean;
}

/** Escape SQL LIKE wildcards so user input is matched literally. */
export function escapeLike(s: string): string {
	return s.replace(/\\/g, "\\\\").replace(/%/g, "\\%").replace(/_/g, "\\_");
}

export function formatError(err: unknown): ErrorSummary {
	if (err instanceof RepositoryError) {
		return { error: err.code, message: err.message, retryable: err.retryable };
	}
	const message = err instanceof Error ? err.message : String(err);
	return { error: "internal", message, retryable: false };
}
