// Structured error system for the artefact repository.

export type ErrorCode =
	| "malformed_document"
	| "unidentifiable_document"
	| "storage_busy"
	| "storage_unavailable"
	| "unknown_curated_id"
	| "validation";

export class RepositoryError extends Error {
	readonly code: ErrorCode;
	readonly retryable: boolean;

	constructor(code: ErrorCode, message: string, retryable = false) {
		super(message);
		this.name = "RepositoryError";
		this.code = code;
		this.retryable = retryable;
	}

	static malformed(message: string): RepositoryError {
		return new RepositoryError("malformed_document", message);
	}

	static unidentifiable(resourceType: string): RepositoryError {
		return new RepositoryError(
			"unidentifiable_document",
			`${resourceType} has neither a canonical url nor a logical id`,
		);
	}

	static storageBusy(message: string): RepositoryError {
		return new RepositoryError("storage_busy", message, true);
	}

	static storageUnavailable(message: string): RepositoryError {
		return new RepositoryError("storage_unavailable", message);
	}

	static unknownCuratedId(ids: number[]): RepositoryError {
		return new RepositoryError("unknown_curated_id", `Unknown curated id(s): ${ids.join(", ")}`);
	}

	static validation(message: string): RepositoryError {
		return new RepositoryError("validation", message);
	}
}

export function isRepositoryError(err: unknown, code?: ErrorCode): err is RepositoryError {
	return err instanceof RepositoryError && (code === undefined || err.code === code);
}
