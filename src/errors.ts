export type ContactGraphErrorCode =
	| "INVALID_TABLE"
	| "UNKNOWN_NODE"
	| "INVALID_CONFIG"
	| "INVALID_ARGUMENT"
	| "IO";

export class ContactGraphError extends Error {
	readonly code: ContactGraphErrorCode;

	constructor(code: ContactGraphErrorCode, message: string) {
		super(message);
		this.name = "ContactGraphError";
		this.code = code;
	}
}

export const isContactGraphError = (
	error: unknown
): error is ContactGraphError => error instanceof ContactGraphError;
