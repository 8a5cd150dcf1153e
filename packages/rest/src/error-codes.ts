/**
 * Application error code and its default client-facing message.
 */
export interface ErrorEntry {
	readonly code: number;
	readonly message: string;
}

export const ErrorCodes = {
	GENERAL_NOT_FOUND: { code: 4000, message: "Endpoint does not exists" },
	METHOD_NOT_IMPLEMENTED: { code: 4001, message: "Method not implemented yet" },
	METHOD_NOT_SUPPORTED: { code: 4002, message: "Method not supported" },
	CANNOT_PERFORM_THIS_ACTION: { code: 4003, message: "Cannot perform this action" },
	INVALID_CONTENT: { code: 4004, message: "Request has invalid content" },
	UNDEFINED_ERROR: { code: 4005, message: "An unexpected error has occurred" },
	REQUIRES_AUTHORIZATION: { code: 4006, message: "Authorization required" },
	AUTHORIZATION_DATA_MISSING: { code: 4007, message: "Missing authorization data" },
	// shares 4002 with METHOD_NOT_SUPPORTED
	MISSING_REQUEST_DATA: { code: 4002, message: "Missing data in requests" },
	VALIDATION_ERROR: { code: 4008, message: "Request validation error" },
	BAD_UUID: { code: 4009, message: "Badly formed uuid" },
	EMAIL_NOT_VALID: { code: 4010, message: "Provided email is not valid" },
	EMAIL_REGISTERED: { code: 4011, message: "Email address already taken" },
	STORE_TO_DATABASE: { code: 4012, message: "Error storing result in database" },
} as const satisfies Record<string, ErrorEntry>;

export type ErrorCodeName = keyof typeof ErrorCodes;
