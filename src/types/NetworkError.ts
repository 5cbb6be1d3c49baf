/**
 * Discriminant of every outcome a network operation can fail with.
 * The set is closed: new failure types must be added here, not inferred
 * from message text.
 */
export type NetworkErrorKind =
	| "NoNetwork"
	| "TransportFailure"
	| "DecodingFailure"
	| "ServerError"
	| "MockUnresolved";

/**
 * Localizable description strings, one per error kind.
 * `errorFetchingWith` receives the server payload through a `{reason}` placeholder.
 */
export interface NetworkStrings {
	readonly noNetwork: string;
	readonly errorFetching: string;
	readonly errorFetchingWith: string;
	readonly errorDecoding: string;
	readonly mockUnresolved: string;
}

export const DEFAULT_NETWORK_STRINGS: NetworkStrings = {
	noNetwork: "No network connection available",
	errorFetching: "Failed to fetch data",
	errorFetchingWith: "Failed to fetch data: {reason}",
	errorDecoding: "Failed to decode data",
	mockUnresolved: "No mock data available for this request",
};

/**
 * Why a request could not be completed
 */
export type TransportFailureReason =
	| "timeout"
	| "cancelled"
	| "connection"
	| "invalid-request"
	| "fixture-missing";

/**
 * Base class for all network-layer errors
 */
export abstract class NetworkError extends Error {
	abstract readonly kind: NetworkErrorKind;

	constructor(
		message: string,
		public readonly url?: string,
	) {
		super(message);
		this.name = this.constructor.name;
	}
}

/**
 * Reachability check failed
 */
export class NoNetworkError extends NetworkError {
	readonly kind = "NoNetwork";

	constructor(url?: string) {
		super(DEFAULT_NETWORK_STRINGS.noNetwork, url);
	}
}

/**
 * The request could not be completed (DNS, refused connection, cancellation,
 * timeout, malformed request, or a fixture that cannot be loaded)
 */
export class TransportFailureError extends NetworkError {
	readonly kind = "TransportFailure";

	constructor(
		url: string | undefined,
		public readonly reason: TransportFailureReason,
		public readonly detail?: string,
	) {
		super(DEFAULT_NETWORK_STRINGS.errorFetching, url);
	}
}

/**
 * Caller-side payload decoding failed.
 *
 * Neither the executor nor the mock dispatcher raise this; it belongs to
 * callers (see `decodeJson`) and lives here so they share one taxonomy.
 */
export class DecodingFailureError extends NetworkError {
	readonly kind = "DecodingFailure";

	constructor(
		public readonly detail?: string,
		url?: string,
	) {
		super(DEFAULT_NETWORK_STRINGS.errorDecoding, url);
	}
}

/**
 * A response arrived with a status outside 200-299
 */
export class ServerError extends NetworkError {
	readonly kind = "ServerError";

	constructor(
		url: string | undefined,
		public readonly status?: number,
		public readonly body?: Uint8Array,
	) {
		super(serverErrorDescription(body, DEFAULT_NETWORK_STRINGS), url);
	}
}

/**
 * Mock mode is active but no mock entry or override matched the path
 */
export class MockUnresolvedError extends NetworkError {
	readonly kind = "MockUnresolved";

	constructor(
		public readonly path: string,
		url?: string,
	) {
		super(DEFAULT_NETWORK_STRINGS.mockUnresolved, url);
	}
}

export type AnyNetworkError =
	| NoNetworkError
	| TransportFailureError
	| DecodingFailureError
	| ServerError
	| MockUnresolvedError;

export function isNetworkError(value: unknown): value is AnyNetworkError {
	return (
		value instanceof NoNetworkError ||
		value instanceof TransportFailureError ||
		value instanceof DecodingFailureError ||
		value instanceof ServerError ||
		value instanceof MockUnresolvedError
	);
}

/**
 * Decode bytes as UTF-8 text, or undefined when they are empty or not valid UTF-8
 */
export function bytesAsText(bytes: Uint8Array | undefined): string | undefined {
	if (!bytes || bytes.length === 0) {
		return undefined;
	}
	try {
		return new TextDecoder("utf-8", { fatal: true }).decode(bytes);
	} catch (_error) {
		return undefined;
	}
}

function serverErrorDescription(
	body: Uint8Array | undefined,
	strings: NetworkStrings,
): string {
	const reason = bytesAsText(body);
	if (reason === undefined) {
		return strings.errorFetching;
	}
	return strings.errorFetchingWith.replace("{reason}", () => reason);
}

/**
 * Map an error to its user-facing description
 *
 * @param error - Any network-layer error
 * @param strings - Localized strings (English by default)
 */
export function describeNetworkError(
	error: AnyNetworkError,
	strings: NetworkStrings = DEFAULT_NETWORK_STRINGS,
): string {
	switch (error.kind) {
		case "NoNetwork":
			return strings.noNetwork;
		case "TransportFailure":
			return strings.errorFetching;
		case "DecodingFailure":
			return strings.errorDecoding;
		case "ServerError":
			return serverErrorDescription(error.body, strings);
		case "MockUnresolved":
			return strings.mockUnresolved;
	}
}
