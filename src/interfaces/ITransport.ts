export type HttpMethod = "GET" | "POST" | "HEAD";

/**
 * Request descriptor handed to a transport. Built per call and discarded
 * after execution.
 */
export interface TransportRequest {
	readonly method: HttpMethod;
	readonly url: string;
	readonly headers: Readonly<Record<string, string>>;
	readonly body?: Uint8Array;
	/** Aborted on timeout or caller cancellation */
	readonly signal: AbortSignal;
}

/**
 * Raw response as received from the wire
 */
export interface TransportResponse {
	readonly status: number;
	readonly statusText: string;
	/** Response headers with lowercase names */
	readonly headers: Readonly<Record<string, string>>;
	readonly body: Uint8Array;
	/** Final URL after any redirects */
	readonly url: string;
}

/**
 * Performs one HTTP exchange.
 *
 * Rejects on transport-level failure only (DNS, refused connection, abort);
 * any HTTP status, including 4xx/5xx, resolves.
 */
export type Transport = (request: TransportRequest) => Promise<TransportResponse>;
