/**
 * Per-call request options
 */
export interface RequestOptions {
	/** Request headers; later keys overwrite earlier ones */
	readonly headers?: Readonly<Record<string, string>>;
	/** Request timeout in milliseconds (default: 30000) */
	readonly timeout?: number;
	/** Cancels the call; surfaces as a TransportFailureError */
	readonly signal?: AbortSignal;
}

/**
 * Request body accepted by `post`. Strings are sent as UTF-8.
 */
export type RequestBody = Uint8Array | string;

/**
 * Network client contract
 *
 * Implemented by the live executor (`HttpNetwork`) and by the fixture-backed
 * dispatcher (`MockNetwork`), so callers never need to know which one they hold.
 * Every method rejects with a `NetworkError` subclass; nothing is retried.
 *
 * @example
 * ```typescript
 * const network: INetwork = makeNetwork({ host });
 *
 * try {
 *   const bytes = await network.get(buildURL(host, "/users"));
 * } catch (error) {
 *   if (error instanceof ServerError) {
 *     console.log(error.status, bytesAsText(error.body));
 *   }
 * }
 * ```
 */
export default interface INetwork {
	/**
	 * Perform a GET request
	 *
	 * @returns Raw response body
	 * @throws TransportFailureError when the request cannot be completed
	 * @throws ServerError when the status is outside 200-299
	 * @throws MockUnresolvedError when mocking and nothing matched the path
	 */
	get(url: string | URL, options?: RequestOptions): Promise<Uint8Array>;

	/**
	 * Perform a POST request with a body
	 *
	 * @returns Raw response body
	 * @throws TransportFailureError when the request cannot be completed
	 * @throws ServerError when the status is outside 200-299
	 * @throws MockUnresolvedError when mocking and nothing matched the path
	 */
	post(
		url: string | URL,
		body: RequestBody,
		options?: RequestOptions,
	): Promise<Uint8Array>;

	/**
	 * Reachability check; resolves only when the host answered with 2xx
	 *
	 * @throws NoNetworkError on any other outcome
	 */
	ping(url: string | URL, options?: RequestOptions): Promise<void>;

	/**
	 * Read `<name>.json` from a fixture root as raw bytes
	 *
	 * @param root - Directory to read from; the configured fixture root when omitted
	 * @throws TransportFailureError when the file cannot be loaded
	 */
	loadLocalFixture(name: string, root?: string): Promise<Uint8Array>;
}
