import type { Logger } from "@logtape/logtape";
import type INetwork from "../interfaces/INetwork.js";
import type { RequestBody, RequestOptions } from "../interfaces/INetwork.js";
import type {
	HttpMethod,
	Transport,
	TransportRequest,
	TransportResponse,
} from "../interfaces/ITransport.js";
import type { HostConfig } from "../types/Endpoint.js";
import {
	NoNetworkError,
	ServerError,
	TransportFailureError,
} from "../types/NetworkError.js";
import { httpLogger } from "../utils/logger.js";
import { resolveRequestUrl } from "./EndpointBuilder.js";
import { createFetchTransport } from "./FetchTransport.js";
import { FixtureLoader } from "./FixtureLoader.js";

export interface HttpNetworkOptions {
	/** Host that "/"-prefixed request paths are resolved against */
	readonly host?: HostConfig;
	/** Defaults to the "netlayer.http" category logger */
	readonly logger?: Logger;
	/** Defaults to the undici fetch transport */
	readonly transport?: Transport;
	/** Default per-call timeout in milliseconds */
	readonly timeout?: number;
	/**
	 * Accept any server certificate chain. Only honoured by the default
	 * transport; ignored when `transport` is supplied.
	 */
	readonly allowInsecureTls?: boolean;
	/** Default directory for `loadLocalFixture` */
	readonly fixtureRoot?: string;
}

export function hasSuccessStatusCode(status: number): boolean {
	return status >= 200 && status <= 299;
}

/**
 * Live network client
 *
 * Builds a fresh request descriptor for every call and hands it to the
 * transport; the default transport also opens a fresh connection pool per
 * call. The instance holds only read-only configuration, so one instance
 * can serve any number of concurrent callers.
 *
 * @example
 * ```typescript
 * const network = new HttpNetwork({ host: { host: "api.example.com", path: "/v1" } });
 * const bytes = await network.get("/users", { headers: { Accept: "application/json" } });
 * await network.ping("https://api.example.com/health");
 * ```
 */
export default class HttpNetwork implements INetwork {
	static readonly DEFAULT_TIMEOUT = 30_000;

	readonly host?: HostConfig;
	private readonly logger: Logger;
	private readonly transport: Transport;
	private readonly timeout: number;
	private readonly fixtures: FixtureLoader;

	constructor(options: HttpNetworkOptions = {}) {
		this.host = options.host;
		this.logger = options.logger ?? httpLogger;
		this.transport =
			options.transport ??
			createFetchTransport({ allowInsecureTls: options.allowInsecureTls });
		this.timeout = options.timeout ?? HttpNetwork.DEFAULT_TIMEOUT;
		this.fixtures = new FixtureLoader(options.fixtureRoot);
	}

	async get(url: string | URL, options?: RequestOptions): Promise<Uint8Array> {
		const response = await this.execute("GET", url, options);
		return this.classify(response);
	}

	async post(
		url: string | URL,
		body: RequestBody,
		options?: RequestOptions,
	): Promise<Uint8Array> {
		const bytes =
			typeof body === "string" ? new TextEncoder().encode(body) : body;
		const response = await this.execute("POST", url, options, bytes);
		return this.classify(response);
	}

	/**
	 * HEAD request; every failure mode (transport, non-2xx, bad URL)
	 * collapses to NoNetworkError
	 */
	async ping(url: string | URL, options?: RequestOptions): Promise<void> {
		let response: TransportResponse;
		try {
			response = await this.execute("HEAD", url, options);
		} catch (error) {
			this.logger.debug("ping failed: {url} ({error})", {
				url: url.toString(),
				error: error instanceof Error ? error.message : String(error),
			});
			throw new NoNetworkError(url.toString());
		}

		if (!hasSuccessStatusCode(response.status)) {
			this.logger.debug("ping failed: {url} (status {status})", {
				url: response.url,
				status: response.status,
			});
			throw new NoNetworkError(url.toString());
		}
	}

	loadLocalFixture(name: string, root?: string): Promise<Uint8Array> {
		return this.fixtures.load(name, root);
	}

	/**
	 * 2xx returns the body unchanged; anything else is a ServerError
	 * carrying the exact body received
	 */
	private classify(response: TransportResponse): Uint8Array {
		if (!hasSuccessStatusCode(response.status)) {
			this.logger.error("{url} answered {status} {statusText}", {
				url: response.url,
				status: response.status,
				statusText: response.statusText,
			});
			throw new ServerError(response.url, response.status, response.body);
		}
		return response.body;
	}

	private async execute(
		method: HttpMethod,
		url: string | URL,
		options: RequestOptions | undefined,
		body?: Uint8Array,
	): Promise<TransportResponse> {
		const target = this.validateUrl(resolveRequestUrl(url, this.host));
		const timeout = options?.timeout ?? this.timeout;

		if (!Number.isFinite(timeout) || timeout <= 0) {
			throw new TransportFailureError(
				target,
				"invalid-request",
				`Invalid timeout value: ${timeout}. Must be a positive number.`,
			);
		}

		const controller = new AbortController();
		let timedOut = false;
		const timeoutId = setTimeout(() => {
			timedOut = true;
			controller.abort();
		}, timeout);

		const callerSignal = options?.signal;
		const onCallerAbort = () => controller.abort();
		if (callerSignal?.aborted) {
			controller.abort();
		} else {
			callerSignal?.addEventListener("abort", onCallerAbort, { once: true });
		}

		const request: TransportRequest = {
			method,
			url: target,
			headers: this.processHeaders(options?.headers),
			body,
			signal: controller.signal,
		};

		this.logger.debug("{method} {url}", { method, url: target });
		this.logger.debug("request headers: {names}", {
			names: Object.keys(request.headers),
		});
		if (body) {
			this.logger.debug("request body: {bytes} bytes", { bytes: body.length });
		}

		// Settles as soon as the call is aborted, even if the transport ignores the signal
		const aborted = new Promise<never>((_, reject) => {
			if (controller.signal.aborted) {
				reject(controller.signal.reason);
				return;
			}
			controller.signal.addEventListener(
				"abort",
				() => reject(controller.signal.reason),
				{ once: true },
			);
		});

		try {
			const response = await Promise.race([this.transport(request), aborted]);
			this.logger.debug("{method} {url} -> {status} ({bytes} bytes)", {
				method,
				url: response.url,
				status: response.status,
				bytes: response.body.length,
			});
			return response;
		} catch (error) {
			const failure = this.mapError(
				error,
				target,
				timeout,
				timedOut,
				controller.signal.aborted,
			);
			this.logger.error("{method} {url} failed: {reason} ({detail})", {
				method,
				url: target,
				reason: failure.reason,
				detail: failure.detail,
			});
			throw failure;
		} finally {
			clearTimeout(timeoutId);
			callerSignal?.removeEventListener("abort", onCallerAbort);
		}
	}

	/**
	 * @throws TransportFailureError for empty, unparsable or non-HTTP URLs
	 */
	private validateUrl(url: string): string {
		const trimmed = url.trim();
		if (trimmed === "") {
			throw new TransportFailureError(
				url,
				"invalid-request",
				"URL must be a non-empty string",
			);
		}

		let parsed: URL;
		try {
			parsed = new URL(trimmed);
		} catch (urlError) {
			const message =
				urlError instanceof Error ? urlError.message : "Invalid URL format";
			throw new TransportFailureError(
				url,
				"invalid-request",
				`Invalid URL format: ${message}`,
			);
		}

		if (parsed.protocol !== "http:" && parsed.protocol !== "https:") {
			throw new TransportFailureError(
				url,
				"invalid-request",
				"URL must start with http:// or https://",
			);
		}

		return trimmed;
	}

	/**
	 * Drop headers with empty names or CR/LF in name or value. Names are
	 * case-insensitive; the last value given for a name wins.
	 */
	private processHeaders(
		headers?: Readonly<Record<string, string>>,
	): Record<string, string> {
		const processed: Record<string, string> = {};
		if (!headers) {
			return processed;
		}

		for (const [key, value] of Object.entries(headers)) {
			const name = key.trim();
			if (!name || /[\r\n]/.test(key) || /[\r\n]/.test(value)) {
				this.logger.warn("dropping invalid request header {name}", {
					name: JSON.stringify(key),
				});
				continue;
			}
			const lowered = name.toLowerCase();
			for (const existing of Object.keys(processed)) {
				if (existing.toLowerCase() === lowered) {
					delete processed[existing];
				}
			}
			processed[name] = value;
		}

		return processed;
	}

	private mapError(
		error: unknown,
		url: string,
		timeout: number,
		timedOut: boolean,
		aborted: boolean,
	): TransportFailureError {
		if (timedOut) {
			return new TransportFailureError(
				url,
				"timeout",
				`Request timed out after ${timeout}ms`,
			);
		}

		if (aborted) {
			return new TransportFailureError(url, "cancelled", "Request was cancelled");
		}

		if (error instanceof TransportFailureError) {
			return error;
		}

		if (error instanceof Error) {
			// undici reports "fetch failed" and keeps the real reason in `cause`
			const cause = error.cause instanceof Error ? error.cause.message : undefined;
			return new TransportFailureError(
				url,
				"connection",
				cause ? `${error.message}: ${cause}` : error.message,
			);
		}

		return new TransportFailureError(
			url,
			"connection",
			"Unknown network error occurred",
		);
	}
}
