/**
 * A single query-string item. A missing value renders the bare name.
 */
export interface QueryParam {
	readonly name: string;
	readonly value?: string;
}

/**
 * Where requests are sent for one environment (development, staging, production)
 *
 * @example
 * ```typescript
 * const production: HostConfig = { host: "api.example.com", path: "/v1" };
 * const development: HostConfig = {
 *   secure: false,
 *   host: "localhost",
 *   port: 8080,
 *   path: "/api/v1",
 * };
 * ```
 */
export interface HostConfig {
	/** https when true (default), http otherwise */
	readonly secure?: boolean;
	/** Host name or IP address */
	readonly host: string;
	/** Only needed for non-standard ports */
	readonly port?: number;
	/** Base path prepended to every API path, e.g. "/v1" */
	readonly path?: string;
	/** When set, replaces the API path of every endpoint built on this host */
	readonly api?: string;
	/** When set, replaces the query parameters of every endpoint built on this host */
	readonly queryParams?: readonly QueryParam[];
}

/**
 * Host used when no configuration is supplied
 */
export const DEFAULT_HOST: HostConfig = Object.freeze({
	secure: true,
	host: "localhost",
});

/**
 * A fully resolvable request target
 */
export interface Endpoint {
	readonly host: HostConfig;
	readonly api: string;
	readonly queryParams: readonly QueryParam[];
	/** Absolute URL */
	readonly url: string;
	/** Base path followed by the API path, e.g. "/v1/users" */
	readonly restPath: string;
}
