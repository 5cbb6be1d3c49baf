import {
	DEFAULT_HOST,
	type Endpoint,
	type HostConfig,
	type QueryParam,
} from "../types/Endpoint.js";

/**
 * Base path with a guaranteed leading slash, or "" when unset or empty
 */
function normalizeBasePath(path: string | undefined): string {
	if (!path) {
		return "";
	}
	return path.startsWith("/") ? path : `/${path}`;
}

function encodePath(path: string): string {
	try {
		return encodeURI(path);
	} catch (_error) {
		// Lone surrogates cannot be encoded; keep the path as given
		return path;
	}
}

function encodeComponent(value: string): string {
	try {
		return encodeURIComponent(value);
	} catch (_error) {
		return value;
	}
}

function encodeQuery(queryParams: readonly QueryParam[]): string {
	return queryParams
		.map(({ name, value }) =>
			value === undefined
				? encodeComponent(name)
				: `${encodeComponent(name)}=${encodeComponent(value)}`,
		)
		.join("&");
}

/**
 * Build the absolute URL for an API path on a host
 *
 * Pure function of its inputs; malformed values degrade to a best-effort URL
 * instead of throwing. `host.api` and `host.queryParams`, when set, take
 * precedence over the arguments.
 *
 * @example
 * ```typescript
 * buildURL({ host: "api.example.com", path: "/v1" }, "/users", [
 *   { name: "page", value: "2" },
 * ]);
 * // "https://api.example.com/v1/users?page=2"
 * ```
 */
export function buildURL(
	host: HostConfig | undefined,
	apiPath: string,
	queryParams: readonly QueryParam[] = [],
): string {
	return createEndpoint(host, apiPath, queryParams).url;
}

/**
 * Turn a request target into an absolute URL string.
 *
 * Strings starting with "/" are API paths on `host` (or the default host);
 * everything else is taken as given.
 */
export function resolveRequestUrl(
	url: string | URL,
	host: HostConfig | undefined,
): string {
	if (typeof url !== "string" || !url.startsWith("/")) {
		return url.toString();
	}

	// The caller's path and query win over the host's api/queryParams overrides
	const queryStart = url.indexOf("?");
	const apiPath = queryStart === -1 ? url : url.slice(0, queryStart);
	const query = queryStart === -1 ? "" : url.slice(queryStart);
	const base = buildURL(
		{ ...(host ?? DEFAULT_HOST), api: undefined, queryParams: undefined },
		apiPath,
	);
	return `${base}${query}`;
}

/**
 * Resolve a host, API path and query parameters into an Endpoint
 */
export function createEndpoint(
	host: HostConfig | undefined,
	apiPath: string,
	queryParams: readonly QueryParam[] = [],
): Endpoint {
	const resolvedHost = host ?? DEFAULT_HOST;
	const api = resolvedHost.api ?? apiPath;
	const params = resolvedHost.queryParams ?? queryParams;

	const scheme = resolvedHost.secure === false ? "http" : "https";
	const port = resolvedHost.port === undefined ? "" : `:${resolvedHost.port}`;
	const joined = `${normalizeBasePath(resolvedHost.path)}${api}`;
	// A path that does not start with "/" would run into the authority
	const restPath = joined === "" || joined.startsWith("/") ? joined : `/${joined}`;
	const query = params.length > 0 ? `?${encodeQuery(params)}` : "";

	return {
		host: resolvedHost,
		api,
		queryParams: params,
		url: `${scheme}://${resolvedHost.host}${port}${encodePath(restPath)}${query}`,
		restPath,
	};
}
