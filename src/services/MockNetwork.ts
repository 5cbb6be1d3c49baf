import type { Logger } from "@logtape/logtape";
import type INetwork from "../interfaces/INetwork.js";
import type { RequestBody, RequestOptions } from "../interfaces/INetwork.js";
import type { HostConfig } from "../types/Endpoint.js";
import type { MockEntry } from "../types/MockEntry.js";
import {
	MockUnresolvedError,
	NoNetworkError,
} from "../types/NetworkError.js";
import { mockLogger } from "../utils/logger.js";
import { resolveRequestUrl } from "./EndpointBuilder.js";
import { FixtureLoader } from "./FixtureLoader.js";

/**
 * Read-only key/value lookup consulted when no mock entry matches,
 * keyed by exact request path (usually a snapshot of the environment)
 */
export type FixtureOverrides = Readonly<Record<string, string | undefined>>;

export interface MockNetworkOptions {
	/** First entry whose path equals the request path wins */
	readonly entries?: readonly MockEntry[];
	readonly overrides?: FixtureOverrides;
	/** Directory for entries without a root, overrides and `loadLocalFixture` */
	readonly fixtureRoot?: string;
	/** Host that "/"-prefixed request paths are resolved against */
	readonly host?: HostConfig;
	readonly logger?: Logger;
	/** Receives requests that resolve to MockUnresolved, and every ping */
	readonly fallback?: INetwork;
	/** Makes `ping` succeed when no fallback is configured */
	readonly reachable?: boolean;
}

/**
 * Fixture-backed network client
 *
 * Serves requests from local JSON files instead of the network. Resolution
 * order for a request path:
 * 1. the first mock entry with exactly that path
 * 2. the override lookup, keyed by the path, naming a fixture in the default root
 * 3. MockUnresolvedError (or the fallback client, when one is configured)
 *
 * @example
 * ```typescript
 * const network = new MockNetwork({
 *   entries: [{ path: "/v1/users", fixture: "users" }],
 *   fixtureRoot: "./fixtures",
 * });
 * const bytes = await network.get("https://api.example.com/v1/users");
 * ```
 */
export default class MockNetwork implements INetwork {
	readonly host?: HostConfig;
	private readonly entries: readonly MockEntry[];
	private readonly overrides: FixtureOverrides;
	private readonly fixtures: FixtureLoader;
	private readonly logger: Logger;
	private readonly fallback?: INetwork;
	private readonly reachable: boolean;

	constructor(options: MockNetworkOptions = {}) {
		this.host = options.host;
		this.entries = Object.freeze([...(options.entries ?? [])]);
		this.overrides = Object.freeze({ ...(options.overrides ?? {}) });
		this.fixtures = new FixtureLoader(options.fixtureRoot);
		this.logger = options.logger ?? mockLogger;
		this.fallback = options.fallback;
		this.reachable = options.reachable ?? false;
	}

	async get(url: string | URL, options?: RequestOptions): Promise<Uint8Array> {
		try {
			return await this.resolve(url, options);
		} catch (error) {
			if (error instanceof MockUnresolvedError && this.fallback) {
				this.logger.debug("no mock for {path}, forwarding GET", {
					path: error.path,
				});
				return this.fallback.get(url, options);
			}
			throw error;
		}
	}

	async post(
		url: string | URL,
		body: RequestBody,
		options?: RequestOptions,
	): Promise<Uint8Array> {
		this.logger.debug("ignoring POST body (length {length})", {
			length: body.length,
		});
		try {
			return await this.resolve(url, options);
		} catch (error) {
			if (error instanceof MockUnresolvedError && this.fallback) {
				this.logger.debug("no mock for {path}, forwarding POST", {
					path: error.path,
				});
				return this.fallback.post(url, body, options);
			}
			throw error;
		}
	}

	async ping(url: string | URL, options?: RequestOptions): Promise<void> {
		if (this.fallback) {
			return this.fallback.ping(url, options);
		}
		if (!this.reachable) {
			throw new NoNetworkError(url.toString());
		}
	}

	loadLocalFixture(name: string, root?: string): Promise<Uint8Array> {
		return this.fixtures.load(name, root);
	}

	/**
	 * Path component of a request target, percent-decoded, or undefined
	 * when the target cannot be parsed
	 */
	requestPath(url: string | URL): string | undefined {
		let pathname: string;
		try {
			pathname = new URL(resolveRequestUrl(url, this.host)).pathname;
		} catch (_error) {
			return undefined;
		}
		try {
			return decodeURIComponent(pathname);
		} catch (_error) {
			return pathname;
		}
	}

	private async resolve(
		url: string | URL,
		options: RequestOptions | undefined,
	): Promise<Uint8Array> {
		const path = this.requestPath(url);
		if (path === undefined) {
			throw new MockUnresolvedError(url.toString(), url.toString());
		}

		this.logger.debug("Mocked data {path}", { path });
		if (options?.headers) {
			this.logger.debug("ignoring request headers: {names}", {
				names: Object.keys(options.headers),
			});
		}

		const entry = this.entries.find((candidate) => candidate.path === path);
		if (entry) {
			return this.fixtures.load(entry.fixture, entry.root);
		}

		const override = this.overrides[path];
		if (override) {
			this.logger.debug("override {path} -> {fixture}", {
				path,
				fixture: override,
			});
			return this.fixtures.load(override);
		}

		throw new MockUnresolvedError(path, url.toString());
	}
}
