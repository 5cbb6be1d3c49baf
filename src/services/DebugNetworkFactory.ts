import type INetwork from "../interfaces/INetwork.js";
import type { MockEntry } from "../types/MockEntry.js";
import { factoryLogger } from "../utils/logger.js";
import HttpNetwork from "./HttpNetwork.js";
import MockNetwork from "./MockNetwork.js";
import type { NetworkConfig } from "./NetworkConfig.js";
import type { NetworkFactoryOptions } from "./NetworkFactory.js";

export interface DebugNetworkFactoryOptions extends NetworkFactoryOptions {
	/** Captured launch arguments and environment */
	readonly config: NetworkConfig;
	/** Explicit mock entries, used when the mapper channel is not active */
	readonly mapper?: readonly MockEntry[];
	/** Forward MockUnresolved requests (and pings) to a live client */
	readonly fallbackToLive?: boolean;
}

/**
 * Development factory: picks the mock dispatcher or the live client once,
 * at construction.
 *
 * 1. mock launch argument + decodable `mapper` channel → MockNetwork(channel entries)
 * 2. explicit `mapper` → MockNetwork(mapper)
 * 3. otherwise → HttpNetwork
 */
export function makeDebugNetwork(options: DebugNetworkFactoryOptions): INetwork {
	const { config } = options;
	const liveOptions = {
		...options,
		fixtureRoot: options.fixtureRoot ?? config.fixtureRoot,
		allowInsecureTls: options.allowInsecureTls ?? config.allowInsecureTls,
	};

	const entries =
		config.mockMode && config.mapper ? config.mapper : options.mapper;

	if (!entries) {
		factoryLogger.debug("using live network");
		return new HttpNetwork(liveOptions);
	}

	factoryLogger.debug("using mock network ({count} entries, source: {source})", {
		count: entries.length,
		source: entries === config.mapper ? "mapper channel" : "caller",
	});

	return new MockNetwork({
		entries,
		overrides: config.overrides,
		fixtureRoot: liveOptions.fixtureRoot,
		host: options.host,
		logger: options.logger,
		fallback: options.fallbackToLive ? new HttpNetwork(liveOptions) : undefined,
	});
}
