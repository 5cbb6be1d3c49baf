import type { Logger } from "@logtape/logtape";
import type INetwork from "../interfaces/INetwork.js";
import type { Transport } from "../interfaces/ITransport.js";
import type { HostConfig } from "../types/Endpoint.js";
import { factoryLogger } from "../utils/logger.js";
import HttpNetwork from "./HttpNetwork.js";

/**
 * Options shared by the release and debug factories
 */
export interface NetworkFactoryOptions {
	readonly host?: HostConfig;
	readonly logger?: Logger;
	readonly transport?: Transport;
	readonly timeout?: number;
	readonly allowInsecureTls?: boolean;
	readonly fixtureRoot?: string;
}

/**
 * Release factory: always the live client.
 *
 * This module never imports the mock dispatcher or the mapper decoding;
 * those are only reachable through the "netlayer/debug" entry point.
 */
export function makeNetwork(options: NetworkFactoryOptions = {}): INetwork {
	factoryLogger.debug("using live network for {host}", {
		host: options.host?.host ?? "(no host)",
	});
	return new HttpNetwork(options);
}
