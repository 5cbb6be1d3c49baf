import type INetwork from "../interfaces/INetwork.js";
import type { HostConfig } from "../types/Endpoint.js";
import { makeDebugNetwork } from "./DebugNetworkFactory.js";
import {
	type NetworkConfig,
	readHostConfig,
	readNetworkConfig,
} from "./NetworkConfig.js";
import { makeNetwork } from "./NetworkFactory.js";

/**
 * CLI-side holder of the long-lived network client.
 *
 * The configuration is captured from the process once, the client is built
 * on first access and reused by every command. Without mock mode the client
 * comes from the release factory; the debug factory is only consulted when
 * --mock (or the mock argument) is given.
 */

export interface ServiceOverrides {
	/** Forces mock mode regardless of launch arguments (--mock) */
	readonly mock?: boolean;
	/** Accept any TLS certificate chain (--insecure-tls) */
	readonly insecureTls?: boolean;
}

let services: {
	config: NetworkConfig;
	host: HostConfig | undefined;
	network: INetwork;
} | null = null;

let overrides: ServiceOverrides = {};

/**
 * Set flags parsed from the command line. Must run before the first
 * getServices() call to take effect.
 */
export function configureServices(next: ServiceOverrides): void {
	overrides = next;
}

/**
 * Initialize and return the singleton client and its configuration
 */
export function getServices() {
	if (!services) {
		const captured = readNetworkConfig({
			argv: process.argv,
			env: process.env,
		});
		const config: NetworkConfig = {
			...captured,
			mockMode: captured.mockMode || (overrides.mock ?? false),
			allowInsecureTls:
				captured.allowInsecureTls || (overrides.insecureTls ?? false),
		};
		const host = readHostConfig(process.env);

		services = {
			config,
			host,
			network: config.mockMode
				? makeDebugNetwork({
						config,
						host,
						// Paths without a fixture are served live
						fallbackToLive: true,
					})
				: makeNetwork({
						host,
						allowInsecureTls: config.allowInsecureTls,
						fixtureRoot: config.fixtureRoot,
					}),
		};
	}

	return services;
}

/**
 * Reset service instances (primarily for testing purposes)
 */
export function resetServices(): void {
	services = null;
	overrides = {};
}
