/**
 * Development-only entry point ("netlayer/debug").
 *
 * Mock dispatch, the mapper channel and the always-failing client live
 * here so that code importing only "netlayer" cannot reach them.
 */
export {
	type DebugNetworkFactoryOptions,
	makeDebugNetwork,
} from "./services/DebugNetworkFactory.js";
export { default as FailingNetwork } from "./services/FailingNetwork.js";
export {
	type FixtureOverrides,
	default as MockNetwork,
	type MockNetworkOptions,
} from "./services/MockNetwork.js";
export {
	decodeMapper,
	encodeMapper,
	type NetworkConfig,
	type NetworkConfigSource,
	readHostConfig,
	readNetworkConfig,
} from "./services/NetworkConfig.js";
export { MockEntrySchema, MockEntryListSchema } from "./types/MockEntry.js";
