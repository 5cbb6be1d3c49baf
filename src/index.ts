export type {
	default as INetwork,
	RequestBody,
	RequestOptions,
} from "./interfaces/INetwork.js";
export type {
	HttpMethod,
	Transport,
	TransportRequest,
	TransportResponse,
} from "./interfaces/ITransport.js";
export {
	buildURL,
	createEndpoint,
	resolveRequestUrl,
} from "./services/EndpointBuilder.js";
export {
	createFetchTransport,
	type FetchTransportOptions,
} from "./services/FetchTransport.js";
export {
	FixtureLoader,
	fixtureNameFromUrl,
	loadFixtureForUrl,
} from "./services/FixtureLoader.js";
export {
	default as HttpNetwork,
	hasSuccessStatusCode,
	type HttpNetworkOptions,
} from "./services/HttpNetwork.js";
export {
	makeNetwork,
	type NetworkFactoryOptions,
} from "./services/NetworkFactory.js";
export {
	DEFAULT_HOST,
	type Endpoint,
	type HostConfig,
	type QueryParam,
} from "./types/Endpoint.js";
export type { MockEntry } from "./types/MockEntry.js";
export {
	type AnyNetworkError,
	bytesAsText,
	DEFAULT_NETWORK_STRINGS,
	DecodingFailureError,
	describeNetworkError,
	isNetworkError,
	MockUnresolvedError,
	NetworkError,
	type NetworkErrorKind,
	type NetworkStrings,
	NoNetworkError,
	ServerError,
	TransportFailureError,
	type TransportFailureReason,
} from "./types/NetworkError.js";
export { decodeJson } from "./utils/decodeJson.js";
export { configureLogger, parseLogLevel } from "./utils/logger.js";
