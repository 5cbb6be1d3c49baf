import type INetwork from "../interfaces/INetwork.js";
import {
	NoNetworkError,
	TransportFailureError,
} from "../types/NetworkError.js";
import { FixtureLoader } from "./FixtureLoader.js";

/**
 * Network double that is always offline: requests fail with
 * TransportFailureError and pings with NoNetworkError. Fixture loading
 * still works, so tests can read expected payloads through it.
 */
export default class FailingNetwork implements INetwork {
	private readonly fixtures: FixtureLoader;

	constructor(fixtureRoot?: string) {
		this.fixtures = new FixtureLoader(fixtureRoot);
	}

	async get(url: string | URL): Promise<Uint8Array> {
		throw new TransportFailureError(url.toString(), "connection", "offline");
	}

	async post(url: string | URL): Promise<Uint8Array> {
		throw new TransportFailureError(url.toString(), "connection", "offline");
	}

	async ping(url: string | URL): Promise<void> {
		throw new NoNetworkError(url.toString());
	}

	loadLocalFixture(name: string, root?: string): Promise<Uint8Array> {
		return this.fixtures.load(name, root);
	}
}
