import { afterEach, beforeEach, describe, expect, test, vi } from "vitest";
import HttpNetwork from "../../src/services/HttpNetwork.js";
import MockNetwork from "../../src/services/MockNetwork.js";
import { encodeMapper } from "../../src/services/NetworkConfig.js";
import {
	configureServices,
	getServices,
	resetServices,
} from "../../src/services/serviceFactory.js";
import { FIXTURE_ROOT, text, USERS_JSON } from "../testUtils.js";

describe("serviceFactory", () => {
	beforeEach(() => {
		resetServices();
		vi.stubEnv("NETLAYER_FIXTURE_ROOT", FIXTURE_ROOT);
		vi.stubEnv("mapper", encodeMapper([{ path: "/v1/users", fixture: "users" }]));
	});

	afterEach(() => {
		vi.unstubAllEnvs();
		resetServices();
	});

	test("should build the live client by default", () => {
		expect(getServices().network).toBeInstanceOf(HttpNetwork);
	});

	test("should ignore the mapper channel without mock mode", async () => {
		const { config, network } = getServices();

		expect(config.mapper).toHaveLength(1);
		expect(network).toBeInstanceOf(HttpNetwork);
		expect(network).not.toBeInstanceOf(MockNetwork);
		expect(text(await network.loadLocalFixture("users"))).toBe(USERS_JSON);
	});

	test("should return the same instance until reset", () => {
		const first = getServices();

		expect(getServices()).toBe(first);
		resetServices();
		expect(getServices()).not.toBe(first);
	});

	test("should serve the mapper entries when --mock is set", async () => {
		configureServices({ mock: true });

		const { config, network } = getServices();

		expect(config.mockMode).toBe(true);
		expect(network).toBeInstanceOf(MockNetwork);
		expect(text(await network.get("https://api.example.com/v1/users"))).toBe(
			USERS_JSON,
		);
	});

	test("should read the host from the environment", () => {
		vi.stubEnv("NETLAYER_HOST", "api.example.com");
		vi.stubEnv("NETLAYER_BASE_PATH", "/v1");

		expect(getServices().host).toEqual({
			host: "api.example.com",
			port: undefined,
			path: "/v1",
			secure: true,
		});
	});

	test("should honour --insecure-tls", () => {
		configureServices({ insecureTls: true });

		expect(getServices().config.allowInsecureTls).toBe(true);
	});
});
