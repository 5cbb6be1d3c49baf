import { describe, expect, test } from "vitest";
import FailingNetwork from "../../src/services/FailingNetwork.js";
import {
	NoNetworkError,
	TransportFailureError,
} from "../../src/types/NetworkError.js";
import { captureError, FIXTURE_ROOT, STATUS_JSON, text } from "../testUtils.js";

describe("FailingNetwork", () => {
	const network = new FailingNetwork(FIXTURE_ROOT);

	test("should fail GET with a connection TransportFailureError", async () => {
		const error = await captureError(network.get("https://api.example.com/v1"));

		expect(error).toBeInstanceOf(TransportFailureError);
		expect((error as TransportFailureError).reason).toBe("connection");
		expect((error as TransportFailureError).url).toBe("https://api.example.com/v1");
	});

	test("should fail POST with a connection TransportFailureError", async () => {
		const error = await captureError(network.post("https://api.example.com/v1"));

		expect(error).toBeInstanceOf(TransportFailureError);
	});

	test("should fail ping with NoNetworkError", async () => {
		const error = await captureError(network.ping("https://api.example.com"));

		expect(error).toBeInstanceOf(NoNetworkError);
	});

	test("should still load fixtures from its default root", async () => {
		expect(text(await network.loadLocalFixture("status"))).toBe(STATUS_JSON);
	});
});
