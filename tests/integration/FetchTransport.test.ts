import { afterAll, beforeAll, describe, expect, test } from "vitest";
import HttpNetwork from "../../src/services/HttpNetwork.js";
import {
	NoNetworkError,
	TransportFailureError,
} from "../../src/types/NetworkError.js";
import { startSelfSignedServer } from "../helpers/mockHttpServer.js";
import { captureError, text } from "../testUtils.js";

/**
 * Certificate validation against a server presenting a self-signed chain
 */
describe("FetchTransport TLS", () => {
	let server: Awaited<ReturnType<typeof startSelfSignedServer>> | undefined;
	let baseUrl = "";

	beforeAll(async () => {
		server = await startSelfSignedServer();
		baseUrl = server.baseUrl;
	});

	afterAll(async () => {
		await server?.stop();
	});

	test("should reject an untrusted certificate by default", async () => {
		const network = new HttpNetwork({ timeout: 5000 });

		const error = await captureError(network.get(`${baseUrl}/secure`));

		expect(error).toBeInstanceOf(TransportFailureError);
		expect((error as TransportFailureError).reason).toBe("connection");
	});

	test("should fail ping against an untrusted certificate by default", async () => {
		const network = new HttpNetwork({ timeout: 5000 });

		const error = await captureError(network.ping(`${baseUrl}/secure`));

		expect(error).toBeInstanceOf(NoNetworkError);
	});

	test("should accept the certificate with allowInsecureTls", async () => {
		const network = new HttpNetwork({ timeout: 5000, allowInsecureTls: true });

		const body = await network.get(`${baseUrl}/secure`);

		expect(text(body)).toBe('{"secure":true}');
	});

	test("should ping successfully with allowInsecureTls", async () => {
		const network = new HttpNetwork({ timeout: 5000, allowInsecureTls: true });

		await expect(network.ping(`${baseUrl}/secure`)).resolves.toBeUndefined();
	});
});
