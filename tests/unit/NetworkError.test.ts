import { describe, expect, test } from "vitest";
import {
	type AnyNetworkError,
	bytesAsText,
	DecodingFailureError,
	DEFAULT_NETWORK_STRINGS,
	describeNetworkError,
	isNetworkError,
	MockUnresolvedError,
	type NetworkStrings,
	NoNetworkError,
	ServerError,
	TransportFailureError,
} from "../../src/types/NetworkError.js";
import { bytes } from "../testUtils.js";

const FRENCH: NetworkStrings = {
	noNetwork: "Pas de connexion",
	errorFetching: "Échec du chargement",
	errorFetchingWith: "Échec du chargement : {reason}",
	errorDecoding: "Échec du décodage",
	mockUnresolved: "Aucune donnée simulée",
};

describe("NetworkError", () => {
	describe("kinds", () => {
		test("should tag every class with its kind", () => {
			const errors: AnyNetworkError[] = [
				new NoNetworkError("https://a.example.com"),
				new TransportFailureError("https://a.example.com", "timeout"),
				new DecodingFailureError("bad json"),
				new ServerError("https://a.example.com", 500),
				new MockUnresolvedError("/v1/users"),
			];

			expect(errors.map((error) => error.kind)).toEqual([
				"NoNetwork",
				"TransportFailure",
				"DecodingFailure",
				"ServerError",
				"MockUnresolved",
			]);
		});

		test("should name errors after their class", () => {
			expect(new NoNetworkError().name).toBe("NoNetworkError");
			expect(new ServerError(undefined).name).toBe("ServerError");
		});

		test("should keep the request URL", () => {
			const error = new TransportFailureError(
				"https://a.example.com/x",
				"connection",
				"ECONNREFUSED",
			);

			expect(error.url).toBe("https://a.example.com/x");
			expect(error.reason).toBe("connection");
			expect(error.detail).toBe("ECONNREFUSED");
		});

		test("should carry status and exact body bytes on ServerError", () => {
			const body = bytes('{"error":"boom"}');
			const error = new ServerError("https://a.example.com", 500, body);

			expect(error.status).toBe(500);
			expect(error.body).toBe(body);
		});
	});

	describe("isNetworkError", () => {
		test("should recognise every kind", () => {
			expect(isNetworkError(new NoNetworkError())).toBe(true);
			expect(isNetworkError(new MockUnresolvedError("/x"))).toBe(true);
		});

		test("should reject other values", () => {
			expect(isNetworkError(new Error("plain"))).toBe(false);
			expect(isNetworkError({ kind: "NoNetwork" })).toBe(false);
			expect(isNetworkError(undefined)).toBe(false);
		});
	});

	describe("describeNetworkError", () => {
		test("should map each kind to its fixed string", () => {
			expect(describeNetworkError(new NoNetworkError())).toBe(
				"No network connection available",
			);
			expect(
				describeNetworkError(new TransportFailureError(undefined, "cancelled")),
			).toBe("Failed to fetch data");
			expect(describeNetworkError(new DecodingFailureError())).toBe(
				"Failed to decode data",
			);
			expect(describeNetworkError(new MockUnresolvedError("/x"))).toBe(
				"No mock data available for this request",
			);
		});

		test("should interpolate a textual server payload", () => {
			const error = new ServerError(undefined, 400, bytes("Invalid token"));

			expect(describeNetworkError(error)).toBe(
				"Failed to fetch data: Invalid token",
			);
			expect(error.message).toBe("Failed to fetch data: Invalid token");
		});

		test("should not expand replacement patterns in the payload", () => {
			const error = new ServerError(undefined, 400, bytes("cost $& more"));

			expect(error.message).toBe("Failed to fetch data: cost $& more");
		});

		test("should fall back to the generic string without a payload", () => {
			expect(describeNetworkError(new ServerError(undefined, 500))).toBe(
				"Failed to fetch data",
			);
			expect(
				describeNetworkError(new ServerError(undefined, 500, new Uint8Array(0))),
			).toBe("Failed to fetch data");
		});

		test("should fall back to the generic string for binary payloads", () => {
			const error = new ServerError(undefined, 500, new Uint8Array([0xff, 0xfe]));

			expect(describeNetworkError(error)).toBe("Failed to fetch data");
		});

		test("should use localized strings when given", () => {
			expect(describeNetworkError(new NoNetworkError(), FRENCH)).toBe(
				"Pas de connexion",
			);
			expect(
				describeNetworkError(new ServerError(undefined, 500, bytes("boom")), FRENCH),
			).toBe("Échec du chargement : boom");
		});

		test("should use the default strings for messages", () => {
			expect(new NoNetworkError().message).toBe(
				DEFAULT_NETWORK_STRINGS.noNetwork,
			);
			expect(new MockUnresolvedError("/x").message).toBe(
				DEFAULT_NETWORK_STRINGS.mockUnresolved,
			);
		});
	});

	describe("bytesAsText", () => {
		test("should decode UTF-8", () => {
			expect(bytesAsText(bytes("héllo"))).toBe("héllo");
		});

		test("should return undefined for empty, missing or invalid input", () => {
			expect(bytesAsText(undefined)).toBeUndefined();
			expect(bytesAsText(new Uint8Array(0))).toBeUndefined();
			expect(bytesAsText(new Uint8Array([0xc3]))).toBeUndefined();
		});
	});
});
