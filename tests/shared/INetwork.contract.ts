import { beforeEach, describe, expect, test } from "vitest";
import type INetwork from "../../src/interfaces/INetwork.js";
import {
	NoNetworkError,
	TransportFailureError,
} from "../../src/types/NetworkError.js";
import { captureError, FIXTURE_ROOT, text, USERS_JSON } from "../testUtils.js";

/**
 * Setup context for contract tests. Properties may be getters so that
 * integration suites can supply URLs known only after their server starts.
 */
interface ContractSetupContext {
	/** Answers GET and POST with `expectedBody` */
	readonly okUrl: string;
	readonly expectedBody: string;
	/** A target whose ping must fail */
	readonly unreachableUrl: string;
}

/**
 * Shared contract test suite for INetwork implementations
 *
 * Any client (live executor, fixture dispatcher) must satisfy these.
 *
 * @param networkFactory - Creates the client under test
 * @param context - Targets for the client under test
 */
export function runNetworkContractTests(
	networkFactory: () => INetwork,
	context: ContractSetupContext,
) {
	describe("INetwork Contract", () => {
		let network: INetwork;

		beforeEach(() => {
			network = networkFactory();
		});

		describe("successful requests", () => {
			test("should return the body of a GET unchanged", async () => {
				const body = await network.get(context.okUrl);

				expect(body).toBeInstanceOf(Uint8Array);
				expect(text(body)).toBe(context.expectedBody);
			});

			test("should accept a URL object", async () => {
				const body = await network.get(new URL(context.okUrl));

				expect(text(body)).toBe(context.expectedBody);
			});

			test("should return the body of a POST unchanged", async () => {
				const body = await network.post(context.okUrl, '{"name":"Carol"}', {
					headers: { "Content-Type": "application/json" },
				});

				expect(text(body)).toBe(context.expectedBody);
			});

			test("should accept custom headers", async () => {
				const body = await network.get(context.okUrl, {
					headers: { Accept: "application/json", "X-Request-Id": "abc" },
				});

				expect(text(body)).toBe(context.expectedBody);
			});

			test("should serve concurrent calls independently", async () => {
				const bodies = await Promise.all(
					Array.from({ length: 10 }, () => network.get(context.okUrl)),
				);

				expect(bodies.map(text)).toEqual(
					Array.from({ length: 10 }, () => context.expectedBody),
				);
			});
		});

		describe("local fixtures", () => {
			test("should load a fixture from an explicit root", async () => {
				const body = await network.loadLocalFixture("users", FIXTURE_ROOT);

				expect(text(body)).toBe(USERS_JSON);
			});

			test("should fail with TransportFailureError for a missing fixture", async () => {
				const error = await captureError(
					network.loadLocalFixture("does_not_exist", FIXTURE_ROOT),
				);

				expect(error).toBeInstanceOf(TransportFailureError);
				expect((error as TransportFailureError).reason).toBe("fixture-missing");
			});
		});

		describe("reachability", () => {
			test("should fail ping with NoNetworkError", async () => {
				const error = await captureError(network.ping(context.unreachableUrl));

				expect(error).toBeInstanceOf(NoNetworkError);
				expect((error as NoNetworkError).kind).toBe("NoNetwork");
			});
		});
	});
}
