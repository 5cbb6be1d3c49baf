import * as path from "node:path";
import { z } from "zod";
import type { HostConfig } from "../types/Endpoint.js";
import { type MockEntry, MockEntryListSchema } from "../types/MockEntry.js";
import { factoryLogger } from "../utils/logger.js";

/**
 * Everything the client factories read from the process boundary, captured
 * once at startup and passed in explicitly
 */
export interface NetworkConfig {
	/** The "mock" launch argument was present */
	readonly mockMode: boolean;
	/** Entries decoded from the `mapper` variable; undefined when absent or undecodable */
	readonly mapper?: readonly MockEntry[];
	/** Path → fixture-name overrides (a snapshot of the environment) */
	readonly overrides: Readonly<Record<string, string>>;
	readonly fixtureRoot: string;
	readonly allowInsecureTls: boolean;
}

export interface NetworkConfigSource {
	readonly argv?: readonly string[];
	readonly env?: Readonly<Record<string, string | undefined>>;
}

const MOCK_ARGUMENTS = new Set(["mock", "--mock"]);

const BooleanFlagSchema = z
	.string()
	.trim()
	.toLowerCase()
	.transform((value) => value === "1" || value === "true" || value === "yes");

const HostEnvSchema = z.object({
	NETLAYER_HOST: z.string().trim().min(1),
	NETLAYER_PORT: z.coerce.number().int().min(1).max(65535).optional(),
	NETLAYER_BASE_PATH: z.string().optional(),
	NETLAYER_SECURE: BooleanFlagSchema.optional(),
});

/**
 * Decode the `mapper` channel: base64 of a JSON array of mock entries.
 * Any failure is reported as "channel absent" (undefined).
 */
export function decodeMapper(
	encoded: string | undefined,
): readonly MockEntry[] | undefined {
	if (!encoded) {
		return undefined;
	}

	let raw: unknown;
	try {
		raw = JSON.parse(Buffer.from(encoded, "base64").toString("utf-8"));
	} catch (error) {
		factoryLogger.warn("mapper is not base64-encoded JSON: {error}", {
			error: error instanceof Error ? error.message : String(error),
		});
		return undefined;
	}

	const result = MockEntryListSchema.safeParse(raw);
	if (!result.success) {
		factoryLogger.warn("mapper rejected: {issues}", {
			issues: result.error.errors.map((issue) => issue.message).join("; "),
		});
		return undefined;
	}
	return result.data;
}

/**
 * Encode mock entries for the `mapper` channel
 */
export function encodeMapper(entries: readonly MockEntry[]): string {
	return Buffer.from(JSON.stringify(entries), "utf-8").toString("base64");
}

/**
 * Capture network configuration from launch arguments and environment
 *
 * @example
 * ```typescript
 * const config = readNetworkConfig({ argv: process.argv, env: process.env });
 * ```
 */
export function readNetworkConfig(source: NetworkConfigSource = {}): NetworkConfig {
	const argv = source.argv ?? [];
	const env = source.env ?? {};

	const overrides: Record<string, string> = {};
	for (const [key, value] of Object.entries(env)) {
		if (typeof value === "string") {
			overrides[key] = value;
		}
	}

	const insecure = BooleanFlagSchema.safeParse(env.NETLAYER_INSECURE_TLS ?? "");

	return {
		mockMode: argv.some((argument) => MOCK_ARGUMENTS.has(argument)),
		mapper: decodeMapper(env.mapper),
		overrides: Object.freeze(overrides),
		fixtureRoot: path.resolve(env.NETLAYER_FIXTURE_ROOT ?? "fixtures"),
		allowInsecureTls: insecure.success && insecure.data,
	};
}

/**
 * Build a host configuration from NETLAYER_HOST, NETLAYER_PORT,
 * NETLAYER_BASE_PATH and NETLAYER_SECURE; undefined when NETLAYER_HOST is
 * unset or any value is invalid
 */
export function readHostConfig(
	env: Readonly<Record<string, string | undefined>>,
): HostConfig | undefined {
	if (!env.NETLAYER_HOST) {
		return undefined;
	}

	const result = HostEnvSchema.safeParse(env);
	if (!result.success) {
		factoryLogger.warn("ignoring host environment: {issues}", {
			issues: result.error.errors
				.map((issue) => `${issue.path.join(".")}: ${issue.message}`)
				.join("; "),
		});
		return undefined;
	}

	const { NETLAYER_HOST, NETLAYER_PORT, NETLAYER_BASE_PATH, NETLAYER_SECURE } =
		result.data;
	return {
		host: NETLAYER_HOST,
		port: NETLAYER_PORT,
		path: NETLAYER_BASE_PATH,
		secure: NETLAYER_SECURE ?? true,
	};
}
