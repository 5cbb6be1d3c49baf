import { readFile } from "node:fs/promises";
import * as path from "node:path";
import type INetwork from "../interfaces/INetwork.js";
import { TransportFailureError } from "../types/NetworkError.js";
import { fixtureLogger } from "../utils/logger.js";

export const FIXTURE_EXTENSION = ".json";

/**
 * Default fixture directory: `fixtures/` under the current working directory
 */
export function defaultFixtureRoot(): string {
	return path.resolve("fixtures");
}

/**
 * Reads JSON fixtures from disk as raw bytes
 *
 * Shared by every INetwork implementation for `loadLocalFixture`, and by
 * the mock dispatcher to resolve mock entries.
 */
export class FixtureLoader {
	constructor(private readonly defaultRoot: string = defaultFixtureRoot()) {}

	get root(): string {
		return this.defaultRoot;
	}

	/**
	 * Read `<root>/<name>.json`
	 *
	 * @throws TransportFailureError (reason "fixture-missing") for any read failure
	 */
	async load(name: string, root?: string): Promise<Uint8Array> {
		const directory = root ?? this.defaultRoot;
		const filePath = path.join(directory, `${name}${FIXTURE_EXTENSION}`);

		if (name.trim() === "") {
			throw new TransportFailureError(
				filePath,
				"fixture-missing",
				"Fixture name must be a non-empty string",
			);
		}

		try {
			const content = await readFile(filePath);
			fixtureLogger.debug("read success: {path} ({bytes} bytes)", {
				path: filePath,
				bytes: content.length,
			});
			return new Uint8Array(content);
		} catch (error) {
			const message = error instanceof Error ? error.message : String(error);
			fixtureLogger.error("read failed: {path} (error: {error})", {
				path: filePath,
				error: message,
			});
			throw new TransportFailureError(filePath, "fixture-missing", message);
		}
	}
}

/**
 * Last path segment of a URL, e.g. "users" for "https://host/v1/users"
 */
export function fixtureNameFromUrl(url: string | URL): string | undefined {
	const withoutQuery = url.toString().split(/[?#]/, 1)[0] ?? "";
	const last = withoutQuery.split("/").pop();
	return last ? last : undefined;
}

/**
 * Load the fixture named after the last path segment of `url`
 *
 * @throws TransportFailureError when the URL has no usable segment or the file cannot be loaded
 */
export async function loadFixtureForUrl(
	network: INetwork,
	url: string | URL,
	root?: string,
): Promise<Uint8Array> {
	const name = fixtureNameFromUrl(url);
	if (!name) {
		throw new TransportFailureError(
			url.toString(),
			"fixture-missing",
			"URL has no file segment",
		);
	}
	return network.loadLocalFixture(name, root);
}
