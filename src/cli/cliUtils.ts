import { InvalidArgumentError } from "commander";
import type { QueryParam } from "../types/Endpoint.js";
import {
	bytesAsText,
	describeNetworkError,
	isNetworkError,
} from "../types/NetworkError.js";
import { cliLogger } from "../utils/logger.js";

/**
 * Build the one-line message shown for a failed command
 */
export function formatError(error: unknown, defaultMessage: string): string {
	if (isNetworkError(error)) {
		switch (error.kind) {
			case "ServerError":
				return `Error: ${describeNetworkError(error)}${error.status === undefined ? "" : ` (HTTP ${error.status})`}`;
			case "TransportFailure":
				return error.detail
					? `Error: ${describeNetworkError(error)} (${error.reason}: ${error.detail})`
					: `Error: ${describeNetworkError(error)} (${error.reason})`;
			case "MockUnresolved":
				return `Error: ${describeNetworkError(error)}: ${error.path}`;
			case "NoNetwork":
			case "DecodingFailure":
				return `Error: ${describeNetworkError(error)}`;
		}
	}

	if (error instanceof Error) {
		return `Error: ${error.message}`;
	}
	return defaultMessage;
}

/**
 * Handle CLI command errors with user-friendly messages
 */
export function handleError(error: unknown, defaultMessage: string): void {
	cliLogger.debug("command failed: {error}", {
		error: error instanceof Error ? (error.stack ?? error.message) : String(error),
	});
	console.error(formatError(error, defaultMessage));
	process.exit(1);
}

/**
 * commander collector for repeatable `-H "Name: value"` options
 */
export function collectHeader(
	value: string,
	previous: Record<string, string> = {},
): Record<string, string> {
	const separator = value.indexOf(":");
	if (separator <= 0) {
		throw new InvalidArgumentError(`Expected "Name: value", got "${value}".`);
	}
	return {
		...previous,
		[value.slice(0, separator).trim()]: value.slice(separator + 1).trim(),
	};
}

/**
 * commander collector for repeatable `-q name=value` options; a bare
 * `name` yields a parameter without value
 */
export function collectQueryParam(
	value: string,
	previous: QueryParam[] = [],
): QueryParam[] {
	const separator = value.indexOf("=");
	if (separator === 0) {
		throw new InvalidArgumentError(`Query parameter needs a name: "${value}".`);
	}
	const param: QueryParam =
		separator === -1
			? { name: value }
			: { name: value.slice(0, separator), value: value.slice(separator + 1) };
	return [...previous, param];
}

export function parsePositiveInt(value: string): number {
	const parsed = Number(value);
	if (!Number.isInteger(parsed) || parsed <= 0) {
		throw new InvalidArgumentError("Must be a positive integer.");
	}
	return parsed;
}

/**
 * Write a response body to stdout, as text when it is UTF-8
 */
export function printBody(bytes: Uint8Array): void {
	const text = bytesAsText(bytes);
	if (text === undefined) {
		if (bytes.length > 0) {
			process.stdout.write(bytes);
		}
		return;
	}
	console.log(text);
}
