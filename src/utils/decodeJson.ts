import type { ZodType, ZodTypeDef } from "zod";
import { bytesAsText, DecodingFailureError } from "../types/NetworkError.js";

/**
 * Decode a response body as JSON and validate it
 *
 * Caller-side counterpart of the network layer: the clients hand back raw
 * bytes, and this is where DecodingFailureError is raised.
 *
 * @example
 * ```typescript
 * const User = z.object({ id: z.number() });
 * const user = decodeJson(await network.get("/users/1"), User);
 * ```
 * @throws DecodingFailureError for non-UTF-8 bytes, invalid JSON or schema mismatch
 */
export function decodeJson<T>(
	bytes: Uint8Array,
	schema: ZodType<T, ZodTypeDef, unknown>,
): T {
	const text = bytesAsText(bytes);
	if (text === undefined) {
		throw new DecodingFailureError("Body is empty or not valid UTF-8");
	}

	let raw: unknown;
	try {
		raw = JSON.parse(text);
	} catch (error) {
		throw new DecodingFailureError(
			error instanceof Error ? error.message : "Invalid JSON format",
		);
	}

	const result = schema.safeParse(raw);
	if (!result.success) {
		throw new DecodingFailureError(
			result.error.errors
				.map((issue) =>
					issue.path.length > 0
						? `${issue.path.join(".")}: ${issue.message}`
						: issue.message,
				)
				.join("; "),
		);
	}
	return result.data;
}
