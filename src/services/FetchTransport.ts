import { Agent, fetch } from "undici";
import type { Transport } from "../interfaces/ITransport.js";

export interface FetchTransportOptions {
	/**
	 * Accept whatever certificate chain the server presents.
	 * Only for controlled/internal hosts; defaults to false.
	 */
	readonly allowInsecureTls?: boolean;
}

/**
 * Live transport over undici's fetch
 *
 * Every exchange gets its own Agent (connection pool), closed once the body
 * has been read, so nothing (connections, TLS sessions, credentials) is
 * shared between calls. Nothing is cached.
 */
export function createFetchTransport(
	options: FetchTransportOptions = {},
): Transport {
	const rejectUnauthorized = !(options.allowInsecureTls ?? false);

	return async (request) => {
		const agent = new Agent({ connect: { rejectUnauthorized } });

		try {
			const response = await fetch(request.url, {
				method: request.method,
				headers: { ...request.headers },
				body: request.body,
				signal: request.signal,
				redirect: "follow",
				dispatcher: agent,
			});

			const headers: Record<string, string> = {};
			response.headers.forEach((value, key) => {
				headers[key.toLowerCase()] = value;
			});

			const body =
				request.method === "HEAD"
					? new Uint8Array(0)
					: new Uint8Array(await response.arrayBuffer());

			await agent.close();

			return {
				status: response.status,
				statusText: response.statusText,
				headers,
				body,
				url: response.url || request.url,
			};
		} catch (error) {
			await agent.destroy();
			throw error;
		}
	};
}
