import type {
	Transport,
	TransportRequest,
	TransportResponse,
} from "../../src/interfaces/ITransport.js";

/**
 * Canned reply for one URL
 */
export interface StubReply {
	readonly status: number;
	readonly statusText?: string;
	readonly body?: string | Uint8Array;
	readonly headers?: Record<string, string>;
	/** Simulated latency in milliseconds */
	readonly delayMs?: number;
}

/** Reply that never settles; only an abort on the executor side ends the call */
export const HANG = Symbol("hang");

type StubRoute =
	| StubReply
	| Error
	| typeof HANG
	| ((request: TransportRequest) => StubReply | Error);

const NOT_FOUND: StubReply = {
	status: 404,
	statusText: "Not Found",
	body: "Not Found",
};

/**
 * In-memory transport for exercising HttpNetwork without sockets
 *
 * Routes are matched by exact URL. Unmapped URLs answer 404. Every request
 * descriptor is recorded for verification.
 *
 * @example
 * ```typescript
 * const stub = new InMemoryTransport();
 * stub.setResponse("https://api.example.com/v1/users", { status: 200, body: "[]" });
 * const network = new HttpNetwork({ transport: stub.transport });
 * ```
 */
export default class InMemoryTransport {
	private readonly routes = new Map<string, StubRoute>();
	private readonly requestHistory: TransportRequest[] = [];

	readonly transport: Transport = async (request) => {
		this.requestHistory.push(request);

		const route = this.routes.get(request.url) ?? NOT_FOUND;
		if (route === HANG) {
			return new Promise<TransportResponse>(() => {});
		}

		const reply = typeof route === "function" ? route(request) : route;
		if (reply instanceof Error) {
			throw reply;
		}

		if (reply.delayMs) {
			await new Promise((resolve) => setTimeout(resolve, reply.delayMs));
		}

		return {
			status: reply.status,
			statusText: reply.statusText ?? "",
			headers: reply.headers ?? {},
			body:
				typeof reply.body === "string"
					? new TextEncoder().encode(reply.body)
					: (reply.body ?? new Uint8Array(0)),
			url: request.url,
		};
	};

	setResponse(url: string, route: StubRoute): void {
		this.routes.set(url, route);
	}

	/**
	 * Copy of the recorded request descriptors, oldest first
	 */
	getRequestHistory(): TransportRequest[] {
		return [...this.requestHistory];
	}
}
