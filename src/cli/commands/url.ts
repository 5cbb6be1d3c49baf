import { Command } from "commander";
import { createEndpoint } from "../../services/EndpointBuilder.js";
import { getServices } from "../../services/serviceFactory.js";
import type { HostConfig, QueryParam } from "../../types/Endpoint.js";
import { collectQueryParam, handleError, parsePositiveInt } from "../cliUtils.js";

interface UrlOptions {
	host?: string;
	port?: number;
	basePath?: string;
	insecure?: boolean;
	query?: QueryParam[];
	rest?: boolean;
}

export const urlCommand = new Command("url")
	.description(
		"Build the absolute URL for an API path. Host flags override NETLAYER_HOST and friends.",
	)
	.argument("<api-path>", "API path, e.g. /users")
	.option("--host <host>", "Host name")
	.option("--port <port>", "Port", parsePositiveInt)
	.option("--base-path <path>", "Base path prepended to the API path")
	.option("--insecure", "Use http instead of https")
	.option(
		"-q, --query <name=value>",
		"Query parameter (repeatable, order preserved)",
		collectQueryParam,
	)
	.option("--rest", "Print only the base path + API path")
	.action((apiPath: string, options: UrlOptions) => {
		try {
			const { host: configuredHost } = getServices();
			const host: HostConfig | undefined = options.host
				? {
						host: options.host,
						port: options.port,
						path: options.basePath,
						secure: !options.insecure,
					}
				: configuredHost;

			const endpoint = createEndpoint(host, apiPath, options.query ?? []);
			console.log(options.rest ? endpoint.restPath : endpoint.url);
		} catch (error) {
			handleError(error, "Failed to build URL");
		}
	});
