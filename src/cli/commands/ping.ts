import { Command } from "commander";
import { getServices } from "../../services/serviceFactory.js";
import { cliLogger } from "../../utils/logger.js";
import { parsePositiveInt } from "../cliUtils.js";

export const pingCommand = new Command("ping")
	.description("Check that a URL answers a HEAD request with a 2xx status.")
	.argument("<url>", "Absolute URL or API path")
	.option("-t, --timeout <ms>", "Request timeout in milliseconds", parsePositiveInt)
	.action(async (url: string, options: { timeout?: number }) => {
		const { network } = getServices();
		try {
			await network.ping(url, { timeout: options.timeout });
			console.log("success");
		} catch (error) {
			cliLogger.debug("ping {url} failed: {error}", {
				url,
				error: error instanceof Error ? error.message : String(error),
			});
			console.log("failed to ping");
			process.exitCode = 1;
		}
	});
