import { Command } from "commander";
import { getServices } from "../../services/serviceFactory.js";
import {
	collectHeader,
	handleError,
	parsePositiveInt,
	printBody,
} from "../cliUtils.js";

export const getCommand = new Command("get")
	.description(
		'Send a GET request and print the response body. Paths starting with "/" use the configured host.',
	)
	.argument("<url>", "Absolute URL or API path")
	.option("-H, --header <header>", 'Request header "Name: value" (repeatable)', collectHeader)
	.option("-t, --timeout <ms>", "Request timeout in milliseconds", parsePositiveInt)
	.action(
		async (
			url: string,
			options: { header?: Record<string, string>; timeout?: number },
		) => {
			try {
				const { network } = getServices();
				const body = await network.get(url, {
					headers: options.header,
					timeout: options.timeout,
				});
				printBody(body);
			} catch (error) {
				handleError(error, "Request failed");
			}
		},
	);
