import { Command } from "commander";
import { getServices } from "../../services/serviceFactory.js";
import {
	collectHeader,
	handleError,
	parsePositiveInt,
	printBody,
} from "../cliUtils.js";

export const postCommand = new Command("post")
	.description("Send a POST request and print the response body.")
	.argument("<url>", "Absolute URL or API path")
	.option("-d, --data <text>", "Request body", "")
	.option("-H, --header <header>", 'Request header "Name: value" (repeatable)', collectHeader)
	.option("-t, --timeout <ms>", "Request timeout in milliseconds", parsePositiveInt)
	.action(
		async (
			url: string,
			options: {
				data: string;
				header?: Record<string, string>;
				timeout?: number;
			},
		) => {
			try {
				const { network } = getServices();
				const body = await network.post(url, options.data, {
					headers: options.header,
					timeout: options.timeout,
				});
				printBody(body);
			} catch (error) {
				handleError(error, "Request failed");
			}
		},
	);
