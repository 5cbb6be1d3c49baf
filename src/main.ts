#!/usr/bin/env node

import { readFile } from "node:fs/promises";
import { Command } from "commander";
import { fixtureCommand } from "./cli/commands/fixture.js";
import { getCommand } from "./cli/commands/get.js";
import { pingCommand } from "./cli/commands/ping.js";
import { postCommand } from "./cli/commands/post.js";
import { urlCommand } from "./cli/commands/url.js";
import { configureServices } from "./services/serviceFactory.js";
import {
	configureLogger,
	enableVerboseLogging,
	parseLogLevel,
} from "./utils/logger.js";

// Early check for verbose flag and environment variable before configuring LogTape.
// LogTape loggers resolve their sinks lazily, so module-level loggers created
// by the imports above pick up this configuration.
const hasVerboseFlag =
	process.argv.includes("-V") || process.argv.includes("--verbose");

// LOG_LEVEL wins over --verbose
const initialLogLevel =
	parseLogLevel(process.env.LOG_LEVEL) ?? (hasVerboseFlag ? "debug" : "info");

await configureLogger(initialLogLevel);

let version = "0.0.0";
try {
	const packageJson: unknown = JSON.parse(
		await readFile(new URL("../../package.json", import.meta.url), "utf-8"),
	);
	if (
		typeof packageJson === "object" &&
		packageJson !== null &&
		"version" in packageJson &&
		typeof packageJson.version === "string"
	) {
		version = packageJson.version;
	}
} catch (_error) {
	console.error(
		"Warning: Could not read version from package.json, using default version",
	);
}

const program = new Command();

program
	.name("netlayer")
	.description(
		"netlayer sends requests through the netlayer client, either live or from \nlocal JSON fixtures, and builds endpoint URLs for configured hosts.",
	)
	.version(version, "-v, --version", "Show version information")
	.option(
		"-V, --verbose",
		"Enable verbose debug logging for HTTP, mock and fixture operations.",
	)
	.option(
		"--mock",
		"Serve requests from the base64 mock entries in $mapper (falls back to live)",
	)
	.option(
		"--insecure-tls",
		"Accept any server certificate. Only for trusted internal hosts.",
	)
	.helpOption("-h, --help", "help for netlayer")
	.hook("preAction", (thisCommand) => {
		const opts = thisCommand.opts<{
			verbose?: boolean;
			mock?: boolean;
			insecureTls?: boolean;
		}>();
		if (opts.verbose) {
			enableVerboseLogging();
		}
		configureServices({ mock: opts.mock, insecureTls: opts.insecureTls });
	});

program.addCommand(urlCommand);
program.addCommand(getCommand);
program.addCommand(postCommand);
program.addCommand(pingCommand);
program.addCommand(fixtureCommand);

await program.parseAsync();
