import { Command } from "commander";
import { loadFixtureForUrl } from "../../services/FixtureLoader.js";
import { getServices } from "../../services/serviceFactory.js";
import { handleError, printBody } from "../cliUtils.js";

export const fixtureCommand = new Command("fixture")
	.description("Print a local JSON fixture (<root>/<name>.json).")
	.argument("<name>", "Fixture name without extension, or a URL with --from-url")
	.option("-r, --root <dir>", "Fixture directory (default: NETLAYER_FIXTURE_ROOT or ./fixtures)")
	.option("-u, --from-url", "Name the fixture after the last path segment of <name>")
	.action(
		async (name: string, options: { root?: string; fromUrl?: boolean }) => {
			try {
				const { network } = getServices();
				const body = options.fromUrl
					? await loadFixtureForUrl(network, name, options.root)
					: await network.loadLocalFixture(name, options.root);
				printBody(body);
			} catch (error) {
				handleError(error, "Failed to load fixture");
			}
		},
	);
