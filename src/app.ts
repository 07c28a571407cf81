#!/usr/bin/env node
import { buildApplication, buildRouteMap, run } from "@stricli/core";
import { extractCommand } from "./commands/extract/command.js";
import { resetCommand } from "./commands/reset/command.js";
import { statusCommand } from "./commands/status/command.js";
import { buildContext } from "./context.js";

const routes = buildRouteMap({
	routes: {
		extract: extractCommand,
		status: statusCommand,
		reset: resetCommand,
	},
	docs: {
		brief: "Back-fill a subreddit's post history into a CSV file, one time window at a time.",
	},
});

export const app = buildApplication(routes, {
	name: "reddit-backfill",
	versionInfo: {
		currentVersion: "0.1.0",
	},
	scanner: {
		caseStyle: "allow-kebab-for-camel",
	},
	documentation: {
		caseStyle: "convert-camel-to-kebab",
	},
});

await run(app, process.argv.slice(2), buildContext(process));
