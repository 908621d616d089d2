#!/usr/bin/env node
import { runCli } from "./run";

const controller = new AbortController();
process.once("SIGINT", () => controller.abort(new Error("Interrupted.")));

runCli(process.argv.slice(2), { signal: controller.signal }).then(
	(code) => {
		process.exitCode = code;
	},
	(err: unknown) => {
		console.error(err);
		process.exitCode = 1;
	},
);
