#!/usr/bin/env node
import { runCli } from "./run";

runCli(process.argv.slice(2))
	.then((code) => {
		process.exitCode = code;
	})
	.catch((err) => {
		console.error("Unexpected failure:", err);
		process.exitCode = 1;
	});
