#!/usr/bin/env node
import { readFile } from "node:fs/promises";
import { buildWithDagger, createProgram, reportFailure } from "./cli.js";

const program = createProgram({
	env: process.env,
	readFile: (path) => readFile(path, "utf8"),
	log: (line) => console.log(line),
	build: buildWithDagger,
});

try {
	await program.parseAsync(process.argv);
} catch (error) {
	process.exitCode = reportFailure(error);
}
