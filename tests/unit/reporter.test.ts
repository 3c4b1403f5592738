import { describe, expect, it } from "vitest";
import { BuildError } from "../../src/pipeline/errors.js";
import {
	consoleReporter,
	describeStep,
	formatEvent,
} from "../../src/pipeline/reporter.js";

describe("consoleReporter", () => {
	it("logs steps and skips comment headers", () => {
		const lines: string[] = [];
		const report = consoleReporter((line) => lines.push(line));

		report({
			type: "base-resolved",
			reference: {
				repository: "andrius/asterisk",
				tag: "latest",
				digest: null,
			},
			user: "asterisk",
		});
		report({
			type: "step-started",
			index: 0,
			step: { kind: "COMMENT", line: 3, text: "Switch to root" },
		});
		report({ type: "comment", text: "Switch to root" });
		report({
			type: "step-started",
			index: 1,
			step: { kind: "SET_USER", line: 4, identity: "root" },
		});
		report({ type: "identity-changed", from: "asterisk", to: "root" });
		report({
			type: "layer-committed",
			layer: {
				id: "0123456789abcdef",
				stepIndex: 3,
				line: 7,
				instruction: "RUN true",
			},
		});

		expect(lines).toEqual([
			"FROM andrius/asterisk:latest (user asterisk)",
			"# Switch to root",
			"[1] line 4: USER root",
			"identity asterisk -> root",
			"  layer 0123456789ab",
		]);
	});
});

describe("formatEvent", () => {
	it("names the failed step", () => {
		const error = new BuildError(
			"command-failed",
			"line 7: command exited with code 100",
			{ exitCode: 100 }
		);

		expect(formatEvent({ type: "step-failed", index: 3, error })).toBe(
			"[3] failed: line 7: command exited with code 100"
		);
	});
});

describe("describeStep", () => {
	it("joins shell actions back into one command", () => {
		expect(
			describeStep({
				kind: "RUN",
				line: 1,
				actions: [
					{ kind: "shell", command: "apt-get update" },
					{ kind: "shell", command: "apt-get install -y unixodbc" },
				],
			})
		).toBe("RUN apt-get update && apt-get install -y unixodbc");
	});
});
