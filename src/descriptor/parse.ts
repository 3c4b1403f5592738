import { DescriptorError } from "../pipeline/errors.js";
import type { BuildPlan, ImageReference, Step } from "../pipeline/types.js";
import { parseRunPayload } from "./command.js";
import { parseImageReference } from "./image-ref.js";

type LogicalLine = {
	readonly kind: "comment" | "directive";
	readonly line: number;
	readonly text: string;
};

const isContinued = (line: string) => line.trimEnd().endsWith("\\");
const stripContinuation = (line: string) => line.trimEnd().slice(0, -1);
const isSkipped = (line: string) =>
	line.trim().length === 0 || line.trim().startsWith("#");

// Continuation lines are joined with their leading indentation removed;
// comments and blank lines between them are dropped.
const logicalLines = (text: string): LogicalLine[] => {
	const lines = text.split(/\r?\n/);
	const result: LogicalLine[] = [];

	for (let i = 0; i < lines.length; i++) {
		const trimmed = lines[i].trim();
		if (trimmed.length === 0) continue;

		if (trimmed.startsWith("#")) {
			const comment = trimmed.slice(1).trim();
			result.push({ kind: "comment", line: i + 1, text: comment });
			continue;
		}

		const start = i + 1;
		let current = lines[i];
		let joined = "";
		while (isContinued(current)) {
			joined += stripContinuation(current);
			do {
				i++;
				if (i >= lines.length) {
					throw new DescriptorError(
						start,
						"line continuation runs past the end of the file"
					);
				}
			} while (isSkipped(lines[i]));
			current = lines[i].trimStart();
		}
		joined += current;

		result.push({ kind: "directive", line: start, text: joined.trim() });
	}

	return result;
};

const words = (args: string) =>
	args.split(/\s+/).filter((word) => word.length > 0);

const parseFrom = (line: number, args: string): ImageReference => {
	const [first, ...rest] = words(args);
	if (first === undefined) {
		throw new DescriptorError(line, "FROM needs an image reference");
	}
	if (first.startsWith("--")) {
		throw new DescriptorError(line, `FROM flags are not supported: ${first}`);
	}
	if (rest.length > 0) {
		throw new DescriptorError(
			line,
			`multi-stage builds are not supported: FROM ${args}`
		);
	}

	const reference = parseImageReference(first);
	if (!reference) {
		throw new DescriptorError(line, `invalid image reference "${first}"`);
	}
	return reference;
};

const parseUser = (line: number, args: string): string => {
	const names = words(args);
	if (names.length !== 1) {
		throw new DescriptorError(line, "USER takes exactly one name");
	}
	if (names[0].includes(":")) {
		throw new DescriptorError(
			line,
			`USER groups are not supported: ${names[0]}`
		);
	}
	return names[0];
};

export const parseDescriptor = (text: string): BuildPlan => {
	let from: { reference: ImageReference; line: number } | null = null;
	const steps: Step[] = [];

	for (const { kind, line, text: body } of logicalLines(text)) {
		if (kind === "comment") {
			steps.push({ kind: "COMMENT", line, text: body });
			continue;
		}

		const match = /^(\S+)\s*([\s\S]*)$/.exec(body);
		const keyword = (match?.[1] ?? "").toUpperCase();
		const args = match?.[2] ?? "";

		if (keyword === "FROM") {
			if (from) throw new DescriptorError(line, "only one FROM is supported");
			from = { reference: parseFrom(line, args), line };
			continue;
		}

		if (!from) {
			throw new DescriptorError(line, "FROM must be the first directive");
		}

		switch (keyword) {
			case "USER":
				steps.push({
					kind: "SET_USER",
					line,
					identity: parseUser(line, args),
				});
				break;
			case "RUN": {
				const payload = parseRunPayload(args);
				if (!payload.ok) throw new DescriptorError(line, payload.reason);
				steps.push({ kind: "RUN", line, actions: payload.actions });
				break;
			}
			default:
				throw new DescriptorError(line, `unsupported directive ${keyword}`);
		}
	}

	if (!from) throw new DescriptorError(1, "descriptor has no FROM");

	return { from: from.reference, fromLine: from.line, steps };
};
