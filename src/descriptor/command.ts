import { z } from "zod";
import type { SubAction } from "../pipeline/types.js";

const ExecForm = z.array(z.string()).nonempty();

const OPENERS = new Set(["if", "case", "for", "while", "until", "select"]);
const CLOSERS = new Set(["fi", "esac", "done"]);

const FAILURE_MARKER = "provision: sub-action failed:";

/**
 * Splits a shell command on the `&&` operators of its top-level list.
 *
 * Only a plain chain `a && b && c` is split: `&&` inside quotes,
 * `( )`, `{ }`, `$( )`, backticks or `if`/`case`/loop bodies is part of
 * its segment, and a command whose top level also uses `||`, `;`, `&`
 * or a newline is kept whole, since splitting would change what runs
 * after a failure. Returns null when a segment is empty or a quote is
 * left open.
 */
export const splitConjunction = (command: string): string[] | null => {
	const segments: string[] = [];
	let start = 0;
	let quote: "'" | '"' | "`" | null = null;
	let depth = 0;
	let keywords = 0;
	let whole = false;
	let word = "";

	const endWord = () => {
		if (OPENERS.has(word)) keywords++;
		else if (CLOSERS.has(word)) keywords--;
		if (keywords < 0) whole = true;
		word = "";
	};

	for (let i = 0; i < command.length; i++) {
		const char = command[i];

		if (quote === "'") {
			if (char === "'") quote = null;
			continue;
		}

		if (char === "\\") {
			word += char + (command[i + 1] ?? "");
			i++;
			continue;
		}

		if (quote !== null) {
			if (char === quote) quote = null;
			continue;
		}

		const topLevel = depth === 0 && keywords === 0;

		switch (char) {
			case "'":
			case '"':
			case "`":
				quote = char;
				word += char;
				break;
			case "(":
			case "{":
				endWord();
				depth++;
				break;
			case ")":
			case "}":
				endWord();
				depth--;
				if (depth < 0) whole = true;
				break;
			case "&":
				endWord();
				if (command[i + 1] === "&") {
					if (topLevel) {
						segments.push(command.slice(start, i).trim());
						start = i + 2;
					}
					i++;
				} else if (topLevel && !/[<>]/.test(command[i - 1] ?? "")) {
					whole = true;
				}
				break;
			case "|":
				endWord();
				if (command[i + 1] === "|") {
					if (topLevel) whole = true;
					i++;
				}
				break;
			case ";":
			case "\n":
				endWord();
				if (topLevel) whole = true;
				break;
			case " ":
			case "\t":
				endWord();
				break;
			default:
				word += char;
		}
	}

	if (quote !== null) return null;
	endWord();

	if (whole || depth !== 0 || keywords !== 0) return [command.trim()];

	segments.push(command.slice(start).trim());
	if (segments.some((segment) => segment.length === 0)) return null;
	return segments;
};

/**
 * Reads a RUN payload as an ordered list of sub-actions: a JSON array is
 * one exec-form action, anything else is split into shell actions.
 */
export const parseRunPayload = (
	payload: string
): { ok: true; actions: SubAction[] } | { ok: false; reason: string } => {
	const text = payload.trim();
	if (text.length === 0) return { ok: false, reason: "RUN needs a command" };

	if (text.startsWith("[")) {
		let json: unknown;
		try {
			json = JSON.parse(text);
		} catch {
			json = undefined;
		}
		const argv = ExecForm.safeParse(json);
		if (argv.success) {
			return { ok: true, actions: [{ kind: "exec", argv: argv.data }] };
		}
		// not a string array: Docker runs it through the shell as written
	}

	const segments = splitConjunction(text);
	if (!segments) {
		return { ok: false, reason: `cannot split command: ${text}` };
	}

	return {
		ok: true,
		actions: segments.map(
			(command): SubAction => ({ kind: "shell", command })
		),
	};
};

export const describeSubAction = (action: SubAction): string =>
	action.kind === "shell" ? action.command : JSON.stringify(action.argv);

const quote = (arg: string) => `'${arg.replace(/'/g, `'\\''`)}'`;

const shellText = (action: SubAction) =>
	action.kind === "shell" ? action.command : action.argv.map(quote).join(" ");

/**
 * Renders sub-actions as one `sh` script. Each sub-action is checked
 * right after it runs; on failure the script names it on stderr and
 * exits with its status.
 */
export const toShellScript = (actions: readonly SubAction[]): string =>
	actions
		.map((action, index) =>
			[
				shellText(action),
				`__rc=$?; if [ "$__rc" -ne 0 ]; then ` +
					`echo "${FAILURE_MARKER} ${index} $__rc" >&2; exit "$__rc"; fi`,
			].join("\n")
		)
		.join("\n");

/** Index of the sub-action a script from `toShellScript` stopped at. */
export const failedSubAction = (output: string): number | null => {
	const match = /provision: sub-action failed: (\d+) \d+/.exec(output);
	return match ? Number(match[1]) : null;
};
