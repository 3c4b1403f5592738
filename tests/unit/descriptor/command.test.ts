import { describe, expect, it } from "vitest";
import {
	failedSubAction,
	parseRunPayload,
	splitConjunction,
	toShellScript,
} from "../../../src/descriptor/command.js";

describe("splitConjunction", () => {
	it("splits on && outside quotes", () => {
		expect(splitConjunction(`a && 'b && c' && "d && e"`)).toEqual([
			"a",
			"'b && c'",
			'"d && e"',
		]);
	});

	it("keeps &&, grouped or substituted, in its segment", () => {
		expect(splitConjunction("{ a && b; } && echo $(c && d) && `e && f`"))
			.toEqual(["{ a && b; }", "echo $(c && d)", "`e && f`"]);
	});

	it("keeps loop and case bodies whole", () => {
		const loop = "for f in a b; do rm $f && echo $f; done";

		expect(splitConjunction(loop)).toEqual([loop]);
		expect(splitConjunction("case $x in a) b && c ;; esac")).toEqual([
			"case $x in a) b && c ;; esac",
		]);
	});

	it("does not split a list that also uses || or ;", () => {
		expect(splitConjunction("a && b || c")).toEqual(["a && b || c"]);
		expect(splitConjunction("a && b; c")).toEqual(["a && b; c"]);
	});

	it("treats a redirect ampersand as part of the command", () => {
		expect(splitConjunction("make 2>&1 && make install")).toEqual([
			"make 2>&1",
			"make install",
		]);
	});

	it("leaves an escaped ampersand alone", () => {
		expect(splitConjunction("echo a \\&& b")).toEqual(["echo a \\&& b"]);
	});

	it("rejects empty segments", () => {
		expect(splitConjunction("a && && b")).toBeNull();
		expect(splitConjunction("a &&")).toBeNull();
	});

	it("rejects an unterminated quote", () => {
		expect(splitConjunction('echo "open')).toBeNull();
	});
});

describe("parseRunPayload", () => {
	it("falls back to the shell for arrays that are not all strings", () => {
		expect(parseRunPayload("[1, 2]")).toEqual({
			ok: true,
			actions: [{ kind: "shell", command: "[1, 2]" }],
		});
	});

	it("falls back to the shell for an empty array", () => {
		expect(parseRunPayload("[]")).toEqual({
			ok: true,
			actions: [{ kind: "shell", command: "[]" }],
		});
	});
});

describe("toShellScript", () => {
	it("runs the sub-actions in one script, checking each", () => {
		const check = (index: number) =>
			`__rc=$?; if [ "$__rc" -ne 0 ]; then echo ` +
			`"provision: sub-action failed: ${index} $__rc" >&2; exit "$__rc"; fi`;

		expect(
			toShellScript([
				{ kind: "shell", command: "cd /opt" },
				{ kind: "exec", argv: ["echo", "it's"] },
			])
		).toBe(["cd /opt", check(0), `'echo' 'it'\\''s'`, check(1)].join("\n"));
	});
});

describe("failedSubAction", () => {
	it("reads the index the script reported", () => {
		expect(failedSubAction("E: oops\nprovision: sub-action failed: 2 100\n"))
			.toBe(2);
	});

	it("returns null without a report", () => {
		expect(failedSubAction("Killed")).toBeNull();
	});
});
