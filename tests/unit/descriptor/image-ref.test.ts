import { describe, expect, it } from "vitest";
import {
	formatImageReference,
	parseImageReference,
} from "../../../src/descriptor/image-ref.js";

const digest = `sha256:${"a".repeat(64)}`;

describe("parseImageReference", () => {
	it("reads repository and tag", () => {
		expect(parseImageReference("andrius/asterisk:latest")).toEqual({
			repository: "andrius/asterisk",
			tag: "latest",
			digest: null,
		});
	});

	it("defaults the tag to latest", () => {
		expect(parseImageReference("andrius/asterisk")?.tag).toBe("latest");
	});

	it("does not mistake a registry port for a tag", () => {
		expect(parseImageReference("localhost:5000/team/app")).toEqual({
			repository: "localhost:5000/team/app",
			tag: "latest",
			digest: null,
		});
		expect(parseImageReference("localhost:5000/app:1.2")?.tag).toBe("1.2");
	});

	it("reads a digest", () => {
		expect(parseImageReference(`alpine@${digest}`)).toEqual({
			repository: "alpine",
			tag: "latest",
			digest,
		});
	});

	it.each(["Andrius/Asterisk", "debian:", `alpine@sha256:xyz`, "", "a//b"])(
		"rejects %j",
		(text) => {
			expect(parseImageReference(text)).toBeNull();
		}
	);
});

describe("formatImageReference", () => {
	it("always writes the tag", () => {
		const debian = { repository: "debian", tag: "latest", digest: null };

		expect(formatImageReference(debian)).toBe("debian:latest");
		expect(
			formatImageReference({ repository: "alpine", tag: "3.19", digest })
		).toBe(`alpine:3.19@${digest}`);
	});
});
