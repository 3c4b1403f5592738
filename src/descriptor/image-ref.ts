import type { ImageReference } from "../pipeline/types.js";

const DEFAULT_TAG = "latest";
const HOST = "[a-z0-9]+(?:[._-][a-z0-9]+)*(?::[0-9]+)?";
const COMPONENT = "[a-z0-9]+(?:(?:[._]|__|-+)[a-z0-9]+)*";
const REPOSITORY = new RegExp(`^${HOST}(?:/${COMPONENT})*$`);
const TAG = /^[A-Za-z0-9_][A-Za-z0-9_.-]{0,127}$/;
const DIGEST = /^[a-z0-9]+(?:[+._-][a-z0-9]+)*:[0-9a-fA-F]{32,}$/;

/**
 * Parses `repository[:tag][@digest]`. The tag separator is the last colon
 * after the last slash, so a registry port is never mistaken for a tag.
 */
export const parseImageReference = (text: string): ImageReference | null => {
	let rest = text.trim();
	let digest: string | null = null;

	const at = rest.indexOf("@");
	if (at !== -1) {
		digest = rest.slice(at + 1);
		rest = rest.slice(0, at);
		if (!DIGEST.test(digest)) return null;
	}

	let tag = DEFAULT_TAG;
	const colon = rest.lastIndexOf(":");
	if (colon > rest.lastIndexOf("/")) {
		tag = rest.slice(colon + 1);
		rest = rest.slice(0, colon);
		if (!TAG.test(tag)) return null;
	}

	if (!REPOSITORY.test(rest)) return null;

	return Object.freeze({ repository: rest, tag, digest });
};

export const formatImageReference = (reference: ImageReference): string => {
	const named = `${reference.repository}:${reference.tag}`;
	return reference.digest ? `${named}@${reference.digest}` : named;
};
