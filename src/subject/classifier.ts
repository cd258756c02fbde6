export type SubjectTag =
	| { kind: "subtree-import"; prefix: string; ref: string }
	| { kind: "subtree-update"; prefix: string; ref: string }
	| { kind: "subtree-split"; prefix: string; ref: string }
	| { kind: "pull-request"; id: string; source: string }
	| { kind: "conventional"; type: string; scope?: string; breaking: boolean; description: string }
	| { kind: "fixup"; description: string }
	| { kind: "revert"; description: string }
	| { kind: "release"; version: string; description: string }
	| { kind: "simple"; description: string }
	| { kind: "unknown" };

/** Labels the nature of a commit from its subject line. */
export interface SubjectClassifier {
	classify(subject: string): SubjectTag;
}

const SUBTREE_IMPORT = /^(?:Import|Add) '([^']+)' (?:as|from) '([^']+)'$|^:?(\S+) Import (\S+)$/;
const SUBTREE_UPDATE = /^Update :(\S+?):? to (\S+)$|^Update '([^']+)' to '([^']+)'$/;
const SUBTREE_SPLIT = /^Split '([^']+)' into commit '([^']+)'$/;
const PULL_REQUEST = /^Merge pull request #(\d+) from (\S+)/;
const CONVENTIONAL = /^([a-z]+)(?:\(([^)]+)\))?(!)?: (.+)$/;
const FIXUP = /^(?:fixup|squash|amend)! (.+)$/;
const REVERT = /^Revert "(.+)"$/;
const RELEASE = /^Release v?(\d+(?:\.\d+)*\S*)(?:\s*[-:]\s*(.*))?$/i;

export function classifySubject(subject: string): SubjectTag {
	const text = subject.trim();
	if (text.length === 0) {
		return { kind: "unknown" };
	}

	const imported = SUBTREE_IMPORT.exec(text);
	if (imported) {
		// `Import 'ref' as 'prefix'` vs `:prefix Import ref`
		const [, ref, prefix, shortPrefix, shortRef] = imported;
		return { kind: "subtree-import", prefix: prefix ?? shortPrefix ?? "", ref: ref ?? shortRef ?? "" };
	}

	const updated = SUBTREE_UPDATE.exec(text);
	if (updated) {
		const [, prefix, ref, quotedPrefix, quotedRef] = updated;
		return { kind: "subtree-update", prefix: prefix ?? quotedPrefix ?? "", ref: ref ?? quotedRef ?? "" };
	}

	const split = SUBTREE_SPLIT.exec(text);
	if (split) {
		return { kind: "subtree-split", prefix: split[1] ?? "", ref: split[2] ?? "" };
	}

	const pull = PULL_REQUEST.exec(text);
	if (pull) {
		return { kind: "pull-request", id: pull[1] ?? "", source: pull[2] ?? "" };
	}

	const fixup = FIXUP.exec(text);
	if (fixup) {
		return { kind: "fixup", description: fixup[1] ?? "" };
	}

	const revert = REVERT.exec(text);
	if (revert) {
		return { kind: "revert", description: revert[1] ?? "" };
	}

	const release = RELEASE.exec(text);
	if (release) {
		return { kind: "release", version: release[1] ?? "", description: release[2] ?? text };
	}

	const conventional = CONVENTIONAL.exec(text);
	if (conventional) {
		const [, type = "", scope, bang, description = ""] = conventional;
		return { kind: "conventional", type, scope, breaking: bang === "!", description };
	}

	return { kind: "simple", description: text };
}

export const defaultSubjectClassifier: SubjectClassifier = {
	classify: classifySubject,
};

export function isSubtreeMerge(tag: SubjectTag | undefined): boolean {
	return tag?.kind === "subtree-import" || tag?.kind === "subtree-update";
}

export function describeSubject(tag: SubjectTag, fallback: string): string {
	switch (tag.kind) {
		case "subtree-import":
			return `Import from ${tag.ref}`;
		case "subtree-update":
			return `Update to ${tag.ref}`;
		case "subtree-split":
			return `Split into commit ${tag.ref}`;
		case "conventional":
			return tag.scope ? `(${tag.scope}) ${tag.description}` : tag.description;
		case "fixup":
		case "revert":
		case "release":
		case "simple":
			return tag.description;
		case "pull-request":
		case "unknown":
			return fallback;
	}
}
