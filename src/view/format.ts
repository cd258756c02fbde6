import { isRoot, shortId } from "../graph/types.js";
import type { HistoryEntry } from "../history/types.js";
import { describeSubject, isSubtreeMerge } from "../subject/classifier.js";

export interface FormatOptions {
	/** Columns for the author name; 0 leaves it unpadded and untruncated. */
	authorNameWidth: number;
	/** Columns for the date; 0 leaves it untruncated. */
	dateWidth: number;
	/** Remote names used to group remote-tracking references. */
	remotes?: readonly string[];
}

export function graphGlyphs(entry: HistoryEntry): string {
	let text = "│ ".repeat(entry.level);

	if (isRoot(entry.commit)) {
		text += "◉";
	} else if (entry.role === "CommitLink") {
		text += "⭞";
	} else {
		text += "●";
	}

	if (entry.hasChildren) {
		const subtree = isSubtreeMerge(entry.subject);
		if (entry.isForkPoint) {
			text += subtree ? "⇤┤" : "─┤";
		} else {
			text += subtree ? "⇤╮" : "─┐";
		}
	} else if (entry.isForkPoint) {
		text += "─┘";
	}

	if (entry.pendingUnfold) {
		text += "…";
	}
	return text;
}

/**
 * Collapses several references of one remote into `remote/{a,b}`. Other
 * references keep their order and come first.
 */
export function shortenReferences(references: readonly string[], remotes: readonly string[] = []): string[] {
	const rest = [...references];
	const grouped: string[] = [];

	for (const remote of remotes) {
		const prefix = `${remote}/`;
		const branches = rest.filter((ref) => ref.startsWith(prefix));
		if (branches.length === 0) continue;
		for (const branch of branches) {
			rest.splice(rest.indexOf(branch), 1);
		}
		if (branches.length === 1) {
			grouped.push(...branches);
		} else {
			grouped.push(`${prefix}{${branches.map((ref) => ref.slice(prefix.length)).join(",")}}`);
		}
	}

	return [...rest, ...grouped];
}

export function formatReferences(references: readonly string[], remotes: readonly string[] = []): string {
	return shortenReferences(references, remotes)
		.map((ref) => `«${ref}»`)
		.join(" ");
}

/** `YYYY-MM-DD` of a timestamp in seconds, in UTC. */
export function formatDate(timestamp: number): string {
	return new Date(timestamp * 1000).toISOString().slice(0, 10);
}

export function fit(text: string, width: number): string {
	if (width <= 0) {
		return text;
	}
	if (text.length > width) {
		return `${text.slice(0, Math.max(0, width - 1))}…`;
	}
	return text.padEnd(width);
}

/** One display line: `shortId date author glyphs «refs» subject`. */
export function formatEntry(entry: HistoryEntry, options: FormatOptions): string {
	const { commit } = entry;
	const parts = [
		shortId(commit.id),
		fit(formatDate(commit.author.timestamp), options.dateWidth),
		fit(commit.author.name, options.authorNameWidth),
		graphGlyphs(entry),
	];

	const references = formatReferences(commit.references, options.remotes);
	if (references.length > 0) {
		parts.push(references);
	}
	parts.push(entry.subject ? describeSubject(entry.subject, commit.subject) : commit.subject);
	return parts.join(" ");
}
