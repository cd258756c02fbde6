import { GitCommandError, UnknownRevisionError } from "../errors.js";
import type { CommitId } from "../graph/types.js";
import { exec } from "../utils/exec.js";

export interface RevisionRange {
	/** Newest end of the range, `B` in `A..B`. */
	start: string;
	/** Excluded side, `A` in `A..B`. */
	end?: string;
}

/** Reads `A..B` or a single revision. Symmetric differences (`A...B`) are not ranges here. */
export function parseRange(text: string): RevisionRange {
	if (text.includes("...")) {
		throw new UnknownRevisionError(text);
	}
	const separator = text.indexOf("..");
	if (separator < 0) {
		return { start: text.length > 0 ? text : "HEAD" };
	}
	const end = text.slice(0, separator);
	const start = text.slice(separator + 2);
	return {
		start: start.length > 0 ? start : "HEAD",
		end: end.length > 0 ? end : "HEAD",
	};
}

export async function resolveRevision(repoPath: string, revision: string): Promise<CommitId> {
	try {
		const { stdout } = await exec(`git rev-parse --verify --quiet "${revision}^{commit}"`, { cwd: repoPath });
		const id = stdout.trim();
		if (id.length === 0) {
			throw new UnknownRevisionError(revision);
		}
		return id;
	} catch (err) {
		if (err instanceof GitCommandError) {
			throw new UnknownRevisionError(revision);
		}
		throw err;
	}
}
