import { isMerge, isRoot, type CommitRecord } from "../graph/types.js";
import { isSubtreeMerge, type SubjectTag } from "../subject/classifier.js";
import type { EntryRole } from "./types.js";

export interface ClassifyContext {
	/** Semantic tag from the subject classifier; absent when it had nothing to say. */
	subject?: SubjectTag;
	/** Final commit of a bounded walk that ended at the range boundary. */
	isLastOfRange?: boolean;
	/** The commit equals a resolved fork point of a merge on the same line. */
	isForkPoint?: boolean;
	/** Terminator of an unfolded branch whose commit already has an entry elsewhere. */
	isLink?: boolean;
	/** Another visible entry's commit also has this merge's second parent as a parent. */
	secondParentShared?: boolean;
}

/**
 * Structural role of a commit at its position in the tree.
 *
 * Terminators win, then fork points (merges only; a plain commit keeps its
 * role and carries the fork-point flag instead), then links, subtree merges,
 * ordinary merges and commits.
 */
export function classifyEntry(commit: CommitRecord, context: ClassifyContext = {}): EntryRole {
	if (isRoot(commit)) {
		return "InitialCommit";
	}
	if (context.isLastOfRange) {
		return "LastCommit";
	}

	const merge = isMerge(commit);
	if (merge && context.isForkPoint) {
		return "ForkPoint";
	}
	if (context.isLink) {
		return "CommitLink";
	}
	if (merge && isSubtreeMerge(context.subject) && !context.secondParentShared) {
		return "Foldable";
	}
	return merge ? "Merge" : "Commit";
}
