import type { CommitId, CommitRecord } from "../graph/types.js";
import type { SubjectTag } from "../subject/classifier.js";

export type EntryRole =
	| "Commit"
	| "Merge"
	| "Foldable"
	| "ForkPoint"
	| "CommitLink"
	| "InitialCommit"
	| "LastCommit";

export type FoldState = "unknown" | "folded" | "unfolded";

export type ForkPointOutcome = { kind: "found"; id: CommitId } | { kind: "none" };

export interface ForkPointRequest {
	merge: CommitId;
	firstParent: CommitId;
}

export interface ForkPointResponse {
	request: ForkPointRequest;
	outcome: ForkPointOutcome;
}

export function forkPointKey(request: ForkPointRequest): string {
	return `${request.merge}:${request.firstParent}`;
}

export interface HistoryEntry {
	readonly commit: CommitRecord;
	readonly level: number;
	readonly fold: FoldState;
	readonly hasChildren: boolean;
	readonly role: EntryRole;
	/** Set once the fork-point resolution for this merge has an outcome. */
	readonly forkPoint: ForkPointOutcome | undefined;
	/** This commit is where a merge on the same line branched off. */
	readonly isForkPoint: boolean;
	/** An unfold was asked for before the fork point was known. */
	readonly pendingUnfold: boolean;
	readonly subject: SubjectTag | undefined;
}

export type UnfoldResult = "unfolded" | "pending";

export interface ForkPointResolvedEvent {
	request: ForkPointRequest;
	outcome: ForkPointOutcome;
	/** Positions of the merge entries the outcome was applied to, after any pending unfold ran. */
	indices: number[];
}
