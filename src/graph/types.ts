/** Full object id of a commit. Only equality is meaningful. */
export type CommitId = string;

export interface Signature {
	name: string;
	email: string;
	/** Seconds since the epoch. */
	timestamp: number;
}

export interface CommitRecord {
	readonly id: CommitId;
	/** First parent first. Empty for a root commit, two or more for a merge. */
	readonly parents: readonly CommitId[];
	readonly author: Readonly<Signature>;
	readonly committer: Readonly<Signature>;
	readonly subject: string;
	readonly body: string;
	/** Branch, tag and remote-tracking names pointing at this commit. */
	readonly references: readonly string[];
	readonly isHead: boolean;
}

/**
 * Read-only view of a repository. Every method is side-effect free and may be
 * cached by callers.
 */
export interface Repository {
	/** Throws `UnknownRevisionError` when `revision` names nothing. */
	resolve(revision: string): CommitId;
	commit(id: CommitId): CommitRecord | undefined;
	/** Throws `MissingCommitError` for unknown ids. */
	parents(id: CommitId): readonly CommitId[];
	/** Reflexive: every commit is its own ancestor. */
	isAncestor(ancestor: CommitId, descendant: CommitId): boolean;
}

export function isMerge(commit: CommitRecord): boolean {
	return commit.parents.length > 1;
}

export function isRoot(commit: CommitRecord): boolean {
	return commit.parents.length === 0;
}

export function shortId(id: CommitId): string {
	return id.slice(0, 8);
}
