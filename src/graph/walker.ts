import { MissingCommitError, NotAMergeError } from "../errors.js";
import { collectAncestors } from "./ancestors.js";
import type { CommitId, CommitRecord, Repository } from "./types.js";

export interface WalkOptions {
	/** Follow only first parents from `start`, like `rev-list --first-parent`. */
	firstParent?: boolean;
}

export interface MergeBranch {
	/** Second parent first, then its first-parent ancestors. */
	commits: CommitRecord[];
	/** The commit the walk stopped at, already part of the first parent's history. */
	stop: CommitRecord | undefined;
}

export function* firstParentChain(repo: Repository, start: CommitId): Generator<CommitRecord, void, undefined> {
	let current = repo.commit(start);
	while (current) {
		yield current;
		const next = current.parents[0];
		if (next === undefined) {
			return;
		}
		current = repo.commit(next);
	}
}

/**
 * Commits reachable from `start` but not from `end` (`end..start`), children
 * before parents. Without `end` this is the whole ancestry of `start`. An
 * `end` missing from the repository throws `MissingCommitError`.
 *
 * Parents become eligible once every child inside the range has been emitted;
 * the most recently eligible one goes next, so a side branch is emitted in one
 * run before the walk returns to the first-parent line.
 */
export function* walkRange(
	repo: Repository,
	start: CommitId,
	end?: CommitId,
	options: WalkOptions = {},
): Generator<CommitRecord, void, undefined> {
	if (!repo.commit(start)) {
		return;
	}
	if (end !== undefined && !repo.commit(end)) {
		throw new MissingCommitError(end);
	}
	const excluded = end === undefined ? new Set<CommitId>() : collectAncestors(repo, end);
	if (excluded.has(start)) {
		return;
	}

	if (options.firstParent) {
		for (const commit of firstParentChain(repo, start)) {
			if (excluded.has(commit.id)) {
				return;
			}
			yield commit;
		}
		return;
	}

	const members = collectRange(repo, start, excluded);
	const pendingChildren = new Map<CommitId, number>();
	for (const id of members) {
		for (const parent of repo.parents(id)) {
			if (members.has(parent)) {
				pendingChildren.set(parent, (pendingChildren.get(parent) ?? 0) + 1);
			}
		}
	}

	const ready: CommitId[] = [start];
	for (let id = ready.pop(); id !== undefined; id = ready.pop()) {
		const commit = repo.commit(id);
		if (!commit) continue;
		yield commit;

		for (const parent of commit.parents) {
			const remaining = pendingChildren.get(parent);
			if (remaining === undefined) continue;
			if (remaining <= 1) {
				pendingChildren.delete(parent);
				ready.push(parent);
			} else {
				pendingChildren.set(parent, remaining - 1);
			}
		}
	}
}

export function countRange(repo: Repository, start: CommitId, end?: CommitId, options: WalkOptions = {}): number {
	let count = 0;
	for (const _ of walkRange(repo, start, end, options)) {
		count++;
	}
	return count;
}

/**
 * The part of history a merge brought in: its second parent and that commit's
 * first-parent ancestors, up to (not including) the first commit that is the
 * resolved fork point or already belongs to the merge's first parent. Commits
 * in `excluded` end the branch without a stop commit.
 */
export function walkMergeBranch(
	repo: Repository,
	mergeId: CommitId,
	forkPoint?: CommitId,
	excluded?: ReadonlySet<CommitId>,
): MergeBranch {
	const merge = repo.commit(mergeId);
	if (!merge) {
		throw new MissingCommitError(mergeId);
	}
	const [firstParent, secondParent] = merge.parents;
	if (firstParent === undefined || secondParent === undefined) {
		throw new NotAMergeError(mergeId);
	}

	const mainline = collectAncestors(repo, firstParent);
	const commits: CommitRecord[] = [];
	let current = repo.commit(secondParent);

	while (current) {
		if (current.id === forkPoint || mainline.has(current.id)) {
			return { commits, stop: current };
		}
		if (excluded?.has(current.id)) {
			break;
		}
		commits.push(current);
		const next = current.parents[0];
		if (next === undefined) {
			break;
		}
		current = repo.commit(next);
	}

	return { commits, stop: undefined };
}

function collectRange(repo: Repository, start: CommitId, excluded: Set<CommitId>): Set<CommitId> {
	const members = new Set<CommitId>();
	const queue: CommitId[] = [start];

	for (let i = 0; i < queue.length; i++) {
		const id = queue[i];
		if (id === undefined || members.has(id) || excluded.has(id)) continue;
		const commit = repo.commit(id);
		if (!commit) continue;
		members.add(id);
		queue.push(...commit.parents);
	}

	return members;
}
