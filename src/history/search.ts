import { collectAncestors } from "../graph/ancestors.js";
import { type CommitId, type CommitRecord, type Repository, isMerge } from "../graph/types.js";
import { walkMergeBranch, walkRange } from "../graph/walker.js";
import { type SubjectClassifier, defaultSubjectClassifier, isSubtreeMerge } from "../subject/classifier.js";
import { type ForkPointResolver, forkPointRequest } from "./fork-point.js";
import type { HistoryTree } from "./tree.js";
import type { ForkPointOutcome } from "./types.js";

export interface SearchRange {
	start: CommitId;
	end?: CommitId;
}

export interface SearchOptions {
	ignoreCase?: boolean;
	classifier?: SubjectClassifier;
	signal?: AbortSignal;
}

export interface SearchResult {
	/** Position among its siblings at each level, top level first. */
	path: number[];
	commit: CommitRecord;
}

export function matchesNeedle(commit: CommitRecord, needle: string, ignoreCase = false): boolean {
	if (needle.length === 0) {
		return false;
	}
	const fold = (text: string): string => (ignoreCase ? text.toLowerCase() : text);
	const wanted = fold(needle);
	const haystack = [
		commit.id,
		commit.author.name,
		commit.author.email,
		commit.committer.name,
		commit.committer.email,
		commit.subject,
		...commit.references,
	];
	return haystack.some((field) => fold(field).includes(wanted));
}

/**
 * Depth-first search through the range and, below each merge that can be
 * unfolded, the commits its branch brought in. Results come in display order.
 */
export async function* searchHistory(
	repo: Repository,
	resolver: ForkPointResolver,
	range: SearchRange,
	needle: string,
	options: SearchOptions = {},
): AsyncGenerator<SearchResult, void, undefined> {
	const commits = [...walkRange(repo, range.start, range.end, { firstParent: true })];
	const context: SearchContext = {
		repo,
		resolver,
		needle,
		options,
		excluded: range.end === undefined ? new Set<CommitId>() : collectAncestors(repo, range.end),
	};
	yield* searchLevel(context, commits, []);
}

interface SearchContext {
	repo: Repository;
	resolver: ForkPointResolver;
	needle: string;
	options: SearchOptions;
	/** Commits reachable from the range end. */
	excluded: ReadonlySet<CommitId>;
}

async function* searchLevel(
	context: SearchContext,
	commits: readonly CommitRecord[],
	prefix: readonly number[],
): AsyncGenerator<SearchResult, void, undefined> {
	const { repo, resolver, needle, options, excluded } = context;
	const classifier = options.classifier ?? defaultSubjectClassifier;

	for (const [i, commit] of commits.entries()) {
		options.signal?.throwIfAborted();
		const path = [...prefix, i];
		if (matchesNeedle(commit, needle, options.ignoreCase)) {
			yield { path, commit };
		}
		if (!isMerge(commit)) continue;

		const outcome = await resolver.request(forkPointRequest(commit));
		if (!unfoldable(commit, outcome, classifier, excluded)) continue;
		const forkPoint = outcome.kind === "found" ? outcome.id : undefined;
		const branch = walkMergeBranch(repo, commit.id, forkPoint, excluded);
		yield* searchLevel(context, branch.commits, path);
	}
}

function unfoldable(
	commit: CommitRecord,
	outcome: ForkPointOutcome,
	classifier: SubjectClassifier,
	excluded: ReadonlySet<CommitId>,
): boolean {
	const secondParent = commit.parents[1];
	if (secondParent !== undefined && excluded.has(secondParent)) {
		return false;
	}
	if (outcome.kind === "found") {
		return outcome.id !== commit.parents[1];
	}
	return isSubtreeMerge(classifier.classify(commit.subject));
}

/** Unfolds the merges along `path` and returns the tree index of its last step. */
export async function revealPath(tree: HistoryTree, path: readonly number[]): Promise<number> {
	let index = -1;
	for (const [level, step] of path.entries()) {
		if (index >= 0) {
			await tree.unfoldResolved(index);
		}
		index = nthChild(tree, index, level, step);
	}
	if (index < 0) {
		throw new RangeError("Cannot reveal an empty path");
	}
	return index;
}

function nthChild(tree: HistoryTree, parent: number, level: number, n: number): number {
	let seen = 0;
	for (let i = parent + 1; ; i++) {
		const entry = tree.entry(i);
		if (entry.level < level) break;
		if (entry.level !== level) continue;
		if (seen === n) {
			return i;
		}
		seen++;
	}
	throw new RangeError(`No entry ${n} at level ${level} below #${parent}`);
}
