import { firstParentChain } from "./walker.js";
import type { CommitId, Repository } from "./types.js";

const SIDE_A = 1;
const SIDE_B = 2;
const BOTH_SIDES = SIDE_A | SIDE_B;
const STALE = 4;

export interface MergeBaseCandidate {
	id: CommitId;
	/** Generations between the first input and the candidate. */
	distanceA: number;
	distanceB: number;
	/** The candidate lies on the first-parent chain of both inputs. */
	onFirstParentChains: boolean;
}

/** Picks one of several equally good common ancestors. Must not depend on argument order. */
export type TieBreak = (candidates: readonly MergeBaseCandidate[]) => CommitId;

export interface MergeBaseOptions {
	tieBreak?: TieBreak;
}

export const defaultTieBreak: TieBreak = (candidates) => {
	const ranked = [...candidates].sort(compareCandidates);
	const best = ranked[0];
	if (!best) {
		throw new Error("defaultTieBreak called without candidates");
	}
	return best.id;
};

/**
 * Nearest common ancestor of `a` and `b`, or `undefined` when the histories
 * are disjoint.
 */
export function mergeBase(
	repo: Repository,
	a: CommitId,
	b: CommitId,
	options: MergeBaseOptions = {},
): CommitId | undefined {
	const candidates = mergeBaseCandidates(repo, a, b);
	if (candidates.length <= 1) {
		return candidates[0]?.id;
	}
	return (options.tieBreak ?? defaultTieBreak)(candidates);
}

/**
 * Every best common ancestor of `a` and `b`: common ancestors that are not
 * ancestors of another common ancestor.
 *
 * Both histories are painted in lockstep generations. A commit painted from
 * both sides is a candidate and passes a stale mark on to its ancestors, which
 * disqualifies them. Painting runs until no commit changes colour.
 */
export function mergeBaseCandidates(repo: Repository, a: CommitId, b: CommitId): MergeBaseCandidate[] {
	if (!repo.commit(a) || !repo.commit(b)) {
		return [];
	}
	if (a === b) {
		return [{ id: a, distanceA: 0, distanceB: 0, onFirstParentChains: true }];
	}

	const paint = new Map<CommitId, number>([
		[a, SIDE_A],
		[b, SIDE_B],
	]);
	const found = new Set<CommitId>();
	let frontier: CommitId[] = [a, b];

	while (frontier.length > 0) {
		const next: CommitId[] = [];
		for (const id of frontier) {
			const colour = paint.get(id) ?? 0;
			let carried = colour;
			if ((colour & BOTH_SIDES) === BOTH_SIDES && (colour & STALE) === 0) {
				found.add(id);
				carried |= STALE;
			}

			const commit = repo.commit(id);
			if (!commit) continue;
			for (const parent of commit.parents) {
				if (!repo.commit(parent)) continue;
				const before = paint.get(parent) ?? 0;
				const after = before | carried;
				if (after !== before) {
					paint.set(parent, after);
					next.push(parent);
				}
			}
		}
		frontier = next;
	}

	const best = [...found].filter((id) => ((paint.get(id) ?? 0) & STALE) === 0);
	if (best.length <= 1) {
		return best.map((id) => ({ id, distanceA: 0, distanceB: 0, onFirstParentChains: false }));
	}

	const distancesA = generationDistances(repo, a);
	const distancesB = generationDistances(repo, b);
	const chainA = new Set([...firstParentChain(repo, a)].map((c) => c.id));
	const chainB = new Set([...firstParentChain(repo, b)].map((c) => c.id));

	return best.map((id) => ({
		id,
		distanceA: distancesA.get(id) ?? Number.POSITIVE_INFINITY,
		distanceB: distancesB.get(id) ?? Number.POSITIVE_INFINITY,
		onFirstParentChains: chainA.has(id) && chainB.has(id),
	}));
}

function generationDistances(repo: Repository, start: CommitId): Map<CommitId, number> {
	const distances = new Map<CommitId, number>([[start, 0]]);
	const queue: CommitId[] = [start];

	for (let i = 0; i < queue.length; i++) {
		const id = queue[i];
		if (id === undefined) continue;
		const distance = distances.get(id) ?? 0;
		for (const parent of repo.commit(id)?.parents ?? []) {
			if (!distances.has(parent)) {
				distances.set(parent, distance + 1);
				queue.push(parent);
			}
		}
	}

	return distances;
}

function compareCandidates(x: MergeBaseCandidate, y: MergeBaseCandidate): number {
	if (x.onFirstParentChains !== y.onFirstParentChains) {
		return x.onFirstParentChains ? -1 : 1;
	}
	const sum = x.distanceA + x.distanceB - (y.distanceA + y.distanceB);
	if (sum !== 0) {
		return sum;
	}
	const max = Math.max(x.distanceA, x.distanceB) - Math.max(y.distanceA, y.distanceB);
	if (max !== 0) {
		return max;
	}
	return x.id < y.id ? -1 : x.id > y.id ? 1 : 0;
}
