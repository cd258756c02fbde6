import type { CommitId, Repository } from "./types.js";

/** `startId` and everything reachable from it. Parents missing from the repository are skipped. */
export function collectAncestors(repo: Repository, startId: CommitId): Set<CommitId> {
	const result = new Set<CommitId>();
	const queue: CommitId[] = [startId];

	for (let i = 0; i < queue.length; i++) {
		const id = queue[i];
		if (id === undefined || result.has(id)) continue;

		const commit = repo.commit(id);
		if (!commit) continue;
		result.add(id);
		for (const parent of commit.parents) {
			if (!result.has(parent)) {
				queue.push(parent);
			}
		}
	}

	return result;
}

export function isAncestorOf(repo: Repository, ancestor: CommitId, descendant: CommitId): boolean {
	if (!repo.commit(ancestor)) {
		return false;
	}
	if (ancestor === descendant) {
		return true;
	}

	const visited = new Set<CommitId>();
	const queue: CommitId[] = [descendant];

	for (let i = 0; i < queue.length; i++) {
		const id = queue[i];
		if (id === undefined || visited.has(id)) continue;
		visited.add(id);
		if (id === ancestor) {
			return true;
		}

		const commit = repo.commit(id);
		if (!commit) continue;
		for (const parent of commit.parents) {
			if (!visited.has(parent)) {
				queue.push(parent);
			}
		}
	}

	return false;
}
