import { resolve } from "node:path";

export interface FoldlogConfig {
	repoPath: string;
	/** Revision or `A..B` range shown at the top level. */
	revision: string;
	pageSize: number;
	workers: number;
	/** Merge levels unfolded on start. */
	unfoldDepth: number;
	maxCount?: number;
	authorNameWidth: number;
	dateWidth: number;
	/** Remotes whose branches are grouped; read from `git remote` when unset. */
	remotes?: string[];
	debug: boolean;
}

export function defaultConfig(overrides: Partial<FoldlogConfig> = {}): FoldlogConfig {
	return {
		repoPath: resolve(overrides.repoPath ?? process.cwd()),
		revision: overrides.revision ?? "HEAD",
		pageSize: overrides.pageSize ?? 50,
		workers: overrides.workers ?? 4,
		unfoldDepth: overrides.unfoldDepth ?? 0,
		maxCount: overrides.maxCount,
		authorNameWidth: overrides.authorNameWidth ?? 10,
		dateWidth: overrides.dateWidth ?? 0,
		remotes: overrides.remotes,
		debug: overrides.debug ?? false,
	};
}
