export { defaultConfig, type FoldlogConfig } from "./config.js";
export * from "./errors.js";
export { LOG_FORMAT, loadCommitGraph, loadRangeGraph, parseDecorations, parseGitLog } from "./git/log.js";
export { listRemotes } from "./git/remote.js";
export { parseRange, resolveRevision, type RevisionRange } from "./git/rev-parse.js";
export { collectAncestors, isAncestorOf } from "./graph/ancestors.js";
export { CommitGraph } from "./graph/commit-graph.js";
export {
	defaultTieBreak,
	mergeBase,
	mergeBaseCandidates,
	type MergeBaseCandidate,
	type MergeBaseOptions,
	type TieBreak,
} from "./graph/merge-base.js";
export * from "./graph/types.js";
export { countRange, firstParentChain, walkMergeBranch, walkRange, type MergeBranch, type WalkOptions } from "./graph/walker.js";
export { classifyEntry, type ClassifyContext } from "./history/classify.js";
export {
	ForkPointResolver,
	findForkPoint,
	forkPointRequest,
	searchForkPoint,
	type ForkPointResolverOptions,
	type ForkPointSearch,
} from "./history/fork-point.js";
export {
	matchesNeedle,
	revealPath,
	searchHistory,
	type SearchOptions,
	type SearchRange,
	type SearchResult,
} from "./history/search.js";
export { HistoryTree, type HistoryTreeOptions } from "./history/tree.js";
export * from "./history/types.js";
export * from "./subject/classifier.js";
export { fit, formatDate, formatEntry, formatReferences, graphGlyphs, shortenReferences, type FormatOptions } from "./view/format.js";
