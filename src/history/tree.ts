import { EventEmitter } from "node:events";
import { NotFoldableError } from "../errors.js";
import { type CommitId, type CommitRecord, type Repository, isMerge, isRoot, shortId } from "../graph/types.js";
import { collectAncestors } from "../graph/ancestors.js";
import { firstParentChain, walkMergeBranch, walkRange } from "../graph/walker.js";
import { type SubjectClassifier, type SubjectTag, defaultSubjectClassifier, isSubtreeMerge } from "../subject/classifier.js";
import { logDebug } from "../utils/log.js";
import { classifyEntry } from "./classify.js";
import { type ForkPointResolver, forkPointRequest } from "./fork-point.js";
import type {
	EntryRole,
	FoldState,
	ForkPointOutcome,
	ForkPointResolvedEvent,
	ForkPointResponse,
	HistoryEntry,
	UnfoldResult,
} from "./types.js";
import { forkPointKey } from "./types.js";

const DEFAULT_PAGE_SIZE = 50;
const RESOLVED = "forkPointResolved";
const NO_FORK_POINT: ForkPointOutcome = { kind: "none" };

export interface HistoryTreeOptions {
	repo: Repository;
	resolver: ForkPointResolver;
	/** Newest commit of the top-level range. */
	start: CommitId;
	/** Exclusive lower bound: commits reachable from it are not listed. */
	end?: CommitId;
	classifier?: SubjectClassifier;
	/** Top-level commits loaded at once when an entry past the window is read. */
	pageSize?: number;
}

interface EntryState {
	commit: CommitRecord;
	level: number;
	fold: FoldState;
	hasChildren: boolean;
	role: EntryRole;
	forkPoint: ForkPointOutcome | undefined;
	isForkPoint: boolean;
	pendingUnfold: boolean;
	subject: SubjectTag | undefined;
	lastOfRange: boolean;
	link: boolean;
}

interface Placement {
	lastOfRange: boolean;
	link: boolean;
	forkPoint: boolean;
}

const PLAIN: Placement = { lastOfRange: false, link: false, forkPoint: false };

/**
 * The foldable history view: a flat, ordered list of entries where an unfolded
 * merge is followed by the commits its branch brought in, one level deeper.
 *
 * The top level is the first-parent history of the range, loaded in pages.
 * Merges ask the resolver for their fork point as soon as they appear and stay
 * `unknown` until the answer is applied here; only this class mutates entries.
 */
export class HistoryTree {
	private readonly repo: Repository;
	private readonly resolver: ForkPointResolver;
	private readonly classifier: SubjectClassifier;
	private readonly pageSize: number;
	private readonly source: Iterator<CommitRecord, void, undefined>;
	private readonly rows: EntryState[] = [];
	private readonly emitter = new EventEmitter();
	private readonly mainlineForkPoints = new Set<CommitId>();
	private readonly stopListening: () => void;
	private readonly end: CommitId | undefined;
	private excluded: ReadonlySet<CommitId> | undefined;
	private lookahead: CommitRecord | undefined;
	private exhausted = false;

	constructor(options: HistoryTreeOptions) {
		const pageSize = options.pageSize ?? DEFAULT_PAGE_SIZE;
		if (!Number.isInteger(pageSize) || pageSize < 1) {
			throw new RangeError(`pageSize must be a positive integer, got ${pageSize}`);
		}
		this.repo = options.repo;
		this.resolver = options.resolver;
		this.classifier = options.classifier ?? defaultSubjectClassifier;
		this.pageSize = pageSize;
		this.end = options.end;
		this.source = walkRange(options.repo, options.start, options.end, { firstParent: true });
		this.stopListening = this.resolver.on("resolved", (response) => this.apply(response));
	}

	/** Entries currently materialized. */
	get length(): number {
		return this.rows.length;
	}

	/** Every top-level commit of the range has been loaded. */
	get isComplete(): boolean {
		return this.peekSource() === undefined;
	}

	entry(index: number): HistoryEntry {
		return snapshot(this.row(index));
	}

	entries(): HistoryEntry[] {
		return this.rows.map(snapshot);
	}

	parentIndex(index: number): number | undefined {
		const level = this.row(index).level;
		for (let i = index - 1; i >= 0; i--) {
			const row = this.rows[i];
			if (row && row.level < level) {
				return i;
			}
		}
		return undefined;
	}

	/** Number of entries, at any depth, below `index` before the next sibling. */
	childCount(index: number): number {
		const level = this.row(index).level;
		let count = 0;
		for (let i = index + 1; i < this.rows.length; i++) {
			const row = this.rows[i];
			if (!row || row.level <= level) break;
			count++;
		}
		return count;
	}

	/** Appends up to `count` top-level commits and returns how many were added. */
	loadMore(count: number = this.pageSize): number {
		const added: EntryState[] = [];
		while (added.length < count) {
			const commit = this.nextFromSource();
			if (!commit) break;
			const row = this.materialize(commit, 0, {
				lastOfRange: !isRoot(commit) && this.peekSource() === undefined,
				link: false,
				forkPoint: this.mainlineForkPoints.has(commit.id),
			});
			this.rows.push(row);
			added.push(row);
		}
		this.settleRun(added);
		return added.length;
	}

	unfold(index: number): UnfoldResult {
		const row = this.row(index);
		if (!row.hasChildren) {
			throw new NotFoldableError(index, row.commit.id);
		}
		if (row.fold === "unfolded") {
			return "unfolded";
		}
		if (row.forkPoint === undefined) {
			if (!row.pendingUnfold) {
				row.pendingUnfold = true;
				this.requestForkPoint(row);
			}
			return "pending";
		}
		this.expand(index, row);
		return "unfolded";
	}

	fold(index: number): void {
		const row = this.row(index);
		if (!row.hasChildren) {
			throw new NotFoldableError(index, row.commit.id);
		}
		if (row.fold === "unknown") {
			row.pendingUnfold = false;
			return;
		}
		if (row.fold === "folded") {
			return;
		}
		const removed = this.rows.splice(index + 1, this.childCount(index));
		row.fold = "folded";
		logDebug(`Folding entry #${index} (${shortId(row.commit.id)}), removed ${removed.length} entries`);
	}

	/** Folds an unfolded (or pending) entry, unfolds anything else. */
	toggle(index: number): UnfoldResult | "folded" {
		const row = this.row(index);
		if (row.fold === "unfolded" || row.pendingUnfold) {
			this.fold(index);
			return "folded";
		}
		return this.unfold(index);
	}

	/** Unfolds `index`, waiting for its fork point first when it is not known yet. */
	async unfoldResolved(index: number): Promise<void> {
		const row = this.row(index);
		if (!row.hasChildren) {
			throw new NotFoldableError(index, row.commit.id);
		}
		if (row.forkPoint === undefined) {
			await this.resolver.request(forkPointRequest(row.commit));
		}

		const position = this.rows.indexOf(row);
		if (position < 0 || row.forkPoint === undefined || !row.hasChildren || row.fold === "unfolded") {
			return;
		}
		this.expand(position, row);
	}

	onForkPointResolved(listener: (event: ForkPointResolvedEvent) => void): () => void {
		this.emitter.on(RESOLVED, listener);
		return () => {
			this.emitter.off(RESOLVED, listener);
		};
	}

	/** One line per run of equal-level entries, for debug output. */
	describe(): string {
		const lines: string[] = [];
		let start = 0;
		for (let i = 1; i <= this.rows.length; i++) {
			const first = this.rows[start];
			const current = this.rows[i];
			if (first && current && current.level === first.level) continue;
			const last = this.rows[i - 1];
			if (first && last) {
				const indent = "  ".repeat(first.level);
				lines.push(
					`#${start}…${i - 1}  ${indent}${shortId(last.commit.id)}..${shortId(first.commit.id)} (${first.level})`,
				);
			}
			start = i;
		}
		return lines.join("\n");
	}

	dispose(): void {
		this.stopListening();
		this.emitter.removeAllListeners();
	}

	private row(index: number): EntryState {
		if (!Number.isInteger(index) || index < 0) {
			throw new RangeError(`Invalid entry index ${index}`);
		}
		if (index >= this.rows.length) {
			this.loadMore(index + 1 - this.rows.length + this.pageSize);
		}
		const row = this.rows[index];
		if (!row) {
			throw new RangeError(`Entry #${index} is past the end of history (${this.rows.length} entries)`);
		}
		return row;
	}

	private nextFromSource(): CommitRecord | undefined {
		const buffered = this.peekSource();
		this.lookahead = undefined;
		return buffered;
	}

	private peekSource(): CommitRecord | undefined {
		if (this.lookahead === undefined && !this.exhausted) {
			const next = this.source.next();
			if (next.done) {
				this.exhausted = true;
			} else {
				this.lookahead = next.value;
			}
		}
		return this.lookahead;
	}

	private materialize(commit: CommitRecord, level: number, placement: Placement): EntryState {
		const merge = isMerge(commit);
		const row: EntryState = {
			commit,
			level,
			fold: merge ? "unknown" : "folded",
			hasChildren: merge,
			role: "Commit",
			forkPoint: merge ? undefined : NO_FORK_POINT,
			isForkPoint: placement.forkPoint,
			pendingUnfold: false,
			subject: this.classifySubject(commit),
			lastOfRange: placement.lastOfRange,
			link: placement.link,
		};
		row.role = this.roleOf(row);

		if (merge) {
			const known = this.resolver.peek(forkPointRequest(commit));
			if (known) {
				this.settle(row, known);
			}
		}
		return row;
	}

	private classifySubject(commit: CommitRecord): SubjectTag | undefined {
		try {
			return this.classifier.classify(commit.subject);
		} catch (err) {
			const message = err instanceof Error ? err.message : String(err);
			logDebug(`Subject classifier failed on ${shortId(commit.id)}: ${message}`);
			return undefined;
		}
	}

	private roleOf(row: EntryState): EntryRole {
		return classifyEntry(row.commit, {
			subject: row.subject,
			isLastOfRange: row.lastOfRange,
			isForkPoint: row.isForkPoint,
			isLink: row.link,
			secondParentShared: isSubtreeMerge(row.subject) && this.secondParentShared(row),
		});
	}

	private secondParentShared(row: EntryState): boolean {
		const secondParent = row.commit.parents[1];
		if (secondParent === undefined) {
			return false;
		}
		return this.rows.some(
			(other) => other.commit.id !== row.commit.id && other.commit.parents.includes(secondParent),
		);
	}

	/** Records an outcome on an unresolved merge. Returns false when it already had one. */
	private settle(row: EntryState, outcome: ForkPointOutcome): boolean {
		if (row.forkPoint !== undefined) {
			return false;
		}
		row.forkPoint = outcome;
		row.fold = "folded";
		const secondParent = row.commit.parents[1];
		if (secondParent !== undefined && this.outsideRange().has(secondParent)) {
			row.hasChildren = false;
		} else if (outcome.kind === "found") {
			if (outcome.id === row.commit.parents[1]) {
				row.hasChildren = false;
			}
		} else if (!isSubtreeMerge(row.subject)) {
			row.hasChildren = false;
		}
		return true;
	}

	private settleRun(run: readonly EntryState[]): void {
		for (const row of run) {
			if (!isMerge(row.commit)) continue;
			if (row.forkPoint === undefined) {
				this.requestForkPoint(row);
			} else {
				this.markForkPoint(this.rows.indexOf(row));
			}
		}
	}

	private requestForkPoint(row: EntryState): void {
		const request = forkPointRequest(row.commit);
		const key = forkPointKey(request);
		void this.resolver.request(request).catch((err: unknown) => {
			const message = err instanceof Error ? err.message : String(err);
			logDebug(`Dropping pending unfolds of ${shortId(request.merge)}: ${message}`);
			for (const other of this.rows) {
				if (other.pendingUnfold && forkPointKey(forkPointRequest(other.commit)) === key) {
					other.pendingUnfold = false;
				}
			}
		});
	}

	/** Flags the fork point of the merge at `index` where it appears further down the same line. */
	private markForkPoint(index: number): void {
		const merge = this.rows[index];
		const outcome = merge?.forkPoint;
		if (!merge || outcome?.kind !== "found") {
			return;
		}
		if (merge.level === 0) {
			this.mainlineForkPoints.add(outcome.id);
		}

		for (let i = index + 1; i < this.rows.length; i++) {
			const row = this.rows[i];
			if (!row || row.level < merge.level) return;
			if (row.level === merge.level && row.commit.id === outcome.id) {
				if (!row.isForkPoint) {
					row.isForkPoint = true;
					row.role = this.roleOf(row);
				}
				return;
			}
		}
	}

	private expand(index: number, row: EntryState): void {
		const forkPoint = row.forkPoint?.kind === "found" ? row.forkPoint.id : undefined;
		const branch = walkMergeBranch(this.repo, row.commit.id, forkPoint, this.outsideRange());
		const level = row.level + 1;

		const run = branch.commits.map((commit) => this.materialize(commit, level, PLAIN));
		const stop = branch.stop;
		if (stop && !this.onFirstParentLine(row.commit, stop.id)) {
			const link = this.rows.some((other) => other.commit.id === stop.id);
			run.push(this.materialize(stop, level, { lastOfRange: false, link, forkPoint: stop.id === forkPoint }));
		}

		this.rows.splice(index + 1, 0, ...run);
		row.fold = "unfolded";
		row.pendingUnfold = false;
		logDebug(`Unfolding entry #${index} (${shortId(row.commit.id)}) with ${run.length} children`);
		this.settleRun(run);
	}

	/** Commits reachable from the range end; unfolded branches stop before them. */
	private outsideRange(): ReadonlySet<CommitId> {
		if (this.excluded === undefined) {
			this.excluded = this.end === undefined ? new Set<CommitId>() : collectAncestors(this.repo, this.end);
		}
		return this.excluded;
	}

	private onFirstParentLine(merge: CommitRecord, id: CommitId): boolean {
		const firstParent = merge.parents[0];
		if (firstParent === undefined) {
			return false;
		}
		for (const commit of firstParentChain(this.repo, firstParent)) {
			if (commit.id === id) {
				return true;
			}
		}
		return false;
	}

	private apply(response: ForkPointResponse): void {
		const key = forkPointKey(response.request);
		const settled: EntryState[] = [];
		for (const row of this.rows) {
			if (row.forkPoint !== undefined || !isMerge(row.commit)) continue;
			if (forkPointKey(forkPointRequest(row.commit)) !== key) continue;
			if (this.settle(row, response.outcome)) {
				settled.push(row);
			}
		}
		if (settled.length === 0) {
			return;
		}

		for (const row of settled) {
			this.markForkPoint(this.rows.indexOf(row));
		}
		for (const row of settled) {
			if (!row.pendingUnfold) continue;
			row.pendingUnfold = false;
			if (row.hasChildren) {
				this.expand(this.rows.indexOf(row), row);
			}
		}

		const event: ForkPointResolvedEvent = {
			request: response.request,
			outcome: response.outcome,
			indices: settled.map((row) => this.rows.indexOf(row)),
		};
		this.emitter.emit(RESOLVED, event);
	}
}

function snapshot(row: EntryState): HistoryEntry {
	return {
		commit: row.commit,
		level: row.level,
		fold: row.fold,
		hasChildren: row.hasChildren,
		role: row.role,
		forkPoint: row.forkPoint,
		isForkPoint: row.isForkPoint,
		pendingUnfold: row.pendingUnfold,
		subject: row.subject,
	};
}
