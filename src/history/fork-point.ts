import { EventEmitter } from "node:events";
import { setImmediate as yieldToEventLoop } from "node:timers/promises";
import { MissingCommitError, NotAMergeError } from "../errors.js";
import { type CommitId, type CommitRecord, type Repository, shortId } from "../graph/types.js";
import { logDebug, logWarn } from "../utils/log.js";
import {
	type ForkPointOutcome,
	type ForkPointRequest,
	type ForkPointResponse,
	forkPointKey,
} from "./types.js";

const DEFAULT_WORKERS = 4;
const RESOLVED = "resolved";
const SEARCH_CHUNK = 512;

const MAINLINE = 1;
const BRANCH = 2;

export type ForkPointSearch = (request: ForkPointRequest) => ForkPointOutcome | Promise<ForkPointOutcome>;

export interface ForkPointResolverOptions {
	/** Computations allowed to run at the same time. */
	workers?: number;
	/** Replaces the in-memory graph search, e.g. with one backed by git. */
	search?: ForkPointSearch;
	/** Called each time a computation actually starts. */
	onCompute?: (request: ForkPointRequest) => void;
}

export function forkPointRequest(merge: CommitRecord): ForkPointRequest {
	const firstParent = merge.parents[0];
	if (merge.parents.length < 2 || firstParent === undefined) {
		throw new NotAMergeError(merge.id);
	}
	return { merge: merge.id, firstParent };
}

/**
 * Where the branch merged by `request.merge` left the history of
 * `request.firstParent`. Both ancestries grow one generation at a time and
 * the first commit reached from both sides is the fork point; among commits
 * met in the same generation the one the second parent reached first wins.
 * Unrelated histories are walked down to their roots before `none` is
 * reported.
 */
export function findForkPoint(repo: Repository, request: ForkPointRequest): ForkPointOutcome {
	const walk = new ForkPointWalk(repo, request);
	for (;;) {
		const outcome = walk.advance();
		if (outcome) {
			return outcome;
		}
	}
}

/** Same search as {@link findForkPoint}, yielding to the event loop every `chunk` commits. */
export async function searchForkPoint(
	repo: Repository,
	request: ForkPointRequest,
	chunk: number = SEARCH_CHUNK,
): Promise<ForkPointOutcome> {
	const walk = new ForkPointWalk(repo, request);
	let budget = chunk;
	for (;;) {
		const before = walk.visited;
		const outcome = walk.advance();
		if (outcome) {
			return outcome;
		}
		budget -= walk.visited - before;
		if (budget <= 0) {
			await yieldToEventLoop();
			budget = chunk;
		}
	}
}

class ForkPointWalk {
	private readonly paint = new Map<CommitId, number>();
	/** Position of each commit in the second parent's breadth-first order. */
	private readonly order = new Map<CommitId, number>();
	private mainline: CommitId[];
	private branch: CommitId[];
	private readonly repo: Repository;
	private outcome: ForkPointOutcome | undefined;
	/** Commits expanded so far, on both sides. */
	visited = 0;

	constructor(repo: Repository, request: ForkPointRequest) {
		this.repo = repo;
		const merge = repo.commit(request.merge);
		if (!merge) {
			throw new MissingCommitError(request.merge);
		}
		const secondParent = merge.parents[1];
		if (secondParent === undefined) {
			throw new NotAMergeError(request.merge);
		}
		if (!repo.commit(request.firstParent)) {
			throw new MissingCommitError(request.firstParent);
		}

		this.mainline = [request.firstParent];
		this.branch = [];
		this.paint.set(request.firstParent, MAINLINE);
		if (secondParent === request.firstParent) {
			this.outcome = { kind: "found", id: secondParent };
		} else if (repo.commit(secondParent)) {
			this.branch.push(secondParent);
			this.paint.set(secondParent, BRANCH);
			this.order.set(secondParent, 0);
		} else {
			this.outcome = { kind: "none" };
		}
	}

	/** Grows both sides by one generation. Returns the outcome once it is known. */
	advance(): ForkPointOutcome | undefined {
		if (this.outcome) {
			return this.outcome;
		}

		const met: CommitId[] = [];
		this.mainline = this.grow(this.mainline, MAINLINE, met);
		this.branch = this.grow(this.branch, BRANCH, met);

		let best: CommitId | undefined;
		for (const id of met) {
			if (best === undefined || (this.order.get(id) ?? 0) < (this.order.get(best) ?? 0)) {
				best = id;
			}
		}
		if (best !== undefined) {
			this.outcome = { kind: "found", id: best };
		} else if (this.branch.length === 0 && this.mainline.length === 0) {
			this.outcome = { kind: "none" };
		}
		return this.outcome;
	}

	private grow(frontier: readonly CommitId[], side: number, met: CommitId[]): CommitId[] {
		const next: CommitId[] = [];
		for (const id of frontier) {
			const commit = this.repo.commit(id);
			if (!commit) continue;
			this.visited++;

			for (const parent of commit.parents) {
				const before = this.paint.get(parent) ?? 0;
				if ((before & side) !== 0 || !this.repo.commit(parent)) continue;
				this.paint.set(parent, before | side);
				if (side === BRANCH) {
					this.order.set(parent, this.order.size);
				}
				if (before !== 0) {
					met.push(parent);
				}
				next.push(parent);
			}
		}
		return next;
	}
}

interface QueuedTask {
	run: () => void;
	cancel: (reason: Error) => void;
}

/**
 * Computes fork points off the caller's path. Outcomes are memoized per
 * request for the resolver's lifetime, concurrent identical requests share one
 * computation, and every delivered outcome is also published as a `resolved`
 * event.
 */
export class ForkPointResolver {
	private readonly emitter = new EventEmitter();
	private readonly memo = new Map<string, ForkPointOutcome>();
	private readonly inFlight = new Map<string, Promise<ForkPointOutcome>>();
	private readonly outstanding = new Set<Promise<unknown>>();
	private readonly queue: QueuedTask[] = [];
	private readonly workers: number;
	private readonly search: ForkPointSearch;
	private readonly onCompute: ((request: ForkPointRequest) => void) | undefined;
	private running = 0;
	private computed = 0;
	private disposed = false;

	constructor(repo: Repository, options: ForkPointResolverOptions = {}) {
		const workers = options.workers ?? DEFAULT_WORKERS;
		if (!Number.isInteger(workers) || workers < 1) {
			throw new RangeError(`workers must be a positive integer, got ${workers}`);
		}
		this.workers = workers;
		this.search = options.search ?? ((request) => searchForkPoint(repo, request));
		this.onCompute = options.onCompute;
	}

	/** Number of computations started so far. */
	get computations(): number {
		return this.computed;
	}

	peek(request: ForkPointRequest): ForkPointOutcome | undefined {
		return this.memo.get(forkPointKey(request));
	}

	request(request: ForkPointRequest): Promise<ForkPointOutcome> {
		const key = forkPointKey(request);

		const known = this.memo.get(key);
		if (known) {
			return this.track(
				Promise.resolve(known).then((outcome) => {
					this.publish({ request, outcome });
					return outcome;
				}),
			);
		}

		const pending = this.inFlight.get(key);
		if (pending) {
			return pending;
		}

		const promise = this.track(
			this.schedule(() => this.compute(request)).then(
				(outcome) => {
					this.inFlight.delete(key);
					if (!this.memo.has(key)) {
						this.memo.set(key, outcome);
					}
					const stored = this.memo.get(key) ?? outcome;
					this.publish({ request, outcome: stored });
					return stored;
				},
				(err: unknown) => {
					this.inFlight.delete(key);
					const message = err instanceof Error ? err.message : String(err);
					logWarn(`fork point of ${shortId(request.merge)} failed: ${message}`);
					throw err;
				},
			),
		);
		this.inFlight.set(key, promise);
		return promise;
	}

	on(event: "resolved", listener: (response: ForkPointResponse) => void): () => void {
		this.emitter.on(event, listener);
		return () => {
			this.emitter.off(event, listener);
		};
	}

	/** Settles once nothing is queued, computing or waiting to be delivered. */
	async idle(): Promise<void> {
		while (this.outstanding.size > 0) {
			await Promise.allSettled([...this.outstanding]);
		}
	}

	dispose(): void {
		this.disposed = true;
		const cancelled = this.queue.splice(0);
		for (const task of cancelled) {
			task.cancel(new Error("fork point resolver disposed"));
		}
		this.emitter.removeAllListeners();
	}

	private publish(response: ForkPointResponse): void {
		const outcome = response.outcome.kind === "found" ? shortId(response.outcome.id) : "none";
		logDebug(`fork point ${shortId(response.request.merge)} => ${outcome}`);
		this.emitter.emit(RESOLVED, response);
	}

	private track<T>(promise: Promise<T>): Promise<T> {
		const settled = promise.then(
			() => undefined,
			() => undefined,
		);
		this.outstanding.add(settled);
		void settled.then(() => {
			this.outstanding.delete(settled);
		});
		return promise;
	}

	private async compute(request: ForkPointRequest): Promise<ForkPointOutcome> {
		await yieldToEventLoop();
		if (this.disposed) {
			throw new Error("fork point resolver disposed");
		}
		this.computed++;
		this.onCompute?.(request);
		return this.search(request);
	}

	private schedule<T>(task: () => Promise<T>): Promise<T> {
		return new Promise<T>((resolve, reject) => {
			const run = async (): Promise<void> => {
				this.running++;
				try {
					resolve(await task());
				} catch (err) {
					reject(err);
				} finally {
					this.running--;
					this.drain();
				}
			};

			if (this.running < this.workers) {
				void run();
			} else {
				this.queue.push({ run: () => void run(), cancel: reject });
			}
		});
	}

	private drain(): void {
		while (this.running < this.workers) {
			const next = this.queue.shift();
			if (!next) {
				return;
			}
			next.run();
		}
	}
}
