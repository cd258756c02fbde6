import { MissingCommitError, UnknownRevisionError } from "../errors.js";
import { isAncestorOf } from "./ancestors.js";
import type { CommitId, CommitRecord, Repository } from "./types.js";

const MIN_ABBREV = 4;
const SUFFIX_PATTERN = /[~^]\d*/g;
const REVISION_PATTERN = /^([^~^]+)((?:[~^]\d*)*)$/;

/**
 * A repository snapshot held in memory: every commit record keyed by id plus
 * the names pointing at them.
 */
export class CommitGraph implements Repository {
	private readonly records = new Map<CommitId, CommitRecord>();
	private readonly names = new Map<string, CommitId>();
	private readonly head: CommitId | undefined;

	constructor(commits: Iterable<CommitRecord>, head?: CommitId) {
		let headFromRecords: CommitId | undefined;
		for (const commit of commits) {
			this.records.set(commit.id, commit);
			if (commit.isHead) {
				headFromRecords = commit.id;
			}
			for (const ref of commit.references) {
				this.names.set(ref, commit.id);
			}
		}
		this.head = head ?? headFromRecords;
	}

	get size(): number {
		return this.records.size;
	}

	has(id: CommitId): boolean {
		return this.records.has(id);
	}

	all(): IterableIterator<CommitRecord> {
		return this.records.values();
	}

	commit(id: CommitId): CommitRecord | undefined {
		return this.records.get(id);
	}

	parents(id: CommitId): readonly CommitId[] {
		const commit = this.records.get(id);
		if (!commit) {
			throw new MissingCommitError(id);
		}
		return commit.parents;
	}

	isAncestor(ancestor: CommitId, descendant: CommitId): boolean {
		return isAncestorOf(this, ancestor, descendant);
	}

	resolve(revision: string): CommitId {
		const match = REVISION_PATTERN.exec(revision.trim());
		if (!match) {
			throw new UnknownRevisionError(revision);
		}
		const [, base = "", suffixes = ""] = match;

		let current = this.resolveName(base);
		if (current === undefined) {
			throw new UnknownRevisionError(revision);
		}

		for (const step of suffixes.match(SUFFIX_PATTERN) ?? []) {
			const count = step.length > 1 ? Number.parseInt(step.slice(1), 10) : 1;
			const next: CommitId | undefined = step.startsWith("~")
				? this.firstParentAncestor(current, count)
				: this.nthParent(current, count);
			if (next === undefined) {
				throw new UnknownRevisionError(revision);
			}
			current = next;
		}

		return current;
	}

	private resolveName(name: string): CommitId | undefined {
		if (name === "HEAD") {
			return this.head;
		}
		if (this.records.has(name)) {
			return name;
		}

		const named =
			this.names.get(name) ??
			this.names.get(name.replace(/^refs\/(heads|tags|remotes)\//, ""));
		if (named !== undefined) {
			return named;
		}

		if (name.length >= MIN_ABBREV && /^[0-9a-f]+$/i.test(name)) {
			const prefix = name.toLowerCase();
			let found: CommitId | undefined;
			for (const id of this.records.keys()) {
				if (id.startsWith(prefix)) {
					if (found !== undefined) {
						// ambiguous
						return undefined;
					}
					found = id;
				}
			}
			return found;
		}

		return undefined;
	}

	private firstParentAncestor(id: CommitId, count: number): CommitId | undefined {
		let current: CommitId | undefined = id;
		for (let i = 0; i < count && current !== undefined; i++) {
			current = this.records.get(current)?.parents[0];
		}
		return current;
	}

	private nthParent(id: CommitId, n: number): CommitId | undefined {
		if (n === 0) {
			return id;
		}
		return this.records.get(id)?.parents[n - 1];
	}
}
