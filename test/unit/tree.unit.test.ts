import { afterEach, describe, expect, it } from "vitest";
import { NotFoldableError } from "../../src/errors.js";
import type { CommitGraph } from "../../src/graph/commit-graph.js";
import { ForkPointResolver } from "../../src/history/fork-point.js";
import { HistoryTree, type HistoryTreeOptions } from "../../src/history/tree.js";
import type { ForkPointResolvedEvent } from "../../src/history/types.js";
import { graphOf } from "../helpers/graph.js";

const scenario = (): CommitGraph => graphOf({ M: ["P1", "P2"], P1: ["F"], P2: ["F"], F: [] });

// A side branch S merged through P1, then a branch forked off S merged through M.
const rejoining = (): CommitGraph =>
	graphOf({ M: ["P1", "Q2"], P1: ["R", "S"], Q2: ["Q1"], Q1: ["S"], S: ["R"], R: [] });

describe("history/tree.ts", () => {
	const open: Array<{ tree: HistoryTree; resolver: ForkPointResolver }> = [];

	function build(repo: CommitGraph, options: Partial<HistoryTreeOptions> = {}) {
		const resolver = options.resolver ?? new ForkPointResolver(repo);
		const tree = new HistoryTree({ repo, resolver, start: "M", ...options });
		open.push({ tree, resolver });
		return { tree, resolver };
	}

	function layout(tree: HistoryTree): string[] {
		return tree.entries().map((entry) => `${entry.level}:${entry.commit.id}`);
	}

	afterEach(() => {
		for (const { tree, resolver } of open.splice(0)) {
			tree.dispose();
			resolver.dispose();
		}
	});

	describe("UNIT-070: top-level history", () => {
		it("lists a linear history with its roles", () => {
			const { tree } = build(graphOf({ C: ["B"], B: ["A"], A: [] }), { start: "C" });
			tree.loadMore();
			expect(tree.entries().map((e) => e.role)).toEqual(["Commit", "Commit", "InitialCommit"]);
			expect(tree.entries().every((e) => e.level === 0 && e.fold === "folded" && !e.hasChildren)).toBe(true);
		});

		it("ends a bounded range with its last commit", () => {
			const { tree } = build(graphOf({ C: ["B"], B: ["A"], A: [] }), { start: "C", end: "A" });
			tree.loadMore();
			expect(tree.entries().map((e) => e.role)).toEqual(["Commit", "LastCommit"]);
		});

		it("loads pages on demand", () => {
			const repo = graphOf({ E: ["D"], D: ["C"], C: ["B"], B: ["A"], A: [] });
			const { tree } = build(repo, { start: "E", pageSize: 2 });

			expect(tree.loadMore()).toBe(2);
			expect(tree.length).toBe(2);
			expect(tree.isComplete).toBe(false);

			expect(tree.entry(3).commit.id).toBe("B");
			expect(tree.length).toBe(5);
			expect(tree.isComplete).toBe(true);
		});

		it("rejects indices past the end of history", () => {
			const { tree } = build(scenario());
			expect(() => tree.entry(3)).toThrow(RangeError);
			expect(() => tree.entry(-1)).toThrow(RangeError);
		});

		it("starts merges unresolved", () => {
			const { tree } = build(scenario());
			const merge = tree.entry(0);
			expect(merge.fold).toBe("unknown");
			expect(merge.hasChildren).toBe(true);
			expect(merge.role).toBe("Merge");
			expect(merge.forkPoint).toBeUndefined();
		});
	});

	describe("UNIT-071: unfolding a merge", () => {
		it("inserts the merged branch below the merge once resolved", async () => {
			const { tree, resolver } = build(scenario());

			expect(tree.unfold(0)).toBe("pending");
			expect(tree.entry(0).pendingUnfold).toBe(true);
			await resolver.idle();

			expect(layout(tree)).toEqual(["0:M", "1:P2", "0:P1", "0:F"]);
			expect(tree.entry(1).role).toBe("Commit");
			expect(tree.entry(0)).toMatchObject({
				fold: "unfolded",
				pendingUnfold: false,
				forkPoint: { kind: "found", id: "F" },
			});
			expect(tree.entry(3).isForkPoint).toBe(true);
		});

		it("unfolds at once when the fork point is already known", async () => {
			const repo = scenario();
			const resolver = new ForkPointResolver(repo);
			await resolver.request({ merge: "M", firstParent: "P1" });
			const { tree } = build(repo, { resolver });

			expect(tree.entry(0).fold).toBe("folded");
			expect(tree.unfold(0)).toBe("unfolded");
			expect(layout(tree)).toEqual(["0:M", "1:P2", "0:P1", "0:F"]);
		});

		it("waits for resolution with unfoldResolved", async () => {
			const { tree } = build(scenario());
			await tree.unfoldResolved(0);
			expect(layout(tree)).toEqual(["0:M", "1:P2", "0:P1", "0:F"]);
		});

		it("leaves an unfolded entry untouched", async () => {
			const { tree } = build(scenario());
			await tree.unfoldResolved(0);
			expect(tree.unfold(0)).toBe("unfolded");
			expect(tree.length).toBe(4);
		});

		it("refuses entries without children", async () => {
			const { tree } = build(scenario());
			await tree.unfoldResolved(0);
			expect(() => tree.unfold(1)).toThrow(NotFoldableError);
			expect(() => tree.fold(2)).toThrow(NotFoldableError);
		});

		it("computes each fork point once for trees sharing a resolver", async () => {
			const repo = scenario();
			const first = build(repo);
			first.tree.loadMore();
			const second = build(repo, { resolver: first.resolver });
			second.tree.loadMore();
			await first.resolver.idle();
			expect(second.tree.entry(0).forkPoint).toEqual({ kind: "found", id: "F" });
			expect(first.resolver.computations).toBe(1);
		});
	});

	describe("UNIT-072: folding", () => {
		it("removes the unfolded branch and is idempotent", async () => {
			const { tree } = build(scenario());
			await tree.unfoldResolved(0);

			tree.fold(0);
			expect(layout(tree)).toEqual(["0:M", "0:P1", "0:F"]);
			expect(tree.entry(0).fold).toBe("folded");
			tree.fold(0);
			expect(tree.length).toBe(3);
		});

		it("toggles between folded and unfolded", async () => {
			const { tree } = build(scenario());
			await tree.unfoldResolved(0);

			expect(tree.toggle(0)).toBe("folded");
			expect(tree.length).toBe(3);
			expect(tree.toggle(0)).toBe("unfolded");
			expect(tree.length).toBe(4);
		});

		it("cancels a pending unfold", async () => {
			const { tree, resolver } = build(scenario());
			tree.unfold(0);
			tree.fold(0);
			expect(tree.entry(0).pendingUnfold).toBe(false);
			await resolver.idle();

			expect(tree.entry(0).fold).toBe("folded");
			expect(tree.length).toBe(3);
		});

		it("only touches the folded subtree", async () => {
			const { tree } = build(rejoining());
			await tree.unfoldResolved(1);
			await tree.unfoldResolved(0);
			expect(layout(tree)).toEqual(["0:M", "1:Q2", "1:Q1", "1:S", "0:P1", "1:S", "0:R"]);

			tree.fold(4);
			expect(layout(tree)).toEqual(["0:M", "1:Q2", "1:Q1", "1:S", "0:P1", "0:R"]);
			expect(tree.entry(0).fold).toBe("unfolded");

			tree.fold(0);
			expect(layout(tree)).toEqual(["0:M", "0:P1", "0:R"]);
		});
	});

	describe("UNIT-073: tree navigation", () => {
		it("finds parents and counts children", async () => {
			const { tree } = build(scenario());
			await tree.unfoldResolved(0);

			expect(tree.parentIndex(1)).toBe(0);
			expect(tree.parentIndex(0)).toBeUndefined();
			expect(tree.parentIndex(2)).toBeUndefined();
			expect(tree.childCount(0)).toBe(1);
			expect(tree.childCount(2)).toBe(0);
		});

		it("describes runs of equal level", async () => {
			const { tree } = build(scenario());
			await tree.unfoldResolved(0);
			expect(tree.describe()).toBe(["#0…0  M..M (0)", "#1…1    P2..P2 (1)", "#2…3  F..P1 (0)"].join("\n"));
		});
	});

	describe("UNIT-074: fork point outcomes", () => {
		it("keeps a merge of unrelated history folded", async () => {
			const { tree, resolver } = build(graphOf({ M: ["A", "X"], A: ["R"], R: [], X: [] }));
			tree.loadMore();
			await resolver.idle();

			expect(tree.entry(0)).toMatchObject({ fold: "folded", hasChildren: false, forkPoint: { kind: "none" } });
			expect(() => tree.unfold(0)).toThrow(NotFoldableError);
		});

		it("unfolds a subtree import of unrelated history down to its root", async () => {
			const repo = graphOf(
				{ M: ["A", "X"], A: ["R"], R: [], X: ["Y"], Y: [] },
				{ M: { subject: "Import 'libfoo' as 'vendor/foo'" } },
			);
			const { tree } = build(repo);
			expect(tree.entry(0).role).toBe("Foldable");

			await tree.unfoldResolved(0);
			expect(layout(tree)).toEqual(["0:M", "1:X", "1:Y", "0:A", "0:R"]);
			expect(tree.entry(2).role).toBe("InitialCommit");
		});

		it("has nothing to unfold when the second parent is already merged", async () => {
			const { tree, resolver } = build(graphOf({ M: ["A", "B"], A: ["B"], B: [] }));
			tree.loadMore();
			await resolver.idle();
			expect(tree.entry(0).hasChildren).toBe(false);
			expect(tree.entry(2).isForkPoint).toBe(true);
		});

		it("shows a fork point off the mainline as the branch's last entry", async () => {
			const { tree } = build(rejoining());
			await tree.unfoldResolved(0);

			expect(layout(tree)).toEqual(["0:M", "1:Q2", "1:Q1", "1:S", "0:P1", "0:R"]);
			expect(tree.entry(3)).toMatchObject({ role: "Commit", isForkPoint: true });
		});

		it("links a fork point that already has an entry", async () => {
			const { tree } = build(rejoining());
			await tree.unfoldResolved(1);
			await tree.unfoldResolved(0);

			expect(tree.entry(3).role).toBe("CommitLink");
			expect(tree.entry(5).role).toBe("Commit");
		});

		it("notifies subscribers with the affected indices", async () => {
			const { tree, resolver } = build(scenario());
			const events: ForkPointResolvedEvent[] = [];
			const unsubscribe = tree.onForkPointResolved((event) => events.push(event));

			tree.entry(0);
			await resolver.idle();
			unsubscribe();

			expect(events).toEqual([
				{ request: { merge: "M", firstParent: "P1" }, outcome: { kind: "found", id: "F" }, indices: [0] },
			]);
		});
	});

	describe("UNIT-075: ranges with an end off the first-parent line", () => {
		it("lists only commits the end cannot reach", () => {
			const repo = graphOf({ main2: ["main1"], main1: ["base"], base: [], feat2: ["feat1"], feat1: ["base"] });
			const { tree } = build(repo, { start: "main2", end: "feat2" });
			tree.loadMore();

			expect(layout(tree)).toEqual(["0:main2", "0:main1"]);
			expect(tree.entries().map((e) => e.role)).toEqual(["Commit", "LastCommit"]);
		});

		it("stops an unfolded branch before commits the end can reach", async () => {
			const repo = graphOf({ M: ["P1", "S2"], P1: ["B"], S2: ["S1"], S1: ["B"], B: [] });
			const { tree } = build(repo, { start: "M", end: "S1" });

			await tree.unfoldResolved(0);
			expect(layout(tree)).toEqual(["0:M", "1:S2", "0:P1"]);
			expect(tree.entry(2).role).toBe("LastCommit");
		});

		it("has nothing to unfold when the end reaches the second parent", async () => {
			const repo = graphOf({ M: ["P1", "S2"], P1: ["B"], S2: ["B"], B: [] });
			const { tree, resolver } = build(repo, { start: "M", end: "S2" });
			tree.loadMore();
			await resolver.idle();

			expect(layout(tree)).toEqual(["0:M", "0:P1"]);
			expect(tree.entry(0)).toMatchObject({ fold: "folded", hasChildren: false });
		});
	});
});
