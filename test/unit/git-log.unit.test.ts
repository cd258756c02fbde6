import { beforeEach, describe, expect, it, vi } from "vitest";
import { loadCommitGraph, loadRangeGraph, parseDecorations, parseGitLog } from "../../src/git/log.js";
import { exec } from "../../src/utils/exec.js";

vi.mock("../../src/utils/exec.js", () => ({
	exec: vi.fn(),
}));

function record(fields: string[]): string {
	return `${fields.join("\x1f")}\x1e\n`;
}

const MERGE = record([
	"aaa111",
	"bbb222 ccc333",
	"HEAD -> main, tag: v1.0, origin/main",
	"Ada",
	"ada@example.com",
	"1700000000",
	"Bob",
	"bob@example.com",
	"1700000100",
	"Merge branch 'dev'",
	"Body line 1\nline 2\n",
]);
const ROOT = record(["bbb222", "", "", "Ada", "ada@example.com", "1600000000", "Ada", "ada@example.com", "1600000000", "root", ""]);

describe("git/log.ts", () => {
	describe("UNIT-100: parseDecorations", () => {
		it("reads branches, tags and the HEAD marker", () => {
			expect(parseDecorations("HEAD -> main, tag: v1.0, origin/main")).toEqual({
				references: ["main", "v1.0", "origin/main"],
				isHead: true,
			});
		});

		it("recognises a detached HEAD", () => {
			expect(parseDecorations("HEAD, feature")).toEqual({ references: ["feature"], isHead: true });
		});

		it("handles commits without decorations", () => {
			expect(parseDecorations("")).toEqual({ references: [], isHead: false });
		});
	});

	describe("UNIT-101: parseGitLog", () => {
		it("parses every record", () => {
			expect(parseGitLog(MERGE + ROOT)).toEqual([
				{
					id: "aaa111",
					parents: ["bbb222", "ccc333"],
					author: { name: "Ada", email: "ada@example.com", timestamp: 1_700_000_000 },
					committer: { name: "Bob", email: "bob@example.com", timestamp: 1_700_000_100 },
					subject: "Merge branch 'dev'",
					body: "Body line 1\nline 2",
					references: ["main", "v1.0", "origin/main"],
					isHead: true,
				},
				{
					id: "bbb222",
					parents: [],
					author: { name: "Ada", email: "ada@example.com", timestamp: 1_600_000_000 },
					committer: { name: "Ada", email: "ada@example.com", timestamp: 1_600_000_000 },
					subject: "root",
					body: "",
					references: [],
					isHead: false,
				},
			]);
		});

		it("skips malformed records", () => {
			expect(parseGitLog(`garbage\x1e\n${ROOT}`).map((c) => c.id)).toEqual(["bbb222"]);
		});

		it("returns nothing for empty output", () => {
			expect(parseGitLog("")).toEqual([]);
		});
	});

	describe("UNIT-102: loadCommitGraph", () => {
		const execMock = vi.mocked(exec);

		beforeEach(() => {
			vi.clearAllMocks();
		});

		it("runs git log over the revisions and builds the graph", async () => {
			execMock.mockResolvedValue({ stdout: MERGE + ROOT, stderr: "" });

			const graph = await loadCommitGraph("/repo", ["main", "dev"]);

			expect(execMock).toHaveBeenCalledTimes(1);
			const [command, options] = execMock.mock.calls[0] ?? [];
			expect(command).toMatch(/^git log --decorate=short --format="%H%x1f%P%x1f%D/);
			expect(command).toMatch(/ "main" "dev" --$/);
			expect(options).toEqual({ cwd: "/repo" });
			expect(graph.size).toBe(2);
			expect(graph.resolve("HEAD")).toBe("aaa111");
			expect(graph.resolve("v1.0")).toBe("aaa111");
		});
	});

	describe("UNIT-103: loadRangeGraph", () => {
		const execMock = vi.mocked(exec);

		beforeEach(() => {
			vi.clearAllMocks();
			execMock.mockResolvedValue({ stdout: MERGE + ROOT, stderr: "" });
		});

		it("loads the excluded side of a range as well", async () => {
			await loadRangeGraph("/repo", { start: "aaa111", end: "ddd444" });
			const [command] = execMock.mock.calls[0] ?? [];
			expect(command).toMatch(/ "aaa111" "ddd444" --$/);
		});

		it("loads only the start of an open range", async () => {
			await loadRangeGraph("/repo", { start: "aaa111" });
			const [command] = execMock.mock.calls[0] ?? [];
			expect(command).toMatch(/ "aaa111" --$/);
		});
	});
});
