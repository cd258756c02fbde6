import { CommitGraph } from "../graph/commit-graph.js";
import type { CommitRecord } from "../graph/types.js";
import { exec } from "../utils/exec.js";
import { logDebug } from "../utils/log.js";

const FIELD_SEP = "\x1f";
const RECORD_SEP = "\x1e";
const FIELDS = ["%H", "%P", "%D", "%aN", "%aE", "%at", "%cN", "%cE", "%ct", "%s", "%b"];

export const LOG_FORMAT = FIELDS.join("%x1f") + "%x1e";

interface Decorations {
	references: string[];
	isHead: boolean;
}

/** Splits a `%D` decoration list into reference names and the HEAD marker. */
export function parseDecorations(text: string): Decorations {
	const references: string[] = [];
	let isHead = false;

	for (const raw of text.split(",")) {
		const item = raw.trim();
		if (item.length === 0) continue;
		if (item === "HEAD") {
			isHead = true;
		} else if (item.startsWith("HEAD -> ")) {
			isHead = true;
			references.push(item.slice("HEAD -> ".length));
		} else if (item.startsWith("tag: ")) {
			references.push(item.slice("tag: ".length));
		} else {
			references.push(item);
		}
	}

	return { references, isHead };
}

export function parseGitLog(stdout: string): CommitRecord[] {
	const commits: CommitRecord[] = [];

	for (const record of stdout.split(RECORD_SEP)) {
		const text = record.replace(/^\n+/, "");
		if (text.trim().length === 0) continue;

		const fields = text.split(FIELD_SEP);
		if (fields.length < FIELDS.length) {
			logDebug(`Skipping malformed log record: ${text.slice(0, 40)}`);
			continue;
		}

		const [
			id = "",
			parentList = "",
			decorations = "",
			authorName = "",
			authorEmail = "",
			authorTime = "",
			committerName = "",
			committerEmail = "",
			commitTime = "",
			subject = "",
			...body
		] = fields;
		const { references, isHead } = parseDecorations(decorations);

		commits.push({
			id,
			parents: parentList.split(" ").filter(Boolean),
			author: { name: authorName, email: authorEmail, timestamp: Number(authorTime) },
			committer: { name: committerName, email: committerEmail, timestamp: Number(commitTime) },
			subject,
			body: body.join(FIELD_SEP).trimEnd(),
			references,
			isHead,
		});
	}

	return commits;
}

/** Reads the history reachable from `revisions` into memory. */
export async function loadCommitGraph(repoPath: string, revisions: readonly string[] = ["HEAD"]): Promise<CommitGraph> {
	const revArgs = revisions.map((rev) => `"${rev}"`).join(" ");
	const { stdout } = await exec(`git log --decorate=short --format="${LOG_FORMAT}" ${revArgs} --`, {
		cwd: repoPath,
	});

	const commits = parseGitLog(stdout);
	logDebug(`Loaded ${commits.length} commits from ${repoPath}`);
	return new CommitGraph(commits);
}

/** Reads both sides of `end..start`, so everything reachable from `end` can be hidden. */
export function loadRangeGraph(repoPath: string, range: { start: string; end?: string }): Promise<CommitGraph> {
	return loadCommitGraph(repoPath, range.end === undefined ? [range.start] : [range.start, range.end]);
}
