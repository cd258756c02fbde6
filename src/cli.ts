#!/usr/bin/env node
import { Command } from "commander";
import { defaultConfig, type FoldlogConfig } from "./config.js";
import { ContractError } from "./errors.js";
import { loadRangeGraph } from "./git/log.js";
import { listRemotes } from "./git/remote.js";
import { parseRange, resolveRevision } from "./git/rev-parse.js";
import { shortId } from "./graph/types.js";
import { ForkPointResolver } from "./history/fork-point.js";
import { searchHistory } from "./history/search.js";
import { HistoryTree } from "./history/tree.js";
import { isDebug, logDebug, logError, logInfo, setDebug } from "./utils/log.js";
import { formatEntry } from "./view/format.js";

interface CliOptions {
	repo?: string;
	unfold: string;
	maxCount?: string;
	workers: string;
	pageSize: string;
	search?: string;
	ignoreCase?: boolean;
	debug?: boolean;
}

const program = new Command();

program
	.name("foldlog")
	.description("Print a git history with merges folded into their branches")
	.argument("[range]", "Revision or A..B range to show", "HEAD")
	.option("-C, --repo <path>", "Path to the git repository")
	.option("--unfold <depth>", "Unfold merges down to this depth", "0")
	.option("-n, --max-count <n>", "Limit the number of top-level commits")
	.option("--workers <n>", "Fork point computations run in parallel", "4")
	.option("--page-size <n>", "Top-level commits loaded at once", "50")
	.option("--search <needle>", "Print only commits matching the needle, with their path")
	.option("-i, --ignore-case", "Match the search needle case-insensitively")
	.option("--debug", "Log fold operations and fork point results")
	.action(async (range: string, opts: CliOptions) => {
		const config = defaultConfig({
			repoPath: opts.repo,
			revision: range,
			unfoldDepth: Number.parseInt(opts.unfold, 10),
			maxCount: opts.maxCount === undefined ? undefined : Number.parseInt(opts.maxCount, 10),
			workers: Number.parseInt(opts.workers, 10),
			pageSize: Number.parseInt(opts.pageSize, 10),
			debug: opts.debug ?? false,
		});
		setDebug(config.debug);

		try {
			await run(config, opts);
			process.exit(0);
		} catch (err) {
			const message = err instanceof Error ? err.message : String(err);
			logError(message);
			process.exit(err instanceof ContractError ? 2 : 1);
		}
	});

async function run(config: FoldlogConfig, opts: CliOptions): Promise<void> {
	const range = parseRange(config.revision);
	const start = await resolveRevision(config.repoPath, range.start);
	const end = range.end === undefined ? undefined : await resolveRevision(config.repoPath, range.end);

	const repo = await loadRangeGraph(config.repoPath, { start, end });
	const resolver = new ForkPointResolver(repo, { workers: config.workers });

	try {
		if (opts.search !== undefined) {
			let found = 0;
			for await (const result of searchHistory(repo, resolver, { start, end }, opts.search, {
				ignoreCase: opts.ignoreCase,
			})) {
				console.log(`${result.path.join(".")}\t${shortId(result.commit.id)} ${result.commit.subject}`);
				found++;
				if (config.maxCount !== undefined && found >= config.maxCount) break;
			}
			logInfo(`${found} matching commits`);
			return;
		}

		const tree = new HistoryTree({ repo, resolver, start, end, pageSize: config.pageSize });
		if (config.maxCount !== undefined) {
			tree.loadMore(config.maxCount);
		} else {
			while (tree.loadMore() > 0) {
				// drain the range
			}
		}

		for (let i = 0; i < tree.length; i++) {
			const entry = tree.entry(i);
			if (entry.level < config.unfoldDepth && entry.hasChildren && entry.fold !== "unfolded") {
				await tree.unfoldResolved(i);
			}
		}
		await resolver.idle();

		const format = { ...config, remotes: config.remotes ?? (await listRemotes(config.repoPath)) };
		for (const entry of tree.entries()) {
			console.log(formatEntry(entry, format));
		}
		if (isDebug()) {
			logDebug(`Tree layout:\n${tree.describe()}`);
		}
		tree.dispose();
	} finally {
		resolver.dispose();
	}
}

await program.parseAsync(process.argv);
