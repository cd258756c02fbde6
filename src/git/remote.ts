import { exec } from "../utils/exec.js";

/** Names of the repository's remotes, as `git remote` lists them. */
export async function listRemotes(repoPath: string): Promise<string[]> {
	const { stdout } = await exec("git remote", { cwd: repoPath });
	return stdout
		.split("\n")
		.map((line) => line.trim())
		.filter(Boolean);
}
