import { exec as cpExec, type ExecOptions } from "node:child_process";
import { GitCommandError } from "../errors.js";

export interface ExecResult {
	stdout: string;
	stderr: string;
}

export function exec(command: string, options: ExecOptions = {}): Promise<ExecResult> {
	return new Promise((resolve, reject) => {
		cpExec(command, { maxBuffer: 256 * 1024 * 1024, ...options }, (error, stdout, stderr) => {
			const out = String(stdout);
			const err = String(stderr);
			if (error) {
				reject(new GitCommandError(command, out, err, error.code));
				return;
			}
			resolve({ stdout: out, stderr: err });
		});
	});
}
