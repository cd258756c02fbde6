/** The repository could not answer: bad revision, missing commit, failed git call. */
export class RepositoryError extends Error {
	constructor(message: string) {
		super(message);
		this.name = "RepositoryError";
	}
}

export class UnknownRevisionError extends RepositoryError {
	readonly revision: string;

	constructor(revision: string) {
		super(`Unknown revision '${revision}'`);
		this.name = "UnknownRevisionError";
		this.revision = revision;
	}
}

export class MissingCommitError extends RepositoryError {
	readonly id: string;

	constructor(id: string) {
		super(`Commit ${id} is not in the repository`);
		this.name = "MissingCommitError";
		this.id = id;
	}
}

export class GitCommandError extends RepositoryError {
	readonly command: string;
	readonly stdout: string;
	readonly stderr: string;
	readonly exitCode: number | undefined;

	constructor(command: string, stdout: string, stderr: string, exitCode: number | undefined) {
		super(`Command failed: ${command}\n${stderr}`);
		this.name = "GitCommandError";
		this.command = command;
		this.stdout = stdout;
		this.stderr = stderr;
		this.exitCode = exitCode;
	}
}

/** The caller asked for something the contract does not allow. */
export class ContractError extends Error {
	constructor(message: string) {
		super(message);
		this.name = "ContractError";
	}
}

export class NotFoldableError extends ContractError {
	readonly index: number;

	constructor(index: number, id: string) {
		super(`Entry #${index} (${id.slice(0, 8)}) has no children to fold or unfold`);
		this.name = "NotFoldableError";
		this.index = index;
	}
}

export class NotAMergeError extends ContractError {
	readonly id: string;

	constructor(id: string) {
		super(`Commit ${id.slice(0, 8)} is not a merge`);
		this.name = "NotAMergeError";
		this.id = id;
	}
}
