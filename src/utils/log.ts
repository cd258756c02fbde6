const PREFIX = "[foldlog]";

let debugEnabled = false;

export function setDebug(enabled: boolean): void {
	debugEnabled = enabled;
}

export function isDebug(): boolean {
	return debugEnabled;
}

export function logInfo(message: string): void {
	console.error(`${PREFIX} ${message}`);
}

export function logWarn(message: string): void {
	console.error(`${PREFIX} warning: ${message}`);
}

export function logDebug(message: string): void {
	if (!debugEnabled) return;
	console.error(`${PREFIX} ${message}`);
}

export function logError(message: string): void {
	console.error(`${PREFIX} ${message}`);
}
