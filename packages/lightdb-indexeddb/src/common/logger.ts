import debug from 'debug';

const BASE_NAMESPACE = 'lightdb';
const defaultLogFn = debug.log;

/**
 * Creates a namespaced debug logger.
 *
 * createLogger('indexeddb:database') logs under 'lightdb:indexeddb:database';
 * `log.extend('warn')` gives 'lightdb:indexeddb:database:warn'.
 */
export function createLogger(subNamespace: string): debug.Debugger {
	return debug(`${BASE_NAMESPACE}:${subNamespace}`);
}

/**
 * Enable lightdb logging programmatically, for hosts without a DEBUG environment variable.
 *
 * @param pattern - e.g. 'lightdb:*', or 'lightdb:indexeddb:transaction'
 * @param logFn - Replacement output function (defaults to the debug library's own)
 */
export function enableLogging(
	pattern: string = `${BASE_NAMESPACE}:*`,
	logFn?: (...args: unknown[]) => void
): void {
	if (logFn) {
		debug.log = logFn;
	}
	debug.enable(pattern);
}

/** Disable all logging and restore the default output function. */
export function disableLogging(): void {
	debug.disable();
	debug.log = defaultLogFn;
}
