import debug from 'debug';

// Base namespace for the project
const BASE_NAMESPACE = 'deltaplan';

/**
 * Creates a namespaced debug logger instance.
 *
 * Example: createLogger('build') -> returns a debugger for 'deltaplan:build'
 * Example: createLogger('planner:join') -> returns a debugger for 'deltaplan:planner:join'
 *
 * Usage:
 * const log = createLogger('build');
 * log('Building form %d', index);
 * const errorLog = log.extend('error'); // Creates 'deltaplan:build:error'
 * errorLog('Construction failed: %O', error);
 *
 * @param subNamespace The specific subsystem namespace (e.g., 'parser', 'planner:join', 'explain')
 */
export function createLogger(subNamespace: string): debug.Debugger {
	return debug(`${BASE_NAMESPACE}:${subNamespace}`);
}

/**
 * Enable debug logging programmatically.
 *
 * @param pattern - Debug pattern to enable (default: 'deltaplan:*')
 *   Examples:
 *   - 'deltaplan:*' - everything
 *   - 'deltaplan:planner:*' - join planning and arrangement requests
 *   - 'deltaplan:*,-deltaplan:parser' - all except the DSL parser
 * @param logFn - Optional custom log function. Defaults to debug's stderr writer.
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

/** Disable all debug logging. */
export function disableLogging(): void {
	debug.disable();
}

/**
 * Check if logging is enabled for a specific namespace.
 *
 * @param namespace - The namespace to check (without the 'deltaplan:' prefix)
 */
export function isLoggingEnabled(namespace: string): boolean {
	return debug.enabled(`${BASE_NAMESPACE}:${namespace}`);
}
