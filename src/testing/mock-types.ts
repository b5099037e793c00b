/**
 * Type-safe mock utilities for the Jest test runner
 */

/**
 * Typed spy for console methods (log, error, warn, info)
 * @example
 * let consoleLogSpy: ConsoleSpy;
 * consoleLogSpy = jest.spyOn(console, "log");
 */
export type ConsoleSpy = jest.SpyInstance<
	void,
	[message?: unknown, ...optionalParams: unknown[]]
>;

/**
 * Typed spy for process.exit
 * @example
 * let processExitSpy: ProcessExitSpy;
 * processExitSpy = jest.spyOn(process, "exit");
 */
export type ProcessExitSpy = jest.SpyInstance<
	never,
	[code?: string | number | null | undefined]
>;

/**
 * Lines passed as the first argument of every console call
 * @example
 * const output = loggedLines(consoleLogSpy).join("\n");
 */
export function loggedLines(spy: ConsoleSpy): string[] {
	return spy.mock.calls.map((call) => String(call[0]));
}
