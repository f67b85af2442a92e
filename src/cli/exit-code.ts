/**
 * Process exit codes. `InvalidArgument` follows Node's own code 9.
 *
 * @see https://nodejs.org/api/process.html#process_exit_codes
 */
export const ExitCode = {
	Success: 0,
	/** A component operation failed or the versions file could not be saved. */
	Failure: 1,
	InvalidArgument: 9,
} as const;

export type ExitCode = (typeof ExitCode)[keyof typeof ExitCode];
