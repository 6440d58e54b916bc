// ============================================================================
// Logging Configuration
// ============================================================================

/**
 * Log levels for controlling injector output verbosity
 *
 * @example
 * const injector = new Injector()
 * injector.setLogLevel(LogLevel.OFF) // Disable all logging
 */
export enum LogLevel {
	/** No logging output */
	OFF = 'OFF',
	/** Minimal logging - only important events (cache teardown, failures) */
	MINIMAL = 'MINIMAL',
	/** Verbose logging - metadata builds and every injection step */
	VERBOSE = 'VERBOSE',
}

/**
 * Console logger gated by a {@link LogLevel}
 *
 * One logger is shared by an Injector and the MetadataCache it owns, so
 * changing the level on the injector affects both.
 *
 * @example
 * const logger = new Logger(LogLevel.VERBOSE)
 * logger.log('Building injection metadata for UserService')
 */
export class Logger {
	constructor(private level: LogLevel = LogLevel.MINIMAL) {}

	/**
	 * Set the logging level
	 *
	 * @param level - The desired log level
	 */
	setLevel(level: LogLevel): void {
		this.level = level
	}

	/**
	 * Get the current logging level
	 *
	 * @returns The current log level
	 */
	getLevel(): LogLevel {
		return this.level
	}

	/**
	 * Log a message if the current log level allows it
	 *
	 * @param message - The message to log
	 * @param level - The minimum log level required to log this message
	 */
	log(message: string, level: LogLevel = LogLevel.VERBOSE): void {
		if (this.level === LogLevel.OFF) {
			return
		}

		if (level === LogLevel.MINIMAL && this.level === LogLevel.MINIMAL) {
			console.log(message)
			return
		}

		if (this.level === LogLevel.VERBOSE) {
			console.log(message)
		}
	}

	/**
	 * Log an error message (always logged unless OFF)
	 *
	 * @param message - The error message to log
	 */
	error(message: string): void {
		if (this.level !== LogLevel.OFF) {
			console.error(message)
		}
	}
}
