/**
 * Structured logger for the Karya runtime.
 *
 * Level filtering, pluggable transports, child loggers and contextual
 * metadata. Entries below the active level are dropped before any
 * formatting work happens.
 */

// ─── Log Level ───────────────────────────────────────────────────────────────

export enum LogLevel {
	DEBUG = 0,
	INFO = 1,
	WARN = 2,
	ERROR = 3,
	FATAL = 4,
}

const LEVEL_NAMES: Record<LogLevel, string> = {
	[LogLevel.DEBUG]: "DEBUG",
	[LogLevel.INFO]: "INFO",
	[LogLevel.WARN]: "WARN",
	[LogLevel.ERROR]: "ERROR",
	[LogLevel.FATAL]: "FATAL",
};

const LEVEL_BY_NAME: Record<string, LogLevel> = {
	debug: LogLevel.DEBUG,
	info: LogLevel.INFO,
	warn: LogLevel.WARN,
	error: LogLevel.ERROR,
	fatal: LogLevel.FATAL,
};

/** Parse a level name (case-insensitive). Returns `undefined` for unknown names. */
export function parseLogLevel(name: string | undefined): LogLevel | undefined {
	if (!name) return undefined;
	return LEVEL_BY_NAME[name.trim().toLowerCase()];
}

// ─── Types ───────────────────────────────────────────────────────────────────

export interface LogEntry {
	/** ISO-8601 timestamp */
	timestamp: string;
	level: LogLevel;
	levelName: string;
	message: string;
	/** Structured context metadata */
	context: Record<string, unknown>;
	/** Logger name, e.g. `"patra:mail-manager"` */
	logger: string;
	error?: { name: string; message: string; code?: string; stack?: string };
	/** Duration in milliseconds for timed operations */
	duration?: number;
}

export interface LogTransport {
	write(entry: LogEntry): void;
}

export interface LoggerConfig {
	/** Minimum level to emit. */
	level?: LogLevel;
	/** Output transports. Defaults to a single ConsoleTransport. */
	transports?: LogTransport[];
	/** Context merged into every entry. */
	defaultContext?: Record<string, unknown>;
}

// ─── Global Configuration ────────────────────────────────────────────────────

let globalConfig: LoggerConfig = {};

/**
 * Set global logging defaults. Loggers created afterwards pick them up;
 * existing loggers keep what they resolved at construction.
 */
export function configureLogging(config: LoggerConfig): void {
	globalConfig = { ...config };
}

export function getLoggingConfig(): LoggerConfig {
	return { ...globalConfig };
}

/** Reset global config to defaults. Primarily for testing. */
export function resetLoggingConfig(): void {
	globalConfig = {};
}

// ─── Transports ──────────────────────────────────────────────────────────────

const ANSI_RESET = "\x1b[0m";
const ANSI_DIM = "\x1b[2m";

const LEVEL_COLORS: Record<LogLevel, string> = {
	[LogLevel.DEBUG]: "\x1b[36m",
	[LogLevel.INFO]: "\x1b[32m",
	[LogLevel.WARN]: "\x1b[33m",
	[LogLevel.ERROR]: "\x1b[31m",
	[LogLevel.FATAL]: "\x1b[35;1m",
};

/**
 * Human-readable single-line output. Colors are used only on a TTY
 * unless forced through the constructor.
 */
export class ConsoleTransport implements LogTransport {
	private readonly useColors: boolean;

	constructor(opts?: { colors?: boolean }) {
		this.useColors = opts?.colors ?? (process.stdout.isTTY ?? false);
	}

	format(entry: LogEntry): string {
		const ts = entry.timestamp.slice(11, 23); // HH:mm:ss.SSS
		const lvl = LEVEL_NAMES[entry.level].padEnd(5);
		const head = this.useColors
			? `${ANSI_DIM}${ts}${ANSI_RESET} ${LEVEL_COLORS[entry.level]}${lvl}${ANSI_RESET}`
			: `${ts} ${lvl}`;

		let line = `${head} [${entry.logger}] ${entry.message}`;

		const pairs = Object.entries(entry.context).map(([k, val]) => `${k}=${JSON.stringify(val)}`);
		if (entry.duration !== undefined) pairs.push(`duration=${entry.duration}ms`);
		if (pairs.length > 0) {
			line += this.useColors ? ` ${ANSI_DIM}${pairs.join(" ")}${ANSI_RESET}` : ` ${pairs.join(" ")}`;
		}

		if (entry.error) {
			const code = entry.error.code ? ` (${entry.error.code})` : "";
			line += `\n  ${entry.error.name}${code}: ${entry.error.message}`;
		}
		return line;
	}

	write(entry: LogEntry): void {
		const stream = entry.level >= LogLevel.ERROR ? process.stderr : process.stdout;
		stream.write(this.format(entry) + "\n");
	}
}

/**
 * One JSON object per line, for log aggregation.
 */
export class JsonTransport implements LogTransport {
	serialize(entry: LogEntry): string {
		const obj: Record<string, unknown> = {
			timestamp: entry.timestamp,
			level: LEVEL_NAMES[entry.level],
			logger: entry.logger,
			message: entry.message,
		};
		if (Object.keys(entry.context).length > 0) obj.context = entry.context;
		if (entry.error) obj.error = entry.error;
		if (entry.duration !== undefined) obj.duration = entry.duration;
		return JSON.stringify(obj);
	}

	write(entry: LogEntry): void {
		const stream = entry.level >= LogLevel.ERROR ? process.stderr : process.stdout;
		stream.write(this.serialize(entry) + "\n");
	}
}

// ─── Logger ──────────────────────────────────────────────────────────────────

/**
 * Effective level: `LOG_LEVEL` env, then explicit config, then global config,
 * then INFO in production and DEBUG elsewhere.
 */
function resolveLevel(configLevel?: LogLevel): LogLevel {
	const envLevel = parseLogLevel(process.env.LOG_LEVEL);
	if (envLevel !== undefined) return envLevel;
	if (configLevel !== undefined) return configLevel;
	if (globalConfig.level !== undefined) return globalConfig.level;
	return process.env.NODE_ENV === "production" ? LogLevel.INFO : LogLevel.DEBUG;
}

function serializeError(error: unknown): LogEntry["error"] {
	if (error instanceof Error) {
		const code = "code" in error && typeof error.code === "string" ? error.code : undefined;
		return { name: error.name, message: error.message, code, stack: error.stack };
	}
	return { name: "Error", message: String(error) };
}

export class Logger {
	private readonly name: string;
	private level: LogLevel;
	private readonly transports: LogTransport[];
	private readonly context: Record<string, unknown>;

	constructor(name: string, config?: LoggerConfig) {
		this.name = name;
		this.level = resolveLevel(config?.level);
		this.transports = config?.transports
			?? globalConfig.transports
			?? [new ConsoleTransport()];
		this.context = {
			...(globalConfig.defaultContext ?? {}),
			...(config?.defaultContext ?? {}),
		};
	}

	debug(message: string, ctx?: Record<string, unknown>): void {
		this.emit(LogLevel.DEBUG, message, undefined, ctx);
	}

	info(message: string, ctx?: Record<string, unknown>): void {
		this.emit(LogLevel.INFO, message, undefined, ctx);
	}

	warn(message: string, ctx?: Record<string, unknown>): void {
		this.emit(LogLevel.WARN, message, undefined, ctx);
	}

	error(message: string, error?: unknown, ctx?: Record<string, unknown>): void {
		this.emit(LogLevel.ERROR, message, error, ctx);
	}

	fatal(message: string, error?: unknown, ctx?: Record<string, unknown>): void {
		this.emit(LogLevel.FATAL, message, error, ctx);
	}

	/**
	 * Child logger named `parent:child`, sharing transports, level and context.
	 */
	child(childName: string): Logger {
		return new Logger(`${this.name}:${childName}`, {
			level: this.level,
			transports: this.transports,
			defaultContext: { ...this.context },
		});
	}

	/** A new logger with extra context merged in. Does not mutate this one. */
	withContext(ctx: Record<string, unknown>): Logger {
		return new Logger(this.name, {
			level: this.level,
			transports: this.transports,
			defaultContext: { ...this.context, ...ctx },
		});
	}

	setLevel(level: LogLevel): void {
		this.level = level;
	}

	getLevel(): LogLevel {
		return this.level;
	}

	getName(): string {
		return this.name;
	}

	isEnabled(level: LogLevel): boolean {
		return level >= this.level;
	}

	// ─── Internal ────────────────────────────────────────────────────────

	private emit(level: LogLevel, message: string, error: unknown, ctx?: Record<string, unknown>): void {
		if (level < this.level) return;

		const context = { ...this.context, ...(ctx ?? {}) };
		const entry: LogEntry = {
			timestamp: new Date().toISOString(),
			level,
			levelName: LEVEL_NAMES[level],
			message,
			context,
			logger: this.name,
		};

		if (typeof context.duration === "number") {
			entry.duration = context.duration;
			delete context.duration;
		}
		if (error !== undefined) {
			entry.error = serializeError(error);
		}

		for (const transport of this.transports) {
			try {
				transport.write(entry);
			} catch {
				// A broken transport must not take the runtime down with it.
			}
		}
	}
}

// ─── Factory ─────────────────────────────────────────────────────────────────

/**
 * Create a named logger with global defaults.
 *
 * @param name - Package and component, e.g. `"pravaha:executor"`.
 */
export function createLogger(name: string): Logger {
	return new Logger(name);
}
