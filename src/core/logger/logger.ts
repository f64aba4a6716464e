import winston from 'winston';
import chalk from 'chalk';
import { env } from '../env.js';

// ===== 1. Foundation Layer: Winston Configuration =====

const logLevels = {
	error: 0, // Highest priority
	warn: 1,
	info: 2,
	http: 3,
	verbose: 4,
	debug: 5,
	silly: 6, // Lowest priority
};

type LogLevel = keyof typeof logLevels;

const isLogLevel = (level: string): level is LogLevel =>
	Object.prototype.hasOwnProperty.call(logLevels, level);

// ===== 2. Security Layer: Data Redaction =====

const SENSITIVE_KEYS = ['apiKey', 'password', 'secret', 'token', 'auth', 'credential'];
const MASK_REGEX = new RegExp(
	`(${SENSITIVE_KEYS.join('|')})(["']?\\s*[:=]\\s*)(["'])?.*?\\3`,
	'gi'
);

export const redactSensitiveData = (message: string): string => {
	if (env.REDACT_SECRETS === false) return message;

	return message.replace(
		MASK_REGEX,
		(_match: string, key: string, separator: string, quote: string | undefined) => {
			const quoteMark = quote || '';
			return `${key}${separator}${quoteMark}***REDACTED***${quoteMark}`;
		}
	);
};

// ===== 3. Visual Formatting Layer =====

const chalkColors = {
	red: chalk.red,
	green: chalk.green,
	yellow: chalk.yellow,
	blue: chalk.blue,
	magenta: chalk.magenta,
	cyan: chalk.cyan,
	white: chalk.white,
	gray: chalk.gray,
} as const;

type ChalkColor = keyof typeof chalkColors;

const isChalkColor = (color: unknown): color is ChalkColor =>
	typeof color === 'string' && Object.prototype.hasOwnProperty.call(chalkColors, color);

const levelColorMap: Record<LogLevel, (text: string) => string> = {
	error: chalk.red,
	warn: chalk.yellow,
	info: chalk.blue,
	http: chalk.cyan,
	verbose: chalk.magenta,
	debug: chalk.gray,
	silly: chalk.gray.dim,
};

const maskFormat = winston.format(info => {
	if (typeof info.message === 'string') {
		info.message = redactSensitiveData(info.message);
	}
	return info;
});

const consoleFormat = winston.format.printf(({ level, message, timestamp, color }) => {
	const colorize = isLogLevel(level) ? levelColorMap[level] : chalk.white;
	const text = String(message);
	const formattedMessage = isChalkColor(color) ? chalkColors[color](text) : text;

	return `${chalk.dim(String(timestamp))} ${colorize(level.toUpperCase())}: ${formattedMessage}`;
});

// ===== 4. Configuration Layer =====

const getDefaultLogLevel = (): LogLevel => {
	const envLevel = env.VECTORBRIDGE_LOG_LEVEL.toLowerCase();
	return isLogLevel(envLevel) ? envLevel : 'info';
};

export interface LoggerOptions {
	level?: string;
	silent?: boolean;
}

export type LogMeta = Record<string, unknown>;

// ===== 5. Core Logger Class =====

export class Logger {
	private logger: winston.Logger;
	private isSilent: boolean;

	constructor(options: LoggerOptions = {}) {
		const requested = options.level?.toLowerCase();
		const level = requested && isLogLevel(requested) ? requested : getDefaultLogLevel();
		this.isSilent = options.silent || false;

		this.logger = winston.createLogger({
			levels: logLevels,
			level,
			format: winston.format.combine(
				winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
				maskFormat()
			),
			transports: this.createTransports(),
			silent: this.isSilent,
		});
	}

	private createTransports(): winston.transport[] {
		return [
			new winston.transports.Console({
				format: winston.format.combine(
					winston.format.timestamp({ format: 'HH:mm:ss' }),
					maskFormat(),
					consoleFormat
				),
				stderrLevels: Object.keys(logLevels), // Redirect all log levels to stderr
			}),
		];
	}

	// ===== Core Logging Methods =====

	error(message: string, meta?: LogMeta, color?: ChalkColor): void {
		this.logger.error(message, { ...meta, color });
	}

	warn(message: string, meta?: LogMeta, color?: ChalkColor): void {
		this.logger.warn(message, { ...meta, color });
	}

	info(message: string, meta?: LogMeta, color?: ChalkColor): void {
		this.logger.info(message, { ...meta, color });
	}

	debug(message: string, meta?: LogMeta, color?: ChalkColor): void {
		this.logger.debug(message, { ...meta, color });
	}

	silly(message: string, meta?: LogMeta, color?: ChalkColor): void {
		this.logger.silly(message, { ...meta, color });
	}

	// ===== Runtime Configuration Management =====

	setLevel(level: string): void {
		const normalized = level.toLowerCase();
		if (isLogLevel(normalized)) {
			this.logger.level = normalized;
		} else {
			this.error(`Invalid log level: ${level}. Valid levels: ${Object.keys(logLevels).join(', ')}`);
		}
	}

	getLevel(): string {
		return this.logger.level;
	}

	setSilent(silent: boolean): void {
		this.isSilent = silent;
		this.logger.silent = silent;
	}

	isSilentMode(): boolean {
		return this.isSilent;
	}

	createChild(options: LoggerOptions = {}): Logger {
		return new Logger({
			level: options.level || this.getLevel(),
			silent: options.silent !== undefined ? options.silent : this.isSilent,
		});
	}
}

// ===== 6. Singleton Pattern =====

export const logger = new Logger();

export type { ChalkColor };

export const createLogger = (options: LoggerOptions = {}): Logger => {
	return new Logger(options);
};

export const setGlobalLogLevel = (level: string): void => {
	logger.setLevel(level);
};

export const getGlobalLogLevel = (): string => {
	return logger.getLevel();
};
