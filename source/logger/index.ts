import fs from 'node:fs';
import path from 'node:path';
import {getLogsDir} from '../constants.js';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface Logger {
	debug(component: string, message: string, data?: object): void;
	info(component: string, message: string, data?: object): void;
	warn(component: string, message: string, data?: object): void;
	error(component: string, message: string, error?: Error | object): void;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
	debug: 0,
	info: 1,
	warn: 2,
	error: 3,
};

export interface LoggerOptions {
	/** Minimum level written (default: info) */
	level?: LogLevel;
}

/**
 * Get the path to today's log file.
 */
export function getLogPath(dataDir: string): string {
	const logsDir = getLogsDir(dataDir);
	const date = new Date().toISOString().split('T')[0]; // YYYY-MM-DD
	return path.join(logsDir, `${date}.log`);
}

/**
 * Format a log entry.
 */
export function formatEntry(
	level: LogLevel,
	component: string,
	message: string,
	extra?: object | Error,
): string {
	const timestamp = new Date().toISOString();
	const levelStr = level.toUpperCase().padEnd(5);
	let entry = `[${timestamp}] [${levelStr}] ${component}: ${message}`;

	if (extra) {
		if (extra instanceof Error) {
			entry += `\n  Error: ${extra.message}`;
			if (extra.stack) {
				entry += `\n  Stack: ${extra.stack}`;
			}
			if (extra.cause instanceof Error) {
				entry += `\n  Cause: ${extra.cause.message}`;
			}
		} else {
			entry += `\n  ${JSON.stringify(extra)}`;
		}
	}

	return entry;
}

/**
 * Create a logger that writes to daily log files.
 * Log files are created in the <dataDir>/logs/ directory.
 */
export function createLogger(
	dataDir: string,
	options: LoggerOptions = {},
): Logger {
	const logsDir = getLogsDir(dataDir);
	const threshold = LEVEL_ORDER[options.level ?? 'info'];
	let initialized = false;

	function ensureDir() {
		if (!initialized) {
			fs.mkdirSync(logsDir, {recursive: true});
			initialized = true;
		}
	}

	function write(
		level: LogLevel,
		component: string,
		message: string,
		extra?: object,
	) {
		if (LEVEL_ORDER[level] < threshold) return;
		ensureDir();
		fs.appendFileSync(
			getLogPath(dataDir),
			formatEntry(level, component, message, extra) + '\n',
		);
	}

	return {
		debug(component: string, message: string, data?: object) {
			write('debug', component, message, data);
		},

		info(component: string, message: string, data?: object) {
			write('info', component, message, data);
		},

		warn(component: string, message: string, data?: object) {
			write('warn', component, message, data);
		},

		error(component: string, message: string, error?: Error | object) {
			write('error', component, message, error);
		},
	};
}

/**
 * Create a no-op logger for testing or when logging is disabled.
 */
export function createNullLogger(): Logger {
	return {
		debug() {},
		info() {},
		warn() {},
		error() {},
	};
}
