/**
 * @license
 * Copyright (c) 2025, Internal Implementation
 *
 * This source code is licensed under the MIT license found in the
 * LICENSE file in the root directory of this source tree.
 */

import pino from 'pino';
import { getConfig, type LogLevel } from './config.js';

export type Logger = pino.Logger;

/** Anything with a `write(string)` method; `process.stderr` by default. */
export interface LogSink {
	write(chunk: string): unknown;
}

interface LogRecord {
	time?: number;
	level?: number;
	module?: string;
	msg?: string;
	err?: { message?: string } | string;
}

function getModuleName(module: string | ImportMeta): string {
	const moduleUrl = typeof module === 'string' ? module : module.url;
	const lastSlashIndex = moduleUrl.lastIndexOf('/');
	const fileNameWithExtension = lastSlashIndex >= 0 ? moduleUrl.substring(lastSlashIndex + 1) : moduleUrl;
	const parts = fileNameWithExtension.split('.');
	return parts.length > 1 ? parts.slice(0, -1).join('.') : fileNameWithExtension;
}

const LEVEL_NAMES: Record<number, string> = {
	10: 'TRACE',
	20: 'DEBUG',
	30: 'INFO',
	40: 'WARN',
	50: 'ERROR',
	60: 'FATAL',
};

function formatTime(timestamp: number): string {
	const date = new Date(timestamp);
	const pad = (n: number) => n.toString().padStart(2, '0');
	return `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} ${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`;
}

/**
 * Formats one pino JSON record as a single line. Exported for tests.
 */
export function formatLogLine(chunk: string): string {
	let record: LogRecord;
	try {
		record = JSON.parse(chunk);
	} catch {
		// Not a pino record, pass it through untouched
		return chunk;
	}
	const time = formatTime(record.time ?? Date.now());
	const levelName = LEVEL_NAMES[record.level ?? 30] ?? 'LOG';
	const moduleName = record.module ?? 'unknown';
	const detail = typeof record.err === 'string' ? record.err : record.err?.message;
	const suffix = detail ? ` (${detail})` : '';
	return `[${time}] ${levelName} ${moduleName} - ${record.msg ?? ''}${suffix}\n`;
}

// Program output goes to stdout, so log lines go to stderr
let sink: LogSink = process.stderr;
let levelOverride: LogLevel | undefined;
let rootLogger: pino.Logger | undefined;

function getRootLogger(): pino.Logger {
	if (!rootLogger) {
		rootLogger = pino(
			{ level: levelOverride ?? getConfig().LOG_LEVEL },
			{ write: (chunk: string) => void sink.write(formatLogLine(chunk)) },
		);
	}
	return rootLogger;
}

/**
 * Get a logger for the specified module. The module name is derived from the file name.
 * Call `getLog(import.meta)` where the logger is needed; loggers obtained before
 * {@link configureLogger} keep the old level and sink.
 */
export function getLog(module: string | ImportMeta): Logger {
	return getRootLogger().child({ module: getModuleName(module) });
}

/**
 * Overrides the level from config and/or the destination of log lines.
 */
export function configureLogger(options: { level?: LogLevel; sink?: LogSink }): void {
	if (options.level !== undefined) levelOverride = options.level;
	if (options.sink !== undefined) sink = options.sink;
	rootLogger = undefined;
}

/**
 * Log an error with proper formatting
 */
export function logError(logger: Logger, err: unknown, message: string): void {
	if (err instanceof Error) {
		logger.error({ err }, message);
	} else {
		logger.error({ err: String(err) }, message);
	}
}

/**
 * Reset the logger to its defaults (useful for testing)
 */
export function resetLogger(): void {
	sink = process.stderr;
	levelOverride = undefined;
	rootLogger = undefined;
}
