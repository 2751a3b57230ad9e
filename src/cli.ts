/**
 * @license
 * Copyright (c) 2025, Internal Implementation
 *
 * This source code is licensed under the MIT license found in the
 * LICENSE file in the root directory of this source tree.
 */

import { Command, CommanderError, InvalidArgumentError, Option } from 'commander';
import { type Article, type FetchLike, fetchRandomArticles } from './article_source.js';
import { LOG_LEVELS, type LogLevel } from './config.js';
import { ArticleRetrievalError, ConfigError } from './errors.js';
import { LongestCommonSubstring, type LcsUnit } from './longest_common_substring.js';
import { configureLogger, getLog, logError, type LogSink } from './logger.js';
import { runSelfTest } from './self_test.js';

const ARTICLE_COUNT = 2;

/**
 * Streams and network access of one CLI run; replaced in tests.
 */
export interface CliIo {
	stdout: LogSink;
	stderr: LogSink;
	fetch?: FetchLike;
}

type CliOptions = {
	test: boolean;
	unit: LcsUnit;
	minLength: number;
	logLevel?: LogLevel;
};

function parsePositiveInt(value: string): number {
	const parsed = Number(value);
	if (!Number.isInteger(parsed) || parsed < 1) {
		throw new InvalidArgumentError('Must be a positive integer.');
	}
	return parsed;
}

export function createProgram(io: CliIo): Command {
	return new Command()
		.name('coincidence')
		.description('Find the longest common substring in two random Wikipedia articles.')
		.version('0.1.0')
		.option('-t, --test', 'run the built-in self-test instead of downloading articles', false)
		.addOption(
			new Option('--unit <unit>', 'compare UTF-16 code units or Unicode code points')
				.choices(['code-unit', 'code-point'])
				.default('code-unit'),
		)
		.option('--min-length <n>', 'ignore common substrings shorter than n', parsePositiveInt, 1)
		.addOption(new Option('--log-level <level>', 'override LOG_LEVEL').choices(LOG_LEVELS))
		.exitOverride()
		.configureOutput({
			writeOut: str => void io.stdout.write(str),
			writeErr: str => void io.stderr.write(str),
		});
}

function printSelfTest(io: CliIo): number {
	const report = runSelfTest();
	for (const result of report.results) {
		if (result.ok) {
			io.stdout.write(`ok   - ${result.name}\n`);
		} else {
			io.stdout.write(`FAIL - ${result.name}: expected ${result.expected}, got ${result.actual}\n`);
		}
	}
	io.stdout.write(`${report.passed} passed, ${report.failed} failed\n`);
	return report.failed === 0 ? 0 : 1;
}

function reportRetrievalFailure(io: CliIo, err: unknown): number {
	if (err instanceof ArticleRetrievalError) {
		io.stderr.write(`\nError: Unable to retrieve articles, ${err.reason}\n`);
		return 1;
	}
	throw err;
}

async function compareRandomArticles(io: CliIo, options: CliOptions): Promise<number> {
	const log = getLog(import.meta);

	io.stdout.write('Requesting two random Wikipedia articles...\n');
	let articles: Article[];
	try {
		articles = await fetchRandomArticles(ARTICLE_COUNT, io.fetch ? { fetch: io.fetch } : undefined);
	} catch (err) {
		return reportRetrievalFailure(io, err);
	}
	for (const article of articles) {
		io.stdout.write(`  Title: ${article.title}\n`);
	}

	io.stdout.write('Computing longest common sequence(s) in articles...\n');
	let texts: string[];
	try {
		texts = articles.map(article => article.getText());
	} catch (err) {
		return reportRetrievalFailure(io, err);
	}

	const [first, second] = texts;
	const { length, substrings } = new LongestCommonSubstring().search(first, second, {
		unit: options.unit,
		minLength: options.minLength,
	});
	log.info(`Found ${substrings.size} common substring(s) of length ${length}`);

	if (substrings.size === 0) {
		io.stdout.write('No common substring found.\n');
		return 0;
	}
	for (const sequence of [...substrings].sort()) {
		io.stdout.write(`sequence: ${JSON.stringify(sequence)}\n`);
	}
	return 0;
}

/**
 * Runs the program for the given `process.argv`-shaped arguments.
 * @returns The process exit code.
 */
export async function run(argv: readonly string[], io: CliIo = { stdout: process.stdout, stderr: process.stderr }): Promise<number> {
	const program = createProgram(io);
	try {
		await program.parseAsync(argv);
	} catch (err) {
		if (err instanceof CommanderError) {
			return err.exitCode;
		}
		throw err;
	}

	const options = program.opts<CliOptions>();
	configureLogger({ sink: io.stderr, level: options.logLevel });

	try {
		return options.test ? printSelfTest(io) : await compareRandomArticles(io, options);
	} catch (err) {
		// The logger reads config too and would throw the same ConfigError
		if (!(err instanceof ConfigError)) {
			logError(getLog(import.meta), err, 'coincidence failed');
		}
		io.stderr.write(`Error: ${err instanceof Error ? err.message : String(err)}\n`);
		return 1;
	}
}
