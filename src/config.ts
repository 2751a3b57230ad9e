/**
 * @license
 * Copyright (c) 2025, Internal Implementation
 *
 * This source code is licensed under the MIT license found in the
 * LICENSE file in the root directory of this source tree.
 */

import { z } from 'zod';
import { ConfigError } from './errors.js';

export const LOG_LEVELS = ['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent'] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

/**
 * Configuration schema definition, keyed by environment variable.
 */
const configSchema = {
	// Redirects to a random article; its final URL carries the title
	COINCIDENCE_RANDOM_URL: z.string().url().default('https://en.wikipedia.org/wiki/Special:Random'),

	// The title is appended to this URL to fetch the article as XML
	COINCIDENCE_EXPORT_URL: z.string().url().default('https://en.wikipedia.org/wiki/Special:Export/'),

	// Wikipedia rejects requests without a descriptive user agent
	COINCIDENCE_USER_AGENT: z.string().min(1).default('coincidence/0.1'),

	// Abort timeout per request
	COINCIDENCE_TIMEOUT_MS: z.coerce.number().int().positive().default(30_000),

	// Log level for pino logger
	LOG_LEVEL: z.enum(LOG_LEVELS).default('warn'),
};

type ConfigSchema = typeof configSchema;
export type Config = {
	[K in keyof ConfigSchema]: z.infer<ConfigSchema[K]>;
};

function parseVariable<T extends z.ZodTypeAny>(key: keyof ConfigSchema, schema: T, env: NodeJS.ProcessEnv): z.infer<T> {
	const raw = env[key];
	// Treat empty string as undefined so defaults apply
	const result = schema.safeParse(raw === '' ? undefined : raw);
	if (!result.success) {
		throw new ConfigError(key, result.error.issues.map(issue => issue.message).join('; '));
	}
	return result.data;
}

/**
 * Builds a validated config from an environment.
 * @throws {ConfigError} naming the first variable that fails validation.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
	return {
		COINCIDENCE_RANDOM_URL: parseVariable('COINCIDENCE_RANDOM_URL', configSchema.COINCIDENCE_RANDOM_URL, env),
		COINCIDENCE_EXPORT_URL: parseVariable('COINCIDENCE_EXPORT_URL', configSchema.COINCIDENCE_EXPORT_URL, env),
		COINCIDENCE_USER_AGENT: parseVariable('COINCIDENCE_USER_AGENT', configSchema.COINCIDENCE_USER_AGENT, env),
		COINCIDENCE_TIMEOUT_MS: parseVariable('COINCIDENCE_TIMEOUT_MS', configSchema.COINCIDENCE_TIMEOUT_MS, env),
		LOG_LEVEL: parseVariable('LOG_LEVEL', configSchema.LOG_LEVEL, env),
	};
}

let currentConfig: Config | undefined;

/**
 * Gets the current configuration object.
 * Config is created from `process.env` on first access and cached.
 */
export function getConfig(): Config {
	if (!currentConfig) {
		currentConfig = loadConfig();
	}
	return currentConfig;
}

/**
 * Resets the config cache (useful for testing)
 */
export function resetConfig(): void {
	currentConfig = undefined;
}
