/**
 * @license
 * Copyright (c) 2025, Internal Implementation
 *
 * This source code is licensed under the MIT license found in the
 * LICENSE file in the root directory of this source tree.
 */

/**
 * Base class for every error raised around the engine. The engine itself is
 * total and never throws.
 */
export class CoincidenceError extends Error {
	constructor(message: string, options?: { cause?: unknown }) {
		super(message, options);
		this.name = new.target.name;
	}
}

/**
 * An article could not be downloaded, or its export held no text.
 */
export class ArticleRetrievalError extends CoincidenceError {
	/** Short human-readable reason, printed after "Unable to retrieve articles". */
	readonly reason: string;

	constructor(reason: string, options?: { cause?: unknown }) {
		super(`Unable to retrieve articles, ${reason}`, options);
		this.reason = reason;
	}
}

/** The exported document is not well-formed XML. */
export class MarkupError extends CoincidenceError {}

/**
 * An environment variable failed validation.
 */
export class ConfigError extends CoincidenceError {
	readonly variable: string;

	constructor(variable: string, message: string) {
		super(`Invalid ${variable}: ${message}`);
		this.variable = variable;
	}
}
