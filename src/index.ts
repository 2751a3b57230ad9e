// src/index.ts
// version: 0.1.0

/**
 * @license
 * Copyright (c) 2025, Internal Implementation
 *
 * This source code is licensed under the MIT license found in the
 * LICENSE file in the root directory of this source tree.
 */

// Core Engine and Types
export {
	LCS,
	LongestCommonSubstring,
	longestCommonSubstrings,
	type LcsOptions,
	type LcsResult,
	type LcsUnit
} from './longest_common_substring.js';

// Document Source
export {
	Article,
	fetchRandomArticle,
	fetchRandomArticles,
	titleFromUrl,
	type ArticleSourceOptions,
	type FetchLike
} from './article_source.js';
export { extractMarkupText, stripMarkup } from './markup.js';

// Self-test and Errors
export { runSelfTest, selfTestCases, type SelfTestCase, type SelfTestReport, type SelfTestResult } from './self_test.js';
export { ArticleRetrievalError, CoincidenceError, ConfigError, MarkupError } from './errors.js';
