/**
 * @license
 * Copyright (c) 2025, Internal Implementation
 *
 * This source code is licensed under the MIT license found in the
 * LICENSE file in the root directory of this source tree.
 */

/**
 * How an input string is split into comparable units.
 * - `code-unit`: UTF-16 code units, the way `String.prototype[i]` indexes.
 * - `code-point`: Unicode code points, so surrogate pairs stay whole.
 */
export type LcsUnit = 'code-unit' | 'code-point';

/**
 * Configuration options for the longest-common-substring search.
 */
export interface LcsOptions {
	/** The unit the two inputs are compared in. */
	unit?: LcsUnit;
	/** Runs shorter than this never enter the result. Values below 1 act as 1. */
	minLength?: number;
}

/**
 * The outcome of a search: every co-maximal common substring and their shared length.
 */
export interface LcsResult {
	/** Length of each substring, counted in the configured unit. 0 when there is none. */
	length: number;
	/** The longest common substrings, unique by value. */
	substrings: Set<string>;
}

/**
 * Sparse row of the dynamic programming matrix: inner index -> run length.
 * Only nonzero run lengths are stored.
 * @internal
 */
type SparseRow = Map<number, number>;

/**
 * Reads a run length from a sparse row. Unset keys are 0, and so is the
 * column left of the first one (index -1), which starts a run on every row.
 * @internal
 */
function runLengthAt(row: SparseRow, index: number): number {
	if (index < 0) return 0;
	return row.get(index) ?? 0;
}

/**
 * Splits a string into the units the search compares.
 * @internal
 */
function toUnits(str: string, unit: LcsUnit): string[] {
	return unit === 'code-point' ? Array.from(str) : str.split('');
}

/**
 * Finds every longest common substring of two sequences with the classic
 * dynamic programming recurrence:
 *
 *   run(i, j) = A[i] === B[j] ? run(i - 1, j - 1) + 1 : 0
 *
 * Only the current and previous rows are kept, and only their nonzero cells,
 * so the auxiliary space is bounded by the shorter input. Time is
 * O(len(str1) * len(str2)). For similar, highly overlapping inputs the
 * memory in use is on the order of twice their combined length.
 *
 * @example
 * ```typescript
 * const finder = new LongestCommonSubstring();
 * finder.search('xydxyaa', 'abcdxyz');
 * // => { length: 3, substrings: Set { 'dxy' } }
 * ```
 */
export class LongestCommonSubstring {
	public static readonly defaultOptions: Required<LcsOptions> = {
		unit: 'code-unit',
		minLength: 1,
	};

	/**
	 * Runs the search. Total over every pair of finite strings: an empty
	 * input, or two inputs with no unit in common, give an empty result.
	 *
	 * @param str1 - First sequence.
	 * @param str2 - Second sequence.
	 * @param options - Optional overrides of {@link LongestCommonSubstring.defaultOptions}.
	 */
	public search(str1: string, str2: string, options?: LcsOptions): LcsResult {
		const config: Required<LcsOptions> = {
			...LongestCommonSubstring.defaultOptions,
			...options,
		};
		const units1 = toUnits(str1, config.unit);
		const units2 = toUnits(str2, config.unit);

		// The inner loop walks the shorter input, which bounds the row size.
		const [hStr, vStr] = units1.length < units2.length
			? [units1, units2]
			: [units2, units1];

		let prevRow: SparseRow = new Map();
		let row: SparseRow = new Map();
		let longestStrings = new Set<string>();
		let maxLengthSeen = 0;

		for (const vChar of vStr) {
			for (let i = 0; i < hStr.length; i++) {
				if (hStr[i] !== vChar) continue;

				const commonLength = runLengthAt(prevRow, i - 1) + 1;
				row.set(i, commonLength);

				if (commonLength < maxLengthSeen) {
					continue;
				} else if (commonLength === maxLengthSeen) {
					longestStrings.add(this._slice(hStr, i, commonLength));
				} else {
					maxLengthSeen = commonLength;
					longestStrings = new Set([this._slice(hStr, i, commonLength)]);
				}
			}

			prevRow = row;
			row = new Map();
		}

		if (maxLengthSeen < config.minLength) {
			return { length: 0, substrings: new Set() };
		}
		return { length: maxLengthSeen, substrings: longestStrings };
	}

	/**
	 * Extracts the substring of `length` units that ends at `end` (inclusive).
	 * @private
	 */
	private _slice(units: string[], end: number, length: number): string {
		return units.slice(end - length + 1, end + 1).join('');
	}
}

const sharedFinder = new LongestCommonSubstring();

/**
 * Returns every longest common substring of `str1` and `str2`.
 * The result is unordered and empty when the inputs share nothing.
 *
 * @example
 * longestCommonSubstrings('xxx123yyyy456zzz', '789zzz012xxx345yyy');
 * // => Set { 'zzz', 'xxx', 'yyy' }
 */
export function longestCommonSubstrings(str1: string, str2: string, options?: LcsOptions): Set<string> {
	return sharedFinder.search(str1, str2, options).substrings;
}

export { longestCommonSubstrings as LCS };
