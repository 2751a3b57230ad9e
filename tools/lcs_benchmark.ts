import { performance } from 'perf_hooks';
import { LongestCommonSubstring, type LcsOptions } from '../src/index.js';

interface BenchmarkResult {
    name: string;
    time: number;
    memory: number;
    resultCount: number;
    resultLength: number;
    correctness: '✅ OK' | '❌ FAILED';
}

interface Subject {
    name: string;
    options: LcsOptions;
}

const subjects: Subject[] = [
    { name: 'code units', options: { unit: 'code-unit' } },
    { name: 'code points', options: { unit: 'code-point' } },
    { name: 'code units, minLength=16', options: { unit: 'code-unit', minLength: 16 } },
];

// --- Test Scenarios ---
// Deterministic text so runs are comparable between machines.
function makeText(length: number, seed: number, alphabet = 'abcdefghij '): string {
    let state = seed;
    let text = '';
    for (let i = 0; i < length; i++) {
        state = (Math.imul(state, 1664525) + 1013904223) >>> 0;
        text += alphabet[state % alphabet.length];
    }
    return text;
}

type Scenario = { str1: string; str2: string; planted: string };

const PLANTED = 'the longest common substring of both texts';

const scenarios: { [key: string]: () => Scenario } = {
    'Planted substring (2k x 2k)': () => ({
        str1: makeText(1000, 1) + PLANTED + makeText(1000, 2),
        str2: makeText(700, 3) + PLANTED + makeText(1300, 4),
        planted: PLANTED,
    }),
    'Planted substring, uneven lengths (500 x 8k)': () => ({
        str1: makeText(250, 5) + PLANTED + makeText(250, 6),
        str2: makeText(6000, 7) + PLANTED + makeText(2000, 8),
        planted: PLANTED,
    }),
    'Highly overlapping (3k x 3k)': () => {
        const shared = makeText(3000, 9, 'ab');
        return { str1: shared, str2: 'x' + shared.slice(1), planted: shared.slice(1) };
    },
};

// --- Runner ---
function runBenchmark(subject: Subject, scenario: Scenario): BenchmarkResult {
    const finder = new LongestCommonSubstring();

    // Warm-up run
    finder.search(scenario.str1, scenario.str2, subject.options);

    if (global.gc) {
        global.gc();
    }

    const startHeap = process.memoryUsage().heapUsed;
    const startTime = performance.now();
    const result = finder.search(scenario.str1, scenario.str2, subject.options);
    const endTime = performance.now();
    const endHeap = process.memoryUsage().heapUsed;

    // Every scenario plants a common substring at least as long as any accidental one
    const correctness = result.substrings.has(scenario.planted) ? '✅ OK' : '❌ FAILED';
    if (correctness !== '✅ OK') {
        console.error(`Verification FAILED for ${subject.name}: planted substring not found.`);
    }

    return {
        name: subject.name,
        time: endTime - startTime,
        memory: (endHeap - startHeap) / 1024,
        resultCount: result.substrings.size,
        resultLength: result.length,
        correctness,
    };
}

// --- Main Execution ---
function main(): void {
    console.log('Starting LongestCommonSubstring Benchmark...\n');

    for (const scenarioName in scenarios) {
        console.log(`=== Scenario: ${scenarioName} ===`);
        const scenario = scenarios[scenarioName]();

        const rows = subjects.map(subject => {
            const result = runBenchmark(subject, scenario);
            return {
                'Configuration': result.name,
                'Time (ms)': result.time.toFixed(2),
                'Heap Used (KB)': result.memory.toFixed(2),
                'Results': result.resultCount,
                'Length': result.resultLength,
                'Correctness': result.correctness,
            };
        });
        rows.sort((a, b) => parseFloat(a['Time (ms)']) - parseFloat(b['Time (ms)']));
        console.table(rows);
        console.log('\n');
    }
}

main();
