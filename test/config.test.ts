// test/config.test.ts
import { suite, teardown, test } from 'mocha';
import * as assert from 'assert';
import { getConfig, loadConfig, resetConfig } from '../src/config.js';
import { ConfigError } from '../src/index.js';

suite('loadConfig', () => {

    test('should apply defaults to an empty environment', () => {
        assert.deepStrictEqual(loadConfig({}), {
            COINCIDENCE_RANDOM_URL: 'https://en.wikipedia.org/wiki/Special:Random',
            COINCIDENCE_EXPORT_URL: 'https://en.wikipedia.org/wiki/Special:Export/',
            COINCIDENCE_USER_AGENT: 'coincidence/0.1',
            COINCIDENCE_TIMEOUT_MS: 30000,
            LOG_LEVEL: 'warn'
        });
    });

    test('should read and coerce variables', () => {
        const config = loadConfig({
            COINCIDENCE_EXPORT_URL: 'https://wiki.test/export/',
            COINCIDENCE_TIMEOUT_MS: '500',
            LOG_LEVEL: 'debug'
        });
        assert.strictEqual(config.COINCIDENCE_EXPORT_URL, 'https://wiki.test/export/');
        assert.strictEqual(config.COINCIDENCE_TIMEOUT_MS, 500);
        assert.strictEqual(config.LOG_LEVEL, 'debug');
    });

    test('should treat empty strings as unset', () => {
        assert.strictEqual(loadConfig({ COINCIDENCE_USER_AGENT: '' }).COINCIDENCE_USER_AGENT, 'coincidence/0.1');
    });

    const runInvalidTest = (variable: string, value: string) => {
        test(`should reject an invalid ${variable}`, () => {
            assert.throws(() => loadConfig({ [variable]: value }), (err: unknown) => {
                assert.ok(err instanceof ConfigError);
                assert.strictEqual(err.variable, variable);
                assert.ok(err.message.startsWith(`Invalid ${variable}: `));
                return true;
            });
        });
    };

    runInvalidTest('LOG_LEVEL', 'loud');
    runInvalidTest('COINCIDENCE_RANDOM_URL', 'not a url');
    runInvalidTest('COINCIDENCE_TIMEOUT_MS', '-1');
    runInvalidTest('COINCIDENCE_TIMEOUT_MS', 'soon');
});

suite('getConfig', () => {

    teardown(() => {
        delete process.env.COINCIDENCE_USER_AGENT;
        resetConfig();
    });

    test('should cache until reset', () => {
        process.env.COINCIDENCE_USER_AGENT = 'first-agent';
        resetConfig();
        assert.strictEqual(getConfig().COINCIDENCE_USER_AGENT, 'first-agent');

        process.env.COINCIDENCE_USER_AGENT = 'second-agent';
        assert.strictEqual(getConfig().COINCIDENCE_USER_AGENT, 'first-agent');

        resetConfig();
        assert.strictEqual(getConfig().COINCIDENCE_USER_AGENT, 'second-agent');
    });
});
