import assert from 'node:assert/strict';
import test from 'node:test';
import { defaultConfig, overridesFromEnv, resolveConfig } from '../src/config/config.ts';
import { ConfigError } from '../src/lib/errors.ts';

test('resolveConfig without overrides returns the defaults', () => {
    assert.deepEqual(resolveConfig(), defaultConfig);
});

test('overrides merge field by field within a section', () => {
    const config = resolveConfig({ viewport: { maxScale: 5 }, explanation: { model: 'qwen2.5-coder' } });
    assert.equal(config.viewport.maxScale, 5);
    assert.equal(config.viewport.minScale, 0.1);
    assert.equal(config.explanation.model, 'qwen2.5-coder');
    assert.equal(config.explanation.baseURL, 'http://localhost:11434/v1');
});

test('resolveConfig never mutates the defaults', () => {
    resolveConfig({ layout: { topicRadius: 900 } });
    assert.equal(defaultConfig.layout.topicRadius, 500);
});

test('every invalid field is reported', () => {
    assert.throws(
        () =>
            resolveConfig({
                expansion: { speed: 0 },
                viewport: { zoomFactor: 1 },
                ingestion: { rootLabel: '  ' },
            }),
        (err: unknown) => {
            assert.ok(err instanceof ConfigError);
            assert.deepEqual(err.issues, [
                'expansion.speed must be within (0, 1] (got 0)',
                'viewport.zoomFactor must be greater than 1 (got 1)',
                'ingestion.rootLabel must not be empty',
            ]);
            assert.equal(
                err.message,
                'Invalid configuration: expansion.speed must be within (0, 1] (got 0); viewport.zoomFactor must be greater than 1 (got 1); ingestion.rootLabel must not be empty',
            );
            return true;
        },
    );
});

test('a scale range that is inverted is rejected', () => {
    assert.throws(() => resolveConfig({ viewport: { minScale: 2, maxScale: 1 } }), ConfigError);
});

test('environment variables become overrides', () => {
    const overrides = overridesFromEnv({
        VITE_EXPLAIN_BASE_URL: 'http://127.0.0.1:8080/v1',
        VITE_EXPLAIN_API_KEY: 'test-secret',
        VITE_EXPLAIN_MODEL: '',
        VITE_SCAN_INTERVAL_MS: '500',
        DEV: true,
    });
    assert.deepEqual(overrides, {
        explanation: { baseURL: 'http://127.0.0.1:8080/v1', apiKey: 'test-secret' },
        ingestion: { scanIntervalMs: 500 },
    });
    assert.equal(resolveConfig(overrides).ingestion.scanIntervalMs, 500);
});

test('a malformed number from the environment fails validation', () => {
    const overrides = overridesFromEnv({ VITE_SCAN_INTERVAL_MS: 'soon' });
    assert.throws(() => resolveConfig(overrides), {
        name: 'ConfigError',
        message: 'Invalid configuration: ingestion.scanIntervalMs must be a positive number (got NaN)',
    });
});

test('channel capacities and byte limits must be whole numbers', () => {
    assert.throws(
        () => resolveConfig({ ingestion: { channelCapacity: 2.5, maxFileBytes: 1024 }, explanation: { channelCapacity: 0 } }),
        {
            name: 'ConfigError',
            message:
                'Invalid configuration: ingestion.channelCapacity must be a positive integer (got 2.5); explanation.channelCapacity must be a positive integer (got 0)',
        },
    );
});
