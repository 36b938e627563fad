import assert from 'node:assert/strict';
import test, { mock } from 'node:test';
import OpenAI from 'openai';
import { OpenAIExplanationProvider, chunkText } from '../src/explain/openaiProvider.ts';
import { explanationPrompt } from '../src/explain/provider.ts';
import { defaultConfig } from '../src/config/config.ts';

function chunk(content: string | null | undefined): OpenAI.Chat.ChatCompletionChunk {
    return {
        id: 'chunk-1',
        object: 'chat.completion.chunk',
        created: 0,
        model: 'test-model',
        choices: [{ index: 0, delta: content === undefined ? {} : { content }, finish_reason: null }],
    };
}

test('chunkText reads the first delta', () => {
    assert.equal(chunkText(chunk('Hello')), 'Hello');
    assert.equal(chunkText(chunk(null)), '');
    assert.equal(chunkText(chunk(undefined)), '');
    assert.equal(chunkText({ ...chunk('x'), choices: [] }), '');
});

test('the prompt precedes the content', () => {
    assert.equal(explanationPrompt('Explain:', 'x = 1'), 'Explain:\n\nx = 1');
});

test('the provider streams non-empty deltas from the chat completions API', async () => {
    const client = new OpenAI({ apiKey: 'test-secret', baseURL: 'http://localhost:11434/v1' });
    const requests: unknown[] = [];
    mock.method(client.chat.completions, 'create', async (body: unknown, options: unknown) => {
        requests.push(body, options);
        return (async function* () {
            yield chunk('Adds ');
            yield chunk(null);
            yield chunk('numbers.');
        })();
    });

    const config = { ...defaultConfig.explanation, model: 'test-model', prompt: 'Explain:' };
    const provider = new OpenAIExplanationProvider(config, client);
    const signal = new AbortController().signal;
    const received: string[] = [];
    for await (const text of provider.stream('x = 1', signal)) received.push(text);

    assert.deepEqual(received, ['Adds ', 'numbers.']);
    assert.deepEqual(requests, [
        {
            model: 'test-model',
            messages: [{ role: 'user', content: 'Explain:\n\nx = 1' }],
            stream: true,
        },
        { signal },
    ]);
    assert.equal(provider.name, 'openai');
    mock.restoreAll();
});
