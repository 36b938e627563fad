import assert from 'node:assert/strict';
import test, { before } from 'node:test';
import { setImmediate } from 'node:timers/promises';
import {
    ExplanationStreamHandler,
    INTERRUPTED_MARKER,
    errorChunk,
    type ExplanationUpdate,
} from '../src/explain/streamHandler.ts';
import type { ExplanationProvider } from '../src/explain/provider.ts';
import { setLogLevel } from '../src/lib/logger.ts';

interface ScriptOptions {
    /** Throw this message after the chunks. */
    failWith?: string;
    /** Keep the stream open until the signal aborts. */
    hold?: boolean;
    /** Wait for this promise before a final chunk, ignoring the signal. */
    gate?: Promise<void>;
}

class ScriptedProvider implements ExplanationProvider {
    readonly name = 'scripted';
    readonly requests: string[] = [];

    constructor(
        private readonly chunks: string[],
        private readonly options: ScriptOptions = {},
    ) {}

    async *stream(content: string, signal: AbortSignal): AsyncIterable<string> {
        this.requests.push(content);
        for (const chunk of this.chunks) yield chunk;
        if (this.options.gate) {
            await this.options.gate;
            yield 'late';
        }
        if (this.options.failWith) throw new Error(this.options.failWith);
        if (this.options.hold && !signal.aborted) {
            await new Promise<void>((resolve) => signal.addEventListener('abort', () => resolve(), { once: true }));
        }
    }
}

async function waitFor(condition: () => boolean): Promise<void> {
    for (let attempt = 0; attempt < 1000; attempt++) {
        if (condition()) return;
        await setImmediate();
    }
    assert.fail('condition never became true');
}

function statuses(updates: ExplanationUpdate[]): string[] {
    return updates.map((update) => `${update.status}:${update.text}`);
}

before(() => {
    setLogLevel('silent');
});

test('a stream that ends naturally finishes with the full text', async () => {
    const provider = new ScriptedProvider(['Adds ', 'two ', 'numbers.']);
    const handler = new ExplanationStreamHandler(provider, 16);

    assert.equal(handler.start(3, 'def add(a, b): return a + b'), true);
    assert.equal(handler.status(3), 'running');
    await handler.session(3)?.done;

    assert.equal(handler.status(3), 'finished');
    assert.deepEqual(provider.requests, ['def add(a, b): return a + b']);
    assert.deepEqual(statuses(handler.updates.drain()), [
        'running:',
        'running:Adds ',
        'running:Adds two ',
        'running:Adds two numbers.',
        'finished:Adds two numbers.',
    ]);
    assert.equal(await handler.stop(3), false);
});

test('stopping mid-stream keeps the received chunks and appends the marker', async () => {
    const handler = new ExplanationStreamHandler(new ScriptedProvider(['one ', 'two ', 'three'], { hold: true }), 16);
    handler.start(5, 'code');
    const session = handler.session(5);
    assert.ok(session);

    await waitFor(() => session.accumulated === 'one two three');
    assert.equal(await handler.stop(5), true);

    assert.equal(session.status, 'interrupted');
    assert.equal(session.accumulated, `one two three${INTERRUPTED_MARKER}`);
    const updates = handler.updates.drain();
    assert.deepEqual(updates.at(-1), {
        nodeId: 5,
        sessionId: session.id,
        text: 'one two three\n\n*Explanation interrupted.*',
        status: 'interrupted',
    });
});

test('chunks arriving after a stop request are discarded', async () => {
    let release = () => {};
    const gate = new Promise<void>((resolve) => {
        release = resolve;
    });
    const handler = new ExplanationStreamHandler(new ScriptedProvider(['first'], { gate }), 16);
    handler.start(1, 'code');
    const session = handler.session(1);
    assert.ok(session);
    await waitFor(() => session.accumulated === 'first');

    const stopping = handler.stop(1);
    release();
    assert.equal(await stopping, true);
    assert.equal(session.accumulated, `first${INTERRUPTED_MARKER}`);
});

test('a provider error is shown in the text and finishes the session', async () => {
    const handler = new ExplanationStreamHandler(new ScriptedProvider(['partial '], { failWith: 'model offline' }), 16);
    handler.start(2, 'code');
    await handler.session(2)?.done;

    assert.equal(handler.status(2), 'finished');
    assert.equal(handler.session(2)?.accumulated, 'partial **Error:** model offline');
    assert.equal(errorChunk('x'), '**Error:** x');
    assert.deepEqual(statuses(handler.updates.drain()).at(-1), 'finished:partial **Error:** model offline');
});

test('a running session refuses a second start; a finished one restarts fresh', async () => {
    const handler = new ExplanationStreamHandler(new ScriptedProvider(['text'], { hold: true }), 16);
    assert.equal(handler.start(4, 'code'), true);
    assert.equal(handler.start(4, 'code'), false);
    const firstId = handler.session(4)?.id;

    await handler.stop(4);
    assert.equal(handler.start(4, 'code'), true);
    assert.notEqual(handler.session(4)?.id, firstId);
    assert.equal(handler.session(4)?.accumulated, '');
    await handler.stop(4);
});

test('the handler tracks running and explained nodes', async () => {
    const handler = new ExplanationStreamHandler(new ScriptedProvider([], { hold: true }), 16);
    assert.equal(handler.status(9), 'idle');
    assert.equal(handler.hasExplained(9), false);

    handler.start(9, 'a');
    handler.start(10, 'b');
    assert.deepEqual(handler.runningNodeIds(), [9, 10]);
    assert.equal(handler.isRunning(10), true);

    await handler.stopAll();
    assert.deepEqual(handler.runningNodeIds(), []);
    assert.equal(handler.hasExplained(9), true);

    await handler.reset();
    assert.equal(handler.hasExplained(9), false);
});

test('dispose stops sessions and closes the update channel', async () => {
    const handler = new ExplanationStreamHandler(new ScriptedProvider(['x'], { hold: true }), 16);
    handler.start(1, 'code');
    await handler.dispose();

    assert.equal(handler.updates.isClosed, true);
    assert.equal(handler.status(1), 'interrupted');
});
