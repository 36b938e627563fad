/**
 * OpenAI-compatible chat provider. The default configuration targets a
 * local Ollama server, which speaks the same `/v1/chat/completions` API.
 */
import OpenAI from 'openai';
import type { ExplanationConfig } from '../config/config';
import { explanationPrompt, type ExplanationProvider } from './provider';

/** Text delta carried by one streamed chunk, or '' when there is none. */
export function chunkText(chunk: OpenAI.Chat.ChatCompletionChunk): string {
    return chunk.choices[0]?.delta?.content ?? '';
}

export class OpenAIExplanationProvider implements ExplanationProvider {
    readonly name = 'openai' as const;
    private readonly client: OpenAI;

    constructor(
        private readonly config: ExplanationConfig,
        client?: OpenAI,
    ) {
        this.client =
            client ??
            new OpenAI({
                baseURL: config.baseURL,
                apiKey: config.apiKey,
                // The front end calls a local server straight from the browser.
                dangerouslyAllowBrowser: true,
            });
    }

    async *stream(content: string, signal: AbortSignal): AsyncIterable<string> {
        const messages: OpenAI.Chat.ChatCompletionMessageParam[] = [
            { role: 'user', content: explanationPrompt(this.config.prompt, content) },
        ];

        const stream = await this.client.chat.completions.create(
            { model: this.config.model, messages, stream: true },
            { signal },
        );

        for await (const chunk of stream) {
            const delta = chunkText(chunk);
            if (delta) yield delta;
        }
    }
}
