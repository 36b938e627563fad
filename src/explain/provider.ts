/**
 * Text-generation provider contract: an opaque, cancellable token stream.
 */
export interface ExplanationProvider {
    readonly name: string;
    /**
     * Stream the explanation of `content` chunk by chunk. Aborting `signal`
     * must end the iteration (by returning or throwing).
     */
    stream(content: string, signal: AbortSignal): AsyncIterable<string>;
}

/** User message sent for one explanation request. */
export function explanationPrompt(prompt: string, content: string): string {
    return `${prompt}\n\n${content}`;
}
