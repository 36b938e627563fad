import DOMPurify from 'dompurify';
import { marked } from 'marked';

type SanitizerWindow = Parameters<typeof DOMPurify>[0];

let purifier = DOMPurify;

/** Sanitize against the DOM of `window` instead of the global one. */
export function setSanitizerWindow(window: SanitizerWindow): void {
    purifier = DOMPurify(window);
}

/**
 * Render accumulated explanation Markdown to sanitized HTML (synchronous).
 * Model output is untrusted, so nothing reaches the page unsanitized.
 */
export function renderMarkdown(markdown: string): string {
    if (!purifier.isSupported) {
        throw new Error('Rendering explanations needs a DOM to sanitize HTML');
    }
    return purifier.sanitize(marked.parser(marked.lexer(markdown)));
}
