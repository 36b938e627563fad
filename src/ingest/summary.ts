/**
 * Summary providers produce the short text shown on a detail node before any
 * explanation has been generated.
 */
import { extensionOf } from './fileSystem';

export interface SummaryProvider {
    summarize(path: string, name: string): string | Promise<string>;
}

const CANNED_SUMMARIES = [
    'This file contains important data structures',
    'Multiple function definitions found',
    'Appears to be a configuration file',
    'Complex algorithms detected',
    'Database interactions present',
    'Network communication code',
    'User interface components',
    'Testing framework implementation',
    'Data processing routines',
    'Authentication mechanisms',
] as const;

/** 32-bit FNV-1a. */
export function hashString(value: string): number {
    let hash = 0x811c9dc5;
    for (let i = 0; i < value.length; i++) {
        hash ^= value.charCodeAt(i);
        hash = Math.imul(hash, 0x01000193);
    }
    return hash >>> 0;
}

/**
 * Placeholder summaries: a canned phrase picked by path hash, tagged with
 * the file extension. The same path always gets the same summary.
 */
export class StubSummaryProvider implements SummaryProvider {
    summarize(path: string, name: string): string {
        const phrase = CANNED_SUMMARIES[hashString(path) % CANNED_SUMMARIES.length];
        return `${phrase} [${extensionOf(name)}]`;
    }
}
