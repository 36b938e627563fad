/**
 * Filesystem provider contract used by the directory scanner, plus the
 * path and text helpers shared by its implementations.
 */

/** One directory visited by a walk. */
export interface DirectoryEntry {
    /** Full path of the directory (the walk root for depth 0). */
    path: string;
    name: string;
    depth: number;
    /** Child directory names that will be visited, sorted. */
    directories: string[];
    /** File names, sorted. */
    files: string[];
}

export type ReadResult =
    | { kind: 'text'; text: string; size: number; truncated: boolean }
    | { kind: 'error'; message: string };

export interface FileSystemProvider {
    /**
     * Visit every directory under `root` top-down (a directory before its
     * children), children in name order, never entering an excluded name.
     */
    walk(root: string, excluded: ReadonlySet<string>): AsyncIterable<DirectoryEntry>;
    /** Read at most `maxBytes` bytes as UTF-8. Failures come back as an `error` result. */
    readFile(path: string, maxBytes: number): Promise<ReadResult>;
    joinPath(...parts: string[]): string;
    baseName(path: string): string;
}

/** Lower-cased extension including the dot, or '' when there is none. */
export function extensionOf(name: string): string {
    const dot = name.lastIndexOf('.');
    if (dot <= 0 || dot === name.length - 1) return '';
    return name.slice(dot).toLowerCase();
}

export function isTextFile(name: string, textExtensions: readonly string[]): boolean {
    const ext = extensionOf(name);
    return ext !== '' && textExtensions.includes(ext);
}

export function sortNames(names: Iterable<string>): string[] {
    return [...names].sort((a, b) => (a < b ? -1 : a > b ? 1 : 0));
}

/**
 * Decode UTF-8 bytes. When `cut` is set the bytes end at a size ceiling and a
 * character split by it is dropped rather than decoded as U+FFFD.
 */
export function decodeUtf8(bytes: Uint8Array, cut: boolean): string {
    // In stream mode an incomplete trailing sequence is held back, not emitted.
    return new TextDecoder('utf-8').decode(bytes, { stream: cut });
}
