/**
 * Filesystem provider backed by `node:fs` for running the scanner under
 * Node (CLI hosts, tests against a temporary directory).
 */
import type { Dirent } from 'node:fs';
import { open, readdir } from 'node:fs/promises';
import { basename, join } from 'node:path';
import { createLogger } from '../lib/logger';
import { toErrorMessage } from '../lib/errors';
import { decodeUtf8, sortNames, type DirectoryEntry, type FileSystemProvider, type ReadResult } from './fileSystem';

const logger = createLogger('fs');

async function listChildren(path: string, isRoot: boolean): Promise<Dirent[] | null> {
    try {
        return await readdir(path, { withFileTypes: true });
    } catch (err) {
        // A missing or unreadable root is the caller's problem; deeper failures only skip that subtree.
        if (isRoot) throw err;
        logger.warn(`Skipping unreadable directory ${path}`, { error: toErrorMessage(err) });
        return null;
    }
}

export class NodeFileSystem implements FileSystemProvider {
    walk(root: string, excluded: ReadonlySet<string>): AsyncIterable<DirectoryEntry> {
        return this.visit(root, basename(root), 0, excluded);
    }

    private async *visit(
        path: string,
        name: string,
        depth: number,
        excluded: ReadonlySet<string>,
    ): AsyncGenerator<DirectoryEntry> {
        const entries = await listChildren(path, depth === 0);
        if (!entries) return;

        const directories = sortNames(
            entries.filter((entry) => entry.isDirectory() && !excluded.has(entry.name)).map((entry) => entry.name),
        );
        const files = sortNames(entries.filter((entry) => entry.isFile()).map((entry) => entry.name));

        yield { path, name, depth, directories, files };

        for (const directory of directories) {
            yield* this.visit(join(path, directory), directory, depth + 1, excluded);
        }
    }

    async readFile(path: string, maxBytes: number): Promise<ReadResult> {
        try {
            const handle = await open(path, 'r');
            try {
                const { size } = await handle.stat();
                const length = Math.min(size, maxBytes);
                const buffer = new Uint8Array(length);
                const { bytesRead } = await handle.read(buffer, 0, length, 0);
                const truncated = size > maxBytes;
                return {
                    kind: 'text',
                    text: decodeUtf8(buffer.subarray(0, bytesRead), truncated),
                    size,
                    truncated,
                };
            } finally {
                await handle.close();
            }
        } catch (err) {
            return { kind: 'error', message: toErrorMessage(err) };
        }
    }

    joinPath(...parts: string[]): string {
        return join(...parts);
    }

    baseName(path: string): string {
        return basename(path);
    }
}
