/**
 * In-memory filesystem provider.
 *
 * The browser front end fills it from the `File` objects of a directory
 * picker; tests fill it with plain strings. Paths use `/` separators and are
 * stored without leading `./` or trailing slashes.
 */
import { toErrorMessage } from '../lib/errors';
import { decodeUtf8, sortNames, type DirectoryEntry, type FileSystemProvider, type ReadResult } from './fileSystem';

/** Lazily readable file contents. */
export interface FileSource {
    size: number;
    /** At most `maxBytes` bytes of the file. */
    readBytes(maxBytes: number): Promise<Uint8Array>;
}

/** Minimal shape of a browser `File` picked from a directory input. */
export interface PickedFile extends Blob {
    readonly name: string;
    readonly webkitRelativePath: string;
}

export function textSource(text: string): FileSource {
    const bytes = new TextEncoder().encode(text);
    return {
        size: bytes.length,
        readBytes: (maxBytes) => Promise.resolve(bytes.subarray(0, maxBytes)),
    };
}

export function blobSource(blob: Blob): FileSource {
    return {
        size: blob.size,
        readBytes: async (maxBytes) => new Uint8Array(await blob.slice(0, maxBytes).arrayBuffer()),
    };
}

export function normalizePath(path: string): string {
    return path
        .split('/')
        .filter((part) => part.length > 0 && part !== '.')
        .join('/');
}

function parentOf(path: string): string | null {
    const slash = path.lastIndexOf('/');
    return slash < 0 ? null : path.slice(0, slash);
}

export class MemoryFileSystem implements FileSystemProvider {
    private readonly files = new Map<string, FileSource>();
    private readonly directories = new Set<string>();

    /** Build from a directory picker's file list (paths from `webkitRelativePath`). */
    static fromPickedFiles(files: Iterable<PickedFile>): MemoryFileSystem {
        const fs = new MemoryFileSystem();
        for (const file of files) {
            fs.addFile(file.webkitRelativePath || file.name, blobSource(file));
        }
        return fs;
    }

    /** Top-level directory names, i.e. candidate walk roots. */
    roots(): string[] {
        return sortNames([...this.directories].filter((dir) => !dir.includes('/')));
    }

    addDirectory(path: string): this {
        let current: string | null = normalizePath(path);
        while (current && !this.directories.has(current)) {
            this.directories.add(current);
            current = parentOf(current);
        }
        return this;
    }

    addFile(path: string, source: FileSource): this {
        const normalized = normalizePath(path);
        this.files.set(normalized, source);
        const parent = parentOf(normalized);
        if (parent) this.addDirectory(parent);
        return this;
    }

    addText(path: string, text: string): this {
        return this.addFile(path, textSource(text));
    }

    removeFile(path: string): boolean {
        return this.files.delete(normalizePath(path));
    }

    hasFile(path: string): boolean {
        return this.files.has(normalizePath(path));
    }

    walk(root: string, excluded: ReadonlySet<string>): AsyncIterable<DirectoryEntry> {
        return this.visit(normalizePath(root), 0, excluded);
    }

    private async *visit(path: string, depth: number, excluded: ReadonlySet<string>): AsyncGenerator<DirectoryEntry> {
        if (!this.directories.has(path)) {
            if (depth === 0) throw new Error(`Directory not found: ${path}`);
            return;
        }

        const directories = sortNames(this.childNames(path, this.directories)).filter((name) => !excluded.has(name));
        const files = sortNames(this.childNames(path, this.files.keys()));

        yield { path, name: this.baseName(path), depth, directories, files };

        for (const directory of directories) {
            yield* this.visit(this.joinPath(path, directory), depth + 1, excluded);
        }
    }

    private childNames(parent: string, paths: Iterable<string>): string[] {
        const names: string[] = [];
        for (const path of paths) {
            if (parentOf(path) === parent) names.push(this.baseName(path));
        }
        return names;
    }

    async readFile(path: string, maxBytes: number): Promise<ReadResult> {
        const source = this.files.get(normalizePath(path));
        if (!source) return { kind: 'error', message: `File not found: ${path}` };
        try {
            const bytes = await source.readBytes(maxBytes);
            const truncated = source.size > maxBytes;
            return { kind: 'text', text: decodeUtf8(bytes, truncated), size: source.size, truncated };
        } catch (err) {
            return { kind: 'error', message: toErrorMessage(err) };
        }
    }

    joinPath(...parts: string[]): string {
        return normalizePath(parts.join('/'));
    }

    baseName(path: string): string {
        const normalized = normalizePath(path);
        const slash = normalized.lastIndexOf('/');
        return slash < 0 ? normalized : normalized.slice(slash + 1);
    }
}
