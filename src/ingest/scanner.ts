/**
 * Directory scanner and deduplicating ingestion pipeline.
 *
 * `scanDirectory` turns one walk into an ordered stream of ingestion events.
 * `IngestionPipeline` repeats that walk on an interval, drops every event
 * whose key it has already forwarded, and pushes the rest into a bounded
 * channel that the runtime drains on the render loop.
 */
import type { DetailEvent, IngestionEvent } from '../types/diagram';
import type { IngestionConfig } from '../config/config';
import { createLogger } from '../lib/logger';
import { toErrorMessage } from '../lib/errors';
import { EventChannel } from './channel';
import { isTextFile, type FileSystemProvider } from './fileSystem';
import type { SummaryProvider } from './summary';

const logger = createLogger('ingest');

export function eventKey(event: Pick<IngestionEvent, 'kind' | 'parent' | 'content'>): string {
    return `${event.kind}:${event.parent}:${event.content}`;
}

export function truncationNote(maxBytes: number): string {
    return `File too large to display (showing first ${maxBytes} bytes)...`;
}

export function readErrorText(message: string): string {
    return `Error reading file: ${message}`;
}

/* ------------------------------------------------------------------ */
/*  Single walk                                                       */
/* ------------------------------------------------------------------ */

export interface ScanSources {
    fs: FileSystemProvider;
    summaries: SummaryProvider;
    config: IngestionConfig;
}

async function describeFile(
    sources: ScanSources,
    path: string,
    name: string,
): Promise<Pick<DetailEvent, 'summary' | 'fileText' | 'truncated'>> {
    const { fs, summaries, config } = sources;
    const summary = await summaries.summarize(path, name);
    if (!isTextFile(name, config.textExtensions)) {
        return { summary, fileText: null };
    }

    const result = await fs.readFile(path, config.maxFileBytes);
    switch (result.kind) {
        case 'error':
            return { summary: readErrorText(result.message), fileText: null };
        case 'text':
            return { summary, fileText: result.text, truncated: result.truncated };
    }
}

/**
 * Walk `root` once. Every directory below the root yields a `subtopic`
 * (parent = enclosing directory, or the root label at the first level);
 * every file yields a `detail` whose parent is its directory, or the root
 * label for files directly under the root.
 */
export async function* scanDirectory(
    sources: ScanSources,
    root: string,
    signal?: AbortSignal,
): AsyncGenerator<IngestionEvent> {
    const { fs, config } = sources;
    const excluded = new Set(config.excludedDirectories);
    // Directory names along the current walk path, indexed by depth.
    const lineage: string[] = [];

    for await (const entry of fs.walk(root, excluded)) {
        if (signal?.aborted) return;
        lineage[entry.depth] = entry.name;

        if (entry.depth > 0) {
            const parent = entry.depth === 1 ? config.rootLabel : lineage[entry.depth - 1];
            yield { kind: 'subtopic', parent, content: entry.name, path: entry.path };
        }

        const owner = entry.depth === 0 ? config.rootLabel : entry.name;
        for (const file of entry.files) {
            if (signal?.aborted) return;
            const path = fs.joinPath(entry.path, file);
            const described = await describeFile(sources, path, file);
            yield { kind: 'detail', parent: owner, content: file, path, ...described };
        }
    }
}

/* ------------------------------------------------------------------ */
/*  Repeating pipeline                                                */
/* ------------------------------------------------------------------ */

function sleep(ms: number, signal: AbortSignal): Promise<void> {
    return new Promise((resolve) => {
        if (signal.aborted) {
            resolve();
            return;
        }
        const onAbort = () => {
            clearTimeout(timer);
            resolve();
        };
        const timer = setTimeout(() => {
            signal.removeEventListener('abort', onAbort);
            resolve();
        }, ms);
        signal.addEventListener('abort', onAbort, { once: true });
    });
}

export class IngestionPipeline {
    /** Forwarded events, drained by the runtime once per tick. */
    readonly events: EventChannel<IngestionEvent>;
    private readonly seen = new Set<string>();
    private controller: AbortController | null = null;
    private loop: Promise<void> | null = null;

    constructor(private readonly sources: ScanSources) {
        this.events = new EventChannel<IngestionEvent>('ingestion', sources.config.channelCapacity);
    }

    get isRunning(): boolean {
        return this.loop !== null;
    }

    /** Number of distinct keys forwarded so far. */
    get seenCount(): number {
        return this.seen.size;
    }

    hasSeen(event: Pick<IngestionEvent, 'kind' | 'parent' | 'content'>): boolean {
        return this.seen.has(eventKey(event));
    }

    /**
     * Walk once and forward every event with an unseen key. Resolves with the
     * number of events forwarded; waits while the channel is full.
     */
    async scanOnce(root: string, signal?: AbortSignal): Promise<number> {
        let forwarded = 0;
        for await (const event of scanDirectory(this.sources, root, signal)) {
            const key = eventKey(event);
            if (this.seen.has(key)) continue;
            this.seen.add(key);
            logger.debug(`New ${event.kind}`, { key });
            await this.events.send(event);
            forwarded++;
        }
        if (forwarded > 0) {
            logger.info(`Scan of ${root} forwarded ${forwarded} new entries`, { seen: this.seen.size });
        }
        return forwarded;
    }

    /** Scan `root` now and then every `scanIntervalMs` until `stop()`. */
    start(root: string): void {
        if (this.loop) {
            logger.warn('Ingestion already running; ignoring start', { root });
            return;
        }
        const controller = new AbortController();
        this.controller = controller;
        this.loop = this.run(root, controller.signal);
        logger.info(`Watching ${root}`);
    }

    private async run(root: string, signal: AbortSignal): Promise<void> {
        while (!signal.aborted) {
            try {
                await this.scanOnce(root, signal);
            } catch (err) {
                if (signal.aborted) break;
                logger.error('Scan failed; retrying on next interval', { root, error: toErrorMessage(err) });
            }
            await sleep(this.sources.config.scanIntervalMs, signal);
        }
    }

    /**
     * Stop the loop and close the channel. Already forwarded events stay
     * drainable; resolves once the loop has exited.
     */
    async stop(): Promise<void> {
        this.controller?.abort();
        this.events.close();
        const loop = this.loop;
        this.loop = null;
        this.controller = null;
        if (loop) {
            await loop;
            logger.success('Ingestion stopped', { seen: this.seen.size });
        }
    }
}
