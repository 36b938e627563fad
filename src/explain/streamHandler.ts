/**
 * Explanation streaming: one session per detail node.
 *
 *   idle ──start──▶ running ──stream ends / provider error──▶ finished
 *                   running ──stop()──▶ interrupted
 *
 * Sessions never touch the diagram. Every change of the accumulated text is
 * queued as an `ExplanationUpdate` that the runtime applies on its tick.
 */
import { nanoid } from 'nanoid';
import type { ExplanationStatus } from '../types/diagram';
import { EventChannel } from '../ingest/channel';
import { createLogger } from '../lib/logger';
import { ChannelClosedError, isAbortError, toErrorMessage } from '../lib/errors';
import type { ExplanationProvider } from './provider';

const logger = createLogger('explain');

export const INTERRUPTED_MARKER = '\n\n*Explanation interrupted.*';

export function errorChunk(message: string): string {
    return `**Error:** ${message}`;
}

export interface ExplanationUpdate {
    nodeId: number;
    sessionId: string;
    /** Full accumulated Markdown, not a delta. */
    text: string;
    status: ExplanationStatus;
}

export class ExplanationSession {
    private sessionId = '';
    private statusValue: ExplanationStatus = 'idle';
    private text = '';
    private controller: AbortController | null = null;
    private stopRequested = false;
    private worker: Promise<void> = Promise.resolve();

    constructor(
        readonly nodeId: number,
        private readonly provider: ExplanationProvider,
        private readonly updates: EventChannel<ExplanationUpdate>,
    ) {}

    /** Id of the latest run; '' before the first start. */
    get id(): string {
        return this.sessionId;
    }

    get status(): ExplanationStatus {
        return this.statusValue;
    }

    get accumulated(): string {
        return this.text;
    }

    /** Resolves when the current worker has exited. */
    get done(): Promise<void> {
        return this.worker;
    }

    /** Begin streaming; false when a run is already in progress. */
    start(content: string): boolean {
        if (this.statusValue === 'running') return false;

        const controller = new AbortController();
        this.controller = controller;
        this.sessionId = nanoid();
        this.stopRequested = false;
        this.text = '';
        this.statusValue = 'running';
        logger.info(`Explaining node ${this.nodeId}`, { session: this.sessionId, provider: this.provider.name });

        this.worker = this.publish().then(() => this.run(content, controller.signal));
        return true;
    }

    private async run(content: string, signal: AbortSignal): Promise<void> {
        try {
            for await (const chunk of this.provider.stream(content, signal)) {
                // Anything arriving after a stop request is discarded.
                if (this.stopRequested) break;
                this.text += chunk;
                await this.publish();
            }
            if (this.stopRequested) return;
            this.statusValue = 'finished';
            logger.success(`Explanation of node ${this.nodeId} finished`, { session: this.sessionId });
        } catch (err) {
            // stop() appends the marker and settles the session itself.
            if (this.stopRequested || (signal.aborted && isAbortError(err))) return;
            const message = toErrorMessage(err);
            logger.error(`Explanation of node ${this.nodeId} failed`, { session: this.sessionId, error: message });
            this.text += errorChunk(message);
            this.statusValue = 'finished';
        }
        await this.publish();
    }

    /**
     * Cancel a running stream, wait for the worker to exit, then append the
     * interruption marker. Resolves false when nothing was running.
     */
    async stop(): Promise<boolean> {
        if (this.statusValue !== 'running' || this.stopRequested) return false;
        this.stopRequested = true;
        this.controller?.abort();
        await this.worker;

        this.text += INTERRUPTED_MARKER;
        this.statusValue = 'interrupted';
        logger.info(`Explanation of node ${this.nodeId} interrupted`, { session: this.sessionId });
        await this.publish();
        return true;
    }

    private async publish(): Promise<void> {
        try {
            await this.updates.send({
                nodeId: this.nodeId,
                sessionId: this.sessionId,
                text: this.text,
                status: this.statusValue,
            });
        } catch (err) {
            if (!(err instanceof ChannelClosedError)) throw err;
            logger.debug('Update not delivered; channel closed', { node: this.nodeId });
        }
    }
}

/** Owns the sessions of one diagram and the channel they report through. */
export class ExplanationStreamHandler {
    readonly updates: EventChannel<ExplanationUpdate>;
    private readonly sessions = new Map<number, ExplanationSession>();

    constructor(
        private readonly provider: ExplanationProvider,
        capacity: number,
    ) {
        this.updates = new EventChannel<ExplanationUpdate>('explanation', capacity);
    }

    session(nodeId: number): ExplanationSession | undefined {
        return this.sessions.get(nodeId);
    }

    /** Start explaining `content` for a node; false when it is already running. */
    start(nodeId: number, content: string): boolean {
        let session = this.sessions.get(nodeId);
        if (!session) {
            session = new ExplanationSession(nodeId, this.provider, this.updates);
            this.sessions.set(nodeId, session);
        }
        return session.start(content);
    }

    stop(nodeId: number): Promise<boolean> {
        const session = this.sessions.get(nodeId);
        return session ? session.stop() : Promise.resolve(false);
    }

    async stopAll(): Promise<void> {
        await Promise.all([...this.sessions.values()].map((session) => session.stop()));
    }

    status(nodeId: number): ExplanationStatus {
        return this.sessions.get(nodeId)?.status ?? 'idle';
    }

    isRunning(nodeId: number): boolean {
        return this.status(nodeId) === 'running';
    }

    runningNodeIds(): number[] {
        return [...this.sessions.values()]
            .filter((session) => session.status === 'running')
            .map((session) => session.nodeId);
    }

    /** True once a session has ever been started for the node. */
    hasExplained(nodeId: number): boolean {
        return this.sessions.has(nodeId);
    }

    /** Stop everything and forget all sessions (diagram rebuilt). */
    async reset(): Promise<void> {
        await this.stopAll();
        this.sessions.clear();
    }

    /** Stop everything and close the update channel. */
    async dispose(): Promise<void> {
        await this.stopAll();
        this.updates.close();
    }
}
