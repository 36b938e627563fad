/**
 * Diagram runtime: the single-threaded core loop of one diagram.
 *
 * Background work (directory scans, explanation streams) only ever feeds
 * bounded channels. `tick(dt)` runs on the render loop and is the only place
 * where their events reach the store:
 *
 *   1. drain ingestion events, apply them in order, arm the fit debounce
 *   2. drain explanation updates into node text
 *   3. advance zoom and expansion animations
 *   4. run the debounced fit-to-view once it has elapsed
 *   5. publish the viewport snapshot for rendering
 */
import type { DetailNode, Point, Rect, Size, StaticFileEntry } from '../types/diagram';
import { defaultConfig, type DiagramConfig } from '../config/config';
import { createDiagramStore, detailBody, detailNodes, type DiagramStoreApi } from '../store/diagramStore';
import { ViewportController } from '../engine/viewport';
import { AnimationScheduler } from '../engine/animationScheduler';
import { sceneBounds } from '../engine/renderer';
import { rectFromCorners } from '../engine/geometry';
import { IngestionPipeline, readErrorText, truncationNote } from '../ingest/scanner';
import { StubSummaryProvider, type SummaryProvider } from '../ingest/summary';
import { isTextFile, type FileSystemProvider } from '../ingest/fileSystem';
import { ExplanationStreamHandler } from '../explain/streamHandler';
import type { ExplanationProvider } from '../explain/provider';
import { createLogger } from '../lib/logger';

const logger = createLogger('runtime');

export interface RuntimeOptions {
    explanationProvider: ExplanationProvider;
    config?: DiagramConfig;
    summaries?: SummaryProvider;
    viewport?: Size;
}

export interface FrameStats {
    /** Nodes created from ingestion events this frame. */
    created: number;
    /** Explanation updates of current runs applied this frame. */
    explained: number;
    /** Nodes whose expansion progress moved this frame. */
    animated: number;
    /** A debounced fit-to-view ran this frame. */
    fitted: boolean;
}

export class DiagramRuntime {
    readonly config: DiagramConfig;
    readonly store: DiagramStoreApi;
    readonly viewport: ViewportController;
    readonly scheduler: AnimationScheduler;
    readonly explanations: ExplanationStreamHandler;
    private readonly summaries: SummaryProvider;
    private pipeline: IngestionPipeline | null = null;
    /** Bumped by every `watch`/`loadFileList`; only the latest call installs its source. */
    private sourceGeneration = 0;
    /** Milliseconds of tick time left before the pending fit runs. */
    private fitCountdown: number | null = null;

    constructor(options: RuntimeOptions) {
        this.config = options.config ?? defaultConfig;
        this.store = createDiagramStore(this.config);
        this.viewport = new ViewportController(this.config.viewport, options.viewport);
        this.scheduler = new AnimationScheduler(this.store, this.viewport, this.config.expansion);
        this.explanations = new ExplanationStreamHandler(
            options.explanationProvider,
            this.config.explanation.channelCapacity,
        );
        this.summaries = options.summaries ?? new StubSummaryProvider();
        this.publishView();
    }

    get isWatching(): boolean {
        return this.pipeline?.isRunning ?? false;
    }

    get fitPending(): boolean {
        return this.fitCountdown !== null;
    }

    /* -------------------------------------------------------------- */
    /*  Diagram sources                                               */
    /* -------------------------------------------------------------- */

    /**
     * Rebuild the diagram for a new root directory and keep it in sync with
     * the filesystem until `stopWatching()`.
     */
    async watch(fs: FileSystemProvider, root: string, rootLabel = this.config.ingestion.rootLabel): Promise<void> {
        if (!(await this.clearSources())) return;
        this.store.getState().reset(rootLabel);
        this.pipeline = new IngestionPipeline({
            fs,
            summaries: this.summaries,
            config: { ...this.config.ingestion, rootLabel },
        });
        this.pipeline.start(root);
    }

    async stopWatching(): Promise<void> {
        await this.pipeline?.stop();
    }

    /** Replace the diagram with a static file list laid out on a ring. */
    async loadFileList(files: readonly StaticFileEntry[], rootLabel?: string): Promise<void> {
        if (!(await this.clearSources())) return;
        this.store.getState().initFromFileList(files, rootLabel);
        this.scheduler.syncViewTargets();
        this.scheduleFit();
    }

    /**
     * Stop the current source and its explanations. Resolves to false when a
     * later `watch` or `loadFileList` started meanwhile; that call owns the
     * diagram now.
     */
    /** Read `paths` from `fs` and show them as a static ring, without watching. */
    async loadFiles(fs: FileSystemProvider, paths: readonly string[], rootLabel?: string): Promise<void> {
        const { maxFileBytes, textExtensions } = this.config.ingestion;
        const entries = await Promise.all(
            paths.map(async (path): Promise<StaticFileEntry> => {
                const name = fs.baseName(path);
                if (!isTextFile(name, textExtensions)) return { name, path, content: null };
                const result = await fs.readFile(path, maxFileBytes);
                if (result.kind === 'error') return { name, path, content: readErrorText(result.message) };
                const note = result.truncated ? truncationNote(maxFileBytes) : null;
                return { name, path, content: detailBody(null, result.text, note) };
            }),
        );
        await this.loadFileList(entries, rootLabel);
    }

    private async clearSources(): Promise<boolean> {
        const generation = ++this.sourceGeneration;
        const previous = this.pipeline;
        this.pipeline = null;
        await previous?.stop();
        await this.explanations.reset();
        if (generation !== this.sourceGeneration) return false;
        // Anything still queued belongs to the previous diagram.
        this.explanations.updates.drain();
        this.scheduler.clear();
        this.fitCountdown = null;
        return true;
    }

    /* -------------------------------------------------------------- */
    /*  Frame loop                                                    */
    /* -------------------------------------------------------------- */

    tick(dt: number): FrameStats {
        const state = this.store.getState();

        const events = this.pipeline?.events.drain() ?? [];
        const created = state.applyIngestionEvents(events);
        if (created > 0) {
            logger.debug(`Applied ${events.length} events`, { created });
            this.scheduler.syncViewTargets();
            this.scheduleFit();
        }

        let explained = 0;
        for (const update of this.explanations.updates.drain()) {
            // Updates of a replaced or forgotten run would overwrite the current one.
            if (this.explanations.session(update.nodeId)?.id !== update.sessionId) continue;
            state.setExplanation(update.nodeId, { text: update.text, status: update.status });
            explained++;
        }

        const { advanced } = this.scheduler.tick(dt);

        let fitted = false;
        if (this.fitCountdown !== null) {
            this.fitCountdown -= dt;
            if (this.fitCountdown <= 0) {
                this.fitCountdown = null;
                this.fitToContent();
                fitted = true;
            }
        }

        this.publishView();
        return { created, explained, animated: advanced, fitted };
    }

    private scheduleFit(): void {
        this.fitCountdown = this.config.viewport.fitDebounceMs;
    }

    /** Mirror the controller into the store when anything changed. */
    private publishView(): void {
        const next = this.viewport.snapshot();
        const { view, setView } = this.store.getState();
        const unchanged =
            view.scale === next.scale &&
            view.center.x === next.center.x &&
            view.center.y === next.center.y &&
            view.viewport.width === next.viewport.width &&
            view.viewport.height === next.viewport.height;
        if (!unchanged) setView(next);
    }

    private afterViewChange(): number {
        this.scheduler.syncViewTargets();
        this.publishView();
        return this.viewport.scale;
    }

    /* -------------------------------------------------------------- */
    /*  View operations                                               */
    /* -------------------------------------------------------------- */

    setViewportSize(size: Size): void {
        this.viewport.setViewportSize(size);
        this.publishView();
    }

    zoomIn(): number {
        this.viewport.zoomIn();
        return this.afterViewChange();
    }

    zoomOut(): number {
        this.viewport.zoomOut();
        return this.afterViewChange();
    }

    resetZoom(): number {
        this.viewport.resetZoom();
        return this.afterViewChange();
    }

    zoomAt(factor: number, screenPoint: Point): number {
        this.viewport.zoomAt(factor, screenPoint);
        return this.afterViewChange();
    }

    /** Eased zoom; scale changes are picked up by subsequent ticks. */
    animateZoom(target: number): void {
        this.viewport.animateZoom(target);
    }

    fitToContent(): number {
        this.viewport.fitInView(sceneBounds(this.store.getState()));
        return this.afterViewChange();
    }

    /** Zoom to a rubber-band rectangle given in screen coordinates. */
    zoomToScreenRect(a: Point, b: Point): number {
        return this.zoomToRect(rectFromCorners(this.viewport.screenToScene(a), this.viewport.screenToScene(b)));
    }

    zoomToRect(rect: Rect): number {
        this.viewport.zoomToRect(rect);
        return this.afterViewChange();
    }

    panBy(dx: number, dy: number): void {
        this.viewport.panBy(dx, dy);
        this.publishView();
    }

    /* -------------------------------------------------------------- */
    /*  Node operations                                               */
    /* -------------------------------------------------------------- */

    toggleNode(nodeId: number): boolean {
        const expansion = this.store.getState().toggleExpanded(nodeId);
        if (!expansion) return false;
        this.scheduler.activate(nodeId);
        return true;
    }

    /** Drag a node by a screen-space delta. */
    dragNode(nodeId: number, dx: number, dy: number): void {
        const scale = this.viewport.scale;
        this.store.getState().moveNodeBy(nodeId, { x: dx / scale, y: dy / scale });
    }

    selectNode(nodeId: number | null): void {
        this.store.getState().selectNode(nodeId);
    }

    /* -------------------------------------------------------------- */
    /*  Explanations                                                  */
    /* -------------------------------------------------------------- */

    /** Start explaining a detail node's contents; false when not possible. */
    explain(nodeId: number): boolean {
        const node = this.store.getState().nodes[nodeId];
        if (node?.kind !== 'detail') return false;
        const started = this.explanations.start(nodeId, node.body ?? node.label);
        if (started) this.store.getState().setExplanation(nodeId, { showing: true });
        return started;
    }

    /** Stop one node's explanation, or every running one. */
    async stopExplanation(nodeId?: number): Promise<boolean> {
        if (nodeId !== undefined) return this.explanations.stop(nodeId);
        const running = this.explanations.runningNodeIds();
        await this.explanations.stopAll();
        return running.length > 0;
    }

    /** Explain the first detail, in creation order, never explained before. */
    explainNext(): number | null {
        const next = detailNodes(this.store.getState()).find(
            (node: DetailNode) => !this.explanations.hasExplained(node.id),
        );
        if (!next) return null;
        this.store.getState().selectNode(next.id);
        return this.explain(next.id) ? next.id : null;
    }

    toggleExplanationView(nodeId: number): void {
        this.store.getState().toggleExplanationView(nodeId);
    }

    async dispose(): Promise<void> {
        await this.stopWatching();
        await this.explanations.dispose();
        this.scheduler.clear();
    }
}
