/**
 * Zustand store — single source of truth for one diagram.
 *
 * All mutations go through this store and run on the render loop; the
 * background scanner and explanation sessions only ever queue events that
 * the runtime applies here. One store is created per diagram, there is no
 * module-level instance.
 */
import { createStore, type StoreApi } from 'zustand/vanilla';
import type {
    Connector,
    DetailNode,
    DiagramNode,
    DiagramState,
    ExpansionState,
    ExplanationView,
    IngestionEvent,
    LayoutMode,
    Point,
    RootNode,
    Size,
    StaticFileEntry,
    TopicNode,
    ViewState,
} from '../types/diagram';
import type { DiagramConfig } from '../config/config';
import { computeNodeSizing } from '../engine/nodeSizing';
import { createExpansion, effectiveTarget, retarget, toggleExpansion } from '../engine/expansion';
import { computeLayout } from '../engine/layout';
import { truncationNote } from '../ingest/scanner';

/* ------------------------------------------------------------------ */
/*  Helpers: keys and node factories                                  */
/* ------------------------------------------------------------------ */

export function topicKey(label: string): string {
    return `topic::${label}`;
}

export function detailKey(topicLabel: string, label: string): string {
    return `detail:${topicLabel}:${label}`;
}

/** Text a detail shows when expanded: file name, then its payload. */
export function detailText(label: string, body: string | null): string {
    return body ? `${label}\n${body}` : label;
}

/** Body of a detail: captured file text wins over the summary; `note` goes last. */
export function detailBody(summary: string | null, fileText: string | null, note: string | null = null): string | null {
    const body = fileText ? `File contents:\n\n${fileText}` : summary;
    if (!note) return body;
    return body ? `${body}\n\n${note}` : note;
}

const IDLE_EXPLANATION: ExplanationView = { text: '', status: 'idle', showing: false };

function createRoot(label: string, config: DiagramConfig): RootNode {
    return {
        id: 0,
        kind: 'root',
        label,
        sizing: computeNodeSizing(config.sizes.root, label, config.sizes),
        expansion: createExpansion(true),
        connectorIds: [],
    };
}

function sizeFor(kind: DiagramNode['kind'], config: DiagramConfig): Size {
    switch (kind) {
        case 'root':
            return config.sizes.root;
        case 'topic':
            return config.sizes.topic;
        case 'detail':
            return config.sizes.detail;
    }
}

/**
 * Working copy of the structural slices, mutated in place while a batch is
 * applied and committed with a single `set`.
 */
interface Draft {
    nodes: DiagramNode[];
    connectors: Connector[];
    topicIds: number[];
    keyIndex: Record<string, number>;
    responses: Record<string, string | null>;
    created: number;
}

function draftFrom(state: DiagramState): Draft {
    return {
        nodes: [...state.nodes],
        connectors: [...state.connectors],
        topicIds: [...state.topicIds],
        keyIndex: { ...state.keyIndex },
        responses: { ...state.responses },
        created: 0,
    };
}

function connect(draft: Draft, from: number, to: number): void {
    const id = draft.connectors.length;
    draft.connectors.push({ id, from, to });
    for (const nodeId of [from, to]) {
        const node = draft.nodes[nodeId];
        draft.nodes[nodeId] = { ...node, connectorIds: [...node.connectorIds, id] };
    }
}

function ensureTopic(
    draft: Draft,
    rootId: number,
    label: string,
    synthetic: boolean,
    withConnector: boolean,
    config: DiagramConfig,
): number {
    const key = topicKey(label);
    const existingId = draft.keyIndex[key];
    if (existingId !== undefined && draft.nodes[existingId]?.kind === 'topic') {
        return existingId;
    }

    const topic: TopicNode = {
        id: draft.nodes.length,
        kind: 'topic',
        label,
        sizing: computeNodeSizing(sizeFor('topic', config), label, config.sizes),
        expansion: createExpansion(true),
        connectorIds: [],
        detailIds: [],
        synthetic,
    };
    draft.nodes.push(topic);
    draft.topicIds.push(topic.id);
    draft.keyIndex[key] = topic.id;
    draft.created++;
    if (withConnector) connect(draft, rootId, topic.id);
    return topic.id;
}

function addDetail(
    draft: Draft,
    topicId: number,
    label: string,
    path: string | null,
    body: string | null,
    withConnector: boolean,
    config: DiagramConfig,
): DetailNode | null {
    const topic = draft.nodes[topicId];
    if (topic?.kind !== 'topic') return null;

    const key = detailKey(topic.label, label);
    if (draft.keyIndex[key] !== undefined) return null;

    const detail: DetailNode = {
        id: draft.nodes.length,
        kind: 'detail',
        label,
        sizing: computeNodeSizing(sizeFor('detail', config), detailText(label, body), config.sizes),
        expansion: createExpansion(false),
        connectorIds: [],
        topicId,
        path,
        body,
        explanation: IDLE_EXPLANATION,
    };
    draft.nodes.push(detail);
    draft.nodes[topicId] = { ...topic, detailIds: [...topic.detailIds, detail.id] };
    draft.keyIndex[key] = detail.id;
    draft.responses[label] = body;
    draft.created++;
    if (withConnector) connect(draft, topicId, detail.id);
    return detail;
}

/* ------------------------------------------------------------------ */
/*  Store actions                                                     */
/* ------------------------------------------------------------------ */

export interface DiagramActions {
    /** Drop every node and start over with a fresh root. */
    reset: (rootLabel?: string) => void;
    /** Apply queued ingestion events in order; returns the number of nodes created. */
    applyIngestionEvents: (events: readonly IngestionEvent[]) => number;
    /** Rebuild the diagram from a static file list laid out on a ring. */
    initFromFileList: (files: readonly StaticFileEntry[], rootLabel?: string) => void;
    /** Flip a node's requested expansion; returns the new state. */
    toggleExpanded: (nodeId: number) => ExpansionState | null;
    /** Commit animation progress computed by the scheduler. */
    setExpansions: (updates: ReadonlyMap<number, ExpansionState>) => void;
    /** Persist a node's position after a drag. */
    setNodePosition: (nodeId: number, position: Point) => void;
    /** Move a node by a scene-space delta (drag in progress). */
    moveNodeBy: (nodeId: number, delta: Point) => void;
    /** Update a detail's explanation text and status. */
    setExplanation: (nodeId: number, patch: Partial<ExplanationView>) => void;
    /** Switch a detail between its body and its explanation. */
    toggleExplanationView: (nodeId: number) => void;
    selectNode: (nodeId: number | null) => void;
    /** Mirror the viewport controller's state for rendering. */
    setView: (view: ViewState) => void;
}

export type DiagramStore = DiagramState & DiagramActions;
export type DiagramStoreApi = StoreApi<DiagramStore>;

function initialState(rootLabel: string, config: DiagramConfig, layoutMode: LayoutMode = 'radial'): DiagramState {
    const root = createRoot(rootLabel, config);
    const nodes: DiagramNode[] = [root];
    const topicIds: number[] = [];
    const base = { rootId: root.id, nodes, topicIds, layoutMode };
    return {
        ...base,
        connectors: [],
        keyIndex: {},
        responses: {},
        layout: computeLayout(base, config.layout),
        selectedNodeId: null,
        view: { scale: 1, center: { x: 0, y: 0 }, viewport: { width: 800, height: 600 } },
        revision: 0,
    };
}

/* ------------------------------------------------------------------ */
/*  Store definition                                                  */
/* ------------------------------------------------------------------ */

export function createDiagramStore(config: DiagramConfig): DiagramStoreApi {
    return createStore<DiagramStore>((set, get) => {
        const withLayout = (state: DiagramState, patch: Partial<DiagramState>): Partial<DiagramState> => {
            const next = { ...state, ...patch };
            return { ...patch, layout: computeLayout(next, config.layout) };
        };

        const updateNode = (nodeId: number, update: (node: DiagramNode) => DiagramNode | null): boolean => {
            const node = get().nodes[nodeId];
            if (!node) return false;
            const next = update(node);
            if (!next) return false;
            set((state) => {
                const nodes = [...state.nodes];
                nodes[nodeId] = next;
                return { nodes };
            });
            return true;
        };

        return {
            // --- Initial state ---
            ...initialState(config.ingestion.rootLabel, config),

            // --- Actions ---

            reset(rootLabel = config.ingestion.rootLabel) {
                const view = get().view;
                set((state) => ({ ...initialState(rootLabel, config), view, revision: state.revision + 1 }));
            },

            applyIngestionEvents(events) {
                if (events.length === 0) return 0;
                const state = get();
                const draft = draftFrom(state);
                const rootLabel = state.nodes[state.rootId].label;
                const { rootFilesTopic } = config.ingestion;

                for (const event of events) {
                    switch (event.kind) {
                        case 'subtopic':
                            ensureTopic(draft, state.rootId, event.content, false, true, config);
                            break;
                        case 'detail': {
                            const inRoot = event.parent === rootLabel;
                            const topicLabel = inRoot ? rootFilesTopic : event.parent;
                            // Details may arrive before their directory event; the topic is created on demand.
                            const topicId = ensureTopic(draft, state.rootId, topicLabel, inRoot, true, config);
                            addDetail(
                                draft,
                                topicId,
                                event.content,
                                event.path,
                                detailBody(
                                    event.summary,
                                    event.fileText,
                                    event.truncated ? truncationNote(config.ingestion.maxFileBytes) : null,
                                ),
                                true,
                                config,
                            );
                            break;
                        }
                    }
                }

                if (draft.created === 0) return 0;
                set((current) =>
                    withLayout(current, {
                        nodes: draft.nodes,
                        connectors: draft.connectors,
                        topicIds: draft.topicIds,
                        keyIndex: draft.keyIndex,
                        responses: draft.responses,
                        revision: current.revision + 1,
                    }),
                );
                return draft.created;
            },

            initFromFileList(files, rootLabel = config.ingestion.rootLabel) {
                const fresh = initialState(rootLabel, config, 'ring');
                const draft = draftFrom(fresh);
                const topicId = ensureTopic(draft, fresh.rootId, config.ingestion.rootFilesTopic, true, false, config);
                for (const file of files) {
                    addDetail(draft, topicId, file.name, file.path, file.content, false, config);
                }
                const view = get().view;
                set((state) =>
                    withLayout(fresh, {
                        ...fresh,
                        nodes: draft.nodes,
                        connectors: draft.connectors,
                        topicIds: draft.topicIds,
                        keyIndex: draft.keyIndex,
                        responses: draft.responses,
                        view,
                        revision: state.revision + 1,
                    }),
                );
            },

            toggleExpanded(nodeId) {
                const { nodes, view } = get();
                const node = nodes[nodeId];
                if (!node) return null;
                const toggled: DiagramNode = { ...node, expansion: toggleExpansion(node.expansion) };
                const expansion = retarget(toggled.expansion, effectiveTarget(toggled, view, config.expansion));
                updateNode(nodeId, () => ({ ...toggled, expansion }));
                return expansion;
            },

            setExpansions(updates) {
                if (updates.size === 0) return;
                set((state) => {
                    const nodes = [...state.nodes];
                    for (const [nodeId, expansion] of updates) {
                        const node = nodes[nodeId];
                        if (node) nodes[nodeId] = { ...node, expansion };
                    }
                    return { nodes };
                });
            },

            setNodePosition(nodeId, position) {
                const node = get().nodes[nodeId];
                if (!node) return;
                const previous = node.manualPosition;
                if (previous && previous.x === position.x && previous.y === position.y) return;
                set((state) => {
                    const nodes = [...state.nodes];
                    nodes[nodeId] = { ...node, manualPosition: { x: position.x, y: position.y } };
                    return withLayout(state, { nodes });
                });
            },

            moveNodeBy(nodeId, delta) {
                const { layout } = get();
                const current = layout[nodeId];
                if (!current) return;
                get().setNodePosition(nodeId, { x: current.x + delta.x, y: current.y + delta.y });
            },

            setExplanation(nodeId, patch) {
                updateNode(nodeId, (node) => {
                    if (node.kind !== 'detail') return null;
                    return { ...node, explanation: { ...node.explanation, ...patch } };
                });
            },

            toggleExplanationView(nodeId) {
                updateNode(nodeId, (node) => {
                    if (node.kind !== 'detail') return null;
                    return {
                        ...node,
                        explanation: { ...node.explanation, showing: !node.explanation.showing },
                    };
                });
            },

            selectNode(nodeId) {
                set({ selectedNodeId: nodeId });
            },

            setView(view) {
                set({ view });
            },
        };
    });
}

/* ------------------------------------------------------------------ */
/*  Selectors                                                         */
/* ------------------------------------------------------------------ */

/** Topic label → ordered detail ids. */
export function topicMembership(state: Pick<DiagramState, 'nodes' | 'topicIds'>): Map<string, number[]> {
    const membership = new Map<string, number[]>();
    for (const id of state.topicIds) {
        const topic = state.nodes[id];
        if (topic?.kind === 'topic') membership.set(topic.label, [...topic.detailIds]);
    }
    return membership;
}

export function detailNodes(state: Pick<DiagramState, 'nodes'>): DetailNode[] {
    return state.nodes.filter((node): node is DetailNode => node.kind === 'detail');
}

export function findNodeByKey(state: Pick<DiagramState, 'nodes' | 'keyIndex'>, key: string): DiagramNode | null {
    const id = state.keyIndex[key];
    return id === undefined ? null : (state.nodes[id] ?? null);
}
