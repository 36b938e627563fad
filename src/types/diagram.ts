/**
 * Core semantic types for the codeorbit diagram model.
 *
 * Design: nodes and connectors live in flat arenas addressed by integer id.
 * A connector only names its two endpoint ids; a node only lists the ids of
 * the connectors touching it. Nothing owns anything else.
 */

export interface Point {
    x: number;
    y: number;
}

export interface Size {
    width: number;
    height: number;
}

/** Axis-aligned rectangle given by its top-left corner. */
export interface Rect {
    x: number;
    y: number;
    width: number;
    height: number;
}

export type NodeKind = 'root' | 'topic' | 'detail';

export interface NodeSizing {
    minSize: Size;
    collapsedSize: Size;
    expandedSize: Size;
}

/**
 * Animation state of one node. `requested` is the user's explicit wish;
 * `target` is what the animation actually heads for (a view rule may force
 * it to 0).
 */
export interface ExpansionState {
    progress: number;
    target: 0 | 1;
    requested: boolean;
}

export type ExpansionPhase = 'collapsed' | 'expanding' | 'expanded' | 'collapsing';

export type ExplanationStatus = 'idle' | 'running' | 'finished' | 'interrupted';

export interface ExplanationView {
    /** Accumulated Markdown of the latest session. */
    text: string;
    status: ExplanationStatus;
    /** Show the explanation instead of the file body. */
    showing: boolean;
}

interface NodeBase {
    id: number;
    label: string;
    sizing: NodeSizing;
    expansion: ExpansionState;
    /** Set by a user drag; overrides the computed layout position. */
    manualPosition?: Point;
    connectorIds: number[];
}

export interface RootNode extends NodeBase {
    kind: 'root';
}

export interface TopicNode extends NodeBase {
    kind: 'topic';
    /** Insertion-ordered detail ids; drives angular placement. */
    detailIds: number[];
    /** True for the "Root Files" bucket that has no directory behind it. */
    synthetic: boolean;
}

export interface DetailNode extends NodeBase {
    kind: 'detail';
    topicId: number;
    /** File path as reported by the filesystem provider, when known. */
    path: string | null;
    /** File contents or scan summary. */
    body: string | null;
    explanation: ExplanationView;
}

export type DiagramNode = RootNode | TopicNode | DetailNode;

export interface Connector {
    id: number;
    from: number;
    to: number;
}

export type LayoutMode = 'radial' | 'ring';

/** Node id → center position in scene coordinates. */
export type LayoutMap = Record<number, Point>;

export interface ViewState {
    scale: number;
    /** Scene point displayed at the viewport center. */
    center: Point;
    viewport: Size;
}

/** Full model state for one diagram. */
export interface DiagramState {
    rootId: number;
    /** Arena indexed by node id. */
    nodes: DiagramNode[];
    /** Arena indexed by connector id. */
    connectors: Connector[];
    /** Topic node ids in insertion order. */
    topicIds: number[];
    /** `kind:parent:label` → node id. */
    keyIndex: Record<string, number>;
    /** Content label → payload shown in the node body. */
    responses: Record<string, string | null>;
    layoutMode: LayoutMode;
    layout: LayoutMap;
    selectedNodeId: number | null;
    view: ViewState;
    /** Bumped on every structural change. */
    revision: number;
}

/* ------------------------------------------------------------------ */
/*  Ingestion events                                                  */
/* ------------------------------------------------------------------ */

export type IngestionEventKind = 'subtopic' | 'detail';

export interface SubtopicEvent {
    kind: 'subtopic';
    parent: string;
    content: string;
    path: string;
}

export interface DetailEvent {
    kind: 'detail';
    parent: string;
    content: string;
    path: string;
    summary: string;
    /** Captured file text, absent for binary or unknown file types. */
    fileText: string | null;
    /** `fileText` holds only the first `maxFileBytes` bytes of the file. */
    truncated?: boolean;
}

export type IngestionEvent = SubtopicEvent | DetailEvent;

/** Entry of a static file list used to (re)initialise a diagram. */
export interface StaticFileEntry {
    name: string;
    path: string;
    content: string | null;
}
