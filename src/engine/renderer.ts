/**
 * Renderer: converts the semantic model + layout positions into flat scene
 * element descriptors that the SVG canvas draws one-to-one.
 *
 * Rectangles are taken at the current animation progress, so the scene can
 * be rebuilt every frame while nodes expand or collapse.
 */
import type {
    DetailNode,
    DiagramNode,
    DiagramState,
    ExplanationStatus,
    NodeKind,
    Point,
    Rect,
} from '../types/diagram';
import type { DiagramConfig } from '../config/config';
import { renderMarkdown } from '../explain/markdown';
import { boundingBox } from './geometry';
import { compactLabel } from './nodeSizing';
import { connectorSegments, nodeRect } from './connectors';

/* ------------------------------------------------------------------ */
/*  Style constants for node kinds                                    */
/* ------------------------------------------------------------------ */

const NODE_STYLES: Record<NodeKind, { fill: string; stroke: string }> = {
    root: { fill: '#e7f5ff', stroke: '#1971c2' },
    topic: { fill: '#a5d8ff', stroke: '#1c7ed6' },
    detail: { fill: '#d3f9d8', stroke: '#2f9e44' },
};

/** Below this progress a detail shows its compact label and no body. */
const CONTENT_THRESHOLD = 0.5;

/* ------------------------------------------------------------------ */
/*  Element ids                                                       */
/* ------------------------------------------------------------------ */

export function shapeElementId(nodeId: number): string {
    return `shape-${nodeId}`;
}

export function labelElementId(nodeId: number): string {
    return `label-${nodeId}`;
}

export function connectorElementId(connectorId: number): string {
    return `connector-${connectorId}`;
}

/* ------------------------------------------------------------------ */
/*  Element descriptor types                                          */
/* ------------------------------------------------------------------ */

export type NodeContent = { kind: 'text'; text: string } | { kind: 'html'; html: string };

export interface NodeElement {
    id: string;
    labelId: string;
    nodeId: number;
    kind: NodeKind;
    rect: Rect;
    progress: number;
    label: string;
    fontSize: number;
    fill: string;
    stroke: string;
    selected: boolean;
    content: NodeContent | null;
    /** Explanation status of a detail, null for other kinds. */
    explanation: ExplanationStatus | null;
}

export interface ConnectorElement {
    id: string;
    connectorId: number;
    from: number;
    to: number;
    start: Point;
    end: Point;
}

export interface Scene {
    nodes: NodeElement[];
    connectors: ConnectorElement[];
    /** Bounding box of every drawn node, null when nothing is drawn. */
    bounds: Rect | null;
}

export type SceneInput = Pick<DiagramState, 'nodes' | 'connectors' | 'layout' | 'selectedNodeId' | 'view'>;

/* ------------------------------------------------------------------ */
/*  Element factories                                                 */
/* ------------------------------------------------------------------ */

function detailContent(node: DetailNode): NodeContent | null {
    const { explanation } = node;
    if (explanation.showing && explanation.text.length > 0) {
        return { kind: 'html', html: renderMarkdown(explanation.text) };
    }
    return node.body ? { kind: 'text', text: node.body } : null;
}

export function nodeLabel(node: DiagramNode): string {
    if (node.kind === 'detail' && node.expansion.progress < CONTENT_THRESHOLD) {
        return compactLabel(node.label);
    }
    return node.label;
}

/** Font scales from 80% of the base size when collapsed to 100% expanded. */
export function nodeFontSize(progress: number, baseSize: number): number {
    return baseSize * (0.8 + 0.2 * progress);
}

function createNodeElement(node: DiagramNode, rect: Rect, state: SceneInput, config: DiagramConfig): NodeElement {
    const { progress } = node.expansion;
    const style = NODE_STYLES[node.kind];
    const showContent = node.kind === 'detail' && progress >= CONTENT_THRESHOLD;

    return {
        id: shapeElementId(node.id),
        labelId: labelElementId(node.id),
        nodeId: node.id,
        kind: node.kind,
        rect,
        progress,
        label: nodeLabel(node),
        fontSize: nodeFontSize(progress, config.sizes.fontSize),
        fill: style.fill,
        stroke: style.stroke,
        selected: state.selectedNodeId === node.id,
        content: showContent && node.kind === 'detail' ? detailContent(node) : null,
        explanation: node.kind === 'detail' ? node.explanation.status : null,
    };
}

/* ------------------------------------------------------------------ */
/*  Main render function                                              */
/* ------------------------------------------------------------------ */

/**
 * Build the scene for the current state. Nodes without a layout position
 * (topics of a static file ring) are skipped, and so are their connectors.
 */
export function buildScene(state: SceneInput, config: DiagramConfig): Scene {
    const nodes: NodeElement[] = [];
    for (const node of state.nodes) {
        const rect = nodeRect(node, state.layout);
        if (rect) nodes.push(createNodeElement(node, rect, state, config));
    }

    const connectors = connectorSegments(
        state.connectors,
        state.nodes,
        state.layout,
        state.view,
        config.expansion,
    ).map((segment) => ({ id: connectorElementId(segment.connectorId), ...segment }));

    return { nodes, connectors, bounds: boundingBox(nodes.map((element) => element.rect)) };
}

/** Bounding box of all positioned nodes at their current size. */
export function sceneBounds(state: Pick<DiagramState, 'nodes' | 'layout'>): Rect | null {
    const rects: Rect[] = [];
    for (const node of state.nodes) {
        const rect = nodeRect(node, state.layout);
        if (rect) rects.push(rect);
    }
    return boundingBox(rects);
}
