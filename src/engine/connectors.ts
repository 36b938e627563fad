/**
 * Connector geometry: both endpoints of every connector, recomputed from the
 * current interpolated node rectangles so lines stay attached to node edges
 * while nodes move, resize or animate.
 */
import type { Connector, DiagramNode, LayoutMap, Point, Rect } from '../types/diagram';
import type { ExpansionConfig } from '../config/config';
import { anchorPoint, collapsedAnchorPoint, rectCenter, rectFromCenter } from './geometry';
import { currentSize, isViewCollapsed, type ViewContext } from './expansion';

export interface ConnectorSegment {
    connectorId: number;
    from: number;
    to: number;
    start: Point;
    end: Point;
}

/** The node's rectangle at its current position and animation progress. */
export function nodeRect(node: DiagramNode, layout: LayoutMap): Rect | null {
    const center = layout[node.id];
    if (!center) return null;
    return rectFromCenter(center, currentSize(node.sizing, node.expansion.progress));
}

/**
 * Edge point of `node` facing `target`. Detail nodes shown in their
 * zoomed-out silhouette use the axis-aligned edge midpoint.
 */
export function nodeAnchor(
    node: DiagramNode,
    rect: Rect,
    target: Point,
    view: ViewContext,
    config: ExpansionConfig,
): Point {
    if (node.kind === 'detail' && isViewCollapsed(view, config)) {
        return collapsedAnchorPoint(rect, target);
    }
    return anchorPoint(rect, target);
}

export function connectorSegment(
    connector: Connector,
    nodes: readonly DiagramNode[],
    layout: LayoutMap,
    view: ViewContext,
    config: ExpansionConfig,
): ConnectorSegment | null {
    const fromNode = nodes[connector.from];
    const toNode = nodes[connector.to];
    if (!fromNode || !toNode) return null;

    const fromRect = nodeRect(fromNode, layout);
    const toRect = nodeRect(toNode, layout);
    if (!fromRect || !toRect) return null;

    return {
        connectorId: connector.id,
        from: connector.from,
        to: connector.to,
        start: nodeAnchor(fromNode, fromRect, rectCenter(toRect), view, config),
        end: nodeAnchor(toNode, toRect, rectCenter(fromRect), view, config),
    };
}

export function connectorSegments(
    connectors: readonly Connector[],
    nodes: readonly DiagramNode[],
    layout: LayoutMap,
    view: ViewContext,
    config: ExpansionConfig,
): ConnectorSegment[] {
    const segments: ConnectorSegment[] = [];
    for (const connector of connectors) {
        const segment = connectorSegment(connector, nodes, layout, view, config);
        if (segment) segments.push(segment);
    }
    return segments;
}
