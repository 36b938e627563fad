/**
 * Radial layout engine.
 *
 * Computes { x, y } center positions for every node: the root at the scene
 * origin, topics on a circle around it, and each topic's details fanned out
 * on an arc facing away from the root.
 *
 * This is intentionally a full recompute on every model change, with no
 * incremental relaxation; diagrams stay within hundreds of nodes.
 */
import type { DiagramState, DiagramNode, LayoutMap, Point, TopicNode } from '../types/diagram';
import type { LayoutConfig } from '../config/config';
import { distributeAngles, polarPoint } from './geometry';

const ORIGIN: Point = { x: 0, y: 0 };

export type LayoutInput = Pick<DiagramState, 'rootId' | 'nodes' | 'topicIds' | 'layoutMode'>;

function topicAt(nodes: readonly DiagramNode[], id: number): TopicNode | null {
    const node = nodes[id];
    return node && node.kind === 'topic' ? node : null;
}

/** Angles (degrees) of `count` topics, clockwise from the start angle. */
export function topicAngles(count: number, config: LayoutConfig): number[] {
    if (count === 0) return [];
    return distributeAngles(config.startAngleDegrees, -360 / count, count);
}

/**
 * Angles (degrees) of a topic's details: an arc of `detailSpanDegrees`
 * centered on the topic direction, swept clockwise from `base`. A single
 * detail sits exactly at `base`.
 */
export function detailAngles(topicAngle: number, count: number, config: LayoutConfig): number[] {
    if (count === 0) return [];
    const span = config.detailSpanDegrees;
    const base = topicAngle + span / 2;
    const step = count > 1 ? -span / (count - 1) : 0;
    return distributeAngles(base, step, count);
}

export function detailRadius(index: number, detailWidth: number, config: LayoutConfig): number {
    return config.detailBaseRadius + index * detailWidth * config.detailSpacingFactor;
}

/* ------------------------------------------------------------------ */
/*  Layout computation                                                */
/* ------------------------------------------------------------------ */

/**
 * Compute center positions for all live nodes.
 *
 * Algorithm:
 * 1. Root at the origin.
 * 2. Topic i of n at startAngle − i·360/n on the topic circle.
 * 3. Detail j of m at base − j·span/(m−1), pushed outward by j spacings.
 * 4. Manual drag positions replace the computed ones.
 */
export function computeRadialLayout(state: LayoutInput, config: LayoutConfig): LayoutMap {
    const { nodes } = state;
    const positions: LayoutMap = {};
    if (!nodes[state.rootId]) return positions;

    positions[state.rootId] = ORIGIN;

    const topics = state.topicIds
        .map((id) => topicAt(nodes, id))
        .filter((topic): topic is TopicNode => topic !== null);
    const angles = topicAngles(topics.length, config);

    topics.forEach((topic, i) => {
        const angle = angles[i];
        const topicCenter = polarPoint(ORIGIN, config.topicRadius, angle);
        positions[topic.id] = topicCenter;

        const details = topic.detailIds.filter((id) => nodes[id]?.kind === 'detail');
        const arc = detailAngles(angle, details.length, config);
        details.forEach((detailId, j) => {
            const width = nodes[detailId].sizing.minSize.width;
            positions[detailId] = polarPoint(topicCenter, detailRadius(j, width, config), arc[j]);
        });
    });

    return applyManualPositions(positions, nodes);
}

/**
 * Static file list layout: every detail evenly spaced on one ring around
 * the root, the ring sized so neighbours keep `ringGap` between them.
 */
export function computeRingLayout(state: LayoutInput, config: LayoutConfig): LayoutMap {
    const { nodes } = state;
    const positions: LayoutMap = {};
    if (!nodes[state.rootId]) return positions;

    positions[state.rootId] = ORIGIN;

    const details = nodes.filter((node) => node.kind === 'detail');
    if (details.length === 0) return applyManualPositions(positions, nodes);

    const widest = Math.max(...details.map((node) => node.sizing.minSize.width));
    const radius = ringRadius(details.length, widest, config);
    details.forEach((node, i) => {
        positions[node.id] = polarPoint(ORIGIN, radius, (360 * i) / details.length);
    });

    // Topics get no position here, so they are not drawn.
    return applyManualPositions(positions, nodes);
}

export function ringRadius(count: number, nodeWidth: number, config: LayoutConfig): number {
    const circumference = count * (nodeWidth + config.ringGap);
    return Math.max(config.ringMinRadius, circumference / (2 * Math.PI));
}

export function computeLayout(state: LayoutInput, config: LayoutConfig): LayoutMap {
    switch (state.layoutMode) {
        case 'radial':
            return computeRadialLayout(state, config);
        case 'ring':
            return computeRingLayout(state, config);
    }
}

// Manual drag positions override auto layout for placed nodes.
function applyManualPositions(positions: LayoutMap, nodes: readonly DiagramNode[]): LayoutMap {
    for (const node of nodes) {
        if (!positions[node.id] || !node.manualPosition) continue;
        positions[node.id] = { x: node.manualPosition.x, y: node.manualPosition.y };
    }
    return positions;
}
