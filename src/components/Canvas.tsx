/**
 * Canvas component — draws the diagram as SVG and wires pointer input to the
 * runtime.
 *
 * Responsibilities:
 * - Projects store state through the renderer into SVG elements
 * - Pans on background drag, drags nodes (or their labels), zooms on wheel
 * - Click toggles a node; Shift+drag zooms to the dragged rectangle
 * - Reports its size to the viewport controller
 */
import { useCallback, useEffect, useMemo, useRef, useState } from 'react';
import { useStore } from 'zustand';
import type { Point } from '../types/diagram';
import type { DiagramRuntime } from '../runtime/diagramRuntime';
import { buildScene, type NodeElement } from '../engine/renderer';
import { rectFromCorners } from '../engine/geometry';
import { useKeyboardShortcuts } from '../hooks/useKeyboardShortcuts';
import {
    findManagedElementId,
    getPointerIntent,
    isClick,
    resolveNodeId,
    wheelZoomFactor,
    type PointerIntent,
} from './canvasSync';

interface Gesture {
    intent: Exclude<PointerIntent, null>;
    pointerId: number;
    nodeId: number | null;
    start: Point;
    last: Point;
}

interface CanvasProps {
    runtime: DiagramRuntime;
}

function NodeShape({ element }: { element: NodeElement }) {
    const { rect, content } = element;
    const headerHeight = element.fontSize * 2;
    return (
        <g
            className={`node node-${element.kind}${element.selected ? ' node-selected' : ''}`}
            data-element-id={element.id}
        >
            <rect
                x={rect.x}
                y={rect.y}
                width={rect.width}
                height={rect.height}
                rx={8}
                fill={element.fill}
                stroke={element.explanation === 'running' ? '#ff8c00' : element.stroke}
                strokeWidth={element.selected ? 3 : 2}
            />
            <text
                data-element-id={element.labelId}
                x={rect.x + rect.width / 2}
                y={content ? rect.y + headerHeight * 0.7 : rect.y + rect.height / 2}
                fontSize={element.fontSize}
                textAnchor="middle"
                dominantBaseline="middle"
            >
                {element.label}
            </text>
            {content && (
                <foreignObject
                    x={rect.x + 8}
                    y={rect.y + headerHeight}
                    width={Math.max(0, rect.width - 16)}
                    height={Math.max(0, rect.height - headerHeight - 8)}
                >
                    {content.kind === 'html' ? (
                        <div
                            className="node-content node-explanation"
                            style={{ fontSize: element.fontSize }}
                            dangerouslySetInnerHTML={{ __html: content.html }}
                        />
                    ) : (
                        <pre className="node-content" style={{ fontSize: element.fontSize }}>
                            {content.text}
                        </pre>
                    )}
                </foreignObject>
            )}
        </g>
    );
}

export default function Canvas({ runtime }: CanvasProps) {
    const { store, config } = runtime;
    const containerRef = useRef<HTMLDivElement | null>(null);
    const gestureRef = useRef<Gesture | null>(null);
    const [band, setBand] = useState<{ start: Point; end: Point } | null>(null);

    // Subscribe to store slices
    const nodes = useStore(store, (s) => s.nodes);
    const connectors = useStore(store, (s) => s.connectors);
    const layout = useStore(store, (s) => s.layout);
    const view = useStore(store, (s) => s.view);
    const selectedNodeId = useStore(store, (s) => s.selectedNodeId);

    const scene = useMemo(
        () => buildScene({ nodes, connectors, layout, view, selectedNodeId }, config),
        [nodes, connectors, layout, view, selectedNodeId, config],
    );

    // Keep the viewport controller in step with the element size.
    useEffect(() => {
        const element = containerRef.current;
        if (!element) return;
        const observer = new ResizeObserver(([entry]) => {
            if (!entry) return;
            const { width, height } = entry.contentRect;
            runtime.setViewportSize({ width, height });
        });
        observer.observe(element);
        return () => observer.disconnect();
    }, [runtime]);

    // Wheel zoom needs a non-passive listener to keep the page from scrolling.
    useEffect(() => {
        const element = containerRef.current;
        if (!element) return;
        function handleWheel(e: WheelEvent): void {
            e.preventDefault();
            const bounds = element?.getBoundingClientRect();
            if (!bounds) return;
            const point = { x: e.clientX - bounds.left, y: e.clientY - bounds.top };
            runtime.zoomAt(wheelZoomFactor(e.deltaY, config.viewport.zoomFactor), point);
        }
        element.addEventListener('wheel', handleWheel, { passive: false });
        return () => element.removeEventListener('wheel', handleWheel);
    }, [runtime, config]);

    useKeyboardShortcuts(runtime, containerRef);

    const localPoint = useCallback((e: React.PointerEvent<HTMLDivElement>): Point => {
        const bounds = e.currentTarget.getBoundingClientRect();
        return { x: e.clientX - bounds.left, y: e.clientY - bounds.top };
    }, []);

    const handlePointerDown = useCallback(
        (e: React.PointerEvent<HTMLDivElement>) => {
            const target = e.target instanceof Element ? e.target : null;
            const nodeId = resolveNodeId(findManagedElementId(target));
            const intent = getPointerIntent({ button: e.button, shiftKey: e.shiftKey, nodeId });
            if (!intent) return;

            e.currentTarget.focus({ preventScroll: true });
            e.currentTarget.setPointerCapture(e.pointerId);
            const point = localPoint(e);
            gestureRef.current = { intent, pointerId: e.pointerId, nodeId, start: point, last: point };
            if (intent === 'rubberBand') setBand({ start: point, end: point });
        },
        [localPoint],
    );

    const handlePointerMove = useCallback(
        (e: React.PointerEvent<HTMLDivElement>) => {
            const gesture = gestureRef.current;
            if (!gesture || gesture.pointerId !== e.pointerId) return;
            const point = localPoint(e);
            const dx = point.x - gesture.last.x;
            const dy = point.y - gesture.last.y;
            gesture.last = point;

            switch (gesture.intent) {
                case 'pan':
                    runtime.panBy(dx, dy);
                    return;
                case 'dragNode':
                    if (gesture.nodeId !== null && !isClick(gesture.start, point)) {
                        runtime.dragNode(gesture.nodeId, dx, dy);
                    }
                    return;
                case 'rubberBand':
                    setBand({ start: gesture.start, end: point });
                    return;
            }
        },
        [runtime, localPoint],
    );

    const handlePointerUp = useCallback(
        (e: React.PointerEvent<HTMLDivElement>) => {
            const gesture = gestureRef.current;
            if (!gesture || gesture.pointerId !== e.pointerId) return;
            gestureRef.current = null;
            const point = localPoint(e);
            const clicked = isClick(gesture.start, point);

            switch (gesture.intent) {
                case 'dragNode':
                    if (clicked && gesture.nodeId !== null) {
                        runtime.selectNode(gesture.nodeId);
                        runtime.toggleNode(gesture.nodeId);
                    }
                    return;
                case 'pan':
                    if (clicked) runtime.selectNode(null);
                    return;
                case 'rubberBand':
                    setBand(null);
                    if (!clicked) runtime.zoomToScreenRect(gesture.start, point);
                    return;
            }
        },
        [runtime, localPoint],
    );

    const handleDoubleClick = useCallback(
        (e: React.MouseEvent<HTMLDivElement>) => {
            const target = e.target instanceof Element ? e.target : null;
            const nodeId = resolveNodeId(findManagedElementId(target));
            if (nodeId !== null) runtime.toggleExplanationView(nodeId);
        },
        [runtime],
    );

    const { width, height } = view.viewport;
    const transform = `translate(${width / 2} ${height / 2}) scale(${view.scale}) translate(${-view.center.x} ${-view.center.y})`;
    const bandRect = band ? rectFromCorners(band.start, band.end) : null;

    return (
        <div
            ref={containerRef}
            className="diagram-canvas"
            tabIndex={0}
            onPointerDown={handlePointerDown}
            onPointerMove={handlePointerMove}
            onPointerUp={handlePointerUp}
            onPointerCancel={handlePointerUp}
            onDoubleClick={handleDoubleClick}
        >
            <svg width="100%" height="100%">
                <g transform={transform}>
                    {scene.connectors.map((connector) => (
                        <line
                            key={connector.id}
                            data-element-id={connector.id}
                            x1={connector.start.x}
                            y1={connector.start.y}
                            x2={connector.end.x}
                            y2={connector.end.y}
                            stroke="#868e96"
                            strokeWidth={2}
                        />
                    ))}
                    {scene.nodes.map((element) => (
                        <NodeShape key={element.id} element={element} />
                    ))}
                </g>
                {bandRect && (
                    <rect
                        className="rubber-band"
                        x={bandRect.x}
                        y={bandRect.y}
                        width={bandRect.width}
                        height={bandRect.height}
                    />
                )}
            </svg>
        </div>
    );
}
