import type { Point } from '../types/diagram';

export type ElementRole = 'shape' | 'label' | 'connector';

export interface ManagedElementRef {
    role: ElementRole;
    /** Node id for shapes and labels, connector id for connectors. */
    index: number;
}

const MANAGED_ELEMENT_ID_PREFIXES: ReadonlyArray<readonly [string, ElementRole]> = [
    ['shape-', 'shape'],
    ['label-', 'label'],
    ['connector-', 'connector'],
];

/** Attribute carrying the element id on every drawn scene element. */
export const ELEMENT_ID_ATTRIBUTE = 'data-element-id';

export function hasManagedElementId(id: string | null | undefined): boolean {
    return parseManagedElementId(id) !== null;
}

export function parseManagedElementId(id: string | null | undefined): ManagedElementRef | null {
    if (typeof id !== 'string') return null;
    for (const [prefix, role] of MANAGED_ELEMENT_ID_PREFIXES) {
        if (!id.startsWith(prefix)) continue;
        const rest = id.slice(prefix.length);
        if (!/^\d+$/.test(rest)) return null;
        return { role, index: Number(rest) };
    }
    return null;
}

/** Node a shape or label belongs to (a dragged label moves its node); connectors belong to no node. */
export function resolveNodeId(id: string | null | undefined): number | null {
    const ref = parseManagedElementId(id);
    if (!ref || ref.role === 'connector') return null;
    return ref.index;
}

interface ClosestLookup {
    closest(selector: string): { getAttribute(name: string): string | null } | null;
}

/** Managed element id of the nearest tagged ancestor of an event target. */
export function findManagedElementId(target: ClosestLookup | null): string | null {
    const element = target?.closest(`[${ELEMENT_ID_ATTRIBUTE}]`);
    const id = element?.getAttribute(ELEMENT_ID_ATTRIBUTE) ?? null;
    return hasManagedElementId(id) ? id : null;
}

/* ------------------------------------------------------------------ */
/*  Pointer gestures                                                  */
/* ------------------------------------------------------------------ */

export type PointerIntent = 'pan' | 'rubberBand' | 'dragNode' | null;

export interface PointerIntentInput {
    button: number;
    shiftKey: boolean;
    nodeId: number | null;
}

export function getPointerIntent(input: PointerIntentInput): PointerIntent {
    const { button, shiftKey, nodeId } = input;
    if (button === 1) return 'pan';
    if (button !== 0) return null;
    if (shiftKey) return 'rubberBand';
    return nodeId !== null ? 'dragNode' : 'pan';
}

/** A press and release closer than `tolerance` pixels counts as a click. */
export function isClick(start: Point, end: Point, tolerance = 3): boolean {
    return Math.hypot(end.x - start.x, end.y - start.y) <= tolerance;
}

/** Wheel up zooms in by one step, wheel down zooms out. */
export function wheelZoomFactor(deltaY: number, zoomFactor: number): number {
    if (deltaY < 0) return zoomFactor;
    if (deltaY > 0) return 1 / zoomFactor;
    return 1;
}
