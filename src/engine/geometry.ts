/**
 * Geometry kernel: stateless helpers shared by layout, connectors and the
 * viewport. Angles are in degrees unless a name says otherwise; coordinates
 * are screen-style (y grows downward).
 */
import type { Point, Rect, Size } from '../types/diagram';

export function degToRad(degrees: number): number {
    return (degrees * Math.PI) / 180;
}

export function clamp(value: number, min: number, max: number): number {
    return Math.min(max, Math.max(min, value));
}

export function lerp(from: number, to: number, t: number): number {
    return from + (to - from) * t;
}

export function lerpSize(from: Size, to: Size, t: number): Size {
    return {
        width: lerp(from.width, to.width, t),
        height: lerp(from.height, to.height, t),
    };
}

export function polarPoint(center: Point, radius: number, angleDegrees: number): Point {
    const angle = degToRad(angleDegrees);
    return {
        x: center.x + radius * Math.cos(angle),
        y: center.y + radius * Math.sin(angle),
    };
}

/**
 * `count` angles starting at `start` and stepping by `step` degrees.
 * A single angle is returned as `[start]`.
 */
export function distributeAngles(start: number, step: number, count: number): number[] {
    const angles: number[] = [];
    for (let i = 0; i < count; i++) {
        angles.push(start + i * step);
    }
    return angles;
}

/* ------------------------------------------------------------------ */
/*  Rectangles                                                        */
/* ------------------------------------------------------------------ */

export function rectFromCenter(center: Point, size: Size): Rect {
    return {
        x: center.x - size.width / 2,
        y: center.y - size.height / 2,
        width: size.width,
        height: size.height,
    };
}

export function rectCenter(rect: Rect): Point {
    return { x: rect.x + rect.width / 2, y: rect.y + rect.height / 2 };
}

/** Rectangle spanned by two corner points in any order. */
export function rectFromCorners(a: Point, b: Point): Rect {
    return {
        x: Math.min(a.x, b.x),
        y: Math.min(a.y, b.y),
        width: Math.abs(a.x - b.x),
        height: Math.abs(a.y - b.y),
    };
}

export function isEmptyRect(rect: Rect): boolean {
    return !(rect.width > 0) || !(rect.height > 0);
}

export function expandRect(rect: Rect, padding: number): Rect {
    return {
        x: rect.x - padding,
        y: rect.y - padding,
        width: rect.width + padding * 2,
        height: rect.height + padding * 2,
    };
}

/** Smallest rectangle containing all inputs, or null for an empty list. */
export function boundingBox(rects: readonly Rect[]): Rect | null {
    if (rects.length === 0) return null;
    let minX = Infinity;
    let minY = Infinity;
    let maxX = -Infinity;
    let maxY = -Infinity;
    for (const rect of rects) {
        minX = Math.min(minX, rect.x);
        minY = Math.min(minY, rect.y);
        maxX = Math.max(maxX, rect.x + rect.width);
        maxY = Math.max(maxY, rect.y + rect.height);
    }
    return { x: minX, y: minY, width: maxX - minX, height: maxY - minY };
}

/* ------------------------------------------------------------------ */
/*  Anchor points                                                     */
/* ------------------------------------------------------------------ */

/**
 * Point where the ray from the rectangle's center toward `target` leaves the
 * rectangle. A zero-size rectangle anchors at its center.
 */
export function anchorPoint(rect: Rect, target: Point): Point {
    const center = rectCenter(rect);
    if (isEmptyRect(rect)) return center;

    const halfWidth = rect.width / 2;
    const halfHeight = rect.height / 2;

    if (target.x === center.x) {
        return {
            x: center.x,
            y: target.y < center.y ? center.y - halfHeight : center.y + halfHeight,
        };
    }

    const slope = (target.y - center.y) / (target.x - center.x);
    if (Math.abs(slope) < rect.height / rect.width) {
        const x = target.x < center.x ? center.x - halfWidth : center.x + halfWidth;
        return { x, y: center.y + slope * (x - center.x) };
    }

    const y = target.y < center.y ? center.y - halfHeight : center.y + halfHeight;
    return { x: center.x + (y - center.y) / slope, y };
}

/**
 * Anchor used while a node shows its compact silhouette: the midpoint of the
 * rectangle edge facing the target, not a true circle intersection.
 */
export function collapsedAnchorPoint(rect: Rect, target: Point): Point {
    const center = rectCenter(rect);
    if (isEmptyRect(rect)) return center;

    if (Math.abs(target.x - center.x) > Math.abs(target.y - center.y)) {
        return {
            x: target.x < center.x ? rect.x : rect.x + rect.width,
            y: center.y,
        };
    }
    return {
        x: center.x,
        y: target.y < center.y ? rect.y : rect.y + rect.height,
    };
}

/** True when `point` lies on the rectangle's outline within `tolerance`. */
export function isOnRectBoundary(rect: Rect, point: Point, tolerance = 1e-6): boolean {
    const left = rect.x;
    const right = rect.x + rect.width;
    const top = rect.y;
    const bottom = rect.y + rect.height;
    const insideX = point.x >= left - tolerance && point.x <= right + tolerance;
    const insideY = point.y >= top - tolerance && point.y <= bottom + tolerance;
    if (!insideX || !insideY) return false;
    return (
        Math.abs(point.x - left) <= tolerance ||
        Math.abs(point.x - right) <= tolerance ||
        Math.abs(point.y - top) <= tolerance ||
        Math.abs(point.y - bottom) <= tolerance
    );
}
