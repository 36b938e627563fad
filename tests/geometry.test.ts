import assert from 'node:assert/strict';
import test from 'node:test';
import {
    anchorPoint,
    boundingBox,
    clamp,
    collapsedAnchorPoint,
    distributeAngles,
    isOnRectBoundary,
    lerp,
    lerpSize,
    polarPoint,
    rectCenter,
    rectFromCenter,
    rectFromCorners,
} from '../src/engine/geometry.ts';
import type { Rect } from '../src/types/diagram.ts';

const RECT: Rect = { x: 0, y: 0, width: 200, height: 100 };

function assertClose(actual: number, expected: number, message?: string): void {
    assert.ok(Math.abs(actual - expected) < 1e-9, message ?? `${actual} ≉ ${expected}`);
}

test('anchorPoint exits through the right edge for a shallow slope', () => {
    assert.deepEqual(anchorPoint(RECT, { x: 300, y: 75 }), { x: 200, y: 62.5 });
});

test('anchorPoint exits through the bottom edge for a steep slope', () => {
    const point = anchorPoint(RECT, { x: 120, y: 250 });
    assertClose(point.x, 105);
    assertClose(point.y, 100);
});

test('anchorPoint clamps a dead-vertical target to top or bottom', () => {
    assert.deepEqual(anchorPoint(RECT, { x: 100, y: -400 }), { x: 100, y: 0 });
    assert.deepEqual(anchorPoint(RECT, { x: 100, y: 400 }), { x: 100, y: 100 });
});

test('anchorPoint lies on the boundary and toward the target for many directions', () => {
    const center = rectCenter(RECT);
    for (let deg = 0; deg < 360; deg += 7) {
        const target = polarPoint(center, 1000, deg);
        const anchor = anchorPoint(RECT, target);
        assert.ok(isOnRectBoundary(RECT, anchor, 1e-6), `off boundary at ${deg}°`);
        const toTarget = { x: target.x - center.x, y: target.y - center.y };
        const toAnchor = { x: anchor.x - center.x, y: anchor.y - center.y };
        assert.ok(toTarget.x * toAnchor.x + toTarget.y * toAnchor.y > 0, `wrong side at ${deg}°`);
    }
});

test('anchor functions return the center of a zero-size rectangle', () => {
    const empty: Rect = { x: 10, y: 20, width: 0, height: 0 };
    assert.deepEqual(anchorPoint(empty, { x: 100, y: 100 }), { x: 10, y: 20 });
    assert.deepEqual(collapsedAnchorPoint(empty, { x: 100, y: 100 }), { x: 10, y: 20 });
});

test('collapsedAnchorPoint uses the midpoint of the facing edge', () => {
    assert.deepEqual(collapsedAnchorPoint(RECT, { x: 500, y: 60 }), { x: 200, y: 50 });
    assert.deepEqual(collapsedAnchorPoint(RECT, { x: -500, y: 60 }), { x: 0, y: 50 });
    assert.deepEqual(collapsedAnchorPoint(RECT, { x: 110, y: -500 }), { x: 100, y: 0 });
    assert.deepEqual(collapsedAnchorPoint(RECT, { x: 110, y: 500 }), { x: 100, y: 100 });
});

test('lerp and lerpSize interpolate linearly', () => {
    assert.equal(lerp(10, 20, 0.25), 12.5);
    assert.deepEqual(lerpSize({ width: 100, height: 40 }, { width: 300, height: 120 }, 0.5), {
        width: 200,
        height: 80,
    });
});

test('clamp keeps values within bounds', () => {
    assert.equal(clamp(5, 0, 3), 3);
    assert.equal(clamp(-1, 0, 3), 0);
    assert.equal(clamp(2, 0, 3), 2);
});

test('distributeAngles steps from the start angle', () => {
    assert.deepEqual(distributeAngles(90, -120, 3), [90, -30, -150]);
    assert.deepEqual(distributeAngles(45, 0, 1), [45]);
    assert.deepEqual(distributeAngles(0, 10, 0), []);
});

test('polarPoint follows screen coordinates', () => {
    const point = polarPoint({ x: 0, y: 0 }, 500, 90);
    assertClose(point.x, 0);
    assertClose(point.y, 500);
});

test('rectangles convert between center and corners', () => {
    const rect = rectFromCenter({ x: 50, y: 50 }, { width: 20, height: 10 });
    assert.deepEqual(rect, { x: 40, y: 45, width: 20, height: 10 });
    assert.deepEqual(rectCenter(rect), { x: 50, y: 50 });
    assert.deepEqual(rectFromCorners({ x: 30, y: 5 }, { x: 10, y: 25 }), { x: 10, y: 5, width: 20, height: 20 });
});

test('boundingBox covers every rectangle and is null for none', () => {
    assert.equal(boundingBox([]), null);
    assert.deepEqual(
        boundingBox([
            { x: 0, y: 0, width: 10, height: 10 },
            { x: -20, y: 5, width: 5, height: 30 },
        ]),
        { x: -20, y: 0, width: 30, height: 35 },
    );
});
