import assert from 'node:assert/strict';
import test from 'node:test';
import { ViewportController } from '../src/engine/viewport.ts';
import { defaultConfig } from '../src/config/config.ts';

function createViewport(): ViewportController {
    return new ViewportController(defaultConfig.viewport, { width: 800, height: 600 });
}

test('zoom stays within bounds over any sequence of steps', () => {
    const viewport = createViewport();
    for (let i = 0; i < 100; i++) {
        viewport.zoomIn();
        assert.ok(viewport.scale <= 3 && viewport.scale >= 0.1);
    }
    assert.equal(viewport.scale, 3);
    for (let i = 0; i < 100; i++) {
        viewport.zoomOut();
        assert.ok(viewport.scale <= 3 && viewport.scale >= 0.1);
    }
    assert.equal(viewport.scale, 0.1);
    assert.equal(viewport.resetZoom(), 1);
});

test('one zoom step multiplies by the zoom factor', () => {
    const viewport = createViewport();
    assert.equal(viewport.zoomIn(), 1.15);
});

test('fitInView of an empty scene leaves the view untouched', () => {
    const viewport = createViewport();
    viewport.zoomIn();
    assert.equal(viewport.fitInView(null), 1.15);
    assert.equal(viewport.fitInView({ x: 5, y: 5, width: 0, height: 0 }), 1.15);
    assert.deepEqual(viewport.center, { x: 0, y: 0 });
});

test('fitInView pads the content and centers on it', () => {
    const viewport = createViewport();
    assert.equal(viewport.fitInView({ x: 0, y: 0, width: 1500, height: 1100 }), 0.5);
    assert.deepEqual(viewport.center, { x: 750, y: 550 });
});

test('fitInView never zooms in past 100%', () => {
    const viewport = createViewport();
    assert.equal(viewport.fitInView({ x: 0, y: 0, width: 10, height: 10 }), 1);
});

test('zoomToRect of a viewport-sized rectangle yields scale 1', () => {
    const viewport = createViewport();
    viewport.setScale(0.4);
    assert.equal(viewport.zoomToRect({ x: 0, y: 0, width: 800, height: 600 }), 1);
    assert.deepEqual(viewport.center, { x: 400, y: 300 });
});

test('zoomToRect is clamped to the maximum scale', () => {
    const viewport = createViewport();
    assert.equal(viewport.zoomToRect({ x: 0, y: 0, width: 100, height: 100 }), 3);
});

test('animateZoom eases out and lands on the target after the duration', () => {
    const viewport = createViewport();
    viewport.animateZoom(2);
    assert.equal(viewport.isAnimating, true);

    assert.equal(viewport.tick(100), true);
    assert.equal(viewport.scale, 1.875);

    viewport.tick(100);
    assert.equal(viewport.scale, 2);
    assert.equal(viewport.isAnimating, false);
    assert.equal(viewport.tick(16), false);
});

test('animateZoom clamps its target', () => {
    const viewport = createViewport();
    viewport.animateZoom(10);
    viewport.tick(250);
    assert.equal(viewport.scale, 3);
});

test('an immediate zoom cancels a running animation', () => {
    const viewport = createViewport();
    viewport.animateZoom(2);
    viewport.tick(50);
    viewport.resetZoom();
    assert.equal(viewport.isAnimating, false);
    assert.equal(viewport.scale, 1);
});

test('scene and screen coordinates round-trip through the transform', () => {
    const viewport = createViewport();
    viewport.setScale(2);
    assert.deepEqual(viewport.sceneToScreen({ x: 10, y: 10 }), { x: 420, y: 320 });
    assert.deepEqual(viewport.screenToScene({ x: 420, y: 320 }), { x: 10, y: 10 });
});

test('zoomAt keeps the scene point under the cursor fixed', () => {
    const viewport = createViewport();
    viewport.zoomAt(2, { x: 600, y: 300 });
    assert.equal(viewport.scale, 2);
    assert.deepEqual(viewport.center, { x: 100, y: 0 });
    assert.deepEqual(viewport.sceneToScreen({ x: 200, y: 0 }), { x: 600, y: 300 });
});

test('panBy moves the view by screen pixels', () => {
    const viewport = createViewport();
    viewport.setScale(2);
    viewport.panBy(100, -40);
    assert.deepEqual(viewport.center, { x: -50, y: 20 });
    assert.deepEqual(viewport.visibleRect(), { x: -250, y: -130, width: 400, height: 300 });
});
