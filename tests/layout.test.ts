import assert from 'node:assert/strict';
import test from 'node:test';
import {
    computeLayout,
    detailAngles,
    detailRadius,
    ringRadius,
    topicAngles,
} from '../src/engine/layout.ts';
import { polarPoint } from '../src/engine/geometry.ts';
import { defaultConfig } from '../src/config/config.ts';
import { createDiagramStore } from '../src/store/diagramStore.ts';
import type { IngestionEvent, Point } from '../src/types/diagram.ts';

const layoutConfig = defaultConfig.layout;

function assertNear(actual: Point | undefined, expected: Point): void {
    assert.ok(actual, 'position missing');
    assert.ok(
        Math.abs(actual.x - expected.x) < 1e-6 && Math.abs(actual.y - expected.y) < 1e-6,
        `(${actual.x}, ${actual.y}) ≉ (${expected.x}, ${expected.y})`,
    );
}

function detail(parent: string, content: string): IngestionEvent {
    return { kind: 'detail', parent, content, path: `${parent}/${content}`, summary: 'summary', fileText: null };
}

function scenarioStore() {
    const store = createDiagramStore(defaultConfig);
    store.getState().applyIngestionEvents([
        { kind: 'subtopic', parent: 'Main Topic', content: 'src', path: 'project/src' },
        detail('src', 'a.py'),
        detail('src', 'b.py'),
        detail('Main Topic', 'README.md'),
    ]);
    return store;
}

test('topics are spaced 360/n degrees apart starting at the start angle', () => {
    for (let n = 1; n <= 8; n++) {
        const angles = topicAngles(n, layoutConfig);
        assert.equal(angles.length, n);
        assert.equal(angles[0], 90);
        for (let i = 1; i < n; i++) {
            assert.ok(Math.abs(angles[i - 1] - angles[i] - 360 / n) < 1e-9);
        }
    }
});

test('a single detail sits at the arc base', () => {
    assert.deepEqual(detailAngles(0, 1, layoutConfig), [60]);
});

test('several details sweep the arc clockwise from the base', () => {
    assert.deepEqual(detailAngles(0, 3, layoutConfig), [60, 0, -60]);
    assert.deepEqual(detailAngles(90, 0, layoutConfig), []);
});

test('detail radius grows by one and a half widths per sibling', () => {
    assert.equal(detailRadius(0, 500, layoutConfig), 300);
    assert.equal(detailRadius(2, 500, layoutConfig), 1800);
});

test('computeLayout places the scanned tree radially', () => {
    const state = scenarioStore().getState();
    const src = state.keyIndex['topic::src'];
    const rootFiles = state.keyIndex['topic::Root Files'];
    const a = state.keyIndex['detail:src:a.py'];
    const b = state.keyIndex['detail:src:b.py'];
    const readme = state.keyIndex['detail:Root Files:README.md'];

    const layout = computeLayout(state, layoutConfig);
    const srcCenter = polarPoint({ x: 0, y: 0 }, 500, 90);

    assert.deepEqual(layout[state.rootId], { x: 0, y: 0 });
    assertNear(layout[src], srcCenter);
    assertNear(layout[rootFiles], polarPoint({ x: 0, y: 0 }, 500, -90));
    assertNear(layout[a], polarPoint(srcCenter, 300, 150));
    assertNear(layout[b], polarPoint(srcCenter, 1050, 30));
    assertNear(layout[readme], polarPoint(layout[rootFiles], 300, -30));
});

test('computeLayout with no topics positions only the root', () => {
    const state = createDiagramStore(defaultConfig).getState();
    assert.deepEqual(computeLayout(state, layoutConfig), { 0: { x: 0, y: 0 } });
});

test('computeLayout prefers stored manual node position overrides', () => {
    const store = scenarioStore();
    const a = store.getState().keyIndex['detail:src:a.py'];
    store.getState().setNodePosition(a, { x: 420, y: 180 });

    assert.deepEqual(store.getState().layout[a], { x: 420, y: 180 });
    assert.deepEqual(computeLayout(store.getState(), layoutConfig)[a], { x: 420, y: 180 });
});

test('ring layout spreads a static file list around the root', () => {
    const store = createDiagramStore(defaultConfig);
    store.getState().initFromFileList([
        { name: 'a.txt', path: 'a.txt', content: 'one' },
        { name: 'b.txt', path: 'b.txt', content: 'two' },
        { name: 'c.txt', path: 'c.txt', content: 'three' },
        { name: 'd.txt', path: 'd.txt', content: 'four' },
    ]);
    const state = store.getState();
    const radius = ringRadius(4, 500, layoutConfig);
    assert.ok(Math.abs(radius - 2400 / (2 * Math.PI)) < 1e-9);

    const first = state.keyIndex['detail:Root Files:a.txt'];
    const third = state.keyIndex['detail:Root Files:c.txt'];
    assertNear(state.layout[first], { x: radius, y: 0 });
    assertNear(state.layout[third], { x: -radius, y: 0 });
    assert.equal(state.layout[state.keyIndex['topic::Root Files']], undefined);
});

test('ring radius never drops below the minimum', () => {
    assert.equal(ringRadius(1, 100, layoutConfig), 200);
});
