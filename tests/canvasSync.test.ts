import assert from 'node:assert/strict';
import test from 'node:test';
import {
    ELEMENT_ID_ATTRIBUTE,
    findManagedElementId,
    getPointerIntent,
    hasManagedElementId,
    isClick,
    parseManagedElementId,
    resolveNodeId,
    wheelZoomFactor,
} from '../src/components/canvasSync.ts';

function target(attributes: Record<string, string> | null) {
    return {
        closest(selector: string) {
            assert.equal(selector, `[${ELEMENT_ID_ATTRIBUTE}]`);
            if (!attributes) return null;
            return { getAttribute: (name: string) => attributes[name] ?? null };
        },
    };
}

test('parseManagedElementId reads the role and index', () => {
    assert.deepEqual(parseManagedElementId('shape-12'), { role: 'shape', index: 12 });
    assert.deepEqual(parseManagedElementId('label-0'), { role: 'label', index: 0 });
    assert.deepEqual(parseManagedElementId('connector-3'), { role: 'connector', index: 3 });
});

test('parseManagedElementId rejects foreign ids', () => {
    assert.equal(parseManagedElementId('shape-'), null);
    assert.equal(parseManagedElementId('shape-1a'), null);
    assert.equal(parseManagedElementId('free-text'), null);
    assert.equal(parseManagedElementId(null), null);
    assert.equal(hasManagedElementId(undefined), false);
    assert.equal(hasManagedElementId('label-7'), true);
});

test('shapes and labels resolve to their node, connectors to none', () => {
    assert.equal(resolveNodeId('shape-4'), 4);
    assert.equal(resolveNodeId('label-4'), 4);
    assert.equal(resolveNodeId('connector-4'), null);
    assert.equal(resolveNodeId('text-4'), null);
});

test('findManagedElementId uses the nearest tagged ancestor', () => {
    assert.equal(findManagedElementId(target({ [ELEMENT_ID_ATTRIBUTE]: 'shape-5' })), 'shape-5');
    assert.equal(findManagedElementId(target({ [ELEMENT_ID_ATTRIBUTE]: 'toolbar' })), null);
    assert.equal(findManagedElementId(target(null)), null);
    assert.equal(findManagedElementId(null), null);
});

test('pointer intent follows the button, the shift key and the hit node', () => {
    assert.equal(getPointerIntent({ button: 0, shiftKey: false, nodeId: 3 }), 'dragNode');
    assert.equal(getPointerIntent({ button: 0, shiftKey: false, nodeId: null }), 'pan');
    assert.equal(getPointerIntent({ button: 0, shiftKey: true, nodeId: 3 }), 'rubberBand');
    assert.equal(getPointerIntent({ button: 1, shiftKey: true, nodeId: 3 }), 'pan');
    assert.equal(getPointerIntent({ button: 2, shiftKey: false, nodeId: null }), null);
});

test('small pointer movements still count as clicks', () => {
    assert.equal(isClick({ x: 10, y: 10 }, { x: 12, y: 12 }), true);
    assert.equal(isClick({ x: 10, y: 10 }, { x: 14, y: 10 }), false);
    assert.equal(isClick({ x: 0, y: 0 }, { x: 4, y: 0 }, 5), true);
});

test('wheel direction picks the zoom factor', () => {
    assert.equal(wheelZoomFactor(-120, 1.15), 1.15);
    assert.equal(wheelZoomFactor(120, 1.15), 1 / 1.15);
    assert.equal(wheelZoomFactor(0, 1.15), 1);
});
