import assert from 'node:assert/strict';
import test from 'node:test';
import { getDiagramShortcutAction, type ShortcutPolicyInput } from '../src/hooks/shortcutPolicy.ts';

function press(key: string, overrides: Partial<ShortcutPolicyInput> = {}) {
    return getDiagramShortcutAction({
        key,
        hasSelection: false,
        hasCommandModifier: false,
        shiftKey: false,
        altKey: false,
        isEditableTarget: false,
        ...overrides,
    });
}

test('zoom keys map to zoom actions', () => {
    assert.equal(press('+'), 'zoomIn');
    assert.equal(press('='), 'zoomIn');
    assert.equal(press('-'), 'zoomOut');
    assert.equal(press('_'), 'zoomOut');
    assert.equal(press('0'), 'resetZoom');
    assert.equal(press('f'), 'fitView');
    assert.equal(press('F'), 'fitView');
});

test('Escape stops explanations', () => {
    assert.equal(press('Escape'), 'stopExplanation');
});

test('Space and Enter need a selected node', () => {
    assert.equal(press(' '), null);
    assert.equal(press('Enter'), null);
    assert.equal(press(' ', { hasSelection: true }), 'toggleNode');
    assert.equal(press('Enter', { hasSelection: true }), 'toggleExplanationView');
});

test('command+shift+E explains the next file', () => {
    assert.equal(press('E', { hasCommandModifier: true, shiftKey: true }), 'explainNext');
    assert.equal(press('e', { hasCommandModifier: true, shiftKey: true }), 'explainNext');
    assert.equal(press('e', { hasCommandModifier: true }), null);
});

test('other command combinations are left to the browser', () => {
    assert.equal(press('+', { hasCommandModifier: true }), null);
    assert.equal(press('0', { hasCommandModifier: true }), null);
});

test('typing in editable fields and alt combinations are ignored', () => {
    assert.equal(press('f', { isEditableTarget: true }), null);
    assert.equal(press('Escape', { isEditableTarget: true }), null);
    assert.equal(press('+', { altKey: true }), null);
});

test('unmapped keys do nothing', () => {
    assert.equal(press('x'), null);
    assert.equal(press('Tab', { hasSelection: true }), null);
});
