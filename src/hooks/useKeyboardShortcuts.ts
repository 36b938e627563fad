/**
 * Keyboard shortcuts hook for diagram operations.
 *
 * + / =   → zoom in
 * - / _   → zoom out
 * 0       → reset zoom
 * F       → fit diagram in view
 * Escape  → stop running explanations
 * Ctrl/Cmd+Shift+E → explain the next unexplained file
 * Space   → expand/collapse selected node
 * Enter   → switch selected file between contents and explanation
 *
 * Shortcuts are ignored while focus is in a form control.
 */
import { useEffect, type RefObject } from 'react';
import type { DiagramRuntime } from '../runtime/diagramRuntime';
import { createLogger } from '../lib/logger';
import { toErrorMessage } from '../lib/errors';
import { getDiagramShortcutAction } from './shortcutPolicy';

const logger = createLogger('shortcuts');

function isEditableTarget(target: EventTarget | null): boolean {
    if (!(target instanceof HTMLElement)) return false;
    return Boolean(
        target.closest(
            'input, textarea, select, button, a, [contenteditable=""], [contenteditable="true"], [role="textbox"]',
        ),
    );
}

export function useKeyboardShortcuts(runtime: DiagramRuntime, scopeRef: RefObject<HTMLElement | null>): void {
    useEffect(() => {
        const scopeElement = scopeRef.current;
        if (!scopeElement) return;

        function handleKeyDown(e: KeyboardEvent): void {
            const selectedId = runtime.store.getState().selectedNodeId;
            const action = getDiagramShortcutAction({
                key: e.key,
                hasSelection: selectedId !== null,
                hasCommandModifier: e.ctrlKey || e.metaKey,
                shiftKey: e.shiftKey,
                altKey: e.altKey,
                isEditableTarget: isEditableTarget(e.target),
            });
            if (!action) return;

            e.preventDefault();
            e.stopPropagation();

            switch (action) {
                case 'zoomIn':
                    runtime.zoomIn();
                    return;
                case 'zoomOut':
                    runtime.zoomOut();
                    return;
                case 'resetZoom':
                    runtime.resetZoom();
                    return;
                case 'fitView':
                    runtime.fitToContent();
                    return;
                case 'stopExplanation':
                    runtime.stopExplanation().catch((err: unknown) => {
                        logger.error('Stopping explanations failed', { error: toErrorMessage(err) });
                    });
                    return;
                case 'explainNext':
                    if (runtime.explainNext() === null) logger.info('Every file has been explained');
                    return;
                case 'toggleNode':
                    if (selectedId !== null) runtime.toggleNode(selectedId);
                    return;
                case 'toggleExplanationView':
                    if (selectedId !== null) runtime.toggleExplanationView(selectedId);
                    return;
            }
        }

        scopeElement.addEventListener('keydown', handleKeyDown, { capture: true });
        return () => {
            scopeElement.removeEventListener('keydown', handleKeyDown, { capture: true });
        };
    }, [runtime, scopeRef]);
}
