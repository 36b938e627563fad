export type DiagramShortcutAction =
    | 'zoomIn'
    | 'zoomOut'
    | 'resetZoom'
    | 'fitView'
    | 'stopExplanation'
    | 'explainNext'
    | 'toggleNode'
    | 'toggleExplanationView'
    | null;

export interface ShortcutPolicyInput {
    key: string;
    hasSelection: boolean;
    /** Ctrl on most platforms, Cmd on macOS. */
    hasCommandModifier: boolean;
    shiftKey: boolean;
    altKey: boolean;
    isEditableTarget: boolean;
}

export function getDiagramShortcutAction(input: ShortcutPolicyInput): DiagramShortcutAction {
    const { key, hasSelection, hasCommandModifier, shiftKey, altKey, isEditableTarget } = input;
    if (isEditableTarget || altKey) return null;

    if (hasCommandModifier) {
        return shiftKey && key.toLowerCase() === 'e' ? 'explainNext' : null;
    }

    switch (key) {
        case '+':
        case '=':
            return 'zoomIn';
        case '-':
        case '_':
            return 'zoomOut';
        case '0':
            return 'resetZoom';
        case 'f':
        case 'F':
            return 'fitView';
        case 'Escape':
            return 'stopExplanation';
        case ' ':
            return hasSelection ? 'toggleNode' : null;
        case 'Enter':
            return hasSelection ? 'toggleExplanationView' : null;
        default:
            return null;
    }
}
