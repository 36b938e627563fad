/**
 * Node expansion state machine.
 *
 *   collapsed ──toggle──▶ expanding ──(|p − 1| < ε)──▶ expanded
 *   expanded  ──toggle──▶ collapsing ──(|p − 0| < ε)──▶ collapsed
 *
 * The phase is never stored: it is read off `(progress, target)`. Progress
 * approaches the target exponentially, a fixed fraction of the remaining
 * distance per reference frame, and snaps once within epsilon.
 */
import type { DiagramNode, ExpansionPhase, ExpansionState, NodeSizing, Size } from '../types/diagram';
import type { ExpansionConfig } from '../config/config';
import { lerpSize } from './geometry';

export function createExpansion(expanded: boolean): ExpansionState {
    const value = expanded ? 1 : 0;
    return { progress: value, target: value, requested: expanded };
}

export function expansionPhase(state: ExpansionState): ExpansionPhase {
    if (state.progress === state.target) {
        return state.target === 1 ? 'expanded' : 'collapsed';
    }
    return state.target === 1 ? 'expanding' : 'collapsing';
}

export function isSettled(state: ExpansionState): boolean {
    return state.progress === state.target;
}

/** Flip the user's requested state; the animation target follows it. */
export function toggleExpansion(state: ExpansionState): ExpansionState {
    const requested = !state.requested;
    return { ...state, requested, target: requested ? 1 : 0 };
}

/** Retarget without touching the user's request. */
export function retarget(state: ExpansionState, target: 0 | 1): ExpansionState {
    if (state.target === target) return state;
    return { ...state, target };
}

export interface ViewContext {
    scale: number;
}

/**
 * Target dictated by the view: detail nodes collapse while the view is
 * zoomed out below the threshold, whatever the user asked for.
 */
export function effectiveTarget(
    node: DiagramNode,
    view: ViewContext,
    config: ExpansionConfig,
): 0 | 1 {
    switch (node.kind) {
        case 'detail':
            if (isViewCollapsed(view, config)) return 0;
            return node.expansion.requested ? 1 : 0;
        case 'topic':
        case 'root':
            return node.expansion.requested ? 1 : 0;
    }
}

export function isViewCollapsed(view: ViewContext, config: ExpansionConfig): boolean {
    return view.scale < config.autoCollapseScale;
}

/**
 * Advance one state by `dt` milliseconds. Settled states are returned as the
 * same object so callers can detect convergence by identity.
 */
export function stepExpansion(
    state: ExpansionState,
    dt: number,
    config: ExpansionConfig,
): ExpansionState {
    if (isSettled(state) || dt <= 0) return state;

    const remaining = state.target - state.progress;
    if (Math.abs(remaining) < config.epsilon) {
        return { ...state, progress: state.target };
    }

    const frames = dt / config.frameMs;
    const fraction = 1 - Math.pow(1 - config.speed, frames);
    const progress = state.progress + remaining * fraction;
    if (Math.abs(state.target - progress) < config.epsilon) {
        return { ...state, progress: state.target };
    }
    return { ...state, progress };
}

/** Footprint at the current progress. */
export function currentSize(sizing: NodeSizing, progress: number): Size {
    return lerpSize(sizing.collapsedSize, sizing.expandedSize, progress);
}
