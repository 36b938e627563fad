/**
 * Animation scheduler: advances node expansion and view zoom once per frame.
 *
 * Only nodes with an unsettled expansion are tracked; a node leaves the
 * active set as soon as it converges, so idle nodes cost nothing per tick.
 */
import type { DiagramNode, ExpansionState } from '../types/diagram';
import type { ExpansionConfig } from '../config/config';
import type { DiagramStoreApi } from '../store/diagramStore';
import type { ViewportController } from './viewport';
import { effectiveTarget, isSettled, retarget, stepExpansion, type ViewContext } from './expansion';

export interface TickResult {
    /** Nodes whose progress moved this tick. */
    advanced: number;
    /** The view scale changed (zoom animation). */
    scaleChanged: boolean;
}

export class AnimationScheduler {
    private readonly active = new Set<number>();

    constructor(
        private readonly store: DiagramStoreApi,
        private readonly viewport: ViewportController,
        private readonly config: ExpansionConfig,
    ) {}

    get activeCount(): number {
        return this.active.size;
    }

    isActive(nodeId: number): boolean {
        return this.active.has(nodeId);
    }

    /** Track a node whose target may differ from its progress. */
    activate(nodeId: number): void {
        const node = this.store.getState().nodes[nodeId];
        if (node && !isSettled(node.expansion)) {
            this.active.add(nodeId);
        }
    }

    /**
     * Re-evaluate view-driven targets (auto-collapse when zoomed out) and
     * start animations for nodes whose target changed. Returns how many
     * nodes were retargeted.
     */
    syncViewTargets(view: ViewContext = { scale: this.viewport.scale }): number {
        const updates = new Map<number, ExpansionState>();
        for (const node of this.store.getState().nodes) {
            const target = effectiveTarget(node, view, this.config);
            if (target !== node.expansion.target) {
                updates.set(node.id, retarget(node.expansion, target));
            }
        }
        this.store.getState().setExpansions(updates);
        for (const nodeId of updates.keys()) this.activate(nodeId);
        return updates.size;
    }

    /** Advance every running animation by `dt` milliseconds. */
    tick(dt: number): TickResult {
        const scaleChanged = this.viewport.tick(dt);
        if (scaleChanged) this.syncViewTargets();

        if (this.active.size === 0) return { advanced: 0, scaleChanged };

        const { nodes } = this.store.getState();
        const updates = new Map<number, ExpansionState>();
        for (const nodeId of [...this.active]) {
            const node: DiagramNode | undefined = nodes[nodeId];
            if (!node) {
                this.active.delete(nodeId);
                continue;
            }
            const next = stepExpansion(node.expansion, dt, this.config);
            if (next !== node.expansion) updates.set(nodeId, next);
            if (isSettled(next)) this.active.delete(nodeId);
        }
        this.store.getState().setExpansions(updates);
        return { advanced: updates.size, scaleChanged };
    }

    /** Forget every tracked animation (the diagram was rebuilt). */
    clear(): void {
        this.active.clear();
    }
}
