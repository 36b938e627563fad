/**
 * Node footprints.
 *
 * Text is not measured by a renderer here; extents are estimated from the
 * character count so sizing stays deterministic and runs outside a browser.
 */
import type { NodeSizing, Size } from '../types/diagram';
import type { SizesConfig } from '../config/config';

const AVG_CHAR_WIDTH_RATIO = 0.6;
const LINE_HEIGHT_RATIO = 1.4;
/** Collapsed silhouette relative to the smaller min dimension. */
const COLLAPSED_WIDTH_RATIO = 0.8;
const COLLAPSED_HEIGHT_RATIO = 0.4;

export function charWidth(fontSize: number): number {
    return fontSize * AVG_CHAR_WIDTH_RATIO;
}

export function lineHeight(fontSize: number): number {
    return fontSize * LINE_HEIGHT_RATIO;
}

/** Single-line width of `text`, padded, never below `minWidth`. */
export function estimateTextWidth(text: string, fontSize: number, minWidth = 0): number {
    return Math.max(minWidth, text.length * charWidth(fontSize) + 32);
}

/** Size of `text` word-wrapped at `wrapWidth`. */
export function measureWrappedText(text: string, wrapWidth: number, fontSize: number): Size {
    const perChar = charWidth(fontSize);
    const charsPerLine = Math.max(1, Math.floor(wrapWidth / perChar));
    let lines = 0;
    let widest = 0;
    for (const line of text.split('\n')) {
        const length = line.length;
        lines += Math.max(1, Math.ceil(length / charsPerLine));
        widest = Math.max(widest, Math.min(length, charsPerLine));
    }
    return {
        width: widest * perChar,
        height: lines * lineHeight(fontSize),
    };
}

/**
 * Derive collapsed and expanded footprints from the minimum size and the
 * text the node shows when expanded.
 *
 * Long text first widens the node in `growthStep` increments until its
 * wrapped height fits `maxGrowthFactor × min height`; both dimensions are
 * then capped at `maxGrowthFactor × min`.
 */
export function computeNodeSizing(minSize: Size, text: string, sizes: SizesConfig): NodeSizing {
    const maxWidth = minSize.width * sizes.maxGrowthFactor;
    const maxHeight = minSize.height * sizes.maxGrowthFactor;

    let wrapWidth = minSize.width;
    let content = measureWrappedText(text, wrapWidth, sizes.fontSize);
    while (content.height > maxHeight && wrapWidth < maxWidth) {
        wrapWidth += sizes.growthStep;
        content = measureWrappedText(text, wrapWidth, sizes.fontSize);
    }

    const expandedSize: Size = {
        width: Math.min(maxWidth, Math.max(minSize.width, content.width)),
        height: Math.min(maxHeight, Math.max(minSize.height, content.height)),
    };
    const side = Math.min(minSize.width, minSize.height);
    const collapsedSize: Size = {
        width: side * COLLAPSED_WIDTH_RATIO,
        height: side * COLLAPSED_HEIGHT_RATIO,
    };

    return { minSize: { ...minSize }, collapsedSize, expandedSize };
}

/** Label shown while a node is mostly collapsed. */
export function compactLabel(label: string, maxLength = 15): string {
    if (label.length <= maxLength) return label;
    return `${label.slice(0, maxLength - 3)}...`;
}
