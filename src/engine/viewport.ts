/**
 * Viewport controller: owns scale and pan for one view.
 *
 * The transform maps a scene point p to the screen as
 *   screen = (p − center) · scale + viewport / 2
 * so `center` is the scene point shown in the middle of the viewport.
 * Animated zoom is advanced by `tick(dt)` from the render loop.
 */
import { easeCubicOut } from 'd3-ease';
import type { Point, Rect, Size, ViewState } from '../types/diagram';
import type { ViewportConfig } from '../config/config';
import { clamp, expandRect, isEmptyRect, lerp, rectCenter } from './geometry';

interface ZoomAnimation {
    from: number;
    to: number;
    elapsed: number;
    duration: number;
}

export class ViewportController {
    private scaleValue = 1;
    private centerValue: Point = { x: 0, y: 0 };
    private sizeValue: Size;
    private zoomAnimation: ZoomAnimation | null = null;

    constructor(
        private readonly config: ViewportConfig,
        viewport: Size = { width: 800, height: 600 },
    ) {
        this.sizeValue = { ...viewport };
    }

    get scale(): number {
        return this.scaleValue;
    }

    get center(): Point {
        return this.centerValue;
    }

    get viewport(): Size {
        return this.sizeValue;
    }

    get isAnimating(): boolean {
        return this.zoomAnimation !== null;
    }

    snapshot(): ViewState {
        return {
            scale: this.scaleValue,
            center: { ...this.centerValue },
            viewport: { ...this.sizeValue },
        };
    }

    setViewportSize(size: Size): void {
        this.sizeValue = { ...size };
    }

    /* -------------------------------------------------------------- */
    /*  Immediate zoom                                                */
    /* -------------------------------------------------------------- */

    clampScale(scale: number): number {
        return clamp(scale, this.config.minScale, this.config.maxScale);
    }

    setScale(scale: number): number {
        this.zoomAnimation = null;
        this.scaleValue = this.clampScale(scale);
        return this.scaleValue;
    }

    zoomIn(): number {
        return this.setScale(this.scaleValue * this.config.zoomFactor);
    }

    zoomOut(): number {
        return this.setScale(this.scaleValue / this.config.zoomFactor);
    }

    resetZoom(): number {
        return this.setScale(1);
    }

    /** Zoom by `factor` keeping the scene point under `screenPoint` fixed. */
    zoomAt(factor: number, screenPoint: Point): number {
        const anchor = this.screenToScene(screenPoint);
        this.setScale(this.scaleValue * factor);
        const { width, height } = this.sizeValue;
        this.centerValue = {
            x: anchor.x - (screenPoint.x - width / 2) / this.scaleValue,
            y: anchor.y - (screenPoint.y - height / 2) / this.scaleValue,
        };
        return this.scaleValue;
    }

    /* -------------------------------------------------------------- */
    /*  Animated zoom                                                 */
    /* -------------------------------------------------------------- */

    /** Ease from the current scale to `target` (clamped) over the zoom duration. */
    animateZoom(target: number): void {
        const to = this.clampScale(target);
        if (to === this.scaleValue) {
            this.zoomAnimation = null;
            return;
        }
        this.zoomAnimation = {
            from: this.scaleValue,
            to,
            elapsed: 0,
            duration: this.config.zoomDurationMs,
        };
    }

    /** Advance a running zoom animation. Returns true when the scale changed. */
    tick(dt: number): boolean {
        const animation = this.zoomAnimation;
        if (!animation || dt <= 0) return false;

        animation.elapsed = Math.min(animation.duration, animation.elapsed + dt);
        const t = animation.elapsed / animation.duration;
        const previous = this.scaleValue;
        this.scaleValue = t >= 1 ? animation.to : lerp(animation.from, animation.to, easeCubicOut(t));
        if (t >= 1) {
            this.zoomAnimation = null;
        }
        return this.scaleValue !== previous;
    }

    /* -------------------------------------------------------------- */
    /*  Fitting                                                       */
    /* -------------------------------------------------------------- */

    /**
     * Scale and center so `content` (padded) fills the viewport, never
     * zooming in past 100%. An empty scene leaves the view untouched.
     */
    fitInView(content: Rect | null): number {
        if (!content || isEmptyRect(content)) return this.scaleValue;
        const padded = expandRect(content, this.config.fitPadding);
        const fitted = this.fitScale(padded);
        if (fitted === null) return this.scaleValue;

        this.zoomAnimation = null;
        const ceiling = Math.min(1, this.config.maxScale);
        this.scaleValue = clamp(fitted, this.config.minScale, ceiling);
        this.centerValue = rectCenter(padded);
        return this.scaleValue;
    }

    /** Fit an arbitrary scene rectangle (e.g. a rubber-band selection). */
    zoomToRect(rect: Rect): number {
        if (isEmptyRect(rect)) return this.scaleValue;
        const fitted = this.fitScale(rect);
        if (fitted === null) return this.scaleValue;

        this.zoomAnimation = null;
        this.scaleValue = this.clampScale(fitted);
        this.centerValue = rectCenter(rect);
        return this.scaleValue;
    }

    private fitScale(rect: Rect): number | null {
        const { width, height } = this.sizeValue;
        if (!(width > 0) || !(height > 0)) return null;
        return Math.min(width / rect.width, height / rect.height);
    }

    /* -------------------------------------------------------------- */
    /*  Panning and coordinate mapping                                */
    /* -------------------------------------------------------------- */

    /** Move the view by a screen-space drag delta. */
    panBy(dx: number, dy: number): void {
        this.centerValue = {
            x: this.centerValue.x - dx / this.scaleValue,
            y: this.centerValue.y - dy / this.scaleValue,
        };
    }

    screenToScene(point: Point): Point {
        const { width, height } = this.sizeValue;
        return {
            x: (point.x - width / 2) / this.scaleValue + this.centerValue.x,
            y: (point.y - height / 2) / this.scaleValue + this.centerValue.y,
        };
    }

    sceneToScreen(point: Point): Point {
        const { width, height } = this.sizeValue;
        return {
            x: (point.x - this.centerValue.x) * this.scaleValue + width / 2,
            y: (point.y - this.centerValue.y) * this.scaleValue + height / 2,
        };
    }

    /** Scene rectangle currently visible. */
    visibleRect(): Rect {
        const { width, height } = this.sizeValue;
        const topLeft = this.screenToScene({ x: 0, y: 0 });
        return {
            x: topLeft.x,
            y: topLeft.y,
            width: width / this.scaleValue,
            height: height / this.scaleValue,
        };
    }
}
