/**
 * Diagram configuration: defaults plus validated overrides.
 *
 * Every tunable constant of the layout, animation, viewport, ingestion and
 * explanation modules lives here so a host can adjust them in one place.
 */
import { ConfigError } from '../lib/errors';

export interface SizeConfig {
    width: number;
    height: number;
}

export interface LayoutConfig {
    /** Distance from the root center to each topic center (px). */
    topicRadius: number;
    /** Distance from a topic to its first detail (px). */
    detailBaseRadius: number;
    /** Angular window of a topic's detail arc (degrees). */
    detailSpanDegrees: number;
    /** Angle of the first topic (degrees, screen coordinates). */
    startAngleDegrees: number;
    /** Radial step between siblings, as a multiple of the detail width. */
    detailSpacingFactor: number;
    /** Minimum radius of the static file ring (px). */
    ringMinRadius: number;
    /** Gap between neighbours on the static file ring (px). */
    ringGap: number;
}

export interface SizesConfig {
    root: SizeConfig;
    topic: SizeConfig;
    detail: SizeConfig;
    fontSize: number;
    /** Expanded footprint never exceeds min size × this factor. */
    maxGrowthFactor: number;
    /** Widening step while fitting long text (px). */
    growthStep: number;
}

export interface ExpansionConfig {
    /** Fraction of the remaining distance covered per reference frame. */
    speed: number;
    /** Reference frame length the speed is expressed against (ms). */
    frameMs: number;
    epsilon: number;
    /** Detail nodes auto-collapse while the view scale is below this. */
    autoCollapseScale: number;
}

export interface ViewportConfig {
    minScale: number;
    maxScale: number;
    zoomFactor: number;
    zoomDurationMs: number;
    fitPadding: number;
    fitDebounceMs: number;
}

export interface IngestionConfig {
    rootLabel: string;
    rootFilesTopic: string;
    scanIntervalMs: number;
    maxFileBytes: number;
    excludedDirectories: string[];
    textExtensions: string[];
    channelCapacity: number;
}

export interface ExplanationConfig {
    baseURL: string;
    apiKey: string;
    model: string;
    prompt: string;
    channelCapacity: number;
}

export interface DiagramConfig {
    layout: LayoutConfig;
    sizes: SizesConfig;
    expansion: ExpansionConfig;
    viewport: ViewportConfig;
    ingestion: IngestionConfig;
    explanation: ExplanationConfig;
}

export type ConfigOverrides = {
    [K in keyof DiagramConfig]?: Partial<DiagramConfig[K]>;
};

export const defaultConfig: DiagramConfig = {
    layout: {
        topicRadius: 500,
        detailBaseRadius: 300,
        detailSpanDegrees: 120,
        startAngleDegrees: 90,
        detailSpacingFactor: 1.5,
        ringMinRadius: 200,
        ringGap: 100,
    },
    sizes: {
        root: { width: 200, height: 120 },
        topic: { width: 180, height: 100 },
        detail: { width: 500, height: 120 },
        fontSize: 10,
        maxGrowthFactor: 3,
        growthStep: 50,
    },
    expansion: {
        speed: 0.15,
        frameMs: 16,
        epsilon: 0.01,
        autoCollapseScale: 0.5,
    },
    viewport: {
        minScale: 0.1,
        maxScale: 3,
        zoomFactor: 1.15,
        zoomDurationMs: 200,
        fitPadding: 50,
        fitDebounceMs: 100,
    },
    ingestion: {
        rootLabel: 'Main Topic',
        rootFilesTopic: 'Root Files',
        scanIntervalMs: 2000,
        maxFileBytes: 10_000,
        excludedDirectories: ['.git', '.idea', '__pycache__', 'node_modules', 'venv', 'env'],
        textExtensions: [
            '.txt', '.py', '.js', '.ts', '.tsx', '.html', '.css', '.json', '.xml', '.yaml',
            '.yml', '.md', '.rst', '.ini', '.conf', '.sh', '.bat', '.ps1', '.java', '.cpp',
            '.c', '.h', '.hpp', '.cs', '.go', '.rb', '.php', '.pl', '.swift',
        ],
        channelCapacity: 256,
    },
    explanation: {
        baseURL: 'http://localhost:11434/v1',
        apiKey: 'ollama',
        model: 'llama3.1:latest',
        prompt: 'Please explain this code and return response in Markdown:',
        channelCapacity: 64,
    },
};

function positive(issues: string[], path: string, value: number): void {
    if (!Number.isFinite(value) || value <= 0) {
        issues.push(`${path} must be a positive number (got ${value})`);
    }
}

function positiveInteger(issues: string[], path: string, value: number): void {
    if (!Number.isInteger(value) || value <= 0) {
        issues.push(`${path} must be a positive integer (got ${value})`);
    }
}

function validate(config: DiagramConfig): string[] {
    const issues: string[] = [];
    const { layout, sizes, expansion, viewport, ingestion, explanation } = config;

    positive(issues, 'layout.topicRadius', layout.topicRadius);
    positive(issues, 'layout.detailBaseRadius', layout.detailBaseRadius);
    positive(issues, 'layout.detailSpacingFactor', layout.detailSpacingFactor);
    positive(issues, 'layout.ringMinRadius', layout.ringMinRadius);
    if (layout.detailSpanDegrees < 0 || layout.detailSpanDegrees > 360) {
        issues.push(`layout.detailSpanDegrees must be within [0, 360] (got ${layout.detailSpanDegrees})`);
    }

    for (const kind of ['root', 'topic', 'detail'] as const) {
        positive(issues, `sizes.${kind}.width`, sizes[kind].width);
        positive(issues, `sizes.${kind}.height`, sizes[kind].height);
    }
    positive(issues, 'sizes.fontSize', sizes.fontSize);
    positive(issues, 'sizes.growthStep', sizes.growthStep);
    if (sizes.maxGrowthFactor < 1) {
        issues.push(`sizes.maxGrowthFactor must be at least 1 (got ${sizes.maxGrowthFactor})`);
    }

    if (!(expansion.speed > 0 && expansion.speed <= 1)) {
        issues.push(`expansion.speed must be within (0, 1] (got ${expansion.speed})`);
    }
    positive(issues, 'expansion.frameMs', expansion.frameMs);
    positive(issues, 'expansion.epsilon', expansion.epsilon);

    positive(issues, 'viewport.minScale', viewport.minScale);
    if (viewport.maxScale < viewport.minScale) {
        issues.push(`viewport.maxScale must not be below viewport.minScale (got ${viewport.maxScale})`);
    }
    if (!(viewport.zoomFactor > 1)) {
        issues.push(`viewport.zoomFactor must be greater than 1 (got ${viewport.zoomFactor})`);
    }
    positive(issues, 'viewport.zoomDurationMs', viewport.zoomDurationMs);

    positive(issues, 'ingestion.scanIntervalMs', ingestion.scanIntervalMs);
    positiveInteger(issues, 'ingestion.maxFileBytes', ingestion.maxFileBytes);
    positiveInteger(issues, 'ingestion.channelCapacity', ingestion.channelCapacity);
    if (ingestion.rootLabel.trim().length === 0) {
        issues.push('ingestion.rootLabel must not be empty');
    }

    positiveInteger(issues, 'explanation.channelCapacity', explanation.channelCapacity);
    if (explanation.model.trim().length === 0) {
        issues.push('explanation.model must not be empty');
    }

    return issues;
}

/**
 * Merge section-level overrides onto the defaults and validate the result.
 * Throws a `ConfigError` naming every invalid field.
 */
export function resolveConfig(overrides: ConfigOverrides = {}, base: DiagramConfig = defaultConfig): DiagramConfig {
    const config: DiagramConfig = {
        layout: { ...base.layout, ...overrides.layout },
        sizes: { ...base.sizes, ...overrides.sizes },
        expansion: { ...base.expansion, ...overrides.expansion },
        viewport: { ...base.viewport, ...overrides.viewport },
        ingestion: { ...base.ingestion, ...overrides.ingestion },
        explanation: { ...base.explanation, ...overrides.explanation },
    };
    const issues = validate(config);
    if (issues.length > 0) {
        throw new ConfigError(issues);
    }
    return config;
}

export type EnvSource = Record<string, string | boolean | undefined>;

function envString(env: EnvSource, key: string): string | undefined {
    const value = env[key];
    return typeof value === 'string' && value.length > 0 ? value : undefined;
}

function envNumber(env: EnvSource, key: string): number | undefined {
    const value = envString(env, key);
    return value === undefined ? undefined : Number(value);
}

/**
 * Overrides read from `VITE_*` environment variables. Unset variables are
 * left out; malformed numbers surface through `resolveConfig` validation.
 */
export function overridesFromEnv(env: EnvSource): ConfigOverrides {
    const explanation: Partial<ExplanationConfig> = {};
    const baseURL = envString(env, 'VITE_EXPLAIN_BASE_URL');
    const apiKey = envString(env, 'VITE_EXPLAIN_API_KEY');
    const model = envString(env, 'VITE_EXPLAIN_MODEL');
    if (baseURL !== undefined) explanation.baseURL = baseURL;
    if (apiKey !== undefined) explanation.apiKey = apiKey;
    if (model !== undefined) explanation.model = model;

    const ingestion: Partial<IngestionConfig> = {};
    const scanIntervalMs = envNumber(env, 'VITE_SCAN_INTERVAL_MS');
    if (scanIntervalMs !== undefined) ingestion.scanIntervalMs = scanIntervalMs;

    return { explanation, ingestion };
}
