/** Raised by `resolveConfig` with one entry per invalid field. */
export class ConfigError extends Error {
    readonly issues: readonly string[];

    constructor(issues: readonly string[]) {
        super(`Invalid configuration: ${issues.join('; ')}`);
        this.name = 'ConfigError';
        this.issues = issues;
    }
}

export class ChannelClosedError extends Error {
    constructor(channel: string) {
        super(`Channel "${channel}" is closed`);
        this.name = 'ChannelClosedError';
    }
}

export function toErrorMessage(err: unknown): string {
    if (err instanceof Error) return err.message;
    if (typeof err === 'string') return err;
    return String(err);
}

export function isAbortError(err: unknown): boolean {
    return err instanceof Error && (err.name === 'AbortError' || err.name === 'APIUserAbortError');
}
