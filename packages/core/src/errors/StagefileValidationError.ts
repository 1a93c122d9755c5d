import { StagefileBaseError } from './StagefileBaseError.js';
import type { Issue } from './types.js';

/**
 * Aggregates validation issues (schema failures, bad config values).
 * The message lists every issue, so a single throw reads on its own.
 */
export class StagefileValidationError extends StagefileBaseError {
    constructor(public readonly issues: Issue[]) {
        super(StagefileValidationError.formatMessage(issues));
    }

    toJSON(): Record<string, unknown> {
        return {
            name: this.name,
            message: this.message,
            issues: this.issues,
        };
    }

    private static formatMessage(issues: Issue[]): string {
        if (issues.length === 0) {
            return 'Validation failed';
        }
        if (issues.length === 1) {
            return issues[0]?.message ?? 'Validation failed';
        }
        return `Validation failed with ${issues.length} errors:\n${issues
            .map((issue) => `  - ${issue.message}`)
            .join('\n')}`;
    }
}
