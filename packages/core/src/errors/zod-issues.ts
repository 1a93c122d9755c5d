import type { ZodError } from 'zod';
import { ErrorScope, ErrorType } from './types.js';
import type { Issue } from './types.js';

/**
 * Convert zod issues into our Issue shape.
 * Messages are prefixed with the dotted path so they read well without the path field.
 */
export function zodToIssues(
    error: ZodError,
    scope: ErrorScope | string = ErrorScope.CONFIG
): Issue[] {
    return error.issues.map((issue) => {
        const path = issue.path.length > 0 ? issue.path.join('.') : '(root)';
        return {
            code: 'schema_validation',
            message: `${path}: ${issue.message}`,
            scope,
            type: ErrorType.USER,
            path: [...issue.path],
        };
    });
}
