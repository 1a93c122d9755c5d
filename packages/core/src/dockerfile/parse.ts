import { StagefileValidationError } from '../errors/StagefileValidationError.js';
import { ErrorScope } from '../errors/types.js';
import { zodToIssues } from '../errors/zod-issues.js';
import { DockerfileSchema } from './schemas.js';
import type { Dockerfile } from './schemas.js';

/**
 * Validate untyped input (parsed YAML or JSON) as a build description
 *
 * @throws StagefileValidationError listing every schema issue
 */
export function parseDockerfile(input: unknown): Dockerfile {
    const result = DockerfileSchema.safeParse(input);
    if (!result.success) {
        throw new StagefileValidationError(zodToIssues(result.error, ErrorScope.CONFIG));
    }
    return result.data;
}
