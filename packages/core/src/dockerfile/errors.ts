import { StagefileRuntimeError } from '../errors/StagefileRuntimeError.js';
import { ErrorScope, ErrorType } from '../errors/types.js';
import { DockerfileErrorCode } from './error-codes.js';

/**
 * Dockerfile error factory
 * Each method creates a properly typed error with DOCKERFILE scope
 */
export class DockerfileError {
    /**
     * A key under `stages` cannot be referenced as `<name>:<path>` (empty, or contains ':')
     */
    static invalidStageName(stageName: string) {
        return new StagefileRuntimeError(
            DockerfileErrorCode.INVALID_STAGE_NAME,
            ErrorScope.DOCKERFILE,
            ErrorType.USER,
            `invalid stage name '${stageName}'`,
            { stageName },
            'Stage names start with a letter or digit and contain only letters, digits, ".", "_" and "-"'
        );
    }

    /**
     * A copy source names a stage that is not declared under `stages`
     */
    static missingStage(stageName: string, source: string, consumer: string) {
        return new StagefileRuntimeError(
            DockerfileErrorCode.MISSING_STAGE,
            ErrorScope.DOCKERFILE,
            ErrorType.NOT_FOUND,
            `missing stage ${stageName}`,
            { stageName, source, consumer },
            `Declare a stage named '${stageName}' under 'stages' or fix the copy source '${source}'`
        );
    }

    /**
     * A stage is the source of a cross-stage copy but has no working directory to join paths against
     */
    static missingWorkdir(stageName: string, source: string, consumer: string) {
        return new StagefileRuntimeError(
            DockerfileErrorCode.MISSING_WORKDIR,
            ErrorScope.DOCKERFILE,
            ErrorType.USER,
            `stage ${stageName} must define workdir for copy file`,
            { stageName, source, consumer },
            `Set 'workdir' on stage '${stageName}'`
        );
    }

    static stageCycle(stages: string[]) {
        return new StagefileRuntimeError(
            DockerfileErrorCode.STAGE_CYCLE,
            ErrorScope.DOCKERFILE,
            ErrorType.USER,
            `stages copy from each other in a cycle: ${stages.join(', ')}`,
            { stages },
            'Remove one of the cross-stage copies so that every stage can be built before its consumers'
        );
    }

    static unsupportedShape(keyword: string, shape: string) {
        return new StagefileRuntimeError(
            DockerfileErrorCode.UNSUPPORTED_SHAPE,
            ErrorScope.DOCKERFILE,
            ErrorType.SYSTEM,
            `directive ${keyword} declares unsupported shape '${shape}'`,
            { keyword, shape },
            'This is an internal error - please report it'
        );
    }
}
