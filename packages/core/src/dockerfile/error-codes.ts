/**
 * Dockerfile serialization error codes
 * Covers cross-stage references, stage ordering, and directive metadata
 */
export enum DockerfileErrorCode {
    // Resolution
    INVALID_STAGE_NAME = 'dockerfile_invalid_stage_name',
    MISSING_STAGE = 'dockerfile_missing_stage',
    MISSING_WORKDIR = 'dockerfile_missing_workdir',

    // Ordering
    STAGE_CYCLE = 'dockerfile_stage_cycle',

    // Directive table (programming defects)
    UNSUPPORTED_SHAPE = 'dockerfile_unsupported_shape',
}
