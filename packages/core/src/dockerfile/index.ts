export {
    DockerfileSchema,
    StageSchema,
    StageNameSchema,
} from './schemas.js';
export type { Dockerfile, DockerfileInput, Stage, StageInput } from './schemas.js';

export { DIRECTIVES } from './directives.js';
export type {
    Directive,
    DirectiveKeyword,
    DirectiveShape,
    MappingField,
    ScalarField,
    SequenceField,
} from './directives.js';

export { mayQuote } from './quote.js';
export { BufferSink, StreamSink } from './sink.js';
export type { DirectiveSink } from './sink.js';

export {
    FINAL_STAGE_ID,
    createResolutionTable,
    getResolution,
    parseStageReference,
    resolveStage,
} from './resolver.js';
export type { ResolutionTable, StageResolution } from './resolver.js';

export { encodeStage } from './encoder.js';
export type { EncodeStageOptions } from './encoder.js';

export { orderStages, planStages, renderDockerfile, serializeDockerfile } from './serializer.js';
export type { SerializeOptions, StagePlan } from './serializer.js';

export { parseDockerfile } from './parse.js';
export { args, containerEnvVar, scripts } from './helpers.js';

export { DockerfileError } from './errors.js';
export { DockerfileErrorCode } from './error-codes.js';
