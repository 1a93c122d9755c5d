export { ErrorScope, ErrorType } from './types.js';
export type { Issue, StagefileErrorCode } from './types.js';
export { StagefileBaseError } from './StagefileBaseError.js';
export { StagefileRuntimeError, toError } from './StagefileRuntimeError.js';
export { StagefileValidationError } from './StagefileValidationError.js';
export { zodToIssues } from './zod-issues.js';
