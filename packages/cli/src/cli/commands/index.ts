export { handleRenderCommand, STDOUT_TARGET } from './render.js';
export type { RenderCommandOptionsInput, RenderCommandOptions, RenderResult } from './render.js';
export { handleCheckCommand } from './check.js';
export type { CheckCommandOptionsInput, CheckResult, CheckedStage } from './check.js';
