/**
 * @stagefile/core
 *
 * Renders multi-stage build descriptions into Dockerfiles.
 */

export * from './errors/index.js';
export * from './logger/index.js';
export * from './dockerfile/index.js';
