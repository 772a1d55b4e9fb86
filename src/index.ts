/**
 * @relflow/engine
 *
 * Resumable release orchestration: freeze a release branch, stamp the
 * version, tag, publish docs and packages, merge back.
 * Every side effect goes through the injected EngineContext.
 */

// Core interfaces and errors
export * from '#/core';

// Version utilities (semver parsing, bumping, comparison)
export * from '#/version';

// Release stages (ordered state machine states)
export * from '#/stages';

// Schemas (Zod validation)
export * from '#/schemas';

// YAML + Zod parsing with readable errors
export * from '#/friendly-errors';

// Version registry (read and stamp version locations)
export * from '#/versioning';

// Branch manager (git branches, tags, merges)
export * from '#/branch';

// Artifact publisher (docs and package builds, publish, alias links)
export * from '#/publisher';

// release.yaml loading
export * from '#/config';

// Release workflow, records and line locks
export * from '#/workflow';

// Node.js implementations of the core interfaces
export * from '#/node';
