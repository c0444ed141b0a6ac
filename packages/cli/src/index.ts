/**
 * @seedhash/cli
 *
 * Programmatic access to the seedhash command line.
 */

export { buildProgram } from './program.js';
export { createCommandContext } from './core/command-context.js';
export type { CommandContext, CommandContextOptions } from './core/command-context.js';
export { formatError } from './core/error-handler.js';
export { hashInputHandler } from './handlers/seeds/hash-input.js';
export { generateSeedsHandler } from './handlers/seeds/generate-seeds.js';
export { sampleSeedsHandler } from './handlers/seeds/sample-seeds.js';
export { buildHierarchyHandler } from './handlers/seeds/build-hierarchy.js';
export { hashSchema, generateSchema, sampleSchema, hierarchySchema } from './command-defs/seeds.js';
