/**
 * In-memory implementations (no git binary or filesystem required)
 *
 * Suitable for tests and for tools that build a commit graph themselves.
 *
 * Usage:
 *   import { MemoryGitModule } from '@relkit/core/memory';
 */

// GitModule
export { MemoryGitModule } from './git/memory';
export type { MemoryCommitInput } from './git/memory';
