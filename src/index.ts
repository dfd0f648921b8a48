/**
 * gitmarks
 *
 * Repository awareness for directory listings: finds the git working tree
 * around a path, snapshots its status once, and answers per-file,
 * per-directory and ignore-list queries.
 */

export * from './core/discovery';
export * from './core/status.resolver';
export * from './core/status.snapshot';
export * from './core/status.flags';
export * from './core/repository.handle';
export * from './core/repository.provider';
export * from './core/simple-git.provider';
export * from './core/config.manager';
export * from './commands/list.command';
export * from './types/status.types';
export * from './types/config.types';
export * from './types/config.schema';
export * from './utils/status.markers';
export * from './errors/base.error';
export * from './errors/git.error';
export * from './errors/listing.error';
