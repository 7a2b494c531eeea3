export { TagResolver } from './tag_resolver';
export type {
  ITagResolver,
  TagResolverDependencies,
  ResolvedPreviousTag,
  ResolutionStrategy,
} from './tag_resolver.types';
