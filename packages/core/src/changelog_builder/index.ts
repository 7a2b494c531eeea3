export {
  ChangelogBuilder,
  CATEGORY_HEADINGS,
  classifyCommit,
  buildCommitUrl,
  formatCommitLine,
  renderChangelog,
} from './changelog_builder';
export { ChangelogGenerator } from './changelog_generator';
export { CHANGELOG_CATEGORIES } from './changelog_builder.types';
export type {
  ChangelogCategory,
  ClassifiedSubject,
  CommitLinkOptions,
  ChangelogSection,
  ChangelogDocument,
  ChangelogBuilderOptions,
  ChangelogGeneratorDependencies,
  GenerateChangelogOptions,
  GeneratedChangelog,
  IChangelogGenerator,
} from './changelog_builder.types';
