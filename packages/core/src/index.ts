export * as ActionsOutput from "./actions_output";
export * as ChangelogBuilder from "./changelog_builder";
export * as Config from "./config";
export * as Git from "./git";
export * as GitHub from "./github";
export * as Logger from "./logger";
export * as ReleaseTag from "./release_tag";
export * as TagResolver from "./tag_resolver";
