export { GitLabClient, GitLabGroupSchema, GitLabProjectSchema } from './gitlab-client';
export type { GitLabClientConfig, GitLabGroup, GitLabProject } from './gitlab-client';
export { GitLabApiError } from './gitlab-error';
export { cloneRepository, runGit } from './git';
export type { CloneOptions, CloneResult, GitRunner } from './git';
export { cloneGroups, cloneBaseRepositories, baseDirectory } from './clone';
export type { CloneSummary, GroupCloneOptions, GroupDirectory } from './clone';
export { findGroupFiles, findBaseFiles, filterInputFiles, stripComments, hasCode } from './file-discovery';
