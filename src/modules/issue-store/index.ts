export { IssueClient, parseCreatedIssue, issueTypeOf } from './issue-client.js'
export type { IssueReader, IssueStore, IssueUpdate } from './issue-client.js'
export { IssueSchema } from './issue-schema.js'
export type { Issue } from './issue-schema.js'
