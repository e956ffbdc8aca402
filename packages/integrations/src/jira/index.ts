/**
 * JIRA Integration
 *
 * @example
 * import { JiraService } from '@flowkit/integrations';
 *
 * const jira = new JiraService({
 *   host: 'example.atlassian.net',
 *   email: 'someone@example.com',
 *   apiToken: 'test-token',
 * });
 *
 * const issues = await jira.searchIssues('project = DEMO ORDER BY created DESC', 10);
 * if (issues.success) {
 *   console.log(issues.data.map((issue) => issue.key));
 * }
 */

export type {
  AssigneeType,
  CreateComponentInput,
  CreatedIssue,
  CreateIssueInput,
  JiraComponent,
  JiraCustomField,
  JiraGroup,
  JiraGroupMember,
  JiraIssue,
  JiraIssueType,
  JiraProjectDetails,
  JiraProjectSummary,
  JiraServiceConfig,
  JiraUser,
  RoleUser,
  RoleUserSource,
  UpdateComponentInput,
  UsersWithRoles,
} from './types.js';

export {
  JiraService,
  createJiraService,
  jqlString,
  roleIdFromUrl,
  toBaseUrl,
  transformIssue,
} from './service.js';

export { adfToPlainText } from './adf.js';
