/**
 * JIRA Integration Types
 *
 * Plain shapes returned by the JIRA facade.
 */

/**
 * JIRA user information
 */
export interface JiraUser {
  accountId: string;
  displayName: string;
  emailAddress: string;
}

/**
 * JIRA issue representation
 */
export interface JiraIssue {
  id: string;
  key: string;
  summary: string;
  /** Plain text rendering of the ADF description */
  description: string | null;
  status: string;
  issueType: string;
  assignee: JiraUser | null;
  reporter: JiraUser | null;
  priority: string | null;
  created: string | null;
  updated: string | null;
  labels: string[];
  /** Every requested field as returned by JIRA */
  fields: Record<string, unknown>;
}

export interface CreateIssueInput {
  projectKey: string;
  summary: string;
  description?: string;
  /** Issue type name (default: Task) */
  issueType?: string;
  /** Additional fields merged into the create payload */
  extraFields?: Record<string, unknown>;
}

export interface CreatedIssue {
  id: string;
  key: string;
}

export interface JiraProjectSummary {
  id: string;
  key: string;
  name: string;
}

export interface JiraProjectDetails extends JiraProjectSummary {
  description: string | null;
  lead: string | null;
}

export interface JiraIssueType {
  id: string;
  name: string;
  description: string;
  subtask: boolean;
}

export interface JiraGroup {
  name: string;
  groupId: string | null;
}

export interface JiraGroupMember extends JiraUser {
  active: boolean;
}

// =============================================================================
// Users and roles
// =============================================================================

export type RoleUserSource = 'project_role' | 'global_user' | 'group_member';

export interface RoleUser extends JiraUser {
  type: RoleUserSource;
  active?: boolean;
  projectKey?: string;
  role?: string;
  roleId?: number;
  groups: string[];
}

export interface UsersWithRoles {
  users: RoleUser[];
  /** Roles, users or groups that could not be read, e.g. "role:Developers" */
  partialFailures: string[];
}

// =============================================================================
// Components
// =============================================================================

export type AssigneeType = 'PROJECT_DEFAULT' | 'COMPONENT_LEAD' | 'PROJECT_LEAD' | 'UNASSIGNED';

export interface JiraComponent {
  id: string;
  name: string;
  description: string;
  lead: string;
  leadAccountId: string | null;
  assigneeType: string;
  isAssigneeTypeValid: boolean;
  projectKey: string;
  projectName: string;
}

export interface CreateComponentInput {
  projectKey: string;
  name: string;
  description?: string;
  /** Lead as an account ID, email or display name */
  lead?: string;
  assigneeType?: AssigneeType;
}

export interface UpdateComponentInput {
  name?: string;
  description?: string;
  lead?: string;
  assigneeType?: AssigneeType;
}

// =============================================================================
// Custom fields
// =============================================================================

export interface JiraCustomField {
  id: string;
  name: string;
  custom: boolean;
  orderable: boolean;
  navigable: boolean;
  searchable: boolean;
  clauseNames: string[];
  fieldType: string;
  system: string;
  items: string;
  projectKey: string;
  projectName: string;
}

/**
 * Connection settings for the JIRA facade
 */
export interface JiraServiceConfig {
  /** Host with or without scheme, e.g. "yourorg.atlassian.net" */
  host: string;
  email: string;
  apiToken: string;
}
