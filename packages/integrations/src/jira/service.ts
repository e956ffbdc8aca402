/**
 * JIRA Service
 *
 * Facade over the jira.js Version 3 client. Every operation logs its
 * outcome and returns a Result instead of throwing.
 *
 * @packageDocumentation
 */

import { Version3Client } from 'jira.js';
import { createServiceLogger } from '@flowkit/core';
import {
  describeError,
  errors,
  fail,
  ok,
  statusOf,
  toIntegrationError,
  type IntegrationError,
  type Result,
} from '../result.js';
import { isRecord, readArray, readBoolean, readField, readString } from '../utils/read.js';
import { adfToPlainText } from './adf.js';
import type {
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
  UpdateComponentInput,
  UsersWithRoles,
} from './types.js';

const jiraLogger = createServiceLogger('jira-service');

const USER_ROLE_ACTOR = 'atlassian-user-role-actor';
const CUSTOM_FIELD_PREFIX = 'customfield_';

/**
 * Normalize a host ("org.atlassian.net" or "https://org.atlassian.net/") to a base URL
 */
export function toBaseUrl(host: string): string {
  const trimmed = host.trim().replace(/\/+$/, '');
  return /^https?:\/\//.test(trimmed) ? trimmed : `https://${trimmed}`;
}

/** Quote a value for use inside a JQL string literal */
export function jqlString(value: string): string {
  return `"${value.replace(/\\/g, '\\\\').replace(/"/g, '\\"')}"`;
}

function toUser(user: unknown): JiraUser | null {
  if (!isRecord(user)) return null;
  return {
    accountId: readString(user, 'accountId') || '',
    displayName: readString(user, 'displayName') || '',
    emailAddress: readString(user, 'emailAddress') || '',
  };
}

/**
 * Transform a JIRA issue payload into a JiraIssue
 */
export function transformIssue(issue: { id?: string; key?: string; fields?: unknown }): JiraIssue {
  const fields = isRecord(issue.fields) ? issue.fields : {};
  const description = fields.description;

  return {
    id: issue.id || '',
    key: issue.key || '',
    summary: readString(fields, 'summary') || '',
    description: description == null ? null : adfToPlainText(description),
    status: readString(readField(fields, 'status'), 'name') || 'Unknown',
    issueType: readString(readField(fields, 'issuetype'), 'name') || 'Unknown',
    assignee: toUser(fields.assignee),
    reporter: toUser(fields.reporter),
    priority: readString(readField(fields, 'priority'), 'name') ?? null,
    created: readString(fields, 'created') ?? null,
    updated: readString(fields, 'updated') ?? null,
    labels: readArray(fields, 'labels').filter((label): label is string => typeof label === 'string'),
    fields,
  };
}

/**
 * Role ID from a role URL such as ".../project/PROJ/role/10002"
 */
export function roleIdFromUrl(url: string): number | null {
  const last = url.replace(/\/+$/, '').split('/').pop() || '';
  const id = Number(last);
  return Number.isInteger(id) && last !== '' ? id : null;
}

function notFoundOr(error: unknown, query: string, message: string): IntegrationError {
  return statusOf(error) === 404 ? errors.notFound(query, message) : toIntegrationError(error);
}

// =============================================================================
// JiraService Class
// =============================================================================

export class JiraService {
  private readonly client: Version3Client;
  readonly baseUrl: string;

  constructor(config: JiraServiceConfig, client?: Version3Client) {
    this.baseUrl = toBaseUrl(config.host);
    this.client =
      client ??
      new Version3Client({
        host: this.baseUrl,
        authentication: {
          basic: {
            email: config.email,
            apiToken: config.apiToken,
          },
        },
      });
    jiraLogger.debug('Jira client initialized', { host: this.baseUrl });
  }

  /**
   * Verify credentials by fetching the current user
   */
  async testConnection(): Promise<Result<JiraUser>> {
    const op = jiraLogger.startOperation('testConnection');

    try {
      const user = await this.client.myself.getCurrentUser();
      const current = toUser(user);
      if (!current) {
        op.failure('Empty user response');
        return fail(errors.generic('Empty response from /myself'));
      }
      op.success(`Connected as ${current.displayName}`, { accountId: current.accountId });
      return ok(current);
    } catch (error) {
      op.failure(describeError(error));
      return fail(toIntegrationError(error));
    }
  }

  // ===========================================================================
  // Issues
  // ===========================================================================

  async getIssue(issueKey: string, fields?: string[]): Promise<Result<JiraIssue>> {
    const op = jiraLogger.startOperation('getIssue', { issueKey });

    try {
      const issue = await this.client.issues.getIssue({ issueIdOrKey: issueKey, fields });
      const transformed = transformIssue(issue);
      op.success(`Retrieved issue: ${transformed.key} - ${transformed.summary}`);
      return ok(transformed);
    } catch (error) {
      op.failure(describeError(error), { issueKey });
      return fail(notFoundOr(error, issueKey, `Issue ${issueKey} not found`));
    }
  }

  async searchIssues(
    jql: string,
    maxResults = 50,
    fields: string[] = ['summary', 'status', 'issuetype', 'assignee', 'reporter', 'priority', 'created', 'updated', 'labels', 'description']
  ): Promise<Result<JiraIssue[]>> {
    const op = jiraLogger.startOperation('searchIssues', { jql, maxResults });

    try {
      const result = await this.client.issueSearch.searchForIssuesUsingJqlEnhancedSearchPost({
        jql,
        maxResults,
        fields,
      });
      const issues = (result.issues || []).map((issue) => transformIssue(issue));
      op.success(`Found ${issues.length} issues`, {
        issueKeys: issues.slice(0, 5).map((i) => i.key),
      });
      return ok(issues);
    } catch (error) {
      op.failure(describeError(error), { jql });
      return fail(toIntegrationError(error));
    }
  }

  async createIssue(input: CreateIssueInput): Promise<Result<CreatedIssue>> {
    const op = jiraLogger.startOperation('createIssue', {
      projectKey: input.projectKey,
      issueType: input.issueType || 'Task',
    });

    try {
      const created = await this.client.issues.createIssue({
        fields: {
          ...input.extraFields,
          project: { key: input.projectKey },
          summary: input.summary,
          issuetype: { name: input.issueType || 'Task' },
          ...(input.description !== undefined ? { description: input.description } : {}),
        },
      });
      const issue = { id: created.id || '', key: created.key || '' };
      op.success(`Created issue: ${issue.key}`, { id: issue.id });
      return ok(issue);
    } catch (error) {
      op.failure(describeError(error));
      return fail(toIntegrationError(error));
    }
  }

  async updateIssue(issueKey: string, fields: Record<string, unknown>): Promise<Result<boolean>> {
    const op = jiraLogger.startOperation('updateIssue', {
      issueKey,
      fields: Object.keys(fields),
    });

    try {
      await this.client.issues.editIssue({ issueIdOrKey: issueKey, fields });
      op.success(`Updated issue: ${issueKey}`);
      return ok(true);
    } catch (error) {
      op.failure(describeError(error), { issueKey });
      return fail(notFoundOr(error, issueKey, `Issue ${issueKey} not found`));
    }
  }

  async addComment(issueKey: string, body: string): Promise<Result<{ id: string }>> {
    const op = jiraLogger.startOperation('addComment', { issueKey });

    try {
      const comment = await this.client.issueComments.addComment({
        issueIdOrKey: issueKey,
        comment: body,
      });
      op.success(`Added comment to ${issueKey}`, { commentId: comment.id });
      return ok({ id: comment.id || '' });
    } catch (error) {
      op.failure(describeError(error), { issueKey });
      return fail(notFoundOr(error, issueKey, `Issue ${issueKey} not found`));
    }
  }

  async getIssueTypes(): Promise<Result<JiraIssueType[]>> {
    const op = jiraLogger.startOperation('getIssueTypes');

    try {
      const types = await this.client.issueTypes.getIssueAllTypes();
      const mapped = types.map((type) => ({
        id: type.id || '',
        name: type.name || '',
        description: type.description || '',
        subtask: type.subtask ?? false,
      }));
      op.success(`Found ${mapped.length} issue types`);
      return ok(mapped);
    } catch (error) {
      op.failure(describeError(error));
      return fail(toIntegrationError(error));
    }
  }

  // ===========================================================================
  // Projects
  // ===========================================================================

  async getProjects(maxResults = 100): Promise<Result<JiraProjectSummary[]>> {
    const op = jiraLogger.startOperation('getProjects');

    try {
      const page = await this.client.projects.searchProjects({ maxResults });
      const projects = (page.values || []).map((project) => ({
        id: project.id || '',
        key: project.key || '',
        name: project.name || '',
      }));
      op.success(`Found ${projects.length} projects`);
      return ok(projects);
    } catch (error) {
      op.failure(describeError(error));
      return fail(toIntegrationError(error));
    }
  }

  async getProject(projectKey: string): Promise<Result<JiraProjectDetails>> {
    const op = jiraLogger.startOperation('getProject', { projectKey });

    try {
      const project = await this.client.projects.getProject({ projectIdOrKey: projectKey });
      const details: JiraProjectDetails = {
        id: project.id || '',
        key: project.key || projectKey,
        name: project.name || '',
        description: project.description || null,
        lead: readString(project.lead, 'displayName') ?? null,
      };
      op.success(`Retrieved project: ${details.key} - ${details.name}`);
      return ok(details);
    } catch (error) {
      op.failure(describeError(error), { projectKey });
      return fail(notFoundOr(error, projectKey, `Project ${projectKey} not found`));
    }
  }

  // ===========================================================================
  // Groups and users
  // ===========================================================================

  async getGroups(maxResults = 50): Promise<Result<JiraGroup[]>> {
    const op = jiraLogger.startOperation('getGroups');

    try {
      const page = await this.client.groups.bulkGetGroups({ maxResults });
      const groups = (page.values || []).map((group) => ({
        name: group.name || '',
        groupId: group.groupId || null,
      }));
      op.success(`Found ${groups.length} groups`);
      return ok(groups);
    } catch (error) {
      op.failure(describeError(error));
      return fail(toIntegrationError(error));
    }
  }

  async getGroupMembers(groupName: string, maxResults = 50): Promise<Result<JiraGroupMember[]>> {
    const op = jiraLogger.startOperation('getGroupMembers', { groupName });

    try {
      const page = await this.client.groups.getUsersFromGroup({ groupname: groupName, maxResults });
      const members = (page.values || []).map((user) => ({
        accountId: user.accountId || '',
        displayName: user.displayName || '',
        emailAddress: user.emailAddress || '',
        active: user.active ?? false,
      }));
      op.success(`Found ${members.length} members in ${groupName}`);
      return ok(members);
    } catch (error) {
      op.failure(describeError(error), { groupName });
      return fail(notFoundOr(error, groupName, `Group ${groupName} not found`));
    }
  }

  /**
   * Users with their roles.
   *
   * With a project: one entry per user per project role.
   * Without: all users from user search, falling back to group membership
   * (deduplicated by account, groups merged) when the search fails or is empty.
   * Roles, users or groups that cannot be read are skipped and listed in
   * `partialFailures`.
   */
  async getUsersWithRoles(projectKey?: string, includeGroups = true): Promise<Result<UsersWithRoles>> {
    const op = jiraLogger.startOperation('getUsersWithRoles', { projectKey, includeGroups });

    try {
      const result = projectKey
        ? await this.collectProjectRoleUsers(projectKey)
        : await this.collectGlobalUsers(includeGroups);

      if (result.partialFailures.length > 0) {
        jiraLogger.warn('Some user sources could not be read', {
          partialFailures: result.partialFailures,
        });
      }
      op.success(`Found ${result.users.length} users`, {
        partialFailures: result.partialFailures.length,
      });
      return ok(result);
    } catch (error) {
      op.failure(describeError(error), { projectKey });
      return fail(
        projectKey
          ? notFoundOr(error, projectKey, `Project ${projectKey} not found`)
          : toIntegrationError(error)
      );
    }
  }

  private async collectProjectRoleUsers(projectKey: string): Promise<UsersWithRoles> {
    const roles = await this.client.projectRoles.getProjectRoles({ projectIdOrKey: projectKey });
    const users: RoleUser[] = [];
    const partialFailures: string[] = [];

    for (const [roleName, roleUrl] of Object.entries(roles)) {
      const roleId = typeof roleUrl === 'string' ? roleIdFromUrl(roleUrl) : null;
      if (roleId === null) {
        partialFailures.push(`role:${roleName}`);
        continue;
      }

      try {
        const role = await this.client.projectRoles.getProjectRole({
          projectIdOrKey: projectKey,
          id: roleId,
        });
        for (const actor of readArray(role, 'actors')) {
          if (readString(actor, 'type') !== USER_ROLE_ACTOR) continue;
          const actorUser = readField(actor, 'actorUser');
          users.push({
            accountId: readString(actorUser, 'accountId') || '',
            displayName: readString(actor, 'displayName') || '',
            emailAddress: readString(actorUser, 'emailAddress') || '',
            type: 'project_role',
            projectKey,
            role: roleName,
            roleId,
            groups: [],
          });
        }
      } catch (error) {
        jiraLogger.warn(`Could not read role ${roleName}`, {
          projectKey,
          error: error instanceof Error ? error.message : String(error),
        });
        partialFailures.push(`role:${roleName}`);
      }
    }

    return { users, partialFailures };
  }

  /**
   * Every user the search API returns. An empty query is rejected by some
   * sites, so '.' is tried next; an empty list means both came up empty.
   */
  private async searchAllUsers(): Promise<JiraGroupMember[]> {
    for (const query of ['', '.']) {
      try {
        const found = await this.client.userSearch.findUsers({ query, maxResults: 1000 });
        if (found.length > 0) {
          return found.map((user) => ({
            accountId: user.accountId || '',
            displayName: user.displayName || '',
            emailAddress: user.emailAddress || '',
            active: user.active ?? false,
          }));
        }
      } catch (error) {
        jiraLogger.warn(`User search failed for query '${query}'`, {
          error: error instanceof Error ? error.message : String(error),
        });
      }
    }
    return [];
  }

  private async collectGlobalUsers(includeGroups: boolean): Promise<UsersWithRoles> {
    const searched = await this.searchAllUsers();

    if (searched.length === 0) {
      jiraLogger.info('User search found nobody, falling back to group membership');
      return this.collectGroupMembers();
    }

    const users: RoleUser[] = [];
    const partialFailures: string[] = [];

    for (const user of searched) {
      let groups: string[] = [];
      if (includeGroups) {
        try {
          const userGroups = await this.client.users.getUserGroups({ accountId: user.accountId });
          groups = userGroups.map((group) => group.name || '').filter(Boolean);
        } catch (error) {
          jiraLogger.warn(`Could not read groups for ${user.displayName}`, {
            accountId: user.accountId,
            error: error instanceof Error ? error.message : String(error),
          });
          partialFailures.push(`user:${user.accountId}`);
        }
      }
      users.push({ ...user, type: 'global_user', groups });
    }

    return { users, partialFailures };
  }

  private async collectGroupMembers(): Promise<UsersWithRoles> {
    const page = await this.client.groups.bulkGetGroups({ maxResults: 1000 });
    const byAccount = new Map<string, RoleUser>();
    const partialFailures: string[] = [];

    for (const group of page.values || []) {
      const groupName = group.name;
      if (!groupName) continue;

      try {
        const members = await this.client.groups.getUsersFromGroup({
          groupname: groupName,
          maxResults: 1000,
        });
        for (const member of members.values || []) {
          const accountId = member.accountId || '';
          const existing = byAccount.get(accountId);
          if (existing) {
            if (!existing.groups.includes(groupName)) existing.groups.push(groupName);
            continue;
          }
          byAccount.set(accountId, {
            accountId,
            displayName: member.displayName || '',
            emailAddress: member.emailAddress || '',
            active: member.active ?? false,
            type: 'group_member',
            groups: [groupName],
          });
        }
      } catch (error) {
        jiraLogger.warn(`Could not read members of ${groupName}`, {
          error: error instanceof Error ? error.message : String(error),
        });
        partialFailures.push(`group:${groupName}`);
      }
    }

    return { users: [...byAccount.values()], partialFailures };
  }

  /**
   * Account ID of the one user whose account ID, email or display name equals
   * the lead exactly; null when none or several match
   */
  private async resolveAccountId(lead: string): Promise<string | null> {
    const found = await this.client.userSearch.findUsers({ query: lead, maxResults: 10 });
    const exact = found.filter(
      (user) =>
        user.accountId === lead || user.emailAddress === lead || user.displayName === lead
    );
    return exact.length === 1 ? exact[0].accountId || null : null;
  }

  // ===========================================================================
  // Components
  // ===========================================================================

  async getProjectComponents(projectKey: string): Promise<Result<JiraComponent[]>> {
    const op = jiraLogger.startOperation('getProjectComponents', { projectKey });

    const project = await this.getProject(projectKey);
    if (!project.success) {
      op.failure(project.error.message);
      return project;
    }

    try {
      const components = await this.client.projectComponents.getProjectComponents({
        projectIdOrKey: projectKey,
      });
      const mapped = components.map((component) => this.toComponent(component, project.data));
      op.success(`Found ${mapped.length} components in ${projectKey}`);
      return ok(mapped);
    } catch (error) {
      op.failure(describeError(error), { projectKey });
      return fail(toIntegrationError(error));
    }
  }

  private toComponent(component: unknown, project: JiraProjectSummary): JiraComponent {
    const lead = readField(component, 'lead');
    return {
      id: readString(component, 'id') || '',
      name: readString(component, 'name') || '',
      description: readString(component, 'description') || '',
      lead: readString(lead, 'displayName') || 'No lead assigned',
      leadAccountId: readString(lead, 'accountId') ?? null,
      assigneeType: readString(component, 'assigneeType') || 'UNASSIGNED',
      isAssigneeTypeValid: readBoolean(component, 'isAssigneeTypeValid') ?? false,
      projectKey: project.key,
      projectName: project.name,
    };
  }

  /**
   * Create a component; an unresolvable lead is dropped with a warning
   */
  async createComponent(input: CreateComponentInput): Promise<Result<JiraComponent>> {
    const op = jiraLogger.startOperation('createComponent', {
      projectKey: input.projectKey,
      name: input.name,
    });

    const project = await this.getProject(input.projectKey);
    if (!project.success) {
      op.failure(project.error.message);
      return project;
    }

    let leadAccountId: string | undefined;
    if (input.lead) {
      try {
        leadAccountId = (await this.resolveAccountId(input.lead)) ?? undefined;
      } catch (error) {
        jiraLogger.warn('Lead lookup failed', {
          lead: input.lead,
          error: error instanceof Error ? error.message : String(error),
        });
      }
      if (!leadAccountId) {
        jiraLogger.warn(`Lead '${input.lead}' not found, creating component without a lead`);
      }
    }

    try {
      const created = await this.client.projectComponents.createComponent({
        project: input.projectKey,
        name: input.name,
        description: input.description,
        leadAccountId,
        assigneeType: input.assigneeType || 'UNASSIGNED',
      });
      const component = this.toComponent(created, project.data);
      op.success(`Created component: ${component.name}`, { id: component.id });
      return ok(component);
    } catch (error) {
      op.failure(describeError(error));
      return fail(toIntegrationError(error));
    }
  }

  /**
   * Update a component; an unresolvable lead aborts without changes
   */
  async updateComponent(componentId: string, input: UpdateComponentInput): Promise<Result<boolean>> {
    const op = jiraLogger.startOperation('updateComponent', { componentId });

    const changes: {
      name?: string;
      description?: string;
      leadAccountId?: string;
      assigneeType?: UpdateComponentInput['assigneeType'];
    } = {};
    if (input.name !== undefined) changes.name = input.name;
    if (input.description !== undefined) changes.description = input.description;
    if (input.assigneeType !== undefined) changes.assigneeType = input.assigneeType;

    if (input.lead !== undefined) {
      let leadAccountId: string | null = null;
      try {
        leadAccountId = await this.resolveAccountId(input.lead);
      } catch (error) {
        jiraLogger.warn('Lead lookup failed', {
          lead: input.lead,
          error: error instanceof Error ? error.message : String(error),
        });
      }
      if (!leadAccountId) {
        op.failure(`Lead '${input.lead}' not found`);
        return fail(errors.notFound(input.lead, `Lead '${input.lead}' not found`));
      }
      changes.leadAccountId = leadAccountId;
    }

    if (Object.keys(changes).length === 0) {
      op.failure('No updates provided');
      return fail(errors.generic('No updates provided'));
    }

    try {
      await this.client.projectComponents.updateComponent({ id: componentId, ...changes });
      op.success(`Updated component ${componentId}`, { fields: Object.keys(changes) });
      return ok(true);
    } catch (error) {
      op.failure(describeError(error), { componentId });
      return fail(notFoundOr(error, componentId, `Component ${componentId} not found`));
    }
  }

  // ===========================================================================
  // Custom fields
  // ===========================================================================

  /**
   * Custom fields used by a project's issues. Falls back to every custom
   * field when none are in use or the issue scan fails.
   */
  async getProjectCustomFields(projectKey: string): Promise<Result<JiraCustomField[]>> {
    const op = jiraLogger.startOperation('getProjectCustomFields', { projectKey });

    const project = await this.getProject(projectKey);
    if (!project.success) {
      op.failure(project.error.message);
      return project;
    }

    try {
      const allFields = await this.client.issueFields.getFields();
      const customFields = allFields.filter((field) =>
        (field.id || '').startsWith(CUSTOM_FIELD_PREFIX)
      );

      let selected = customFields;
      try {
        const used = await this.customFieldsInUse(projectKey);
        const inUse = customFields.filter((field) => used.has(field.id || ''));
        if (inUse.length > 0) {
          selected = inUse;
        } else {
          jiraLogger.info('No custom fields in use, returning all custom fields', { projectKey });
        }
      } catch (error) {
        jiraLogger.warn('Could not scan project issues, returning all custom fields', {
          projectKey,
          error: error instanceof Error ? error.message : String(error),
        });
      }

      const mapped = selected.map((field) => this.toCustomField(field, project.data));
      op.success(`Found ${mapped.length} custom fields for ${projectKey}`);
      return ok(mapped);
    } catch (error) {
      op.failure(describeError(error), { projectKey });
      return fail(toIntegrationError(error));
    }
  }

  private async customFieldsInUse(projectKey: string): Promise<Set<string>> {
    const result = await this.client.issueSearch.searchForIssuesUsingJqlEnhancedSearchPost({
      jql: `project = ${jqlString(projectKey)}`,
      maxResults: 50,
      fields: ['*all'],
    });

    const used = new Set<string>();
    for (const issue of result.issues || []) {
      const fields = readField(issue, 'fields');
      if (!isRecord(fields)) continue;
      for (const [id, value] of Object.entries(fields)) {
        if (id.startsWith(CUSTOM_FIELD_PREFIX) && value !== null && value !== undefined) {
          used.add(id);
        }
      }
    }
    return used;
  }

  private toCustomField(field: unknown, project: JiraProjectSummary): JiraCustomField {
    const schema = readField(field, 'schema');
    return {
      id: readString(field, 'id') || '',
      name: readString(field, 'name') || '',
      custom: readBoolean(field, 'custom') ?? true,
      orderable: readBoolean(field, 'orderable') ?? false,
      navigable: readBoolean(field, 'navigable') ?? true,
      searchable: readBoolean(field, 'searchable') ?? true,
      clauseNames: readArray(field, 'clauseNames').filter(
        (name): name is string => typeof name === 'string'
      ),
      fieldType: readString(schema, 'type') || 'Unknown',
      system: readString(schema, 'system') || 'N/A',
      items: readString(schema, 'items') || 'N/A',
      projectKey: project.key,
      projectName: project.name,
    };
  }
}

/**
 * Create a JIRA facade from configuration
 */
export function createJiraService(config: JiraServiceConfig): JiraService {
  return new JiraService(config);
}
