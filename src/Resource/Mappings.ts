/**
 * Process-wide attribute name -> resource type tables. Frozen at load time and only ever read.
 */

function freeze(map: Record<string, string>): Readonly<Record<string, string>> {
    return Object.freeze({ ...map });
}

/** Embedded fragments that become a single Resource when read. */
export const RESOURCE_MAP = freeze({
    author: `User`,
    assigned_to: `User`,
    project: `Project`,
    tracker: `Tracker`,
    status: `IssueStatus`,
    user: `User`,
    issue: `Issue`,
    priority: `Enumeration`,
    activity: `Enumeration`,
    category: `IssueCategory`,
    fixed_version: `Version`,
});

/** Embedded arrays that become a ResourceCollection when read. */
export const RESOURCE_SET_MAP = freeze({
    trackers: `Tracker`,
    issue_categories: `IssueCategory`,
    custom_fields: `CustomField`,
    groups: `Group`,
    users: `User`,
    memberships: `ProjectMembership`,
    relations: `IssueRelation`,
    attachments: `Attachment`,
    watchers: `User`,
    journals: `IssueJournal`,
    children: `Issue`,
    roles: `Role`,
});

/** Relation attributes, fetched with a filter on the related type. */
export const RELATIONS_MAP = freeze({
    wiki_pages: `WikiPage`,
    memberships: `ProjectMembership`,
    issue_categories: `IssueCategory`,
    versions: `Version`,
    news: `News`,
    relations: `IssueRelation`,
    time_entries: `TimeEntry`,
    issues: `Issue`,
});

/** Writing one of these also stores an `{id}` stub under the composite name. */
export const SINGLE_ATTR_ID_MAP = freeze({
    parent_id: `parent`,
    project_id: `project`,
    tracker_id: `tracker`,
    priority_id: `priority`,
    assigned_to_id: `assigned_to`,
    category_id: `category`,
    fixed_version_id: `fixed_version`,
    parent_issue_id: `parent`,
    issue_id: `issue`,
    activity_id: `activity`,
});

/** Writing one of these also stores a list of `{id}` stubs under the composite name. */
export const MULTIPLE_ATTR_ID_MAP = freeze({
    user_ids: `users`,
    role_ids: `roles`,
});

/** Own-key lookup that ignores the prototype chain. */
export function lookup(map: Readonly<Record<string, string>>, name: string): string | undefined {
    return Object.prototype.hasOwnProperty.call(map, name) ? map[name] : undefined;
}
