import { NotFoundError } from '../Common/Errors.js';
import type { ResourceType } from './ResourceType.js';
import { Attachment } from './Types/Attachment.js';
import { CustomField } from './Types/CustomField.js';
import { Enumeration } from './Types/Enumeration.js';
import { Group } from './Types/Group.js';
import { Issue } from './Types/Issue.js';
import { IssueCategory } from './Types/IssueCategory.js';
import { IssueJournal } from './Types/IssueJournal.js';
import { IssueRelation } from './Types/IssueRelation.js';
import { IssueStatus } from './Types/IssueStatus.js';
import { News } from './Types/News.js';
import { Project } from './Types/Project.js';
import { ProjectMembership } from './Types/ProjectMembership.js';
import { Query } from './Types/Query.js';
import { Role } from './Types/Role.js';
import { TimeEntry } from './Types/TimeEntry.js';
import { Tracker } from './Types/Tracker.js';
import { User } from './Types/User.js';
import { Version } from './Types/Version.js';
import { WikiPage } from './Types/WikiPage.js';

const TYPES: readonly ResourceType[] = [
    Project,
    Issue,
    TimeEntry,
    Enumeration,
    Attachment,
    IssueJournal,
    WikiPage,
    ProjectMembership,
    IssueCategory,
    IssueRelation,
    Version,
    User,
    Group,
    Role,
    News,
    IssueStatus,
    Tracker,
    Query,
    CustomField,
];

/** Every known resource type by name. */
export const RESOURCE_TYPES: ReadonlyMap<string, ResourceType> = new Map(
    TYPES.map(type => {
        return [type.name, type];
    }),
);

/**
 * Looks up a resource type by name.
 * @throws NotFoundError for unknown names
 */
export function GetResourceType(name: string): ResourceType {
    const type = RESOURCE_TYPES.get(name);
    if (!type) {
        throw new NotFoundError(`Unknown resource type '${name}'`, { resourceName: name });
    }
    return type;
}
