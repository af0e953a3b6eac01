import { DefineResourceType } from '../ResourceType.js';

export const IssueCategory = DefineResourceType({
    name: `IssueCategory`,
    minimumVersion: `1.3`,
    containerMany: `issue_categories`,
    containerOne: `issue_category`,
    queries: {
        filter: `/projects/{project_id}/issue_categories.json`,
        one: `/issue_categories/{0}.json`,
        create: `/projects/{project_id}/issue_categories.json`,
        update: `/issue_categories/{0}.json`,
        delete: `/issue_categories/{0}.json`,
    },
});
