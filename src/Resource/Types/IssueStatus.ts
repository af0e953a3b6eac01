import { DefineResourceType } from '../ResourceType.js';

export const IssueStatus = DefineResourceType({
    name: `IssueStatus`,
    minimumVersion: `1.3`,
    containerMany: `issue_statuses`,
    queries: {
        all: `/issue_statuses.json`,
    },
    relations: [`issues`],
    relationsName: `status`,
    overrides: {
        url(resource) {
            return `${resource.manager.connection.url}/issue_statuses/${resource.internalId}/edit`;
        },
    },
});
