import { beforeEach, describe, it, expect } from 'vitest';
import { ResourceAttributeError } from '../src/Common/Errors.js';
import { InMemoryResourceManager } from '../src/Repository/InMemoryResourceManager.js';
import { InMemoryTracker } from '../src/Repository/InMemoryTracker.js';
import type { ResourceCollection } from '../src/Resource/ResourceCollection.js';

const CREATED_ON = '2024-01-01T00:00:00Z';

async function ids(collection: ResourceCollection): Promise<Array<string | number>> {
    const resources = await collection.all();
    return resources.map(resource => {
        return resource.internalId;
    });
}

describe('Relations', () => {
    let tracker: InMemoryTracker;

    beforeEach(() => {
        tracker = new InMemoryTracker();
    });

    describe('filtered relations', () => {
        beforeEach(() => {
            tracker.seed('TimeEntry', [
                { id: 1, hours: 2, issue: { id: 5 }, user: { id: 9 } },
                { id: 2, hours: 1, issue: { id: 6 }, user: { id: 8 } },
                { id: 3, hours: 3, issue: { id: 5 }, user: { id: 8 } },
            ]);
        });

        it('should fetch an issue\'s time entries once, on first iteration', async () => {
            const issue = new InMemoryResourceManager(tracker, 'Issue').toResource({ id: 5, subject: 'Crash' });

            const entries = await issue.getCollection('time_entries');
            expect(tracker.requests).toEqual([]);
            expect(await issue.getCollection('time_entries')).toBe(entries);

            expect(await ids(entries)).toEqual([1, 3]);
            expect(await ids(entries)).toEqual([1, 3]);
            expect(tracker.requests).toEqual([{ method: 'get', path: '/time_entries.json' }]);
        });

        it('should match a user\'s time entries by user and issues by assignee', async () => {
            tracker.seed('Issue', [
                { id: 1, subject: 'Mine', assigned_to: { id: 9 } },
                { id: 2, subject: 'Theirs', assigned_to: { id: 3 } },
            ]);
            const user = new InMemoryResourceManager(tracker, 'User').toResource({ id: 9, firstname: 'Ada' });

            expect(await ids(await user.getCollection('time_entries'))).toEqual([1]);
            expect(await ids(await user.getCollection('issues'))).toEqual([1]);
        });

        it('should resolve project-scoped endpoints from the owner id', async () => {
            tracker.seed('Version', [
                { id: 1, name: '1.0', project: { id: 2 } },
                { id: 2, name: '2.0', project: { id: 4 } },
            ]);
            const project = new InMemoryResourceManager(tracker, 'Project').toResource({ id: 2, identifier: 'core' });

            expect(await ids(await project.getCollection('versions'))).toEqual([1]);
            expect(tracker.requests).toEqual([{ method: 'get', path: '/projects/2/versions.json' }]);
        });

        it('should keep the project scope on wiki pages reached through a project', async () => {
            tracker.seed('WikiPage', [
                { title: 'Home', text: 'Hello', version: 1, project: { id: 2 }, created_on: CREATED_ON },
                { title: 'Elsewhere', text: 'Other', version: 1, project: { id: 4 }, created_on: CREATED_ON },
            ]);
            const project = new InMemoryResourceManager(tracker, 'Project').toResource({ id: 2, identifier: 'core' });

            const page = await (await project.getCollection('wiki_pages')).first();
            expect(page?.internalId).toBe('Home');
            expect(page?.manager.params).toEqual({ project_id: 2 });
            expect(page?.url).toBe('https://tracker.test/projects/2/wiki/Home');

            await page?.refresh();
            await page?.delete();
            expect(tracker.requests).toEqual([
                { method: 'get', path: '/projects/2/wiki/index.json' },
                { method: 'get', path: '/projects/2/wiki/Home.json' },
                { method: 'delete', path: '/projects/2/wiki/Home.json' },
            ]);
        });

        it('should filter issues by status for issue statuses', async () => {
            tracker.seed('Issue', [
                { id: 1, status: { id: 1 } },
                { id: 2, status: { id: 5 } },
            ]);
            const status = new InMemoryResourceManager(tracker, 'IssueStatus').toResource({ id: 5, name: 'Closed' });
            expect(await ids(await status.getCollection('issues'))).toEqual([2]);
        });
    });

    describe('includes', () => {
        let issues: InMemoryResourceManager;

        beforeEach(() => {
            issues = new InMemoryResourceManager(tracker, 'Issue');
            tracker.seed('Issue', [
                {
                    id: 10,
                    subject: 'Parent',
                    children: [{ id: 11, subject: 'Child' }],
                    created_on: CREATED_ON,
                },
            ]);
        });

        it('should leave include-only attributes out of plain reads', async () => {
            const issue = await issues.get(10);
            expect(issue.keys()).not.toContain('children');
        });

        it('should refresh once with the include and cache the result', async () => {
            const issue = await issues.get(10);

            const children = await issue.getCollection('children');
            expect(await ids(children)).toEqual([11]);
            expect(await issue.getCollection('children')).toBe(children);
            expect(tracker.requests).toEqual([
                { method: 'get', path: '/issues/10.json' },
                { method: 'get', path: '/issues/10.json' },
            ]);
            expect(issue.keys()).not.toContain('children');
        });

        it('should share one refresh between overlapping reads of an include', async () => {
            const issue = await issues.get(10);

            const [first, second] = await Promise.all([issue.get('children'), issue.get('children')]);
            expect(second).toBe(first);
            expect(tracker.requests).toEqual([
                { method: 'get', path: '/issues/10.json' },
                { method: 'get', path: '/issues/10.json' },
            ]);
        });

        it('should apply the error policy when the server omits the include', async () => {
            const issue = await issues.get(10);
            await expect(issue.get('journals')).rejects.toBeInstanceOf(ResourceAttributeError);

            const quiet = new InMemoryTracker({ raiseAttrException: false });
            quiet.seed('Issue', [{ id: 10, subject: 'Parent', created_on: CREATED_ON }]);
            const quietIssue = await new InMemoryResourceManager(quiet, 'Issue').get(10);
            expect(await quietIssue.get('journals')).toBeNull();
        });
    });
});
