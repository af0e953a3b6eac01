import { beforeEach, describe, it, expect, vi } from 'vitest';
import { NotFoundError, ValidationError } from '../src/Common/Errors.js';
import { EVENT_NAMES } from '../src/Domain/Utility.js';
import { MAIN_EVENT_BUS } from '../src/Events/MainEventBus.js';
import { InMemoryResourceManager } from '../src/Repository/InMemoryResourceManager.js';
import { InMemoryTracker } from '../src/Repository/InMemoryTracker.js';

const CREATED_ON = '2024-01-01T00:00:00Z';

describe('Resource lifecycle', () => {
    let tracker: InMemoryTracker;
    let issues: InMemoryResourceManager;

    beforeEach(() => {
        tracker = new InMemoryTracker();
        issues = new InMemoryResourceManager(tracker, 'Issue');
        tracker.seed('Issue', [{ id: 7, subject: 'Old subject', created_on: CREATED_ON }]);
    });

    describe('save (create)', () => {
        it('should send the change set and adopt the server response', async () => {
            const created = vi.fn();
            MAIN_EVENT_BUS.On(EVENT_NAMES.resourceCreated, created);

            const issue = issues.toResource({});
            issue.set('project_id', 1);
            issue.set('subject', 'Crash on start');
            expect(await issue.save()).toBe(true);

            expect(tracker.requests).toEqual([
                { method: 'post', path: '/projects/1/issues.json', data: { project_id: 1, subject: 'Crash on start' } },
            ]);
            expect(issue.isNew()).toBe(false);
            expect(issue.internalId).toBe(8);
            expect(issue.changes).toEqual({});
            expect((await issue.getResource('project')).internalId).toBe(1);
            expect(created).toHaveBeenCalledWith(issue);
        });

        it('should keep the change set when the request fails', async () => {
            const issue = issues.toResource({});
            issue.set('subject', 'No project');
            await expect(issue.save()).rejects.toBeInstanceOf(ValidationError);
            expect(issue.isNew()).toBe(true);
            expect(issue.changes).toEqual({ subject: 'No project' });
        });
    });

    describe('save (update)', () => {
        it('should send only the changes and stamp updated_on', async () => {
            const updated = vi.fn();
            MAIN_EVENT_BUS.On(EVENT_NAMES.resourceUpdated, updated);

            const issue = await issues.get(7);
            issue.set('subject', 'New subject');
            expect(await issue.save()).toBe(true);

            expect(tracker.requests[1]).toEqual({ method: 'put', path: '/issues/7.json', data: { subject: 'New subject' } });
            expect(tracker.records('Issue')[0].subject).toBe('New subject');
            expect(issue.changes).toEqual({});
            expect(issue.raw().updated_on).toMatch(/^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}Z$/);
            expect(updated).toHaveBeenCalledTimes(1);
        });

        it('should leave untouched attributes and their resolved values alone', async () => {
            const issue = await issues.get(7);
            const createdOn = await issue.get('created_on');
            expect(createdOn).toEqual(new Date(CREATED_ON));

            issue.set('subject', 'New subject');
            await issue.save();

            expect(issue.raw().id).toBe(7);
            expect(issue.raw().created_on).toBe(CREATED_ON);
            expect(await issue.get('created_on')).toBe(createdOn);
            expect(await issue.get('subject')).toBe('New subject');
        });

        it('should keep the change set when the server does not know the resource', async () => {
            const ghost = issues.toResource({ id: 99, subject: 'Ghost' });
            ghost.set('subject', 'Still a ghost');
            await expect(ghost.save()).rejects.toBeInstanceOf(NotFoundError);
            expect(ghost.changes).toEqual({ subject: 'Still a ghost' });
        });

        it('should refuse types without an update endpoint', async () => {
            const relations = new InMemoryResourceManager(tracker, 'IssueRelation');
            const relation = relations.toResource({ id: 3, relation_type: 'blocks' });
            relation.set('relation_type', 'precedes');
            await expect(relation.save()).rejects.toThrow("IssueRelation does not support 'update'");
        });
    });

    describe('delete', () => {
        it('should remove the resource and return the response', async () => {
            const deleted = vi.fn();
            MAIN_EVENT_BUS.On(EVENT_NAMES.resourceDeleted, deleted);

            const issue = await issues.get(7);
            expect(await issue.delete()).toBe(true);
            expect(tracker.records('Issue')).toEqual([]);
            expect(tracker.requests[1]).toEqual({ method: 'delete', path: '/issues/7.json' });
            expect(deleted).toHaveBeenCalledWith(issue);
        });
    });

    describe('refresh', () => {
        it('should replace the snapshot and drop cached values', async () => {
            const issue = await issues.get(7);
            expect(await issue.get('subject')).toBe('Old subject');

            tracker.modify(issue.type, 7, { subject: 'Changed elsewhere' });
            expect(await issue.refresh()).toBe(issue);
            expect(await issue.get('subject')).toBe('Changed elsewhere');
        });

        it('should return a separate instance when not refreshing itself', async () => {
            const issue = await issues.get(7);
            tracker.modify(issue.type, 7, { subject: 'Changed elsewhere' });

            const fresh = await issue.refresh(false);
            expect(fresh).not.toBe(issue);
            expect(await fresh.get('subject')).toBe('Changed elsewhere');
            expect(await issue.get('subject')).toBe('Old subject');
        });
    });

    describe('wiki pages', () => {
        let pages: InMemoryResourceManager;

        beforeEach(() => {
            pages = new InMemoryResourceManager(tracker, 'WikiPage', { project_id: 1 });
            tracker.seed('WikiPage', [
                { title: 'Home', text: 'Hello', version: 3, project: { id: 1 }, created_on: CREATED_ON },
            ]);
        });

        it('should be addressed by title within the project', async () => {
            const page = await pages.get('Home');
            expect(tracker.requests).toEqual([{ method: 'get', path: '/projects/1/wiki/Home.json' }]);
            expect(page.url).toBe('https://tracker.test/projects/1/wiki/Home');
        });

        it('should bump the version after an update', async () => {
            const page = await pages.get('Home');
            page.set('text', 'Hello again');
            await page.save();

            expect(tracker.requests[1]).toEqual({
                method: 'put',
                path: '/projects/1/wiki/Home.json',
                data: { text: 'Hello again' },
            });
            expect(page.toNumber()).toBe(4);
            expect(await page.get('version')).toBe(4);
        });

        it('should fetch the text of a listed page once', async () => {
            const listed = pages.toResource({ title: 'Home', version: 3, created_on: CREATED_ON });

            expect(await listed.get('text')).toBe('Hello');
            expect(await listed.get('text')).toBe('Hello');
            expect(tracker.requests).toEqual([{ method: 'get', path: '/projects/1/wiki/Home.json' }]);
        });

        it('should create pages under their title', async () => {
            const page = pages.toResource({});
            page.set('title', 'Roadmap');
            page.set('text', 'Later');
            await page.save();

            expect(tracker.requests[0].path).toBe('/projects/1/wiki/Roadmap.json');
            expect(page.isNew()).toBe(false);
            expect(page.internalId).toBe('Roadmap');
        });

        it('should pass the project scope when deleting', async () => {
            const page = await pages.get('Home');
            await page.delete();
            expect(tracker.requests[1]).toEqual({ method: 'delete', path: '/projects/1/wiki/Home.json' });
        });
    });
});
