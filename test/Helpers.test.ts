import { join } from 'path';
import { beforeEach, describe, it, expect } from 'vitest';
import { ServerVersionMismatchError, ValidationError } from '../src/Common/Errors.js';
import { InMemoryResourceManager } from '../src/Repository/InMemoryResourceManager.js';
import { InMemoryTracker } from '../src/Repository/InMemoryTracker.js';
import { DownloadAttachment } from '../src/Resource/Types/Attachment.js';
import { GroupUsers } from '../src/Resource/Types/Group.js';
import { IssueWatcher } from '../src/Resource/Types/Issue.js';

describe('IssueWatcher', () => {
    it('should refuse servers older than 2.3', () => {
        const issue = new InMemoryResourceManager(new InMemoryTracker({ version: '2.2' }), 'Issue').toResource({ id: 7 });
        expect(() => {
            return new IssueWatcher(issue);
        }).toThrow(ServerVersionMismatchError);
    });

    it('should add and remove watchers without touching the change set', async () => {
        const tracker = new InMemoryTracker({ version: '2.3' });
        const issue = new InMemoryResourceManager(tracker, 'Issue').toResource({ id: 7 });
        const watchers = new IssueWatcher(issue);

        expect(await watchers.add(5)).toBe(true);
        expect(await watchers.remove(5)).toBe(true);
        expect(tracker.requests).toEqual([
            { method: 'post', path: 'https://tracker.test/issues/7/watchers.json', data: { user_id: 5 } },
            { method: 'delete', path: 'https://tracker.test/issues/7/watchers/5.json' },
        ]);
        expect(issue.changes).toEqual({});
    });

    it('should only accept issues', () => {
        const project = new InMemoryResourceManager(new InMemoryTracker(), 'Project').toResource({ id: 1 });
        expect(() => {
            return new IssueWatcher(project);
        }).toThrow(ValidationError);
    });
});

describe('GroupUsers', () => {
    it('should add and remove group members', async () => {
        const tracker = new InMemoryTracker();
        const group = new InMemoryResourceManager(tracker, 'Group').toResource({ id: 3, name: 'Developers' });
        const users = new GroupUsers(group);

        await users.add(4);
        await users.remove(4);
        expect(tracker.requests).toEqual([
            { method: 'post', path: 'https://tracker.test/groups/3/users.json', data: { user_id: 4 } },
            { method: 'delete', path: 'https://tracker.test/groups/3/users/4.json' },
        ]);
    });
});

describe('DownloadAttachment', () => {
    let tracker: InMemoryTracker;
    let attachments: InMemoryResourceManager;

    beforeEach(() => {
        tracker = new InMemoryTracker();
        attachments = new InMemoryResourceManager(tracker, 'Attachment');
    });

    it('should download the content url into the given directory', async () => {
        const contentUrl = 'https://tracker.test/attachments/download/6/build.log';
        const attachment = attachments.toResource({ id: 6, filename: 'build.log', content_url: contentUrl });

        expect(await DownloadAttachment(attachment, 'downloads')).toBe(join('downloads', 'build.log'));
        expect(await DownloadAttachment(attachment, 'downloads', 'renamed.log')).toBe(join('downloads', 'renamed.log'));
        expect(tracker.requests).toEqual([
            { method: 'get', path: contentUrl },
            { method: 'get', path: contentUrl },
        ]);
    });

    it('should fail when the attachment has no content url', async () => {
        const quiet = new InMemoryTracker({ raiseAttrException: false });
        const attachment = new InMemoryResourceManager(quiet, 'Attachment').toResource({ id: 6 });
        await expect(DownloadAttachment(attachment)).rejects.toThrow('Attachment 6 has no content_url');
    });
});
