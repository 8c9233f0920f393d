import { describe, it, expect } from 'vitest';
import { RoutePermissionTable } from '../route-permissions.js';

describe('RoutePermissionTable', () => {
  const table = new RoutePermissionTable();

  it.each([
    ['POST', '/api/tasks', 'tasks', 'create'],
    ['GET', '/api/tasks', 'tasks', 'list'],
    ['GET', '/api/tasks/', 'tasks', 'list'],
    ['GET', '/api/tasks/abc-123/status', 'tasks', 'read'],
    ['GET', '/api/tasks/abc-123/result', 'tasks', 'read'],
    ['POST', '/api/tasks/abc-123/cancel', 'tasks', 'cancel'],
    ['GET', '/api/models/all', 'models', 'read'],
    ['GET', '/api/models/by-provider/aliyun', 'models', 'read'],
    ['HEAD', '/api/download/clip.mp4', 'download', 'read'],
  ])('%s %s requires %s:%s', (method, path, resource, action) => {
    expect(table.find(method, path)).toMatchObject({ resource, action });
  });

  it('has no entry for unlisted routes or methods', () => {
    expect(table.find('GET', '/api/health')).toBeUndefined();
    expect(table.find('DELETE', '/api/tasks')).toBeUndefined();
    expect(table.find('GET', '/api/tasks/a/b/status')).toBeUndefined();
  });

  it('accepts a custom table', () => {
    const custom = new RoutePermissionTable([
      { method: 'GET', path: '/api/v2/jobs/:id', resource: 'jobs', action: 'read' },
    ]);

    expect(custom.find('get', '/api/v2/jobs/42')?.resource).toBe('jobs');
    expect(custom.find('GET', '/api/tasks')).toBeUndefined();
  });
});
