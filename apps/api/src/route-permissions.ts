// Route permission table - which (resource, action) each endpoint requires

export interface RoutePermission {
  method: 'GET' | 'POST';
  path: string; // express-style, `:name` matches one segment
  resource: string;
  action: string;
}

export const ROUTE_PERMISSIONS: readonly RoutePermission[] = [
  { method: 'POST', path: '/api/tasks', resource: 'tasks', action: 'create' },
  { method: 'GET', path: '/api/tasks', resource: 'tasks', action: 'list' },
  { method: 'GET', path: '/api/tasks/:id/status', resource: 'tasks', action: 'read' },
  { method: 'GET', path: '/api/tasks/:id/result', resource: 'tasks', action: 'read' },
  { method: 'POST', path: '/api/tasks/:id/cancel', resource: 'tasks', action: 'cancel' },
  { method: 'GET', path: '/api/models', resource: 'models', action: 'read' },
  { method: 'GET', path: '/api/models/all', resource: 'models', action: 'read' },
  { method: 'GET', path: '/api/models/by-provider/:name', resource: 'models', action: 'read' },
  { method: 'GET', path: '/api/download/:filename', resource: 'download', action: 'read' },
];

interface CompiledRoute {
  method: string;
  pattern: RegExp;
  permission: RoutePermission;
}

function compile(permission: RoutePermission): CompiledRoute {
  const source = permission.path
    .split('/')
    .map(segment =>
      segment.startsWith(':') ? '[^/]+' : segment.replace(/[.*+?^${}()|[\]\\]/g, '\\$&')
    )
    .join('/');
  return { method: permission.method, pattern: new RegExp(`^${source}/?$`), permission };
}

export class RoutePermissionTable {
  private readonly routes: CompiledRoute[];

  constructor(permissions: readonly RoutePermission[] = ROUTE_PERMISSIONS) {
    this.routes = permissions.map(compile);
  }

  /** First entry matching the method and path; HEAD is checked as GET. */
  find(method: string, path: string): RoutePermission | undefined {
    const verb = method.toUpperCase() === 'HEAD' ? 'GET' : method.toUpperCase();
    return this.routes.find(route => route.method === verb && route.pattern.test(path))?.permission;
  }
}
