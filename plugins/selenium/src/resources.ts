import type { SessionRegistry } from './session-registry.js';

export interface StatusResource {
  uri: string;
  name: string;
  description: string;
  mimeType: string;
  read(registry: SessionRegistry): string;
}

export function describeCurrentSession(registry: SessionRegistry): string {
  const session = registry.active();
  if (!session) return 'No active browser session';
  return [
    `Active session: ${session.id}`,
    ...(session.name ? [`Name: ${session.name}`] : []),
    `Browser: ${session.kind}`,
    `URL: ${session.url ?? 'No URL'}`,
    `Created: ${session.createdAt}`,
    `Last activity: ${session.lastActivity}`,
  ].join('\n');
}

export function describeSessions(registry: SessionRegistry): string {
  return JSON.stringify(registry.list(), null, 2);
}

export const STATUS_RESOURCES: readonly StatusResource[] = [
  {
    uri: 'browser-status://current',
    name: 'Current Browser Status',
    description: 'Status of the active browser session',
    mimeType: 'text/plain',
    read: describeCurrentSession,
  },
  {
    uri: 'browser-status://sessions',
    name: 'All Sessions',
    description: 'Every open browser session',
    mimeType: 'application/json',
    read: describeSessions,
  },
];
