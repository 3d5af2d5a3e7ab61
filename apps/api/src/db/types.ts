/**
 * Database row types and conversion functions.
 *
 * Row interfaces represent the raw SQLite row format (snake_case fields).
 * Conversion functions transform rows to application types (camelCase).
 */

import type { Server } from '@server-registry/shared';

export interface ServerRow {
  id: number;
  name: string;
  ip_address: string;
  description: string;
  server_is_active: number;
  created_at: string;
  updated_at: string;
}

// SQLite CURRENT_TIMESTAMP is UTC without a zone designator
function parseTimestamp(value: string): Date {
  return new Date(value.includes('T') ? value : `${value.replace(' ', 'T')}Z`);
}

export function rowToServer(row: ServerRow): Server {
  return {
    id: row.id,
    name: row.name,
    ipAddress: row.ip_address,
    description: row.description,
    isActive: Boolean(row.server_is_active),
    createdAt: parseTimestamp(row.created_at),
    updatedAt: parseTimestamp(row.updated_at),
  };
}
