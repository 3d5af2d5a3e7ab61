import type { Server, ServerFilter, ServerInput, ServerPatch, ServerReplacement } from '@server-registry/shared';
import { getDb, runInTransaction, withQueryTiming } from '../db/index.js';
import { rowToServer, type ServerRow } from '../db/types.js';
import { escapeLike, filter, update } from '../db/queryBuilder.js';
import { dbLogger } from '../lib/logger.js';

export type ServerStatus = Pick<Server, 'id' | 'ipAddress' | 'isActive'>;

interface ServerStatusRow {
  id: number;
  ip_address: string;
  server_is_active: number;
}

function toFlag(value: boolean): number {
  return value ? 1 : 0;
}

/**
 * Data access for server records. Every read is ordered by id so list
 * responses are stable across requests.
 */
class ServerRegistry {
  list(criteria: ServerFilter = {}): Server[] {
    const { whereClause, params } = filter()
      .equals('server_is_active', criteria.isActive === undefined ? undefined : toFlag(criteria.isActive))
      .equals('ip_address', criteria.ipAddress)
      .like('name', criteria.search ? `%${escapeLike(criteria.search)}%` : undefined)
      .build();

    return withQueryTiming('servers.list', () => {
      const rows = getDb()
        .prepare(`SELECT * FROM servers ${whereClause} ORDER BY id`)
        .all(...params) as ServerRow[];
      return rows.map(rowToServer);
    });
  }

  count(): number {
    const row = getDb().prepare('SELECT COUNT(*) AS count FROM servers').get() as { count: number };
    return row.count;
  }

  get(id: number): Server | null {
    const row = getDb().prepare('SELECT * FROM servers WHERE id = ?').get(id) as ServerRow | undefined;
    return row ? rowToServer(row) : null;
  }

  create(input: ServerInput): Server {
    const result = withQueryTiming('servers.create', () =>
      getDb()
        .prepare(`
          INSERT INTO servers (name, ip_address, description, server_is_active)
          VALUES (?, ?, ?, ?)
        `)
        .run(input.name, input.ipAddress, input.description, toFlag(input.isActive))
    );

    const id = Number(result.lastInsertRowid);
    dbLogger.info({ serverId: id, name: input.name }, 'Server created');

    const server = this.get(id);
    if (!server) {
      throw new Error(`Server ${id} missing after insert`);
    }
    return server;
  }

  /**
   * Full update. The name is always written; optional fields that were
   * omitted keep their stored value. Returns null when the id is unknown.
   */
  replace(id: number, replacement: ServerReplacement): Server | null {
    return this.update(id, replacement);
  }

  /**
   * Write only the supplied fields. An empty patch leaves the record
   * untouched. Returns null when the id is unknown.
   */
  update(id: number, patch: ServerPatch): Server | null {
    return runInTransaction(() => {
      const existing = this.get(id);
      if (!existing) {
        return null;
      }

      const builder = update()
        .set('name', patch.name)
        .set('ip_address', patch.ipAddress)
        .set('description', patch.description)
        .set('server_is_active', patch.isActive === undefined ? undefined : toFlag(patch.isActive));

      if (!builder.hasUpdates) {
        return existing;
      }

      const { setClause, params } = builder.setRaw('updated_at', 'CURRENT_TIMESTAMP').build();
      withQueryTiming('servers.update', () =>
        getDb()
          .prepare(`UPDATE servers SET ${setClause} WHERE id = ?`)
          .run(...params, id)
      );
      dbLogger.info({ serverId: id, fields: Object.keys(patch) }, 'Server updated');

      return this.get(id);
    });
  }

  /**
   * Returns false when the id is unknown.
   */
  remove(id: number): boolean {
    const result = withQueryTiming('servers.remove', () =>
      getDb().prepare('DELETE FROM servers WHERE id = ?').run(id)
    );
    if (result.changes > 0) {
      dbLogger.info({ serverId: id }, 'Server deleted');
      return true;
    }
    return false;
  }

  statuses(): ServerStatus[] {
    const rows = getDb()
      .prepare('SELECT id, ip_address, server_is_active FROM servers ORDER BY id')
      .all() as ServerStatusRow[];
    return rows.map((row) => ({
      id: row.id,
      ipAddress: row.ip_address,
      isActive: Boolean(row.server_is_active),
    }));
  }
}

export const serverRegistry = new ServerRegistry();
