export interface Server {
  id: number;
  name: string;
  ipAddress: string;
  description: string;
  isActive: boolean;
  createdAt: Date;
  updatedAt: Date;
}

/** Writable fields of a server, as accepted on create. */
export interface ServerInput {
  name: string;
  ipAddress: string;
  description: string;
  isActive: boolean;
}

export type ServerPatch = Partial<ServerInput>;

/** Full update: the name is required, omitted fields keep their stored value. */
export type ServerReplacement = Pick<ServerInput, 'name'> & ServerPatch;

export interface ServerFilter {
  isActive?: boolean;
  ipAddress?: string;
  search?: string;
}

// Wire representations (snake_case, as served by /api/servers)

export interface ServerResource {
  id: number;
  name: string;
  ip_address: string;
  description: string;
  server_is_active: boolean;
}

export type ServerReviewResource = Pick<ServerResource, 'ip_address' | 'server_is_active'>;

export interface Paginated<T> {
  items: T[];
  total: number;
  limit: number;
  offset: number;
}
