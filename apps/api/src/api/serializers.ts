import type { Server, ServerResource, ServerReviewResource } from '@server-registry/shared';

/**
 * Full wire representation of a server.
 */
export function serializeServer(server: Server): ServerResource {
  return {
    id: server.id,
    name: server.name,
    ip_address: server.ipAddress,
    description: server.description,
    server_is_active: server.isActive,
  };
}

/**
 * Limited representation used by the status view: address and active flag only.
 */
export function serializeServerReview(server: Pick<Server, 'ipAddress' | 'isActive'>): ServerReviewResource {
  return {
    ip_address: server.ipAddress,
    server_is_active: server.isActive,
  };
}
