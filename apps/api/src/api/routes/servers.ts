import { Router, type Request, type Response } from 'express';
import type { ServerInput, ServerPatch, ServerReplacement } from '@server-registry/shared';
import { serverRegistry } from '../../services/serverRegistry.js';
import { Errors, methodNotAllowed } from '../middleware/error.js';
import { validateBody, schemas, type RouteParams } from '../middleware/validate.js';
import { serializeServer, serializeServerReview } from '../serializers.js';
import { parsePaginationParams, paginateOrReturnAll } from '../../lib/pagination.js';

const router = Router();

type BodyRequest<T> = Request<RouteParams, unknown, T>;

/**
 * Resolve the :id segment. Ids that cannot name a stored row (0, or past
 * the safe integer range) are simply unknown.
 */
function serverId(params: RouteParams): number {
  const parsed = schemas.serverIdParam.safeParse(params);
  if (!parsed.success) {
    throw Errors.serverNotFound(params.id);
  }
  return parsed.data.id;
}

// GET /api/servers/ - List servers, optionally filtered
router.get('/', (req, res) => {
  const query = schemas.query.servers.parse(req.query);
  const servers = serverRegistry.list({
    isActive: query.active,
    ipAddress: query.ip_address,
    search: query.search,
  });

  // Plain array unless limit/offset was requested
  res.json(paginateOrReturnAll(servers.map(serializeServer), parsePaginationParams(query)));
});
router.all('/', methodNotAllowed('GET'));

// POST /api/servers/add - Create a server
router.post('/add', validateBody(schemas.servers.create), (req: BodyRequest<ServerInput>, res: Response) => {
  const server = serverRegistry.create(req.body);
  res.status(201).json(serializeServer(server));
});
router.all('/add', methodNotAllowed('POST'));

// GET /api/servers/status - Address and active flag of every server
router.get('/status', (req, res) => {
  const pagination = parsePaginationParams(schemas.query.pagination.parse(req.query));
  const statuses = serverRegistry.statuses().map(serializeServerReview);
  res.json(paginateOrReturnAll(statuses, pagination));
});
router.all('/status', methodNotAllowed('GET'));

// GET /api/servers/:id - Server details
router.get('/:id(\\d+)', (req, res) => {
  const id = serverId(req.params);
  const server = serverRegistry.get(id);
  if (!server) {
    throw Errors.serverNotFound(id);
  }
  res.json(serializeServer(server));
});

// PUT /api/servers/:id - Full update, name required
router.put('/:id(\\d+)', validateBody(schemas.servers.replace), (req: BodyRequest<ServerReplacement>, res: Response) => {
  const id = serverId(req.params);
  const server = serverRegistry.replace(id, req.body);
  if (!server) {
    throw Errors.serverNotFound(id);
  }
  res.json(serializeServer(server));
});

// PATCH /api/servers/:id - Update only the supplied fields
router.patch('/:id(\\d+)', validateBody(schemas.servers.patch), (req: BodyRequest<ServerPatch>, res: Response) => {
  const id = serverId(req.params);
  const server = serverRegistry.update(id, req.body);
  if (!server) {
    throw Errors.serverNotFound(id);
  }
  res.json(serializeServer(server));
});

// DELETE /api/servers/:id - Remove a server
router.delete('/:id(\\d+)', (req, res) => {
  const id = serverId(req.params);
  if (!serverRegistry.remove(id)) {
    throw Errors.serverNotFound(id);
  }
  res.status(204).send();
});
router.all('/:id(\\d+)', methodNotAllowed('GET', 'PUT', 'PATCH', 'DELETE'));

export default router;
