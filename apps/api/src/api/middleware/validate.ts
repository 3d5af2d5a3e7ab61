import type { Request, Response, NextFunction, RequestHandler } from 'express';
import { z, ZodError, type ZodType, type ZodTypeDef } from 'zod';
import {
  ServerDefaults,
  ServerLimits,
  type ServerInput,
  type ServerPatch,
  type ServerReplacement,
} from '@server-registry/shared';
import { Errors, formatZodIssues } from './error.js';

export type RouteParams = Record<string, string>;

/**
 * Middleware factory for validating request body with Zod schemas.
 * The parsed (and transformed) value replaces req.body.
 */
export function validateBody<T>(
  schema: ZodType<T, ZodTypeDef, unknown>
): RequestHandler<RouteParams, unknown, T> {
  return (req: Request<RouteParams, unknown, T>, _res: Response, next: NextFunction): void => {
    try {
      req.body = schema.parse(req.body);
      next();
    } catch (err) {
      if (err instanceof ZodError) {
        next(Errors.validation('Invalid request body', formatZodIssues(err)));
        return;
      }
      next(err);
    }
  };
}

// ===============================
// Field Schemas
// ===============================

// Lengths are counted in code points, as SQLite length() does
function maxChars(limit: number) {
  return (value: string) => [...value].length <= limit;
}

const name = z.string({ required_error: 'Name is required', invalid_type_error: 'Name must be a string' })
  .trim()
  .min(1, 'Name is required')
  .refine(maxChars(ServerLimits.NAME_MAX_LENGTH), `Name must be at most ${ServerLimits.NAME_MAX_LENGTH} characters`);

const ipAddress = z.string({ invalid_type_error: 'IP address must be a string' })
  .trim()
  .ip({ message: 'Enter a valid IPv4 or IPv6 address' });

const description = z.string({ invalid_type_error: 'Description must be a string' })
  .refine(
    maxChars(ServerLimits.DESCRIPTION_MAX_LENGTH),
    `Description must be at most ${ServerLimits.DESCRIPTION_MAX_LENGTH} characters`
  );

const TRUE_VALUES = new Set(['true', 't', 'yes', 'y', 'on', '1']);
const FALSE_VALUES = new Set(['false', 'f', 'no', 'n', 'off', '0']);

function parseFlag(value: unknown): boolean | undefined {
  if (typeof value === 'boolean') return value;
  if (value === 1 || value === 0) return value === 1;
  if (typeof value === 'string') {
    const normalized = value.toLowerCase();
    if (TRUE_VALUES.has(normalized)) return true;
    if (FALSE_VALUES.has(normalized)) return false;
  }
  return undefined;
}

// JSON booleans plus the usual form spellings ("yes", "on", 1, ...)
const isActive = z.unknown().transform((value, ctx): boolean => {
  const flag = parseFlag(value);
  if (flag === undefined) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'server_is_active must be a boolean' });
    return z.NEVER;
  }
  return flag;
});

const serverFields = z.object({
  name,
  ip_address: ipAddress.default(ServerDefaults.IP_ADDRESS),
  description: description.default(ServerDefaults.DESCRIPTION),
  server_is_active: isActive.default(ServerDefaults.IS_ACTIVE),
});

const serverPatchFields = z.object({
  name: name.optional(),
  ip_address: ipAddress.optional(),
  description: description.optional(),
  server_is_active: isActive.optional(),
});

// Full update: name required, omitted fields keep their stored value
const serverReplaceFields = serverPatchFields.extend({ name });

function toServerInput(body: z.infer<typeof serverFields>): ServerInput {
  return {
    name: body.name,
    ipAddress: body.ip_address,
    description: body.description,
    isActive: body.server_is_active,
  };
}

function toServerPatch(body: z.infer<typeof serverPatchFields>): ServerPatch {
  const patch: ServerPatch = {};
  if (body.name !== undefined) patch.name = body.name;
  if (body.ip_address !== undefined) patch.ipAddress = body.ip_address;
  if (body.description !== undefined) patch.description = body.description;
  if (body.server_is_active !== undefined) patch.isActive = body.server_is_active;
  return patch;
}

function toServerReplacement(body: z.infer<typeof serverReplaceFields>): ServerReplacement {
  return { ...toServerPatch(body), name: body.name };
}

const booleanFlag = z.enum(['true', 'false', '1', '0'], {
  errorMap: () => ({ message: 'Expected true or false' }),
}).transform(value => value === 'true' || value === '1');

const pagination = {
  limit: z.coerce.number().int().min(1).max(500).optional(),
  offset: z.coerce.number().int().min(0).optional(),
};

export const schemas = {
  // Positive primary key; callers map a failure to not-found
  serverIdParam: z.object({
    id: z.coerce.number().int().min(1).max(Number.MAX_SAFE_INTEGER),
  }),

  query: {
    pagination: z.object(pagination),

    servers: z.object({
      active: booleanFlag.optional(),
      ip_address: z.string().trim().min(1).max(45).optional(),
      search: z.string().trim().min(1).max(ServerLimits.NAME_MAX_LENGTH).optional(),
      ...pagination,
    }),
  },

  servers: {
    create: serverFields.transform(toServerInput),

    replace: serverReplaceFields.transform(toServerReplacement),

    patch: serverPatchFields.transform(toServerPatch),
  },
};
