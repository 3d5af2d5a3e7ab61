/**
 * Management commands for the server registry, shared by the CLI entry
 * point and its tests. Each command writes through the given output and
 * returns the process exit code.
 */

import type { Server } from '@server-registry/shared';
import { serverRegistry } from '../services/serverRegistry.js';
import { schemas } from '../api/middleware/validate.js';
import { formatZodIssues } from '../api/middleware/error.js';

export interface CliOutput {
  log(line: string): void;
  error(line: string): void;
}

const RULE = '─'.repeat(60);

export const USAGE = `
Server Registry CLI

Usage: server-registry <command> [options]

Commands:
  list                                 List all servers
  add <name> [ip_address] [description]  Register a new server
  show <id>                            Show one server
  activate <id>                        Mark a server as active
  deactivate <id>                      Mark a server as inactive
  remove <id>                          Delete a server
  status                               Show address and active flag of every server
  help                                 Show this help message

Examples:
  server-registry add web-1 192.168.1.10 "Front web node"
  server-registry activate 1
`;

function parseId(raw: string | undefined, out: CliOutput): number | null {
  const parsed = schemas.serverIdParam.safeParse({ id: raw });
  if (raw === undefined || !/^\d+$/.test(raw) || !parsed.success) {
    out.error('Error: a numeric server id is required');
    return null;
  }
  return parsed.data.id;
}

function printServer(server: Server, out: CliOutput): void {
  out.log(`  ID: ${server.id}`);
  out.log(`  Name: ${server.name}`);
  out.log(`  IP Address: ${server.ipAddress}`);
  out.log(`  Description: ${server.description}`);
  out.log(`  Active: ${server.isActive ? 'yes' : 'no'}`);
}

function listServers(out: CliOutput): number {
  const servers = serverRegistry.list();
  if (servers.length === 0) {
    out.log('No servers found');
    return 0;
  }

  out.log('Servers:');
  out.log(RULE);
  for (const server of servers) {
    printServer(server, out);
    out.log(RULE);
  }
  return 0;
}

function addServer(args: string[], out: CliOutput): number {
  const [name, ipAddress, description] = args;
  const parsed = schemas.servers.create.safeParse({
    name,
    ip_address: ipAddress,
    description,
  });

  if (!parsed.success) {
    for (const issue of formatZodIssues(parsed.error)) {
      out.error(`Error: ${issue.path}: ${issue.message}`);
    }
    return 1;
  }

  const server = serverRegistry.create(parsed.data);
  out.log('Server created successfully');
  printServer(server, out);
  return 0;
}

function showServer(rawId: string | undefined, out: CliOutput): number {
  const id = parseId(rawId, out);
  if (id === null) return 1;

  const server = serverRegistry.get(id);
  if (!server) {
    out.error(`Error: Server '${id}' not found`);
    return 1;
  }
  printServer(server, out);
  return 0;
}

function setActive(rawId: string | undefined, isActive: boolean, out: CliOutput): number {
  const id = parseId(rawId, out);
  if (id === null) return 1;

  const server = serverRegistry.update(id, { isActive });
  if (!server) {
    out.error(`Error: Server '${id}' not found`);
    return 1;
  }
  out.log(`Server ${id} is now ${isActive ? 'active' : 'inactive'}`);
  return 0;
}

function removeServer(rawId: string | undefined, out: CliOutput): number {
  const id = parseId(rawId, out);
  if (id === null) return 1;

  if (!serverRegistry.remove(id)) {
    out.error(`Error: Server '${id}' not found`);
    return 1;
  }
  out.log(`Server ${id} removed successfully`);
  return 0;
}

function showStatus(out: CliOutput): number {
  const statuses = serverRegistry.statuses();
  if (statuses.length === 0) {
    out.log('No servers found');
    return 0;
  }
  for (const status of statuses) {
    out.log(`${status.ipAddress}\t${status.isActive ? 'active' : 'inactive'}`);
  }
  return 0;
}

export function runCommand(args: string[], out: CliOutput): number {
  const [command, ...rest] = args;

  switch (command) {
    case 'list':
      return listServers(out);
    case 'add':
      return addServer(rest, out);
    case 'show':
      return showServer(rest[0], out);
    case 'activate':
      return setActive(rest[0], true, out);
    case 'deactivate':
      return setActive(rest[0], false, out);
    case 'remove':
      return removeServer(rest[0], out);
    case 'status':
      return showStatus(out);
    case 'help':
    case '--help':
    case '-h':
    case undefined:
      out.log(USAGE);
      return 0;
    default:
      out.error(`Unknown command: ${command}`);
      out.log(USAGE);
      return 1;
  }
}
