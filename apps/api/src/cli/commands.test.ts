import { describe, it, expect, beforeAll, afterAll, beforeEach, vi } from 'vitest';

vi.mock('../config.js', () => ({
  config: {
    isDevelopment: true,
    nodeEnv: 'test',
    database: { path: ':memory:' },
  },
}));

const mockLogger = {
  info: vi.fn(),
  warn: vi.fn(),
  error: vi.fn(),
  debug: vi.fn(),
  child: () => mockLogger,
};

vi.mock('../lib/logger.js', () => ({
  default: mockLogger,
  logger: mockLogger,
  dbLogger: mockLogger,
  cliLogger: mockLogger,
}));

// Import after mocks
const { runCommand, USAGE } = await import('./commands.js');
const { initDb, closeDb, getDb } = await import('../db/index.js');

function capture() {
  const out = { logs: [] as string[], errors: [] as string[] };
  return {
    out,
    io: {
      log: (line: string) => { out.logs.push(line); },
      error: (line: string) => { out.errors.push(line); },
    },
  };
}

describe('CLI commands', () => {
  beforeAll(() => {
    initDb(':memory:');
  });

  afterAll(() => {
    closeDb();
  });

  beforeEach(() => {
    getDb().exec("DELETE FROM servers; DELETE FROM sqlite_sequence WHERE name = 'servers'");
  });

  it('add should register a server and print it', () => {
    const { out, io } = capture();

    const code = runCommand(['add', 'web-1', '192.168.1.10', 'Front web node'], io);

    expect(code).toBe(0);
    expect(out.logs).toEqual([
      'Server created successfully',
      '  ID: 1',
      '  Name: web-1',
      '  IP Address: 192.168.1.10',
      '  Description: Front web node',
      '  Active: no',
    ]);
  });

  it('add should apply defaults for omitted arguments', () => {
    const { out, io } = capture();

    runCommand(['add', 'bare'], io);

    expect(out.logs).toContain('  IP Address: 0.0.0.0');
    expect(out.logs).toContain('  Description: no_description');
  });

  it('add should report validation errors', () => {
    const { out, io } = capture();

    const code = runCommand(['add', 'web-1', 'invalid_ip'], io);

    expect(code).toBe(1);
    expect(out.errors).toEqual(['Error: ip_address: Enter a valid IPv4 or IPv6 address']);
  });

  it('add should require a name', () => {
    const { out, io } = capture();

    expect(runCommand(['add'], io)).toBe(1);
    expect(out.errors).toEqual(['Error: name: Name is required']);
  });

  it('activate and status should reflect the active flag', () => {
    runCommand(['add', 'web-1', '10.0.0.1'], capture().io);
    runCommand(['add', 'web-2', '10.0.0.2'], capture().io);

    const activate = capture();
    expect(runCommand(['activate', '1'], activate.io)).toBe(0);
    expect(activate.out.logs).toEqual(['Server 1 is now active']);

    const status = capture();
    runCommand(['status'], status.io);
    expect(status.out.logs).toEqual(['10.0.0.1\tactive', '10.0.0.2\tinactive']);
  });

  it('deactivate should clear the active flag', () => {
    runCommand(['add', 'web-1', '10.0.0.1'], capture().io);
    runCommand(['activate', '1'], capture().io);

    const { out, io } = capture();
    runCommand(['deactivate', '1'], io);

    expect(out.logs).toEqual(['Server 1 is now inactive']);
  });

  it('show should print one server', () => {
    runCommand(['add', 'db-1', '10.0.0.5'], capture().io);

    const { out, io } = capture();
    expect(runCommand(['show', '1'], io)).toBe(0);
    expect(out.logs[1]).toBe('  Name: db-1');
  });

  it('show should fail for an unknown id', () => {
    const { out, io } = capture();

    expect(runCommand(['show', '99'], io)).toBe(1);
    expect(out.errors).toEqual(["Error: Server '99' not found"]);
  });

  it('should reject a non-numeric id', () => {
    const { out, io } = capture();

    expect(runCommand(['remove', 'abc'], io)).toBe(1);
    expect(out.errors).toEqual(['Error: a numeric server id is required']);
  });

  it('remove should delete the server', () => {
    runCommand(['add', 'web-1'], capture().io);

    const removed = capture();
    expect(runCommand(['remove', '1'], removed.io)).toBe(0);
    expect(removed.out.logs).toEqual(['Server 1 removed successfully']);

    const list = capture();
    runCommand(['list'], list.io);
    expect(list.out.logs).toEqual(['No servers found']);
  });

  it('list should print every server between rules', () => {
    runCommand(['add', 'web-1'], capture().io);
    runCommand(['add', 'web-2'], capture().io);

    const { out, io } = capture();
    runCommand(['list'], io);

    expect(out.logs[0]).toBe('Servers:');
    expect(out.logs.filter(line => line.startsWith('  Name: '))).toEqual(['  Name: web-1', '  Name: web-2']);
  });

  it('help should print usage', () => {
    const { out, io } = capture();

    expect(runCommand([], io)).toBe(0);
    expect(out.logs).toEqual([USAGE]);
  });

  it('should fail on an unknown command', () => {
    const { out, io } = capture();

    expect(runCommand(['frobnicate'], io)).toBe(1);
    expect(out.errors).toEqual(['Unknown command: frobnicate']);
  });
});
