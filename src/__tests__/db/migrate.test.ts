import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { fileURLToPath } from 'node:url';

// Suppress pino log noise in tests
vi.mock('pino', () => ({
  default: () => ({
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    debug: vi.fn(),
  }),
}));

vi.mock('../../config/index.js', () => ({
  config: { DATABASE_URL: 'postgres://localhost:5432/does_paging_test' },
}));

vi.mock('node-pg-migrate', () => ({
  runner: vi.fn().mockResolvedValue([
    { name: '1729000000000_people-and-memberships', path: 'migrations/1729000000000_people-and-memberships.sql', timestamp: 1729000000000 },
  ]),
}));

import { runner } from 'node-pg-migrate';
import { config } from '../../config/index.js';
import { migrationsDir, runMigrations } from '../../db/migrate.js';

const projectMigrations = fileURLToPath(new URL('../../../migrations', import.meta.url));

beforeEach(() => {
  vi.clearAllMocks();
});

afterEach(() => {
  config.MIGRATIONS_DIR = undefined;
});

describe('migrationsDir', () => {
  it('finds migrations/ relative to the module, not the working directory', () => {
    expect(migrationsDir()).toBe(projectMigrations);
  });

  it('prefers MIGRATIONS_DIR when set', () => {
    config.MIGRATIONS_DIR = '/srv/does-paging/migrations';
    expect(migrationsDir()).toBe('/srv/does-paging/migrations');
  });
});

describe('runMigrations', () => {
  it('applies pending migrations upward from the resolved directory', async () => {
    await runMigrations();

    expect(runner).toHaveBeenCalledWith({
      databaseUrl: 'postgres://localhost:5432/does_paging_test',
      dir: projectMigrations,
      direction: 'up',
      migrationsTable: 'pgmigrations',
      log: expect.any(Function),
    });
  });
});
