import { runner } from 'node-pg-migrate';
import { fileURLToPath } from 'node:url';
import pino from 'pino';
import { config } from '../config/index.js';

const log = pino({ name: 'migrate' });

// Two levels up from src/db is the project root; the build copies migrations/ into dist/ to match
const BUNDLED_MIGRATIONS = fileURLToPath(new URL('../../migrations', import.meta.url));

/** Directory migrations are read from: `MIGRATIONS_DIR`, or the project's own. */
export function migrationsDir(): string {
  return config.MIGRATIONS_DIR ?? BUNDLED_MIGRATIONS;
}

/** Applies every pending migration for the people and memberships tables. */
export async function runMigrations(): Promise<void> {
  const dir = migrationsDir();
  log.info({ dir }, 'Applying migrations');

  const applied = await runner({
    databaseUrl: config.DATABASE_URL,
    dir,
    direction: 'up',
    migrationsTable: 'pgmigrations',
    log: (msg: string) => log.info(msg),
  });

  log.info({ applied: applied.map((m) => m.name) }, 'Migrations up to date');
}

// npm run migrate, or node dist/src/db/migrate.js
if (process.argv[1] && /[\\/]migrate\.[jt]s$/.test(process.argv[1])) {
  runMigrations()
    .then(() => process.exit(0))
    .catch((err) => {
      log.error({ err }, 'Migration failed');
      process.exit(1);
    });
}
