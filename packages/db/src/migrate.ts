import dotenv from 'dotenv';

dotenv.config({ path: '../../.env.local' });
dotenv.config({ path: '../../.env' });

import postgres from 'postgres';
import { applyMigrations } from './migrations';

async function runMigrations() {
  const connectionString = process.env.DATABASE_URL_ADMIN || process.env.DATABASE_URL;
  if (!connectionString) {
    throw new Error('DATABASE_URL_ADMIN or DATABASE_URL environment variable is required');
  }

  const masked = connectionString.replace(/:[^:@]+@/, ':***@');
  console.log(`Connecting to database: ${masked}`);
  const client = postgres(connectionString, { max: 1, prepare: false });

  try {
    console.log('Running migrations...');
    const applied = await applyMigrations({
      exec: (text) => client.unsafe(text),
      query: (text) => client.unsafe(text),
    });
    console.log(
      applied.length > 0
        ? `Migrations complete (${applied.join(', ')}).`
        : 'Migrations complete (nothing to apply).',
    );
  } finally {
    await client.end();
  }
}

runMigrations().catch((err) => {
  console.error('Migration failed:', err);
  process.exit(1);
});
