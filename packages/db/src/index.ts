import { drizzle, type PostgresJsDatabase } from 'drizzle-orm/postgres-js';
import postgres from 'postgres';
import * as schema from './schema';

export type Database = PostgresJsDatabase<typeof schema>;

export interface DatabaseHandle {
  db: Database;
  close: () => Promise<void>;
}

/**
 * Create a drizzle database over a postgres.js connection
 */
export function createDatabase(connectionString: string, options: { debug?: boolean } = {}): DatabaseHandle {
  console.log('[DB] Initializing database connection...');
  console.log('[DB] DATABASE_URL:', redactConnectionString(connectionString));

  const client = postgres(connectionString, {
    onnotice: (notice) => console.log('[DB] Notice:', notice.message),
    debug: (_connection, query) => {
      if (options.debug) {
        console.log('[DB] Query:', query.substring(0, 100));
      }
    },
  });

  console.log('[DB] PostgreSQL client created');
  const db = drizzle(client, { schema });
  console.log('[DB] Drizzle ORM initialized');

  return {
    db,
    close: () => client.end(),
  };
}

export function redactConnectionString(connectionString: string): string {
  const at = connectionString.lastIndexOf('@');
  if (at === -1) {
    return connectionString;
  }
  const credentials = connectionString.slice(0, at);
  const schemeEnd = credentials.indexOf('://');
  const userStart = schemeEnd === -1 ? 0 : schemeEnd + 3;
  const colon = credentials.indexOf(':', userStart);
  const visible = colon === -1 ? credentials : credentials.slice(0, colon);
  return `${visible}:***${connectionString.slice(at)}`;
}

// Export schema for use elsewhere
export * from './schema';
