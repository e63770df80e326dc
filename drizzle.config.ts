/**
 * Drizzle Kit configuration for the Golf Practice Log.
 *
 * The app migrates itself from src/storage/schema.ts at startup; this file
 * points the drizzle-kit CLI (studio, ad-hoc generate) at the same schema
 * and database.
 */

import { defineConfig } from 'drizzle-kit';

export default defineConfig({
  schema: './src/storage/schema.ts',
  dialect: 'sqlite',
  dbCredentials: {
    url: process.env.DATABASE_PATH ?? 'golf-practice.db',
  },
  verbose: true,
  strict: true,
});
