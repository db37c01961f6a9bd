/**
 * Drizzle Kit Configuration
 *
 * Used by drizzle-kit to generate SQL migrations from src/storage/schema.ts
 * into ./drizzle.
 */
import { defineConfig } from 'drizzle-kit';

export default defineConfig({
  schema: './src/storage/schema.ts',
  out: './drizzle',
  dialect: 'sqlite',
  dbCredentials: {
    url: process.env.DATABASE_PATH || './data/opening-drill.db',
  },
  verbose: true,
  strict: true,
});
