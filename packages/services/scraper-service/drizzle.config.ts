import { defineConfig } from 'drizzle-kit';

export default defineConfig({
  schema: './src/schema/scraper-schema.ts',
  out: './drizzle',
  dialect: 'postgresql',
  dbCredentials: {
    url: process.env.DATABASE_URL ?? 'postgres://localhost:5432/songharvest',
  },
  tablesFilter: ['scr_*'],
  verbose: true,
  strict: true,
});
