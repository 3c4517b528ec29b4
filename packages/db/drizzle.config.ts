import { loadRuntimeConfig } from '@fxdesk/config';
import { defineConfig } from 'drizzle-kit';

// drizzle-kit configuration, run through `npm run db:check`.
export default defineConfig({
  dialect: 'postgresql',
  schema: './packages/db/src/schema/index.ts',
  out: './packages/db/migrations',
  strict: true,
  dbCredentials: {
    url: loadRuntimeConfig().DATABASE_URL
  }
});
