import { defineConfig } from 'drizzle-kit';

export default defineConfig({
    schema: './src/infrastructure/database/schema.ts',
    out: './drizzle',
    dialect: 'sqlite',
    dbCredentials: {
        url: 'file:./data/orders.db',
    },
    verbose: true,
    strict: true,
});
