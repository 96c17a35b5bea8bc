import { boolFromEnv, intFromEnv } from './env';

export default () => ({
  database: {
    host: process.env.DB_HOST || 'localhost',
    port: intFromEnv('DB_PORT', 5432),
    username: process.env.DB_USER || 'orders',
    password: process.env.DB_PASSWORD || 'orders',
    name: process.env.DB_NAME || 'orders',
    migrationsRun: boolFromEnv('DB_MIGRATIONS_RUN', true),
  },
});
