import { registerAs } from '@nestjs/config';

export default registerAs('database', () => ({
  url: process.env.DATABASE_URL || null,
  host: process.env.DATABASE_HOST || 'localhost',
  port: parseInt(process.env.DATABASE_PORT || '5432', 10),
  username: process.env.DATABASE_USERNAME || 'warehouse',
  password: process.env.DATABASE_PASSWORD || 'warehouse',
  name: process.env.DATABASE_NAME || 'warehouse',
  synchronize: (process.env.DB_SYNCHRONIZE ?? 'true') === 'true',
  ssl: process.env.DB_SSL === 'true',
}));
