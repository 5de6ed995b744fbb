import { Module } from '@nestjs/common';
import { ConfigModule, ConfigType } from '@nestjs/config';
import { TypeOrmModule, TypeOrmModuleOptions } from '@nestjs/typeorm';
import databaseConfig from '../config/database.config';
import { WAREHOUSE_ENTITIES } from '../warehouse/entities';

@Module({
  imports: [
    TypeOrmModule.forRootAsync({
      imports: [ConfigModule.forFeature(databaseConfig)],
      inject: [databaseConfig.KEY],
      useFactory: (db: ConfigType<typeof databaseConfig>): TypeOrmModuleOptions => {
        const shared = {
          type: 'postgres' as const,
          entities: WAREHOUSE_ENTITIES,
          // Table existence only; there are no migrations
          synchronize: db.synchronize,
          // Backfills share the pool across concurrent dates, one query runner per load
          extra: {
            min: 1,
            max: 10,
            idleTimeoutMillis: 30_000,
            connectionTimeoutMillis: 5_000,
          },
        };

        // Hosted databases supply DATABASE_URL; discrete vars are used for local dev
        if (db.url) {
          return { ...shared, url: db.url, ssl: db.ssl ? { rejectUnauthorized: false } : false };
        }

        return {
          ...shared,
          host: db.host,
          port: db.port,
          username: db.username,
          password: db.password,
          database: db.name,
          ssl: db.ssl ? { rejectUnauthorized: false } : false,
        };
      },
    }),
  ],
})
export class DatabaseModule {}
