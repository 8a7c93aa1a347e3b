import { Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { TypeOrmModuleOptions, TypeOrmOptionsFactory } from '@nestjs/typeorm';
import { DataSourceOptions } from 'typeorm';
import { AllConfigType } from '../config/config.type';
import { DatabaseConfig } from './config/database-config.type';

const ENTITY_GLOB =
  __dirname +
  '/../**/infrastructure/persistence/relational/entities/*.entity{.ts,.js}';

const MIGRATION_GLOB = __dirname + '/migrations/**/*{.ts,.js}';

/**
 * Connection options shared by the Nest module and the migration CLI.
 *
 * The pg pool is capped at `maxConnections`; a request that cannot get a
 * connection within `connectionTimeoutMs` fails and is reported as
 * StorageUnavailable.
 */
export function buildDataSourceOptions(
  database: DatabaseConfig,
): DataSourceOptions {
  return {
    type: 'postgres',
    url: database.url,
    host: database.host,
    port: database.port,
    username: database.username,
    password: database.password,
    database: database.name,
    synchronize: database.synchronize,
    dropSchema: false,
    logging: database.logging,
    entities: [ENTITY_GLOB],
    migrations: [MIGRATION_GLOB],
    extra: {
      max: database.maxConnections,
      connectionTimeoutMillis: database.connectionTimeoutMs,
      ssl: database.sslEnabled
        ? { rejectUnauthorized: database.rejectUnauthorized }
        : undefined,
    },
  };
}

@Injectable()
export class TypeOrmConfigService implements TypeOrmOptionsFactory {
  constructor(private configService: ConfigService<AllConfigType>) {}

  createTypeOrmOptions(): TypeOrmModuleOptions {
    return buildDataSourceOptions(
      this.configService.getOrThrow('database', { infer: true }),
    );
  }
}
