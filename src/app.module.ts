import { MiddlewareConsumer, Module, NestModule } from '@nestjs/common';
import { APP_GUARD } from '@nestjs/core';
import { ConfigModule, ConfigService } from '@nestjs/config';
import { TypeOrmModule } from '@nestjs/typeorm';
import { ThrottlerGuard, ThrottlerModule } from '@nestjs/throttler';
import { DataSource, DataSourceOptions } from 'typeorm';
import appConfig from './config/app.config';
import throttlerConfig from './config/throttler.config';
import authConfig from './auth/config/auth.config';
import databaseConfig from './database/config/database.config';
import documentsConfig from './documents/config/documents.config';
import { TypeOrmConfigService } from './database/typeorm-config.service';
import { RelationalPersistenceModule } from './database/relational-persistence.module';
import { UsersModule } from './users/users.module';
import { AuthModule } from './auth/auth.module';
import { ActivityModule } from './activity/activity.module';
import { ActivityQueryModule } from './activity/activity-query.module';
import { PermissionsModule } from './permissions/permissions.module';
import { DocumentsModule } from './documents/documents.module';
import { HomeModule } from './home/home.module';
import { HttpsEnforcementMiddleware } from './utils/https-enforcement.middleware';
import { AllConfigType } from './config/config.type';

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      load: [
        appConfig,
        authConfig,
        databaseConfig,
        documentsConfig,
        throttlerConfig,
      ],
      envFilePath: ['.env'],
    }),
    TypeOrmModule.forRootAsync({
      useClass: TypeOrmConfigService,
      dataSourceFactory: async (options?: DataSourceOptions) => {
        if (!options) {
          throw new Error('Missing TypeORM options');
        }
        return new DataSource(options).initialize();
      },
    }),
    ThrottlerModule.forRootAsync({
      inject: [ConfigService],
      useFactory: (configService: ConfigService<AllConfigType>) => [
        {
          ttl: configService.getOrThrow('throttler.ttl', { infer: true }),
          limit: configService.getOrThrow('throttler.limit', { infer: true }),
        },
      ],
    }),
    RelationalPersistenceModule,
    UsersModule,
    AuthModule,
    ActivityModule,
    PermissionsModule,
    DocumentsModule,
    ActivityQueryModule,
    HomeModule,
  ],
  providers: [
    {
      provide: APP_GUARD,
      useClass: ThrottlerGuard,
    },
  ],
})
export class AppModule implements NestModule {
  configure(consumer: MiddlewareConsumer) {
    consumer.apply(HttpsEnforcementMiddleware).forRoutes('*');
  }
}
