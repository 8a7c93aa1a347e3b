import { Module } from '@nestjs/common';
import { ConfigModule, ConfigService } from '@nestjs/config';
import { MulterModule } from '@nestjs/platform-express';
import documentsConfig from './config/documents.config';
import { DocumentsController } from './documents.controller';
import { DocumentsService } from './documents.service';
import { DocumentLifecycleDomainService } from './domain/services/document-lifecycle.domain.service';
import { VersionAllocatorDomainService } from './domain/services/version-allocator.domain.service';
import { BlobStorePort } from './domain/ports/blob-store.port';
import { GcpBlobStoreAdapter } from './infrastructure/storage/gcp-blob-store.adapter';
import { PermissionsModule } from '../permissions/permissions.module';
import { ActivityModule } from '../activity/activity.module';
import { AllConfigType } from '../config/config.type';

@Module({
  imports: [
    ConfigModule.forFeature(documentsConfig),

    // Oversized uploads are cut off by multer before they are buffered
    MulterModule.registerAsync({
      imports: [ConfigModule.forFeature(documentsConfig)],
      inject: [ConfigService],
      useFactory: (configService: ConfigService<AllConfigType>) => ({
        limits: {
          fileSize: configService.getOrThrow('documents.maxFileSizeBytes', {
            infer: true,
          }),
          files: 1,
        },
      }),
    }),

    PermissionsModule,
    ActivityModule,
  ],
  controllers: [DocumentsController],
  providers: [
    DocumentsService,
    DocumentLifecycleDomainService,
    VersionAllocatorDomainService,
    {
      provide: BlobStorePort,
      useClass: GcpBlobStoreAdapter,
    },
  ],
  exports: [BlobStorePort],
})
export class DocumentsModule {}
