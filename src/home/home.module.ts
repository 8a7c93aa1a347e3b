import { Module } from '@nestjs/common';
import { HomeService } from './home.service';
import { HomeController } from './home.controller';
import { HealthService } from './health.service';
import { DocumentsModule } from '../documents/documents.module';

@Module({
  // DocumentsModule exports the BlobStorePort binding
  imports: [DocumentsModule],
  controllers: [HomeController],
  providers: [HomeService, HealthService],
})
export class HomeModule {}
