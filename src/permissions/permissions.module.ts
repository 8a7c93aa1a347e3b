import { Module } from '@nestjs/common';
import { PermissionEngine } from './domain/services/permission-engine.domain.service';
import { PermissionsService } from './permissions.service';
import { PermissionsController } from './permissions.controller';
import { ActivityModule } from '../activity/activity.module';

@Module({
  imports: [ActivityModule],
  providers: [PermissionEngine, PermissionsService],
  controllers: [PermissionsController],
  exports: [PermissionEngine],
})
export class PermissionsModule {}
