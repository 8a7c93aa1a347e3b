import { Module } from '@nestjs/common';
import { ActivityQueryService } from './activity-query.service';
import { ActivityController } from './activity.controller';
import { PermissionsModule } from '../permissions/permissions.module';

// Separate from ActivityModule, which PermissionsModule itself imports
@Module({
  imports: [PermissionsModule],
  providers: [ActivityQueryService],
  controllers: [ActivityController],
})
export class ActivityQueryModule {}
