import { Module } from '@nestjs/common';
import { ActivityRecorderService } from './activity-recorder.service';

@Module({
  providers: [ActivityRecorderService],
  exports: [ActivityRecorderService],
})
export class ActivityModule {}
