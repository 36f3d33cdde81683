import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { DatasetModule } from '@/dataset/dataset.module';
import { SamplingModule } from '@/sampling/sampling.module';
import { ThumbnailModule } from '@/thumbnail/thumbnail.module';
import { TrackingModule } from '@/tracking/tracking.module';
import { CollectService } from './collect.service';

@Module({
  imports: [
    ConfigModule,
    DatasetModule,
    SamplingModule,
    ThumbnailModule,
    TrackingModule,
  ],
  providers: [CollectService],
  exports: [CollectService],
})
export class CollectModule {}
