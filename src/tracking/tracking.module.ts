import { Module } from '@nestjs/common';
import { ConfigModule, ConfigService } from '@nestjs/config';
import { loadCollectorSettings } from '@/config/collector.config';
import { ThumbnailModule } from '@/thumbnail/thumbnail.module';
import { ThumbnailService } from '@/thumbnail/thumbnail.service';
import { LocalRunTracker } from './local-run.tracker';
import { EXPERIMENT_TRACKER, ExperimentTracker, NoopTracker } from './tracker';

@Module({
  imports: [ConfigModule, ThumbnailModule],
  providers: [
    {
      provide: EXPERIMENT_TRACKER,
      useFactory: (
        cfg: ConfigService,
        thumbnails: ThumbnailService,
      ): ExperimentTracker => {
        const settings = loadCollectorSettings(cfg);
        if (!settings.trackingEnabled) return new NoopTracker();
        return new LocalRunTracker(
          { dir: settings.trackingDir, project: settings.trackingProject },
          thumbnails,
        );
      },
      inject: [ConfigService, ThumbnailService],
    },
  ],
  exports: [EXPERIMENT_TRACKER],
})
export class TrackingModule {}
