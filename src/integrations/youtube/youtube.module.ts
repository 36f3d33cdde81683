import { Module, Global } from '@nestjs/common';
import { ConfigModule, ConfigService } from '@nestjs/config';
import { YoutubeClient } from './youtube.client';
import { VIDEO_PLATFORM } from './video-platform';

@Global()
@Module({
  imports: [ConfigModule],
  providers: [
    {
      provide: YoutubeClient,
      useFactory: (cfg: ConfigService) => new YoutubeClient(cfg),
      inject: [ConfigService],
    },
    { provide: VIDEO_PLATFORM, useExisting: YoutubeClient },
  ],
  exports: [YoutubeClient, VIDEO_PLATFORM],
})
export class YoutubeModule {}
