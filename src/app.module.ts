import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { CollectModule } from './collect/collect.module';
import { DatasetModule } from './dataset/dataset.module';
import { YoutubeModule } from './integrations/youtube/youtube.module';

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      envFilePath: '.env',
    }),
    YoutubeModule,

    DatasetModule,
    CollectModule,
  ],
})
export class AppModule {}
