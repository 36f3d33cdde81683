import {
  IsArray,
  IsIn,
  IsInt,
  IsNotEmpty,
  IsNumber,
  IsOptional,
  IsString,
  Max,
  Min,
  validate,
} from 'class-validator';
import { plainToInstance, Type } from 'class-transformer';
import { ConfigurationError } from '@/common/errors';
import { FetchRequest } from '@/types/sample';
import { DurationBucket } from '@/types/youtube';

const DURATION_BUCKETS: DurationBucket[] = ['any', 'short', 'medium', 'long'];

export class FetchRequestDto {
  @Type(() => Number)
  @IsInt()
  @Min(0)
  daysAgo!: number;

  @Type(() => Number)
  @IsInt()
  @Min(1)
  videosPerCategory!: number;

  @IsOptional()
  @IsArray()
  @IsString({ each: true })
  @IsNotEmpty({ each: true })
  categories?: string[];

  @IsString()
  @IsNotEmpty()
  region!: string;

  @Type(() => Number)
  @IsInt()
  @Min(0)
  minSubscribers!: number;

  @Type(() => Number)
  @IsInt()
  @Min(0)
  minViews!: number;

  @Type(() => Number)
  @IsNumber()
  @Min(0)
  @Max(1000)
  minViewRatio!: number;

  @Type(() => Number)
  @IsInt()
  @Min(0)
  minDurationSeconds!: number;

  @IsIn(DURATION_BUCKETS)
  videoDuration!: DurationBucket;

  @IsOptional()
  @IsString()
  seed?: string;
}

/** Coerces and validates a fetch request; rejects with ConfigurationError. */
export async function toFetchRequest(raw: object): Promise<FetchRequest> {
  const dto = plainToInstance(FetchRequestDto, raw);
  const errors = await validate(dto, { forbidUnknownValues: true });
  if (errors.length) {
    const detail = errors
      .map(
        (e) =>
          `${e.property}: ${Object.values(e.constraints ?? {}).join(', ')}`,
      )
      .join('; ');
    throw new ConfigurationError(`Invalid fetch request: ${detail}`);
  }
  return {
    daysAgo: dto.daysAgo,
    videosPerCategory: dto.videosPerCategory,
    categories: dto.categories,
    region: dto.region,
    minSubscribers: dto.minSubscribers,
    minViews: dto.minViews,
    minViewRatio: dto.minViewRatio,
    minDurationSeconds: dto.minDurationSeconds,
    videoDuration: dto.videoDuration,
    seed: dto.seed,
  };
}
