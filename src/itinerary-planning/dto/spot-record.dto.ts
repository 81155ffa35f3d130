// src/itinerary-planning/dto/spot-record.dto.ts

import { Type } from 'class-transformer';
import {
  IsInt,
  IsNotEmpty,
  IsNumber,
  IsOptional,
  IsString,
  Matches,
  Max,
  Min,
  ValidateNested,
} from 'class-validator';

const HHMM = /^([01]\d|2[0-3]):[0-5]\d$/;

export class OpeningWindowDto {
  @Matches(HHMM, { message: 'open must be HH:mm' })
  open!: string;

  @Matches(HHMM, { message: 'close must be HH:mm' })
  close!: string;
}

/**
 * 目录文件中的一条 spot 记录（spots_<city>.json）
 */
export class SpotRecordDto {
  @IsOptional()
  @IsString()
  @IsNotEmpty()
  id?: string;

  @IsString()
  @IsNotEmpty()
  name!: string;

  @IsNumber()
  @Min(-90)
  @Max(90)
  lat!: number;

  @IsNumber()
  @Min(-180)
  @Max(180)
  lon!: number;

  @IsString()
  @IsNotEmpty()
  category!: string;

  @IsOptional()
  @IsInt()
  @Min(1)
  durationMin?: number;

  @IsOptional()
  @ValidateNested()
  @Type(() => OpeningWindowDto)
  openingHours?: OpeningWindowDto;
}
