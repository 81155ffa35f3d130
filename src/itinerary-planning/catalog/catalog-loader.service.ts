// src/itinerary-planning/catalog/catalog-loader.service.ts

/**
 * Catalog Loader - 从 spots_<city>.json 加载只读目录
 *
 * 目录文件由外部采集脚本生成；这里只做校验与默认值补全。
 */

import { readFile } from 'fs/promises';
import { join } from 'path';
import {
  BadRequestException,
  Injectable,
  Logger,
  NotFoundException,
} from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { plainToInstance } from 'class-transformer';
import { validateSync } from 'class-validator';
import { SpotRecordDto } from '../dto/spot-record.dto';
import { Spot } from '../world-model';
import { SpotCatalog } from './spot-catalog';

/**
 * 按类别的默认游玩时长（分钟）
 */
export const DEFAULT_VISIT_DURATION_MIN: ReadonlyMap<string, number> = new Map([
  ['museum', 90],
  ['park', 60],
  ['garden', 60],
  ['outdoor', 60],
  ['food', 60],
  ['shopping', 75],
  ['temple', 45],
]);

const FALLBACK_VISIT_DURATION_MIN = 60;

function isFileNotFound(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

@Injectable()
export class CatalogLoaderService {
  private readonly logger = new Logger(CatalogLoaderService.name);

  constructor(private readonly configService: ConfigService) {}

  async loadCity(cityId: string, cityName: string = cityId): Promise<SpotCatalog> {
    if (!/^[a-z0-9_-]+$/i.test(cityId)) {
      throw new BadRequestException(`Invalid city id: "${cityId}"`);
    }

    const path = join(this.dataDir(), `spots_${cityId}.json`);

    let raw: string;
    try {
      raw = await readFile(path, 'utf-8');
    } catch (error) {
      if (isFileNotFound(error)) {
        throw new NotFoundException(`No spot data found for city: ${cityId}`);
      }
      throw error;
    }

    let rows: unknown;
    try {
      rows = JSON.parse(raw);
    } catch (error) {
      throw new Error(`Corrupted spot data for city ${cityId}: ${error instanceof Error ? error.message : String(error)}`);
    }

    if (!Array.isArray(rows)) {
      throw new Error(`Corrupted spot data for city ${cityId}: expected a JSON array`);
    }

    const spots = this.parseRecords(cityId, rows);
    this.logger.log(`Loaded ${spots.length} spot(s) for ${cityId} from ${path}`);

    return SpotCatalog.forCity(cityId, cityName, spots);
  }

  /**
   * 逐条校验；非法记录和重复 id 跳过并告警
   */
  parseRecords(cityId: string, rows: readonly unknown[]): Spot[] {
    const spots: Spot[] = [];
    const ids = new Set<string>();

    rows.forEach((row, index) => {
      if (typeof row !== 'object' || row === null || Array.isArray(row)) {
        this.logger.warn(`Skipping spot #${index + 1} in ${cityId}: not an object`);
        return;
      }

      const record = plainToInstance(SpotRecordDto, row);
      const errors = validateSync(record);
      if (errors.length > 0) {
        const reasons = errors.flatMap(e => [
          ...Object.values(e.constraints ?? {}),
          ...e.children?.flatMap(c => Object.values(c.constraints ?? {})) ?? [],
        ]);
        this.logger.warn(`Skipping spot #${index + 1} in ${cityId}: ${reasons.join('; ')}`);
        return;
      }

      const id = record.id ?? `${cityId}-${String(index + 1).padStart(3, '0')}`;
      if (ids.has(id)) {
        this.logger.warn(`Skipping spot #${index + 1} in ${cityId}: duplicate id "${id}"`);
        return;
      }
      ids.add(id);

      spots.push({
        id,
        name: record.name,
        location: { lat: record.lat, lng: record.lon },
        category: record.category,
        visitDurationMin:
          record.durationMin ?? DEFAULT_VISIT_DURATION_MIN.get(record.category) ?? FALLBACK_VISIT_DURATION_MIN,
        openingHours: record.openingHours
          ? { open: record.openingHours.open, close: record.openingHours.close }
          : undefined,
      });
    });

    return spots;
  }

  private dataDir(): string {
    return this.configService.get<string>('SPOT_DATA_DIR') ?? 'data';
  }
}
