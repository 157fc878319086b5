// Event Intake — 원시 보고 검증/정규화 후 Alert 생성 (부수 효과 없음)

import { Injectable } from '@nestjs/common';
import { createHash, randomUUID } from 'crypto';
import type { Alert, GeoPoint } from '../../db/types/index.js';
import { InvalidReportError } from '../../common/errors/beacon-errors.js';
import { formatZodIssues } from '../../common/pipes/zod-validation.pipe.js';
import { DispatchConfigService } from '../../settings/dispatch-config.service.js';
import { RawReportSchema, type ParsedReport } from './dto/raw-report.dto.js';

@Injectable()
export class EventIntakeService {
  constructor(private readonly configService: DispatchConfigService) {}

  intake(payload: unknown): Alert {
    const parsed = RawReportSchema.safeParse(payload);
    if (!parsed.success) {
      throw new InvalidReportError('Malformed hazard report', {
        issues: formatZodIssues(parsed.error),
      });
    }
    const report = parsed.data;
    const config = this.configService.get();

    const reportedAt = new Date(report.timestamp);
    if (Number.isNaN(reportedAt.getTime())) {
      throw new InvalidReportError('Malformed hazard report', {
        issues: ['timestamp: Invalid date'],
      });
    }

    const hazardType = normalizeHazardType(report.hazardType);
    const { region, point } = this.regionOf(report, config.regionCellDegrees);

    return {
      id: randomUUID(),
      hazardType,
      geographicRegion: region,
      severity: report.severity,
      reportedAt,
      dedupKey: dedupKeyOf(
        hazardType,
        region,
        timeBucket(reportedAt, config.dedupWindowMs),
      ),
      source: report.source,
      location: point,
      description: report.description ?? null,
    };
  }

  private regionOf(
    report: ParsedReport,
    cellDegrees: number,
  ): { region: string; point: GeoPoint | null } {
    const { location } = report;
    if ('region' in location) {
      return { region: normalizeRegion(location.region), point: null };
    }
    return {
      region: regionBucket(location, cellDegrees),
      point: { latitude: location.latitude, longitude: location.longitude },
    };
  }
}

export function normalizeHazardType(raw: string): string {
  return raw.trim().toLowerCase().replace(/\s+/g, '_');
}

export function normalizeRegion(raw: string): string {
  return raw.trim().toUpperCase();
}

/** 좌표 → 격자 셀 코드 `G:<latIdx>:<lonIdx>` */
export function regionBucket(point: GeoPoint, cellDegrees: number): string {
  const lat = Math.floor(point.latitude / cellDegrees);
  const lon = Math.floor(point.longitude / cellDegrees);
  return `G:${lat}:${lon}`;
}

export function timeBucket(at: Date, windowMs: number): number {
  return Math.floor(at.getTime() / windowMs);
}

export function dedupKeyOf(
  hazardType: string,
  region: string,
  bucket: number,
): string {
  return createHash('sha256')
    .update(JSON.stringify([hazardType, region, bucket]))
    .digest('hex');
}
