import {
  dedupKeyOf,
  EventIntakeService,
  normalizeHazardType,
  normalizeRegion,
  regionBucket,
  timeBucket,
} from './event-intake.service.js';
import { InvalidReportError } from '../../common/errors/beacon-errors.js';
import { makeConfig } from '../../testing/fixtures.js';

function validReport(overrides: Record<string, unknown> = {}) {
  return {
    hazardType: 'Bushfire',
    location: { region: ' nsw-blue-mountains ' },
    severity: 'High',
    timestamp: '2025-01-01T00:00:00Z',
    source: 'rfs-feed',
    ...overrides,
  };
}

describe('EventIntakeService', () => {
  const intake = new EventIntakeService(makeConfig());

  it('보고를 정규화된 Alert 로 변환', () => {
    const alert = intake.intake(validReport({ description: ' Fire near Katoomba ' }));

    expect(alert.hazardType).toBe('bushfire');
    expect(alert.geographicRegion).toBe('NSW-BLUE-MOUNTAINS');
    expect(alert.severity).toBe('high');
    expect(alert.reportedAt).toEqual(new Date('2025-01-01T00:00:00.000Z'));
    expect(alert.source).toBe('rfs-feed');
    expect(alert.description).toBe('Fire near Katoomba');
    expect(alert.location).toBeNull();
    expect(alert.id).toMatch(/^[0-9a-f-]{36}$/);
    expect(alert.dedupKey).toMatch(/^[0-9a-f]{64}$/);
  });

  it('epoch ms 타임스탬프도 받는다', () => {
    const alert = intake.intake(validReport({ timestamp: Date.UTC(2025, 0, 1) }));
    expect(alert.reportedAt.toISOString()).toBe('2025-01-01T00:00:00.000Z');
  });

  it('좌표는 격자 셀 지역으로 변환', () => {
    const alert = intake.intake(
      validReport({ location: { latitude: -33.71, longitude: 150.31 } }),
    );
    // 0.25° 격자: floor(-33.71/0.25) = -135, floor(150.31/0.25) = 601
    expect(alert.geographicRegion).toBe('G:-135:601');
    expect(alert.location).toEqual({ latitude: -33.71, longitude: 150.31 });
  });

  it('같은 창 안의 같은 위험/지역 보고는 같은 dedupKey', () => {
    const first = intake.intake(validReport());
    const second = intake.intake(
      validReport({ timestamp: '2025-01-01T00:01:00Z', hazardType: ' BUSHFIRE ' }),
    );
    expect(second.dedupKey).toBe(first.dedupKey);
    expect(second.id).not.toBe(first.id);
  });

  it('다른 창, 다른 지역, 다른 위험 유형은 다른 dedupKey', () => {
    const base = intake.intake(validReport()).dedupKey;
    expect(intake.intake(validReport({ timestamp: '2025-01-01T00:30:00Z' })).dedupKey).not.toBe(base);
    expect(intake.intake(validReport({ location: { region: 'VIC-GIPPSLAND' } })).dedupKey).not.toBe(base);
    expect(intake.intake(validReport({ hazardType: 'flood' })).dedupKey).not.toBe(base);
  });

  const invalid: [string, Record<string, unknown>][] = [
    ['hazardType 누락', { hazardType: undefined }],
    ['알 수 없는 severity', { severity: 'catastrophic' }],
    ['위도 범위 밖', { location: { latitude: 91, longitude: 0 } }],
    ['잘못된 timestamp', { timestamp: 'yesterday' }],
    ['빈 source', { source: '  ' }],
  ];

  it.each(invalid)('%s → InvalidReport', (_label, overrides) => {
    expect(() => intake.intake(validReport(overrides))).toThrow(InvalidReportError);
  });

  it('InvalidReport 는 422 와 이슈 목록을 담는다', () => {
    let caught: unknown;
    try {
      intake.intake({ hazardType: 'bushfire' });
    } catch (err) {
      caught = err;
    }
    expect(caught).toBeInstanceOf(InvalidReportError);
    if (!(caught instanceof InvalidReportError)) return;
    expect(caught.httpStatus).toBe(422);
    expect(caught.code).toBe('INVALID_REPORT');
    expect(caught.details?.issues).toEqual(
      expect.arrayContaining([expect.stringContaining('severity')]),
    );
  });

  it('null 이나 배열 payload 도 InvalidReport', () => {
    expect(() => intake.intake(null)).toThrow(InvalidReportError);
    expect(() => intake.intake([])).toThrow(InvalidReportError);
  });
});

describe('normalization helpers', () => {
  it('normalizeHazardType', () => {
    expect(normalizeHazardType('  Grass  Fire ')).toBe('grass_fire');
  });

  it('normalizeRegion', () => {
    expect(normalizeRegion(' vic-gippsland ')).toBe('VIC-GIPPSLAND');
  });

  it('regionBucket 은 셀 경계에서 내림', () => {
    expect(regionBucket({ latitude: 0, longitude: 0.25 }, 0.25)).toBe('G:0:1');
    expect(regionBucket({ latitude: -0.01, longitude: 0.24 }, 0.25)).toBe('G:-1:0');
  });

  it('timeBucket / dedupKeyOf', () => {
    const window = 30 * 60_000;
    expect(timeBucket(new Date('2025-01-01T00:29:59.999Z'), window)).toBe(
      timeBucket(new Date('2025-01-01T00:00:00.000Z'), window),
    );
    expect(dedupKeyOf('bushfire', 'A', 1)).toBe(dedupKeyOf('bushfire', 'A', 1));
    expect(dedupKeyOf('bushfire', 'A', 1)).not.toBe(dedupKeyOf('bushfire', 'A', 2));
    // 필드 경계가 구분자 문자와 섞이지 않는다
    expect(dedupKeyOf('a|b', 'c', 1)).not.toBe(dedupKeyOf('a', 'b|c', 1));
  });
});
