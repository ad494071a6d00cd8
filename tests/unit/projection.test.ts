import {
  Lv03,
  ProjectionError,
  Wgs84,
  projectSwissToWGS84,
  projectWGS84ToSwiss,
} from '../../src/index.js';

describe('projectSwissToWGS84', () => {
  it('agrees with the approximation formulas for LV03', () => {
    const approximate = Lv03.create(199_498.43, 600_421.43, 542.8)?.toWgs84();
    const rigorous = projectSwissToWGS84(600_421.43, 199_498.43, 21781);

    expect(approximate).toBeDefined();
    expect(Math.abs(rigorous.longitude - (approximate?.longitude ?? 0))).toBeLessThan(0.001);
    expect(Math.abs(rigorous.latitude - (approximate?.latitude ?? 0))).toBeLessThan(0.001);
  });

  it('gives the same position for LV03 and LV95', () => {
    const fromLv03 = projectSwissToWGS84(700_000, 100_000, 21781);
    const fromLv95 = projectSwissToWGS84(2_700_000, 1_100_000, 2056);

    expect(fromLv95.longitude).toBeCloseTo(fromLv03.longitude, 6);
    expect(fromLv95.latitude).toBeCloseTo(fromLv03.latitude, 6);
    expect(Math.abs(fromLv03.longitude - 8.730497076)).toBeLessThan(0.001);
    expect(Math.abs(fromLv03.latitude - 46.044130339)).toBeLessThan(0.001);
  });

  it('rejects non-Swiss EPSG codes', () => {
    expect(() => projectSwissToWGS84(600_000, 200_000, 4326)).toThrow(ProjectionError);
    expect(() => projectSwissToWGS84(600_000, 200_000, 32632)).toThrow(
      'Unsupported EPSG code: 32632. Expected 21781 (LV03) or 2056 (LV95).'
    );
  });
});

describe('projectSwissToWGS84 input checks', () => {
  it('throws for non-numeric grid coordinates', () => {
    expect(() => projectSwissToWGS84(Number.NaN, 200_000, 21781)).toThrow(ProjectionError);
  });
});

describe('projectWGS84ToSwiss', () => {
  it('agrees with the approximation formulas within a few meters', () => {
    const wgs = new Wgs84(7.44417, 46.94658, 542.8);
    const approximate = wgs.toLv03();
    const rigorous = projectWGS84ToSwiss(wgs.longitude, wgs.latitude, 21781);

    expect(approximate).not.toBeNull();
    expect(Math.abs(rigorous.easting - (approximate?.east ?? 0))).toBeLessThan(5);
    expect(Math.abs(rigorous.northing - (approximate?.north ?? 0))).toBeLessThan(5);
  });

  it('applies the LV95 offsets for EPSG:2056', () => {
    const lv03 = projectWGS84ToSwiss(8.5, 47.4, 21781);
    const lv95 = projectWGS84ToSwiss(8.5, 47.4, 2056);

    expect(lv95.easting - lv03.easting).toBeCloseTo(2_000_000, 3);
    expect(lv95.northing - lv03.northing).toBeCloseTo(1_000_000, 3);
  });

  it('rejects non-Swiss EPSG codes', () => {
    expect(() => projectWGS84ToSwiss(8.5, 47.4, 3857)).toThrow(ProjectionError);
  });

  it('throws instead of returning non-finite coordinates', () => {
    let caught: unknown;
    try {
      projectWGS84ToSwiss(200, 95, 21781);
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(ProjectionError);
    if (caught instanceof ProjectionError) {
      expect(caught.code).toBe('PROJECTION_ERROR');
      expect(caught.details).toMatchObject({ longitude: 200, latitude: 95, epsg: 21781 });
    }
  });
});
