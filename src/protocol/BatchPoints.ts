import type { Point } from './Point';
import { DEFAULT_PRECISION, type Precision, parsePrecision } from './precision';

/**
 * Configuration for a batch of points
 */
export interface BatchPointsConfig {
  /** Write precision of the points, defaults to "ms" */
  precision?: string;
  /** Database to write points to */
  database?: string;
  retentionPolicy?: string;
  writeConsistency?: string;
}

/**
 * An ordered group of points written together.
 * Not safe for concurrent mutation: one batch belongs to one writer.
 */
export class BatchPoints {
  database: string;
  retentionPolicy: string;
  writeConsistency: string;

  private entries: Array<Point | null | undefined> = [];
  private unit: Precision;

  /**
   * @throws ConfigurationError if the precision is not a duration unit
   */
  constructor(config: BatchPointsConfig = {}) {
    this.unit = parsePrecision(config.precision || DEFAULT_PRECISION);
    this.database = config.database ?? '';
    this.retentionPolicy = config.retentionPolicy ?? '';
    this.writeConsistency = config.writeConsistency ?? '';
  }

  get precision(): Precision {
    return this.unit;
  }

  /**
   * Change the precision. On an invalid unit the previous one is kept.
   * @throws ConfigurationError if the unit is not a duration unit
   */
  setPrecision(precision: string): void {
    this.unit = parsePrecision(precision);
  }

  /**
   * Append a point. Empty entries are kept in place and skipped on write.
   */
  addPoint(point: Point | null | undefined): void {
    this.entries.push(point);
  }

  addPoints(points: ReadonlyArray<Point | null | undefined>): void {
    this.entries.push(...points);
  }

  get points(): ReadonlyArray<Point | null | undefined> {
    return this.entries;
  }

  /**
   * Serialize every point at the batch precision, one line each
   */
  toLineProtocol(): string {
    let body = '';
    for (const point of this.entries) {
      if (!point) continue;
      body += `${point.precisionString(this.unit)}\n`;
    }
    return body;
  }
}
