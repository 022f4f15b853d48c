/**
 * Raw sensor file decoding
 *
 * File convention:
 *   row 0    session start (Unix seconds, or a datetime string)
 *   row 1    sample rate in Hz
 *   row 2..N numeric sample matrix (1, 2 or 3 columns depending on the signal)
 */

import { readFileSync } from 'fs';
import { DataQualityError, UnparseableStartTimeError } from './errors.js';
import type { DecodedSignal } from './types.js';

export type ParseResult<T> = { ok: true; value: T } | { ok: false; reason: string };

export interface StartTimeStrategy {
  name: string;
  /** Returns epoch milliseconds (UTC) */
  parse(raw: string): ParseResult<number>;
}

const NUMERIC_PATTERN = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;

const DATETIME_PATTERN =
  /^(\d{4})-(\d{2})-(\d{2})(?:[T ](\d{2}):(\d{2})(?::(\d{2})(?:\.(\d+))?)?)?\s*(Z|z|[+-]\d{2}(?::?\d{2})?)?$/;

function parseNumber(raw: string): number | null {
  if (!NUMERIC_PATTERN.test(raw)) return null;
  const value = Number(raw);
  return Number.isFinite(value) ? value : null;
}

/** Largest magnitude a Date can hold */
export const MAX_EPOCH_MS = 8.64e15;

export function isRepresentableEpochMs(ms: number): boolean {
  return Number.isFinite(ms) && Math.abs(ms) <= MAX_EPOCH_MS;
}

export const epochSecondsStrategy: StartTimeStrategy = {
  name: 'epoch-seconds',
  parse(raw) {
    const seconds = parseNumber(raw);
    if (seconds === null) {
      return { ok: false, reason: 'not a number' };
    }
    const ms = seconds * 1000;
    if (!isRepresentableEpochMs(ms)) {
      return { ok: false, reason: 'out of range' };
    }
    return { ok: true, value: ms };
  },
};

function parseZoneOffsetMs(zone: string | undefined): number {
  if (!zone || zone === 'Z' || zone === 'z') return 0;
  const sign = zone.startsWith('-') ? -1 : 1;
  const digits = zone.slice(1).replace(':', '');
  const hours = Number(digits.slice(0, 2));
  const minutes = digits.length > 2 ? Number(digits.slice(2, 4)) : 0;
  return sign * (hours * 60 + minutes) * 60_000;
}

/**
 * ISO-like datetime; values without a zone are taken as UTC
 */
export const isoDateTimeStrategy: StartTimeStrategy = {
  name: 'iso-datetime',
  parse(raw) {
    const match = DATETIME_PATTERN.exec(raw);
    if (!match) {
      return { ok: false, reason: 'not an ISO datetime' };
    }

    const [, yearStr, monthStr, dayStr, hourStr, minuteStr, secondStr, fractionStr, zone] = match;
    const year = Number(yearStr);
    const month = Number(monthStr);
    const day = Number(dayStr);
    const hour = hourStr ? Number(hourStr) : 0;
    const minute = minuteStr ? Number(minuteStr) : 0;
    const second = secondStr ? Number(secondStr) : 0;

    if (month < 1 || month > 12 || hour > 23 || minute > 59 || second > 59) {
      return { ok: false, reason: 'field out of range' };
    }

    // Date.UTC maps years 0-99 to 1900-1999; setUTCFullYear keeps the year as written
    const date = new Date(0);
    date.setUTCFullYear(year, month - 1, day);
    date.setUTCHours(hour, minute, second, 0);
    if (date.getUTCDate() !== day) {
      return { ok: false, reason: 'invalid calendar day' };
    }

    const fractionMs = fractionStr ? Number(`0.${fractionStr}`) * 1000 : 0;
    const ms = date.getTime() + fractionMs - parseZoneOffsetMs(zone);
    if (!isRepresentableEpochMs(ms)) {
      return { ok: false, reason: 'out of range' };
    }
    return { ok: true, value: ms };
  },
};

export const START_TIME_STRATEGIES: readonly StartTimeStrategy[] = [epochSecondsStrategy, isoDateTimeStrategy];

/**
 * Try each strategy in order; throw only when all of them reject the value
 */
export function parseStartTime(
  raw: string,
  strategies: readonly StartTimeStrategy[] = START_TIME_STRATEGIES
): number {
  const value = cleanCell(raw);
  for (const strategy of strategies) {
    const result = strategy.parse(value);
    if (result.ok) {
      return result.value;
    }
  }
  throw new UnparseableStartTimeError(raw);
}

function cleanCell(cell: string): string {
  return cell.trim().replace(/^"(.*)"$/, '$1').trim();
}

function splitRow(line: string): string[] {
  return line.split(',').map(cleanCell);
}

/**
 * Decode file contents into start time, sample rate and sample matrix
 */
export function decodeSignalText(text: string): DecodedSignal {
  const lines = text.split(/\r?\n/).filter((line) => line.trim().length > 0);

  if (lines.length < 2) {
    throw new DataQualityError(`Expected 2 header rows, found ${lines.length}`);
  }

  const startMs = parseStartTime(splitRow(lines[0])[0]);
  const sampleRate = parseNumber(splitRow(lines[1])[0]);

  const samples: number[][] = [];
  for (let i = 2; i < lines.length; i++) {
    const row = splitRow(lines[i]).map((cell) => {
      if (cell.length === 0) return Number.NaN;
      const value = parseNumber(cell);
      if (value === null) {
        throw new DataQualityError(`Non-numeric value "${cell}" at row ${i}`);
      }
      return value;
    });
    samples.push(row);
  }

  return { startMs, sampleRate, samples };
}

export function decodeSignalFile(filePath: string): DecodedSignal {
  return decodeSignalText(readFileSync(filePath, 'utf-8'));
}
