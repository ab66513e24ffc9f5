/**
 * Copyright (c) 2025 Geoffrey Huntley <ghuntley@ghuntley.com>. All rights reserved.
 * SPDX-License-Identifier: Proprietary
 */

/**
 * Date, time and duration custom field values.
 *
 * Each type has `parse`, which throws `FieldFormatError`, and `tryParse`,
 * which returns `undefined` for input it cannot read. `toJSON` gives the
 * string form the server expects.
 */

import { FieldFormatError } from './errors';

type ParseResult<T> = { ok: true; value: T } | { ok: false; error: string };

function unwrap<T>(result: ParseResult<T>, input: string): T {
	if (!result.ok) {
		throw new FieldFormatError(result.error, input);
	}
	return result.value;
}

function pad(value: number, width = 2): string {
	return String(value).padStart(width, '0');
}

const DIGITS = /^\d+$/;

/**
 * Time of day without a date, `HH:MM:SS`.
 */
export class TimeOnly {
	private constructor(
		readonly hour: number,
		readonly minute: number,
		readonly second: number
	) {}

	private static build(hour: number, minute: number, second: number): ParseResult<TimeOnly> {
		if (!Number.isInteger(hour) || hour < 0 || hour > 23) {
			return { ok: false, error: `invalid hour: ${hour} (must be 0-23)` };
		}
		if (!Number.isInteger(minute) || minute < 0 || minute > 59) {
			return { ok: false, error: `invalid minute: ${minute} (must be 0-59)` };
		}
		if (!Number.isInteger(second) || second < 0 || second > 59) {
			return { ok: false, error: `invalid second: ${second} (must be 0-59)` };
		}
		return { ok: true, value: new TimeOnly(hour, minute, second) };
	}

	private static read(input: string): ParseResult<TimeOnly> {
		if (input === '') {
			return { ok: false, error: 'empty time string' };
		}
		const parts = input.split(':');
		if (parts.length !== 3) {
			return { ok: false, error: `invalid time format: ${input} (expected HH:MM:SS)` };
		}
		const [hour = '', minute = '', second = ''] = parts;
		if (!DIGITS.test(hour)) {
			return { ok: false, error: `invalid hour in time: ${input}` };
		}
		if (!DIGITS.test(minute)) {
			return { ok: false, error: `invalid minute in time: ${input}` };
		}
		if (!DIGITS.test(second)) {
			return { ok: false, error: `invalid second in time: ${input}` };
		}
		return TimeOnly.build(Number(hour), Number(minute), Number(second));
	}

	static create(hour: number, minute: number, second: number): TimeOnly {
		return unwrap(TimeOnly.build(hour, minute, second), `${hour}:${minute}:${second}`);
	}

	static parse(input: string): TimeOnly {
		return unwrap(TimeOnly.read(input), input);
	}

	static tryParse(input: string): TimeOnly | undefined {
		const result = TimeOnly.read(input);
		return result.ok ? result.value : undefined;
	}

	toString(): string {
		return `${pad(this.hour)}:${pad(this.minute)}:${pad(this.second)}`;
	}

	toJSON(): string {
		return this.toString();
	}
}

const DATE_PATTERN = /^(\d{4})-(\d{2})-(\d{2})$/;

/**
 * Calendar date without a time, `YYYY-MM-DD`.
 */
export class DateOnly {
	private constructor(
		readonly year: number,
		readonly month: number,
		readonly day: number
	) {}

	private static read(input: string): ParseResult<DateOnly> {
		if (input === '') {
			return { ok: false, error: 'empty date string' };
		}
		const match = DATE_PATTERN.exec(input);
		const date = match ? calendarDate(Number(match[1]), Number(match[2]), Number(match[3])) : undefined;
		if (!date) {
			return { ok: false, error: `invalid date format: ${input} (expected YYYY-MM-DD)` };
		}
		return { ok: true, value: DateOnly.fromDate(date) };
	}

	static parse(input: string): DateOnly {
		return unwrap(DateOnly.read(input), input);
	}

	static tryParse(input: string): DateOnly | undefined {
		const result = DateOnly.read(input);
		return result.ok ? result.value : undefined;
	}

	/**
	 * The UTC calendar day of `date`.
	 */
	static fromDate(date: Date): DateOnly {
		if (Number.isNaN(date.getTime())) {
			throw new FieldFormatError('invalid date', String(date));
		}
		return new DateOnly(date.getUTCFullYear(), date.getUTCMonth() + 1, date.getUTCDate());
	}

	/**
	 * Midnight UTC of this day.
	 */
	toDate(): Date {
		return new Date(Date.UTC(this.year, this.month - 1, this.day));
	}

	toString(): string {
		return `${pad(this.year, 4)}-${pad(this.month)}-${pad(this.day)}`;
	}

	toJSON(): string {
		return this.toString();
	}
}

function calendarDate(year: number, month: number, day: number): Date | undefined {
	const date = new Date(0);
	date.setUTCFullYear(year, month - 1, day);
	if (date.getUTCFullYear() !== year || date.getUTCMonth() !== month - 1 || date.getUTCDate() !== day) {
		return undefined;
	}
	return date;
}

const DATE_TIME_PATTERN =
	/^(\d{4})-(\d{2})-(\d{2})[Tt](\d{2}):(\d{2}):(\d{2})(?:\.(\d+))?(?:([Zz])|([+-])(\d{2}):(\d{2}))$/;

/**
 * Instant with the UTC offset it was written in, RFC 3339.
 */
export class DateTime {
	private constructor(
		private readonly epochMs: number,
		readonly offsetMinutes: number
	) {}

	private static read(input: string): ParseResult<DateTime> {
		if (input === '') {
			return { ok: false, error: 'empty datetime string' };
		}
		const invalid: ParseResult<DateTime> = {
			ok: false,
			error: `invalid datetime format: ${input} (expected RFC 3339)`
		};
		const match = DATE_TIME_PATTERN.exec(input);
		if (!match) {
			return invalid;
		}

		const date = calendarDate(Number(match[1]), Number(match[2]), Number(match[3]));
		const hour = Number(match[4]);
		const minute = Number(match[5]);
		const second = Number(match[6]);
		if (!date || hour > 23 || minute > 59 || second > 59) {
			return invalid;
		}

		let offsetMinutes = 0;
		if (match[8] === undefined) {
			const offsetHours = Number(match[10]);
			const offsetMins = Number(match[11]);
			if (offsetHours > 23 || offsetMins > 59) {
				return invalid;
			}
			offsetMinutes = (match[9] === '-' ? -1 : 1) * (offsetHours * 60 + offsetMins);
		}

		const fraction = match[7];
		const millis = fraction ? Math.floor(Number(`0.${fraction}`) * 1000) : 0;
		date.setUTCHours(hour, minute, second, millis);
		return { ok: true, value: new DateTime(date.getTime() - offsetMinutes * 60_000, offsetMinutes) };
	}

	static parse(input: string): DateTime {
		return unwrap(DateTime.read(input), input);
	}

	static tryParse(input: string): DateTime | undefined {
		const result = DateTime.read(input);
		return result.ok ? result.value : undefined;
	}

	static fromDate(date: Date): DateTime {
		if (Number.isNaN(date.getTime())) {
			throw new FieldFormatError('invalid date', String(date));
		}
		return new DateTime(date.getTime(), 0);
	}

	toDate(): Date {
		return new Date(this.epochMs);
	}

	/**
	 * RFC 3339 in the original offset, whole seconds, `Z` for UTC.
	 */
	toString(): string {
		const local = new Date(this.epochMs + this.offsetMinutes * 60_000);
		const date = `${pad(local.getUTCFullYear(), 4)}-${pad(local.getUTCMonth() + 1)}-${pad(local.getUTCDate())}`;
		const time = `${pad(local.getUTCHours())}:${pad(local.getUTCMinutes())}:${pad(local.getUTCSeconds())}`;
		return `${date}T${time}${formatOffset(this.offsetMinutes)}`;
	}

	toJSON(): string {
		return this.toString();
	}
}

function formatOffset(offsetMinutes: number): string {
	if (offsetMinutes === 0) {
		return 'Z';
	}
	const sign = offsetMinutes < 0 ? '-' : '+';
	const abs = Math.abs(offsetMinutes);
	return `${sign}${pad(Math.floor(abs / 60))}:${pad(abs % 60)}`;
}

const DURATION_UNITS: Record<string, number> = { d: 86_400, h: 3_600, m: 60, s: 1 };

/**
 * Length of time in whole seconds, written like `2d 3h 30m`.
 */
export class Duration {
	private constructor(readonly totalSeconds: number) {}

	private static read(input: string): ParseResult<Duration> {
		if (input === '') {
			return { ok: false, error: 'empty duration string' };
		}
		let total = 0;
		let matched = false;
		for (const match of input.matchAll(/(\d+)\s*([dhms])/g)) {
			const unit = DURATION_UNITS[match[2] ?? ''] ?? 0;
			total += Number(match[1]) * unit;
			matched = true;
		}
		if (!matched) {
			return { ok: false, error: `invalid duration format: ${input}` };
		}
		return { ok: true, value: new Duration(total) };
	}

	static parse(input: string): Duration {
		return unwrap(Duration.read(input), input);
	}

	static tryParse(input: string): Duration | undefined {
		const result = Duration.read(input);
		return result.ok ? result.value : undefined;
	}

	static fromSeconds(seconds: number): Duration {
		if (!Number.isSafeInteger(seconds) || seconds < 0) {
			throw new FieldFormatError(`invalid duration: ${seconds} (must be whole non-negative seconds)`, String(seconds));
		}
		return new Duration(seconds);
	}

	/**
	 * Only non-zero components are written; zero is `0s`.
	 */
	toString(): string {
		if (this.totalSeconds === 0) {
			return '0s';
		}
		const parts: string[] = [];
		let rest = this.totalSeconds;
		for (const [unit, seconds] of Object.entries(DURATION_UNITS)) {
			const count = Math.floor(rest / seconds);
			if (count > 0) {
				parts.push(`${count}${unit}`);
				rest -= count * seconds;
			}
		}
		return parts.join(' ');
	}

	toJSON(): string {
		return this.toString();
	}
}
