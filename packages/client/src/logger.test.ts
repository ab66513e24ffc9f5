/**
 * Copyright (c) 2025 Geoffrey Huntley <ghuntley@ghuntley.com>. All rights reserved.
 * SPDX-License-Identifier: Proprietary
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { createLogger, sanitizeContext, type LoggerOptions } from './logger';

describe('createLogger', () => {
	let lines: string[];
	let options: LoggerOptions;

	beforeEach(() => {
		lines = [];
		options = {
			write: (line) => lines.push(line),
			now: () => new Date('2026-01-26T19:23:30.000Z')
		};
	});

	it('should write one JSON object per entry', () => {
		createLogger(options).info('client ready', { baseUrl: 'https://polarion.example.com' });

		expect(lines).toEqual([
			'{"ts":"2026-01-26T19:23:30.000Z","level":"info","message":"client ready","context":{"baseUrl":"https://polarion.example.com"}}'
		]);
	});

	it('should drop entries below the minimum level', () => {
		const logger = createLogger({ ...options, level: 'warn' });

		logger.debug('hidden');
		logger.info('hidden');
		logger.warn('shown');
		logger.error('shown');

		expect(lines.map((line) => JSON.parse(line).level)).toEqual(['warn', 'error']);
	});

	it('should default to info', () => {
		const logger = createLogger(options);

		logger.debug('hidden');
		logger.info('shown');

		expect(lines).toHaveLength(1);
	});

	it('should merge scoped context', () => {
		const logger = createLogger(options).withContext({ component: 'client' }).withContext({ method: 'GET' });

		logger.warn('retrying request', { attempt: 0 });

		expect(JSON.parse(lines[0] ?? '{}').context).toEqual({ component: 'client', method: 'GET', attempt: 0 });
	});

	it('should let call context override scoped context', () => {
		createLogger(options).withContext({ status: 200 }).error('request failed', { status: 503 });

		expect(JSON.parse(lines[0] ?? '{}').context).toEqual({ status: 503 });
	});
});

describe('sanitizeContext', () => {
	it('should redact credentials', () => {
		expect(
			sanitizeContext({ token: 'test-token', Authorization: 'Bearer test-token', dbPassword: 'x', clientSecret: 'y' })
		).toEqual({
			token: '[REDACTED]',
			Authorization: '[REDACTED]',
			dbPassword: '[REDACTED]',
			clientSecret: '[REDACTED]'
		});
	});

	it('should drop null and undefined values', () => {
		expect(sanitizeContext({ url: undefined, status: null, attempt: 1 })).toEqual({ attempt: 1 });
	});

	it('should reduce errors to name and message', () => {
		expect(sanitizeContext({ error: new TypeError('fetch failed') })).toEqual({
			error: { name: 'TypeError', message: 'fetch failed' }
		});
	});

	it('should replace values JSON cannot write', () => {
		const circular: Record<string, unknown> = {};
		circular.self = circular;

		expect(sanitizeContext({ circular, big: 10n })).toEqual({ circular: '[Unserializable]', big: '10' });
	});
});
