/**
 * Tests for the structured logger
 */

import { describe, it, expect, afterEach } from 'vitest';
import { configureLogger, createLogger, logger } from './logger.js';

describe('createLogger', () => {
  it('writes one JSON object per entry', () => {
    const lines: string[] = [];
    const log = createLogger((line) => lines.push(line), 'debug');

    log.info({ event: 'tasks_loaded', count: 3 });

    expect(lines).toHaveLength(1);
    const entry: unknown = JSON.parse(lines[0]);
    expect(entry).toMatchObject({ level: 'info', event: 'tasks_loaded', count: 3 });
    expect(entry).toHaveProperty('timestamp');
  });

  it('drops entries below the minimum level', () => {
    const lines: string[] = [];
    const log = createLogger((line) => lines.push(line), 'warn');

    log.debug({ event: 'a' });
    log.info({ event: 'b' });
    log.warn({ event: 'c' });
    log.error({ event: 'd' });

    expect(lines.map((l) => JSON.parse(l).event)).toEqual(['c', 'd']);
  });
});

describe('configureLogger', () => {
  afterEach(() => {
    configureLogger({});
  });

  it('enables debug output when verbose', () => {
    const lines: string[] = [];
    configureLogger({ verbose: true, output: (line) => lines.push(line) });

    logger.debug({ event: 'query_parsed', query: 'status = open' });

    expect(JSON.parse(lines[0])).toMatchObject({ level: 'debug', query: 'status = open' });
  });

  it('hides debug output otherwise', () => {
    const lines: string[] = [];
    configureLogger({ output: (line) => lines.push(line) });

    logger.debug({ event: 'query_parsed' });

    expect(lines).toEqual([]);
  });
});
