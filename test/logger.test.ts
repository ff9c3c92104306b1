/**
 * Logger Module Tests
 */

import { describe, it, beforeEach, afterEach } from 'node:test';
import assert from 'node:assert';
import {
  Logger,
  configureLogger,
  setLogLevel,
  getLogLevel,
  parseLogLevel,
  getAvailableLevels,
  createLogger,
  getLoggerConfig,
  loggers,
} from '../src/logger.js';

// =============================================================================
// Logger Class Tests
// =============================================================================

describe('Logger', () => {
  beforeEach(() => {
    configureLogger({ level: 'info', timestamps: false, colors: false });
  });

  it('should respect its own log level', () => {
    const logger = new Logger('test', { level: 'warn' });
    assert.strictEqual(logger.getLevel(), 'warn');
  });

  it('should follow later global level changes', () => {
    const logger = new Logger('test');
    setLogLevel('error');
    assert.strictEqual(logger.getLevel(), 'error');
  });

  it('should pin a level once set', () => {
    const logger = new Logger('test');
    logger.setLevel('debug');
    setLogLevel('error');
    assert.strictEqual(logger.getLevel(), 'debug');
  });

  it('should name child loggers after the parent', () => {
    const child = new Logger('runner').child('consumer');
    assert.strictEqual(child.getModule(), 'runner:consumer');
  });

  it('should format plain lines', () => {
    const logger = new Logger('checkpoint');
    assert.strictEqual(logger.format('warn', 'slow write'), '[WRN] [checkpoint] slow write');
  });

  it('should append scalar and object data', () => {
    const logger = new Logger('runner');
    assert.strictEqual(logger.format('info', 'processed', 42), '[INF] [runner] processed 42');
    assert.strictEqual(
      logger.format('error', 'failed', { step: 3 }),
      '[ERR] [runner] failed\n{\n  "step": 3\n}'
    );
  });

  it('should colorize when enabled', () => {
    const logger = new Logger('mcp', { colors: true });
    assert.strictEqual(
      logger.format('debug', 'hi'),
      '\x1b[90m[DBG]\x1b[0m \x1b[36m[mcp]\x1b[0m hi'
    );
  });
});

// =============================================================================
// Output Routing
// =============================================================================

describe('Logger output', () => {
  const original = { log: console.log, warn: console.warn, error: console.error };
  let lines: string[];

  beforeEach(() => {
    configureLogger({ level: 'warn', timestamps: false, colors: false });
    lines = [];
    console.log = (line: string) => lines.push(`out ${line}`);
    console.warn = (line: string) => lines.push(`err ${line}`);
    console.error = (line: string) => lines.push(`err ${line}`);
  });

  afterEach(() => {
    console.log = original.log;
    console.warn = original.warn;
    console.error = original.error;
  });

  it('should drop messages below the level', () => {
    const logger = createLogger('runner');
    logger.info('hidden');
    logger.warn('shown');
    logger.error('also shown');
    assert.deepStrictEqual(lines, ['err [WRN] [runner] shown', 'err [ERR] [runner] also shown']);
  });

  it('should print nothing when silent', () => {
    setLogLevel('silent');
    createLogger('runner').error('nothing');
    assert.deepStrictEqual(lines, []);
  });
});

// =============================================================================
// Global Functions
// =============================================================================

describe('Log Levels', () => {
  beforeEach(() => {
    setLogLevel('info');
  });

  it('should get and set the global level', () => {
    assert.strictEqual(getLogLevel(), 'info');
    setLogLevel('debug');
    assert.strictEqual(getLogLevel(), 'debug');
  });

  it('should parse valid log levels case-insensitively', () => {
    assert.strictEqual(parseLogLevel('debug'), 'debug');
    assert.strictEqual(parseLogLevel('INFO'), 'info');
    assert.strictEqual(parseLogLevel('Silent'), 'silent');
  });

  it('should return null for invalid log levels', () => {
    assert.strictEqual(parseLogLevel('trace'), null);
    assert.strictEqual(parseLogLevel(''), null);
    assert.strictEqual(parseLogLevel('constructor'), null);
  });

  it('should list all levels', () => {
    assert.deepStrictEqual(getAvailableLevels(), ['debug', 'info', 'warn', 'error', 'silent']);
  });

  it('should merge partial global configuration', () => {
    configureLogger({ colors: false });
    configureLogger({ timestamps: false });
    const config = getLoggerConfig();
    assert.strictEqual(config.colors, false);
    assert.strictEqual(config.timestamps, false);
  });
});

describe('loggers', () => {
  it('should provide one logger per module that logs', () => {
    assert.deepStrictEqual(Object.keys(loggers), ['oscillator', 'checkpoint', 'runner', 'mcp']);
  });

  it('should tag each logger with its module name', () => {
    assert.ok(loggers.checkpoint instanceof Logger);
    assert.strictEqual(loggers.checkpoint.getModule(), 'checkpoint');
    assert.strictEqual(loggers.mcp.getModule(), 'mcp');
  });
});
