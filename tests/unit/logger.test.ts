import { test } from 'node:test';
import assert from 'node:assert';
import { ConsoleLogger, NoopLogFacility, createLogger, noopLogger } from '../../src/logger.js';
import { RecordingFacility } from '../utils/recording-facility.js';

test('ConsoleLogger prefixes each level', () => {
  const facility = new RecordingFacility();
  const logger = new ConsoleLogger('encode', facility);

  logger.info('reading');
  logger.success('done');
  logger.warn('careful');
  logger.error('failed');

  assert.deepStrictEqual(facility.lines, [
    { level: 'log', text: '[INFO] encode :: reading' },
    { level: 'log', text: '[SUCCESS] encode :: done' },
    { level: 'warn', text: '[WARNING] encode :: careful' },
    { level: 'error', text: '[ERROR] encode :: failed' }
  ]);
});

test('ConsoleLogger drops debug lines unless verbose', () => {
  const quiet = new RecordingFacility();
  createLogger('decode', quiet).debug('hidden');
  assert.deepStrictEqual(quiet.lines, []);

  const verbose = new RecordingFacility();
  createLogger('decode', verbose, true).debug('shown');
  assert.deepStrictEqual(verbose.texts('log'), ['[DEBUG] decode :: shown']);
});

test('noopLogger writes nothing', () => {
  assert.doesNotThrow(() => {
    noopLogger.info('x');
    noopLogger.error('x');
    NoopLogFacility.log('x');
  });
});
