import { assert } from 'chai';

import { createConsoleLogger, silentLogger } from '../src/logger.js';
import {
  createPhasedConfig,
  DEFAULT_DELIMITER,
  defaultTokenProvider,
} from '../src/phased-config.js';

describe('phased configuration', function () {
  it('fills in defaults', function () {
    const config = createPhasedConfig();
    assert.strictEqual(config.delimiter, DEFAULT_DELIMITER);
    assert.isFalse(config.keepContext);
    assert.deepEqual(config.refetchNames, [ 'csrf_token' ]);
    assert.strictEqual(config.maxDepth, 16);
    assert.isFalse(config.strictSnapshots);
    assert.strictEqual(config.logger, silentLogger);
    assert.strictEqual(config.tokenProvider, defaultTokenProvider);
    assert.isUndefined(config.renderer);
    assert.isUndefined(config.cacheStore);
  });

  it('returns a frozen object', function () {
    const config = createPhasedConfig({ refetchNames: [ 'nonce' ] });
    assert.isTrue(Object.isFrozen(config));
    assert.isTrue(Object.isFrozen(config.refetchNames));
  });

  it('rejects invalid scalar options', function () {
    assert.throws(() => createPhasedConfig({ delimiter: '' }), TypeError, "Invalid phased option 'delimiter': delimiter must not be empty");
    assert.throws(() => createPhasedConfig({ maxDepth: 0 }), TypeError, "Invalid phased option 'maxDepth'");
    assert.throws(() => createPhasedConfig({ maxDepth: 2.5 }), TypeError);
    assert.throws(() => createPhasedConfig({ refetchNames: [ '' ] }), TypeError, "Invalid phased option 'refetchNames.0'");
  });

  describe('default token provider', function () {
    it('returns the innermost value and calls functions', function () {
      assert.strictEqual(defaultTokenProvider('t', [ { t: 'outer' }, { t: 'inner' } ]), 'inner');
      assert.strictEqual(defaultTokenProvider('t', [ { t: () => 'called' } ]), 'called');
      assert.isUndefined(defaultTokenProvider('t', [ {} ]));
    });
  });

  describe('console logger', function () {
    const original = { log: console.log, warn: console.warn, error: console.error };
    let lines: string[][];

    beforeEach(function () {
      lines = [];
      const capture = (sink: string) => (...args: unknown[]): void => {
        lines.push([ sink, ...args.map((a) => typeof a === 'string' ? a : JSON.stringify(a)) ]);
      };
      console.log = capture('log');
      console.warn = capture('warn');
      console.error = capture('error');
    });

    afterEach(function () {
      console.log = original.log;
      console.warn = original.warn;
      console.error = original.error;
    });

    it('drops messages below the minimum level', function () {
      const logger = createConsoleLogger('warn');
      logger.debug('d');
      logger.info('i');
      logger.warn('w', { key: 'k' });
      logger.error('e');
      assert.deepEqual(lines, [
        [ 'warn', '[phased] WARN w', '{"key":"k"}' ],
        [ 'error', '[phased] ERROR e' ],
      ]);
    });

    it('writes debug and info to the log sink under its namespace', function () {
      const logger = createConsoleLogger('debug', 'app');
      logger.debug('d');
      logger.info('i');
      assert.deepEqual(lines, [
        [ 'log', '[app] DEBUG d' ],
        [ 'log', '[app] INFO i' ],
      ]);
    });
  });
});
