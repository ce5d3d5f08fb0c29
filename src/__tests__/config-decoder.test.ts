import assert from 'node:assert/strict';
import { describe, it } from 'node:test';
import { DEFAULT_DEVICE_CONFIG, configEquals, decodeConfig } from '../config-decoder.js';
import { DecodeContext } from '../decode-context.js';
import { createRecordingLogger } from './support/recording-logger.js';
import { configRecord } from './support/table-builder.js';
import { silentLogger } from '../utils/logger.js';

const context = new DecodeContext({ strict: true, logger: silentLogger });

describe('decodeConfig', () => {
  it('reads the base record and stops after 28 bytes', () => {
    const data = configRecord({ size: 28, mcc: 310, language: 'en', country: 'US', orientation: 2, density: 320, sdkVersion: 21 });
    const { config, next } = decodeConfig(data, 0, context);
    assert.equal(next, 28);
    assert.equal(config.mcc, 310);
    assert.equal(config.language, 'en');
    assert.equal(config.country, 'US');
    assert.equal(config.orientation, 2);
    assert.equal(config.density, 320);
    assert.equal(config.sdkVersion, 21);
    assert.equal(config.screenWidthDp, 0);
    assert.equal(config.localeScript, '');
  });

  it('reads each tail group the size covers', () => {
    const cases: ReadonlyArray<readonly [number, number]> = [[32, 32], [36, 36], [40, 40], [48, 48]];
    for (const [size, expectedNext] of cases) {
      const data = configRecord({ size, smallestScreenWidthDp: 600, screenWidthDp: 720, localeScript: 'Latn', localeVariant: 'posix' });
      const { config, next } = decodeConfig(data, 0, context);
      assert.equal(next, expectedNext);
      assert.equal(config.smallestScreenWidthDp, 600);
      assert.equal(config.screenWidthDp, size > 32 ? 720 : 0);
      assert.equal(config.localeScript, size > 36 ? 'Latn' : '');
      assert.equal(config.localeVariant, size > 40 ? 'posix' : '');
    }
  });

  it('skips bytes beyond the known fields', () => {
    const data = configRecord({ size: 64, uiMode: 0x21 });
    const { config, next } = decodeConfig(data, 0, context);
    assert.equal(next, 64);
    assert.equal(config.size, 64);
    assert.equal(config.uiMode, 0x21);
  });

  it('logs non-zero trailing bytes at debug level', () => {
    const data = configRecord({ size: 52 });
    data[50] = 7;
    const logger = createRecordingLogger();
    decodeConfig(data, 0, new DecodeContext({ strict: true, logger }));
    assert.deepEqual(logger.messages('debug'), ['Excessive 4 non-null bytes in config at 0x30 ignored']);
  });
});

describe('configEquals', () => {
  it('compares every field including size', () => {
    assert.equal(configEquals(DEFAULT_DEVICE_CONFIG, { ...DEFAULT_DEVICE_CONFIG }), true);
    assert.equal(configEquals(DEFAULT_DEVICE_CONFIG, { ...DEFAULT_DEVICE_CONFIG, language: 'de' }), false);
    assert.equal(configEquals(DEFAULT_DEVICE_CONFIG, { ...DEFAULT_DEVICE_CONFIG, size: 48 }), false);
  });
});
