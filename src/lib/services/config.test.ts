import { describe, it, expect } from 'vitest';
import { Effect } from 'effect';
import { runFailure } from '@tests/utils/effect-helpers';
import {
  ConfigService,
  ConfigServiceTest,
  defaultConfig,
  loadConfigFromEnv,
  makeConfigService,
  mergeConfigs,
} from './config';

describe('Config', () => {
  describe('loadConfigFromEnv', () => {
    it('should read only the variables that are set', async () => {
      const overrides = await Effect.runPromise(
        loadConfigFromEnv({
          FLOW_ID_INDICATOR: '@',
          FLOW_DANGLING_LINKS: 'fail',
          LOG_LEVEL: 'debug',
          FLOW_COMMENT_INDICATOR: '',
        })
      );
      expect(overrides).toEqual({
        recording: { idIndicator: '@', danglingLinks: 'fail' },
        conversion: {},
        logging: { level: 'debug' },
      });
    });

    it('should reject values outside the allowed set', async () => {
      const error = await runFailure(
        loadConfigFromEnv({ FLOW_NUMERIC_STRINGS: 'sloppy' })
      );
      expect(error).toMatchObject({
        _tag: 'ConfigError',
        key: 'FLOW_NUMERIC_STRINGS',
        message: 'Invalid value for FLOW_NUMERIC_STRINGS: sloppy',
      });
    });
  });

  describe('mergeConfigs', () => {
    it('should override one section field at a time', () => {
      const merged = mergeConfigs(defaultConfig, {
        recording: { commentIndicator: '//' },
      });
      expect(merged.recording).toEqual({
        ...defaultConfig.recording,
        commentIndicator: '//',
      });
      expect(merged.conversion).toEqual(defaultConfig.conversion);
    });
  });

  describe('ConfigService', () => {
    it('should serve sections and apply updates', async () => {
      const recording = await Effect.runPromise(
        Effect.provide(
          Effect.gen(function* () {
            const config = yield* ConfigService;
            yield* config.update({ recording: { xmlIdPrefix: 'obj' } });
            return yield* config.get('recording');
          }),
          ConfigServiceTest({ recording: { danglingLinks: 'ignore' } })
        )
      );
      expect(recording.xmlIdPrefix).toBe('obj');
      expect(recording.danglingLinks).toBe('ignore');
      expect(recording.idIndicator).toBe('#');
    });

    it('should refuse updates that break the schema', async () => {
      const error = await runFailure(
        Effect.provide(
          Effect.flatMap(ConfigService, (config) =>
            config.update({ recording: { idIndicator: '' } })
          ),
          ConfigServiceTest()
        )
      );
      expect(error._tag).toBe('ConfigError');
    });

    it('should refuse an invalid initial configuration', async () => {
      const error = await runFailure(
        makeConfigService(
          mergeConfigs(defaultConfig, { recording: { xmlRootName: '' } })
        )
      );
      expect(error._tag).toBe('ConfigError');
    });
  });
});
