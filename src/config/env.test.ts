import { describe, expect, it } from 'vitest';
import {
  EnvCoercionError,
  readEnvOverrides,
  applyEnvOverrides,
  getEnvVarDocumentation,
} from './env.js';
import { DEFAULT_CONFIG, parseConfig } from './index.js';

describe('Environment Variable Overrides', () => {
  describe('readEnvOverrides', () => {
    it('should map VOICECRAFT_MODEL to writer_model', () => {
      const result = readEnvOverrides({ VOICECRAFT_MODEL: 'model-x' });

      expect(result.overrides.models?.writer_model).toBe('model-x');
      expect(result.appliedVars).toEqual(['VOICECRAFT_MODEL']);
    });

    it('should read all model env vars', () => {
      const result = readEnvOverrides({
        VOICECRAFT_MODELS_INTERVIEWER_MODEL: 'a',
        VOICECRAFT_MODELS_STRATEGIST_MODEL: 'b',
        VOICECRAFT_MODELS_HOOK_MODEL: 'c',
        VOICECRAFT_MODELS_STRUCTURE_MODEL: 'd',
        VOICECRAFT_MODELS_WRITER_MODEL: 'e',
      });

      expect(result.overrides.models).toEqual({
        interviewer_model: 'a',
        strategist_model: 'b',
        hook_model: 'c',
        structure_model: 'd',
        writer_model: 'e',
      });
    });

    it('should coerce numbers for conversation thresholds', () => {
      const result = readEnvOverrides({
        VOICECRAFT_CONVERSATION_MIN_USER_TURNS: ' 5 ',
        VOICECRAFT_CONVERSATION_MAX_USER_TURNS: '9',
      });

      expect(result.overrides.conversation).toEqual({ min_user_turns: 5, max_user_turns: 9 });
    });

    it.each([
      ['true', true],
      ['YES', true],
      ['1', true],
      ['on', true],
      ['false', false],
      ['No', false],
      ['0', false],
      ['off', false],
    ])('should coerce boolean %s to %s', (raw, expected) => {
      const result = readEnvOverrides({ VOICECRAFT_LOGGING_DEBUG: raw });
      expect(result.overrides.logging?.debug).toBe(expected);
    });

    it('should let the full form win over the shortcut', () => {
      const result = readEnvOverrides({
        VOICECRAFT_MODEL: 'shortcut',
        VOICECRAFT_MODELS_WRITER_MODEL: 'full',
      });

      expect(result.overrides.models?.writer_model).toBe('full');
    });

    it('should skip empty and unknown variables', () => {
      const result = readEnvOverrides({ VOICECRAFT_PATHS_STATE: '', VOICECRAFT_UNKNOWN: 'x' });

      expect(result.overrides).toEqual({});
      expect(result.appliedVars).toEqual([]);
    });

    it('should throw EnvCoercionError for an invalid number', () => {
      expect(() => readEnvOverrides({ VOICECRAFT_PIPELINE_HOOK_COUNT: 'three' })).toThrow(
        EnvCoercionError
      );
    });

    it('should collect errors when asked to', () => {
      const result = readEnvOverrides(
        {
          VOICECRAFT_PIPELINE_HOOK_COUNT: 'three',
          VOICECRAFT_LOGGING_DEBUG: 'maybe',
          VOICECRAFT_PATHS_OUTPUT: 'post.md',
        },
        { collectErrors: true }
      );

      expect(result.errors.map((e) => e.envVar)).toEqual([
        'VOICECRAFT_PIPELINE_HOOK_COUNT',
        'VOICECRAFT_LOGGING_DEBUG',
      ]);
      expect(result.errors[1]?.expectedType).toBe('boolean');
      expect(result.overrides.paths?.output).toBe('post.md');
    });
  });

  describe('applyEnvOverrides', () => {
    it('should override file values and keep the rest', () => {
      const fileConfig = parseConfig(`
[generation]
executable = "from-file"
timeout_ms = 1000
`);
      const config = applyEnvOverrides(fileConfig, { VOICECRAFT_GENERATION_TIMEOUT_MS: '2500' });

      expect(config.generation.executable).toBe('from-file');
      expect(config.generation.timeout_ms).toBe(2500);
      expect(config.style).toEqual(DEFAULT_CONFIG.style);
    });

    it('should not mutate the input configuration', () => {
      const base = parseConfig('');
      applyEnvOverrides(base, { VOICECRAFT_DEBUG: 'true' });
      expect(base.logging.debug).toBe(false);
    });
  });

  describe('getEnvVarDocumentation', () => {
    it('should document every variable with its type', () => {
      const docs = getEnvVarDocumentation();

      expect(docs.VOICECRAFT_CONVERSATION_MAX_USER_TURNS).toEqual({
        description: 'Maximum user turns',
        type: 'number',
      });
      expect(docs.VOICECRAFT_DEBUG?.type).toBe('boolean');
      expect(Object.keys(docs).every((name) => name.startsWith('VOICECRAFT_'))).toBe(true);
    });
  });
});
