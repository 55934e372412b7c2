/**
 * Tests for CommandGenerationClient.
 */

import { beforeEach, describe, expect, it, vi } from 'vitest';
import { getDefaultConfig } from '../config/parser.js';
import { silentLogger } from '../utils/logger.js';
import type { GenerationRequest } from './types.js';

vi.mock('execa', () => ({
  execa: vi.fn(),
}));

import { execa } from 'execa';
import { CommandGenerationClient, parseCommandOutput, resolveModel } from './command-client.js';

const mockExeca = vi.mocked(execa);

function createMockExecaResult(options: {
  exitCode: number | undefined;
  stdout?: string;
  stderr?: string;
  failed?: boolean;
  timedOut?: boolean;
  isCanceled?: boolean;
}): Awaited<ReturnType<typeof execa>> {
  return {
    exitCode: options.exitCode,
    stdout: options.stdout ?? '',
    stderr: options.stderr ?? '',
    failed: options.failed ?? false,
    timedOut: options.timedOut ?? false,
    isCanceled: options.isCanceled ?? false,
    command: 'claude',
    escapedCommand: 'claude',
  } as unknown as Awaited<ReturnType<typeof execa>>;
}

const questionRequest: GenerationRequest = {
  promptKind: 'question',
  context: {
    initialIdea: 'AI and creativity',
    transcript: '',
    uncoveredAreas: ['HookPreference'],
    targetArea: 'HookPreference',
  },
};

function createClient(): CommandGenerationClient {
  return new CommandGenerationClient({ config: getDefaultConfig(), logger: silentLogger });
}

describe('CommandGenerationClient', () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  it('should send the prompt on stdin and unwrap the JSON result', async () => {
    mockExeca.mockResolvedValueOnce(
      createMockExecaResult({
        exitCode: 0,
        stdout: JSON.stringify({ type: 'result', result: 'What hooks you?', is_error: false }),
      })
    );

    const result = await createClient().generate(questionRequest);

    expect(result.success).toBe(true);
    if (result.success) {
      expect(result.response.content).toBe('What hooks you?');
      expect(result.response.modelId).toBe('claude-haiku-4-5');
    }
    expect(mockExeca).toHaveBeenCalledWith(
      'claude',
      ['-p', '--output-format', 'json', '--model', 'claude-haiku-4-5', '--no-session-persistence'],
      expect.objectContaining({
        input: expect.stringContaining('"AI and creativity"'),
        timeout: 120000,
        reject: false,
      })
    );
  });

  it('should pass the abort signal to the subprocess', async () => {
    mockExeca.mockResolvedValueOnce(createMockExecaResult({ exitCode: 0, stdout: 'plain' }));
    const controller = new AbortController();

    await createClient().generate(questionRequest, controller.signal);

    expect(mockExeca).toHaveBeenCalledWith(
      'claude',
      expect.any(Array),
      expect.objectContaining({ cancelSignal: controller.signal })
    );
  });

  it('should accept plain-text output', async () => {
    mockExeca.mockResolvedValueOnce(createMockExecaResult({ exitCode: 0, stdout: '  Who is it for?\n' }));

    const result = await createClient().generate(questionRequest);

    expect(result.success && result.response.content).toBe('Who is it for?');
  });

  it('should map a timeout to TimeoutError', async () => {
    mockExeca.mockResolvedValueOnce(
      createMockExecaResult({ exitCode: undefined, failed: true, timedOut: true })
    );

    const result = await createClient().generate(questionRequest);

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error).toMatchObject({ kind: 'TimeoutError', timeoutMs: 120000, retryable: true });
    }
  });

  it('should map a cancelled subprocess to CancelledError', async () => {
    mockExeca.mockResolvedValueOnce(
      createMockExecaResult({ exitCode: undefined, failed: true, isCanceled: true })
    );

    const result = await createClient().generate(questionRequest);

    expect(!result.success && result.error.kind).toBe('CancelledError');
  });

  it('should not start a subprocess for an already aborted signal', async () => {
    const controller = new AbortController();
    controller.abort();

    const result = await createClient().generate(questionRequest, controller.signal);

    expect(!result.success && result.error.kind).toBe('CancelledError');
    expect(mockExeca).not.toHaveBeenCalled();
  });

  it('should detect rate limiting in stderr', async () => {
    mockExeca.mockResolvedValueOnce(
      createMockExecaResult({ exitCode: 1, failed: true, stderr: 'Error: 429 Too Many Requests' })
    );

    const result = await createClient().generate(questionRequest);

    expect(!result.success && result.error.kind).toBe('RateLimitError');
  });

  it('should detect rate limiting reported inside the JSON result', async () => {
    mockExeca.mockResolvedValueOnce(
      createMockExecaResult({
        exitCode: 0,
        stdout: JSON.stringify({ result: 'API rate limit exceeded', is_error: true }),
      })
    );

    const result = await createClient().generate(questionRequest);

    expect(!result.success && result.error.kind).toBe('RateLimitError');
  });

  it('should map other non-zero exits to TransportError', async () => {
    mockExeca.mockResolvedValueOnce(
      createMockExecaResult({ exitCode: 2, failed: true, stderr: 'boom' })
    );

    const result = await createClient().generate(questionRequest);

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error).toMatchObject({
        kind: 'TransportError',
        exitCode: 2,
        message: 'Generation failed with exit code 2: boom',
      });
    }
  });

  it('should report an executable that cannot start as an invalid request', async () => {
    mockExeca.mockResolvedValueOnce(createMockExecaResult({ exitCode: undefined, failed: true }));

    const result = await createClient().generate(questionRequest);

    expect(!result.success && result.error.kind).toBe('InvalidRequestError');
  });

  it('should map a thrown error to TransportError', async () => {
    mockExeca.mockRejectedValueOnce(new Error('spawn failed'));

    const result = await createClient().generate(questionRequest);

    expect(!result.success && result.error.message).toBe(
      'Generation subprocess failed: spawn failed'
    );
  });

  it('should reject empty output', async () => {
    mockExeca.mockResolvedValueOnce(createMockExecaResult({ exitCode: 0, stdout: '   ' }));

    const result = await createClient().generate(questionRequest);

    expect(!result.success && result.error.message).toBe('Generation returned no text');
  });

  it('should not call the executable when context is missing', async () => {
    const result = await createClient().generate({ promptKind: 'brief', context: {} });

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error).toMatchObject({
        kind: 'InvalidRequestError',
        missingFields: ['conversation', 'styleProfile'],
      });
    }
    expect(mockExeca).not.toHaveBeenCalled();
  });
});

describe('resolveModel', () => {
  it('should pick the model of the role behind each prompt kind', () => {
    const { models } = getDefaultConfig();
    models.writer_model = 'writer';
    models.hook_model = 'hooker';

    expect(resolveModel('content', models)).toBe('writer');
    expect(resolveModel('hooks', models)).toBe('hooker');
    expect(resolveModel('wrapUp', models)).toBe(models.interviewer_model);
  });
});

describe('parseCommandOutput', () => {
  it('should read the model name when present', () => {
    expect(parseCommandOutput('{"result":"hi","model":"m-1"}')).toEqual({
      text: 'hi',
      isError: false,
      modelId: 'm-1',
    });
  });

  it('should fall back to raw text for JSON without a result', () => {
    expect(parseCommandOutput('{"other":1}').text).toBe('{"other":1}');
  });
});
