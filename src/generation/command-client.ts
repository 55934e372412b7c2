/**
 * Command-line generation client.
 *
 * Runs the configured executable (by default the `claude` CLI in print mode),
 * sends the rendered prompt on stdin and reads the reply from its JSON output.
 *
 * @packageDocumentation
 */

import { execa } from 'execa';
import type { Config, ModelAssignments } from '../config/types.js';
import { Logger } from '../utils/logger.js';
import { renderPrompt } from './prompts.js';
import type { GenerationCapability, GenerationRequest, GenerationResult, PromptKind } from './types.js';
import {
  createCancelledError,
  createFailureResult,
  createInvalidRequestError,
  createRateLimitError,
  createSuccessResult,
  createTimeoutError,
  createTransportError,
} from './types.js';

/**
 * Options for creating a CommandGenerationClient.
 */
export interface CommandGenerationClientOptions {
  /** Models, generation and content settings. */
  readonly config: Pick<Config, 'models' | 'generation' | 'content'>;
  /** Additional CLI flags passed on every invocation. */
  readonly additionalFlags?: readonly string[];
  /** Working directory for the subprocess. */
  readonly cwd?: string;
  readonly logger?: Logger;
}

const MODEL_ROLE_BY_KIND: Readonly<Record<PromptKind, keyof ModelAssignments>> = {
  question: 'interviewer_model',
  wrapUp: 'interviewer_model',
  brief: 'strategist_model',
  hooks: 'hook_model',
  structure: 'structure_model',
  content: 'writer_model',
};

const RATE_LIMIT_PATTERN = /rate.?limit|too many requests|\b429\b|overloaded/i;

/**
 * Resolves the model assigned to a prompt kind.
 *
 * @param kind - The prompt kind.
 * @param models - Configured model assignments.
 * @returns The model identifier.
 */
export function resolveModel(kind: PromptKind, models: ModelAssignments): string {
  return models[MODEL_ROLE_BY_KIND[kind]];
}

interface ParsedOutput {
  readonly text: string;
  readonly isError: boolean;
  readonly modelId: string | undefined;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Reads the reply text from the executable's stdout.
 *
 * JSON output of the form `{ "result": "...", "is_error": false }` is unwrapped;
 * anything else is taken as plain text.
 *
 * @param stdout - Raw stdout of the subprocess.
 * @returns The reply text and whether the executable flagged an error.
 */
export function parseCommandOutput(stdout: string): ParsedOutput {
  const trimmed = stdout.trim();
  let parsed: unknown;
  try {
    parsed = JSON.parse(trimmed);
  } catch {
    return { text: trimmed, isError: false, modelId: undefined };
  }

  if (!isRecord(parsed) || typeof parsed.result !== 'string') {
    return { text: trimmed, isError: false, modelId: undefined };
  }

  return {
    text: parsed.result,
    isError: parsed.is_error === true,
    modelId: typeof parsed.model === 'string' ? parsed.model : undefined,
  };
}

/**
 * Generation capability backed by a command-line model client.
 *
 * @example
 * ```typescript
 * const client = new CommandGenerationClient({ config });
 * const result = await client.generate({ promptKind: 'question', context }, signal);
 * if (result.success) {
 *   console.log(result.response.content);
 * }
 * ```
 */
export class CommandGenerationClient implements GenerationCapability {
  private readonly config: Pick<Config, 'models' | 'generation' | 'content'>;
  private readonly additionalFlags: readonly string[];
  private readonly cwd: string | undefined;
  private readonly logger: Logger;

  constructor(options: CommandGenerationClientOptions) {
    this.config = options.config;
    this.additionalFlags = options.additionalFlags ?? [];
    this.cwd = options.cwd;
    this.logger = options.logger ?? new Logger({ component: 'GenerationClient' });
  }

  /**
   * Builds CLI arguments for a request.
   *
   * @param modelId - Model to run.
   * @returns Array of CLI arguments.
   */
  private buildArgs(modelId: string): string[] {
    return [
      '-p',
      '--output-format',
      'json',
      '--model',
      modelId,
      '--no-session-persistence',
      ...this.additionalFlags,
    ];
  }

  async generate(request: GenerationRequest, signal?: AbortSignal): Promise<GenerationResult> {
    const rendered = renderPrompt(request, this.config.content);
    if (!rendered.ok) {
      return createFailureResult(
        createInvalidRequestError(
          `Prompt '${request.promptKind}' is missing context: ${rendered.missingFields.join(', ')}`,
          rendered.missingFields
        )
      );
    }

    if (signal?.aborted === true) {
      return createFailureResult(createCancelledError());
    }

    const { executable, timeout_ms: timeoutMs } = this.config.generation;
    const modelId = resolveModel(request.promptKind, this.config.models);
    const startTime = Date.now();

    this.logger.debug('generation_started', { promptKind: request.promptKind, modelId });

    let result;
    try {
      result = await execa(executable, this.buildArgs(modelId), {
        input: rendered.prompt,
        timeout: timeoutMs,
        reject: false,
        ...(signal !== undefined ? { cancelSignal: signal } : {}),
        ...(this.cwd !== undefined ? { cwd: this.cwd } : {}),
      });
    } catch (error) {
      return createFailureResult(
        createTransportError(
          `Generation subprocess failed: ${error instanceof Error ? error.message : String(error)}`,
          { cause: error instanceof Error ? error : undefined }
        )
      );
    }

    const latencyMs = Date.now() - startTime;

    if (result.isCanceled) {
      return createFailureResult(createCancelledError());
    }
    if (result.timedOut) {
      return createFailureResult(
        createTimeoutError(`Generation timed out after ${String(timeoutMs)}ms`, timeoutMs)
      );
    }
    if (result.failed && result.exitCode === undefined) {
      return createFailureResult(
        createInvalidRequestError(`Generation executable '${executable}' could not be started`)
      );
    }

    const output = parseCommandOutput(result.stdout);

    if (result.exitCode !== 0 || output.isError) {
      const detail = [output.text, result.stderr].filter((part) => part !== '').join('\n');
      this.logger.warn('generation_failed', {
        promptKind: request.promptKind,
        exitCode: result.exitCode,
        detail: detail.slice(0, 500),
      });
      if (RATE_LIMIT_PATTERN.test(detail)) {
        return createFailureResult(createRateLimitError(`Generation rate limited: ${detail}`));
      }
      return createFailureResult(
        createTransportError(
          `Generation failed with exit code ${String(result.exitCode)}${detail !== '' ? `: ${detail}` : ''}`,
          { exitCode: result.exitCode }
        )
      );
    }

    if (output.text === '') {
      return createFailureResult(createTransportError('Generation returned no text'));
    }

    this.logger.debug('generation_succeeded', {
      promptKind: request.promptKind,
      modelId,
      latencyMs,
    });

    return createSuccessResult({
      content: output.text,
      modelId: output.modelId ?? modelId,
      latencyMs,
    });
  }
}
