/**
 * Caller-facing content service.
 *
 * Combines the conversation engine and the pipeline orchestrator behind one
 * surface: a session is brainstormed to completion, handed off as a context
 * bundle, and turned into a post by a pipeline run.
 *
 * @packageDocumentation
 */

import { join } from 'node:path';
import { bundleFromSession } from '../bundle/bundle.js';
import type { ContextBundle } from '../bundle/types.js';
import type { Config } from '../config/types.js';
import { ConversationEngine } from '../conversation/engine.js';
import type { Session } from '../conversation/types.js';
import { CommandGenerationClient } from '../generation/command-client.js';
import type { GenerationCapability } from '../generation/types.js';
import { ResponseMonitor } from '../monitoring/response-monitor.js';
import { PipelineOrchestrator, type StructureEdits } from '../pipeline/orchestrator.js';
import type { PipelineRun } from '../pipeline/types.js';
import { FileEntityStore } from '../store/file-store.js';
import type { EntityStore } from '../store/types.js';
import { Logger, silentLogger } from '../utils/logger.js';
import { parseRunRecord, parseSessionRecord } from './records.js';

/**
 * Options for creating a ContentService.
 */
export interface ContentServiceOptions {
  readonly config: Config;
  readonly sessions: EntityStore<Session>;
  readonly runs: EntityStore<PipelineRun>;
  readonly generation: GenerationCapability;
  readonly logger?: Logger | undefined;
  readonly monitor?: ResponseMonitor | undefined;
  readonly now?: (() => Date) | undefined;
  readonly sleep?: ((ms: number) => Promise<void>) | undefined;
  readonly random?: (() => number) | undefined;
  readonly generateSessionId?: (() => string) | undefined;
  readonly generateRunId?: (() => string) | undefined;
}

/**
 * Id of the bundle handed off from a session.
 */
export function bundleIdFor(sessionId: string): string {
  return `bundle_${sessionId}`;
}

export class ContentService {
  /** Response timings of every session this service drives. */
  readonly monitor: ResponseMonitor;
  private readonly engine: ConversationEngine;
  private readonly orchestrator: PipelineOrchestrator;
  private readonly logger: Logger;
  private readonly now: () => Date;

  constructor(options: ContentServiceOptions) {
    const baseLogger = options.logger ?? silentLogger;
    this.logger = baseLogger.child('ContentService');
    this.now = options.now ?? (() => new Date());
    this.monitor =
      options.monitor ??
      new ResponseMonitor({
        targetResponseMs: options.config.monitoring.target_response_ms,
        logger: baseLogger,
      });
    this.engine = new ConversationEngine({
      store: options.sessions,
      generation: options.generation,
      config: options.config,
      logger: baseLogger,
      monitor: this.monitor,
      generateId: options.generateSessionId,
      now: this.now,
      sleep: options.sleep,
      random: options.random,
    });
    this.orchestrator = new PipelineOrchestrator({
      store: options.runs,
      generation: options.generation,
      config: options.config,
      logger: baseLogger,
      generateId: options.generateRunId,
      now: this.now,
      sleep: options.sleep,
      random: options.random,
    });
  }

  startSession(initialIdea: string): Promise<Session> {
    return this.engine.startSession(initialIdea);
  }

  resumeSession(sessionId: string): Promise<Session> {
    return this.engine.resumeSession(sessionId);
  }

  submitUserTurn(sessionId: string, text: string): Promise<Session> {
    return this.engine.submitUserTurn(sessionId, text);
  }

  requestExplicitStop(sessionId: string): Promise<Session> {
    return this.engine.requestExplicitStop(sessionId);
  }

  cancelSession(sessionId: string): Promise<Session> {
    return this.engine.cancelSession(sessionId);
  }

  getSession(sessionId: string): Promise<Session> {
    return this.engine.getSession(sessionId);
  }

  /**
   * Hands a completed session off as a context bundle with its
   * `conversation` and `styleProfile` sections.
   *
   * @throws InvalidTransitionError if the session is not Completed.
   */
  async handoff(sessionId: string): Promise<ContextBundle> {
    const session = await this.engine.getSession(sessionId);
    const bundle = bundleFromSession(session, { id: bundleIdFor(sessionId), now: this.now() });
    this.logger.info('handoff', { sessionId, bundleId: bundle.id, turns: session.turns.length });
    return bundle;
  }

  /**
   * Runs the pipeline until the structure review or a terminal state, over
   * either a bundle or the handoff of a completed session.
   */
  async startPipeline(source: string | ContextBundle): Promise<PipelineRun> {
    const bundle = typeof source === 'string' ? await this.handoff(source) : source;
    return this.orchestrator.startPipeline(bundle);
  }

  approveStructure(runId: string): Promise<PipelineRun> {
    return this.orchestrator.approveStructure(runId);
  }

  reviseStructure(runId: string, edits: StructureEdits): Promise<PipelineRun> {
    return this.orchestrator.reviseStructure(runId, edits);
  }

  cancelRun(runId: string): Promise<PipelineRun> {
    return this.orchestrator.cancelRun(runId);
  }

  getRunStatus(runId: string): Promise<PipelineRun> {
    return this.orchestrator.getRunStatus(runId);
  }

  /** Starts a fresh run from the bundle of a failed or aborted run. */
  restartRun(runId: string): Promise<PipelineRun> {
    return this.orchestrator.restartRun(runId);
  }
}

/**
 * Options for {@link createContentService}.
 */
export interface CreateContentServiceOptions {
  readonly config: Config;
  /** Defaults to the command-line client built from `config`. */
  readonly generation?: GenerationCapability | undefined;
  readonly logger?: Logger | undefined;
}

/**
 * Builds a service persisting sessions and runs as JSON records under the
 * configured state directory.
 */
export function createContentService(options: CreateContentServiceOptions): ContentService {
  const { config } = options;
  const logger = options.logger ?? silentLogger;
  const generation =
    options.generation ?? new CommandGenerationClient({ config, logger });
  return new ContentService({
    config,
    generation,
    logger,
    sessions: new FileEntityStore({
      directory: join(config.paths.state, 'sessions'),
      parse: parseSessionRecord,
    }),
    runs: new FileEntityStore({
      directory: join(config.paths.state, 'runs'),
      parse: parseRunRecord,
    }),
  });
}
