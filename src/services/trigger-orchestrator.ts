import { EventEmitter } from 'node:events';
import { setTimeout as delay } from 'node:timers/promises';
import { logger, errorMessage } from '../utils/logger.js';
import type { BoundedChannel } from '../utils/channel.js';
import type { AssistantConfig } from '../config.js';
import type { DetectionEvent, DetectionGate } from './keyword-producer.js';
import type { CaptureClassifyClient } from './capture-classify.js';
import type { AudioResponder } from './audio-responder.js';

export const TriggerState = {
  Idle: 'idle',
  Capturing: 'capturing',
  Classifying: 'classifying',
  Announcing: 'announcing',
  Cooldown: 'cooldown',
} as const;

export type TriggerState = (typeof TriggerState)[keyof typeof TriggerState];

export type CycleOutcome = 'announced' | 'capture-failed' | 'classify-failed' | 'announce-failed' | 'failed';

export interface CycleReport {
  outcome: CycleOutcome;
  keyword: string;
  category: string | null;
  durationMs: number;
}

export interface OrchestratorOptions {
  channel: BoundedChannel<DetectionEvent>;
  gate: DetectionGate;
  client: Pick<CaptureClassifyClient, 'captureImage' | 'classify'>;
  responder: Pick<AudioResponder, 'announceCategory' | 'respond'>;
  timing: AssistantConfig['trigger'];
  /** Secondary signal logged after each announcement; never used to trigger */
  diagnostics?: { readResult(): Promise<number | null> };
  now?: () => number;
}

/**
 * Consumes detection events and runs one capture → classify → announce cycle
 * at a time, with a cooldown between cycles.
 *
 * Events:
 * - `state` (from: TriggerState, to: TriggerState) on every transition
 * - `cycle` (report: CycleReport) when a cycle ends, whatever the outcome
 * - `ignored` (event: DetectionEvent) when an event arrives during cooldown
 */
export class TriggerOrchestrator extends EventEmitter {
  private channel: BoundedChannel<DetectionEvent>;
  private gate: DetectionGate;
  private client: OrchestratorOptions['client'];
  private responder: OrchestratorOptions['responder'];
  private timing: AssistantConfig['trigger'];
  private diagnostics: OrchestratorOptions['diagnostics'];
  private now: () => number;

  private current: TriggerState = TriggerState.Idle;
  private lastTriggerAt = Number.NEGATIVE_INFINITY;
  private running = false;

  constructor(options: OrchestratorOptions) {
    super();
    this.channel = options.channel;
    this.gate = options.gate;
    this.client = options.client;
    this.responder = options.responder;
    this.timing = options.timing;
    this.diagnostics = options.diagnostics;
    this.now = options.now ?? Date.now;
  }

  get state(): TriggerState {
    return this.current;
  }

  /**
   * Consume events until `signal` aborts. Collaborator failures end the
   * current cycle, never the loop.
   */
  async run(signal: AbortSignal): Promise<void> {
    if (this.running) {
      throw new Error('TriggerOrchestrator is already running');
    }
    this.running = true;
    logger.info('Trigger orchestrator listening');

    try {
      while (!signal.aborted) {
        const event = await this.channel.receive(this.timing.pollIntervalMs, signal);
        this.expireCooldown();
        if (!event) continue;

        // Only the earliest queued event is considered per check
        const stale = this.channel.drain();
        if (stale.length > 0) {
          logger.debug(`Discarded ${stale.length} detection(s) queued behind "${event.keyword}"`);
        }

        if (!this.accepts(event)) {
          logger.debug(`Ignoring "${event.keyword}" during cooldown`, { state: this.current });
          this.emit('ignored', event);
          continue;
        }

        await this.runCycle(event, signal);
      }
    } finally {
      this.running = false;
      logger.info('Trigger orchestrator stopped');
    }
  }

  private accepts(event: DetectionEvent): boolean {
    return this.current === TriggerState.Idle && event.timestamp - this.lastTriggerAt >= this.timing.cooldownMs;
  }

  private expireCooldown(): void {
    if (this.current === TriggerState.Cooldown && this.now() - this.lastTriggerAt >= this.timing.cooldownMs) {
      this.transition(TriggerState.Idle);
    }
  }

  private async runCycle(event: DetectionEvent, signal: AbortSignal): Promise<void> {
    const startedAt = this.now();
    let outcome: CycleOutcome = 'failed';
    let category: string | null = null;

    logger.info(`Keyword "${event.keyword}" detected, capturing`);
    this.transition(TriggerState.Capturing);
    // Keep the peripheral's own voice from triggering the next cycle
    this.gate.pause();

    try {
      await this.responder.respond('ack');

      let imagePath: string;
      try {
        imagePath = await this.client.captureImage();
      } catch (error) {
        outcome = 'capture-failed';
        logger.error(`Capture failed: ${errorMessage(error)}`);
        await this.responder.respond('capture_error');
        return;
      }

      this.transition(TriggerState.Classifying);
      category = await this.client.classify(imagePath);

      this.transition(TriggerState.Announcing);
      if (category === null) {
        outcome = 'classify-failed';
        logger.error('Classification failed, announcing error');
        await this.responder.respond('classify_error');
      } else if (await this.responder.announceCategory(category, signal)) {
        outcome = 'announced';
      } else {
        outcome = 'announce-failed';
        if (!signal.aborted) {
          logger.error(`Could not announce category "${category}"`);
          await this.responder.respond('announce_error');
        }
      }

      await this.settle(signal);
      await this.logPeripheralResult();
      this.lastTriggerAt = this.now();
    } catch (error) {
      outcome = 'failed';
      logger.error(`Trigger cycle aborted: ${errorMessage(error)}`);
    } finally {
      this.gate.resume();

      const failedEarly = outcome === 'capture-failed' || outcome === 'failed';
      this.transition(failedEarly ? TriggerState.Idle : TriggerState.Cooldown);

      const report: CycleReport = {
        outcome,
        keyword: event.keyword,
        category,
        durationMs: this.now() - startedAt,
      };
      logger.info(`Trigger cycle finished: ${outcome}`, { keyword: report.keyword, category, durationMs: report.durationMs });
      this.emit('cycle', report);
    }
  }

  /**
   * Give the peripheral time to finish speaking before detection resumes
   */
  private async settle(signal: AbortSignal): Promise<void> {
    if (this.timing.settleMs <= 0 || signal.aborted) return;
    try {
      await delay(this.timing.settleMs, undefined, { signal });
    } catch (error) {
      if (!signal.aborted) throw error;
    }
  }

  private async logPeripheralResult(): Promise<void> {
    if (!this.diagnostics) return;
    const result = await this.diagnostics.readResult();
    logger.debug(`Peripheral result register: ${result ?? 'unreadable'}`);
  }

  private transition(to: TriggerState): void {
    const from = this.current;
    if (from === to) return;

    this.current = to;
    logger.debug(`Trigger state ${from} -> ${to}`);
    this.emit('state', from, to);
  }
}
