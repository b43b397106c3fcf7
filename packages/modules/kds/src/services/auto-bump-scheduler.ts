import { createSystemContext, logger, serializeError } from '@kitchenflow/core';
import { DEFAULT_KITCHEN_SETTINGS } from '@kitchenflow/shared';
import type { KitchenSettings } from '@kitchenflow/shared';
import type { Ticket } from '../types';
import { IllegalTransitionError, TicketNotFoundError } from '../errors';
import { transitionTicket } from '../commands/transition-ticket';
import { getKds } from '../runtime';
import { elapsedSeconds } from './escalation';

export interface AutoBumpTickResult {
  hubId: string;
  /** In-progress tickets looked at. */
  scanned: number;
  bumped: number;
  /** Due tickets someone else moved first. */
  skipped: number;
  failed: number;
}

class NotDueError extends Error {
  constructor(ticketId: string) {
    super(`Ticket ${ticketId} is no longer due for auto-bump`);
    this.name = 'NotDueError';
  }
}

interface HubLoop {
  timer: ReturnType<typeof setTimeout> | null;
  pass: Promise<void> | null;
}

/**
 * Bumps in-progress tickets that have sat longer than the hub's
 * `autoBumpDelaySeconds`. One timer per hub, re-armed after each pass at the
 * hub's current `autoBumpIntervalSeconds`; a hub never has two passes
 * running at once.
 */
export class AutoBumpScheduler {
  private running = false;
  private readonly loops = new Map<string, HubLoop>();
  private readonly inFlight = new Map<string, Promise<AutoBumpTickResult>>();

  async start(hubIds: readonly string[]): Promise<void> {
    this.running = true;
    for (const hubId of hubIds) {
      if (this.loops.has(hubId)) continue;
      this.loops.set(hubId, { timer: null, pass: null });
      this.arm(hubId, await this.intervalMs(hubId));
    }
    logger.info('Auto-bump scheduler started', { hubs: hubIds.length });
  }

  /** Cancel pending timers and wait for passes already running. */
  async stop(): Promise<void> {
    this.running = false;
    const passes: Promise<void>[] = [];
    for (const loop of this.loops.values()) {
      if (loop.timer) clearTimeout(loop.timer);
      loop.timer = null;
      if (loop.pass) passes.push(loop.pass);
    }
    this.loops.clear();
    await Promise.all(passes);
    logger.info('Auto-bump scheduler stopped');
  }

  isRunning(): boolean {
    return this.running;
  }

  /**
   * Run one pass for `hubId`. A call made while a pass for the same hub is
   * running gets that pass's result instead of starting another.
   */
  tick(hubId: string): Promise<AutoBumpTickResult> {
    const running = this.inFlight.get(hubId);
    if (running) return running;
    const pass = this.bumpDue(hubId).finally(() => {
      this.inFlight.delete(hubId);
    });
    this.inFlight.set(hubId, pass);
    return pass;
  }

  private arm(hubId: string, delayMs: number): void {
    const loop = this.loops.get(hubId);
    if (!this.running || !loop) return;
    loop.timer = setTimeout(() => {
      loop.timer = null;
      loop.pass = this.runPass(hubId).finally(() => {
        loop.pass = null;
      });
    }, delayMs);
  }

  private async runPass(hubId: string): Promise<void> {
    try {
      await this.tick(hubId);
    } catch (err) {
      logger.error('Auto-bump pass failed', { hubId, error: serializeError(err) });
    }
    this.arm(hubId, await this.intervalMs(hubId));
  }

  private async intervalMs(hubId: string): Promise<number> {
    try {
      const settings = await getKds().settings.getSettings(hubId);
      return settings.autoBumpIntervalSeconds * 1000;
    } catch (err) {
      logger.warn('Could not read auto-bump interval, using default', {
        hubId,
        error: serializeError(err),
      });
      return DEFAULT_KITCHEN_SETTINGS.autoBumpIntervalSeconds * 1000;
    }
  }

  private async bumpDue(hubId: string): Promise<AutoBumpTickResult> {
    const result: AutoBumpTickResult = { hubId, scanned: 0, bumped: 0, skipped: 0, failed: 0 };
    const { store, settings } = getKds();
    const hubSettings = await settings.getSettings(hubId);
    if (!hubSettings.autoBumpEnabled) return result;

    const inProgress = await store.listTickets(hubId, { states: ['in_progress'] });
    result.scanned = inProgress.length;

    const scannedAt = new Date();
    const due = inProgress.filter((t) => isDue(t, hubSettings, scannedAt));
    const ctx = createSystemContext(hubId);

    for (const ticket of due) {
      try {
        await transitionTicket(ctx, ticket.id, (current) => {
          if (current.state !== 'in_progress') {
            throw new IllegalTransitionError(current.id, current.state, 'bump');
          }
          if (!isDue(current, hubSettings, new Date())) throw new NotDueError(current.id);
          return 'bump';
        }, 'auto-bump');
        result.bumped++;
      } catch (err) {
        if (
          err instanceof IllegalTransitionError ||
          err instanceof TicketNotFoundError ||
          err instanceof NotDueError
        ) {
          result.skipped++;
          logger.debug('Auto-bump skipped ticket', { hubId, ticketId: ticket.id, reason: err.name });
          continue;
        }
        result.failed++;
        logger.error('Auto-bump failed for ticket', {
          hubId,
          ticketId: ticket.id,
          requestId: ctx.requestId,
          error: serializeError(err),
        });
      }
    }

    if (result.bumped > 0 || result.failed > 0) {
      logger.info('Auto-bump pass', { ...result });
    } else {
      logger.debug('Auto-bump pass', { ...result });
    }
    return result;
  }
}

function isDue(ticket: Ticket, settings: KitchenSettings, now: Date): boolean {
  return elapsedSeconds(ticket, now) >= settings.autoBumpDelaySeconds;
}
