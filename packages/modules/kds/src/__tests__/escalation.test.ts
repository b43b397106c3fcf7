import { describe, it, expect } from 'vitest';
import { DEFAULT_KITCHEN_SETTINGS } from '@kitchenflow/shared';
import type { KitchenSettings } from '@kitchenflow/shared';
import { annotateTicket, classifyUrgency, elapsedSeconds } from '../services/escalation';
import { buildReadyQueue, compareReady } from '../services/ready-queue';
import { T0, makeTicket } from './helpers';

const at = (seconds: number) => new Date(T0.getTime() + seconds * 1000);
const settings: KitchenSettings = {
  ...DEFAULT_KITCHEN_SETTINGS,
  warningThresholdSeconds: 600,
  criticalThresholdSeconds: 1200,
};

describe('elapsedSeconds', () => {
  it('counts whole seconds since the last transition', () => {
    expect(elapsedSeconds(makeTicket(), at(61.9))).toBe(61);
  });

  it('is zero when the clock reads before the last transition', () => {
    expect(elapsedSeconds(makeTicket(), at(-30))).toBe(0);
  });
});

describe('classifyUrgency', () => {
  const ticket = makeTicket({ state: 'in_progress' });

  it('escalates at each threshold, inclusive', () => {
    expect(classifyUrgency(ticket, settings, at(599))).toBe('normal');
    expect(classifyUrgency(ticket, settings, at(600))).toBe('warning');
    expect(classifyUrgency(ticket, settings, at(1199))).toBe('warning');
    expect(classifyUrgency(ticket, settings, at(1200))).toBe('critical');
  });

  it('keeps terminal tickets normal', () => {
    const served = makeTicket({ state: 'served' });
    expect(classifyUrgency(served, settings, at(5000))).toBe('normal');
  });

  it('treats a non-positive threshold as disabled', () => {
    const noWarning = { ...settings, warningThresholdSeconds: 0 };
    expect(classifyUrgency(ticket, noWarning, at(700))).toBe('normal');
    expect(classifyUrgency(ticket, noWarning, at(1300))).toBe('critical');

    const noCritical = { ...settings, criticalThresholdSeconds: -1 };
    expect(classifyUrgency(ticket, noCritical, at(5000))).toBe('warning');
  });

  it('restarts the clock on every transition', () => {
    const recent = makeTicket({ state: 'accepted', lastTransitionAt: at(900) });
    expect(classifyUrgency(recent, settings, at(1000))).toBe('normal');
  });
});

describe('annotateTicket', () => {
  it('adds elapsed time and urgency without changing the ticket', () => {
    const ticket = makeTicket();
    const annotated = annotateTicket(ticket, settings, at(650));
    expect(annotated).toMatchObject({ id: 'ticket-1', elapsedSeconds: 650, urgency: 'warning' });
    expect(ticket).not.toHaveProperty('urgency');
  });
});

describe('ready queue ordering', () => {
  const bumped = (id: string, priority: number, bumpedAfter: number) =>
    makeTicket({ id, state: 'bumped', priority, bumpedAt: at(bumpedAfter) });

  it('orders by priority, then longest waiting, then id', () => {
    const queue = buildReadyQueue([
      bumped('c', 0, 10),
      bumped('b', 0, 5),
      bumped('a', 0, 10),
      bumped('d', 2, 50),
    ]);
    expect(queue.map((t) => t.id)).toEqual(['d', 'b', 'a', 'c']);
  });

  it('drops tickets that are not bumped', () => {
    const queue = buildReadyQueue([bumped('a', 0, 1), makeTicket({ id: 'b', state: 'completed' })]);
    expect(queue.map((t) => t.id)).toEqual(['a']);
  });

  it('is a total order', () => {
    expect(compareReady(bumped('a', 1, 1), bumped('a', 1, 1))).toBe(0);
  });
});
