import { describe, test, expect, vi } from 'vitest';
import type { CompletionClient } from '../src/claude.js';
import { type CoordinatorOptions, RESTRICTED_MESSAGE, ResponseCoordinator } from '../src/coordinator.js';
import { GenerativeReplyGenerator, type ReplyGenerator } from '../src/reply-generator.js';
import { TIPS } from '../src/tips.js';
import { manualClock } from './helpers.js';

function echoGenerator(kind: ReplyGenerator['kind'] = 'generative') {
  const generate = vi.fn<ReplyGenerator['generate']>(async (history) => `reply:${history.join('|')}`);
  return { generator: { kind, generate }, generate };
}

function makeCoordinator(overrides: Partial<CoordinatorOptions> = {}) {
  const clock = manualClock(0);
  const { generator, generate } = echoGenerator(overrides.mode ?? 'generative');
  const coordinator = new ResponseCoordinator({
    mode: 'generative',
    allowList: new Set(['42']),
    minReplySeconds: 5,
    generator,
    clock: clock.now,
    random: () => 0,
    ...overrides,
  });
  return { coordinator, clock, generate };
}

describe('ResponseCoordinator messages', () => {
  test('replies at most once per window', async () => {
    const { coordinator, clock } = makeCoordinator();

    expect(await coordinator.handleMessage('42', 'hello')).toEqual({ kind: 'reply', text: 'reply:hello' });
    expect(coordinator.lastSentAt('42')).toBe(0);

    clock.set(3);
    expect(await coordinator.handleMessage('42', 'still there?')).toEqual({ kind: 'skip', reason: 'rate-limited' });
    expect(coordinator.lastSentAt('42')).toBe(0);

    clock.set(6);
    expect(await coordinator.handleMessage('42', 'hi again')).toEqual({
      kind: 'reply',
      text: 'reply:hello|still there?|hi again',
    });
    expect(coordinator.lastSentAt('42')).toBe(6);
  });

  test('ignores members outside a non-empty allow-list', async () => {
    const { coordinator, generate } = makeCoordinator();

    expect(await coordinator.handleMessage('7', 'hello')).toEqual({ kind: 'skip', reason: 'not-allowed' });
    expect(generate).not.toHaveBeenCalled();
    expect(coordinator.recentHistory('7')).toEqual([]);
    expect(coordinator.lastSentAt('7')).toBeUndefined();
  });

  test('ignores events without a sender', async () => {
    const { coordinator, generate } = makeCoordinator();

    expect(await coordinator.handleMessage(null, 'hello')).toEqual({ kind: 'skip', reason: 'no-sender' });
    expect(generate).not.toHaveBeenCalled();
  });

  test('generative mode with an empty allow-list answers everyone', async () => {
    const { coordinator } = makeCoordinator({ allowList: new Set() });

    expect(await coordinator.handleMessage('7', 'hello')).toEqual({ kind: 'reply', text: 'reply:hello' });
  });

  test('history keeps only the ten newest messages', async () => {
    const { coordinator, generate } = makeCoordinator({ minReplySeconds: 3600 });

    for (let i = 1; i <= 11; i++) {
      await coordinator.handleMessage('42', `m${i}`);
    }

    const history = coordinator.recentHistory('42');
    expect(history).toHaveLength(10);
    expect(history[0]).toBe('m2');
    expect(history[9]).toBe('m11');
    // Only the first message got past the rate gate
    expect(generate).toHaveBeenCalledTimes(1);
    expect(generate).toHaveBeenCalledWith(['m1']);
  });

  test('static mode keeps no history', async () => {
    const { coordinator, generate } = makeCoordinator({ mode: 'static' });

    await coordinator.handleMessage('42', 'hello');

    expect(generate).toHaveBeenCalledWith([]);
    expect(coordinator.recentHistory('42')).toEqual([]);
  });

  test('static mode with an empty allow-list answers nobody', async () => {
    const { coordinator } = makeCoordinator({ mode: 'static', allowList: new Set() });

    expect(await coordinator.handleMessage('42', 'hello')).toEqual({ kind: 'skip', reason: 'not-allowed' });
  });

  test('a failed completion still produces a tip and consumes the window', async () => {
    const complete = vi.fn<CompletionClient['complete']>();
    complete.mockResolvedValue({ ok: false, reason: 'request-failed', detail: 'boom' });
    const clock = manualClock(100);
    const coordinator = new ResponseCoordinator({
      mode: 'generative',
      allowList: new Set(['42']),
      minReplySeconds: 5,
      generator: new GenerativeReplyGenerator({ complete }, () => 0.25),
      clock: clock.now,
    });

    await coordinator.handleMessage('42', 'a');
    clock.set(200);
    const outcome = await coordinator.handleMessage('42', 'b');

    expect(outcome).toEqual({ kind: 'reply', text: TIPS[2] });
    expect(coordinator.lastSentAt('42')).toBe(200);
  });
});

describe('ResponseCoordinator tip command', () => {
  test('generative mode always answers and leaves the window alone', () => {
    const { coordinator } = makeCoordinator({ random: () => 0.75 });

    expect(coordinator.handleTipCommand('7')).toEqual({ kind: 'reply', text: TIPS[6] });
    expect(coordinator.lastSentAt('7')).toBeUndefined();
  });

  test('generative mode answers even inside the window', async () => {
    const { coordinator } = makeCoordinator();

    await coordinator.handleMessage('42', 'hello');
    expect(coordinator.handleTipCommand('42')).toEqual({ kind: 'reply', text: TIPS[0] });
    expect(coordinator.lastSentAt('42')).toBe(0);
  });

  test('generative mode does not record the command as history', () => {
    const { coordinator } = makeCoordinator();

    coordinator.handleTipCommand('42');
    expect(coordinator.recentHistory('42')).toEqual([]);
  });

  test('static mode tells outsiders the feature is restricted', () => {
    const { coordinator } = makeCoordinator({ mode: 'static' });

    expect(coordinator.handleTipCommand('7')).toEqual({ kind: 'reply', text: RESTRICTED_MESSAGE });
    expect(coordinator.lastSentAt('7')).toBeUndefined();
  });

  test('static mode consumes the window for members', async () => {
    const { coordinator, clock, generate } = makeCoordinator({ mode: 'static', random: () => 0.5 });

    clock.set(10);
    expect(coordinator.handleTipCommand('42')).toEqual({ kind: 'reply', text: TIPS[4] });
    expect(coordinator.lastSentAt('42')).toBe(10);

    clock.set(12);
    expect(await coordinator.handleMessage('42', 'hello')).toEqual({ kind: 'skip', reason: 'rate-limited' });
    expect(generate).not.toHaveBeenCalled();
  });

  test('commands without a sender are ignored', () => {
    const { coordinator } = makeCoordinator();

    expect(coordinator.handleTipCommand(null)).toEqual({ kind: 'skip', reason: 'no-sender' });
  });
});
