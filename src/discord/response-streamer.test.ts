import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { Colors, MessageFlags } from 'discord.js';
import { streamResponse } from './response-streamer.js';
import type { EditPayload, ReplyPayload, ReplyTarget, StreamedMessage } from './response-streamer.js';

class FakeChannel {
  readonly messages: FakeMessage[] = [];
  editError: unknown = null;
  readonly trigger: ReplyTarget = { reply: (p) => this.post(p, 'trigger') };

  async post(payload: ReplyPayload, replyToId: string): Promise<FakeMessage> {
    const message = new FakeMessage(`r${this.messages.length + 1}`, replyToId, payload, this);
    this.messages.push(message);
    return message;
  }
}

class FakeMessage implements StreamedMessage {
  readonly payloads: EditPayload[];
  editAttempts = 0;

  constructor(
    readonly id: string,
    readonly replyToId: string,
    first: ReplyPayload,
    private readonly channel: FakeChannel,
  ) {
    this.payloads = [first];
  }

  async edit(payload: EditPayload): Promise<void> {
    this.editAttempts++;
    if (this.channel.editError) throw this.channel.editError;
    this.payloads.push(payload);
  }

  async reply(payload: ReplyPayload): Promise<FakeMessage> {
    return this.channel.post(payload, this.id);
  }

  get current(): EditPayload | undefined {
    return this.payloads[this.payloads.length - 1];
  }
}

/** Hand-fed delta source. */
class DeltaFeed implements AsyncIterable<string> {
  private readonly queue: Array<IteratorResult<string> | Error> = [];
  private waiter: { resolve: (r: IteratorResult<string>) => void; reject: (e: Error) => void } | null = null;
  returned = false;

  push(text: string): void {
    this.deliver({ done: false, value: text });
  }

  end(): void {
    this.deliver({ done: true, value: undefined });
  }

  fail(err: Error): void {
    this.deliver(err);
  }

  private deliver(item: IteratorResult<string> | Error): void {
    const waiter = this.waiter;
    if (!waiter) {
      this.queue.push(item);
      return;
    }
    this.waiter = null;
    if (item instanceof Error) waiter.reject(item);
    else waiter.resolve(item);
  }

  [Symbol.asyncIterator](): AsyncIterator<string> {
    return {
      next: () => {
        const item = this.queue.shift();
        if (item instanceof Error) return Promise.reject(item);
        if (item) return Promise.resolve(item);
        return new Promise<IteratorResult<string>>((resolve, reject) => {
          this.waiter = { resolve, reject };
        });
      },
      return: async () => {
        this.returned = true;
        return { done: true, value: undefined };
      },
    };
  }
}

function shownText(payload: EditPayload | undefined): string | undefined {
  return payload?.content ?? payload?.embeds?.[0]?.toJSON().description;
}

function shownColor(payload: EditPayload | undefined): number | undefined {
  return payload?.embeds?.[0]?.toJSON().color;
}

const settle = () => vi.advanceTimersByTimeAsync(0);

describe('streamResponse', () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('sends on the first delta, then edits at most once per interval', async () => {
    const channel = new FakeChannel();
    const feed = new DeltaFeed();
    const run = streamResponse(feed, { target: channel.trigger, mode: 'embed', editIntervalMs: 1000 });

    feed.push('Hel');
    await settle();
    expect(channel.messages).toHaveLength(1);
    const [first] = channel.messages;
    expect(first?.replyToId).toBe('trigger');
    expect(first?.payloads[0]).toMatchObject({
      flags: MessageFlags.SuppressNotifications,
      allowedMentions: { parse: [], repliedUser: false },
    });
    expect(shownText(first?.current)).toBe('Hel ⚪');
    expect(shownColor(first?.current)).toBe(Colors.Orange);

    feed.push('lo');
    feed.push(' world');
    await settle();
    expect(first?.payloads).toHaveLength(1);

    await vi.advanceTimersByTimeAsync(1000);
    expect(first?.payloads).toHaveLength(2);
    expect(shownText(first?.current)).toBe('Hello world ⚪');

    await vi.advanceTimersByTimeAsync(1000);
    expect(first?.payloads).toHaveLength(2);

    feed.end();
    const result = await run;

    expect(first?.payloads).toHaveLength(3);
    expect(shownText(first?.current)).toBe('Hello world');
    expect(shownColor(first?.current)).toBe(Colors.DarkGreen);
    expect(result).toEqual({
      text: 'Hello world',
      segments: ['Hello world'],
      messageIds: ['r1'],
      completed: true,
      aborted: false,
    });
  });

  it('spaces the first edit a full interval after a late first send', async () => {
    const channel = new FakeChannel();
    const feed = new DeltaFeed();
    const run = streamResponse(feed, { target: channel.trigger, mode: 'plain', editIntervalMs: 1000 });

    await vi.advanceTimersByTimeAsync(900);
    feed.push('a');
    await settle();
    expect(channel.messages).toHaveLength(1);
    const [first] = channel.messages;

    feed.push('b');
    await vi.advanceTimersByTimeAsync(100);
    expect(first?.payloads).toHaveLength(1);

    await vi.advanceTimersByTimeAsync(1000);
    expect(first?.payloads).toHaveLength(2);
    expect(shownText(first?.current)).toBe('ab');

    feed.end();
    await run;
  });

  it('continues past the limit in a reply to the previous segment', async () => {
    const channel = new FakeChannel();
    const feed = new DeltaFeed();
    const run = streamResponse(feed, { target: channel.trigger, mode: 'plain', editIntervalMs: 1000 });

    feed.push('a'.repeat(1500));
    await settle();
    feed.push('b'.repeat(1000));
    feed.end();
    const result = await run;

    expect(channel.messages.map((m) => m.replyToId)).toEqual(['trigger', 'r1']);
    expect(shownText(channel.messages[0]?.current)).toBe('a'.repeat(1500) + 'b'.repeat(500));
    expect(shownText(channel.messages[1]?.current)).toBe('b'.repeat(500));
    expect(result.segments.join('')).toBe(result.text);
    expect(result.text).toBe('a'.repeat(1500) + 'b'.repeat(1000));
    expect(result.messageIds).toEqual(['r1', 'r2']);
  });

  it('keeps an emoji whole when it lands on the message limit', async () => {
    const channel = new FakeChannel();
    const feed = new DeltaFeed();
    feed.push('a'.repeat(1999) + '😀b');
    feed.end();

    const result = await streamResponse(feed, { target: channel.trigger, mode: 'plain', editIntervalMs: 1000 });

    expect(channel.messages.map((m) => shownText(m.current))).toEqual(['a'.repeat(1999), '😀b']);
    expect(result.segments).toEqual(['a'.repeat(1999), '😀b']);
  });

  it('shows warnings on the first embed only', async () => {
    const channel = new FakeChannel();
    const feed = new DeltaFeed();
    feed.push('x'.repeat(5000));
    feed.end();

    await streamResponse(feed, {
      target: channel.trigger,
      mode: 'embed',
      editIntervalMs: 1000,
      warnings: ['⚠️ Unsupported attachments'],
    });

    expect(channel.messages).toHaveLength(2);
    expect(channel.messages[0]?.current?.embeds?.[0]?.toJSON().fields).toEqual([
      { name: '⚠️ Warnings', value: '⚠️ Unsupported attachments' },
    ]);
    expect(channel.messages[1]?.current?.embeds?.[0]?.toJSON().fields).toBeUndefined();
    expect(shownText(channel.messages[0]?.current)).toHaveLength(4094);
  });

  it('keeps partial text and marks the reply as failed', async () => {
    const channel = new FakeChannel();
    const feed = new DeltaFeed();
    const run = streamResponse(feed, { target: channel.trigger, mode: 'embed', editIntervalMs: 1000 });

    feed.push('partial');
    await settle();
    feed.fail(new Error('boom'));
    const result = await run;

    expect(shownText(channel.messages[0]?.current)).toBe('partial\n\n⚠️ boom');
    expect(shownColor(channel.messages[0]?.current)).toBe(Colors.Red);
    expect(result).toMatchObject({ text: 'partial', completed: false, aborted: false, error: 'boom' });
  });

  it('posts the error on its own when it does not fit', async () => {
    const channel = new FakeChannel();
    const feed = new DeltaFeed();
    const run = streamResponse(feed, {
      target: channel.trigger,
      mode: 'plain',
      editIntervalMs: 1000,
      describeError: () => 'Upstream failed',
    });

    feed.push('x'.repeat(1999));
    await settle();
    feed.fail(new Error('boom'));
    const result = await run;

    expect(shownText(channel.messages[0]?.current)).toBe('x'.repeat(1999));
    expect(channel.messages[1]?.replyToId).toBe('r1');
    expect(shownText(channel.messages[1]?.current)).toBe('⚠️ Upstream failed');
    expect(result.error).toBe('Upstream failed');
    expect(result.messageIds).toEqual(['r1', 'r2']);
  });

  it('stops consuming and releases the source when aborted', async () => {
    const channel = new FakeChannel();
    const feed = new DeltaFeed();
    const controller = new AbortController();
    const run = streamResponse(feed, {
      target: channel.trigger,
      mode: 'embed',
      editIntervalMs: 1000,
      signal: controller.signal,
    });

    feed.push('hi');
    await settle();
    controller.abort();
    const result = await run;

    expect(feed.returned).toBe(true);
    expect(result).toMatchObject({ text: 'hi', completed: false, aborted: true });
    expect(shownColor(channel.messages[0]?.current)).toBe(Colors.DarkGreen);
  });

  it('stops when the reply was deleted', async () => {
    const channel = new FakeChannel();
    const feed = new DeltaFeed();
    const run = streamResponse(feed, { target: channel.trigger, mode: 'embed', editIntervalMs: 1000 });

    feed.push('a');
    await settle();
    channel.editError = Object.assign(new Error('Unknown Message'), { code: 10008 });
    feed.push('b');
    await vi.advanceTimersByTimeAsync(1000);
    const result = await run;

    expect(feed.returned).toBe(true);
    expect(channel.messages[0]?.editAttempts).toBe(1);
    expect(result).toMatchObject({ text: 'ab', completed: false, aborted: true });
  });

  it('keeps streaming after an ordinary edit failure', async () => {
    const channel = new FakeChannel();
    const feed = new DeltaFeed();
    const log = { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
    const run = streamResponse(feed, { target: channel.trigger, mode: 'plain', editIntervalMs: 1000, log });

    feed.push('a');
    await settle();
    channel.editError = Object.assign(new Error('rate limited'), { code: 429 });
    feed.push('b');
    await vi.advanceTimersByTimeAsync(1000);
    channel.editError = null;
    feed.push('c');
    feed.end();
    const result = await run;

    expect(log.warn).toHaveBeenCalledWith(expect.objectContaining({ segment: 0 }), 'streamer:edit failed');
    expect(shownText(channel.messages[0]?.current)).toBe('abc');
    expect(result.completed).toBe(true);
  });

  it('sends a placeholder when the reply is empty', async () => {
    const channel = new FakeChannel();
    const feed = new DeltaFeed();
    feed.end();

    const result = await streamResponse(feed, { target: channel.trigger, mode: 'plain', editIntervalMs: 1000 });

    expect(shownText(channel.messages[0]?.current)).toBe('*(no response)*');
    expect(result).toEqual({ text: '', segments: [], messageIds: ['r1'], completed: true, aborted: false });
  });

  it('reports each sent message', async () => {
    const channel = new FakeChannel();
    const feed = new DeltaFeed();
    feed.push('y'.repeat(2500));
    feed.end();
    const sent: string[] = [];

    await streamResponse(feed, {
      target: channel.trigger,
      mode: 'plain',
      editIntervalMs: 1000,
      onMessageSent: (m) => sent.push(m.id),
    });

    expect(sent).toEqual(['r1', 'r2']);
  });
});
