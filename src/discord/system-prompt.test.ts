import { describe, expect, it } from 'vitest';
import type { ScopeRecord } from '../store/scope-store.js';
import { buildSystemPrompt, formatPromptDate } from './system-prompt.js';

const NOW = new Date('2026-10-08T14:05:09.000Z');

function scope(users: ScopeRecord['users'] = {}): ScopeRecord {
  return { model: 'gemini-2.5-flash', systemPrompt: null, users };
}

function profile(displayName: string, description: string | null) {
  return { displayName, description, firstSeen: NOW.toISOString(), lastUpdated: NOW.toISOString() };
}

describe('formatPromptDate', () => {
  it('formats date and time with zone name and offset', () => {
    expect(formatPromptDate(NOW, 'UTC')).toEqual({ date: 'October 08 2026', time: '14:05:09 UTC+0000' });
  });
});

describe('buildSystemPrompt', () => {
  it('substitutes date and time placeholders and trims', () => {
    const prompt = buildSystemPrompt('  Today is {date}, {time}.  ', {
      now: NOW,
      timeZone: 'UTC',
      serverName: null,
      scope: scope(),
      userIds: [],
      isDm: true,
    });
    expect(prompt).toBe('Today is October 08 2026, 14:05:09 UTC+0000.');
  });

  it('adds the server name and known users with descriptions', () => {
    const prompt = buildSystemPrompt('Base', {
      now: NOW,
      timeZone: 'UTC',
      serverName: 'Test Server',
      scope: scope({ '1': profile('Ann', 'Likes Rust'), '2': profile('Bo', null), '3': profile('Cy', 'Plays chess') }),
      userIds: ['3', '2', '1', '9'],
      isDm: false,
    });
    expect(prompt).toBe(
      'Base\n\nCurrent server: Test Server' +
        '\n\nKnown users in this conversation:\n' +
        '- <@3> (Display: Cy): Plays chess\n' +
        '- <@1> (Display: Ann): Likes Rust' +
        '\n\nWhen addressing users, use their display names naturally in conversation.',
    );
  });

  it('lists the DM peer by name', () => {
    const prompt = buildSystemPrompt('Base', {
      now: NOW,
      timeZone: 'UTC',
      serverName: null,
      scope: scope({ '1': profile('Ann', 'Likes Rust') }),
      userIds: ['1'],
      isDm: true,
    });
    expect(prompt).toBe(
      'Base\n\nKnown users in this conversation:\n- Ann: Likes Rust' +
        '\n\nWhen addressing users, use their display names naturally in conversation.',
    );
  });

  it('omits the known-users block when nobody has a description', () => {
    const prompt = buildSystemPrompt('Base', {
      now: NOW,
      timeZone: 'UTC',
      serverName: null,
      scope: scope({ '1': profile('Ann', null) }),
      userIds: ['1'],
      isDm: false,
    });
    expect(prompt).toBe('Base');
  });
});
