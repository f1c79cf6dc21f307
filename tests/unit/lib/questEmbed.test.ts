/**
 * Quest embed builder tests
 */

import {
  NEW_QUEST_CONTENT,
  buildQuestMessage,
  colorForQuest,
  formatDuration,
  formatQuestDate,
  formatTask,
} from '../../../src/lib/embeds/questEmbed';
import { makeQuest } from '../../helpers/fixtures';

const options = {
  questPageBaseUrl: 'https://quests.example',
  cdnBaseUrl: 'https://cdn.example',
  timeZone: 'Asia/Ho_Chi_Minh',
  now: new Date('2025-01-02T03:04:05.000Z'),
};

describe('buildQuestMessage', () => {
  it('renders a quest with tasks, rewards and artwork', () => {
    const quest = makeQuest('1234', {
      activatedAt: '2025-01-01T00:00:00Z',
      expiresAt: '2025-01-08T17:00:00Z',
      tasks: [
        { eventName: 'WATCH_VIDEO', targetSeconds: 900 },
        { eventName: 'PLAY_ON_DESKTOP', targetSeconds: 90 },
      ],
      rewards: [{ name: 'Orb', asset: 'rewards/orb.png' }],
      heroAsset: 'hero.png',
    });

    const message = buildQuestMessage(quest, options);

    expect(message).toEqual({
      content: NEW_QUEST_CONTENT,
      tts: false,
      components: [],
      flags: 0,
      embeds: [
        {
          title: 'Game 1234',
          url: 'https://quests.example/1234',
          description: 'Name: **Quest 1234**\nPublisher: **Test Publisher**',
          color: 1509442,
          fields: [
            { name: '📆 Starts', value: '01-01-2025 07:00', inline: true },
            { name: '🗓️ Expires', value: '09-01-2025 00:00', inline: true },
            {
              name: '📝 Tasks',
              value: '📺 Watch Video For 15 minutes\n\t🖥️ Play On Desktop For 1.5 minutes',
              inline: false,
            },
            { name: '🎁 Rewards', value: 'Orb', inline: false },
            { name: '🔍 View Quest', value: '[Click here to view quest](https://quests.example/1234)', inline: false },
          ],
          footer: { text: 'ID: 1234' },
          timestamp: '2025-01-02T03:04:05.000Z',
          thumbnail: { url: 'https://cdn.example/quests/1234/rewards/orb.png?format=webp&width=300&height=300' },
          image: { url: 'https://cdn.example/quests/1234/hero.png?format=webp&width=1320&height=350' },
        },
      ],
    });
  });

  it('falls back to the default thumbnail and omits empty sections', () => {
    const message = buildQuestMessage(makeQuest('5678'), options);
    const [embed] = message.embeds;

    expect(embed?.fields.map((field) => field.name)).toEqual(['📆 Starts', '🗓️ Expires', '🔍 View Quest']);
    expect(embed?.thumbnail?.url).toBe(
      'https://cdn.example/assets/content/fb761d9c206f93cd8c4e7301798abe3f623039a4054f2e7accd019e1bb059fc8.webm?format=webp&width=300&height=300'
    );
    expect(embed?.image).toBeUndefined();
  });
});

describe('formatQuestDate', () => {
  it('formats in the display time zone', () => {
    expect(formatQuestDate('2025-01-01T00:00:00Z', 'Asia/Ho_Chi_Minh')).toBe('01-01-2025 07:00');
    expect(formatQuestDate('2025-12-31T23:30:00Z', 'UTC')).toBe('31-12-2025 23:30');
  });
});

describe('formatDuration', () => {
  it('uses seconds below a minute and minutes otherwise', () => {
    expect(formatDuration(30)).toBe('30 seconds');
    expect(formatDuration(900)).toBe('15 minutes');
    expect(formatDuration(90)).toBe('1.5 minutes');
    expect(formatDuration(100)).toBe('1.7 minutes');
  });
});

describe('formatTask', () => {
  it('uses a generic emoji for unknown task types', () => {
    expect(formatTask({ eventName: 'ACHIEVEMENT_IN_GAME', targetSeconds: 30 })).toBe(
      '📋 Achievement In Game For 30 seconds'
    );
  });
});

describe('colorForQuest', () => {
  it('is stable per quest and fits in 24 bits', () => {
    expect(colorForQuest('1234')).toBe(colorForQuest('1234'));
    expect(colorForQuest('1234')).toBe(1509442);
    expect(colorForQuest('1417893476223946823')).toBeLessThanOrEqual(0xffffff);
  });
});
