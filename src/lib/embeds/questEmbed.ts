/**
 * Discord embed builder for quest notifications.
 * Produces the webhook payload posted for each new quest.
 */
import type { Quest, QuestTask } from '../../types/entities';

export const NEW_QUEST_CONTENT = '🎉 New Quest Available! 🎉';

const HERO_SIZE = { width: 1320, height: 350 };
const THUMBNAIL_SIZE = { width: 300, height: 300 };
const DEFAULT_THUMBNAIL_PATH =
  'assets/content/fb761d9c206f93cd8c4e7301798abe3f623039a4054f2e7accd019e1bb059fc8.webm';

const TASK_EMOJI: Record<string, string> = {
  WATCH_VIDEO: '📺',
  PLAY_ON_DESKTOP: '🖥️',
  STREAM_ON_DESKTOP: '📡',
  PLAY_ACTIVITY: '🎮',
  WATCH_VIDEO_ON_MOBILE: '📱',
};
const DEFAULT_TASK_EMOJI = '📋';

export interface EmbedField {
  name: string;
  value: string;
  inline: boolean;
}

export interface DiscordEmbed {
  title: string;
  url: string;
  description: string;
  color: number;
  fields: EmbedField[];
  footer: { text: string };
  timestamp: string;
  thumbnail?: { url: string };
  image?: { url: string };
}

export interface WebhookMessage {
  content: string;
  tts: boolean;
  embeds: DiscordEmbed[];
  components: unknown[];
  flags: number;
}

export interface QuestEmbedOptions {
  questPageBaseUrl: string;
  cdnBaseUrl: string;
  timeZone: string;
  now?: Date;
}

export function buildQuestMessage(quest: Quest, options: QuestEmbedOptions): WebhookMessage {
  return {
    content: NEW_QUEST_CONTENT,
    tts: false,
    embeds: [buildQuestEmbed(quest, options)],
    components: [],
    flags: 0,
  };
}

export function buildQuestEmbed(quest: Quest, options: QuestEmbedOptions): DiscordEmbed {
  const questUrl = `${options.questPageBaseUrl}/${quest.id}`;
  const fields: EmbedField[] = [
    { name: '📆 Starts', value: formatQuestDate(quest.activatedAt, options.timeZone), inline: true },
    { name: '🗓️ Expires', value: formatQuestDate(quest.expiresAt, options.timeZone), inline: true },
  ];

  if (quest.tasks.length > 0) {
    fields.push({ name: '📝 Tasks', value: quest.tasks.map(formatTask).join('\n\t'), inline: false });
  }

  if (quest.rewards.length > 0) {
    fields.push({
      name: '🎁 Rewards',
      value: quest.rewards.map((reward) => reward.name).join('\n\t'),
      inline: false,
    });
  }

  fields.push({ name: '🔍 View Quest', value: `[Click here to view quest](${questUrl})`, inline: false });

  const rewardAsset = quest.rewards[0]?.asset;
  const embed: DiscordEmbed = {
    title: quest.gameTitle,
    url: questUrl,
    description: `Name: **${quest.name}**\nPublisher: **${quest.gamePublisher}**`,
    color: colorForQuest(quest.id),
    fields,
    footer: { text: `ID: ${quest.id}` },
    timestamp: (options.now ?? new Date()).toISOString(),
    thumbnail: {
      url: rewardAsset
        ? questAssetUrl(options.cdnBaseUrl, quest.id, rewardAsset, THUMBNAIL_SIZE)
        : `${options.cdnBaseUrl}/${DEFAULT_THUMBNAIL_PATH}?format=webp&width=${THUMBNAIL_SIZE.width}&height=${THUMBNAIL_SIZE.height}`,
    },
  };

  if (quest.heroAsset) {
    embed.image = { url: questAssetUrl(options.cdnBaseUrl, quest.id, quest.heroAsset, HERO_SIZE) };
  }

  return embed;
}

/**
 * DD-MM-YYYY HH:mm in the given IANA time zone
 */
export function formatQuestDate(iso: string, timeZone: string): string {
  const parts = new Intl.DateTimeFormat('en-GB', {
    timeZone,
    day: '2-digit',
    month: '2-digit',
    year: 'numeric',
    hour: '2-digit',
    minute: '2-digit',
    hourCycle: 'h23',
  }).formatToParts(new Date(iso));

  const part = (type: Intl.DateTimeFormatPartTypes): string =>
    parts.find((candidate) => candidate.type === type)?.value ?? '';

  return `${part('day')}-${part('month')}-${part('year')} ${part('hour')}:${part('minute')}`;
}

export function formatTask(task: QuestTask): string {
  const emoji = TASK_EMOJI[task.eventName] ?? DEFAULT_TASK_EMOJI;
  const title = task.eventName
    .toLowerCase()
    .split('_')
    .filter(Boolean)
    .map((word) => word.charAt(0).toUpperCase() + word.slice(1))
    .join(' ');
  return `${emoji} ${title} For ${formatDuration(task.targetSeconds)}`;
}

export function formatDuration(seconds: number): string {
  if (seconds < 60) {
    return `${seconds} seconds`;
  }
  const minutes = seconds / 60;
  if (Number.isInteger(minutes)) {
    return `${minutes} minutes`;
  }
  return `${minutes.toFixed(1)} minutes`;
}

/**
 * Stable 24-bit colour per quest, so reposts of the same quest look the same
 */
export function colorForQuest(questId: string): number {
  let hash = 0;
  for (const char of questId) {
    hash = (hash * 31 + char.charCodeAt(0)) >>> 0;
  }
  return hash & 0xffffff;
}

function questAssetUrl(
  cdnBaseUrl: string,
  questId: string,
  assetPath: string,
  size: { width: number; height: number }
): string {
  return `${cdnBaseUrl}/quests/${questId}/${assetPath}?format=webp&width=${size.width}&height=${size.height}`;
}
