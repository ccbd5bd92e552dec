/**
 * Webhook notifications for newly detected items. Delivery problems are
 * logged and reported as `false`; they never reach the change detector.
 */

import type { Item } from '../source/item.js';
import { NotificationError, errorMessage } from '../shared/errors.js';
import { logger } from '../shared/logger.js';

export type WebhookFormat = 'discord' | 'slack';

export interface Notifier {
  isEnabled(): boolean;
  send(sourceId: string, current: Item, previous: Item | null): Promise<boolean>;
}

export interface WebhookNotifierOptions {
  webhookUrl: string;
  format: WebhookFormat;
  timeoutMs?: number;
}

const DISCORD_BLURPLE = 0x5865f2;

export function buildDiscordPayload(sourceId: string, current: Item, previous: Item | null): Record<string, unknown> {
  const fields = [
    { name: 'Title', value: current.title, inline: false },
    { name: 'URL', value: `[View Article](${current.url})`, inline: false },
  ];
  if (current.publishedTime) {
    fields.push({ name: 'Published', value: current.publishedTime, inline: false });
  }

  const embed: Record<string, unknown> = {
    title: `📰 New Article: ${sourceId}`,
    url: current.url,
    color: DISCORD_BLURPLE,
    fields,
  };
  if (previous) {
    embed['footer'] = { text: `Previous: ${previous.title}` };
  }

  return {
    content: `📰 New article from ${sourceId}`,
    embeds: [embed],
  };
}

function escapeSlack(text: string): string {
  return text.replace(/&/g, '&amp;').replace(/</g, '&lt;').replace(/>/g, '&gt;');
}

export function buildSlackPayload(sourceId: string, current: Item, previous: Item | null): Record<string, unknown> {
  const context: string[] = [];
  if (current.publishedTime) context.push(`Published: ${current.publishedTime}`);
  if (previous) context.push(`Previous: ${escapeSlack(previous.title)}`);

  const blocks: Array<Record<string, unknown>> = [
    {
      type: 'section',
      text: {
        type: 'mrkdwn',
        text: `*New article from ${escapeSlack(sourceId)}*\n<${current.url}|${escapeSlack(current.title)}>`,
      },
    },
  ];
  if (context.length > 0) {
    blocks.push({
      type: 'context',
      elements: context.map((text) => ({ type: 'mrkdwn', text })),
    });
  }

  return {
    text: `New article from ${sourceId}: ${current.title}`,
    blocks,
  };
}

export class WebhookNotifier implements Notifier {
  private readonly timeoutMs: number;

  constructor(private readonly options: WebhookNotifierOptions) {
    this.timeoutMs = options.timeoutMs ?? 10000;
  }

  isEnabled(): boolean {
    return this.options.webhookUrl.length > 0;
  }

  async send(sourceId: string, current: Item, previous: Item | null): Promise<boolean> {
    if (!this.isEnabled()) return false;

    const payload =
      this.options.format === 'slack'
        ? buildSlackPayload(sourceId, current, previous)
        : buildDiscordPayload(sourceId, current, previous);

    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), this.timeoutMs);

    try {
      const response = await fetch(this.options.webhookUrl, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify(payload),
        signal: controller.signal,
      });
      if (!response.ok) {
        throw new NotificationError(`Webhook returned HTTP ${response.status}`, {
          status: response.status,
        });
      }
      logger.info({ source: sourceId, format: this.options.format }, 'Notification sent');
      return true;
    } catch (err) {
      logger.warn({ source: sourceId, error: errorMessage(err) }, 'Notification failed');
      return false;
    } finally {
      clearTimeout(timer);
    }
  }
}
