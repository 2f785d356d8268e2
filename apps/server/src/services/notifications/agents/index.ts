/**
 * Notification agents and the factory building them from configuration
 */

import type { NotificationSettings } from '../../../config/env.js';
import type { NotificationHandler } from '../types.js';
import { DiscordAgent } from './discord.js';
import { JsonWebhookAgent } from './jsonWebhook.js';
import { LogAgent } from './log.js';

export { BaseAgent } from './base.js';
export { DiscordAgent } from './discord.js';
export { JsonWebhookAgent } from './jsonWebhook.js';
export { LogAgent } from './log.js';

/**
 * One agent per configured target
 */
export function createAgents(settings: NotificationSettings): NotificationHandler[] {
  const agents: NotificationHandler[] = [];
  if (settings.webhookUrl) agents.push(new JsonWebhookAgent(settings.webhookUrl));
  if (settings.discordWebhookUrl) agents.push(new DiscordAgent(settings.discordWebhookUrl));
  if (settings.log) agents.push(new LogAgent());
  return agents;
}
