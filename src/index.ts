#!/usr/bin/env node

/**
 * Support tips bot
 *
 * Listens to one Discord group and answers allow-listed members:
 * - free text gets a reply, at most once per MIN_REPLY_SECONDS per member
 * - `!tip` returns a canned tip
 *
 * REPLY_MODE=generative asks Claude for a reply built from the member's last
 * ten messages; REPLY_MODE=static always answers with a canned tip.
 */

// Must run before any module that reads process.env at import time
import 'dotenv/config';
import { ConfigError, loadConfig } from './config.js';
import { ResponseCoordinator } from './coordinator.js';
import { DiscordClient, type InboundEvent } from './discord-client.js';
import { logger } from './logger.js';
import { createReplyGenerator } from './reply-generator.js';
import type { BotConfig } from './types.js';

async function handleInbound(
  event: InboundEvent,
  coordinator: ResponseCoordinator,
  discordClient: DiscordClient
): Promise<void> {
  logger.debug('Bot', `Inbound ${event.kind} from ${event.authorTag} in ${event.channelId}`);

  const outcome = event.kind === 'tip'
    ? coordinator.handleTipCommand(event.participantId)
    : await coordinator.handleMessage(event.participantId, event.content);

  if (outcome.kind === 'skip') {
    logger.debug('Bot', `No reply to ${event.authorTag}: ${outcome.reason}`);
    return;
  }

  const sent = await discordClient.replyToMessage(event.message, outcome.text);
  if (sent) {
    logger.info('Bot', `Replied to ${event.authorTag} (${event.kind})`);
  }
}

async function main(config: BotConfig): Promise<void> {
  logger.info('Bot', `Starting in ${config.mode} mode`, {
    allowListSize: config.allowList.size,
    minReplySeconds: config.minReplySeconds,
    channelId: config.channelId ?? null,
  });

  const coordinator = new ResponseCoordinator({
    mode: config.mode,
    allowList: config.allowList,
    minReplySeconds: config.minReplySeconds,
    generator: createReplyGenerator(config),
  });

  const discordClient = new DiscordClient({
    channelId: config.channelId,
    commandPrefix: config.commandPrefix,
  });

  discordClient.on('inbound', (event: InboundEvent) => {
    handleInbound(event, coordinator, discordClient).catch((error: unknown) => {
      const msg = error instanceof Error ? error.message : String(error);
      logger.error('Bot', `Failed to handle message from ${event.authorTag}`, { error: msg });
    });
  });

  const shutdown = (signal: string) => {
    logger.info('Bot', `Received ${signal}, shutting down...`);
    logger.stopHeartbeat();
    discordClient.destroy()
      .catch((error: unknown) => {
        logger.error('Bot', 'Error while closing the gateway connection', { error: String(error) });
      })
      .finally(() => process.exit(0));
  };

  process.on('SIGINT', () => shutdown('SIGINT'));
  process.on('SIGTERM', () => shutdown('SIGTERM'));
  process.on('uncaughtException', (err) => {
    logger.fatal('Bot', 'Uncaught exception', { error: err.message, stack: err.stack });
    logger.stopHeartbeat();
    process.exit(1);
  });

  logger.startHeartbeat(() => ({
    mode: config.mode,
    gatewayConnected: discordClient.isReady,
    lastGatewayEventAt: discordClient.lastGatewayEventAt,
    repliesSent: discordClient.repliesSent,
  }));

  logger.info('Bot', 'Connecting to Discord...');
  await discordClient.login(config.discordToken);
}

let config: BotConfig;
try {
  config = loadConfig();
} catch (error) {
  if (error instanceof ConfigError) {
    logger.fatal('Bot', 'Invalid configuration', { issues: error.issues });
    process.exit(1);
  }
  throw error;
}

main(config).catch((error: unknown) => {
  const err = error instanceof Error ? error : new Error(String(error));
  logger.fatal('Bot', 'Fatal error during startup', { error: err.message, stack: err.stack });
  logger.stopHeartbeat();
  process.exit(1);
});
