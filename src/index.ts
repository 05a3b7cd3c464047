#!/usr/bin/env node

/**
 * Entry point: wires configuration, storage, tokenizer and provider into a
 * SessionManager and runs the terminal chat.
 */

import { getConfig, printConfigInfo } from './config.js';
import { ConfigurationError } from './core/errors.js';
import { DatabaseConnection } from './infrastructure/database/DatabaseConnection.js';
import { ChatRepository } from './infrastructure/database/repositories/ChatRepository.js';
import { TiktokenCounter } from './infrastructure/tokenizer/TiktokenCounter.js';
import { OpenAIStreamClient } from './infrastructure/http/OpenAIStreamClient.js';
import { SessionManager } from './application/services/SessionManager.js';
import { ChatCli } from './presentation/ChatCli.js';
import { createLogger } from './utils/logger.js';

async function main() {
  let connection: DatabaseConnection | null = null;
  let tokenCounter: TiktokenCounter | null = null;
  const logger = createLogger('main');

  try {
    const config = getConfig();
    printConfigInfo(config);

    connection = new DatabaseConnection(config.storage.dbPath);
    tokenCounter = new TiktokenCounter(config.tokenizer.cacheSize);
    const completionProvider = new OpenAIStreamClient(
      config.provider.apiBase,
      config.provider.apiKey
    );

    const { model, systemMessage, ...budgetAndSampling } = config.chat;
    const manager = new SessionManager(
      new ChatRepository(connection.getDatabase()),
      { tokenCounter, completionProvider },
      {
        settings: { model, ...budgetAndSampling },
        waitingIntervalMs: config.ui.waitingIntervalMs,
        logger: createLogger('SessionManager', config.debug),
      }
    );

    const loaded = manager.loadSessions();
    logger.info(`Loaded ${loaded} saved chats`);

    await new ChatCli(manager, connection, systemMessage).run();
  } catch (error) {
    if (error instanceof ConfigurationError) {
      logger.error(error.message);
    } else {
      logger.error('Fatal error in main():', error);
    }
    process.exitCode = 1;
  } finally {
    tokenCounter?.dispose();
    connection?.close();
  }
}

main().catch((error) => {
  console.error('💥 Unhandled error:', error);
  process.exit(1);
});
