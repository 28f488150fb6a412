#!/usr/bin/env node

/**
 * Chat backend - Entry Point
 */

import { getConfig, printConfigInfo } from './config.js';
import { openDocumentStore } from './infrastructure/database/openDocumentStore.js';
import { ChatService } from './application/services/ChatService.js';
import { WebServer } from './infrastructure/web/WebServer.js';
import type { StoreHandle } from './core/interfaces/IDocumentStore.js';

async function main() {
  let webServer: WebServer | null = null;
  let storeHandle: StoreHandle | null = null;

  try {
    const config = getConfig();
    printConfigInfo(config);

    const debugLog = (message: string) => {
      if (config.server.debug) {
        console.error(`[DEBUG] ${message}`);
      }
    };

    // Availability is decided once here; requests never reopen the store
    storeHandle = openDocumentStore(config.database.path);
    const chatService = new ChatService(storeHandle, debugLog);

    webServer = new WebServer(chatService, config.http, debugLog);
    await webServer.start();

    const shutdown = async (signal: string) => {
      console.log(`\n\n📛 Received ${signal}, shutting down gracefully...`);

      if (webServer && webServer.isRunning()) {
        await webServer.stop();
      }

      if (storeHandle?.status === 'available') {
        storeHandle.store.close();
      }

      console.log('👋 Goodbye!\n');
      process.exit(0);
    };

    process.on('SIGINT', () => {
      void shutdown('SIGINT');
    });
    process.on('SIGTERM', () => {
      void shutdown('SIGTERM');
    });

    process.on('uncaughtException', (error) => {
      console.error('💥 Uncaught Exception:', error);
      void shutdown('UNCAUGHT_EXCEPTION');
    });

    process.on('unhandledRejection', (reason) => {
      console.error('💥 Unhandled Rejection, reason:', reason);
      void shutdown('UNHANDLED_REJECTION');
    });
  } catch (error) {
    console.error('💥 Fatal error in main():', error);

    if (webServer && webServer.isRunning()) {
      await webServer.stop();
    }
    if (storeHandle?.status === 'available') {
      storeHandle.store.close();
    }

    process.exit(1);
  }
}

void main();
