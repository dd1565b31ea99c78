/**
 * XMTP Expense Agent
 *
 * Adds shared expenses to the ledger from plain chat messages and keeps a
 * searchable per-user memory of every conversation.
 */

import 'dotenv/config';
import { Agent, filter } from '@xmtp/agent-sdk';
import { getTestUrl } from '@xmtp/agent-sdk/debug';
import { ContentTypeReply, ReplyCodec, type Reply } from '@xmtp/content-type-reply';
import { ContentTypeText } from '@xmtp/content-type-text';
import OpenAI from 'openai';

import { createApiServer } from './api/expense-api.js';
import { loadConfig, type AppConfig } from './config.js';
import { CommandRouter, stripTrigger } from './utils/command-router.js';
import { ConfigError } from './utils/errors.js';
import { OpenAIExpenseParser } from './utils/expense-parser.js';
import { FileIdentityDirectory } from './utils/identity-directory.js';
import { SplitwiseLedgerClient } from './utils/ledger-client.js';
import { HttpMemoryBackend, InMemoryMemoryBackend, type MemoryBackend } from './utils/memory-backends.js';
import { MemoryPartitioner } from './utils/memory-partitioner.js';

import type { Server } from 'node:http';

function createMemoryBackend(config: AppConfig): MemoryBackend {
  if (config.memoryApiUrl === undefined) {
    console.warn('⚠️  MEMORY_API_URL is not set, memories are kept in process and lost on restart');
    return new InMemoryMemoryBackend();
  }
  return new HttpMemoryBackend({ baseUrl: config.memoryApiUrl, apiKey: config.memoryApiKey });
}

/**
 * Main agent function
 */
async function main(): Promise<void> {
  console.log('🚀 Starting XMTP Expense Agent...\n');

  let config: AppConfig;
  try {
    config = loadConfig();
  } catch (error) {
    if (error instanceof ConfigError) {
      console.error(`❌ Error: ${error.message}`);
      process.exit(1);
    }
    throw error;
  }

  const openai = new OpenAI({ apiKey: config.openaiApiKey });
  const identities = new FileIdentityDirectory(config.identityFile);
  const ledger = new SplitwiseLedgerClient({ baseUrl: config.ledgerApiUrl });
  const parser = new OpenAIExpenseParser(openai, { model: config.openaiModel });
  const memory = new MemoryPartitioner(createMemoryBackend(config), { searchLimit: config.memorySearchLimit });

  const router = new CommandRouter({
    identities,
    ledger,
    parser,
    memory,
    defaultCurrency: config.defaultCurrency,
    clarityCheck: config.clarityCheck,
    authStartUrl: config.authStartUrl,
  });

  let apiServer: Server | undefined;
  if (config.apiPort !== undefined) {
    const port = config.apiPort;
    apiServer = createApiServer({
      router,
      identities,
      ledger,
      parser,
      memory,
      defaultCurrency: config.defaultCurrency,
    }).listen(port, () => {
      console.log(`🌐 HTTP API listening on port ${port}`);
    });
  }

  // Shutdown flag to prevent processing during shutdown
  let isShuttingDown = false;

  const agent = await Agent.createFromEnv({
    codecs: [new ReplyCodec()],
    env: config.xmtpEnv,
  });

  agent.on('start', () => {
    console.log('✅ Agent is ready and listening for messages!\n');
    console.log('📬 Agent Address:', agent.address);
    console.log('🔗 Test URL:', getTestUrl(agent.client));
    console.log('🌐 Environment:', config.xmtpEnv);
    console.log(`💱 Default currency: ${config.defaultCurrency}\n`);
  });

  agent.on('text', async (ctx) => {
    if (isShuttingDown) return;

    // Skip own messages to prevent loops
    if (filter.fromSelf(ctx.message, ctx.client)) return;

    let text: string | null = ctx.message.content;
    if (!filter.isDM(ctx.conversation)) {
      text = stripTrigger(ctx.message.content, config.agentTrigger);
      if (text === null) {
        console.log(`⏭️  Skipping group message (not triggered with "${config.agentTrigger}")`);
        return;
      }
    }

    const response = await router.handleMessage({
      senderId: ctx.message.senderInboxId,
      text,
      receivedAt: new Date(),
    });

    const reply: Reply = {
      reference: ctx.message.id,
      content: response.text,
      contentType: ContentTypeText,
    };
    await ctx.conversation.send(reply, ContentTypeReply);
    console.log(`✉️  Replied (${response.route}, ${response.status})`);
  });

  agent.on('unhandledError', (error) => {
    console.error('💥 Unhandled error:', error);
  });

  const gracefulShutdown = async (signal: string): Promise<void> => {
    if (isShuttingDown) {
      return;
    }
    isShuttingDown = true;

    console.log(`\n⚠️  Received ${signal}, shutting down gracefully...`);

    try {
      if (apiServer !== undefined) {
        const server = apiServer;
        await new Promise<void>((resolve, reject) => {
          server.close((error) => (error === undefined ? resolve() : reject(error)));
        });
        console.log('🌐 HTTP API closed');
      }
      // In-flight chat replies get a moment to go out
      await new Promise((resolve) => {
        setTimeout(resolve, 1000);
      });
      console.log('✅ Shutdown complete');
      process.exit(0);
    } catch (error) {
      console.error('❌ Error during shutdown:', error);
      process.exit(1);
    }
  };

  process.on('SIGINT', () => {
    void gracefulShutdown('SIGINT');
  });
  process.on('SIGTERM', () => {
    void gracefulShutdown('SIGTERM');
  });

  console.log('🔄 Starting agent...\n');
  await agent.start();
}

main().catch((error) => {
  console.error('💥 Fatal error:', error);
  process.exit(1);
});
