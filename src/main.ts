/**
 * Process entry point: config, mailbox, engine, HTTP server.
 */

import { loadConfig } from './config.js';
import { createEngine } from './engine.js';
import { createMailbox } from './storage/sqlite.js';
import { createMailboxSender } from './dispatch/senders.js';
import { SeededRandom } from './utils/random.js';
import { createApp, startServer } from './api/server.js';

async function main(): Promise<void> {
  const config = loadConfig();

  const mailbox = createMailbox(config.mailboxPath);
  const sender = createMailboxSender(mailbox, {
    failureRate: config.failureRate,
    random: new SeededRandom(config.seed),
  });
  const engine = createEngine(config, sender);
  const server = startServer(createApp(engine, { mailbox }), config.port);

  if (config.autostart) {
    await engine.startContinuousSimulation();
  }

  let shuttingDown = false;
  const shutdown = async (signal: string): Promise<void> => {
    if (shuttingDown) return;
    shuttingDown = true;
    console.log(`\n${signal} received, stopping simulation...`);

    await engine.stopContinuousSimulation();
    await sender.close();
    server.close();
    process.exit(0);
  };

  for (const signal of ['SIGINT', 'SIGTERM'] as const) {
    process.on(signal, () => {
      shutdown(signal).catch((error) => {
        console.error('Shutdown failed:', error);
        process.exit(1);
      });
    });
  }
}

main().catch((error) => {
  console.error('Fatal error:', error);
  process.exit(1);
});
