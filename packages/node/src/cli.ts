#!/usr/bin/env node
import { program } from 'commander';
import { existsSync, writeFileSync } from 'node:fs';
import path from 'node:path';
import { ChannelKind, createMessage, Driver } from '@peerwire/driver';
import { loadConfig, resolveDriverOptions, type PeerwireConfig } from './config.js';
import { runNode } from './runner.js';

program.name('peerwire').description('Exchange messages with peers over peerwire').version('0.1.0');

program
  .command('start')
  .description('Start a node (load config, bind endpoints, connect peers, print messages)')
  .option('-c, --config <path>', 'Path to config file')
  .action(async (opts: { config?: string }) => {
    try {
      const { name, driver } = await runNode(opts.config);
      console.error(`Node ${name} started. Share this address with peers:`);
      console.log(JSON.stringify(driver.address));
      console.error('Press Ctrl+C to stop.');

      let shuttingDown = false;
      const shutdown = async () => {
        if (shuttingDown) {
          return;
        }
        shuttingDown = true;
        try {
          await driver.close();
        } catch (error) {
          console.error('Error stopping node:', error);
        }
        process.exit(0);
      };
      process.on('SIGINT', shutdown);
      process.on('SIGTERM', shutdown);

      for await (const message of driver.receive()) {
        console.log(JSON.stringify(message));
      }
    } catch (error) {
      console.error('Node failed:', error);
      process.exit(1);
    }
  });

program
  .command('send')
  .description('Send one message to a peer at its unicast address')
  .argument('<peer>', 'Name of the receiving peer')
  .argument('<address>', "The peer's unicast-inbound address")
  .option('-t, --tag <tag>', 'Message tag', 'message')
  .option('-p, --payload <json>', 'Message payload as JSON', 'null')
  .option('-s, --source <name>', 'Sender name (default: name from config)')
  .option('-c, --config <path>', 'Path to config file')
  .action(
    async (
      peer: string,
      address: string,
      opts: { tag: string; payload: string; source?: string; config?: string },
    ) => {
      let driver: Driver | undefined;
      try {
        const config = loadConfig(opts.config);
        const payload: unknown = JSON.parse(opts.payload);
        driver = await Driver.create(resolveDriverOptions(config));
        await driver.connect({ [peer]: { [ChannelKind.UnicastInbound]: address } });

        const message = createMessage({
          tag: opts.tag,
          source: opts.source ?? config.name ?? 'peerwire-cli',
          destination: peer,
          payload,
        });
        const result = await driver.send(message);
        if (!result.sent) {
          console.error('Send failed:', result.error.message);
          process.exitCode = 1;
          return;
        }
        console.error('Sent', message.messageId, 'to', peer);
      } catch (error) {
        console.error('Send failed:', error);
        process.exitCode = 1;
      } finally {
        await driver?.close();
      }
    },
  );

program
  .command('init')
  .description('Write a default config file')
  .option('-c, --config <path>', 'Path to write config file (default: ./peerwire.config.json)')
  .option('-n, --name <name>', 'Node name', 'my-node')
  .action((opts: { config?: string; name: string }) => {
    try {
      const configPath = path.resolve(opts.config ?? './peerwire.config.json');
      const config: PeerwireConfig = {
        name: opts.name,
        driver: resolveDriverOptions({}),
        peers: {},
      };
      if (existsSync(configPath)) {
        console.error('Config already exists at', configPath, '- skipping write to avoid overwriting.');
      } else {
        writeFileSync(configPath, JSON.stringify(config, null, 2));
        console.error('Created', configPath);
      }
    } catch (error) {
      console.error('Init failed:', error);
      process.exit(1);
    }
  });

await program.parseAsync();
