#!/usr/bin/env node

import { Command } from 'commander';
import { hostname } from 'os';
import pc from 'picocolors';
import { StreamSubscriber } from './subscriber';
import { formatRecord } from './format';

const VERSION = '0.1.0';

interface CliOptions {
  url: string;
  clientId: string;
  apiKey?: string;
  insecure: boolean;
}

const program = new Command();

program
  .name('tallystream-client')
  .description('Subscribe to a Tallystream server and print every verified count record')
  .version(VERSION, '-v, --version', 'Display version number')
  .option('--url <url>', 'Stream URL', process.env.TALLYSTREAM_URL || 'ws://localhost:3001/stream')
  .option('--client-id <id>', 'Client identifier', process.env.TALLYSTREAM_CLIENT_ID || `client-${hostname()}`)
  .option('--api-key <key>', 'Shared stream key (or TALLYSTREAM_API_KEY)', process.env.TALLYSTREAM_API_KEY)
  .option('--insecure', 'Accept self-signed TLS certificates', false)
  .action(run);

async function run(options: CliOptions): Promise<void> {
  if (!options.apiKey) {
    console.error(pc.red('Error: TALLYSTREAM_API_KEY or --api-key is required'));
    process.exit(1);
  }

  console.log(pc.cyan(pc.bold(`Tallystream client v${VERSION}`)));
  console.log(pc.dim(`Connecting to ${options.url} as ${options.clientId}`));

  const subscriber = new StreamSubscriber({
    url: options.url,
    clientId: options.clientId,
    apiKey: options.apiKey,
    insecure: options.insecure,
    onRecord: (payload) => console.log(formatRecord(payload)),
    onError: (error) => console.error(pc.yellow(`${error.name}: ${error.message}`)),
  });

  const shutdown = async () => {
    await subscriber.stop();
    process.exit(0);
  };

  process.on('SIGINT', () => void shutdown());
  process.on('SIGTERM', () => void shutdown());

  subscriber.start();
}

program.parseAsync(process.argv).catch((error: unknown) => {
  console.error(pc.red(`Failed to start client: ${error instanceof Error ? error.message : String(error)}`));
  process.exit(1);
});
