#!/usr/bin/env node
import { createInterface } from 'node:readline';
import { Command } from 'commander';
import { TunnelClient } from './client/tunnel-client';
import { loadConfig, type Prompt, type RawConfig } from './config';
import { errorMessage } from './errors';
import { logger } from './utils/logger';

const BANNER = `
  ┌─┐┌─┐┬  ┌─┐┬ ┬   ┌┬┐┬ ┬┌┐┌┌┐┌┌─┐┬
  ├┬┘├┤ │  ├─┤└┬┘ ─  │ │ │││││││├┤ │
  ┴└─└─┘┴─┘┴ ┴ ┴     ┴ └─┘┘└┘┘└┘└─┘┴─┘
`;

interface CliOptions {
  server?: string;
  serverPort?: string;
  localHost?: string;
  localPort?: string;
  clientId?: string;
  secret?: string;
  timeout?: string;
}

function createPrompt(): { prompt: Prompt; close: () => void } {
  const rl = createInterface({ input: process.stdin, output: process.stdout });
  const prompt: Prompt = (question, defaultValue) => {
    const suffix = defaultValue ? ` [${defaultValue}]` : '';
    return new Promise((resolve) => {
      rl.question(`Enter ${question}${suffix}: `, resolve);
    });
  };
  return { prompt, close: () => rl.close() };
}

const program = new Command();

program
  .name('relay-tunnel')
  .description('Expose a local TCP service through a relay server')
  .version('0.1.0')
  .argument('[config-file]', 'YAML config file')
  .option('--server <host>', 'Relay server host (or set RELAY_TUNNEL_SERVER env var)')
  .option('--server-port <number>', 'Relay server control port (or set RELAY_TUNNEL_SERVER_PORT env var)')
  .option('--local-host <host>', 'Local host to forward to (default 127.0.0.1)')
  .option('-p, --local-port <number>', 'Local port to expose')
  .option('--client-id <id>', 'Client ID (or set RELAY_TUNNEL_CLIENT_ID env var)')
  .option('--secret <key>', 'Shared secret (or set RELAY_TUNNEL_SECRET env var)')
  .option('--timeout <ms>', 'Network timeout in milliseconds')
  .action(async (configFile: string | undefined, opts: CliOptions) => {
    console.log(BANNER);

    const overrides: RawConfig = {
      server: opts.server,
      serverPort: opts.serverPort,
      localHost: opts.localHost,
      localPort: opts.localPort,
      clientId: opts.clientId,
      secret: opts.secret,
      networkTimeoutMs: opts.timeout,
    };

    const interactive = process.stdin.isTTY ? createPrompt() : null;
    let client: TunnelClient;
    try {
      const config = await loadConfig({ file: configFile, overrides, prompt: interactive?.prompt });
      client = new TunnelClient(config);
    } catch (err) {
      logger.error(errorMessage(err));
      process.exit(1);
    } finally {
      interactive?.close();
    }

    try {
      const tunnel = await client.connect();
      logger.success('Tunnel established!');
      logger.info(`Public address: ${tunnel.publicAddress}`);
      logger.info('Listening for connections to forward. Press Ctrl+C to close the tunnel.\n');
    } catch (err) {
      logger.error(`Failed to establish tunnel: ${errorMessage(err)}`);
      process.exit(1);
    }

    const shutdown = async (): Promise<void> => {
      logger.info('\nClosing tunnel...');
      await client.close();
      process.exit(0);
    };

    process.on('SIGINT', shutdown);
    process.on('SIGTERM', shutdown);

    try {
      await client.listen();
    } catch (err) {
      logger.error(`Tunnel closed: ${errorMessage(err)}`);
      process.exit(1);
    }
  });

program.parseAsync().catch((err: unknown) => {
  logger.error(errorMessage(err));
  process.exit(1);
});
