import { Command } from '@oclif/core';
import chalk from 'chalk';
import { UserStore } from '../store/user-store.js';
import { createServer, startServer, stopServer } from '../web/server.js';
import { ServerFlags, formatRequestLine, formatServerUrl } from './_shared/index.js';

export default class Serve extends Command {
  static override description = 'Serve the in-memory user API over HTTP';

  static override examples = [
    '<%= config.bin %> serve',
    '<%= config.bin %> serve -p 3000',
    '<%= config.bin %> serve --host 0.0.0.0 --verbose',
  ];

  static override flags = {
    port: ServerFlags.port,
    host: ServerFlags.host,
    verbose: ServerFlags.verbose,
  };

  public async run(): Promise<void> {
    const { flags } = await this.parse(Serve);

    // One store for the lifetime of the process, shared by every request
    const store = new UserStore();
    const server = createServer(store, {
      onRequest: flags.verbose ? (entry) => this.log(formatRequestLine(entry)) : undefined,
    });

    this.log(chalk.blue(`Starting server on ${flags.host}:${flags.port}`));

    try {
      await startServer(server, flags.port, flags.host);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      if (message.includes('EADDRINUSE')) {
        this.error(chalk.red(`Port ${flags.port} is already in use. Try a different port with -p <port>`));
      }
      this.error(chalk.red(`Failed to start server: ${message}`));
    }

    const address = server.address();
    const port = address && typeof address !== 'string' ? address.port : flags.port;
    this.log(chalk.green.bold(`\nServer running at ${formatServerUrl(flags.host, port)}`));
    this.log(chalk.gray('Press Ctrl+C to stop\n'));

    // Handle graceful shutdown
    const shutdown = () => {
      this.log(chalk.blue('\nShutting down...'));
      stopServer(server)
        .then(() => {
          this.log(chalk.green(`Server stopped. ${store.size} user(s) discarded.`));
          process.exit(0);
        })
        .catch((error: unknown) => {
          const message = error instanceof Error ? error.message : String(error);
          console.error(chalk.red(`Failed to stop server: ${message}`));
          process.exit(1);
        });
    };

    process.once('SIGINT', shutdown);
    process.once('SIGTERM', shutdown);

    // Keep the process running
    await new Promise(() => {
      // Never resolves - waits for SIGINT/SIGTERM
    });
  }
}
